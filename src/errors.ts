/**
 * Vector Store Error Classes
 *
 * Hierarchical error classes for model building, filter translation,
 * search orchestration and backing-store operations.
 *
 * @example
 * ```typescript
 * import { SchemaError, StorageOperationError } from './errors'
 *
 * try {
 *   await collection.upsert(hotel)
 * } catch (error) {
 *   if (error instanceof StorageOperationError) {
 *     console.log(`${error.operationName} failed on ${error.collectionName}`)
 *   }
 * }
 * ```
 */

/**
 * Error codes used by the vector store
 */
export const VectorStoreErrorCode = {
  /** Malformed or ambiguous collection model */
  SCHEMA: 'SCHEMA',
  /** Declared type outside the supported set */
  UNSUPPORTED_TYPE: 'UNSUPPORTED_TYPE',
  /** Index kind / similarity pairing without a backing-store equivalent */
  UNSUPPORTED_CONFIGURATION: 'UNSUPPORTED_CONFIGURATION',
  /** Filter node or shape the translator does not recognize */
  UNSUPPORTED_EXPRESSION: 'UNSUPPORTED_EXPRESSION',
  /** Filter casts a property to an incompatible type */
  TYPE_MISMATCH: 'TYPE_MISMATCH',
  /** Zero or multiple candidate properties for a search */
  AMBIGUOUS_PROPERTY: 'AMBIGUOUS_PROPERTY',
  /** Search input is not a vector and no generator is configured */
  NO_EMBEDDING_GENERATOR: 'NO_EMBEDDING_GENERATOR',
  /** Generator configured but it does not accept the input */
  INCOMPATIBLE_GENERATOR: 'INCOMPATIBLE_GENERATOR',
  /** Option combination that cannot be honoured */
  UNSUPPORTED_COMBINATION: 'UNSUPPORTED_COMBINATION',
  /** Backing-store call failed */
  STORAGE_OPERATION: 'STORAGE_OPERATION',
  /** Invalid argument or option value */
  INVALID_ARGUMENT: 'INVALID_ARGUMENT',
  /** Key missing or not parseable into the key type */
  INVALID_KEY: 'INVALID_KEY',
  /** Document store used after its last handle was closed */
  CLIENT_CLOSED: 'CLIENT_CLOSED',
} as const

export type VectorStoreErrorCodeType = (typeof VectorStoreErrorCode)[keyof typeof VectorStoreErrorCode]

/**
 * Base error class for all vector store errors.
 */
export class VectorStoreError extends Error {
  readonly code: VectorStoreErrorCodeType

  constructor(code: VectorStoreErrorCodeType, message: string, options?: { cause?: unknown }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined)
    this.name = 'VectorStoreError'
    this.code = code

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  /**
   * Convert to a plain object for JSON serialization
   */
  toJSON(): { name: string; code: string; message: string; details: Record<string, unknown> } {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details(),
    }
  }

  protected details(): Record<string, unknown> {
    return {}
  }
}

/**
 * Thrown for a malformed or ambiguous collection model, or when a filter or
 * option names a property the model does not have.
 */
export class SchemaError extends VectorStoreError {
  readonly propertyName?: string

  constructor(message: string, propertyName?: string) {
    super(VectorStoreErrorCode.SCHEMA, message)
    this.name = 'SchemaError'
    this.propertyName = propertyName
  }

  protected override details(): Record<string, unknown> {
    return { propertyName: this.propertyName }
  }
}

/**
 * Thrown when a key, data or vector property is declared with a type outside
 * the supported set.
 *
 * @example
 * ```typescript
 * throw new UnsupportedTypeError('id', 'float32', ['string', 'int64', 'uuid'])
 * ```
 */
export class UnsupportedTypeError extends VectorStoreError {
  readonly propertyName: string | undefined
  readonly typeName: string
  readonly supportedTypes: readonly string[]

  constructor(propertyName: string | undefined, typeName: string, supportedTypes: readonly string[]) {
    const subject = propertyName ? `Property '${propertyName}' has type '${typeName}'` : `Type '${typeName}'`
    super(
      VectorStoreErrorCode.UNSUPPORTED_TYPE,
      `${subject} which is not supported. Supported types: ${supportedTypes.join(', ')}`
    )
    this.name = 'UnsupportedTypeError'
    this.propertyName = propertyName
    this.typeName = typeName
    this.supportedTypes = supportedTypes
  }

  protected override details(): Record<string, unknown> {
    return { propertyName: this.propertyName, typeName: this.typeName, supportedTypes: this.supportedTypes }
  }
}

/**
 * Thrown when a vector property asks for an index kind or similarity function
 * (or a pairing of the two) that has no backing-store equivalent.
 */
export class UnsupportedConfigurationError extends VectorStoreError {
  readonly propertyName: string
  readonly value: string

  constructor(propertyName: string, value: string, reason: string) {
    super(VectorStoreErrorCode.UNSUPPORTED_CONFIGURATION, `${reason} (property '${propertyName}', value '${value}')`)
    this.name = 'UnsupportedConfigurationError'
    this.propertyName = propertyName
    this.value = value
  }

  protected override details(): Record<string, unknown> {
    return { propertyName: this.propertyName, value: this.value }
  }
}

/**
 * Thrown for filter nodes or node shapes the translator does not recognize.
 */
export class UnsupportedExpressionError extends VectorStoreError {
  readonly nodeKind: string

  constructor(nodeKind: string, message?: string) {
    super(
      VectorStoreErrorCode.UNSUPPORTED_EXPRESSION,
      message ?? `Filter expression node '${nodeKind}' is not supported`
    )
    this.name = 'UnsupportedExpressionError'
    this.nodeKind = nodeKind
  }

  protected override details(): Record<string, unknown> {
    return { nodeKind: this.nodeKind }
  }
}

/**
 * Thrown when a filter casts a bound property to a type the property cannot
 * be converted to.
 */
export class TypeMismatchError extends VectorStoreError {
  readonly propertyName: string
  readonly propertyType: string
  readonly targetType: string

  constructor(propertyName: string, propertyType: string, targetType: string) {
    super(
      VectorStoreErrorCode.TYPE_MISMATCH,
      `Property '${propertyName}' of type '${propertyType}' cannot be converted to '${targetType}'`
    )
    this.name = 'TypeMismatchError'
    this.propertyName = propertyName
    this.propertyType = propertyType
    this.targetType = targetType
  }

  protected override details(): Record<string, unknown> {
    return { propertyName: this.propertyName, propertyType: this.propertyType, targetType: this.targetType }
  }
}

/**
 * Thrown when a search has to fall back to "the one vector (or full-text)
 * property" and the model has zero or several.
 */
export class AmbiguousPropertyError extends VectorStoreError {
  readonly role: 'vector' | 'fullText'
  readonly candidates: readonly string[]

  constructor(role: 'vector' | 'fullText', candidates: readonly string[]) {
    const what = role === 'vector' ? 'vector' : 'full-text indexed data'
    const message = candidates.length === 0
      ? `The collection does not have any ${what} property`
      : `The collection has multiple ${what} properties (${candidates.join(', ')}); specify which one to use`
    super(VectorStoreErrorCode.AMBIGUOUS_PROPERTY, message)
    this.name = 'AmbiguousPropertyError'
    this.role = role
    this.candidates = candidates
  }

  protected override details(): Record<string, unknown> {
    return { role: this.role, candidates: this.candidates }
  }
}

/**
 * Thrown when the search input is not a vector and the resolved vector
 * property has no embedding generator.
 */
export class NoEmbeddingGeneratorError extends VectorStoreError {
  readonly propertyName: string
  readonly inputType: string

  constructor(propertyName: string, inputType: string, supportedTypes: readonly string[]) {
    super(
      VectorStoreErrorCode.NO_EMBEDDING_GENERATOR,
      `Search input of type '${inputType}' is not a vector and no embedding generator is configured for property '${propertyName}'. Supported vector inputs: ${supportedTypes.join(', ')}`
    )
    this.name = 'NoEmbeddingGeneratorError'
    this.propertyName = propertyName
    this.inputType = inputType
  }

  protected override details(): Record<string, unknown> {
    return { propertyName: this.propertyName, inputType: this.inputType }
  }
}

/**
 * Thrown when the configured embedding generator cannot take the given input.
 */
export class IncompatibleGeneratorError extends VectorStoreError {
  readonly propertyName: string
  readonly inputType: string
  readonly acceptedTypes: readonly string[]

  constructor(propertyName: string, inputType: string, acceptedTypes: readonly string[]) {
    super(
      VectorStoreErrorCode.INCOMPATIBLE_GENERATOR,
      `The embedding generator configured for property '${propertyName}' does not accept input of type '${inputType}' (accepts: ${acceptedTypes.join(', ')})`
    )
    this.name = 'IncompatibleGeneratorError'
    this.propertyName = propertyName
    this.inputType = inputType
    this.acceptedTypes = acceptedTypes
  }

  protected override details(): Record<string, unknown> {
    return { propertyName: this.propertyName, inputType: this.inputType, acceptedTypes: this.acceptedTypes }
  }
}

/**
 * Thrown when options ask for something the collection cannot return, such
 * as vectors of a collection with generated embeddings.
 */
export class UnsupportedCombinationError extends VectorStoreError {
  constructor(message: string) {
    super(VectorStoreErrorCode.UNSUPPORTED_COMBINATION, message)
    this.name = 'UnsupportedCombinationError'
  }
}

/**
 * Thrown when a collection or vector store is created over a shared document
 * store that has already been closed.
 */
export class ClientClosedError extends VectorStoreError {
  constructor() {
    super(VectorStoreErrorCode.CLIENT_CLOSED, 'The shared document store has already been closed')
    this.name = 'ClientClosedError'
  }
}

/**
 * Thrown for invalid arguments and option values.
 */
export class InvalidArgumentError extends VectorStoreError {
  readonly argumentName: string

  constructor(argumentName: string, message: string) {
    super(VectorStoreErrorCode.INVALID_ARGUMENT, `Invalid argument '${argumentName}': ${message}`)
    this.name = 'InvalidArgumentError'
    this.argumentName = argumentName
  }

  protected override details(): Record<string, unknown> {
    return { argumentName: this.argumentName }
  }
}

/**
 * Thrown when a key is missing or a storage id cannot be parsed into the
 * collection's key type.
 */
export class InvalidKeyError extends VectorStoreError {
  readonly keyType: string
  readonly value: string

  constructor(keyType: string, value: string, message?: string) {
    super(VectorStoreErrorCode.INVALID_KEY, message ?? `'${value}' is not a valid ${keyType} key`)
    this.name = 'InvalidKeyError'
    this.keyType = keyType
    this.value = value
  }

  protected override details(): Record<string, unknown> {
    return { keyType: this.keyType, value: this.value }
  }
}

/**
 * Wraps any failure of a backing-store call.
 *
 * @example
 * ```typescript
 * throw new StorageOperationError('hotels', 'search', transportError)
 * ```
 */
export class StorageOperationError extends VectorStoreError {
  readonly collectionName: string | undefined
  readonly operationName: string
  /** HTTP status of the wrapped transport error, when it has one */
  readonly statusCode: number | undefined

  constructor(collectionName: string | undefined, operationName: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause)
    const target = collectionName ? ` on collection '${collectionName}'` : ''
    super(
      VectorStoreErrorCode.STORAGE_OPERATION,
      `Call to vector store failed: '${operationName}'${target}: ${reason}`,
      { cause }
    )
    this.name = 'StorageOperationError'
    this.collectionName = collectionName
    this.operationName = operationName
    this.statusCode = statusCodeOf(cause)
  }

  protected override details(): Record<string, unknown> {
    return { collectionName: this.collectionName, operationName: this.operationName, statusCode: this.statusCode }
  }
}

/**
 * Read the HTTP status code from a transport error, if it carries one
 */
export function statusCodeOf(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'statusCode' in error) {
    const { statusCode } = error
    return typeof statusCode === 'number' ? statusCode : undefined
  }
  return undefined
}

/**
 * Check whether an error is a wrapped 404 from the backing store
 */
export function isNotFound(error: unknown): boolean {
  return error instanceof StorageOperationError && error.statusCode === 404
}
