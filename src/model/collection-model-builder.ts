/**
 * Collection Model Builder
 *
 * Turns a collection definition (explicit, or carried by a record class) into
 * a validated {@link CollectionModel}:
 * - exactly one key property of a supported key type
 * - data properties of supported scalar or array types
 * - vector properties of a native vector type, or of a type an attached
 *   embedding generator accepts
 * - unique application names and unique storage names
 */

import { z } from 'zod'
import type { EmbeddingGenerator } from '../embedding/embedding-generator'
import { SchemaError, UnsupportedTypeError } from '../errors'
import { CollectionModel } from './collection-model'
import { isKeyType } from './key-codec'
import { resolveNamingPolicy, type FieldNameInferrer, type NamingPolicy } from './naming-policy'
import {
  KEY_TYPES,
  NATIVE_VECTOR_TYPES,
  SCALAR_DATA_TYPES,
  type CollectionDefinition,
  type DataType,
  type DataPropertyModel,
  type KeyPropertyModel,
  type PropertyDefinition,
  type PropertyModel,
  type RecordType,
  type VectorPropertyModel,
} from './types'

export interface ModelBuildOptions {
  /** Storage-name inference for properties without an override (default: camelCase) */
  namingPolicy?: NamingPolicy
}

// ============================================================
// Definition schema
// ============================================================

const embeddingGeneratorSchema = z.custom<EmbeddingGenerator>(
  (value) =>
    typeof value === 'object' &&
    value !== null &&
    'generate' in value &&
    typeof value.generate === 'function' &&
    'inputTypes' in value &&
    Array.isArray(value.inputTypes),
  { message: 'Expected an embedding generator' }
)

const propertyBaseSchema = {
  name: z.string().min(1),
  storageName: z.string().min(1).optional(),
  type: z.string().min(1),
}

const propertyDefinitionSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('key'), ...propertyBaseSchema }),
  z.object({
    kind: z.literal('data'),
    ...propertyBaseSchema,
    isIndexed: z.boolean().optional(),
    isFullTextIndexed: z.boolean().optional(),
    nullable: z.boolean().optional(),
  }),
  z.object({
    kind: z.literal('vector'),
    ...propertyBaseSchema,
    dimensions: z.number().int().positive(),
    distanceFunction: z.string().min(1).optional(),
    indexKind: z.string().min(1).optional(),
    embeddingGenerator: embeddingGeneratorSchema.optional(),
  }),
])

const collectionDefinitionSchema = z.object({
  properties: z.array(propertyDefinitionSchema),
})

function validateDefinition(definition: CollectionDefinition): void {
  const result = collectionDefinitionSchema.safeParse(definition)
  if (result.success) {
    return
  }

  const issue = result.error.issues[0]
  const [, index] = issue.path
  const property = typeof index === 'number' ? definition.properties[index] : undefined
  const propertyName = property && typeof property.name === 'string' ? property.name : undefined
  const location = issue.path.join('.')
  throw new SchemaError(
    `Invalid collection definition at '${location}': ${issue.message}`,
    propertyName
  )
}

// ============================================================
// Type checks
// ============================================================

const DATA_TYPES: readonly string[] = [...SCALAR_DATA_TYPES, ...SCALAR_DATA_TYPES.map((t) => `${t}[]`)]

function isDataType(type: string): type is DataType {
  return DATA_TYPES.includes(type)
}

/**
 * Whether values of the declared vector type are stored as-is
 */
export function isNativeVectorType(type: string): boolean {
  return (NATIVE_VECTOR_TYPES as readonly string[]).includes(type)
}

// ============================================================
// Builders
// ============================================================

/**
 * Build the model of a collection of class records.
 *
 * The definition comes from the argument, or from the class's static
 * `definition`. Storage names resolve as: definition `storageName`, then the
 * class's static `fieldNames` entry, then the naming policy.
 */
export function buildCollectionModel<TRecord>(
  recordType: RecordType<TRecord>,
  definition?: CollectionDefinition,
  defaultGenerator?: EmbeddingGenerator,
  options: ModelBuildOptions = {}
): CollectionModel {
  const resolved = definition ?? recordType.definition
  if (!resolved) {
    throw new SchemaError(
      `No collection definition was supplied for record type '${recordType.name}' and the type does not declare one`
    )
  }

  const infer = resolveNamingPolicy(options.namingPolicy)
  const fieldNames = recordType.fieldNames ?? {}
  return buildModel(resolved, defaultGenerator, (name) => fieldNames[name] ?? infer(name))
}

/**
 * Build the model of a collection of dynamic (string-keyed map) records.
 * Storage names resolve as: definition `storageName`, then the naming policy.
 */
export function buildDynamicCollectionModel(
  definition: CollectionDefinition,
  defaultGenerator?: EmbeddingGenerator,
  options: ModelBuildOptions = {}
): CollectionModel {
  return buildModel(definition, defaultGenerator, resolveNamingPolicy(options.namingPolicy))
}

function buildModel(
  definition: CollectionDefinition,
  defaultGenerator: EmbeddingGenerator | undefined,
  inferStorageName: FieldNameInferrer
): CollectionModel {
  validateDefinition(definition)

  const keyDefinitions = definition.properties.filter((p) => p.kind === 'key')
  if (keyDefinitions.length === 0) {
    throw new SchemaError('No key property found in the collection definition')
  }
  if (keyDefinitions.length > 1) {
    throw new SchemaError(
      `Multiple key properties found (${keyDefinitions.map((p) => p.name).join(', ')}); exactly one is supported`,
      keyDefinitions[1].name
    )
  }

  const names = new Set<string>()
  const storageNames = new Map<string, string>()
  const properties: PropertyModel[] = []
  let keyProperty: KeyPropertyModel | undefined

  for (const property of definition.properties) {
    if (names.has(property.name)) {
      throw new SchemaError(`Duplicate property name '${property.name}'`, property.name)
    }
    names.add(property.name)

    const storageName = property.storageName ?? inferStorageName(property.name)
    const clash = storageNames.get(storageName)
    if (clash !== undefined) {
      throw new SchemaError(
        `Properties '${clash}' and '${property.name}' both map to storage name '${storageName}'`,
        property.name
      )
    }
    storageNames.set(storageName, property.name)

    const model = buildProperty(property, storageName, defaultGenerator)
    if (model.kind === 'key') {
      keyProperty = model
    }
    properties.push(model)
  }

  if (!keyProperty) {
    throw new SchemaError('No key property found in the collection definition')
  }
  return new CollectionModel(keyProperty, properties)
}

function buildProperty(
  property: PropertyDefinition,
  storageName: string,
  defaultGenerator: EmbeddingGenerator | undefined
): PropertyModel {
  switch (property.kind) {
    case 'key': {
      if (!isKeyType(property.type)) {
        throw new UnsupportedTypeError(property.name, property.type, KEY_TYPES)
      }
      const key: KeyPropertyModel = { kind: 'key', name: property.name, storageName, type: property.type }
      return Object.freeze(key)
    }

    case 'data': {
      if (!isDataType(property.type)) {
        throw new UnsupportedTypeError(property.name, property.type, DATA_TYPES)
      }
      const isFullTextIndexed = property.isFullTextIndexed ?? false
      if (isFullTextIndexed && property.type !== 'string' && property.type !== 'string[]') {
        throw new UnsupportedTypeError(property.name, property.type, ['string', 'string[]'])
      }
      const data: DataPropertyModel = {
        kind: 'data',
        name: property.name,
        storageName,
        type: property.type,
        isFullTextIndexed,
        // Full-text indexing wins when both are requested
        isIndexed: !isFullTextIndexed && (property.isIndexed ?? false),
        nullable: property.nullable ?? false,
      }
      return Object.freeze(data)
    }

    case 'vector': {
      const embeddingGenerator = property.embeddingGenerator ?? defaultGenerator
      const requiresEmbeddingGeneration = !isNativeVectorType(property.type)
      if (requiresEmbeddingGeneration && !embeddingGenerator?.inputTypes.includes(property.type)) {
        throw new UnsupportedTypeError(property.name, property.type, [
          ...NATIVE_VECTOR_TYPES,
          ...(embeddingGenerator?.inputTypes ?? []),
        ])
      }
      const vector: VectorPropertyModel = {
        kind: 'vector',
        name: property.name,
        storageName,
        type: property.type,
        dimensions: property.dimensions,
        distanceFunction: property.distanceFunction,
        indexKind: property.indexKind,
        embeddingGenerator,
        requiresEmbeddingGeneration,
      }
      return Object.freeze(vector)
    }
  }
}
