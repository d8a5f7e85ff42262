/**
 * Conversion of single property values between their application form and
 * the form stored inside a document body.
 *
 * Stored forms:
 * - vectors: flat number arrays
 * - dates: ISO-8601 strings
 * - bigint values: base-10 strings
 */

import { Embedding, describeValueType } from '../embedding/embedding'
import { UnsupportedTypeError } from '../errors'
import type { DataPropertyModel, PropertyModel, VectorPropertyModel } from '../model/types'

const NUMERIC_TYPES: ReadonlySet<string> = new Set([
  'int8',
  'uint8',
  'int16',
  'uint16',
  'int32',
  'uint32',
  'int64',
  'uint64',
  'float32',
  'float64',
])

/** 64-bit integer types; bigint values are stored as base-10 strings */
const WIDE_INTEGER_TYPES: ReadonlySet<string> = new Set(['int64', 'uint64'])

const INTEGER_PATTERN = /^-?\d+$/

/**
 * Whether the value is a numeric vector in one of the accepted shapes
 */
export function isVectorValue(value: unknown): value is Float32Array | Embedding | readonly number[] {
  if (value instanceof Float32Array || value instanceof Embedding) {
    return true
  }
  return Array.isArray(value) && value.every((item) => typeof item === 'number')
}

/**
 * Flatten a vector value into a plain number array
 */
export function toNumberArray(value: Float32Array | Embedding | readonly number[]): number[] {
  if (value instanceof Embedding) {
    return value.toArray()
  }
  return Array.from(value)
}

// ============================================================
// To storage
// ============================================================

/**
 * Convert a property value into its stored form. `undefined` means the
 * field is left out of the document.
 */
export function toStorageValue(property: PropertyModel, value: unknown): unknown {
  if (value === undefined || value === null) {
    return value
  }

  if (property.kind === 'vector') {
    // Generated vectors are written from the generator output instead
    if (property.requiresEmbeddingGeneration) {
      return undefined
    }
    if (!isVectorValue(value)) {
      throw new UnsupportedTypeError(property.name, describeValueType(value), ['number[]', 'Float32Array', 'Embedding'])
    }
    return toNumberArray(value)
  }

  if (Array.isArray(value)) {
    return value.map((item: unknown) => toStorageScalar(item))
  }
  return toStorageScalar(value)
}

function toStorageScalar(value: unknown): unknown {
  if (value instanceof Date) {
    return value.toISOString()
  }
  if (typeof value === 'bigint') {
    return value.toString()
  }
  return value
}

// ============================================================
// From storage
// ============================================================

/**
 * Convert a stored field value back into the property's application form.
 * A stored `null` reads back as the property's default value.
 */
export function fromStorageValue(property: PropertyModel, value: unknown): unknown {
  if (value === undefined || value === null) {
    return defaultValueFor(property)
  }

  switch (property.kind) {
    case 'key':
      return value
    case 'vector':
      return fromStorageVector(property, value)
    case 'data':
      return fromStorageData(property, value)
  }
}

function fromStorageVector(property: VectorPropertyModel, value: unknown): unknown {
  if (!Array.isArray(value)) {
    throw new UnsupportedTypeError(property.name, describeValueType(value), ['number[]'])
  }
  const numbers = value.map((item: unknown) => Number(item))

  switch (property.type) {
    case 'Float32Array':
      return Float32Array.from(numbers)
    case 'Embedding':
      return new Embedding(numbers)
    default:
      return numbers
  }
}

function fromStorageData(property: DataPropertyModel, value: unknown): unknown {
  const isArray = property.type.endsWith('[]')
  const elementType = isArray ? property.type.slice(0, -2) : property.type

  if (isArray && Array.isArray(value)) {
    return value.map((item: unknown) => fromStorageScalar(elementType, item))
  }
  return fromStorageScalar(elementType, value)
}

function fromStorageScalar(type: string, value: unknown): unknown {
  if (value === null || value === undefined) {
    return null
  }
  if (type === 'date' && (typeof value === 'string' || typeof value === 'number')) {
    return new Date(value)
  }
  if (WIDE_INTEGER_TYPES.has(type) && typeof value === 'string' && INTEGER_PATTERN.test(value)) {
    return toInteger(BigInt(value))
  }
  if (NUMERIC_TYPES.has(type) && typeof value === 'string' && value.trim() !== '' && !Number.isNaN(Number(value))) {
    return Number(value)
  }
  return value
}

/** Safe integers come back as numbers, wider ones keep their precision */
function toInteger(value: bigint): number | bigint {
  const number = Number(value)
  return Number.isSafeInteger(number) ? number : value
}

// ============================================================
// Defaults
// ============================================================

/**
 * Value a field gets when the document stores it as `null` or, for dynamic
 * records, leaves it out: zero for numbers, `false` for booleans, `null`
 * otherwise (or when nullable)
 */
export function defaultValueFor(property: PropertyModel): unknown {
  if (property.kind !== 'data' || property.nullable) {
    return null
  }
  if (NUMERIC_TYPES.has(property.type)) {
    return 0
  }
  if (property.type === 'boolean') {
    return false
  }
  return null
}
