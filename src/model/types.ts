/**
 * Collection definition and model types
 *
 * A definition is what the caller writes; a model is what the builder
 * produces from it after validation and storage-name resolution.
 */

import type { EmbeddingGenerator } from '../embedding/embedding-generator'

// ============================================================
// Supported types
// ============================================================

export const KEY_TYPES = ['string', 'int64', 'uuid'] as const

export type KeyType = (typeof KEY_TYPES)[number]

/** Application-side key values; `bigint` is accepted for `int64` keys on write */
export type KeyValue = string | number | bigint

export const SCALAR_DATA_TYPES = [
  'string',
  'boolean',
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
  'date',
  'object',
] as const

export type ScalarDataType = (typeof SCALAR_DATA_TYPES)[number]

export type DataType = ScalarDataType | `${ScalarDataType}[]`

/** Vector types that are stored as-is, without embedding generation */
export const NATIVE_VECTOR_TYPES = ['float32[]', 'number[]', 'Float32Array', 'Embedding'] as const

export type NativeVectorType = (typeof NATIVE_VECTOR_TYPES)[number]

/**
 * Distance / similarity functions for vector properties
 */
export const DistanceFunction = {
  CosineSimilarity: 'cosine_similarity',
  DotProductSimilarity: 'dot_product_similarity',
  EuclideanDistance: 'euclidean_distance',
  MaxInnerProduct: 'max_inner_product',
} as const

export type DistanceFunctionType = (typeof DistanceFunction)[keyof typeof DistanceFunction]

/**
 * Index kinds for vector properties, with optional scalar/binary quantization
 */
export const IndexKind = {
  Hnsw: 'hnsw',
  Int8Hnsw: 'int8_hnsw',
  Int4Hnsw: 'int4_hnsw',
  BbqHnsw: 'bbq_hnsw',
  Flat: 'flat',
  Int8Flat: 'int8_flat',
  Int4Flat: 'int4_flat',
  BbqFlat: 'bbq_flat',
} as const

export type IndexKindType = (typeof IndexKind)[keyof typeof IndexKind]

// ============================================================
// Definitions
// ============================================================

interface PropertyDefinitionBase {
  /** Application-facing property name (class member or dynamic map key) */
  name: string
  /** Field name inside the stored document; inferred when omitted */
  storageName?: string
}

export interface KeyPropertyDefinition extends PropertyDefinitionBase {
  kind: 'key'
  type: KeyType | (string & {})
}

export interface DataPropertyDefinition extends PropertyDefinitionBase {
  kind: 'data'
  type: DataType | (string & {})
  /** Exact-match filterable */
  isIndexed?: boolean
  /** Tokenized, searchable text; wins over `isIndexed` */
  isFullTextIndexed?: boolean
  /** Missing values read back as `null` instead of the type's zero value */
  nullable?: boolean
}

export interface VectorPropertyDefinition extends PropertyDefinitionBase {
  kind: 'vector'
  /** A native vector type, or an input type of the attached embedding generator */
  type: NativeVectorType | (string & {})
  dimensions: number
  distanceFunction?: DistanceFunctionType | (string & {})
  indexKind?: IndexKindType | (string & {})
  embeddingGenerator?: EmbeddingGenerator
}

export type PropertyDefinition = KeyPropertyDefinition | DataPropertyDefinition | VectorPropertyDefinition

export interface CollectionDefinition {
  properties: readonly PropertyDefinition[]
}

/**
 * A record class usable with typed collections.
 *
 * `fieldNames` maps member names to document field names, the way a
 * serialization attribute would; `definition` lets the class carry its own
 * collection definition.
 */
export interface RecordType<TRecord> {
  new (): TRecord
  readonly name: string
  readonly fieldNames?: Readonly<Record<string, string>>
  readonly definition?: CollectionDefinition
}

// ============================================================
// Model
// ============================================================

interface PropertyModelBase {
  readonly name: string
  readonly storageName: string
}

export interface KeyPropertyModel extends PropertyModelBase {
  readonly kind: 'key'
  readonly type: KeyType
}

export interface DataPropertyModel extends PropertyModelBase {
  readonly kind: 'data'
  readonly type: DataType
  readonly isIndexed: boolean
  readonly isFullTextIndexed: boolean
  readonly nullable: boolean
}

export interface VectorPropertyModel extends PropertyModelBase {
  readonly kind: 'vector'
  readonly type: string
  readonly dimensions: number
  readonly distanceFunction?: string
  readonly indexKind?: string
  readonly embeddingGenerator?: EmbeddingGenerator
  /** The declared type is not a vector; values go through the generator on write */
  readonly requiresEmbeddingGeneration: boolean
}

export type PropertyModel = KeyPropertyModel | DataPropertyModel | VectorPropertyModel
