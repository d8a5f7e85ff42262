/**
 * es-vector-store - vector store collections backed by Elasticsearch
 *
 * Main entry point for the package.
 */

// Vector store and collections
export { ElasticsearchVectorStore } from './collection/vector-store'
export type { VectorStoreOptions } from './collection/vector-store'
export { ElasticsearchCollection } from './collection/elasticsearch-collection'
export type { ElasticsearchCollectionOptions } from './collection/elasticsearch-collection'
export { ElasticsearchDynamicCollection } from './collection/elasticsearch-dynamic-collection'
export type { ElasticsearchDynamicCollectionOptions } from './collection/elasticsearch-dynamic-collection'
export { BaseCollection } from './collection/base-collection'
export type { CallOptions, CollectionOptions, StoreSource, VectorSearchResult } from './collection/base-collection'

// Model
export {
  KEY_TYPES,
  SCALAR_DATA_TYPES,
  NATIVE_VECTOR_TYPES,
  DistanceFunction,
  IndexKind,
} from './model/types'
export type {
  KeyType,
  KeyValue,
  DataType,
  DistanceFunctionType,
  IndexKindType,
  PropertyDefinition,
  KeyPropertyDefinition,
  DataPropertyDefinition,
  VectorPropertyDefinition,
  CollectionDefinition,
  RecordType,
  PropertyModel,
  KeyPropertyModel,
  DataPropertyModel,
  VectorPropertyModel,
} from './model/types'
export { CollectionModel } from './model/collection-model'
export { buildCollectionModel, buildDynamicCollectionModel } from './model/collection-model-builder'
export type { ModelBuildOptions } from './model/collection-model-builder'
export { keyToStorageId, storageIdToKey } from './model/key-codec'
export { toCamelCase, toSnakeCase, resolveNamingPolicy } from './model/naming-policy'
export type { NamingPolicy } from './model/naming-policy'

// Mapping
export { buildIndexSchema, DEFAULT_DISTANCE_FUNCTION, DEFAULT_INDEX_KIND } from './mapping/index-schema-builder'
export { TypedRecordMapper } from './mapping/record-mapper'
export type { RecordMapper, StorageDocument } from './mapping/record-mapper'
export { DynamicRecordMapper } from './mapping/dynamic-record-mapper'
export type { DynamicRecord } from './mapping/dynamic-record-mapper'
export { ModelRecordSerializer } from './mapping/record-serializer'
export type { DocumentBody, RecordSerializer } from './mapping/record-serializer'

// Filters
export {
  field,
  index,
  constant,
  array,
  eq,
  ne,
  lt,
  lte,
  gt,
  gte,
  and,
  or,
  not,
  contains,
  call,
  arithmetic,
} from './filter/filter-expression'
export type { FilterNode, FilterValue, Operand } from './filter/filter-expression'
export { translateFilter, FilterTranslator } from './filter/filter-translator'
export { LegacyFilter, translateLegacyFilter } from './filter/legacy-filter'

// Search
export { buildVectorSearchRequest, buildHybridSearchRequest, DEFAULT_RANK_CONSTANT } from './search/search-request-builder'

// Embeddings
export { Embedding } from './embedding/embedding'
export {
  createEmbeddingGenerator,
  functionEmbeddingGenerator,
  textEmbeddingGenerator,
} from './embedding/embedding-generator'
export type { EmbeddingGenerator, EmbeddingGenerateOptions } from './embedding/embedding-generator'

// Storage
export { ElasticsearchDocumentStore, createClient } from './storage/elasticsearch-document-store'
export { SharedClient } from './storage/shared-client'
export type { DocumentStore } from './storage/types'

// Configuration
export { ConnectionConfigSchema, loadConnectionConfig } from './config/options'
export type {
  ConnectionConfig,
  GetOptions,
  QueryOptions,
  VectorSearchOptions,
  HybridSearchOptions,
  RefreshPolicy,
} from './config/options'

// Errors and logging
export {
  VectorStoreError,
  VectorStoreErrorCode,
  SchemaError,
  UnsupportedTypeError,
  UnsupportedConfigurationError,
  UnsupportedExpressionError,
  TypeMismatchError,
  AmbiguousPropertyError,
  NoEmbeddingGeneratorError,
  IncompatibleGeneratorError,
  UnsupportedCombinationError,
  InvalidArgumentError,
  InvalidKeyError,
  ClientClosedError,
  StorageOperationError,
} from './errors'
export { Logger } from './utils/logger'
export type { LogConfig, LogLevel, LoggerFunction } from './utils/logger'
