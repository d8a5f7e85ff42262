/**
 * Collection base - record operations against one index
 *
 * Shared by the typed and the dynamic collection; the two differ only in
 * their record mapper and in how a record's property values are read.
 */

import { Client } from '@elastic/elasticsearch'
import {
  HybridSearchOptionsSchema,
  GetOptionsSchema,
  QueryOptionsSchema,
  TopSchema,
  VectorSearchOptionsSchema,
  parseOptions,
  type GetOptions,
  type HybridSearchOptions,
  type QueryOptions,
  type RefreshPolicy,
  type VectorSearchOptions,
} from '../config/options'
import { describeValueType, type Embedding } from '../embedding/embedding'
import type { EmbeddingGenerator } from '../embedding/embedding-generator'
import {
  IncompatibleGeneratorError,
  InvalidArgumentError,
  InvalidKeyError,
  NoEmbeddingGeneratorError,
  StorageOperationError,
  UnsupportedCombinationError,
  VectorStoreError,
  isNotFound,
} from '../errors'
import type { FilterNode } from '../filter/filter-expression'
import { translateFilter } from '../filter/filter-translator'
import { translateLegacyFilter, type LegacyFilter } from '../filter/legacy-filter'
import { buildIndexSchema } from '../mapping/index-schema-builder'
import type { GeneratedEmbeddings, RecordMapper } from '../mapping/record-mapper'
import type { CollectionModel } from '../model/collection-model'
import { keyToStorageId, storageIdToKey } from '../model/key-codec'
import type { NamingPolicy } from '../model/naming-policy'
import { NATIVE_VECTOR_TYPES, type CollectionDefinition, type KeyValue, type VectorPropertyModel } from '../model/types'
import { resolveQueryVector } from '../search/query-vector'
import { buildHybridSearchRequest, buildVectorSearchRequest, excludedFields } from '../search/search-request-builder'
import { ElasticsearchDocumentStore } from '../storage/elasticsearch-document-store'
import { SharedClient } from '../storage/shared-client'
import type { DocumentStore, Query, SearchHit } from '../storage/types'
import { Logger, type LogConfig } from '../utils/logger'

// ============================================================
// Options
// ============================================================

/** Where a collection gets its document store from */
export type StoreSource = Client | DocumentStore | SharedClient

export interface CollectionOptions {
  /** Explicit schema; typed collections may also carry it on the record class */
  definition?: CollectionDefinition
  /** Default generator for vector properties without their own */
  embeddingGenerator?: EmbeddingGenerator
  /** Storage-name inference (default: camelCase) */
  namingPolicy?: NamingPolicy
  /** Leave `null` fields out of stored documents (default: false) */
  ignoreNullValues?: boolean
  /** Close the client when the collection is closed (default: false) */
  ownsClient?: boolean
  /** Refresh behaviour of writes when the collection wraps a client itself */
  refresh?: RefreshPolicy
  log?: Partial<LogConfig>
}

export interface CallOptions {
  signal?: AbortSignal
}

export interface VectorSearchResult<TRecord> {
  record: TRecord
  /** Store-assigned relevance; higher is better */
  score: number | null
}

/**
 * Wrap a store source into a shared, reference-counted handle
 */
export function toSharedClient(source: StoreSource, options: Pick<CollectionOptions, 'ownsClient' | 'refresh'> = {}): SharedClient {
  if (source instanceof SharedClient) {
    return source
  }
  if (source instanceof Client) {
    return new SharedClient(new ElasticsearchDocumentStore(source, { refresh: options.refresh }), options.ownsClient ?? false)
  }
  return new SharedClient(source, options.ownsClient ?? false)
}

// ============================================================
// Base collection
// ============================================================

export abstract class BaseCollection<TKey extends KeyValue, TRecord> {
  readonly name: string
  readonly model: CollectionModel

  protected readonly store: DocumentStore
  protected readonly logger: Logger
  private readonly shared: SharedClient
  private closed = false

  protected constructor(
    source: StoreSource,
    name: string,
    model: CollectionModel,
    protected readonly mapper: RecordMapper<TRecord>,
    options: CollectionOptions
  ) {
    if (name.trim() === '') {
      throw new InvalidArgumentError('name', 'collection name cannot be empty')
    }
    this.name = name
    this.model = model
    this.logger = new Logger(options.log)
    this.shared = toSharedClient(source, options)
    this.store = this.shared.acquire()
  }

  /**
   * Read a property value of a record, by the property's model name
   */
  protected abstract readProperty(record: TRecord, propertyName: string): unknown

  // ============================================================
  // Collection lifecycle
  // ============================================================

  async collectionExists(options: CallOptions = {}): Promise<boolean> {
    return this.run('indices.exists', options.signal, () => this.store.indexExists(this.name, options))
  }

  async ensureCollectionExists(options: CallOptions = {}): Promise<void> {
    if (await this.collectionExists(options)) {
      return
    }
    const mappings = buildIndexSchema(this.model)
    await this.run('indices.create', options.signal, () => this.store.createIndex(this.name, mappings, options))
  }

  async ensureCollectionDeleted(options: CallOptions = {}): Promise<void> {
    try {
      await this.run('indices.delete', options.signal, () => this.store.deleteIndex(this.name, options))
    } catch (error) {
      if (!isNotFound(error)) {
        throw error
      }
      this.logger.debug(`Collection '${this.name}' does not exist; nothing to delete`)
    }
  }

  // ============================================================
  // Reads
  // ============================================================

  async get(key: TKey, options: GetOptions & CallOptions = {}): Promise<TRecord | undefined> {
    const { includeVectors } = parseOptions(GetOptionsSchema, { includeVectors: options.includeVectors }, 'options')
    this.assertVectorsRetrievable(includeVectors)

    const id = keyToStorageId(key, this.model.keyProperty.type)
    const document = await this.run('get', options.signal, () =>
      this.store.getDocument(this.name, id, {
        excludeFields: excludedFields(this.model, includeVectors),
        signal: options.signal,
      })
    )
    return document ? this.mapper.fromStorage(document, includeVectors) : undefined
  }

  /**
   * Fetch several records in one round trip; missing keys are skipped
   */
  async *getMany(keys: Iterable<TKey>, options: GetOptions & CallOptions = {}): AsyncGenerator<TRecord> {
    const { includeVectors } = parseOptions(GetOptionsSchema, { includeVectors: options.includeVectors }, 'options')
    this.assertVectorsRetrievable(includeVectors)

    const ids = Array.from(keys, (key) => keyToStorageId(key, this.model.keyProperty.type))
    const documents = await this.run('mget', options.signal, () =>
      this.store.getDocuments(this.name, ids, {
        excludeFields: excludedFields(this.model, includeVectors),
        signal: options.signal,
      })
    )
    for (const document of documents) {
      yield this.mapper.fromStorage(document, includeVectors)
    }
  }

  /**
   * Fetch the records matching a filter, in the requested order
   */
  async *query(
    filter: FilterNode | undefined,
    top: number,
    options: QueryOptions & CallOptions = {}
  ): AsyncGenerator<TRecord> {
    parseOptions(TopSchema, top, 'top')
    const { signal, ...rest } = options
    const { skip, orderBy, includeVectors } = parseOptions(QueryOptionsSchema, rest, 'options')
    this.assertVectorsRetrievable(includeVectors)

    const query = translateFilter(filter, this.model) ?? { match_all: {} }
    const sort = orderBy?.map(({ property, ascending }) => {
      const model = this.model.property(property)
      if (model.kind !== 'data') {
        throw new InvalidArgumentError('orderBy', `property '${property}' is not a data property`)
      }
      return { [model.storageName]: { order: ascending ? ('asc' as const) : ('desc' as const) } }
    })

    const hits = await this.run('search', signal, () =>
      this.store.search(
        {
          index: this.name,
          query,
          sort,
          excludeFields: excludedFields(this.model, includeVectors),
          from: skip,
          size: top,
        },
        { signal }
      )
    )
    for (const hit of hits) {
      yield this.mapper.fromStorage(hit, includeVectors)
    }
  }

  // ============================================================
  // Writes
  // ============================================================

  /**
   * Insert or replace a record; returns its key (store-assigned when the
   * record has none)
   */
  async upsert(record: TRecord, options: CallOptions = {}): Promise<KeyValue> {
    this.assertKeyPresent(record)
    const [generated] = await this.generateEmbeddings([record], options.signal)
    const document = this.mapper.toStorage(record, generated)
    const id = await this.run('index', options.signal, () => this.store.indexDocument(this.name, document, options))
    return storageIdToKey(id, this.model.keyProperty.type)
  }

  /**
   * Insert or replace several records in one round trip; embeddings are
   * generated once per vector property for the whole batch
   */
  async upsertMany(records: Iterable<TRecord>, options: CallOptions = {}): Promise<KeyValue[]> {
    const batch = Array.from(records)
    if (batch.length === 0) {
      return []
    }
    batch.forEach((record) => this.assertKeyPresent(record))
    const generated = await this.generateEmbeddings(batch, options.signal)
    const documents = batch.map((record, i) => this.mapper.toStorage(record, generated[i]))
    const ids = await this.run('bulk', options.signal, () => this.store.indexDocuments(this.name, documents, options))
    return ids.map((id) => storageIdToKey(id, this.model.keyProperty.type))
  }

  async delete(key: TKey, options: CallOptions = {}): Promise<void> {
    const id = keyToStorageId(key, this.model.keyProperty.type)
    try {
      await this.run('delete', options.signal, () => this.store.deleteDocument(this.name, id, options))
    } catch (error) {
      if (!isNotFound(error)) {
        throw error
      }
      this.logger.debug(`Record '${id}' not found in collection '${this.name}'; nothing to delete`)
    }
  }

  async deleteMany(keys: Iterable<TKey>, options: CallOptions = {}): Promise<void> {
    const ids = Array.from(keys, (key) => keyToStorageId(key, this.model.keyProperty.type))
    if (ids.length === 0) {
      return
    }
    await this.run('bulk', options.signal, () => this.store.deleteDocuments(this.name, ids, options))
  }

  // ============================================================
  // Search
  // ============================================================

  /**
   * Nearest-neighbour search. `searchValue` is a vector, or a value the
   * vector property's embedding generator accepts.
   */
  async *search(
    searchValue: unknown,
    top: number,
    options: VectorSearchOptions & CallOptions = {}
  ): AsyncGenerator<VectorSearchResult<TRecord>> {
    parseOptions(TopSchema, top, 'top')
    const { signal, ...rest } = options
    const parsed = parseOptions(VectorSearchOptionsSchema, rest, 'options')
    this.assertVectorsRetrievable(parsed.includeVectors)

    const vectorProperty = this.model.vectorPropertyOrSingle(parsed.vectorProperty)
    const vector = await resolveQueryVector(searchValue, vectorProperty, signal)
    const request = buildVectorSearchRequest(this.name, this.model, {
      vectorProperty,
      vector,
      filters: this.buildFilters(parsed.filter, parsed.legacyFilter),
      top,
      skip: parsed.skip,
      numCandidates: parsed.numCandidates,
      includeVectors: parsed.includeVectors,
    })

    const hits = await this.run('search', signal, () => this.store.search(request, { signal }))
    yield* this.mapHits(hits, parsed.includeVectors)
  }

  /**
   * Vector search fused with a keyword match on a full-text property, using
   * reciprocal rank fusion; the filter applies to both legs
   */
  async *hybridSearch(
    searchValue: unknown,
    keywords: readonly string[],
    top: number,
    options: HybridSearchOptions & CallOptions = {}
  ): AsyncGenerator<VectorSearchResult<TRecord>> {
    parseOptions(TopSchema, top, 'top')
    const { signal, ...rest } = options
    const parsed = parseOptions(HybridSearchOptionsSchema, rest, 'options')
    this.assertVectorsRetrievable(parsed.includeVectors)

    const vectorProperty = this.model.vectorPropertyOrSingle(parsed.vectorProperty)
    const textProperty = this.model.fullTextPropertyOrSingle(parsed.additionalProperty)
    const vector = await resolveQueryVector(searchValue, vectorProperty, signal)
    const request = buildHybridSearchRequest(this.name, this.model, {
      vectorProperty,
      textProperty,
      vector,
      keywords,
      filters: this.buildFilters(parsed.filter, parsed.legacyFilter),
      top,
      skip: parsed.skip,
      numCandidates: parsed.numCandidates,
      rankConstant: parsed.rankConstant,
      rankWindowSize: parsed.rankWindowSize,
      includeVectors: parsed.includeVectors,
    })

    const hits = await this.run('search', signal, () => this.store.hybridSearch(request, { signal }))
    yield* this.mapHits(hits, parsed.includeVectors)
  }

  /**
   * Release this collection's reference on the document store
   */
  async close(): Promise<void> {
    if (this.closed) {
      return
    }
    this.closed = true
    await this.shared.release()
  }

  // ============================================================
  // Helpers
  // ============================================================

  private *mapHits(hits: readonly SearchHit[], includeVectors: boolean): Generator<VectorSearchResult<TRecord>> {
    for (const hit of hits) {
      yield { record: this.mapper.fromStorage(hit, includeVectors), score: hit.score }
    }
  }

  private buildFilters(filter: FilterNode | undefined, legacyFilter: LegacyFilter | undefined): Query[] {
    if (legacyFilter) {
      return translateLegacyFilter(legacyFilter, this.model)
    }
    const translated = translateFilter(filter, this.model)
    return translated ? [translated] : []
  }

  /** Store-assigned ids are only decodable as string keys */
  private assertKeyPresent(record: TRecord): void {
    const keyProperty = this.model.keyProperty
    if (keyProperty.type === 'string') {
      return
    }
    const key = this.readProperty(record, keyProperty.name)
    if (key === undefined || key === null) {
      throw new InvalidKeyError(
        keyProperty.type,
        String(key),
        `Records in collection '${this.name}' need a ${keyProperty.type} key in property '${keyProperty.name}'`
      )
    }
  }

  /** Generated vectors cannot be turned back into their source values */
  private assertVectorsRetrievable(includeVectors: boolean): void {
    if (includeVectors && this.model.hasEmbeddingGenerators) {
      throw new UnsupportedCombinationError(
        'Including vectors is not supported when an embedding generator is configured on any vector property'
      )
    }
  }

  /**
   * Generate embeddings for every vector property whose values are not
   * vectors; one generator call per property for the whole batch
   */
  private async generateEmbeddings(records: readonly TRecord[], signal?: AbortSignal): Promise<GeneratedEmbeddings[]> {
    const vectorProperties = this.model.vectorProperties
    const generated: Array<Array<Embedding | undefined>> = records.map(() => vectorProperties.map(() => undefined))
    if (!this.model.embeddingGenerationRequired) {
      return generated
    }

    for (const [p, property] of vectorProperties.entries()) {
      if (!property.requiresEmbeddingGeneration) {
        continue
      }
      const embeddings = await this.generateForProperty(property, records, signal)
      embeddings.forEach((embedding, r) => {
        generated[r][p] = embedding
      })
    }
    return generated
  }

  private async generateForProperty(
    property: VectorPropertyModel,
    records: readonly TRecord[],
    signal: AbortSignal | undefined
  ): Promise<Array<Embedding | undefined>> {
    const generator = property.embeddingGenerator
    if (!generator) {
      throw new NoEmbeddingGeneratorError(property.name, property.type, NATIVE_VECTOR_TYPES)
    }

    const positions: number[] = []
    const inputs: unknown[] = []
    records.forEach((record, r) => {
      const value = this.readProperty(record, property.name)
      if (value === undefined || value === null) {
        return
      }
      if (!generator.accepts(value)) {
        throw new IncompatibleGeneratorError(property.name, describeValueType(value), generator.inputTypes)
      }
      positions.push(r)
      inputs.push(value)
    })

    const result: Array<Embedding | undefined> = records.map(() => undefined)
    if (inputs.length === 0) {
      return result
    }

    signal?.throwIfAborted()
    const embeddings = await generator.generate(inputs, { dimensions: property.dimensions, signal })
    if (embeddings.length !== inputs.length) {
      throw new InvalidArgumentError(
        'embeddingGenerator',
        `generator of property '${property.name}' returned ${embeddings.length} embeddings for ${inputs.length} values`
      )
    }
    positions.forEach((r, i) => {
      result[r] = embeddings[i]
    })
    return result
  }

  /**
   * Run a store call, wrapping failures in StorageOperationError
   */
  protected async run<T>(operationName: string, signal: AbortSignal | undefined, operation: () => Promise<T>): Promise<T> {
    signal?.throwIfAborted()
    this.logger.debug(`${operationName} on collection '${this.name}'`)
    try {
      return await operation()
    } catch (error) {
      if (error instanceof VectorStoreError || signal?.aborted) {
        throw error
      }
      const wrapped = new StorageOperationError(this.name, operationName, error)
      if (wrapped.statusCode !== 404) {
        this.logger.error(wrapped.message, wrapped.toJSON())
      }
      throw wrapped
    }
  }
}
