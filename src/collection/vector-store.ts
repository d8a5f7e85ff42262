/**
 * Vector store - entry point handing out collections over one shared client
 */

import type { ConnectionConfig } from '../config/options'
import type { EmbeddingGenerator } from '../embedding/embedding-generator'
import { StorageOperationError } from '../errors'
import type { KeyValue, RecordType } from '../model/types'
import type { NamingPolicy } from '../model/naming-policy'
import { createClient } from '../storage/elasticsearch-document-store'
import type { SharedClient } from '../storage/shared-client'
import type { DocumentStore } from '../storage/types'
import { Logger, type LogConfig } from '../utils/logger'
import { toSharedClient, type CallOptions, type StoreSource } from './base-collection'
import { ElasticsearchCollection, type ElasticsearchCollectionOptions } from './elasticsearch-collection'
import {
  ElasticsearchDynamicCollection,
  type ElasticsearchDynamicCollectionOptions,
} from './elasticsearch-dynamic-collection'

export interface VectorStoreOptions {
  /** Default generator handed to every collection */
  embeddingGenerator?: EmbeddingGenerator
  namingPolicy?: NamingPolicy
  /** Close the client when the store and all its collections are closed (default: false) */
  ownsClient?: boolean
  refresh?: ConnectionConfig['refresh']
  log?: Partial<LogConfig>
}

type InheritedOption = 'embeddingGenerator' | 'namingPolicy' | 'log'

export class ElasticsearchVectorStore {
  private readonly shared: SharedClient
  private readonly store: DocumentStore
  private readonly logger: Logger
  private closed = false

  constructor(
    source: StoreSource,
    private readonly options: VectorStoreOptions = {}
  ) {
    this.shared = toSharedClient(source, options)
    this.store = this.shared.acquire()
    this.logger = new Logger(options.log)
  }

  /**
   * Connect with validated connection settings; the store owns the client
   */
  static fromConfig(config: ConnectionConfig, options: Omit<VectorStoreOptions, 'ownsClient' | 'refresh'> = {}): ElasticsearchVectorStore {
    return new ElasticsearchVectorStore(createClient(config), { ...options, ownsClient: true, refresh: config.refresh })
  }

  getCollection<TKey extends KeyValue, TRecord extends object>(
    name: string,
    recordType: RecordType<TRecord>,
    options: Omit<ElasticsearchCollectionOptions<TRecord>, 'ownsClient' | 'refresh'> = {}
  ): ElasticsearchCollection<TKey, TRecord> {
    return new ElasticsearchCollection<TKey, TRecord>(this.shared, name, recordType, this.inherit(options))
  }

  getDynamicCollection(
    name: string,
    options: Omit<ElasticsearchDynamicCollectionOptions, 'ownsClient' | 'refresh'>
  ): ElasticsearchDynamicCollection {
    return new ElasticsearchDynamicCollection(this.shared, name, this.inherit(options))
  }

  /**
   * Names of all indices visible to the client
   */
  async *listCollectionNames(options: CallOptions = {}): AsyncGenerator<string> {
    options.signal?.throwIfAborted()
    this.logger.debug('indices.stats')
    let names: string[]
    try {
      names = await this.store.listIndices(options)
    } catch (error) {
      if (options.signal?.aborted) {
        throw error
      }
      const wrapped = new StorageOperationError(undefined, 'indices.stats', error)
      this.logger.error(wrapped.message, wrapped.toJSON())
      throw wrapped
    }
    yield* names
  }

  /**
   * Release the store's reference; an owned client closes once every
   * collection handed out is closed as well
   */
  async close(): Promise<void> {
    if (this.closed) {
      return
    }
    this.closed = true
    await this.shared.release()
  }

  private inherit<T extends Pick<VectorStoreOptions, InheritedOption>>(options: T): T {
    return {
      ...options,
      embeddingGenerator: options.embeddingGenerator ?? this.options.embeddingGenerator,
      namingPolicy: options.namingPolicy ?? this.options.namingPolicy,
      log: options.log ?? this.options.log,
    }
  }
}
