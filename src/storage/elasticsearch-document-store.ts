import { Client, type ClientOptions, type estypes } from '@elastic/elasticsearch'
import type { ConnectionConfig, RefreshPolicy } from '../config/options'
import type { DocumentBody } from '../mapping/record-serializer'
import type {
  DocumentStore,
  DocumentToIndex,
  HybridSearchRequest,
  ReadOptions,
  SearchHit,
  SearchRequest,
  StoreCallOptions,
  StoredDocument,
} from './types'

export interface ElasticsearchDocumentStoreOptions {
  /** Refresh behaviour of write calls */
  refresh?: RefreshPolicy
}

/**
 * Create an Elasticsearch client from connection settings
 */
export function createClient(config: ConnectionConfig): Client {
  const options: ClientOptions = {
    requestTimeout: config.requestTimeout,
    maxRetries: config.maxRetries,
  }
  if (config.cloudId !== undefined) {
    options.cloud = { id: config.cloudId }
  } else {
    options.node = config.node
  }
  if (config.apiKey !== undefined) {
    options.auth = { apiKey: config.apiKey }
  } else if (config.username !== undefined && config.password !== undefined) {
    options.auth = { username: config.username, password: config.password }
  }
  return new Client(options)
}

/**
 * DocumentStore backed by the official Elasticsearch client.
 *
 * Transport errors propagate unchanged; a missing document on `get` is
 * reported as `undefined`.
 */
export class ElasticsearchDocumentStore implements DocumentStore {
  constructor(
    readonly client: Client,
    private readonly options: ElasticsearchDocumentStoreOptions = {}
  ) {}

  async listIndices(options: StoreCallOptions = {}): Promise<string[]> {
    const response = await this.client.indices.stats({}, { signal: options.signal })
    return Object.keys(response.indices ?? {})
  }

  async indexExists(index: string, options: StoreCallOptions = {}): Promise<boolean> {
    return this.client.indices.exists({ index }, { signal: options.signal })
  }

  async createIndex(index: string, mappings: estypes.MappingTypeMapping, options: StoreCallOptions = {}): Promise<void> {
    await this.client.indices.create({ index, mappings }, { signal: options.signal })
  }

  async deleteIndex(index: string, options: StoreCallOptions = {}): Promise<void> {
    await this.client.indices.delete({ index }, { signal: options.signal })
  }

  async getDocument(index: string, id: string, options: ReadOptions = {}): Promise<StoredDocument | undefined> {
    const response = await this.client.get<DocumentBody>(
      { index, id, _source_excludes: sourceExcludes(options.excludeFields) },
      { signal: options.signal, ignore: [404] }
    )
    if (!response.found) {
      return undefined
    }
    return { id: response._id, body: response._source ?? {} }
  }

  async getDocuments(index: string, ids: readonly string[], options: ReadOptions = {}): Promise<StoredDocument[]> {
    if (ids.length === 0) {
      return []
    }
    const response = await this.client.mget<DocumentBody>(
      { index, ids: [...ids], _source_excludes: sourceExcludes(options.excludeFields) },
      { signal: options.signal }
    )

    const documents: StoredDocument[] = []
    for (const item of response.docs) {
      if ('error' in item) {
        throw new Error(`Multi-get failed for document '${item._id}': ${item.error.reason ?? item.error.type}`)
      }
      if (item.found) {
        documents.push({ id: item._id, body: item._source ?? {} })
      }
    }
    return documents
  }

  async indexDocument(index: string, document: DocumentToIndex, options: StoreCallOptions = {}): Promise<string> {
    const response = await this.client.index(
      {
        index,
        id: document.id ?? undefined,
        document: document.body,
        refresh: this.options.refresh,
      },
      { signal: options.signal }
    )
    return response._id
  }

  async indexDocuments(
    index: string,
    documents: readonly DocumentToIndex[],
    options: StoreCallOptions = {}
  ): Promise<string[]> {
    if (documents.length === 0) {
      return []
    }

    const operations: estypes.BulkRequest['operations'] = []
    for (const document of documents) {
      operations.push({ index: { _index: index, _id: document.id ?? undefined } }, document.body)
    }
    const response = await this.client.bulk({ operations, refresh: this.options.refresh }, { signal: options.signal })

    return response.items.map((item, i) => {
      const result = item.index
      if (!result || result.error) {
        throw new Error(
          `Bulk index failed for document ${documents[i].id ?? `#${i}`}: ${result?.error?.reason ?? 'no result'}`
        )
      }
      return result._id ?? ''
    })
  }

  async deleteDocument(index: string, id: string, options: StoreCallOptions = {}): Promise<void> {
    await this.client.delete({ index, id, refresh: this.options.refresh }, { signal: options.signal })
  }

  async deleteDocuments(index: string, ids: readonly string[], options: StoreCallOptions = {}): Promise<void> {
    if (ids.length === 0) {
      return
    }

    const operations: estypes.BulkRequest['operations'] = ids.map((id) => ({ delete: { _index: index, _id: id } }))
    const response = await this.client.bulk({ operations, refresh: this.options.refresh }, { signal: options.signal })
    if (!response.errors) {
      return
    }

    for (const item of response.items) {
      const result = item.delete
      // Deleting a missing document is not an error
      if (result?.error && result.status !== 404) {
        throw new Error(`Bulk delete failed for document '${result._id ?? ''}': ${result.error.reason ?? result.error.type}`)
      }
    }
  }

  async search(request: SearchRequest, options: StoreCallOptions = {}): Promise<SearchHit[]> {
    const response = await this.client.search<DocumentBody>(
      {
        index: request.index,
        query: request.query,
        sort: request.sort,
        from: request.from,
        size: request.size,
        _source_excludes: sourceExcludes(request.excludeFields),
      },
      { signal: options.signal }
    )
    return response.hits.hits.map(toSearchHit)
  }

  async hybridSearch(request: HybridSearchRequest, options: StoreCallOptions = {}): Promise<SearchHit[]> {
    const response = await this.client.search<DocumentBody>(
      {
        index: request.index,
        retriever: {
          rrf: {
            retrievers: [{ knn: request.knn }, { standard: { query: request.query } }],
            rank_constant: request.rankConstant,
            rank_window_size: request.rankWindowSize,
          },
        },
        from: request.from,
        size: request.size,
        _source_excludes: sourceExcludes(request.excludeFields),
      },
      { signal: options.signal }
    )
    return response.hits.hits.map(toSearchHit)
  }

  async close(): Promise<void> {
    await this.client.close()
  }
}

function sourceExcludes(fields: readonly string[] | undefined): string[] | undefined {
  return fields && fields.length > 0 ? [...fields] : undefined
}

function toSearchHit(hit: estypes.SearchHit<DocumentBody>): SearchHit {
  return { id: hit._id ?? '', body: hit._source ?? {}, score: hit._score ?? null }
}
