import type { estypes } from '@elastic/elasticsearch'
import type { DocumentBody } from '../mapping/record-serializer'

export type Query = estypes.QueryDslQueryContainer

export interface StoreCallOptions {
  signal?: AbortSignal
}

export interface ReadOptions extends StoreCallOptions {
  /** Fields left out of the returned bodies, e.g. vectors */
  excludeFields?: readonly string[]
}

export interface StoredDocument {
  id: string
  body: DocumentBody
}

export interface SearchHit extends StoredDocument {
  score: number | null
}

export interface SearchRequest {
  index: string
  query: Query
  sort?: estypes.SortCombinations[]
  excludeFields?: readonly string[]
  from?: number
  size?: number
}

export interface HybridSearchRequest {
  index: string
  /** Nearest-neighbour leg */
  knn: estypes.KnnRetriever
  /** Keyword leg */
  query: Query
  rankConstant: number
  rankWindowSize: number
  excludeFields?: readonly string[]
  from?: number
  size?: number
}

export interface DocumentToIndex {
  /** `null` lets the store assign an id */
  id: string | null
  body: DocumentBody
}

/**
 * The calls a collection makes against the backing document store.
 *
 * Not-found results of `deleteIndex` and `deleteDocument` are reported as
 * errors carrying status 404; callers decide whether that is a failure.
 */
export interface DocumentStore {
  listIndices(options?: StoreCallOptions): Promise<string[]>
  indexExists(index: string, options?: StoreCallOptions): Promise<boolean>
  createIndex(index: string, mappings: estypes.MappingTypeMapping, options?: StoreCallOptions): Promise<void>
  deleteIndex(index: string, options?: StoreCallOptions): Promise<void>

  getDocument(index: string, id: string, options?: ReadOptions): Promise<StoredDocument | undefined>
  /** Found documents only, in the order of `ids` */
  getDocuments(index: string, ids: readonly string[], options?: ReadOptions): Promise<StoredDocument[]>
  /** Returns the id the document was stored under */
  indexDocument(index: string, document: DocumentToIndex, options?: StoreCallOptions): Promise<string>
  /** One round trip; returns the stored ids in input order */
  indexDocuments(index: string, documents: readonly DocumentToIndex[], options?: StoreCallOptions): Promise<string[]>
  deleteDocument(index: string, id: string, options?: StoreCallOptions): Promise<void>
  /** One round trip; ids that do not exist are ignored */
  deleteDocuments(index: string, ids: readonly string[], options?: StoreCallOptions): Promise<void>

  search(request: SearchRequest, options?: StoreCallOptions): Promise<SearchHit[]>
  hybridSearch(request: HybridSearchRequest, options?: StoreCallOptions): Promise<SearchHit[]>

  close(): Promise<void>
}
