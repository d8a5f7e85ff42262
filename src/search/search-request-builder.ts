/**
 * Search request assembly
 *
 * Pure functions turning resolved search inputs into store requests:
 * - vector search: a kNN query, pre-filtered
 * - hybrid search: a kNN leg and a keyword leg fused with reciprocal rank
 *   fusion, the filter applied to both legs
 */

import type { estypes } from '@elastic/elasticsearch'
import { InvalidArgumentError } from '../errors'
import type { CollectionModel } from '../model/collection-model'
import type { DataPropertyModel, VectorPropertyModel } from '../model/types'
import type { HybridSearchRequest, Query, SearchRequest } from '../storage/types'

/** Reciprocal rank fusion constant */
export const DEFAULT_RANK_CONSTANT = 60

/** Smallest fusion window used when none is given */
export const MIN_RANK_WINDOW_SIZE = 10

export interface VectorSearchParams {
  vectorProperty: VectorPropertyModel
  vector: readonly number[]
  /** Filter queries; all must match */
  filters: readonly Query[]
  top: number
  skip: number
  numCandidates?: number
  includeVectors: boolean
}

export interface HybridSearchParams extends VectorSearchParams {
  textProperty: DataPropertyModel
  keywords: readonly string[]
  rankConstant?: number
  rankWindowSize?: number
}

/**
 * Fields to leave out of returned documents
 */
export function excludedFields(model: CollectionModel, includeVectors: boolean): string[] | undefined {
  if (includeVectors || model.vectorProperties.length === 0) {
    return undefined
  }
  return model.vectorProperties.map((property) => property.storageName)
}

/**
 * Candidates per shard: twice k unless given, never fewer than k
 */
export function resolveNumCandidates(k: number, numCandidates: number | undefined): number {
  return Math.max(numCandidates ?? 2 * k, k)
}

export function buildVectorSearchRequest(
  index: string,
  model: CollectionModel,
  params: VectorSearchParams
): SearchRequest {
  const k = params.skip + params.top
  const knn: estypes.KnnQuery = {
    field: params.vectorProperty.storageName,
    query_vector: [...params.vector],
    k,
    num_candidates: resolveNumCandidates(k, params.numCandidates),
  }
  if (params.filters.length > 0) {
    knn.filter = [...params.filters]
  }

  return {
    index,
    query: { knn },
    excludeFields: excludedFields(model, params.includeVectors),
    from: params.skip,
    size: params.top,
  }
}

export function buildHybridSearchRequest(
  index: string,
  model: CollectionModel,
  params: HybridSearchParams
): HybridSearchRequest {
  const window = params.skip + params.top
  const rankWindowSize = params.rankWindowSize ?? Math.max(window, MIN_RANK_WINDOW_SIZE)
  if (rankWindowSize < window) {
    throw new InvalidArgumentError(
      'rankWindowSize',
      `must be at least skip + top (${window}), got ${rankWindowSize}`
    )
  }

  // Each leg returns the whole fusion window
  const knn: estypes.KnnRetriever = {
    field: params.vectorProperty.storageName,
    query_vector: [...params.vector],
    k: rankWindowSize,
    num_candidates: resolveNumCandidates(rankWindowSize, params.numCandidates),
  }
  if (params.filters.length > 0) {
    knn.filter = [...params.filters]
  }

  const match: Query = { match: { [params.textProperty.storageName]: { query: params.keywords.join(' ') } } }
  const query: Query = params.filters.length > 0
    ? { bool: { must: [match], filter: [...params.filters] } }
    : match

  return {
    index,
    knn,
    query,
    rankConstant: params.rankConstant ?? DEFAULT_RANK_CONSTANT,
    rankWindowSize,
    excludeFields: excludedFields(model, params.includeVectors),
    from: params.skip,
    size: params.top,
  }
}
