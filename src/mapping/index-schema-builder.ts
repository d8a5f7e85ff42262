/**
 * Index Schema Builder
 *
 * Builds the index mapping of a collection from its model. The key property
 * has no mapping of its own: it is the document `_id`.
 */

import type { estypes } from '@elastic/elasticsearch'
import { UnsupportedConfigurationError } from '../errors'
import type { CollectionModel } from '../model/collection-model'
import type { DataPropertyModel, VectorPropertyModel } from '../model/types'
import { DistanceFunction, IndexKind } from '../model/types'

export const DEFAULT_DISTANCE_FUNCTION = DistanceFunction.CosineSimilarity
export const DEFAULT_INDEX_KIND = IndexKind.Int8Hnsw

type Similarity = 'cosine' | 'dot_product' | 'l2_norm' | 'max_inner_product'

type IndexOptionsType = 'hnsw' | 'int8_hnsw' | 'int4_hnsw' | 'bbq_hnsw' | 'flat' | 'int8_flat' | 'int4_flat' | 'bbq_flat'

const SIMILARITIES: ReadonlyMap<string, Similarity> = new Map<string, Similarity>([
  [DistanceFunction.CosineSimilarity, 'cosine'],
  [DistanceFunction.DotProductSimilarity, 'dot_product'],
  [DistanceFunction.EuclideanDistance, 'l2_norm'],
  [DistanceFunction.MaxInnerProduct, 'max_inner_product'],
])

const INDEX_KINDS: ReadonlyMap<string, IndexOptionsType> = new Map<string, IndexOptionsType>([
  [IndexKind.Hnsw, 'hnsw'],
  [IndexKind.Int8Hnsw, 'int8_hnsw'],
  [IndexKind.Int4Hnsw, 'int4_hnsw'],
  [IndexKind.BbqHnsw, 'bbq_hnsw'],
  [IndexKind.Flat, 'flat'],
  [IndexKind.Int8Flat, 'int8_flat'],
  [IndexKind.Int4Flat, 'int4_flat'],
  [IndexKind.BbqFlat, 'bbq_flat'],
])

/** Binary quantization needs at least this many dimensions */
const BBQ_MIN_DIMENSIONS = 64

/**
 * Build the index mapping for a collection
 */
export function buildIndexSchema(model: CollectionModel): estypes.MappingTypeMapping {
  const properties: Record<string, estypes.MappingProperty> = {}

  for (const property of model.vectorProperties) {
    properties[property.storageName] = buildVectorMapping(property)
  }
  for (const property of model.dataProperties) {
    properties[property.storageName] = buildDataMapping(property)
  }

  return { properties }
}

/**
 * Resolve the similarity of a vector property; cosine when unset
 */
export function resolveSimilarity(property: VectorPropertyModel): Similarity {
  const distanceFunction = property.distanceFunction ?? DEFAULT_DISTANCE_FUNCTION
  const similarity = SIMILARITIES.get(distanceFunction)
  if (similarity === undefined) {
    throw new UnsupportedConfigurationError(
      property.name,
      distanceFunction,
      `Distance function '${distanceFunction}' is not supported`
    )
  }
  return similarity
}

/**
 * Resolve the index kind of a vector property; int8_hnsw when unset
 */
export function resolveIndexKind(property: VectorPropertyModel): IndexOptionsType {
  const indexKind = property.indexKind ?? DEFAULT_INDEX_KIND
  const type = INDEX_KINDS.get(indexKind)
  if (type === undefined) {
    throw new UnsupportedConfigurationError(property.name, indexKind, `Index kind '${indexKind}' is not supported`)
  }

  if ((type === 'int4_hnsw' || type === 'int4_flat') && property.dimensions % 2 !== 0) {
    throw new UnsupportedConfigurationError(
      property.name,
      indexKind,
      `Index kind '${indexKind}' requires an even number of dimensions, got ${property.dimensions}`
    )
  }
  if ((type === 'bbq_hnsw' || type === 'bbq_flat') && property.dimensions < BBQ_MIN_DIMENSIONS) {
    throw new UnsupportedConfigurationError(
      property.name,
      indexKind,
      `Index kind '${indexKind}' requires at least ${BBQ_MIN_DIMENSIONS} dimensions, got ${property.dimensions}`
    )
  }
  return type
}

function buildVectorMapping(property: VectorPropertyModel): estypes.MappingDenseVectorProperty {
  return {
    type: 'dense_vector',
    dims: property.dimensions,
    index: true,
    similarity: resolveSimilarity(property),
    index_options: { type: resolveIndexKind(property) },
  }
}

function buildDataMapping(property: DataPropertyModel): estypes.MappingProperty {
  if (property.isFullTextIndexed) {
    return { type: 'text' }
  }

  const elementType = property.type.endsWith('[]') ? property.type.slice(0, -2) : property.type

  // Object values cannot go into a keyword field
  if (elementType === 'object') {
    return property.isIndexed ? { type: 'object' } : { type: 'object', enabled: false }
  }
  if (!property.isIndexed) {
    return { type: 'keyword', index: false }
  }

  switch (elementType) {
    case 'boolean':
      return { type: 'boolean' }
    case 'int8':
    case 'uint8':
      return { type: 'byte' }
    case 'int16':
    case 'uint16':
      return { type: 'short' }
    case 'int32':
    case 'uint32':
      return { type: 'integer' }
    case 'int64':
      return { type: 'long' }
    case 'uint64':
      return { type: 'unsigned_long' }
    case 'float32':
      return { type: 'float' }
    case 'float64':
      return { type: 'double' }
    case 'date':
      return { type: 'date' }
    default:
      return { type: 'keyword' }
  }
}
