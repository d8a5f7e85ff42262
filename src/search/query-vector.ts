import { describeValueType } from '../embedding/embedding'
import {
  IncompatibleGeneratorError,
  InvalidArgumentError,
  NoEmbeddingGeneratorError,
} from '../errors'
import { isVectorValue, toNumberArray } from '../mapping/value-conversion'
import { NATIVE_VECTOR_TYPES, type VectorPropertyModel } from '../model/types'

/**
 * Turn a search input into the query vector for `property`.
 *
 * Numeric vectors (`number[]`, `Float32Array`, `Embedding`) are used as-is;
 * anything else goes through the property's embedding generator.
 */
export async function resolveQueryVector(
  input: unknown,
  property: VectorPropertyModel,
  signal?: AbortSignal
): Promise<number[]> {
  const vector = isVectorValue(input) ? toNumberArray(input) : await generateQueryVector(input, property, signal)

  if (vector.length !== property.dimensions) {
    throw new InvalidArgumentError(
      'searchValue',
      `vector property '${property.name}' has ${property.dimensions} dimensions, the query vector has ${vector.length}`
    )
  }
  return vector
}

async function generateQueryVector(
  input: unknown,
  property: VectorPropertyModel,
  signal: AbortSignal | undefined
): Promise<number[]> {
  const generator = property.embeddingGenerator
  if (!generator) {
    throw new NoEmbeddingGeneratorError(property.name, describeValueType(input), NATIVE_VECTOR_TYPES)
  }
  if (!generator.accepts(input)) {
    throw new IncompatibleGeneratorError(property.name, describeValueType(input), generator.inputTypes)
  }

  signal?.throwIfAborted()
  const [embedding] = await generator.generate([input], { dimensions: property.dimensions, signal })
  if (!embedding) {
    throw new InvalidArgumentError(
      'searchValue',
      `the embedding generator of property '${property.name}' returned no embedding`
    )
  }
  return embedding.toArray()
}
