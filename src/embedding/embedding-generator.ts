import { embedMany, type EmbeddingModel } from 'ai'
import { Embedding } from './embedding'

export interface EmbeddingGenerateOptions {
  /** Dimensions the target vector property declares */
  dimensions?: number
  signal?: AbortSignal
}

/**
 * Turns non-vector values (e.g. text) into embeddings.
 *
 * Attached to a vector property (or to a whole collection as the default),
 * it is invoked at upsert time for properties whose declared type is not a
 * vector, and at search time for search inputs that are not vectors.
 */
export interface EmbeddingGenerator<TInput = unknown> {
  /** Declared property types this generator takes as input, e.g. `['string']` */
  readonly inputTypes: readonly string[]
  accepts(value: unknown): value is TInput
  generate(values: readonly TInput[], options?: EmbeddingGenerateOptions): Promise<Embedding[]>
}

export interface AiEmbeddingGeneratorOptions {
  /** Maximum retries per `embedMany` call (AI SDK default: 2) */
  maxRetries?: number
}

/**
 * Create an embedding generator backed by an AI SDK embedding model.
 *
 * All values of one call are embedded through a single `embedMany` call; the
 * SDK splits them further when the model caps embeddings per call.
 */
export function createEmbeddingGenerator(
  model: EmbeddingModel<string>,
  options: AiEmbeddingGeneratorOptions = {}
): EmbeddingGenerator<string> {
  return {
    inputTypes: ['string'],
    accepts: (value: unknown): value is string => typeof value === 'string',
    async generate(values: readonly string[], generateOptions: EmbeddingGenerateOptions = {}): Promise<Embedding[]> {
      if (values.length === 0) {
        return []
      }
      const { embeddings } = await embedMany({
        model,
        values: [...values],
        maxRetries: options.maxRetries,
        abortSignal: generateOptions.signal,
      })
      return embeddings.map((vector) => new Embedding(vector, { modelId: model.modelId }))
    },
  }
}

export interface FunctionEmbeddingGeneratorConfig<TInput> {
  inputType: string
  accepts(value: unknown): value is TInput
  embed(value: TInput, options: EmbeddingGenerateOptions): Promise<ArrayLike<number>>
}

/**
 * Wrap a plain async function as an embedding generator.
 * Values are embedded one after another, in order.
 */
export function functionEmbeddingGenerator<TInput>(
  config: FunctionEmbeddingGeneratorConfig<TInput>
): EmbeddingGenerator<TInput> {
  return {
    inputTypes: [config.inputType],
    accepts: (value: unknown): value is TInput => config.accepts(value),
    async generate(values: readonly TInput[], options: EmbeddingGenerateOptions = {}): Promise<Embedding[]> {
      const embeddings: Embedding[] = []
      for (const value of values) {
        options.signal?.throwIfAborted()
        embeddings.push(new Embedding(await config.embed(value, options)))
      }
      return embeddings
    },
  }
}

/**
 * Wrap an async text-to-vector function as an embedding generator
 */
export function textEmbeddingGenerator(
  embed: (text: string, options: EmbeddingGenerateOptions) => Promise<ArrayLike<number>>
): EmbeddingGenerator<string> {
  return functionEmbeddingGenerator({
    inputType: 'string',
    accepts: (value: unknown): value is string => typeof value === 'string',
    embed,
  })
}
