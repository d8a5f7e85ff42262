/**
 * An embedding vector together with optional provenance.
 *
 * Stored in the backing store as a flat numeric array; the wrapper is rebuilt
 * from that array when a record declares a vector property of type `Embedding`.
 */
export class Embedding {
  readonly vector: Float32Array
  readonly modelId?: string
  readonly createdAt?: Date

  constructor(vector: Float32Array | ArrayLike<number>, options: { modelId?: string; createdAt?: Date } = {}) {
    this.vector = vector instanceof Float32Array ? vector : Float32Array.from(vector)
    this.modelId = options.modelId
    this.createdAt = options.createdAt
  }

  get dimensions(): number {
    return this.vector.length
  }

  toArray(): number[] {
    return Array.from(this.vector)
  }
}

/**
 * Describe the runtime type of a value for diagnostics
 */
export function describeValueType(value: unknown): string {
  if (value === null) return 'null'
  if (Array.isArray(value)) return 'array'
  if (typeof value === 'object') {
    const name = value.constructor?.name
    return name && name !== 'Object' ? name : 'object'
  }
  return typeof value
}
