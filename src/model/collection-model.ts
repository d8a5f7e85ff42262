import { AmbiguousPropertyError, SchemaError } from '../errors'
import type {
  DataPropertyModel,
  KeyPropertyModel,
  PropertyModel,
  VectorPropertyModel,
} from './types'

/**
 * Validated, immutable schema descriptor of one collection.
 *
 * Built once per collection handle by the model builder and shared by the
 * mappers, the filter translator and the search request builders.
 */
export class CollectionModel {
  readonly keyProperty: KeyPropertyModel
  readonly dataProperties: readonly DataPropertyModel[]
  readonly vectorProperties: readonly VectorPropertyModel[]
  /** All properties in definition order */
  readonly properties: readonly PropertyModel[]

  private readonly byName: ReadonlyMap<string, PropertyModel>

  constructor(keyProperty: KeyPropertyModel, properties: readonly PropertyModel[]) {
    this.keyProperty = keyProperty
    this.properties = Object.freeze([...properties])
    this.dataProperties = Object.freeze(properties.filter((p): p is DataPropertyModel => p.kind === 'data'))
    this.vectorProperties = Object.freeze(properties.filter((p): p is VectorPropertyModel => p.kind === 'vector'))
    this.byName = new Map(properties.map((p) => [p.name, p]))
    Object.freeze(this)
  }

  /** Vectors of at least one property are generated from non-vector values */
  get embeddingGenerationRequired(): boolean {
    return this.vectorProperties.some((p) => p.requiresEmbeddingGeneration)
  }

  /** At least one vector property has an embedding generator attached */
  get hasEmbeddingGenerators(): boolean {
    return this.vectorProperties.some((p) => p.embeddingGenerator !== undefined)
  }

  findProperty(name: string): PropertyModel | undefined {
    return this.byName.get(name)
  }

  /**
   * Look up a property by its application-facing name
   */
  property(name: string): PropertyModel {
    const property = this.byName.get(name)
    if (!property) {
      throw new SchemaError(`Property '${name}' is not part of the collection model`, name)
    }
    return property
  }

  /**
   * Resolve the vector property a search runs against: the named one, or
   * the only one the model has.
   */
  vectorPropertyOrSingle(name?: string): VectorPropertyModel {
    if (name !== undefined) {
      const property = this.property(name)
      if (property.kind !== 'vector') {
        throw new SchemaError(`Property '${name}' is not a vector property`, name)
      }
      return property
    }

    if (this.vectorProperties.length === 1) {
      return this.vectorProperties[0]
    }
    throw new AmbiguousPropertyError(
      'vector',
      this.vectorProperties.map((p) => p.name)
    )
  }

  /**
   * Resolve the full-text indexed data property a keyword search runs
   * against: the named one, or the only one the model has.
   */
  fullTextPropertyOrSingle(name?: string): DataPropertyModel {
    if (name !== undefined) {
      const property = this.property(name)
      if (property.kind !== 'data' || !property.isFullTextIndexed) {
        throw new SchemaError(`Property '${name}' is not a full-text indexed data property`, name)
      }
      return property
    }

    const candidates = this.dataProperties.filter((p) => p.isFullTextIndexed)
    if (candidates.length === 1) {
      return candidates[0]
    }
    throw new AmbiguousPropertyError(
      'fullText',
      candidates.map((p) => p.name)
    )
  }
}
