/**
 * Clause-list filters: every clause must hold.
 *
 * Kept for callers that still build filters as a flat list of equality
 * clauses instead of expression trees.
 */

import type { estypes } from '@elastic/elasticsearch'
import { describeValueType } from '../embedding/embedding'
import { SchemaError, UnsupportedTypeError } from '../errors'
import type { CollectionModel } from '../model/collection-model'
import type { DataPropertyModel } from '../model/types'

export type LegacyFilterValue = string | number | boolean | bigint | null

export type LegacyFilterClause =
  /** The property equals the value */
  | { type: 'equalTo'; fieldName: string; value: LegacyFilterValue }
  /** The array property has at least one element equal to the value */
  | { type: 'anyTagEqualTo'; fieldName: string; value: LegacyFilterValue }

export class LegacyFilter {
  private readonly clauses: LegacyFilterClause[] = []

  get filterClauses(): readonly LegacyFilterClause[] {
    return this.clauses
  }

  equalTo(fieldName: string, value: LegacyFilterValue): this {
    this.clauses.push({ type: 'equalTo', fieldName, value })
    return this
  }

  anyTagEqualTo(fieldName: string, value: LegacyFilterValue): this {
    this.clauses.push({ type: 'anyTagEqualTo', fieldName, value })
    return this
  }
}

/**
 * Translate a clause-list filter into one filter query per clause
 */
export function translateLegacyFilter(
  filter: LegacyFilter | undefined,
  model: CollectionModel
): estypes.QueryDslQueryContainer[] {
  if (!filter) {
    return []
  }

  return filter.filterClauses.map((clause) => {
    const property = filterableProperty(model, clause.fieldName)
    const value = toFieldValue(property, clause.value)
    switch (clause.type) {
      case 'equalTo':
        return { term: { [property.storageName]: value } }
      case 'anyTagEqualTo':
        return { terms: { [property.storageName]: [value] } }
    }
  })
}

function filterableProperty(model: CollectionModel, name: string): DataPropertyModel {
  const property = model.findProperty(name)
  if (!property) {
    throw new SchemaError(`Property '${name}' is not supported as a filter value`, name)
  }
  if (property.kind !== 'data' || !property.isIndexed) {
    throw new SchemaError(`Property '${name}' cannot be used for filtering`, name)
  }
  return property
}

function toFieldValue(property: DataPropertyModel, value: unknown): estypes.FieldValue {
  switch (typeof value) {
    case 'string':
    case 'number':
    case 'boolean':
      return value
    case 'bigint':
      return value.toString()
    default:
      if (value === null) {
        return null
      }
      throw new UnsupportedTypeError(property.name, describeValueType(value), ['string', 'number', 'boolean', 'bigint'])
  }
}
