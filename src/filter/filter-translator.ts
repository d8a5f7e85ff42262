/**
 * FilterTranslator - Compiles filter expression trees into query DSL
 *
 * Features:
 * - One translation per node kind, dispatched on the node's tag
 * - Flattening of nested AND / OR chains into a single bool query
 * - Key-property comparisons target the document `_id`
 * - Constants on the left of a range comparison flip the operator
 */

import type { estypes } from '@elastic/elasticsearch'
import { describeValueType } from '../embedding/embedding'
import { SchemaError, TypeMismatchError, UnsupportedExpressionError } from '../errors'
import type { CollectionModel } from '../model/collection-model'
import { keyToStorageId } from '../model/key-codec'
import type { DataPropertyModel, KeyPropertyModel } from '../model/types'
import type {
  AndNode,
  ArithmeticNode,
  ArrayNode,
  CallNode,
  ComparisonNode,
  ComparisonOperator,
  ContainsNode,
  FieldNode,
  FilterNode,
  FilterValue,
  IndexNode,
  NotNode,
  OrNode,
} from './filter-expression'

type Query = estypes.QueryDslQueryContainer

type RangeOperator = 'lt' | 'lte' | 'gt' | 'gte'

/** A member reference resolved against the model */
interface BoundProperty {
  property: KeyPropertyModel | DataPropertyModel
  /** Query field: the storage name, or `_id` for the key */
  field: string
}

type ResolvedOperand =
  | { type: 'property'; bound: BoundProperty }
  | { type: 'constant'; value: FilterValue }

const FLIPPED: Record<RangeOperator, RangeOperator> = {
  lt: 'gt',
  lte: 'gte',
  gt: 'lt',
  gte: 'lte',
}

const MATCH_NONE: Query = { bool: { must_not: [{ match_all: {} }] } }

/**
 * Translate a filter into a query; `undefined` matches everything
 */
export function translateFilter(node: FilterNode | undefined, model: CollectionModel): Query | undefined {
  if (node === undefined) {
    return undefined
  }
  return new FilterTranslator(model).translate(node)
}

export class FilterTranslator {
  constructor(private readonly model: CollectionModel) {}

  translate(node: FilterNode): Query {
    return this.dispatch(node)
  }

  private dispatch(node: FilterNode): Query {
    switch (node.kind) {
      case 'comparison':
        return this.translateComparison(node)
      case 'and':
        return this.translateAnd(node)
      case 'or':
        return this.translateOr(node)
      case 'not':
        return this.translateNot(node)
      case 'contains':
        return this.translateContains(node)
      case 'field':
      case 'index':
        return this.translateBareMember(node)
      case 'constant':
        if (node.value === true) return { match_all: {} }
        if (node.value === false) return MATCH_NONE
        throw new UnsupportedExpressionError(
          'constant',
          `Constant of type '${describeValueType(node.value)}' cannot be used as a filter condition`
        )
      case 'array':
      case 'call':
      case 'arithmetic':
        throw unsupportedNode(node)
    }
  }

  // ============================================================
  // Comparisons
  // ============================================================

  private translateComparison(node: ComparisonNode): Query {
    const left = this.resolveOperand(node.left)
    const right = this.resolveOperand(node.right)

    if (left.type === 'property' && right.type === 'constant') {
      return this.compare(node.operator, left.bound, right.value)
    }
    if (left.type === 'constant' && right.type === 'property') {
      const operator = node.operator === 'eq' || node.operator === 'ne' ? node.operator : FLIPPED[node.operator]
      return this.compare(operator, right.bound, left.value)
    }
    throw new UnsupportedExpressionError(
      'comparison',
      'A comparison must have a record property on one side and a constant on the other'
    )
  }

  private compare(operator: ComparisonOperator, bound: BoundProperty, value: FilterValue): Query {
    switch (operator) {
      case 'eq':
        return this.equals(bound, value)
      case 'ne':
        return value === null
          ? { exists: { field: bound.field } }
          : { bool: { must_not: [this.equals(bound, value)] } }
      default:
        if (value === null) {
          throw new UnsupportedExpressionError(
            'comparison',
            `Property '${bound.property.name}' cannot be compared with null using '${operator}'`
          )
        }
        // Document ids are not range-queryable
        if (bound.property.kind === 'key') {
          throw new UnsupportedExpressionError(
            'comparison',
            `Key property '${bound.property.name}' only supports equality, not '${operator}'`
          )
        }
        return { range: { [bound.field]: rangeBounds(operator, this.fieldValue(bound, value)) } }
    }
  }

  private equals(bound: BoundProperty, value: FilterValue): Query {
    if (value === null) {
      return { bool: { must_not: [{ exists: { field: bound.field } }] } }
    }
    return { term: { [bound.field]: this.fieldValue(bound, value) } }
  }

  // ============================================================
  // Boolean connectives
  // ============================================================

  private translateAnd(node: AndNode): Query {
    const operands = flatten(node.operands, 'and')
    if (operands.length === 0) {
      return { match_all: {} }
    }
    return { bool: { filter: operands.map((operand) => this.dispatch(operand)) } }
  }

  private translateOr(node: OrNode): Query {
    const operands = flatten(node.operands, 'or')
    if (operands.length === 0) {
      return MATCH_NONE
    }
    return {
      bool: {
        should: operands.map((operand) => this.dispatch(operand)),
        minimum_should_match: 1,
      },
    }
  }

  private translateNot(node: NotNode): Query {
    return { bool: { must_not: [this.dispatch(node.operand)] } }
  }

  // ============================================================
  // Membership
  // ============================================================

  private translateContains(node: ContainsNode): Query {
    const { collection, item } = node

    // r.Tags.Contains("b")
    if (collection.kind === 'field' || collection.kind === 'index') {
      const bound = this.bind(collection)
      if (!bound.property.type.endsWith('[]')) {
        throw new UnsupportedExpressionError(
          'contains',
          `Contains requires an array property, but '${bound.property.name}' has type '${bound.property.type}'`
        )
      }
      const value = this.requireConstant(item)
      return { terms: { [bound.field]: [this.fieldValue(bound, value)] } }
    }

    // new[] { "a", "b" }.Contains(r.Category)
    if (collection.kind === 'array') {
      if (item.kind !== 'field' && item.kind !== 'index') {
        throw new UnsupportedExpressionError(
          'contains',
          'Contains over a literal array requires a record property as the tested item'
        )
      }
      const bound = this.bind(item)
      const values = collection.items.map((element) => this.fieldValue(bound, this.requireConstant(element)))
      return { terms: { [bound.field]: values } }
    }

    throw new UnsupportedExpressionError(
      'contains',
      `Contains over a '${collection.kind}' node is not supported; use an array property or a literal array`
    )
  }

  // ============================================================
  // Members and constants
  // ============================================================

  /** `r.IsActive` on its own means `r.IsActive == true` */
  private translateBareMember(node: FieldNode | IndexNode): Query {
    const bound = this.bind(node)
    if (bound.property.type !== 'boolean') {
      throw new UnsupportedExpressionError(
        node.kind,
        `Property '${bound.property.name}' of type '${bound.property.type}' cannot be used as a condition on its own`
      )
    }
    return { term: { [bound.field]: true } }
  }

  private resolveOperand(node: FilterNode): ResolvedOperand {
    switch (node.kind) {
      case 'field':
      case 'index':
        return { type: 'property', bound: this.bind(node) }
      case 'constant':
        return { type: 'constant', value: node.value }
      case 'array':
      case 'call':
      case 'arithmetic':
        throw unsupportedNode(node)
      default:
        throw new UnsupportedExpressionError(
          node.kind,
          `A '${node.kind}' node cannot be an operand of a comparison`
        )
    }
  }

  private requireConstant(node: FilterNode): FilterValue {
    if (node.kind !== 'constant') {
      throw new UnsupportedExpressionError(
        node.kind,
        `Only constant values are supported here, found a '${node.kind}' node`
      )
    }
    return node.value
  }

  private bind(node: FieldNode | IndexNode): BoundProperty {
    const name = node.kind === 'field' ? node.name : node.key
    const property = this.model.findProperty(name)
    if (!property) {
      throw new SchemaError(`Property '${name}' referenced in the filter is not part of the collection model`, name)
    }
    if (property.kind === 'vector') {
      throw new SchemaError(`Vector property '${name}' cannot be used in a filter`, name)
    }
    if (node.cast !== undefined && !isConvertible(property.type, node.cast)) {
      throw new TypeMismatchError(name, property.type, node.cast)
    }
    return { property, field: property.kind === 'key' ? '_id' : property.storageName }
  }

  private fieldValue(bound: BoundProperty, value: FilterValue): estypes.FieldValue {
    if (value === null) {
      throw new UnsupportedExpressionError('constant', `Property '${bound.property.name}' cannot be matched against null here`)
    }
    if (bound.property.kind === 'key') {
      return keyToStorageId(value, bound.property.type)
    }
    if (value instanceof Date) {
      return value.toISOString()
    }
    if (typeof value === 'bigint') {
      return value.toString()
    }
    return value
  }
}

function flatten(operands: readonly FilterNode[], kind: 'and' | 'or'): FilterNode[] {
  const result: FilterNode[] = []
  for (const operand of operands) {
    if (operand.kind === kind) {
      result.push(...flatten(operand.operands, kind))
    } else {
      result.push(operand)
    }
  }
  return result
}

function unsupportedNode(node: ArrayNode | CallNode | ArithmeticNode): UnsupportedExpressionError {
  switch (node.kind) {
    case 'array':
      return new UnsupportedExpressionError('array', 'A literal array is only supported as the collection of a contains test')
    case 'call':
      return new UnsupportedExpressionError('call', `Method call '${node.method}' is not supported in filters`)
    case 'arithmetic':
      return new UnsupportedExpressionError('arithmetic', `Arithmetic '${node.operator}' is not supported in filters`)
  }
}

function rangeBounds(operator: RangeOperator, value: estypes.FieldValue): estypes.QueryDslUntypedRangeQuery {
  switch (operator) {
    case 'lt':
      return { lt: value }
    case 'lte':
      return { lte: value }
    case 'gt':
      return { gt: value }
    case 'gte':
      return { gte: value }
  }
}

// ============================================================
// Casts
// ============================================================

const NUMERIC = new Set(['int8', 'uint8', 'int16', 'uint16', 'int32', 'uint32', 'int64', 'uint64', 'float32', 'float64'])

function typeCategory(type: string): string {
  const isArray = type.endsWith('[]')
  const element = isArray ? type.slice(0, -2) : type
  const category = NUMERIC.has(element) ? 'number' : element === 'uuid' ? 'string' : element
  return isArray ? `${category}[]` : category
}

/**
 * Whether a property of `propertyType` can be converted to `targetType`
 */
export function isConvertible(propertyType: string, targetType: string): boolean {
  return targetType === 'object' || typeCategory(propertyType) === typeCategory(targetType)
}
