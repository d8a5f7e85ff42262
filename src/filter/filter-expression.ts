/**
 * Filter expressions
 *
 * A filter is a tree over one implicit record. Leaves are record members
 * (`field`, or `index` for dynamic records) and constants; inner nodes are
 * comparisons, boolean connectives and membership tests.
 *
 * @example
 * ```typescript
 * import { and, eq, field, gte, contains } from './filter-expression'
 *
 * // r => r.Category == "shoes" && r.Rating >= 4 && r.Tags.Contains("sale")
 * const filter = and(
 *   eq(field('Category'), 'shoes'),
 *   gte(field('Rating'), 4),
 *   contains(field('Tags'), 'sale')
 * )
 * ```
 */

// ============================================================
// Node types
// ============================================================

export type ComparisonOperator = 'eq' | 'ne' | 'lt' | 'lte' | 'gt' | 'gte'

export type ArithmeticOperator = 'add' | 'subtract' | 'multiply' | 'divide' | 'modulo'

/** Constant values a filter may carry */
export type FilterValue = string | number | boolean | bigint | Date | null

/** Record member access, `r.Name` */
export interface FieldNode {
  kind: 'field'
  name: string
  /** Type the expression converts the member to, e.g. `(string)r.Rating` */
  cast?: string
}

/** Record indexer access, `r["Name"]`, used with dynamic records */
export interface IndexNode {
  kind: 'index'
  key: string
  cast?: string
}

export interface ConstantNode {
  kind: 'constant'
  value: FilterValue
}

/** Literal array, `new[] { "a", "b" }` */
export interface ArrayNode {
  kind: 'array'
  items: FilterNode[]
}

export interface ComparisonNode {
  kind: 'comparison'
  operator: ComparisonOperator
  left: FilterNode
  right: FilterNode
}

export interface AndNode {
  kind: 'and'
  operands: FilterNode[]
}

export interface OrNode {
  kind: 'or'
  operands: FilterNode[]
}

export interface NotNode {
  kind: 'not'
  operand: FilterNode
}

/** `collection.Contains(item)` */
export interface ContainsNode {
  kind: 'contains'
  collection: FilterNode
  item: FilterNode
}

/** Any other method call, e.g. `r.Name.StartsWith("a")` */
export interface CallNode {
  kind: 'call'
  method: string
  target?: FilterNode
  args: FilterNode[]
}

export interface ArithmeticNode {
  kind: 'arithmetic'
  operator: ArithmeticOperator
  left: FilterNode
  right: FilterNode
}

export type FilterNode =
  | FieldNode
  | IndexNode
  | ConstantNode
  | ArrayNode
  | ComparisonNode
  | AndNode
  | OrNode
  | NotNode
  | ContainsNode
  | CallNode
  | ArithmeticNode

/** Builder operand: a node, or a constant to wrap */
export type Operand = FilterNode | FilterValue

// ============================================================
// Builders
// ============================================================

export function isFilterNode(value: Operand | readonly Operand[]): value is FilterNode {
  return typeof value === 'object' && value !== null && !(value instanceof Date) && !Array.isArray(value)
}

function isOperandList(value: Operand | readonly Operand[]): value is readonly Operand[] {
  return Array.isArray(value)
}

function toNode(operand: Operand): FilterNode {
  return isFilterNode(operand) ? operand : constant(operand)
}

export function field(name: string, options: { as?: string } = {}): FieldNode {
  return options.as === undefined ? { kind: 'field', name } : { kind: 'field', name, cast: options.as }
}

export function index(key: string, options: { as?: string } = {}): IndexNode {
  return options.as === undefined ? { kind: 'index', key } : { kind: 'index', key, cast: options.as }
}

export function constant(value: FilterValue): ConstantNode {
  return { kind: 'constant', value }
}

export function array(...items: Operand[]): ArrayNode {
  return { kind: 'array', items: items.map(toNode) }
}

function comparison(operator: ComparisonOperator, left: Operand, right: Operand): ComparisonNode {
  return { kind: 'comparison', operator, left: toNode(left), right: toNode(right) }
}

export const eq = (left: Operand, right: Operand): ComparisonNode => comparison('eq', left, right)
export const ne = (left: Operand, right: Operand): ComparisonNode => comparison('ne', left, right)
export const lt = (left: Operand, right: Operand): ComparisonNode => comparison('lt', left, right)
export const lte = (left: Operand, right: Operand): ComparisonNode => comparison('lte', left, right)
export const gt = (left: Operand, right: Operand): ComparisonNode => comparison('gt', left, right)
export const gte = (left: Operand, right: Operand): ComparisonNode => comparison('gte', left, right)

export function and(...operands: FilterNode[]): AndNode {
  return { kind: 'and', operands }
}

export function or(...operands: FilterNode[]): OrNode {
  return { kind: 'or', operands }
}

export function not(operand: FilterNode): NotNode {
  return { kind: 'not', operand }
}

/**
 * Membership test. A plain array for `collection` becomes a literal array.
 */
export function contains(collection: Operand | readonly Operand[], item: Operand): ContainsNode {
  const collectionNode = isOperandList(collection) ? array(...collection) : toNode(collection)
  return { kind: 'contains', collection: collectionNode, item: toNode(item) }
}

export function call(method: string, target?: Operand, ...args: Operand[]): CallNode {
  return {
    kind: 'call',
    method,
    target: target === undefined ? undefined : toNode(target),
    args: args.map(toNode),
  }
}

export function arithmetic(operator: ArithmeticOperator, left: Operand, right: Operand): ArithmeticNode {
  return { kind: 'arithmetic', operator, left: toNode(left), right: toNode(right) }
}
