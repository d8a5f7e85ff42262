/**
 * Configuration and option schemas
 *
 * - Connection settings for the Elasticsearch client, from code or environment
 * - Per-call option objects for queries and searches
 *
 * Every schema is validated with zod; violations surface as
 * InvalidArgumentError naming the offending option.
 */

import { z } from 'zod'
import { InvalidArgumentError } from '../errors'
import { LegacyFilter } from '../filter/legacy-filter'
import type { FilterNode } from '../filter/filter-expression'

// ============================================================
// Connection
// ============================================================

export const RefreshPolicySchema = z.union([z.boolean(), z.literal('wait_for')])

export type RefreshPolicy = z.infer<typeof RefreshPolicySchema>

export const ConnectionConfigSchema = z
  .object({
    /** Node URL(s) */
    node: z.union([z.string().url(), z.array(z.string().url()).nonempty()]).optional(),
    /** Elastic Cloud deployment id; replaces `node` */
    cloudId: z.string().min(1).optional(),
    apiKey: z.string().min(1).optional(),
    username: z.string().min(1).optional(),
    password: z.string().optional(),
    /** Per-request timeout in milliseconds */
    requestTimeout: z.number().int().positive().optional(),
    /** Transport-level retries; this package does not retry on its own */
    maxRetries: z.number().int().nonnegative().optional(),
    /** Refresh behaviour of write calls (default: the index refresh interval) */
    refresh: RefreshPolicySchema.optional(),
  })
  .refine((config) => config.node !== undefined || config.cloudId !== undefined, {
    message: 'Either node or cloudId is required',
    path: ['node'],
  })
  .refine((config) => config.apiKey === undefined || config.username === undefined, {
    message: 'Use either apiKey or username/password, not both',
    path: ['apiKey'],
  })
  .refine((config) => (config.username === undefined) === (config.password === undefined), {
    message: 'username and password must be given together',
    path: ['username'],
  })

export type ConnectionConfig = z.infer<typeof ConnectionConfigSchema>

/**
 * Read connection settings from environment variables:
 * `ELASTICSEARCH_URL` (comma-separated for several nodes),
 * `ELASTICSEARCH_CLOUD_ID`, `ELASTICSEARCH_API_KEY`,
 * `ELASTICSEARCH_USERNAME`, `ELASTICSEARCH_PASSWORD`,
 * `ELASTICSEARCH_REQUEST_TIMEOUT`, `ELASTICSEARCH_MAX_RETRIES`.
 */
export function loadConnectionConfig(env: NodeJS.ProcessEnv = process.env): ConnectionConfig {
  const nodes = env.ELASTICSEARCH_URL?.split(',')
    .map((url) => url.trim())
    .filter((url) => url.length > 0)

  return parseOptions(
    ConnectionConfigSchema,
    {
      node: nodes === undefined || nodes.length === 0 ? undefined : nodes.length === 1 ? nodes[0] : nodes,
      cloudId: env.ELASTICSEARCH_CLOUD_ID || undefined,
      apiKey: env.ELASTICSEARCH_API_KEY || undefined,
      username: env.ELASTICSEARCH_USERNAME || undefined,
      password: env.ELASTICSEARCH_PASSWORD,
      requestTimeout: toInteger(env.ELASTICSEARCH_REQUEST_TIMEOUT),
      maxRetries: toInteger(env.ELASTICSEARCH_MAX_RETRIES),
    },
    'config'
  )
}

function toInteger(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined
  }
  return Number(value)
}

// ============================================================
// Per-call options
// ============================================================

const filterSchema = z.custom<FilterNode>(
  (value) => typeof value === 'object' && value !== null && 'kind' in value && typeof value.kind === 'string',
  { message: 'Expected a filter expression node' }
)

const legacyFilterSchema = z.instanceof(LegacyFilter)

const propertyNameSchema = z.string().min(1)

export const OrderBySchema = z.array(
  z.object({
    property: propertyNameSchema,
    ascending: z.boolean().default(true),
  })
)

export type OrderBy = z.input<typeof OrderBySchema>

export const QueryOptionsSchema = z.object({
  skip: z.number().int().nonnegative().default(0),
  orderBy: OrderBySchema.optional(),
  includeVectors: z.boolean().default(false),
})

export type QueryOptions = z.input<typeof QueryOptionsSchema>

export const GetOptionsSchema = z.object({
  includeVectors: z.boolean().default(false),
})

export type GetOptions = z.input<typeof GetOptionsSchema>

const searchOptionsShape = {
  skip: z.number().int().nonnegative().default(0),
  includeVectors: z.boolean().default(false),
  /** Vector property to search; defaults to the only one */
  vectorProperty: propertyNameSchema.optional(),
  filter: filterSchema.optional(),
  /** Clause-list filter; cannot be combined with `filter` */
  legacyFilter: legacyFilterSchema.optional(),
  /** kNN candidates per shard (default: twice k) */
  numCandidates: z.number().int().positive().optional(),
}

export const VectorSearchOptionsSchema = z
  .object(searchOptionsShape)
  .refine((options) => options.filter === undefined || options.legacyFilter === undefined, {
    message: 'Either filter or legacyFilter can be specified, but not both',
    path: ['legacyFilter'],
  })

export type VectorSearchOptions = z.input<typeof VectorSearchOptionsSchema>

export const HybridSearchOptionsSchema = z
  .object({
    ...searchOptionsShape,
    /** Full-text property the keywords are matched against; defaults to the only one */
    additionalProperty: propertyNameSchema.optional(),
    /** Reciprocal-rank-fusion constant (default: 60) */
    rankConstant: z.number().int().positive().optional(),
    /** Results per leg considered for fusion (default: max(skip + top, 10)) */
    rankWindowSize: z.number().int().positive().optional(),
  })
  .refine((options) => options.filter === undefined || options.legacyFilter === undefined, {
    message: 'Either filter or legacyFilter can be specified, but not both',
    path: ['legacyFilter'],
  })

export type HybridSearchOptions = z.input<typeof HybridSearchOptionsSchema>

export const TopSchema = z.number().int().positive()

/**
 * Validate a value against a schema, raising InvalidArgumentError
 */
export function parseOptions<T extends z.ZodTypeAny>(schema: T, value: unknown, argumentName: string): z.output<T> {
  const result = schema.safeParse(value)
  if (result.success) {
    return result.data
  }
  const issue = result.error.issues[0]
  const path = issue.path.length > 0 ? `${argumentName}.${issue.path.join('.')}` : argumentName
  throw new InvalidArgumentError(path, issue.message)
}
