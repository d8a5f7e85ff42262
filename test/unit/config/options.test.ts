import { describe, it, expect } from 'vitest'
import {
  HybridSearchOptionsSchema,
  QueryOptionsSchema,
  VectorSearchOptionsSchema,
  loadConnectionConfig,
  parseOptions,
} from '../../../src/config/options'
import { InvalidArgumentError } from '../../../src/errors'
import { eq, field } from '../../../src/filter/filter-expression'
import { LegacyFilter } from '../../../src/filter/legacy-filter'

describe('loadConnectionConfig', () => {
  it('should read a single node and an API key', () => {
    expect(
      loadConnectionConfig({ ELASTICSEARCH_URL: 'http://localhost:9200', ELASTICSEARCH_API_KEY: 'test-secret' })
    ).toEqual({ node: 'http://localhost:9200', apiKey: 'test-secret' })
  })

  it('should split several nodes and parse numeric settings', () => {
    expect(
      loadConnectionConfig({
        ELASTICSEARCH_URL: 'http://es1:9200, http://es2:9200',
        ELASTICSEARCH_USERNAME: 'elastic',
        ELASTICSEARCH_PASSWORD: 'test-secret',
        ELASTICSEARCH_REQUEST_TIMEOUT: '5000',
        ELASTICSEARCH_MAX_RETRIES: '2',
      })
    ).toEqual({
      node: ['http://es1:9200', 'http://es2:9200'],
      username: 'elastic',
      password: 'test-secret',
      requestTimeout: 5000,
      maxRetries: 2,
    })
  })

  it('should accept a cloud id instead of a node', () => {
    expect(loadConnectionConfig({ ELASTICSEARCH_CLOUD_ID: 'test-deployment:abc' })).toEqual({
      cloudId: 'test-deployment:abc',
    })
  })

  it('should require a node or a cloud id', () => {
    expect(() => loadConnectionConfig({})).toThrow("Invalid argument 'config.node': Either node or cloudId is required")
  })

  it('should reject conflicting credentials', () => {
    expect(() =>
      loadConnectionConfig({
        ELASTICSEARCH_URL: 'http://localhost:9200',
        ELASTICSEARCH_API_KEY: 'test-secret',
        ELASTICSEARCH_USERNAME: 'elastic',
        ELASTICSEARCH_PASSWORD: 'test-secret',
      })
    ).toThrow("Invalid argument 'config.apiKey': Use either apiKey or username/password, not both")
    expect(() =>
      loadConnectionConfig({ ELASTICSEARCH_URL: 'http://localhost:9200', ELASTICSEARCH_USERNAME: 'elastic' })
    ).toThrow(InvalidArgumentError)
  })

  it('should reject a malformed timeout', () => {
    expect(() =>
      loadConnectionConfig({ ELASTICSEARCH_URL: 'http://localhost:9200', ELASTICSEARCH_REQUEST_TIMEOUT: 'soon' })
    ).toThrow(InvalidArgumentError)
  })
})

describe('per-call options', () => {
  it('should apply defaults', () => {
    expect(parseOptions(QueryOptionsSchema, {}, 'options')).toEqual({ skip: 0, includeVectors: false })
    expect(
      parseOptions(QueryOptionsSchema, { orderBy: [{ property: 'rating' }] }, 'options').orderBy
    ).toEqual([{ property: 'rating', ascending: true }])
  })

  it('should name the offending option', () => {
    expect(() => parseOptions(QueryOptionsSchema, { skip: -1 }, 'options')).toThrow(
      "Invalid argument 'options.skip': Number must be greater than or equal to 0"
    )
  })

  it('should keep filter objects intact', () => {
    const filter = eq(field('category'), 'budget')
    const legacyFilter = new LegacyFilter().equalTo('category', 'budget')

    expect(parseOptions(VectorSearchOptionsSchema, { filter }, 'options').filter).toBe(filter)
    expect(parseOptions(VectorSearchOptionsSchema, { legacyFilter }, 'options').legacyFilter).toBe(legacyFilter)
  })

  it('should reject both filter kinds together', () => {
    expect(() =>
      parseOptions(
        HybridSearchOptionsSchema,
        { filter: eq(field('category'), 'budget'), legacyFilter: new LegacyFilter() },
        'options'
      )
    ).toThrow("Invalid argument 'options.legacyFilter': Either filter or legacyFilter can be specified, but not both")
  })

  it('should reject non-positive fusion settings', () => {
    expect(() => parseOptions(HybridSearchOptionsSchema, { rankConstant: 0 }, 'options')).toThrow(InvalidArgumentError)
  })
})
