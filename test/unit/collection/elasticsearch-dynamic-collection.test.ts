import { describe, it, expect, beforeEach } from 'vitest'
import { ElasticsearchDynamicCollection } from '../../../src/collection/elasticsearch-dynamic-collection'
import { contains, field } from '../../../src/filter/filter-expression'
import {
  IncompatibleGeneratorError,
  InvalidKeyError,
  UnsupportedTypeError,
  UnsupportedCombinationError,
} from '../../../src/errors'
import type { CollectionDefinition } from '../../../src/model/types'
import { InMemoryDocumentStore } from '../../helpers/in-memory-document-store'
import { collect } from '../../helpers/async'
import { letterCountGenerator } from '../../helpers/hotel'

const notes: CollectionDefinition = {
  properties: [
    { kind: 'key', name: 'id', type: 'string' },
    { kind: 'data', name: 'title', type: 'string', isIndexed: true },
    { kind: 'vector', name: 'body', type: 'string', dimensions: 4 },
  ],
}

describe('ElasticsearchDynamicCollection', () => {
  let store: InMemoryDocumentStore

  beforeEach(() => {
    store = new InMemoryDocumentStore()
  })

  it('should find a record by array membership', async () => {
    const collection = new ElasticsearchDynamicCollection(store, 'items', {
      definition: {
        properties: [
          { kind: 'key', name: 'Id', type: 'string' },
          { kind: 'data', name: 'Tags', type: 'string[]', isIndexed: true },
        ],
      },
    })
    await collection.ensureCollectionExists()
    await collection.upsert({ Id: '42', Tags: ['a', 'b', 'c'] })

    const records = await collect(collection.query(contains(field('Tags'), 'b'), 10))

    expect(records).toEqual([{ Id: '42', Tags: ['a', 'b', 'c'] }])
    expect(store.callsOf('search')[0].args[0]).toMatchObject({ query: { terms: { tags: ['b'] } } })
  })

  it('should return the store-assigned key of a record without one', async () => {
    const collection = new ElasticsearchDynamicCollection(store, 'notes', {
      definition: {
        properties: [
          { kind: 'key', name: 'id', type: 'string' },
          { kind: 'data', name: 'title', type: 'string' },
        ],
      },
    })

    await expect(collection.upsert({ title: 'untitled' })).resolves.toBe('generated-1')
    await expect(collection.get('generated-1')).resolves.toEqual({ id: 'generated-1', title: 'untitled' })
  })

  it('should require a key up front when the store cannot assign one', async () => {
    const collection = new ElasticsearchDynamicCollection(store, 'visits', {
      definition: {
        properties: [
          { kind: 'key', name: 'id', type: 'uuid' },
          { kind: 'data', name: 'title', type: 'string' },
        ],
      },
    })

    await expect(collection.upsert({ title: 'x' })).rejects.toThrow(
      "Records in collection 'visits' need a uuid key in property 'id'"
    )
    await expect(collection.upsertMany([{ id: '0f8fad5b-d9cb-469f-a165-70867728950e' }, { title: 'y' }])).rejects.toThrow(
      InvalidKeyError
    )
    expect(store.calls).toEqual([])
  })

  it('should return int64 keys beyond the safe integer range as bigints', async () => {
    const collection = new ElasticsearchDynamicCollection(store, 'counters', {
      definition: {
        properties: [
          { kind: 'key', name: 'id', type: 'int64' },
          { kind: 'data', name: 'label', type: 'string' },
        ],
      },
    })

    await expect(collection.upsert({ id: 2n ** 60n, label: 'wide' })).resolves.toBe(2n ** 60n)
    await expect(collection.upsertMany([{ id: 9, label: 'small' }])).resolves.toEqual([9])
    await expect(collection.get(2n ** 60n)).resolves.toEqual({ id: 2n ** 60n, label: 'wide' })
  })

  describe('embedding generation', () => {
    it('should embed a whole batch with one generator call', async () => {
      const generator = letterCountGenerator()
      const collection = new ElasticsearchDynamicCollection(store, 'notes', {
        definition: notes,
        embeddingGenerator: generator,
      })

      await collection.upsertMany([
        { id: 'n1', title: 'Fruit', body: 'banana' },
        { id: 'n2', title: 'Other', body: 'kiwi' },
      ])

      expect(generator.calls).toEqual([['banana', 'kiwi']])
      expect(store.documentBody('notes', 'n1')).toEqual({ title: 'Fruit', body: [3, 0, 0, 0] })
      expect(store.documentBody('notes', 'n2')).toEqual({ title: 'Other', body: [0, 0, 2, 0] })
    })

    it('should embed a text search value with the property generator', async () => {
      const generator = letterCountGenerator()
      const collection = new ElasticsearchDynamicCollection(store, 'notes', {
        definition: notes,
        embeddingGenerator: generator,
      })
      await collection.upsertMany([
        { id: 'n1', title: 'Fruit', body: 'banana' },
        { id: 'n2', title: 'Other', body: 'kiwi' },
      ])

      const results = await collect(collection.search('papaya', 1))

      expect(generator.calls[1]).toEqual(['papaya'])
      expect(results.map((result) => result.record)).toEqual([{ id: 'n1', title: 'Fruit' }])
    })

    it('should reject values the generator does not accept', async () => {
      const collection = new ElasticsearchDynamicCollection(store, 'notes', {
        definition: notes,
        embeddingGenerator: letterCountGenerator(),
      })

      await expect(collection.upsert({ id: 'n1', title: 'Fruit', body: 42 })).rejects.toThrow(
        IncompatibleGeneratorError
      )
      expect(store.calls).toEqual([])
    })

    it('should refuse to build a model whose vector type needs a missing generator', () => {
      expect(() => new ElasticsearchDynamicCollection(store, 'notes', { definition: notes })).toThrow(
        UnsupportedTypeError
      )
    })

    it('should refuse to return vectors it generated, before calling the store', async () => {
      const generator = letterCountGenerator()
      const collection = new ElasticsearchDynamicCollection(store, 'notes', {
        definition: notes,
        embeddingGenerator: generator,
      })

      await expect(collection.get('n1', { includeVectors: true })).rejects.toThrow(UnsupportedCombinationError)
      await expect(collect(collection.search('banana', 1, { includeVectors: true }))).rejects.toThrow(
        UnsupportedCombinationError
      )
      expect(store.calls).toEqual([])
      expect(generator.calls).toEqual([])
    })
  })
})
