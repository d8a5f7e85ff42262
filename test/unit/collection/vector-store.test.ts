import { describe, it, expect, vi, beforeEach } from 'vitest'
import { ElasticsearchVectorStore } from '../../../src/collection/vector-store'
import { StorageOperationError } from '../../../src/errors'
import type { LoggerFunction } from '../../../src/utils/logger'
import { InMemoryDocumentStore, StoreHttpError } from '../../helpers/in-memory-document-store'
import { collect } from '../../helpers/async'
import { Hotel, hotel, letterCountGenerator } from '../../helpers/hotel'

describe('ElasticsearchVectorStore', () => {
  let store: InMemoryDocumentStore

  beforeEach(() => {
    store = new InMemoryDocumentStore()
  })

  it('should hand out collections over the same document store', async () => {
    const vectorStore = new ElasticsearchVectorStore(store)
    const hotels = vectorStore.getCollection<string, Hotel>('hotels', Hotel)

    await hotels.ensureCollectionExists()
    await hotels.upsert(hotel({ hotelId: 'h1', hotelName: 'Harbor Inn' }))

    expect(await collect(vectorStore.listCollectionNames())).toEqual(['hotels'])
    expect((await vectorStore.getCollection<string, Hotel>('hotels', Hotel).get('h1'))?.hotelName).toBe('Harbor Inn')
  })

  it('should pass its embedding generator to dynamic collections', async () => {
    const generator = letterCountGenerator()
    const vectorStore = new ElasticsearchVectorStore(store, { embeddingGenerator: generator })
    const notes = vectorStore.getDynamicCollection('notes', {
      definition: {
        properties: [
          { kind: 'key', name: 'id', type: 'string' },
          { kind: 'vector', name: 'text', type: 'string', dimensions: 4 },
        ],
      },
    })

    await notes.upsert({ id: 'n1', text: 'hello' })

    expect(generator.calls).toEqual([['hello']])
    expect(store.documentBody('notes', 'n1')).toEqual({ text: [0, 1, 0, 1] })
  })

  it('should close an owned store after the last collection is closed', async () => {
    const vectorStore = new ElasticsearchVectorStore(store, { ownsClient: true })
    const first = vectorStore.getCollection<string, Hotel>('hotels', Hotel)
    const second = vectorStore.getCollection<string, Hotel>('rooms', Hotel)

    await vectorStore.close()
    await first.close()
    await first.close()
    expect(store.closeCount).toBe(0)

    await second.close()
    expect(store.closeCount).toBe(1)
  })

  it('should never close a borrowed store', async () => {
    const vectorStore = new ElasticsearchVectorStore(store)
    const hotels = vectorStore.getCollection<string, Hotel>('hotels', Hotel)

    await hotels.close()
    await vectorStore.close()

    expect(store.closeCount).toBe(0)
  })

  it('should wrap a failure to list collections', async () => {
    const logger = vi.fn<LoggerFunction>()
    const vectorStore = new ElasticsearchVectorStore(store, { log: { debug: false, logger } })
    store.failNext('listIndices', new StoreHttpError(503, 'unavailable'))

    const error: unknown = await collect(vectorStore.listCollectionNames()).catch((e: unknown) => e)

    expect(error).toBeInstanceOf(StorageOperationError)
    expect(error).toMatchObject({
      message: "Call to vector store failed: 'indices.stats': unavailable",
      collectionName: undefined,
      statusCode: 503,
    })
    expect(logger).toHaveBeenCalledWith(
      'error',
      "Call to vector store failed: 'indices.stats': unavailable",
      expect.objectContaining({ code: 'STORAGE_OPERATION' })
    )
  })

  it('should connect from validated settings without contacting the cluster', async () => {
    const vectorStore = ElasticsearchVectorStore.fromConfig({ node: 'http://localhost:9200' })

    expect(vectorStore).toBeInstanceOf(ElasticsearchVectorStore)
    await vectorStore.close()
  })
})
