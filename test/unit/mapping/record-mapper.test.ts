import { describe, it, expect } from 'vitest'
import { TypedRecordMapper } from '../../../src/mapping/record-mapper'
import { DynamicRecordMapper } from '../../../src/mapping/dynamic-record-mapper'
import type { DocumentBody, RecordSerializer } from '../../../src/mapping/record-serializer'
import { buildCollectionModel, buildDynamicCollectionModel } from '../../../src/model/collection-model-builder'
import { Embedding } from '../../../src/embedding/embedding'
import { UnsupportedTypeError } from '../../../src/errors'
import type { CollectionDefinition } from '../../../src/model/types'
import { Hotel, hotel, letterCountGenerator } from '../../helpers/hotel'

describe('TypedRecordMapper', () => {
  const model = buildCollectionModel(Hotel)
  const mapper = new TypedRecordMapper(model, Hotel)

  const sample = hotel({
    hotelId: 'h1',
    hotelName: 'Harbor Inn',
    description: 'Quiet rooms by the water',
    category: 'budget',
    rating: 4.5,
    tags: ['pool', 'wifi'],
    parkingIncluded: true,
    descriptionEmbedding: [0.1, 0.2, 0.3, 0.4],
  })

  it('should move the key out of the document body', () => {
    expect(mapper.toStorage(sample)).toEqual({
      id: 'h1',
      body: {
        hotelName: 'Harbor Inn',
        description: 'Quiet rooms by the water',
        category: 'budget',
        rating: 4.5,
        tags: ['pool', 'wifi'],
        parkingIncluded: true,
        descriptionEmbedding: [0.1, 0.2, 0.3, 0.4],
      },
    })
  })

  it('should round-trip a record when vectors are included', () => {
    const restored = mapper.fromStorage(mapper.toStorage(sample), true)

    expect(restored).toBeInstanceOf(Hotel)
    expect(restored).toEqual(sample)
  })

  it('should leave vectors at their initial value when not included', () => {
    const restored = mapper.fromStorage(mapper.toStorage(sample), false)

    expect(restored.descriptionEmbedding).toBeNull()
    expect(restored.hotelName).toBe('Harbor Inn')
  })

  it('should keep class defaults for fields missing from the document', () => {
    const restored = mapper.fromStorage({ id: 'h2', body: { hotelName: 'Sparse' } }, false)

    expect(restored).toEqual(hotel({ hotelId: 'h2', hotelName: 'Sparse' }))
  })

  it('should read stored nulls back as type defaults', () => {
    const restored = mapper.fromStorage(
      { id: 'h5', body: { hotelName: null, rating: null, parkingIncluded: null, descriptionEmbedding: null } },
      true
    )

    expect(restored.hotelName).toBeNull()
    expect(restored.rating).toBe(0)
    expect(restored.parkingIncluded).toBe(false)
    expect(restored.descriptionEmbedding).toBeNull()
  })

  it('should drop null fields only when asked to', () => {
    const record = hotel({ hotelId: 'h3' })

    expect(mapper.toStorage(record).body).toHaveProperty('descriptionEmbedding', null)
    const ignoring = new TypedRecordMapper(model, Hotel, { ignoreNullValues: true })
    expect(ignoring.toStorage(record).body).not.toHaveProperty('descriptionEmbedding')
  })

  it('should reject a vector property holding a non-vector value', () => {
    const record = hotel({ hotelId: 'h4' })
    Reflect.set(record, 'descriptionEmbedding', 'not a vector')

    expect(() => mapper.toStorage(record)).toThrow(UnsupportedTypeError)
  })

  it('should convert dates, bigints and embedding wrappers', () => {
    class Visit {
      static readonly definition: CollectionDefinition = {
        properties: [
          { kind: 'key', name: 'id', type: 'int64' },
          { kind: 'data', name: 'at', type: 'date' },
          { kind: 'data', name: 'visitors', type: 'uint64' },
          { kind: 'vector', name: 'embedding', type: 'Embedding', dimensions: 2 },
        ],
      }
      id = 0
      at = new Date(0)
      visitors = 0
      embedding: Embedding | null = null
    }
    const visitMapper = new TypedRecordMapper(buildCollectionModel(Visit), Visit)
    const visit = Object.assign(new Visit(), {
      id: 12,
      at: new Date('2024-05-01T10:00:00.000Z'),
      visitors: 3,
      embedding: new Embedding([0.5, 0.25]),
    })

    const document = visitMapper.toStorage(visit)
    expect(document).toEqual({
      id: '12',
      body: { at: '2024-05-01T10:00:00.000Z', visitors: 3, embedding: [0.5, 0.25] },
    })

    const restored = visitMapper.fromStorage({ id: '12', body: { ...document.body, visitors: '3' } }, true)
    expect(restored.id).toBe(12)
    expect(restored.at).toEqual(new Date('2024-05-01T10:00:00.000Z'))
    expect(restored.visitors).toBe(3)
    expect(restored.embedding).toBeInstanceOf(Embedding)
    expect(restored.embedding?.toArray()).toEqual([0.5, 0.25])
  })

  it('should keep 64-bit integers beyond the safe range exact', () => {
    class Counter {
      static readonly definition: CollectionDefinition = {
        properties: [
          { kind: 'key', name: 'id', type: 'int64' },
          { kind: 'data', name: 'total', type: 'uint64' },
          { kind: 'data', name: 'history', type: 'int64[]' },
        ],
      }
      id: number | bigint = 0
      total: number | bigint = 0
      history: Array<number | bigint> = []
    }
    const counterMapper = new TypedRecordMapper(buildCollectionModel(Counter), Counter)
    const counter = Object.assign(new Counter(), {
      id: 2n ** 60n,
      total: 2n ** 63n + 1n,
      history: [-(2n ** 63n), 5n],
    })

    const document = counterMapper.toStorage(counter)
    expect(document).toEqual({
      id: '1152921504606846976',
      body: { total: '9223372036854775809', history: ['-9223372036854775808', '5'] },
    })

    const restored = counterMapper.fromStorage(document, false)
    expect(restored.id).toBe(2n ** 60n)
    expect(restored.total).toBe(2n ** 63n + 1n)
    expect(restored.history).toEqual([-(2n ** 63n), 5])
  })

  it('should write generated embeddings and never read them back', async () => {
    class Note {
      static readonly definition: CollectionDefinition = {
        properties: [
          { kind: 'key', name: 'id', type: 'string' },
          { kind: 'vector', name: 'text', type: 'string', dimensions: 4 },
        ],
      }
      id = ''
      text = ''
    }
    const noteModel = buildCollectionModel(Note, undefined, letterCountGenerator())
    const noteMapper = new TypedRecordMapper(noteModel, Note)
    const note = Object.assign(new Note(), { id: 'n1', text: 'banana' })

    const document = noteMapper.toStorage(note, [new Embedding([3, 0, 0, 0])])
    expect(document).toEqual({ id: 'n1', body: { text: [3, 0, 0, 0] } })

    const restored = noteMapper.fromStorage(document, true)
    expect(restored.text).toBe('')
  })

  it('should use a custom serializer when given', () => {
    const serializer: RecordSerializer<Hotel> = {
      serialize: (record) => ({ hotelId: record.hotelId, hotelName: record.hotelName.toUpperCase() }),
      deserialize: (body: DocumentBody) => hotel({ hotelId: String(body.hotelId), hotelName: String(body.hotelName) }),
    }
    const custom = new TypedRecordMapper(model, Hotel, { serializer })

    expect(custom.toStorage(sample)).toEqual({ id: 'h1', body: { hotelName: 'HARBOR INN' } })
    expect(custom.fromStorage({ id: 'h9', body: { hotelName: 'X' } }, false)).toEqual(hotel({ hotelId: 'h9', hotelName: 'X' }))
  })
})

describe('DynamicRecordMapper', () => {
  const model = buildDynamicCollectionModel({
    properties: [
      { kind: 'key', name: 'Id', type: 'int64' },
      { kind: 'data', name: 'Title', type: 'string' },
      { kind: 'data', name: 'Count', type: 'int32' },
      { kind: 'data', name: 'Open', type: 'boolean' },
      { kind: 'data', name: 'Floor', type: 'int32', nullable: true },
      { kind: 'vector', name: 'Vector', type: 'float32[]', dimensions: 2 },
    ],
  })
  const mapper = new DynamicRecordMapper(model)

  it('should write fields under their storage names', () => {
    expect(mapper.toStorage({ Id: 5, Title: 'Lobby', Count: 3, Open: true, Floor: null, Vector: [1, 2] })).toEqual({
      id: '5',
      body: { title: 'Lobby', count: 3, open: true, floor: null, vector: [1, 2] },
    })
  })

  it('should leave a missing key for the store to assign', () => {
    expect(mapper.toStorage({ Title: 'No key' }).id).toBeNull()
  })

  it('should fill missing fields with type defaults', () => {
    expect(mapper.fromStorage({ id: '7', body: {} }, false)).toEqual({
      Id: 7,
      Title: null,
      Count: 0,
      Open: false,
      Floor: null,
    })
  })

  it('should read stored nulls back as type defaults', () => {
    expect(mapper.fromStorage({ id: '9', body: { title: null, count: null, open: null, floor: null } }, false)).toEqual({
      Id: 9,
      Title: null,
      Count: 0,
      Open: false,
      Floor: null,
    })
  })

  it('should restore uint64 values beyond the safe range as bigints', () => {
    const wide = new DynamicRecordMapper(
      buildDynamicCollectionModel({
        properties: [
          { kind: 'key', name: 'id', type: 'string' },
          { kind: 'data', name: 'big', type: 'uint64' },
        ],
      })
    )

    const document = wide.toStorage({ id: 'c1', big: 2n ** 63n + 1n })

    expect(document.body).toEqual({ big: '9223372036854775809' })
    expect(wide.fromStorage(document, false)).toEqual({ id: 'c1', big: 2n ** 63n + 1n })
  })

  it('should include vectors only when asked to', () => {
    const document = { id: '8', body: { title: 'Roof', count: 1, open: false, vector: [0.5, 1] } }

    expect(mapper.fromStorage(document, false)).not.toHaveProperty('Vector')
    expect(mapper.fromStorage(document, true)).toEqual({
      Id: 8,
      Title: 'Roof',
      Count: 1,
      Open: false,
      Floor: null,
      Vector: [0.5, 1],
    })
  })
})
