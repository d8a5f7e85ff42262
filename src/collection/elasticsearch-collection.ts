import { buildCollectionModel } from '../model/collection-model-builder'
import type { KeyValue, RecordType } from '../model/types'
import { TypedRecordMapper } from '../mapping/record-mapper'
import type { RecordSerializer } from '../mapping/record-serializer'
import { BaseCollection, type CollectionOptions, type StoreSource } from './base-collection'

export interface ElasticsearchCollectionOptions<TRecord> extends CollectionOptions {
  /** Replaces the model-driven record serializer */
  serializer?: RecordSerializer<TRecord>
}

/**
 * A collection of class records stored in one Elasticsearch index.
 *
 * @example
 * ```ts
 * class Hotel {
 *   static definition: CollectionDefinition = {
 *     properties: [
 *       { kind: 'key', name: 'hotelId', type: 'string' },
 *       { kind: 'data', name: 'hotelName', type: 'string', isIndexed: true },
 *       { kind: 'vector', name: 'descriptionEmbedding', type: 'float32[]', dimensions: 4 },
 *     ],
 *   }
 *   hotelId = ''
 *   hotelName = ''
 *   descriptionEmbedding: number[] = []
 * }
 *
 * const hotels = new ElasticsearchCollection<string, Hotel>(client, 'hotels', Hotel)
 * await hotels.ensureCollectionExists()
 * ```
 */
export class ElasticsearchCollection<TKey extends KeyValue, TRecord extends object> extends BaseCollection<
  TKey,
  TRecord
> {
  readonly recordType: RecordType<TRecord>

  constructor(
    source: StoreSource,
    name: string,
    recordType: RecordType<TRecord>,
    options: ElasticsearchCollectionOptions<TRecord> = {}
  ) {
    const model = buildCollectionModel(recordType, options.definition, options.embeddingGenerator, {
      namingPolicy: options.namingPolicy,
    })
    const mapper = new TypedRecordMapper(model, recordType, {
      serializer: options.serializer,
      ignoreNullValues: options.ignoreNullValues,
    })
    super(source, name, model, mapper, options)
    this.recordType = recordType
  }

  protected readProperty(record: TRecord, propertyName: string): unknown {
    return Reflect.get(record, propertyName)
  }
}
