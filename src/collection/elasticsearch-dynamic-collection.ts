import { DynamicRecordMapper, type DynamicRecord } from '../mapping/dynamic-record-mapper'
import { buildDynamicCollectionModel } from '../model/collection-model-builder'
import type { CollectionDefinition, KeyValue } from '../model/types'
import { BaseCollection, type CollectionOptions, type StoreSource } from './base-collection'

export interface ElasticsearchDynamicCollectionOptions extends CollectionOptions {
  definition: CollectionDefinition
}

/**
 * A collection of string-keyed map records whose schema is given at run time
 */
export class ElasticsearchDynamicCollection extends BaseCollection<KeyValue, DynamicRecord> {
  constructor(source: StoreSource, name: string, options: ElasticsearchDynamicCollectionOptions) {
    const model = buildDynamicCollectionModel(options.definition, options.embeddingGenerator, {
      namingPolicy: options.namingPolicy,
    })
    super(source, name, model, new DynamicRecordMapper(model, { ignoreNullValues: options.ignoreNullValues }), options)
  }

  protected readProperty(record: DynamicRecord, propertyName: string): unknown {
    return record[propertyName]
  }
}
