import type { CollectionModel } from '../model/collection-model'
import type { RecordType } from '../model/types'
import { fromStorageValue, toStorageValue } from './value-conversion'

/**
 * Document body: field values under their storage names
 */
export type DocumentBody = Record<string, unknown>

/**
 * Converts class records to and from document bodies.
 *
 * `serialize` writes every field under its storage name, the key included;
 * `deserialize` receives a body in which the key has been put back under its
 * storage name.
 */
export interface RecordSerializer<TRecord> {
  serialize(record: TRecord): DocumentBody
  deserialize(body: DocumentBody): TRecord
}

export interface RecordSerializerOptions {
  /** Leave `null` fields out of the document (default: false) */
  ignoreNullValues?: boolean
}

/**
 * Default serializer: walks the collection model, reading and writing record
 * members by property name.
 *
 * Members the document does not carry keep the value the record class
 * initializes them with.
 */
export class ModelRecordSerializer<TRecord extends object> implements RecordSerializer<TRecord> {
  constructor(
    private readonly recordType: RecordType<TRecord>,
    private readonly model: CollectionModel,
    private readonly options: RecordSerializerOptions = {}
  ) {}

  serialize(record: TRecord): DocumentBody {
    const body: DocumentBody = {}
    for (const property of this.model.properties) {
      const raw: unknown = Reflect.get(record, property.name)
      const value = property.kind === 'key' ? raw : toStorageValue(property, raw)
      if (value === undefined || (value === null && this.options.ignoreNullValues)) {
        continue
      }
      body[property.storageName] = value
    }
    return body
  }

  deserialize(body: DocumentBody): TRecord {
    const record = new this.recordType()
    for (const property of this.model.properties) {
      if (!Object.prototype.hasOwnProperty.call(body, property.storageName)) {
        continue
      }
      Reflect.set(record, property.name, fromStorageValue(property, body[property.storageName]))
    }
    return record
  }
}
