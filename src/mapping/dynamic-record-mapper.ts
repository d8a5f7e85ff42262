import type { CollectionModel } from '../model/collection-model'
import { storageIdToKey } from '../model/key-codec'
import type { DocumentBody } from './record-serializer'
import {
  applyGeneratedEmbeddings,
  encodeRecordKey,
  type GeneratedEmbeddings,
  type RecordMapper,
  type StorageDocument,
} from './record-mapper'
import { defaultValueFor, fromStorageValue, toStorageValue } from './value-conversion'

/**
 * A record whose schema is only known at run time: values keyed by property name
 */
export type DynamicRecord = Record<string, unknown>

export interface DynamicRecordMapperOptions {
  /** Leave `null` fields out of the document (default: false) */
  ignoreNullValues?: boolean
}

/**
 * Maps dynamic records field by field, following the collection model.
 *
 * Fields missing from a stored document read back as the property type's
 * zero value (`0`, `false`) or `null`; vector fields are left out of the
 * record unless vectors were requested and can be restored.
 */
export class DynamicRecordMapper implements RecordMapper<DynamicRecord> {
  constructor(
    private readonly model: CollectionModel,
    private readonly options: DynamicRecordMapperOptions = {}
  ) {}

  toStorage(record: DynamicRecord, generatedEmbeddings?: GeneratedEmbeddings): StorageDocument {
    const id = encodeRecordKey(this.model, record[this.model.keyProperty.name])
    const body: DocumentBody = {}

    for (const property of this.model.properties) {
      if (property.kind === 'key') {
        continue
      }
      const value = toStorageValue(property, record[property.name])
      if (value === undefined || (value === null && this.options.ignoreNullValues)) {
        continue
      }
      body[property.storageName] = value
    }

    applyGeneratedEmbeddings(this.model, body, generatedEmbeddings)
    return { id, body }
  }

  fromStorage(document: StorageDocument, includeVectors: boolean): DynamicRecord {
    const keyProperty = this.model.keyProperty
    const record: DynamicRecord = {
      [keyProperty.name]: document.id === null ? null : storageIdToKey(document.id, keyProperty.type),
    }

    for (const property of this.model.properties) {
      if (property.kind === 'key') {
        continue
      }
      if (property.kind === 'vector' && (!includeVectors || property.requiresEmbeddingGeneration)) {
        continue
      }

      record[property.name] = Object.prototype.hasOwnProperty.call(document.body, property.storageName)
        ? fromStorageValue(property, document.body[property.storageName])
        : defaultValueFor(property)
    }
    return record
  }
}
