/**
 * Record Mappers
 *
 * Convert between application records and stored documents. The key never
 * lives in the document body; it travels beside it as the document id.
 */

import type { Embedding } from '../embedding/embedding'
import type { CollectionModel } from '../model/collection-model'
import { keyToStorageId, storageIdToKey } from '../model/key-codec'
import type { RecordType } from '../model/types'
import {
  ModelRecordSerializer,
  type DocumentBody,
  type RecordSerializer,
  type RecordSerializerOptions,
} from './record-serializer'

/**
 * A stored document: the id (null when the store is to assign one) and the body
 */
export interface StorageDocument {
  id: string | null
  body: DocumentBody
}

/**
 * Generated embeddings for one record, indexed like the model's vector
 * properties; `undefined` where nothing was generated
 */
export type GeneratedEmbeddings = ReadonlyArray<Embedding | undefined>

export interface RecordMapper<TRecord> {
  toStorage(record: TRecord, generatedEmbeddings?: GeneratedEmbeddings): StorageDocument
  fromStorage(document: StorageDocument, includeVectors: boolean): TRecord
}

/**
 * Encode a record's key value, or `null` when the record has none
 */
export function encodeRecordKey(model: CollectionModel, key: unknown): string | null {
  if (key === undefined || key === null) {
    return null
  }
  return keyToStorageId(key, model.keyProperty.type)
}

/**
 * Overwrite vector fields with generated embeddings, as flat arrays
 */
export function applyGeneratedEmbeddings(
  model: CollectionModel,
  body: DocumentBody,
  generatedEmbeddings: GeneratedEmbeddings | undefined
): void {
  if (!generatedEmbeddings) {
    return
  }
  model.vectorProperties.forEach((property, i) => {
    const embedding = generatedEmbeddings[i]
    if (embedding) {
      body[property.storageName] = embedding.toArray()
    }
  })
}

// ============================================================
// Typed records
// ============================================================

export interface TypedRecordMapperOptions<TRecord> extends RecordSerializerOptions {
  /** Replaces the model-driven serializer */
  serializer?: RecordSerializer<TRecord>
}

/**
 * Maps class records through a {@link RecordSerializer}
 */
export class TypedRecordMapper<TRecord extends object> implements RecordMapper<TRecord> {
  private readonly serializer: RecordSerializer<TRecord>

  constructor(
    private readonly model: CollectionModel,
    recordType: RecordType<TRecord>,
    options: TypedRecordMapperOptions<TRecord> = {}
  ) {
    this.serializer = options.serializer ?? new ModelRecordSerializer(recordType, model, options)
  }

  toStorage(record: TRecord, generatedEmbeddings?: GeneratedEmbeddings): StorageDocument {
    const body = this.serializer.serialize(record)
    const keyStorageName = this.model.keyProperty.storageName

    const id = encodeRecordKey(this.model, body[keyStorageName])
    delete body[keyStorageName]

    applyGeneratedEmbeddings(this.model, body, generatedEmbeddings)
    return { id, body }
  }

  fromStorage(document: StorageDocument, includeVectors: boolean): TRecord {
    const body: DocumentBody = { ...document.body }
    if (document.id !== null) {
      body[this.model.keyProperty.storageName] = storageIdToKey(document.id, this.model.keyProperty.type)
    }

    for (const property of this.model.vectorProperties) {
      // Generated vectors cannot be turned back into their source values
      if (!includeVectors || property.requiresEmbeddingGeneration) {
        delete body[property.storageName]
      }
    }

    return this.serializer.deserialize(body)
  }
}
