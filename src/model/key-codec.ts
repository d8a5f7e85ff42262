/**
 * Conversion between application keys and backing-store document ids.
 *
 * Document ids are always strings. String keys pass through unchanged;
 * int64 keys use their base-10 form; uuid keys use the canonical lower-case
 * 8-4-4-4-12 form.
 *
 * int64 ids decode to a `number` when they are safe integers and to a
 * `bigint` otherwise.
 */

import { InvalidKeyError, UnsupportedTypeError } from '../errors'
import { describeValueType } from '../embedding/embedding'
import { KEY_TYPES, type KeyType, type KeyValue } from './types'

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i
const INT64_PATTERN = /^-?\d+$/

const INT64_MIN = -(2n ** 63n)
const INT64_MAX = 2n ** 63n - 1n

export function isKeyType(type: string): type is KeyType {
  return (KEY_TYPES as readonly string[]).includes(type)
}

/**
 * Convert an application key into a document id
 */
export function keyToStorageId(key: unknown, keyType: string): string {
  if (!isKeyType(keyType)) {
    throw new UnsupportedTypeError(undefined, keyType, KEY_TYPES)
  }

  switch (keyType) {
    case 'string':
      if (typeof key !== 'string') {
        throw new UnsupportedTypeError(undefined, describeValueType(key), ['string'])
      }
      return key

    case 'int64':
      if (typeof key === 'number') {
        if (!Number.isSafeInteger(key)) {
          throw new InvalidKeyError(keyType, String(key))
        }
        return String(key)
      }
      if (typeof key === 'bigint') {
        if (key < INT64_MIN || key > INT64_MAX) {
          throw new InvalidKeyError(keyType, key.toString())
        }
        return key.toString()
      }
      throw new UnsupportedTypeError(undefined, describeValueType(key), ['number', 'bigint'])

    case 'uuid':
      if (typeof key !== 'string') {
        throw new UnsupportedTypeError(undefined, describeValueType(key), ['string'])
      }
      if (!UUID_PATTERN.test(key)) {
        throw new InvalidKeyError(keyType, key)
      }
      return key.toLowerCase()
  }
}

/**
 * Convert a document id back into an application key
 */
export function storageIdToKey(id: string, keyType: 'string' | 'uuid'): string
export function storageIdToKey(id: string, keyType: 'int64'): number | bigint
export function storageIdToKey(id: string, keyType: string): KeyValue
export function storageIdToKey(id: string, keyType: string): KeyValue {
  if (!isKeyType(keyType)) {
    throw new UnsupportedTypeError(undefined, keyType, KEY_TYPES)
  }

  switch (keyType) {
    case 'string':
      return id

    case 'int64': {
      if (!INT64_PATTERN.test(id)) {
        throw new InvalidKeyError(keyType, id)
      }
      const value = BigInt(id)
      if (value < INT64_MIN || value > INT64_MAX) {
        throw new InvalidKeyError(keyType, id, `'${id}' is outside the int64 range`)
      }
      const number = Number(value)
      return Number.isSafeInteger(number) ? number : value
    }

    case 'uuid':
      if (!UUID_PATTERN.test(id)) {
        throw new InvalidKeyError(keyType, id)
      }
      return id.toLowerCase()
  }
}
