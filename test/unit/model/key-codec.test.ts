import { describe, it, expect } from 'vitest'
import { keyToStorageId, storageIdToKey } from '../../../src/model/key-codec'
import { InvalidKeyError, UnsupportedTypeError } from '../../../src/errors'

describe('key codec', () => {
  describe('keyToStorageId', () => {
    it('should pass string keys through unchanged', () => {
      expect(keyToStorageId('hotel-1', 'string')).toBe('hotel-1')
    })

    it('should write int64 keys in base 10', () => {
      expect(keyToStorageId(42, 'int64')).toBe('42')
      expect(keyToStorageId(-7, 'int64')).toBe('-7')
      expect(keyToStorageId(9007199254740993n, 'int64')).toBe('9007199254740993')
    })

    it('should reject int64 keys that are not safe integers', () => {
      expect(() => keyToStorageId(1.5, 'int64')).toThrow(InvalidKeyError)
      expect(() => keyToStorageId(2n ** 63n, 'int64')).toThrow("'9223372036854775808' is not a valid int64 key")
    })

    it('should reject a key of the wrong runtime type', () => {
      expect(() => keyToStorageId('42', 'int64')).toThrow(UnsupportedTypeError)
      expect(() => keyToStorageId(42, 'string')).toThrow(UnsupportedTypeError)
    })

    it('should write uuid keys in lower case', () => {
      expect(keyToStorageId('A0EEBC99-9C0B-4EF8-BB6D-6BB9BD380A11', 'uuid')).toBe('a0eebc99-9c0b-4ef8-bb6d-6bb9bd380a11')
    })

    it('should reject malformed uuid keys', () => {
      expect(() => keyToStorageId('not-a-uuid', 'uuid')).toThrow("'not-a-uuid' is not a valid uuid key")
    })

    it('should reject unknown key types', () => {
      expect(() => keyToStorageId('x', 'float32')).toThrow(
        "Type 'float32' which is not supported. Supported types: string, int64, uuid"
      )
    })
  })

  describe('storageIdToKey', () => {
    it('should parse int64 ids into numbers', () => {
      expect(storageIdToKey('42', 'int64')).toBe(42)
      expect(storageIdToKey('-3', 'int64')).toBe(-3)
    })

    it('should reject int64 ids that are not integers', () => {
      expect(() => storageIdToKey('4.2', 'int64')).toThrow(InvalidKeyError)
      expect(() => storageIdToKey('abc', 'int64')).toThrow("'abc' is not a valid int64 key")
    })

    it('should parse int64 ids beyond the safe integer range into bigints', () => {
      expect(storageIdToKey('9007199254740993', 'int64')).toBe(9007199254740993n)
      expect(storageIdToKey('9007199254740991', 'int64')).toBe(9007199254740991)
    })

    it('should reject int64 ids outside the int64 range', () => {
      expect(() => storageIdToKey('9223372036854775808', 'int64')).toThrow(
        "'9223372036854775808' is outside the int64 range"
      )
    })

    it('should normalize uuid ids to lower case', () => {
      expect(storageIdToKey('A0EEBC99-9C0B-4EF8-BB6D-6BB9BD380A11', 'uuid')).toBe('a0eebc99-9c0b-4ef8-bb6d-6bb9bd380a11')
    })

    it('should round-trip every key type', () => {
      expect(storageIdToKey(keyToStorageId('abc', 'string'), 'string')).toBe('abc')
      expect(storageIdToKey(keyToStorageId(123456789, 'int64'), 'int64')).toBe(123456789)
      expect(storageIdToKey(keyToStorageId(2n ** 60n, 'int64'), 'int64')).toBe(2n ** 60n)
      expect(storageIdToKey(keyToStorageId(2n ** 63n - 1n, 'int64'), 'int64')).toBe(2n ** 63n - 1n)
      expect(storageIdToKey(keyToStorageId(-(2n ** 63n), 'int64'), 'int64')).toBe(-(2n ** 63n))
      const uuid = '0f8fad5b-d9cb-469f-a165-70867728950e'
      expect(storageIdToKey(keyToStorageId(uuid, 'uuid'), 'uuid')).toBe(uuid)
    })
  })
})
