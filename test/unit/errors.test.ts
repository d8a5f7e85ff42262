import { describe, it, expect } from 'vitest'
import {
  InvalidArgumentError,
  StorageOperationError,
  UnsupportedTypeError,
  VectorStoreError,
  VectorStoreErrorCode,
  isNotFound,
  statusCodeOf,
} from '../../src/errors'

describe('errors', () => {
  it('should list the supported types in the message', () => {
    const error = new UnsupportedTypeError('id', 'float32', ['string', 'int64', 'uuid'])

    expect(error).toBeInstanceOf(VectorStoreError)
    expect(error.code).toBe(VectorStoreErrorCode.UNSUPPORTED_TYPE)
    expect(error.message).toBe(
      "Property 'id' has type 'float32' which is not supported. Supported types: string, int64, uuid"
    )
  })

  it('should serialize code and details', () => {
    expect(new InvalidArgumentError('top', 'must be positive').toJSON()).toEqual({
      name: 'InvalidArgumentError',
      code: 'INVALID_ARGUMENT',
      message: "Invalid argument 'top': must be positive",
      details: { argumentName: 'top' },
    })
  })

  it('should keep the wrapped failure and its status code', () => {
    const cause = Object.assign(new Error('index_not_found_exception'), { statusCode: 404 })
    const error = new StorageOperationError('hotels', 'get', cause)

    expect(error.cause).toBe(cause)
    expect(error.statusCode).toBe(404)
    expect(error.message).toBe("Call to vector store failed: 'get' on collection 'hotels': index_not_found_exception")
    expect(isNotFound(error)).toBe(true)
    expect(isNotFound(cause)).toBe(false)
  })

  it('should read status codes only when numeric', () => {
    expect(statusCodeOf({ statusCode: 409 })).toBe(409)
    expect(statusCodeOf({ statusCode: '409' })).toBeUndefined()
    expect(statusCodeOf('failed')).toBeUndefined()
  })
})
