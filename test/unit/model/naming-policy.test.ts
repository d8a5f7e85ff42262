import { describe, it, expect } from 'vitest'
import { resolveNamingPolicy, toCamelCase, toSnakeCase } from '../../../src/model/naming-policy'

describe('naming policy', () => {
  describe('toCamelCase', () => {
    it('should lower-case the first letter', () => {
      expect(toCamelCase('HotelName')).toBe('hotelName')
    })

    it('should lower-case a leading acronym', () => {
      expect(toCamelCase('ID')).toBe('id')
      expect(toCamelCase('URLValue')).toBe('urlValue')
    })

    it('should leave camelCase names unchanged', () => {
      expect(toCamelCase('hotelName')).toBe('hotelName')
      expect(toCamelCase('')).toBe('')
    })
  })

  describe('toSnakeCase', () => {
    it('should split words with underscores', () => {
      expect(toSnakeCase('hotelName')).toBe('hotel_name')
      expect(toSnakeCase('HotelName')).toBe('hotel_name')
      expect(toSnakeCase('URLValue')).toBe('url_value')
    })
  })

  describe('resolveNamingPolicy', () => {
    it('should default to camelCase', () => {
      expect(resolveNamingPolicy()('Rating')).toBe('rating')
    })

    it('should resolve named and custom policies', () => {
      expect(resolveNamingPolicy('identity')('Rating')).toBe('Rating')
      expect(resolveNamingPolicy('snakeCase')('parkingIncluded')).toBe('parking_included')
      expect(resolveNamingPolicy((name) => `f_${name}`)('rating')).toBe('f_rating')
    })
  })
})
