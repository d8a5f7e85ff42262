/**
 * Field-name inference for properties without an explicit storage name
 */

export type NamingPolicy = 'camelCase' | 'snakeCase' | 'identity' | ((name: string) => string)

export type FieldNameInferrer = (name: string) => string

/**
 * Lower-case the leading upper-case run of a member name.
 * `HotelName` -> `hotelName`, `ID` -> `id`, `URLValue` -> `urlValue`
 */
export function toCamelCase(name: string): string {
  if (name.length === 0 || !isUpper(name[0])) {
    return name
  }

  const chars = name.split('')
  for (let i = 0; i < chars.length; i++) {
    if (i === 1 && !isUpper(chars[i])) {
      break
    }
    const hasNext = i + 1 < chars.length
    // Keep the last capital of a run when it starts the next word
    if (i > 0 && hasNext && !isUpper(chars[i + 1])) {
      if (chars[i + 1] === ' ') {
        chars[i] = chars[i].toLowerCase()
      }
      break
    }
    chars[i] = chars[i].toLowerCase()
  }
  return chars.join('')
}

/**
 * Split a member name into lower-case words joined by underscores.
 * `hotelName` -> `hotel_name`, `URLValue` -> `url_value`
 */
export function toSnakeCase(name: string): string {
  return name
    .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
    .replace(/([A-Z]+)([A-Z][a-z])/g, '$1_$2')
    .replace(/[-\s]+/g, '_')
    .toLowerCase()
}

export function resolveNamingPolicy(policy: NamingPolicy = 'camelCase'): FieldNameInferrer {
  if (typeof policy === 'function') {
    return policy
  }
  switch (policy) {
    case 'camelCase':
      return toCamelCase
    case 'snakeCase':
      return toSnakeCase
    case 'identity':
      return (name) => name
  }
}

function isUpper(char: string | undefined): boolean {
  return char !== undefined && char !== char.toLowerCase() && char === char.toUpperCase()
}
