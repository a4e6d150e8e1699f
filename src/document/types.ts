/**
 * Document Tree Types
 *
 * Generic structured value an OpenAPI document is parsed into. Transforms
 * mutate it in place.
 */

export type DocumentScalar = string | number | boolean | null

export type DocumentValue = DocumentScalar | DocumentValue[] | DocumentMap

/**
 * Mapping node. Lookups of absent keys yield `undefined`.
 */
export interface DocumentMap {
  [key: string]: DocumentValue | undefined
}

export type DocumentFormat = 'json' | 'yaml'

/**
 * Check that an arbitrary parsed value is a well-formed document value
 */
export function isDocumentValue(value: unknown): value is DocumentValue {
  if (value === null) return true
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true
    case 'number':
      return Number.isFinite(value)
    case 'object':
      if (Array.isArray(value)) {
        return value.every(isDocumentValue)
      }
      {
        const children: unknown[] = Object.values(value)
        return children.every((v) => v === undefined || isDocumentValue(v))
      }
    default:
      return false
  }
}
