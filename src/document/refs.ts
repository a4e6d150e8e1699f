/**
 * Reference utilities for API documents
 */

import type { DocumentValue } from './types.js'
import { isMap } from './tree.js'

export const SCHEMA_REF_PREFIX = '#/components/schemas/'

/**
 * Schema name behind a `#/components/schemas/` reference
 */
export function schemaNameFromRef(ref: string): string | undefined {
  return ref.startsWith(SCHEMA_REF_PREFIX) ? ref.slice(SCHEMA_REF_PREFIX.length) : undefined
}

/**
 * `$ref` string of a reference object
 */
export function getRef(value: DocumentValue | undefined): string | undefined {
  if (!isMap(value)) return undefined
  const ref = value.$ref
  return typeof ref === 'string' ? ref : undefined
}

/**
 * Get every `$ref` string in a subtree
 */
export function getAllRefs(value: DocumentValue | undefined, refs: string[] = []): string[] {
  if (Array.isArray(value)) {
    for (const item of value) getAllRefs(item, refs)
  } else if (isMap(value)) {
    for (const [key, child] of Object.entries(value)) {
      if (key === '$ref' && typeof child === 'string') {
        refs.push(child)
      } else {
        getAllRefs(child, refs)
      }
    }
  }
  return refs
}
