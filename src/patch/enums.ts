/**
 * Phase 4: enum value rewriting
 */

import {
  getMap,
  getParameters,
  getSchemas,
  isMap,
  listOperations,
  walkMaps,
  type DocumentMap,
  type DocumentValue,
} from '../document/index.js'
import type { EnumRewrite } from '../discover/index.js'

/**
 * Whether an enum value is the zero-value sentinel
 */
export function isEnumSentinel(value: DocumentValue): boolean {
  return (
    typeof value === 'string' &&
    (value === 'unspecified' || value.endsWith('_UNSPECIFIED') || value.endsWith('_unspecified'))
  )
}

function replaceEnum(schema: DocumentMap | undefined, values: readonly string[]): void {
  if (schema && Array.isArray(schema.enum)) {
    schema.enum = [...values]
  }
}

/**
 * Replace the enum arrays of the properties named by each rewrite
 */
export function applyEnumRewrites(doc: DocumentMap, rewrites: readonly EnumRewrite[]): void {
  const schemas = getSchemas(doc)
  if (!schemas) return

  for (const { schema, field, values } of rewrites) {
    const property = getMap(getMap(getMap(schemas, schema), 'properties'), field)
    replaceEnum(property, values)
    replaceEnum(getMap(property, 'items'), values)
  }
}

/**
 * Map every enum value in the document through the raw-to-stripped table
 */
export function rewriteInlineEnumValues(doc: DocumentMap, valueMap: ReadonlyMap<string, string>): void {
  if (valueMap.size === 0) return

  walkMaps(doc, (node) => {
    if (Array.isArray(node.enum)) {
      node.enum = node.enum.map((v) => (typeof v === 'string' ? (valueMap.get(v) ?? v) : v))
    }
  })
}

function stripFrom(schema: DocumentMap | undefined): void {
  if (schema && Array.isArray(schema.enum)) {
    schema.enum = schema.enum.filter((v) => !isEnumSentinel(v))
  }
}

/**
 * Remove sentinel values from parameter and component schemas
 */
export function stripEnumSentinels(doc: DocumentMap): void {
  for (const { operation } of listOperations(doc)) {
    for (const param of getParameters(operation)) {
      if (param.in !== 'query' && param.in !== 'path') continue
      const schema = getMap(param, 'schema')
      stripFrom(schema)
      stripFrom(getMap(schema, 'items'))
    }
  }

  const schemas = getSchemas(doc)
  if (!schemas) return
  for (const schema of Object.values(schemas)) {
    if (!isMap(schema)) continue
    stripFrom(schema)
    const properties = getMap(schema, 'properties')
    if (!properties) continue
    for (const property of Object.values(properties)) {
      if (!isMap(property)) continue
      stripFrom(property)
      stripFrom(getMap(property, 'items'))
    }
  }
}
