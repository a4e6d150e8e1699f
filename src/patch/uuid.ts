/**
 * Phase 8: UUID flattening
 *
 * The UUID wrapper message (`{ value: string }`) surfaces in the document as
 * a component schema, as `.value` suffixes in path templates and as dotted
 * query parameters. These transforms present it as a plain string.
 */

import {
  getArray,
  getMap,
  getParameters,
  getSchemas,
  getString,
  isMap,
  listOperations,
  SCHEMA_REF_PREFIX,
  type DocumentMap,
  type DocumentValue,
} from '../document/index.js'
import { UUID_EXAMPLE, UUID_PATTERN } from './constants.js'

const VALUE_SUFFIX = '.value'

/**
 * Inline string schema standing in for the UUID wrapper
 */
export function uuidStringSchema(): DocumentMap {
  return {
    type: 'string',
    format: 'uuid',
    pattern: UUID_PATTERN,
    example: UUID_EXAMPLE,
  }
}

function isUuidReference(value: DocumentValue | undefined, uuidRef: string): boolean {
  if (!isMap(value)) return false
  if (value.$ref === uuidRef) return true
  return (getArray(value, 'allOf') ?? []).some((item) => isMap(item) && item.$ref === uuidRef)
}

function inlineUuid(prop: DocumentMap): DocumentMap {
  const replacement = uuidStringSchema()
  const description = getString(prop, 'description')
  if (description !== undefined) {
    replacement.description = description
  }
  return replacement
}

/**
 * Replace references to the UUID wrapper schema with an inline string
 * schema, then delete the wrapper
 */
export function flattenUuidRefs(doc: DocumentMap, uuidSchema: string | undefined): void {
  const schemas = getSchemas(doc)
  if (uuidSchema === undefined || !schemas) return
  const uuidRef = `${SCHEMA_REF_PREFIX}${uuidSchema}`

  for (const schema of Object.values(schemas)) {
    const properties = isMap(schema) ? getMap(schema, 'properties') : undefined
    if (!properties) continue

    for (const [name, prop] of Object.entries(properties)) {
      if (!isMap(prop)) continue
      if (isUuidReference(prop, uuidRef)) {
        properties[name] = inlineUuid(prop)
        continue
      }
      const items = getMap(prop, 'items')
      if (items && isUuidReference(items, uuidRef)) {
        prop.items = inlineUuid(items)
      }
    }
  }

  delete schemas[uuidSchema]
}

/**
 * `{item_id.value}` -> `{item_id}` in path keys and path parameter names.
 * Path order is preserved.
 */
export function flattenUuidPathTemplates(doc: DocumentMap): void {
  const paths = getMap(doc, 'paths')
  if (!paths || !Object.keys(paths).some((key) => key.includes(`${VALUE_SUFFIX}}`))) return

  const rebuilt: DocumentMap = {}
  for (const [key, pathItem] of Object.entries(paths)) {
    if (!key.includes(`${VALUE_SUFFIX}}`)) {
      rebuilt[key] = pathItem
      continue
    }

    if (isMap(pathItem)) {
      for (const operation of Object.values(pathItem)) {
        if (!isMap(operation)) continue
        for (const param of getParameters(operation)) {
          const name = getString(param, 'name')
          if (param.in === 'path' && name?.endsWith(VALUE_SUFFIX)) {
            param.name = name.slice(0, -VALUE_SUFFIX.length)
          }
        }
      }
    }
    rebuilt[key.replaceAll(`${VALUE_SUFFIX}}`, '}')] = pathItem
  }

  for (const key of Object.keys(paths)) delete paths[key]
  Object.assign(paths, rebuilt)
}

/**
 * `ownerId.value` query parameters -> `ownerId` with a UUID string schema
 */
export function simplifyUuidQueryParams(doc: DocumentMap): void {
  for (const { operation } of listOperations(doc)) {
    for (const param of getParameters(operation)) {
      const name = getString(param, 'name')
      if (param.in !== 'query' || !name?.endsWith(VALUE_SUFFIX)) continue

      const base = name.slice(0, -VALUE_SUFFIX.length)
      param.name = base
      param.description = `UUID of the ${base.replaceAll('Id', '')}`
      param.schema = uuidStringSchema()
    }
  }
}
