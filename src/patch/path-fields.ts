/**
 * Phase 10: path-bound fields
 *
 * Fields carried in the URL are removed from the body the client sends,
 * and path parameters pick up the shape their proto field declares.
 */

import {
  cloneValue,
  getArray,
  getMap,
  getParameters,
  getRef,
  getSchemas,
  getString,
  listOperations,
  schemaNameFromRef,
  type DocumentMap,
} from '../document/index.js'
import { snakeToLowerCamel, type PathParamConstraint, type PathParams } from '../discover/index.js'
import { uuidStringSchema } from './uuid.js'

/**
 * Body property bound by a path parameter: `item_id.value` -> `itemId`
 */
function boundFieldName(paramName: string): string {
  const [root = paramName] = paramName.split('.')
  return snakeToLowerCamel(root)
}

/**
 * Give every operation that has path parameters its own copy of the
 * request body schema, without the path-bound properties. Operations
 * without path parameters keep the shared reference.
 */
export function stripPathFieldsFromBody(doc: DocumentMap): void {
  const schemas = getSchemas(doc)
  if (!schemas) return

  for (const { operation } of listOperations(doc)) {
    const bound = getParameters(operation)
      .filter((param) => param.in === 'path')
      .map((param) => getString(param, 'name'))
      .filter((name): name is string => name !== undefined)
      .map(boundFieldName)
    if (bound.length === 0) continue

    const media = getMap(getMap(getMap(operation, 'requestBody'), 'content'), 'application/json')
    const ref = getRef(media?.schema)
    const name = ref !== undefined ? schemaNameFromRef(ref) : undefined
    const shared = name !== undefined ? getMap(schemas, name) : undefined
    if (!media || !shared) continue

    const copy = cloneValue(shared)
    const properties = getMap(copy, 'properties')
    if (properties) {
      for (const field of bound) delete properties[field]
    }

    const required = getArray(copy, 'required')
    if (required) {
      const kept = required.filter((entry) => typeof entry !== 'string' || !bound.includes(entry))
      if (kept.length > 0) {
        copy.required = kept
      } else {
        delete copy.required
      }
    }

    media.schema = copy
  }
}

function normalizePathForMatch(path: string): string {
  return path.replaceAll('.value}', '}').replaceAll('_', '').toLowerCase()
}

function normalizeNameForMatch(name: string): string {
  const base = name.endsWith('.value') ? name.slice(0, -'.value'.length) : name
  return base.replaceAll('_', '').toLowerCase()
}

function applyParamConstraint(
  param: DocumentMap,
  constraint: PathParamConstraint,
  enumValueMap: ReadonlyMap<string, string>
): void {
  if (constraint.uuid) {
    param.schema = uuidStringSchema()
    param.description = 'Resource UUID'
    return
  }

  if (constraint.minLength !== undefined || constraint.maxLength !== undefined) {
    const schema: DocumentMap = { type: 'string' }
    if (constraint.minLength !== undefined) schema.minLength = constraint.minLength
    if (constraint.maxLength !== undefined) schema.maxLength = constraint.maxLength
    param.schema = schema
  }

  const existing = getMap(param, 'schema')
  if (constraint.enumValues !== undefined && constraint.enumValues.length > 0 && existing?.enum === undefined) {
    const values = constraint.enumValues.map((value) => enumValueMap.get(value) ?? value)
    param.schema = { ...existing, type: 'string', enum: values }
  }
}

/**
 * Apply discovered constraints to path parameters and drop enum sentinels
 * from their schemas.
 *
 * Paths and names are compared with `.value` suffixes and underscores
 * removed, case-insensitively. Injected enum values go through
 * `enumValueMap` so they match the rewritten body enums.
 */
export function enrichPathParams(
  doc: DocumentMap,
  pathParams: readonly PathParams[],
  enumValueMap: ReadonlyMap<string, string> = new Map()
): void {
  for (const { path, operation } of listOperations(doc)) {
    const normalizedPath = normalizePathForMatch(path)
    const declared = pathParams.find((entry) => normalizePathForMatch(entry.path) === normalizedPath)

    for (const param of getParameters(operation)) {
      if (param.in !== 'path') continue

      const name = normalizeNameForMatch(getString(param, 'name') ?? '')
      const constraint = declared?.params.find((c) => normalizeNameForMatch(c.name) === name)
      if (constraint) {
        applyParamConstraint(param, constraint, enumValueMap)
        if (constraint.uuid) continue
      }

      const schema = getMap(param, 'schema')
      const values = getArray(schema, 'enum')
      if (schema && values) {
        schema.enum = values.filter((value) => !(typeof value === 'string' && value.endsWith('_UNSPECIFIED')))
      }
    }
  }
}
