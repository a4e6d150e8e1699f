/**
 * Phase 9: validation constraints and property access
 *
 * Field rules collected during discovery become JSON Schema keywords.
 * Property names decide `writeOnly`/`readOnly`, and Duration messages
 * become `"300s"` strings.
 */

import {
  getArray,
  getMap,
  getSchemas,
  getString,
  isMap,
  SCHEMA_REF_PREFIX,
  type DocumentMap,
} from '../document/index.js'
import type { FieldConstraint, SchemaConstraints } from '../discover/index.js'
import { DURATION_DESCRIPTION, DURATION_EXAMPLE, UUID_EXAMPLE, UUID_PATTERN } from './constants.js'

function applyConstraint(prop: DocumentMap, constraint: FieldConstraint): void {
  switch (constraint.kind) {
    case 'numeric':
      prop.type = 'integer'
      delete prop.format
      if (constraint.minimum !== undefined) prop.minimum = constraint.minimum
      if (constraint.maximum !== undefined) prop.maximum = constraint.maximum
      return

    case 'string':
      if (constraint.minLength !== undefined) prop.minLength = constraint.minLength
      if (constraint.maxLength !== undefined) prop.maxLength = constraint.maxLength
      if (constraint.pattern !== undefined) prop.pattern = constraint.pattern
      if (constraint.enumValues.length > 0) prop.enum = [...constraint.enumValues]
      break

    case 'presence':
      break
  }

  if (constraint.uuid) {
    prop.format = 'uuid'
    prop.pattern = UUID_PATTERN
    prop.example = UUID_EXAMPLE
  }
}

/**
 * Write field bounds, patterns, enums and `required` lists into component schemas
 */
export function injectValidationConstraints(doc: DocumentMap, constraints: readonly SchemaConstraints[]): void {
  const schemas = getSchemas(doc)
  if (!schemas) return

  for (const { schema: name, fields } of constraints) {
    const schema = getMap(schemas, name)
    const properties = getMap(schema, 'properties')
    if (!schema || !properties) continue

    for (const constraint of fields) {
      const prop = getMap(properties, constraint.field)
      if (prop) applyConstraint(prop, constraint)
    }

    const required = fields.filter((f) => f.required).map((f) => f.field)
    if (required.length > 0) {
      schema.required = required
    }
  }
}

const SECRET_WORDS = ['password', 'secret', 'credential']
const FLAG_PREFIXES = ['has', 'is', 'needs', 'requires', 'supports']

/**
 * Whether a lowercased property name holds a secret value.
 *
 * `password` and `currentpassword` do; `haspassword` is a flag about one.
 */
export function isWriteOnlyField(lower: string): boolean {
  for (const secret of SECRET_WORDS) {
    if (lower === secret) return true
    if (lower.endsWith(secret)) {
      return !FLAG_PREFIXES.includes(lower.slice(0, -secret.length))
    }
  }
  return false
}

function isResponseSchema(name: string): boolean {
  return name.includes('Response') || name.includes('Reply') || name.includes('Result')
}

/**
 * Mark secrets `writeOnly` and timestamps `readOnly`.
 * Extra patterns match as case-insensitive substrings.
 */
export function annotateFieldAccess(
  doc: DocumentMap,
  extraWriteOnly: readonly string[] = [],
  extraReadOnly: readonly string[] = []
): void {
  const schemas = getSchemas(doc)
  if (!schemas) return

  const writeOnly = extraWriteOnly.map((p) => p.toLowerCase())
  const readOnly = extraReadOnly.map((p) => p.toLowerCase())

  for (const [schemaName, schema] of Object.entries(schemas)) {
    const properties = isMap(schema) ? getMap(schema, 'properties') : undefined
    if (!properties) continue
    const response = isResponseSchema(schemaName)

    for (const [propName, prop] of Object.entries(properties)) {
      if (!isMap(prop)) continue
      const lower = propName.toLowerCase()

      const secret = isWriteOnlyField(lower) || writeOnly.some((p) => lower.includes(p))
      const server =
        propName.endsWith('At') || propName.endsWith('_at') || readOnly.some((p) => lower.includes(p))

      if (secret && !response) {
        prop.writeOnly = true
      } else if (server) {
        prop.readOnly = true
      }
    }
  }
}

function isDurationSchemaName(name: string): boolean {
  return name === 'Duration' || name.endsWith('.Duration')
}

function markDuration(target: DocumentMap): void {
  target.type = 'string'
  target.example = DURATION_EXAMPLE
  if (target.description === undefined) {
    target.description = DURATION_DESCRIPTION
  }
}

/**
 * Present Duration messages and Duration-typed properties as `"300s"` strings
 */
export function annotateDurationFields(doc: DocumentMap): void {
  const schemas = getSchemas(doc)
  if (!schemas) return

  const durationNames = Object.keys(schemas).filter(isDurationSchemaName)
  const durationRefs = new Set(durationNames.map((name) => `${SCHEMA_REF_PREFIX}${name}`))

  for (const name of durationNames) {
    const schema = getMap(schemas, name)
    if (!schema) continue
    delete schema.properties
    markDuration(schema)
  }

  for (const schema of Object.values(schemas)) {
    const properties = isMap(schema) ? getMap(schema, 'properties') : undefined
    if (!properties) continue

    for (const prop of Object.values(properties)) {
      if (!isMap(prop)) continue

      const viaAllOf = (getArray(prop, 'allOf') ?? []).some((item) => {
        const ref = isMap(item) ? getString(item, '$ref') : undefined
        return ref !== undefined && durationRefs.has(ref)
      })
      const pattern = getString(prop, 'pattern')
      const viaPattern = pattern !== undefined && pattern.includes('0-9') && pattern.includes('s')

      if (viaAllOf || viaPattern) {
        delete prop.$ref
        delete prop.allOf
        markDuration(prop)
      }
    }
  }
}
