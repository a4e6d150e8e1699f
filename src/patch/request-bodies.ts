/**
 * Phase 11: request body handling
 */

import {
  cloneValue,
  getJsonSchema,
  getMap,
  getRef,
  getSchemas,
  getString,
  isMap,
  listOperations,
  schemaNameFromRef,
  type DocumentMap,
} from '../document/index.js'
import { generateSchemaExample, injectPropertyExamples, meaningfulFieldExample } from './examples.js'
import { removeOrphanedSchemas } from './orphans.js'

/**
 * Replace `allOf: [{ $ref }]` properties with a copy of the referenced
 * schema, keeping the property's own description
 */
function resolveNestedRefs(schema: DocumentMap, schemas: DocumentMap): void {
  const properties = getMap(schema, 'properties')
  if (!properties) return

  for (const [name, prop] of Object.entries(properties)) {
    if (!isMap(prop) || !Array.isArray(prop.allOf)) continue
    const ref = getRef(prop.allOf[0])
    const target = ref !== undefined ? schemaNameFromRef(ref) : undefined
    const resolved = target !== undefined ? getMap(schemas, target) : undefined
    if (!resolved) continue

    const replacement = cloneValue(resolved)
    if (prop.description !== undefined) {
      replacement.description = prop.description
    }
    properties[name] = replacement
  }
}

/**
 * Inline each referenced JSON request body into its operation, with
 * per-property examples. Component schemas left without a consumer are
 * pruned.
 */
export function inlineRequestBodies(doc: DocumentMap): void {
  const registry = getSchemas(doc)
  if (!registry) return
  const schemas = cloneValue(registry)

  for (const { operation } of listOperations(doc)) {
    const requestBody = getMap(operation, 'requestBody')
    const media = getMap(getMap(requestBody, 'content'), 'application/json')
    const ref = getRef(media?.schema)
    const name = ref !== undefined ? schemaNameFromRef(ref) : undefined
    const shared = name !== undefined ? getMap(schemas, name) : undefined
    if (!requestBody || !media || !shared) continue

    const body = cloneValue(shared)
    const description = getString(body, 'description')
    delete body.description
    if (description !== undefined) {
      requestBody.description = description
    }

    resolveNestedRefs(body, schemas)
    injectPropertyExamples(body, generateSchemaExample(body, schemas))
    media.schema = body
  }

  removeOrphanedSchemas(doc)
}

function isComposite(prop: DocumentMap): boolean {
  return (
    prop.allOf !== undefined || prop.oneOf !== undefined || prop.$ref !== undefined || prop.properties !== undefined
  )
}

function enrichProperties(properties: DocumentMap): void {
  for (const [name, prop] of Object.entries(properties)) {
    if (!isMap(prop) || prop.example !== undefined || isComposite(prop)) continue
    const example = meaningfulFieldExample(name, prop)
    if (example !== undefined) {
      prop.example = example
    }
  }
}

/**
 * Add examples to component schema properties where the name or shape
 * suggests a meaningful one
 */
export function enrichSchemaExamples(doc: DocumentMap): void {
  const schemas = getSchemas(doc)
  if (!schemas) return
  for (const schema of Object.values(schemas)) {
    const properties = isMap(schema) ? getMap(schema, 'properties') : undefined
    if (properties) enrichProperties(properties)
  }
}

/**
 * Same enrichment for request bodies declared inline
 */
export function enrichInlineRequestBodyExamples(doc: DocumentMap): void {
  for (const { operation } of listOperations(doc)) {
    const schema = getJsonSchema(getMap(operation, 'requestBody'))
    if (!schema || schema.$ref !== undefined) continue
    const properties = getMap(schema, 'properties')
    if (properties) enrichProperties(properties)
  }
}

/**
 * Drop request bodies whose inline schema has no properties left
 */
export function removeEmptyInlinedRequestBodies(doc: DocumentMap): void {
  for (const { operation } of listOperations(doc)) {
    const properties = getMap(getJsonSchema(getMap(operation, 'requestBody')), 'properties')
    if (properties && Object.keys(properties).length === 0) {
      delete operation.requestBody
    }
  }
}
