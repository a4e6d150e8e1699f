/**
 * Phase 7: description and empty-schema cleanup
 */

import {
  getAllRefs,
  getArray,
  getJsonSchema,
  getMap,
  getRef,
  getSchemas,
  getString,
  isMap,
  listOperations,
  schemaNameFromRef,
  SCHEMA_REF_PREFIX,
  walkMaps,
  type DocumentMap,
} from '../document/index.js'

function meaningfulLines(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line !== '' && !/^=+$/.test(line))
}

/**
 * First non-blank line that is not an `=====` separator, trailing period removed
 */
export function extractSummary(text: string): string {
  const [first] = meaningfulLines(text)
  if (first === undefined) return ''
  return first.endsWith('.') ? first.slice(0, -1) : first
}

/**
 * Reduce each tag description to its first meaningful line
 */
export function cleanTagDescriptions(doc: DocumentMap): void {
  for (const tag of getArray(doc, 'tags') ?? []) {
    if (!isMap(tag)) continue
    const description = getString(tag, 'description')
    if (description === undefined) continue
    tag.description = meaningfulLines(description)[0] ?? description.trim()
  }
}

/**
 * Derive `summary` from `description` where no summary is set
 */
export function populateOperationSummaries(doc: DocumentMap): void {
  for (const { operation } of listOperations(doc)) {
    const summary = getString(operation, 'summary')
    if (summary !== undefined && summary !== '') continue

    const description = getString(operation, 'description')
    if (description === undefined) continue

    const extracted = extractSummary(description)
    if (extracted !== '') {
      operation.summary = extracted
    }
  }
}

/**
 * Names of component schemas whose `properties` mapping is empty
 */
export function collectEmptySchemaNames(doc: DocumentMap): string[] {
  const schemas = getSchemas(doc)
  if (!schemas) return []
  return Object.entries(schemas)
    .filter(([, schema]) => {
      const properties = isMap(schema) ? getMap(schema, 'properties') : undefined
      return properties !== undefined && Object.keys(properties).length === 0
    })
    .map(([name]) => name)
}

/**
 * Drop request bodies that reference a schema without properties
 */
export function removeEmptyRequestBodies(doc: DocumentMap): void {
  const empty = new Set(collectEmptySchemaNames(doc))
  if (empty.size === 0) return

  for (const { operation } of listOperations(doc)) {
    const ref = getRef(getJsonSchema(getMap(operation, 'requestBody')))
    const name = ref !== undefined ? schemaNameFromRef(ref) : undefined
    if (name !== undefined && empty.has(name)) {
      delete operation.requestBody
    }
  }
}

/**
 * Delete empty schemas nothing references any more
 */
export function removeUnusedEmptySchemas(doc: DocumentMap): void {
  const empty = collectEmptySchemaNames(doc)
  const schemas = getSchemas(doc)
  if (empty.length === 0 || !schemas) return

  const referenced = new Set(getAllRefs(doc))
  for (const name of empty) {
    if (!referenced.has(`${SCHEMA_REF_PREFIX}${name}`)) {
      delete schemas[name]
    }
  }
}

/**
 * Remove the nonstandard `format: enum`
 */
export function removeEnumFormat(doc: DocumentMap): void {
  walkMaps(doc, (node) => {
    if (node.format === 'enum') {
      delete node.format
    }
  })
}
