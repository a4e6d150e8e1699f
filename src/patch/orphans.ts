/**
 * Orphan schema pruning
 *
 * A component schema survives only when it is reachable from a `$ref`
 * outside `components.schemas`, directly or through other schemas.
 * Clusters that only reference each other are removed as a whole.
 */

import { getAllRefs, getSchemas, isMap, schemaNameFromRef, type DocumentMap } from '../document/index.js'

/**
 * `$ref` strings found anywhere except under `components.schemas`
 */
export function collectExternalSchemaRefs(doc: DocumentMap): string[] {
  const refs: string[] = []
  for (const [key, value] of Object.entries(doc)) {
    if (key !== 'components') {
      getAllRefs(value, refs)
      continue
    }
    if (!isMap(value)) continue
    for (const [section, entries] of Object.entries(value)) {
      if (section !== 'schemas') getAllRefs(entries, refs)
    }
  }
  return refs
}

/**
 * Names of schemas reachable from the external roots
 */
export function findReachableSchemas(doc: DocumentMap): Set<string> {
  const schemas: DocumentMap = getSchemas(doc) ?? {}
  const reachable = new Set<string>()
  const frontier: string[] = []

  const visit = (ref: string) => {
    const name = schemaNameFromRef(ref)
    if (name !== undefined && !reachable.has(name)) {
      reachable.add(name)
      frontier.push(name)
    }
  }

  collectExternalSchemaRefs(doc).forEach(visit)

  let name = frontier.pop()
  while (name !== undefined) {
    getAllRefs(schemas[name]).forEach(visit)
    name = frontier.pop()
  }
  return reachable
}

/**
 * Delete every unreachable component schema
 *
 * @returns Names of the removed schemas
 */
export function removeOrphanedSchemas(doc: DocumentMap): string[] {
  const schemas = getSchemas(doc)
  if (!schemas) return []

  const reachable = findReachableSchemas(doc)
  const orphans = Object.keys(schemas).filter((name) => !reachable.has(name))
  for (const name of orphans) {
    delete schemas[name]
  }
  return orphans
}
