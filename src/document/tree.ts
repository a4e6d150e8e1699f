/**
 * Document tree accessors
 */

import type { DocumentMap, DocumentValue } from './types.js'

/**
 * HTTP methods that may key an operation inside a path item
 */
export const HTTP_METHODS = ['get', 'put', 'post', 'delete', 'options', 'head', 'patch', 'trace'] as const

export type HttpMethod = (typeof HTTP_METHODS)[number]

export function isMap(value: DocumentValue | undefined): value is DocumentMap {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export function getMap(parent: DocumentMap | undefined, key: string): DocumentMap | undefined {
  const value = parent?.[key]
  return isMap(value) ? value : undefined
}

export function getArray(parent: DocumentMap | undefined, key: string): DocumentValue[] | undefined {
  const value = parent?.[key]
  return Array.isArray(value) ? value : undefined
}

export function getString(parent: DocumentMap | undefined, key: string): string | undefined {
  const value = parent?.[key]
  return typeof value === 'string' ? value : undefined
}

/**
 * Follow a chain of mapping keys
 */
export function getPath(root: DocumentMap | undefined, ...keys: string[]): DocumentMap | undefined {
  let current = root
  for (const key of keys) {
    current = getMap(current, key)
    if (!current) return undefined
  }
  return current
}

/**
 * Get a child mapping, creating it when absent or not a mapping
 */
export function ensureMap(parent: DocumentMap, key: string): DocumentMap {
  const existing = parent[key]
  if (isMap(existing)) return existing
  const created: DocumentMap = {}
  parent[key] = created
  return created
}

/**
 * Component schemas registry, if present
 */
export function getSchemas(doc: DocumentMap): DocumentMap | undefined {
  return getPath(doc, 'components', 'schemas')
}

/**
 * Operation visited by {@link forEachOperation}
 */
export interface OperationRef {
  path: string
  method: HttpMethod
  operation: DocumentMap
  pathItem: DocumentMap
}

/**
 * Collect every operation under `paths`
 */
export function listOperations(doc: DocumentMap): OperationRef[] {
  const paths = getMap(doc, 'paths')
  if (!paths) return []

  const result: OperationRef[] = []
  for (const [path, pathItem] of Object.entries(paths)) {
    if (!isMap(pathItem)) continue
    for (const method of HTTP_METHODS) {
      const operation = pathItem[method]
      if (isMap(operation)) {
        result.push({ path, method, operation, pathItem })
      }
    }
  }
  return result
}

/**
 * Mapping entries of a parameter list
 */
export function getParameters(operation: DocumentMap): DocumentMap[] {
  return (getArray(operation, 'parameters') ?? []).filter(isMap)
}

/**
 * `content['application/json'].schema` of a request body or response
 */
export function getJsonSchema(holder: DocumentMap | undefined): DocumentMap | undefined {
  return getPath(holder, 'content', 'application/json', 'schema')
}

/**
 * Visit every mapping in a subtree, parents before children
 */
export function walkMaps(value: DocumentValue | undefined, visit: (map: DocumentMap) => void): void {
  if (Array.isArray(value)) {
    for (const item of value) walkMaps(item, visit)
  } else if (isMap(value)) {
    visit(value)
    for (const child of Object.values(value)) walkMaps(child, visit)
  }
}

/**
 * Deep copy of a subtree
 */
export function cloneValue<T extends DocumentValue>(value: T): T {
  return structuredClone(value)
}
