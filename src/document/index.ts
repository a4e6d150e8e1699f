/**
 * Document Module
 *
 * Document tree types and accessors, `$ref` helpers, and YAML/JSON
 * parsing and serialization.
 */

import type { DocumentFormat, DocumentMap } from './types.js'
import { parseJson, serializeJson } from './json.js'
import { parseYaml, serializeYaml } from './yaml.js'

export * from './types.js'
export * from './tree.js'
export * from './refs.js'
export { parseJson, serializeJson } from './json.js'
export { parseYaml, serializeYaml } from './yaml.js'

/**
 * Detect format from content
 */
export function detectFormat(content: string): DocumentFormat {
  const trimmed = content.trim()

  // JSON starts with { or [
  if (trimmed.startsWith('{') || trimmed.startsWith('[')) {
    return 'json'
  }

  return 'yaml'
}

/**
 * Detect format from file extension. Anything but `.json` is YAML.
 */
export function detectFormatFromPath(path: string): DocumentFormat {
  return path.toLowerCase().endsWith('.json') ? 'json' : 'yaml'
}

/**
 * Parse document text, detecting the format when not given
 */
export function parseDocument(content: string, format?: DocumentFormat): DocumentMap {
  return (format ?? detectFormat(content)) === 'json' ? parseJson(content) : parseYaml(content)
}

/**
 * Serialize a document tree
 */
export function serializeDocument(doc: DocumentMap, format: DocumentFormat): string {
  return format === 'json' ? serializeJson(doc) : serializeYaml(doc)
}
