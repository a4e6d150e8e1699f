/**
 * JSON parser for API documents
 */

import { Errors } from '../errors/index.js'
import type { DocumentMap } from './types.js'
import { isDocumentValue } from './types.js'
import { isMap } from './tree.js'

/**
 * Parse a JSON string into a document tree
 *
 * @throws PatchError (DOCUMENT_PARSE) if parsing fails or the root is not a mapping
 */
export function parseJson(content: string): DocumentMap {
  let parsed: unknown
  try {
    parsed = JSON.parse(content)
  } catch (err) {
    if (err instanceof SyntaxError) {
      const match = err.message.match(/position (\d+)/)
      if (match) {
        const position = getLineColumn(content, parseInt(match[1], 10))
        throw Errors.documentParse('json', err.message, position, err)
      }
      throw Errors.documentParse('json', err.message, undefined, err)
    }
    throw Errors.documentParse('json', String(err), undefined, err)
  }

  if (!isDocumentValue(parsed) || !isMap(parsed)) {
    throw Errors.documentParse('json', 'document root must be an object')
  }
  return parsed
}

/**
 * Convert a character offset to line and column
 */
function getLineColumn(content: string, position: number): { line: number; column: number } {
  let line = 1
  let column = 1

  for (let i = 0; i < position && i < content.length; i++) {
    if (content[i] === '\n') {
      line++
      column = 1
    } else {
      column++
    }
  }

  return { line, column }
}

/**
 * Serialize a document tree to JSON, with a trailing newline
 */
export function serializeJson(doc: DocumentMap, pretty = true): string {
  return `${JSON.stringify(doc, null, pretty ? 2 : undefined)}\n`
}
