/**
 * YAML parser for API documents
 */

import yaml from 'js-yaml'
import { Errors } from '../errors/index.js'
import type { DocumentMap } from './types.js'
import { isDocumentValue } from './types.js'
import { isMap } from './tree.js'

/**
 * Parse a YAML string into a document tree
 *
 * @throws PatchError (DOCUMENT_PARSE) if parsing fails or the root is not a mapping
 */
export function parseYaml(content: string): DocumentMap {
  let parsed: unknown
  try {
    parsed = yaml.load(content, {
      schema: yaml.JSON_SCHEMA,
      json: true,
    })
  } catch (err) {
    if (err instanceof yaml.YAMLException) {
      const mark = err.mark
      if (mark) {
        throw Errors.documentParse(
          'yaml',
          err.reason || err.message,
          { line: mark.line + 1, column: mark.column + 1 },
          err
        )
      }
      throw Errors.documentParse('yaml', err.message, undefined, err)
    }
    throw Errors.documentParse('yaml', String(err), undefined, err)
  }

  if (!isDocumentValue(parsed) || !isMap(parsed)) {
    throw Errors.documentParse('yaml', 'document root must be a mapping')
  }
  return parsed
}

/**
 * Serialize a document tree to YAML
 *
 * Long strings are never folded and shared subtrees are written out in
 * full rather than as anchors.
 */
export function serializeYaml(
  doc: DocumentMap,
  options: {
    /** Indent size (default: 2) */
    indent?: number
  } = {}
): string {
  const { indent = 2 } = options

  try {
    return yaml.dump(doc, {
      indent,
      lineWidth: -1,
      noRefs: true,
      noCompatMode: true,
      quotingType: '"',
      forceQuotes: false,
      schema: yaml.JSON_SCHEMA,
    })
  } catch (err) {
    throw Errors.documentSerialize('yaml', err)
  }
}
