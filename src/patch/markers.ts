/**
 * Phase 5: lifecycle markers
 */

import { ensureMap, getString, listOperations, type DocumentMap } from '../document/index.js'
import { jsonContentRef } from './responses.js'

export const NOT_IMPLEMENTED_NOTICE = '⚠️ **Not yet implemented.** Calls return 501 Not Implemented.'

/**
 * Flag unimplemented operations and document their 501
 */
export function markUnimplemented(
  doc: DocumentMap,
  operationIds: ReadonlySet<string>,
  errorSchemaRef: string
): void {
  if (operationIds.size === 0) return

  for (const { operation } of listOperations(doc)) {
    const operationId = getString(operation, 'operationId')
    if (operationId === undefined || !operationIds.has(operationId)) continue

    operation['x-not-implemented'] = true

    const description = getString(operation, 'description') ?? ''
    if (!description.startsWith('⚠️')) {
      operation.description = description ? `${NOT_IMPLEMENTED_NOTICE}\n\n${description}` : NOT_IMPLEMENTED_NOTICE
    }

    const responses = ensureMap(operation, 'responses')
    if (responses['501'] === undefined) {
      responses['501'] = { description: 'Not Implemented', content: jsonContentRef(errorSchemaRef) }
    }
  }
}

/**
 * Flag deprecated operations
 */
export function markDeprecated(doc: DocumentMap, operationIds: ReadonlySet<string>): void {
  if (operationIds.size === 0) return

  for (const { operation } of listOperations(doc)) {
    const operationId = getString(operation, 'operationId')
    if (operationId !== undefined && operationIds.has(operationId)) {
      operation.deprecated = true
    }
  }
}
