/**
 * Phase 6: bearer authentication
 */

import { ensureMap, getString, isMap, listOperations, type DocumentMap } from '../document/index.js'
import { BEARER_SCHEME } from './constants.js'

/**
 * Register the bearer scheme and require it globally
 *
 * Existing security schemes are kept. The global requirement is appended
 * only when no entry names the bearer scheme yet, so running twice changes
 * nothing.
 */
export function addBearerSecurity(doc: DocumentMap, description?: string): void {
  if (isMap(doc.components)) {
    const schemes = ensureMap(doc.components, 'securitySchemes')
    schemes[BEARER_SCHEME] = {
      type: 'http',
      scheme: 'bearer',
      bearerFormat: 'JWT',
      description: description ?? 'Bearer authentication token',
    }
  }

  const security = Array.isArray(doc.security) ? doc.security : []
  const present = security.some((entry) => isMap(entry) && entry[BEARER_SCHEME] !== undefined)
  if (!present) {
    doc.security = [...security, { [BEARER_SCHEME]: [] }]
  }
}

/**
 * Clear the security requirement of public operations
 */
export function markPublicOperations(doc: DocumentMap, operationIds: ReadonlySet<string>): void {
  if (operationIds.size === 0) return

  for (const { operation } of listOperations(doc)) {
    const operationId = getString(operation, 'operationId')
    if (operationId !== undefined && operationIds.has(operationId)) {
      operation.security = []
    }
  }
}
