/**
 * Structural passes
 *
 * Phase 1 upgrades the document to OpenAPI 3.1 and applies server and
 * info overrides. Phase 12 normalizes line endings.
 */

import { ensureMap, isMap, walkMaps, type DocumentMap, type DocumentValue } from '../document/index.js'
import type { InfoOverrides, ServerEntry } from './config.js'

/**
 * Rewrite `nullable: true` into a type union with `null`
 *
 * `nullable` is removed from every schema whether it was true or false.
 */
export function convertNullable(root: DocumentValue): void {
  walkMaps(root, (node) => {
    const nullable = node.nullable
    if (typeof nullable !== 'boolean') return

    const type = node.type
    if (nullable && typeof type === 'string') {
      node.type = [type, 'null']
    } else if (nullable && Array.isArray(type) && !type.includes('null')) {
      node.type = [...type, 'null']
    }
    delete node.nullable
  })
}

/**
 * Declare OpenAPI 3.1.0 and convert `nullable`
 */
export function upgradeTo31(doc: DocumentMap): void {
  doc.openapi = '3.1.0'
  convertNullable(doc)
}

function serverToMap(server: ServerEntry): DocumentMap {
  return {
    url: server.url,
    ...(server.description !== undefined && { description: server.description }),
  }
}

/**
 * Replace `servers` and merge `info` overrides
 *
 * Absent overrides leave the document untouched.
 */
export function injectServersAndInfo(doc: DocumentMap, servers: readonly ServerEntry[], info: InfoOverrides): void {
  if (servers.length > 0) {
    doc.servers = servers.map(serverToMap)
  }

  const { contact, license, termsOfService, externalDocs } = info
  if (contact || license || termsOfService !== undefined) {
    const infoMap = ensureMap(doc, 'info')
    if (contact) {
      infoMap.contact = {
        ...(contact.name !== undefined && { name: contact.name }),
        ...(contact.email !== undefined && { email: contact.email }),
        ...(contact.url !== undefined && { url: contact.url }),
      }
    }
    if (license) {
      infoMap.license = { name: license.name, ...(license.url !== undefined && { url: license.url }) }
    }
    if (termsOfService !== undefined) {
      infoMap.termsOfService = termsOfService
    }
  }

  if (externalDocs) {
    doc.externalDocs = {
      url: externalDocs.url,
      ...(externalDocs.description !== undefined && { description: externalDocs.description }),
    }
  }
}

/**
 * Phase 12: CRLF to LF in every string value
 */
export function normalizeLineEndings(root: DocumentValue): void {
  normalizeValue(root)
}

// arrays and maps are rewritten in place
function normalizeValue(value: DocumentValue): DocumentValue {
  if (typeof value === 'string') return value.replaceAll('\r\n', '\n')
  if (Array.isArray(value)) {
    for (const [index, item] of value.entries()) value[index] = normalizeValue(item)
  } else if (isMap(value)) {
    for (const [key, child] of Object.entries(value)) {
      if (child !== undefined) value[key] = normalizeValue(child)
    }
  }
  return value
}
