/**
 * Metadata discovery
 */

import {
  buildMessageIndex,
  decodeDescriptorSet,
  extractHttpBinding,
  type DescriptorSet,
} from '../descriptor/index.js'
import { createLogger } from '../utils/logger.js'
import { extractFieldConstraints } from './constraints.js'
import { discoverEnumRewrites } from './enums.js'
import { operationIdFor } from './naming.js'
import { detectUuidSchema, extractPathParamConstraints, findRedirectPaths, type BoundMethod } from './paths.js'
import { createMetadata, type ProtoMetadata } from './types.js'

const logger = createLogger('discover')

/**
 * Every method that has a primary HTTP binding
 *
 * @throws PatchError (UNSUPPORTED_BODY_SELECTOR)
 */
export function listBoundMethods(set: DescriptorSet): BoundMethod[] {
  const bound: BoundMethod[] = []
  for (const file of set.file) {
    const scope = file.package ? `${file.package}.` : ''
    for (const service of file.service) {
      for (const method of service.method) {
        const binding = extractHttpBinding(method, `${scope}${service.name}.${method.name}`)
        if (binding) {
          bound.push({ service: service.name, method, binding })
        }
      }
    }
  }
  return bound
}

/**
 * Walk a decoded descriptor set once and collect all metadata
 */
export function discoverMetadata(set: DescriptorSet): ProtoMetadata {
  const bound = listBoundMethods(set)
  const { rewrites, valueMap } = discoverEnumRewrites(set)
  const uuidSchema = detectUuidSchema(set)

  const metadata = createMetadata({
    streamingOps: bound
      .filter((b) => b.method.serverStreaming)
      .map((b) => ({ verb: b.binding.verb, path: b.binding.path })),
    operationIds: bound.map((b) => ({
      service: b.service,
      method: b.method.name,
      operationId: operationIdFor(b.service, b.method.name),
    })),
    fieldConstraints: extractFieldConstraints(set),
    enumRewrites: rewrites,
    enumValueMap: valueMap,
    redirectPaths: findRedirectPaths(set, bound),
    uuidSchema,
    pathParamConstraints: extractPathParamConstraints(set, bound, buildMessageIndex(set), uuidSchema),
  })

  logger.debug(
    {
      operations: metadata.operationIds.length,
      streaming: metadata.streamingOps.length,
      constrainedSchemas: metadata.fieldConstraints.length,
      enumRewrites: metadata.enumRewrites.length,
      redirects: metadata.redirectPaths.length,
      uuidSchema: metadata.uuidSchema ?? null,
    },
    'Discovered metadata'
  )
  return metadata
}

/**
 * Decode descriptor bytes and discover their metadata
 *
 * @throws PatchError (DESCRIPTOR_DECODE, UNSUPPORTED_BODY_SELECTOR)
 */
export function discover(bytes: Uint8Array): ProtoMetadata {
  return discoverMetadata(decodeDescriptorSet(bytes))
}
