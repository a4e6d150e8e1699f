/**
 * Per-run context handed to every phase
 */

import type { ProtoMetadata } from '../discover/index.js'
import { resolveMethodNames } from '../resolve/index.js'
import type { PatchConfig } from './config.js'

export interface PatchContext {
  readonly metadata: ProtoMetadata
  readonly config: PatchConfig
  /** Operation ids answered with UNIMPLEMENTED */
  readonly unimplemented: ReadonlySet<string>
  /** Operation ids that need no authentication */
  readonly publicOperations: ReadonlySet<string>
  /** Operation ids flagged as deprecated */
  readonly deprecated: ReadonlySet<string>
}

/**
 * Resolve the configured method names against the discovered operations
 *
 * @throws PatchError (METHOD_NOT_FOUND, AMBIGUOUS_METHOD_NAME)
 */
export function createPatchContext(metadata: ProtoMetadata, config: PatchConfig): PatchContext {
  const resolve = (names: readonly string[]) => new Set(resolveMethodNames(names, metadata.operationIds))
  return Object.freeze({
    metadata,
    config,
    unimplemented: resolve(config.unimplementedMethods),
    publicOperations: resolve(config.publicMethods),
    deprecated: resolve(config.deprecatedMethods),
  })
}
