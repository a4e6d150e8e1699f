/**
 * proto-openapi-patch
 *
 * Discover HTTP, validation and streaming metadata from protobuf
 * descriptors and patch generated OpenAPI documents to match.
 */

// === Discovery ===
export { discover, discoverMetadata, summarizeMetadata } from './discover/index.js'
export type {
  ProtoMetadata,
  StreamingOp,
  OperationEntry,
  FieldConstraint,
  SchemaConstraints,
  EnumRewrite,
  PathParamConstraint,
  PathParams,
} from './discover/index.js'

// === Descriptors ===
export { decodeDescriptorSet, encodeDescriptorSet } from './descriptor/index.js'
export type { DescriptorSet } from './descriptor/index.js'

// === Pipeline ===
export {
  patch,
  patchDocument,
  runPhase,
  PHASES,
  createPatchConfig,
  createPatchContext,
  DEFAULT_TRANSFORMS,
} from './patch/index.js'
export type {
  PatchConfig,
  PatchConfigInput,
  PatchContext,
  PatchOptions,
  PatchPhase,
  TransformToggles,
} from './patch/index.js'

// === Method names ===
export { resolveMethodName, resolveMethodNames } from './resolve/index.js'

// === Documents ===
export { parseDocument, serializeDocument, detectFormat, detectFormatFromPath } from './document/index.js'
export type { DocumentFormat, DocumentMap, DocumentValue } from './document/index.js'

// === Configuration ===
export { loadProjectConfig, parseProjectConfig, projectConfigToPatchConfig } from './config/index.js'
export type { ProjectConfig, ConfigOverrides } from './config/index.js'

// === Errors ===
export { PatchError, Errors, ErrorCodes, isPatchError } from './errors/index.js'
export type { ErrorCode } from './errors/index.js'

// === Logging ===
export { createLogger, setLogLevel } from './utils/index.js'
