/**
 * Discovery Module
 *
 * Single pass over a decoded descriptor set that collects streaming
 * routes, operation ids, field constraints, enum rewrites, redirect
 * routes, the UUID wrapper and path parameter shapes.
 */

export * from './types.js'
export {
  snakeToLowerCamel,
  placeholderToCamel,
  convertPathTemplateToCamel,
  pathMatchesTemplate,
  operationIdFor,
} from './naming.js'
export {
  translateField,
  extractFieldConstraints,
  int32Range,
  uint32Range,
  uint64Range,
  JSON_SAFE_MAX,
} from './constraints.js'
export { detectEnumPrefix, stripEnumPrefix, discoverEnumRewrites, type EnumDiscovery } from './enums.js'
export {
  detectUuidSchema,
  extractPathParamConstraints,
  findRedirectMessages,
  findRedirectPaths,
  type BoundMethod,
} from './paths.js'
export { discover, discoverMetadata, listBoundMethods } from './discover.js'
export { summarizeMetadata } from './summary.js'
