/**
 * Patch Module
 *
 * The twelve-phase transform pipeline and the individual transforms it
 * is built from.
 */

export {
  createPatchConfig,
  DEFAULT_ERROR_SCHEMA_REF,
  DEFAULT_TRANSFORMS,
  type InfoOverrides,
  type PatchConfig,
  type PatchConfigInput,
  type PlainTextEndpoint,
  type ServerEntry,
  type TransformToggles,
} from './config.js'
export * from './constants.js'
export { createPatchContext, type PatchContext } from './context.js'
export { PHASES, runPhase, patchDocument, patch, type PatchPhase, type PatchOptions } from './pipeline.js'

export { convertNullable, upgradeTo31, injectServersAndInfo, normalizeLineEndings } from './structural.js'
export { annotateStreaming, markStreaming, SSE_DESCRIPTION_PREFIX } from './streaming.js'
export {
  addMetricsHeaders,
  addReadinessUnavailable,
  applyPlainTextEndpoints,
  ensureErrorSchema,
  jsonContentRef,
  removeRedundantQueryParams,
  replaceEmptyOkWith204,
  restErrorSchema,
  rewriteCreateResponses,
  rewriteDefaultResponses,
  rewriteRedirects,
} from './responses.js'
export { applyEnumRewrites, isEnumSentinel, rewriteInlineEnumValues, stripEnumSentinels } from './enums.js'
export { markDeprecated, markUnimplemented, NOT_IMPLEMENTED_NOTICE } from './markers.js'
export { addBearerSecurity, markPublicOperations } from './security.js'
export {
  cleanTagDescriptions,
  collectEmptySchemaNames,
  extractSummary,
  populateOperationSummaries,
  removeEmptyRequestBodies,
  removeEnumFormat,
  removeUnusedEmptySchemas,
} from './cleanup.js'
export { flattenUuidPathTemplates, flattenUuidRefs, simplifyUuidQueryParams, uuidStringSchema } from './uuid.js'
export {
  annotateDurationFields,
  annotateFieldAccess,
  injectValidationConstraints,
  isWriteOnlyField,
} from './validation.js'
export { enrichPathParams, stripPathFieldsFromBody } from './path-fields.js'
export {
  exampleFromFieldName,
  generateFieldExample,
  generateSchemaExample,
  injectPropertyExamples,
  meaningfulFieldExample,
} from './examples.js'
export {
  enrichInlineRequestBodyExamples,
  enrichSchemaExamples,
  inlineRequestBodies,
  removeEmptyInlinedRequestBodies,
} from './request-bodies.js'
export { collectExternalSchemaRefs, findReachableSchemas, removeOrphanedSchemas } from './orphans.js'
