/**
 * Transform Pipeline
 *
 * Twelve phases run in a fixed order over one mutable document tree.
 * Later phases depend on the shape earlier ones leave behind, so the
 * order below is part of the contract.
 */

import { createLogger } from '../utils/logger.js'
import { detectFormat, parseDocument, serializeDocument, type DocumentFormat, type DocumentMap } from '../document/index.js'
import type { ProtoMetadata } from '../discover/index.js'
import { createPatchConfig, type PatchConfig } from './config.js'
import { createPatchContext, type PatchContext } from './context.js'
import { injectServersAndInfo, normalizeLineEndings, upgradeTo31 } from './structural.js'
import { annotateStreaming } from './streaming.js'
import {
  addMetricsHeaders,
  addReadinessUnavailable,
  applyPlainTextEndpoints,
  ensureErrorSchema,
  removeRedundantQueryParams,
  replaceEmptyOkWith204,
  rewriteCreateResponses,
  rewriteDefaultResponses,
  rewriteRedirects,
} from './responses.js'
import { applyEnumRewrites, rewriteInlineEnumValues, stripEnumSentinels } from './enums.js'
import { markDeprecated, markUnimplemented } from './markers.js'
import { addBearerSecurity, markPublicOperations } from './security.js'
import {
  cleanTagDescriptions,
  populateOperationSummaries,
  removeEmptyRequestBodies,
  removeEnumFormat,
  removeUnusedEmptySchemas,
} from './cleanup.js'
import { flattenUuidPathTemplates, flattenUuidRefs, simplifyUuidQueryParams } from './uuid.js'
import { annotateDurationFields, annotateFieldAccess, injectValidationConstraints } from './validation.js'
import { enrichPathParams, stripPathFieldsFromBody } from './path-fields.js'
import {
  enrichInlineRequestBodyExamples,
  enrichSchemaExamples,
  inlineRequestBodies,
  removeEmptyInlinedRequestBodies,
} from './request-bodies.js'
import { removeOrphanedSchemas } from './orphans.js'

const logger = createLogger('patch')

const always = (): boolean => true

export interface PatchPhase {
  readonly name: string
  /** Whether the phase runs under the given configuration */
  readonly enabled: (config: PatchConfig) => boolean
  readonly run: (doc: DocumentMap, context: PatchContext) => void
}

export const PHASES: readonly PatchPhase[] = [
  {
    name: 'structural',
    enabled: always,
    run(doc, { config }) {
      if (config.transforms.upgradeTo31) upgradeTo31(doc)
      if (config.transforms.injectServers) injectServersAndInfo(doc, config.servers, config.info)
    },
  },
  {
    name: 'streaming',
    enabled: (config) => config.transforms.annotateSse,
    run(doc, { metadata }) {
      annotateStreaming(doc, metadata.streamingOps)
    },
  },
  {
    name: 'responses',
    enabled: always,
    run(doc, { config, metadata }) {
      replaceEmptyOkWith204(doc)
      removeRedundantQueryParams(doc)
      applyPlainTextEndpoints(doc, config.plainTextEndpoints)
      if (config.metricsPath !== undefined) addMetricsHeaders(doc, config.metricsPath)
      if (config.readinessPath !== undefined) addReadinessUnavailable(doc, config.readinessPath)
      rewriteRedirects(doc, metadata.redirectPaths)
      ensureErrorSchema(doc, config.errorSchemaRef)
      rewriteDefaultResponses(doc, config.errorSchemaRef)
      if (config.transforms.rewriteCreateResponses) rewriteCreateResponses(doc)
    },
  },
  {
    // rewrite first: the rewritten arrays still hold the sentinel
    name: 'enums',
    enabled: always,
    run(doc, { metadata }) {
      applyEnumRewrites(doc, metadata.enumRewrites)
      rewriteInlineEnumValues(doc, metadata.enumValueMap)
      stripEnumSentinels(doc)
    },
  },
  {
    name: 'markers',
    enabled: always,
    run(doc, { config, unimplemented, deprecated }) {
      markUnimplemented(doc, unimplemented, config.errorSchemaRef)
      markDeprecated(doc, deprecated)
    },
  },
  {
    name: 'security',
    enabled: (config) => config.transforms.addSecurity,
    run(doc, { config, publicOperations }) {
      addBearerSecurity(doc, config.bearerDescription)
      markPublicOperations(doc, publicOperations)
    },
  },
  {
    name: 'cleanup',
    enabled: always,
    run(doc) {
      cleanTagDescriptions(doc)
      populateOperationSummaries(doc)
      removeEmptyRequestBodies(doc)
      removeUnusedEmptySchemas(doc)
      removeEnumFormat(doc)
    },
  },
  {
    name: 'uuid',
    enabled: always,
    run(doc, { config, metadata }) {
      flattenUuidPathTemplates(doc)
      if (config.transforms.flattenUuidRefs) flattenUuidRefs(doc, metadata.uuidSchema)
      simplifyUuidQueryParams(doc)
    },
  },
  {
    name: 'validation',
    enabled: always,
    run(doc, { config, metadata }) {
      if (config.transforms.injectValidation) injectValidationConstraints(doc, metadata.fieldConstraints)
      if (config.transforms.annotateFieldAccess) {
        annotateFieldAccess(doc, config.writeOnlyFields, config.readOnlyFields)
      }
      annotateDurationFields(doc)
    },
  },
  {
    name: 'path-fields',
    enabled: always,
    run(doc, { metadata }) {
      stripPathFieldsFromBody(doc)
      enrichPathParams(doc, metadata.pathParamConstraints, metadata.enumValueMap)
    },
  },
  {
    name: 'request-bodies',
    enabled: always,
    run(doc, { config }) {
      if (config.transforms.inlineRequestBodies) {
        inlineRequestBodies(doc)
      } else {
        enrichSchemaExamples(doc)
      }
      enrichInlineRequestBodyExamples(doc)
      removeEmptyInlinedRequestBodies(doc)
      removeOrphanedSchemas(doc)
    },
  },
  {
    name: 'normalize',
    enabled: (config) => config.transforms.normalizeLineEndings,
    run(doc) {
      normalizeLineEndings(doc)
    },
  },
]

/**
 * Run a single phase when its configuration enables it
 *
 * @returns whether the phase ran
 */
export function runPhase(phase: PatchPhase, doc: DocumentMap, context: PatchContext): boolean {
  const ran = phase.enabled(context.config)
  logger.debug({ phase: phase.name, ran }, ran ? 'Running phase' : 'Skipped phase')
  if (ran) phase.run(doc, context)
  return ran
}

/**
 * Run every phase over a parsed document, in place
 *
 * @throws PatchError (METHOD_NOT_FOUND, AMBIGUOUS_METHOD_NAME) when a
 * configured method name does not resolve
 */
export function patchDocument(doc: DocumentMap, metadata: ProtoMetadata, config: PatchConfig): DocumentMap {
  const context = createPatchContext(metadata, config)
  for (const phase of PHASES) {
    runPhase(phase, doc, context)
  }
  return doc
}

export interface PatchOptions {
  /** Input format; detected from the text when absent */
  format?: DocumentFormat
  /** Output format; defaults to the input format */
  outputFormat?: DocumentFormat
}

/**
 * Parse, transform and serialize an API document
 */
export function patch(
  text: string,
  metadata: ProtoMetadata,
  config: PatchConfig = createPatchConfig(),
  options: PatchOptions = {}
): string {
  const format = options.format ?? detectFormat(text)
  const doc = parseDocument(text, format)
  patchDocument(doc, metadata, config)
  logger.debug({ format, phases: PHASES.length }, 'Patched document')
  return serializeDocument(doc, options.outputFormat ?? format)
}
