/**
 * Transform Configuration
 *
 * Toggles and settings for one pipeline run. Built once and frozen.
 */

/**
 * One switch per transform group. All default to `true`.
 */
export interface TransformToggles {
  /** Phase 1: bump to OpenAPI 3.1 and rewrite `nullable` */
  readonly upgradeTo31: boolean
  /** Phase 1: apply server and info overrides */
  readonly injectServers: boolean
  /** Phase 2: annotate server-streaming operations as SSE */
  readonly annotateSse: boolean
  /** Phase 3: answer Create/SignUp/Register operations with 201 */
  readonly rewriteCreateResponses: boolean
  /** Phase 9: apply field constraints to schemas */
  readonly injectValidation: boolean
  /** Phase 9: mark writeOnly/readOnly properties by name */
  readonly annotateFieldAccess: boolean
  /** Phase 6: add bearer authentication */
  readonly addSecurity: boolean
  /** Phase 8: inline the UUID wrapper schema */
  readonly flattenUuidRefs: boolean
  /** Phase 11: inline request body schemas */
  readonly inlineRequestBodies: boolean
  /** Phase 12: convert CRLF to LF in every string */
  readonly normalizeLineEndings: boolean
}

export interface PlainTextEndpoint {
  readonly path: string
  /** Literal response example */
  readonly example?: string
}

export interface ServerEntry {
  readonly url: string
  readonly description?: string
}

export interface InfoOverrides {
  readonly contact?: {
    readonly name?: string
    readonly email?: string
    readonly url?: string
  }
  readonly license?: {
    readonly name: string
    readonly url?: string
  }
  readonly termsOfService?: string
  readonly externalDocs?: {
    readonly url: string
    readonly description?: string
  }
}

export interface PatchConfig {
  /** Reference to the shared error schema */
  readonly errorSchemaRef: string
  /** Description of the bearer security scheme */
  readonly bearerDescription?: string
  /** Method names (bare or `Service.Method`) answered with UNIMPLEMENTED */
  readonly unimplementedMethods: readonly string[]
  /** Method names that need no authentication */
  readonly publicMethods: readonly string[]
  /** Method names to flag as deprecated */
  readonly deprecatedMethods: readonly string[]
  readonly plainTextEndpoints: readonly PlainTextEndpoint[]
  /** Path of the Prometheus metrics endpoint */
  readonly metricsPath?: string
  /** Path of the readiness check */
  readonly readinessPath?: string
  readonly servers: readonly ServerEntry[]
  readonly info: InfoOverrides
  /** Extra substrings marking a property writeOnly */
  readonly writeOnlyFields: readonly string[]
  /** Extra substrings marking a property readOnly */
  readonly readOnlyFields: readonly string[]
  readonly transforms: TransformToggles
}

export type PatchConfigInput = Partial<Omit<PatchConfig, 'transforms'>> & {
  transforms?: Partial<TransformToggles>
}

export const DEFAULT_ERROR_SCHEMA_REF = '#/components/schemas/ErrorResponse'

export const DEFAULT_TRANSFORMS: TransformToggles = Object.freeze({
  upgradeTo31: true,
  injectServers: true,
  annotateSse: true,
  rewriteCreateResponses: true,
  injectValidation: true,
  annotateFieldAccess: true,
  addSecurity: true,
  flattenUuidRefs: true,
  inlineRequestBodies: true,
  normalizeLineEndings: true,
})

/**
 * Build a frozen configuration, filling defaults
 */
export function createPatchConfig(input: PatchConfigInput = {}): PatchConfig {
  const t = input.transforms ?? {}
  return Object.freeze({
    errorSchemaRef: input.errorSchemaRef ?? DEFAULT_ERROR_SCHEMA_REF,
    bearerDescription: input.bearerDescription,
    unimplementedMethods: input.unimplementedMethods ?? [],
    publicMethods: input.publicMethods ?? [],
    deprecatedMethods: input.deprecatedMethods ?? [],
    plainTextEndpoints: input.plainTextEndpoints ?? [],
    metricsPath: input.metricsPath,
    readinessPath: input.readinessPath,
    servers: input.servers ?? [],
    info: input.info ?? {},
    writeOnlyFields: input.writeOnlyFields ?? [],
    readOnlyFields: input.readOnlyFields ?? [],
    transforms: Object.freeze({
      upgradeTo31: t.upgradeTo31 ?? DEFAULT_TRANSFORMS.upgradeTo31,
      injectServers: t.injectServers ?? DEFAULT_TRANSFORMS.injectServers,
      annotateSse: t.annotateSse ?? DEFAULT_TRANSFORMS.annotateSse,
      rewriteCreateResponses: t.rewriteCreateResponses ?? DEFAULT_TRANSFORMS.rewriteCreateResponses,
      injectValidation: t.injectValidation ?? DEFAULT_TRANSFORMS.injectValidation,
      annotateFieldAccess: t.annotateFieldAccess ?? DEFAULT_TRANSFORMS.annotateFieldAccess,
      addSecurity: t.addSecurity ?? DEFAULT_TRANSFORMS.addSecurity,
      flattenUuidRefs: t.flattenUuidRefs ?? DEFAULT_TRANSFORMS.flattenUuidRefs,
      inlineRequestBodies: t.inlineRequestBodies ?? DEFAULT_TRANSFORMS.inlineRequestBodies,
      normalizeLineEndings: t.normalizeLineEndings ?? DEFAULT_TRANSFORMS.normalizeLineEndings,
    }),
  })
}
