/**
 * Project Config Loader
 *
 * Reads the YAML project file, validates it, and maps it onto the
 * pipeline's PatchConfig together with command-line overrides.
 */

import { readFile } from 'node:fs/promises'
import yaml from 'js-yaml'
import { Errors } from '../errors/index.js'
import { createPatchConfig, type PatchConfig, type TransformToggles } from '../patch/index.js'
import { createLogger } from '../utils/logger.js'
import { projectConfigSchema, type ProjectConfig, type ProjectTransforms } from './schema.js'

const logger = createLogger('config')

/**
 * Settings given on the command line
 *
 * Method lists are appended to the file's lists; everything else wins.
 */
export interface ConfigOverrides {
  unimplementedMethods?: readonly string[]
  publicMethods?: readonly string[]
  deprecatedMethods?: readonly string[]
  errorSchemaRef?: string
  transforms?: Partial<TransformToggles>
}

/**
 * Parse and validate project config text
 *
 * An empty file is an empty config.
 *
 * @param source - File name used in error messages
 * @throws PatchError (CONFIG_INVALID)
 */
export function parseProjectConfig(text: string, source: string): ProjectConfig {
  let raw: unknown
  try {
    raw = yaml.load(text, { schema: yaml.JSON_SCHEMA, json: true })
  } catch (err) {
    if (err instanceof yaml.YAMLException) {
      const line = err.mark ? `line ${err.mark.line + 1}` : ''
      throw Errors.configInvalid(source, [{ path: line, message: err.reason || err.message }])
    }
    throw err
  }

  const result = projectConfigSchema.safeParse(raw ?? {})
  if (!result.success) {
    throw Errors.configInvalid(
      source,
      result.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message }))
    )
  }
  return result.data
}

/**
 * Read and validate a project config file
 *
 * @throws PatchError (IO_ERROR, CONFIG_INVALID)
 */
export async function loadProjectConfig(path: string): Promise<ProjectConfig> {
  let text: string
  try {
    text = await readFile(path, 'utf8')
  } catch (err) {
    throw Errors.io('read', path, err)
  }

  const config = parseProjectConfig(text, path)
  logger.debug({ path, keys: Object.keys(config) }, 'Loaded project config')
  return config
}

function toToggles(transforms: ProjectTransforms = {}): Partial<TransformToggles> {
  return {
    upgradeTo31: transforms.upgrade_to_3_1,
    injectServers: transforms.inject_servers,
    annotateSse: transforms.annotate_sse,
    rewriteCreateResponses: transforms.rewrite_create_responses,
    injectValidation: transforms.inject_validation,
    annotateFieldAccess: transforms.annotate_field_access,
    addSecurity: transforms.add_security,
    flattenUuidRefs: transforms.flatten_uuid_refs,
    inlineRequestBodies: transforms.inline_request_bodies,
    normalizeLineEndings: transforms.normalize_line_endings,
  }
}

const TOGGLE_KEYS: readonly (keyof TransformToggles)[] = [
  'upgradeTo31',
  'injectServers',
  'annotateSse',
  'rewriteCreateResponses',
  'injectValidation',
  'annotateFieldAccess',
  'addSecurity',
  'flattenUuidRefs',
  'inlineRequestBodies',
  'normalizeLineEndings',
]

function mergeToggles(
  base: Partial<TransformToggles>,
  top: Partial<TransformToggles>
): Partial<TransformToggles> {
  const merged: { -readonly [K in keyof TransformToggles]?: boolean } = {}
  for (const key of TOGGLE_KEYS) {
    const value = top[key] ?? base[key]
    if (value !== undefined) merged[key] = value
  }
  return merged
}

/**
 * Merge a project config and command-line overrides into a PatchConfig
 */
export function projectConfigToPatchConfig(
  project: ProjectConfig = {},
  overrides: ConfigOverrides = {}
): PatchConfig {
  const info = project.info ?? {}
  return createPatchConfig({
    errorSchemaRef: overrides.errorSchemaRef ?? project.error_schema_ref,
    bearerDescription: project.bearer_description,
    unimplementedMethods: [...(project.unimplemented_methods ?? []), ...(overrides.unimplementedMethods ?? [])],
    publicMethods: [...(project.public_methods ?? []), ...(overrides.publicMethods ?? [])],
    deprecatedMethods: [...(project.deprecated_methods ?? []), ...(overrides.deprecatedMethods ?? [])],
    plainTextEndpoints: project.plain_text_endpoints,
    metricsPath: project.metrics_path,
    readinessPath: project.readiness_path,
    servers: project.servers,
    info: {
      contact: info.contact,
      license: info.license,
      termsOfService: info.terms_of_service,
      externalDocs: info.external_docs,
    },
    writeOnlyFields: project.write_only_fields,
    readOnlyFields: project.read_only_fields,
    transforms: mergeToggles(toToggles(project.transforms), overrides.transforms ?? {}),
  })
}
