/**
 * Project Configuration
 */

export {
  projectConfigSchema,
  plainTextEndpointSchema,
  serverSchema,
  infoSchema,
  transformsSchema,
  type ProjectConfig,
  type ProjectTransforms,
} from './schema.js'

export {
  loadProjectConfig,
  parseProjectConfig,
  projectConfigToPatchConfig,
  type ConfigOverrides,
} from './load.js'
