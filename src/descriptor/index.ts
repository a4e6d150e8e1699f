/**
 * Descriptor Module
 *
 * Decoding of compiled descriptor sets into a typed model, including the
 * HTTP rule and validation rule annotations.
 */

export * from './types.js'
export * from './http.js'
export * from './walk.js'
export {
  decodeDescriptorSet,
  encodeDescriptorSet,
  type BoundRulesInit,
  type FieldRulesInit,
  type FieldInit,
  type EnumInit,
  type MessageInit,
  type MethodInit,
  type FileInit,
} from './decode.js'
export { DESCRIPTOR_SCHEMA, FileDescriptorSetType } from './schema.js'
