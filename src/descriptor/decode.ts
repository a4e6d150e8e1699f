/**
 * Descriptor set decoding and encoding
 */

import { Errors } from '../errors/index.js'
import { createLogger } from '../utils/logger.js'
import { FileDescriptorSetType } from './schema.js'
import { descriptorSetSchema, type DescriptorSet } from './types.js'

const logger = createLogger('descriptor')

/**
 * Decode serialized `FileDescriptorSet` bytes
 *
 * @throws PatchError (DESCRIPTOR_DECODE) on malformed bytes
 */
export function decodeDescriptorSet(bytes: Uint8Array): DescriptorSet {
  let plain: Record<string, unknown>
  try {
    const message = FileDescriptorSetType.decode(bytes)
    plain = FileDescriptorSetType.toObject(message, { longs: String, arrays: true })
  } catch (err) {
    throw Errors.descriptorDecode(err instanceof Error ? err.message : String(err), err)
  }

  const parsed = descriptorSetSchema.safeParse(plain)
  if (!parsed.success) {
    const reason = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')
    throw Errors.descriptorDecode(reason)
  }

  logger.debug({ files: parsed.data.file.length, bytes: bytes.length }, 'Decoded descriptor set')
  return parsed.data
}

// ─────────────────────────────────────────────────────────────
// Encoding
// ─────────────────────────────────────────────────────────────

type Uint64Input = number | string

export interface BoundRulesInit<T> {
  lt?: T
  lte?: T
  gt?: T
  gte?: T
}

export interface FieldRulesInit {
  int32?: BoundRulesInit<number>
  uint32?: BoundRulesInit<number>
  uint64?: BoundRulesInit<Uint64Input>
  string?: {
    minLen?: Uint64Input
    maxLen?: Uint64Input
    pattern?: string
    in?: string[]
    uuid?: boolean
  }
  enum?: { notIn?: number[] }
  message?: { required?: boolean }
}

export interface FieldInit {
  name: string
  number?: number
  type: number
  typeName?: string
  options?: { rules?: FieldRulesInit }
}

export interface EnumInit {
  name: string
  value: Array<{ name: string; number: number }>
}

export interface MessageInit {
  name: string
  field?: FieldInit[]
  nestedType?: MessageInit[]
  enumType?: EnumInit[]
}

export interface MethodInit {
  name: string
  inputType: string
  outputType: string
  serverStreaming?: boolean
  clientStreaming?: boolean
  options?: {
    http?: {
      get?: string
      put?: string
      post?: string
      delete?: string
      patch?: string
      body?: string
    }
  }
}

export interface FileInit {
  name?: string
  package?: string
  messageType?: MessageInit[]
  enumType?: EnumInit[]
  service?: Array<{ name: string; method?: MethodInit[] }>
}

/**
 * Serialize a descriptor set written as plain objects
 */
export function encodeDescriptorSet(set: { file: FileInit[] }): Uint8Array {
  const message = FileDescriptorSetType.fromObject(set)
  return FileDescriptorSetType.encode(message).finish()
}
