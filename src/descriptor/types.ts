/**
 * Descriptor Model
 *
 * Typed, read-only view of a decoded descriptor set. Decoded messages are
 * checked against these zod schemas before anything else reads them.
 */

import { z } from 'zod'

/**
 * `FieldDescriptorProto.Type` values discovery cares about
 */
export const FieldType = {
  INT64: 3,
  UINT64: 4,
  INT32: 5,
  BOOL: 8,
  STRING: 9,
  MESSAGE: 11,
  UINT32: 13,
  ENUM: 14,
} as const

/** uint64 values arrive as decimal strings */
const uint64 = z.union([z.string(), z.number()]).transform((v) => BigInt(v))
const length = z.union([z.string(), z.number()]).transform((v) => Number(v))

export interface BoundRules<T> {
  readonly lt?: T
  readonly lte?: T
  readonly gt?: T
  readonly gte?: T
}

export interface StringRules {
  readonly minLen?: number
  readonly maxLen?: number
  readonly pattern?: string
  readonly in: readonly string[]
  readonly uuid?: boolean
}

export interface FieldRules {
  readonly int32?: BoundRules<number>
  readonly uint32?: BoundRules<number>
  readonly uint64?: BoundRules<bigint>
  readonly string?: StringRules
  readonly enum?: { readonly notIn: readonly number[] }
  readonly message?: { readonly required?: boolean }
}

export interface FieldDescriptor {
  readonly name: string
  readonly number?: number
  readonly type?: number
  /** Fully-qualified type name with a leading dot (e.g. `.pkg.Msg`) */
  readonly typeName?: string
  readonly rules?: FieldRules
}

export interface EnumValueDescriptor {
  readonly name: string
  readonly number: number
}

export interface EnumDescriptor {
  readonly name: string
  readonly value: readonly EnumValueDescriptor[]
}

export interface MessageDescriptor {
  readonly name: string
  readonly field: readonly FieldDescriptor[]
  readonly nestedType: readonly MessageDescriptor[]
  readonly enumType: readonly EnumDescriptor[]
}

/**
 * `google.api.HttpRule` as stored on the method
 */
export interface HttpRuleDescriptor {
  readonly get?: string
  readonly put?: string
  readonly post?: string
  readonly delete?: string
  readonly patch?: string
  readonly body?: string
}

export interface MethodDescriptor {
  readonly name: string
  /** Fully-qualified input type with a leading dot */
  readonly inputType: string
  /** Fully-qualified output type with a leading dot */
  readonly outputType: string
  readonly clientStreaming: boolean
  readonly serverStreaming: boolean
  readonly http?: HttpRuleDescriptor
}

export interface ServiceDescriptor {
  readonly name: string
  readonly method: readonly MethodDescriptor[]
}

export interface FileDescriptor {
  readonly name: string
  readonly package: string
  readonly messageType: readonly MessageDescriptor[]
  readonly enumType: readonly EnumDescriptor[]
  readonly service: readonly ServiceDescriptor[]
}

export interface DescriptorSet {
  readonly file: readonly FileDescriptor[]
}

// ─────────────────────────────────────────────────────────────
// Schemas
// ─────────────────────────────────────────────────────────────

const int32Bounds = z.object({
  lt: z.number().optional(),
  lte: z.number().optional(),
  gt: z.number().optional(),
  gte: z.number().optional(),
})

const uint64Bounds = z.object({
  lt: uint64.optional(),
  lte: uint64.optional(),
  gt: uint64.optional(),
  gte: uint64.optional(),
})

const fieldRulesSchema = z.object({
  int32: int32Bounds.optional(),
  uint32: int32Bounds.optional(),
  uint64: uint64Bounds.optional(),
  string: z
    .object({
      minLen: length.optional(),
      maxLen: length.optional(),
      pattern: z.string().optional(),
      in: z.array(z.string()).default([]),
      uuid: z.boolean().optional(),
    })
    .optional(),
  enum: z.object({ notIn: z.array(z.number()).default([]) }).optional(),
  message: z.object({ required: z.boolean().optional() }).optional(),
})

const fieldSchema = z
  .object({
    name: z.string().default(''),
    number: z.number().optional(),
    type: z.number().optional(),
    typeName: z.string().optional(),
    options: z.object({ rules: fieldRulesSchema.optional() }).optional(),
  })
  .transform(
    ({ options, ...field }): FieldDescriptor => ({ ...field, ...(options?.rules && { rules: options.rules }) })
  )

const enumSchema = z.object({
  name: z.string().default(''),
  value: z
    .array(z.object({ name: z.string().default(''), number: z.number().default(0) }))
    .default([]),
})

const messageSchema: z.ZodType<MessageDescriptor, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.object({
    name: z.string().default(''),
    field: z.array(fieldSchema).default([]),
    nestedType: z.array(messageSchema).default([]),
    enumType: z.array(enumSchema).default([]),
  })
)

const methodSchema = z
  .object({
    name: z.string().default(''),
    inputType: z.string().default(''),
    outputType: z.string().default(''),
    clientStreaming: z.boolean().default(false),
    serverStreaming: z.boolean().default(false),
    options: z
      .object({
        http: z
          .object({
            get: z.string().optional(),
            put: z.string().optional(),
            post: z.string().optional(),
            delete: z.string().optional(),
            patch: z.string().optional(),
            body: z.string().optional(),
          })
          .optional(),
      })
      .optional(),
  })
  .transform(
    ({ options, ...method }): MethodDescriptor => ({ ...method, ...(options?.http && { http: options.http }) })
  )

export const descriptorSetSchema: z.ZodType<DescriptorSet, z.ZodTypeDef, unknown> = z.object({
  file: z
    .array(
      z.object({
        name: z.string().default(''),
        package: z.string().default(''),
        messageType: z.array(messageSchema).default([]),
        enumType: z.array(enumSchema).default([]),
        service: z
          .array(
            z.object({
              name: z.string().default(''),
              method: z.array(methodSchema).default([]),
            })
          )
          .default([]),
      })
    )
    .default([]),
})
