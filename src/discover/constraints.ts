/**
 * Field constraint translation
 *
 * Turns the validation rules on a field into a single {@link FieldConstraint}.
 * Exclusive bounds become inclusive ones. Unsigned upper bounds saturate at
 * zero and 64-bit lower bounds at the type maximum.
 */

import {
  FieldType,
  getFieldRules,
  walkMessages,
  type BoundRules,
  type DescriptorSet,
  type FieldDescriptor,
  type StringRules,
} from '../descriptor/index.js'
import { snakeToLowerCamel } from './naming.js'
import type { FieldConstraint, NumericConstraint, SchemaConstraints } from './types.js'

const UINT64_MAX = 18446744073709551615n

/** Largest integer a JSON number carries without precision loss */
export const JSON_SAFE_MAX = BigInt(Number.MAX_SAFE_INTEGER)

interface Range<T> {
  min?: T
  max?: T
}

export function int32Range(rules: BoundRules<number>): Range<number> {
  return {
    min: rules.gte ?? (rules.gt !== undefined ? rules.gt + 1 : undefined),
    max: rules.lte ?? (rules.lt !== undefined ? rules.lt - 1 : undefined),
  }
}

export function uint32Range(rules: BoundRules<number>): Range<number> {
  return {
    min: rules.gte ?? (rules.gt !== undefined ? rules.gt + 1 : undefined),
    max: rules.lte ?? (rules.lt !== undefined ? Math.max(rules.lt - 1, 0) : undefined),
  }
}

export function uint64Range(rules: BoundRules<bigint>): Range<bigint> {
  const { gt, lt } = rules
  return {
    min: rules.gte ?? (gt !== undefined ? (gt < UINT64_MAX ? gt + 1n : UINT64_MAX) : undefined),
    max: rules.lte ?? (lt !== undefined ? (lt > 0n ? lt - 1n : 0n) : undefined),
  }
}

function hasStringContent(rules: StringRules): boolean {
  return (
    rules.minLen !== undefined ||
    rules.maxLen !== undefined ||
    rules.pattern !== undefined ||
    rules.in.length > 0 ||
    rules.uuid === true
  )
}

function numeric(field: string, signed: boolean, required: boolean, range: Range<number>): NumericConstraint {
  return {
    kind: 'numeric',
    field,
    required,
    signed,
    ...(range.min !== undefined && { minimum: range.min }),
    ...(range.max !== undefined && { maximum: range.max }),
  }
}

/**
 * Translate the rules of one field
 *
 * Rule kinds are tried in a fixed order (string, int32, uint32, uint64,
 * enum, message) and the first one that yields a constraint wins.
 */
export function translateField(field: FieldDescriptor): FieldConstraint | undefined {
  const rules = getFieldRules(field)
  if (!rules) return undefined

  const name = snakeToLowerCamel(field.name)
  const messageRequired = rules.message?.required === true

  if (rules.string && (hasStringContent(rules.string) || messageRequired)) {
    const s = rules.string
    return {
      kind: 'string',
      field: name,
      required: messageRequired || (s.minLen ?? 0) >= 1 || s.in.length > 0,
      ...(s.minLen !== undefined && { minLength: s.minLen }),
      ...(s.maxLen !== undefined && { maxLength: s.maxLen }),
      ...(s.pattern !== undefined && { pattern: s.pattern }),
      enumValues: s.in,
      uuid: s.uuid === true,
    }
  }

  if (rules.int32) {
    const range = int32Range(rules.int32)
    if (range.min !== undefined || range.max !== undefined) {
      return numeric(name, true, messageRequired, range)
    }
  }

  if (rules.uint32) {
    const range = uint32Range(rules.uint32)
    if (range.min !== undefined || range.max !== undefined) {
      return numeric(name, false, messageRequired, range)
    }
  }

  if (rules.uint64) {
    const { min, max } = uint64Range(rules.uint64)
    if (max !== undefined && max <= JSON_SAFE_MAX) {
      return numeric(name, false, messageRequired, {
        min: min !== undefined && min > 0n ? Number(min) : undefined,
        max: Number(max),
      })
    }
    if (messageRequired) {
      return { kind: 'presence', field: name, required: true, uuid: false }
    }
  }

  if (rules.enum) {
    const enumRequired = rules.enum.notIn.includes(0)
    if (enumRequired || messageRequired) {
      return { kind: 'presence', field: name, required: true, uuid: false }
    }
  }

  if (messageRequired) {
    return {
      kind: 'presence',
      field: name,
      required: true,
      uuid: field.type === FieldType.MESSAGE && (field.typeName?.endsWith('.UUID') ?? false),
    }
  }

  return undefined
}

/**
 * Constraints of every message, nested messages included
 */
export function extractFieldConstraints(set: DescriptorSet): SchemaConstraints[] {
  const result: SchemaConstraints[] = []
  for (const file of set.file) {
    for (const { message, fullName } of walkMessages(file)) {
      const fields: FieldConstraint[] = []
      for (const field of message.field) {
        const constraint = translateField(field)
        if (constraint) fields.push(constraint)
      }
      if (fields.length > 0) {
        result.push({ schema: fullName, fields })
      }
    }
  }
  return result
}
