/**
 * Route-level discovery: redirects, the UUID wrapper and path parameters
 */

import {
  FieldType,
  getPathPlaceholders,
  walkEnums,
  walkMessages,
  type DescriptorSet,
  type EnumDescriptor,
  type FieldDescriptor,
  type HttpBinding,
  type MethodDescriptor,
} from '../descriptor/index.js'
import { convertPathTemplateToCamel, placeholderToCamel } from './naming.js'
import type { PathParamConstraint, PathParams } from './types.js'

/**
 * Method together with its primary HTTP binding
 */
export interface BoundMethod {
  readonly service: string
  readonly method: MethodDescriptor
  readonly binding: HttpBinding
}

const UUID_PATTERN_MARKER = '0-9a-fA-F'

/**
 * Fully-qualified names (leading dot) of messages that carry `redirect_url`
 */
export function findRedirectMessages(set: DescriptorSet): Set<string> {
  const names = new Set<string>()
  for (const file of set.file) {
    for (const { message, fullName } of walkMessages(file)) {
      if (message.field.some((f) => f.name === 'redirect_url')) {
        names.add(`.${fullName}`)
      }
    }
  }
  return names
}

export function findRedirectPaths(set: DescriptorSet, bound: readonly BoundMethod[]): string[] {
  const redirectMessages = findRedirectMessages(set)
  return bound.filter((b) => redirectMessages.has(b.method.outputType)).map((b) => b.binding.path)
}

/**
 * First single-field message shaped like `{ string value }` with a hex
 * pattern rule
 */
export function detectUuidSchema(set: DescriptorSet): string | undefined {
  for (const file of set.file) {
    for (const { message, fullName } of walkMessages(file)) {
      if (message.field.length !== 1) continue
      const [field] = message.field
      if (
        field.name === 'value' &&
        field.type === FieldType.STRING &&
        field.rules?.string?.pattern?.includes(UUID_PATTERN_MARKER)
      ) {
        return fullName
      }
    }
  }
  return undefined
}

function isUuidField(field: FieldDescriptor, uuidSchema: string | undefined): boolean {
  if (field.type !== FieldType.MESSAGE || field.typeName === undefined) return false
  return field.typeName.endsWith('.UUID') || (uuidSchema !== undefined && field.typeName === `.${uuidSchema}`)
}

/**
 * Shape of every templated path parameter, resolved against the request
 * message's fields
 */
export function extractPathParamConstraints(
  set: DescriptorSet,
  bound: readonly BoundMethod[],
  messageIndex: ReadonlyMap<string, readonly FieldDescriptor[]>,
  uuidSchema: string | undefined
): PathParams[] {
  const enums = new Map<string, EnumDescriptor>()
  for (const file of set.file) {
    for (const { enumType, fullName } of walkEnums(file)) {
      enums.set(`.${fullName}`, enumType)
    }
  }

  const result: PathParams[] = []
  for (const { method, binding } of bound) {
    const placeholders = getPathPlaceholders(binding.path)
    if (placeholders.length === 0) continue

    const fields = messageIndex.get(method.inputType) ?? []
    const params: PathParamConstraint[] = []

    for (const placeholder of placeholders) {
      const root = placeholder.split('.')[0]
      const field = fields.find((f) => f.name === root)
      if (!field) continue

      const stringRules = field.rules?.string
      const enumType =
        field.type === FieldType.ENUM && field.typeName !== undefined ? enums.get(field.typeName) : undefined

      params.push({
        name: placeholderToCamel(placeholder),
        uuid: isUuidField(field, uuidSchema),
        ...(stringRules?.minLen !== undefined && { minLength: stringRules.minLen }),
        ...(stringRules?.maxLen !== undefined && { maxLength: stringRules.maxLen }),
        ...(enumType && {
          enumValues: enumType.value.map((v) => v.name).filter((n) => !n.endsWith('_UNSPECIFIED')),
        }),
      })
    }

    if (params.length > 0) {
      result.push({ path: convertPathTemplateToCamel(binding.path), params })
    }
  }
  return result
}
