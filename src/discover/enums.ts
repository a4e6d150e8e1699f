/**
 * Enum prefix detection
 *
 * Enum values conventionally repeat the enum name as an UPPER_SNAKE_ prefix
 * (`ORDER_STATUS_SHIPPED`). The served JSON uses the stripped, lowercased
 * form (`shipped`), so the document's enum arrays are rewritten to match.
 */

import { FieldType, walkEnums, walkMessages, type DescriptorSet } from '../descriptor/index.js'
import { snakeToLowerCamel } from './naming.js'
import type { EnumRewrite } from './types.js'

const MIN_PREFIX_LENGTH = 3

/**
 * Shared `PREFIX_` of a set of enum value names
 *
 * The longest common prefix is cut back to its last underscore. Prefixes
 * shorter than three characters are ignored.
 */
export function detectEnumPrefix(values: readonly string[]): string | undefined {
  if (values.length === 0) return undefined

  let common = values[0]
  for (const value of values.slice(1)) {
    let i = 0
    while (i < common.length && i < value.length && common[i] === value[i]) i++
    common = common.slice(0, i)
  }

  const underscore = common.lastIndexOf('_')
  if (underscore === -1) return undefined
  const prefix = common.slice(0, underscore + 1)
  return prefix.length >= MIN_PREFIX_LENGTH ? prefix : undefined
}

/**
 * Strip the prefix from every value and lowercase the remainder
 */
export function stripEnumPrefix(values: readonly string[], prefix: string): string[] | undefined {
  if (!values.every((v) => v.startsWith(prefix))) return undefined
  return values.map((v) => v.slice(prefix.length).toLowerCase())
}

export interface EnumDiscovery {
  rewrites: EnumRewrite[]
  valueMap: Map<string, string>
}

/**
 * Rewrites for every enum-typed field whose enum has a shared prefix
 */
export function discoverEnumRewrites(set: DescriptorSet): EnumDiscovery {
  const stripped = new Map<string, string[]>()
  const valueMap = new Map<string, string>()

  for (const file of set.file) {
    for (const { enumType, fullName } of walkEnums(file)) {
      const names = enumType.value.map((v) => v.name)
      const prefix = detectEnumPrefix(names)
      const values = prefix !== undefined ? stripEnumPrefix(names, prefix) : undefined
      if (!values) continue

      stripped.set(`.${fullName}`, values)
      names.forEach((raw, i) => valueMap.set(raw, values[i]))
    }
  }

  const rewrites: EnumRewrite[] = []
  if (stripped.size === 0) return { rewrites, valueMap }

  for (const file of set.file) {
    for (const { message, fullName } of walkMessages(file)) {
      for (const field of message.field) {
        if (field.type !== FieldType.ENUM || field.typeName === undefined) continue
        const values = stripped.get(field.typeName)
        if (values) {
          rewrites.push({ schema: fullName, field: snakeToLowerCamel(field.name), values })
        }
      }
    }
  }

  return { rewrites, valueMap }
}
