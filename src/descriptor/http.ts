/**
 * HTTP binding extraction
 */

import { Errors } from '../errors/index.js'
import type { FieldDescriptor, FieldRules, MethodDescriptor } from './types.js'

export type HttpVerb = 'GET' | 'PUT' | 'POST' | 'DELETE' | 'PATCH'

/**
 * Request body selector: `*` maps the whole message, `''` sends no body
 */
export type BodySelector = '*' | ''

/**
 * Primary HTTP binding of a method. `additional_bindings` are not read.
 */
export interface HttpBinding {
  readonly verb: HttpVerb
  /** Path template with `{field}` or `{field.subfield}` placeholders */
  readonly path: string
  readonly body: BodySelector
}

const VERBS = [
  ['get', 'GET'],
  ['put', 'PUT'],
  ['post', 'POST'],
  ['delete', 'DELETE'],
  ['patch', 'PATCH'],
] as const

function toBodySelector(body: string | undefined, method: string): BodySelector {
  if (body === undefined || body === '') return ''
  if (body === '*') return '*'
  throw Errors.unsupportedBodySelector(method, body)
}

/**
 * Read the HTTP binding of a method
 *
 * @param method - Method descriptor
 * @param qualifiedName - Name used in error messages (e.g. `pkg.Service.Method`)
 * @returns The binding, or `undefined` when the method has no HTTP rule or
 *   only a custom verb
 * @throws PatchError (UNSUPPORTED_BODY_SELECTOR) when the rule names a single body field
 */
export function extractHttpBinding(
  method: MethodDescriptor,
  qualifiedName: string = method.name
): HttpBinding | undefined {
  const rule = method.http
  if (!rule) return undefined

  for (const [key, verb] of VERBS) {
    const path = rule[key]
    if (path !== undefined) {
      return { verb, path, body: toBodySelector(rule.body, qualifiedName) }
    }
  }
  return undefined
}

/**
 * Validation rules attached to a field, if any
 */
export function getFieldRules(field: FieldDescriptor): FieldRules | undefined {
  return field.rules
}

/**
 * Placeholder expressions of a path template, in order
 *
 * `/v1/{user_id.value}/items/{item_id}` yields `['user_id.value', 'item_id']`.
 */
export function getPathPlaceholders(path: string): string[] {
  return Array.from(path.matchAll(/\{([^}]+)\}/g), (m) => m[1])
}
