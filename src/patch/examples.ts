/**
 * Example values for request schemas
 *
 * Guesses come from the property name first and the schema shape second.
 */

import {
  getArray,
  getMap,
  getRef,
  getString,
  isMap,
  schemaNameFromRef,
  type DocumentMap,
  type DocumentValue,
} from '../document/index.js'
import { DATE_TIME_EXAMPLE, UUID_EXAMPLE } from './constants.js'

type NameRule = readonly [matches: (lower: string) => boolean, example: DocumentValue]

const has =
  (...parts: string[]) =>
  (lower: string) =>
    parts.some((part) => lower.includes(part))

const is =
  (...names: string[]) =>
  (lower: string) =>
    names.includes(lower)

const NAME_RULES: readonly NameRule[] = [
  [(l) => l === 'identifier' || l.includes('email'), 'user@example.com'],
  [has('phone'), '+1234567890'],
  [(l) => l === 'name' || has('displayname', 'display_name')(l), 'John Doe'],
  [has('token'), 'eyJhbGciOiJIUzI1NiIs...'],
  [
    (l) => l === 'otp' || has('verification_code', 'verificationcode', 'mfa_code', 'mfacode', 'totp_code', 'totpcode')(l),
    '123456',
  ],
  [is('query', 'search'), 'search term'],
  [has('url', 'uri'), 'https://example.com'],
  [has('version'), '1.0.0'],
  [has('pagesize', 'page_size', 'limit'), 20],
  [has('pagetoken', 'page_token', 'cursor'), 'eyJpZCI6MTAwfQ=='],
  [is('locale'), 'en-US'],
  [has('timezone', 'time_zone'), 'America/New_York'],
  [is('language', 'lang'), 'en'],
  [is('country', 'ipcountry', 'ip_country'), 'US'],
  [(l) => has('idempotency', 'request_id')(l) || l === 'requestid', UUID_EXAMPLE],
  [is('description'), 'A brief description'],
  [is('title', 'subject'), 'Example Title'],
  [(l) => l.includes('hostname') || l === 'host', 'api.example.com'],
  [
    (l) => l === 'ip' || has('ip_address', 'ipaddress')(l) || l.startsWith('ip_created') || l.startsWith('ipcreated'),
    '192.168.1.1',
  ],
  [has('user_agent', 'useragent'), 'Mozilla/5.0 (compatible)'],
  [has('content_type', 'contenttype', 'media_type', 'mediatype'), 'application/json'],
  [is('etag'), '"33a64df551425fcc55e4d42a148795d9f25f89d4"'],
  [is('deviceid', 'device_id'), 'a1b2c3d4-e5f6-7890-abcd-ef1234567890'],
  [is('devicename', 'device_name'), 'iPhone 15 Pro'],
  [is('devicetype', 'device_type'), 'mobile'],
  [is('installationid', 'installation_id'), UUID_EXAMPLE],
]

/**
 * Example suggested by a property name alone, if any
 */
export function exampleFromFieldName(name: string): DocumentValue | undefined {
  const lower = name.toLowerCase()
  if (lower.includes('password')) {
    return lower.startsWith('new') ? 'N3wP@ssw0rd!456' : 'P@ssw0rd123!'
  }
  return NAME_RULES.find(([matches]) => matches(lower))?.[1]
}

function firstEnumValue(values: DocumentValue[]): DocumentValue | undefined {
  return values.find((value) => value !== 'unspecified') ?? values[0]
}

function integerExample(prop: DocumentMap | undefined): number {
  const minimum = prop?.minimum
  return typeof minimum === 'number' && Number.isInteger(minimum) && minimum >= 0 ? minimum : 0
}

function resolveSchema(schemas: DocumentMap, ref: string | undefined): DocumentMap | undefined {
  const name = ref !== undefined ? schemaNameFromRef(ref) : undefined
  return name !== undefined ? getMap(schemas, name) : undefined
}

/**
 * Example object built from every property of a schema
 */
export function generateSchemaExample(schema: DocumentMap, schemas: DocumentMap): DocumentMap {
  const example: DocumentMap = {}
  const properties = getMap(schema, 'properties')
  if (!properties) return example
  for (const [name, prop] of Object.entries(properties)) {
    example[name] = generateFieldExample(name, prop, schemas)
  }
  return example
}

/**
 * Example for one property. Always yields a value, `"string"` as last resort.
 */
export function generateFieldExample(
  name: string,
  value: DocumentValue | undefined,
  schemas: DocumentMap
): DocumentValue {
  const prop = isMap(value) ? value : undefined
  const type = getString(prop, 'type') ?? ''
  const format = getString(prop, 'format') ?? ''

  if (format === 'uuid') return UUID_EXAMPLE
  if (format === 'field-mask') return exampleFromFieldName(name) ?? 'name,email'

  const enumValues = getArray(prop, 'enum')
  const enumExample = enumValues ? firstEnumValue(enumValues) : undefined
  if (enumExample !== undefined) return enumExample

  if (prop && type === 'object' && getMap(prop, 'properties')) {
    return generateSchemaExample(prop, schemas)
  }

  const allOf = getArray(prop, 'allOf')
  if (allOf) {
    const resolved = resolveSchema(schemas, getRef(allOf[0]))
    if (resolved) return generateSchemaExample(resolved, schemas)
  }

  if (prop?.additionalProperties !== undefined) return { key: 'value' }

  if (type === 'array') {
    const items = prop?.items
    return items !== undefined ? [generateFieldExample('item', items, schemas)] : []
  }

  const fromName = exampleFromFieldName(name)
  if (fromName !== undefined) return fromName

  if (type === 'boolean') return true
  if (type === 'integer') return integerExample(prop)
  if (format === 'date-time') return DATE_TIME_EXAMPLE
  return 'string'
}

/**
 * Example for one property, or `undefined` when only a generic
 * placeholder would fit
 */
export function meaningfulFieldExample(name: string, value: DocumentValue | undefined): DocumentValue | undefined {
  const prop = isMap(value) ? value : undefined
  const type = getString(prop, 'type') ?? ''
  const format = getString(prop, 'format') ?? ''

  if (format === 'uuid') return UUID_EXAMPLE
  if (format === 'date-time') return DATE_TIME_EXAMPLE
  if (format === 'field-mask') return exampleFromFieldName(name) ?? 'name,email'

  const enumValues = getArray(prop, 'enum')
  if (enumValues) return firstEnumValue(enumValues)

  if (type === 'boolean') return true
  if (type === 'integer') return integerExample(prop)

  if (type === 'array') {
    const items = prop?.items
    if (items === undefined || (isMap(items) && (items.$ref !== undefined || items.allOf !== undefined))) {
      return undefined
    }
    const itemExample = meaningfulFieldExample('item', items)
    return itemExample !== undefined ? [itemExample] : undefined
  }

  if (prop?.additionalProperties !== undefined) return { key: 'value' }

  return exampleFromFieldName(name)
}

/**
 * Copy values of a generated example onto the matching properties.
 * Properties with an example keep it; nested objects are descended into.
 */
export function injectPropertyExamples(schema: DocumentMap, example: DocumentValue): void {
  const properties = getMap(schema, 'properties')
  if (!properties || !isMap(example)) return

  for (const [name, prop] of Object.entries(properties)) {
    const value = example[name]
    if (!isMap(prop) || value === undefined || prop.example !== undefined) continue

    if (prop.properties !== undefined) {
      injectPropertyExamples(prop, value)
    } else {
      prop.example = value
    }
  }
}
