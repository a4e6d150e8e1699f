/**
 * Phase 3: response fixes
 */

import {
  ensureMap,
  getJsonSchema,
  getMap,
  getParameters,
  getRef,
  getString,
  isMap,
  listOperations,
  schemaNameFromRef,
  type DocumentMap,
} from '../document/index.js'
import { pathMatchesTemplate, snakeToLowerCamel } from '../discover/index.js'
import type { PlainTextEndpoint } from './config.js'
import { JSON_MEDIA_TYPE } from './constants.js'

/**
 * `content` holding one JSON media type that references a schema
 */
export function jsonContentRef(ref: string): DocumentMap {
  return { [JSON_MEDIA_TYPE]: { schema: { $ref: ref } } }
}

function header(description: string, defaultValue: string): DocumentMap {
  return { description, schema: { type: 'string', default: defaultValue } }
}

/**
 * `200` with an empty `content` mapping becomes `204 No Content`
 */
export function replaceEmptyOkWith204(doc: DocumentMap): void {
  for (const { operation } of listOperations(doc)) {
    const responses = getMap(operation, 'responses')
    const content = getMap(getMap(responses, '200'), 'content')
    if (!responses || !content || Object.keys(content).length > 0) continue

    delete responses['200']
    responses['204'] = { description: 'No Content' }
  }
}

/**
 * Drop query parameters that repeat a path parameter
 *
 * Path parameter names are compared in dotted lowerCamelCase, so a path
 * parameter `user_id.value` shadows a query parameter `userId.value`.
 */
export function removeRedundantQueryParams(doc: DocumentMap): void {
  for (const { operation } of listOperations(doc)) {
    const params = getParameters(operation)
    const pathNames = params
      .filter((p) => p.in === 'path')
      .map((p) => getString(p, 'name'))
      .filter((name): name is string => name !== undefined)
      .map((name) => name.split('.').map(snakeToLowerCamel).join('.'))
    if (pathNames.length === 0 || !Array.isArray(operation.parameters)) continue

    operation.parameters = operation.parameters.filter(
      (p) => !(isMap(p) && p.in === 'query' && typeof p.name === 'string' && pathNames.includes(p.name))
    )
  }
}

/**
 * Serve configured endpoints as `text/plain`
 */
export function applyPlainTextEndpoints(doc: DocumentMap, endpoints: readonly PlainTextEndpoint[]): void {
  if (endpoints.length === 0) return

  for (const { path, operation } of listOperations(doc)) {
    const endpoint = endpoints.find((e) => e.path === path)
    const content = getMap(getMap(getMap(operation, 'responses'), '200'), 'content')
    if (!endpoint || !content || content[JSON_MEDIA_TYPE] === undefined) continue

    delete content[JSON_MEDIA_TYPE]
    content['text/plain'] = {
      schema: { type: 'string' },
      ...(endpoint.example !== undefined && { example: endpoint.example }),
    }
  }
}

/**
 * Document the Prometheus exposition headers on the metrics endpoint
 */
export function addMetricsHeaders(doc: DocumentMap, metricsPath: string): void {
  for (const { path, method, operation } of listOperations(doc)) {
    if (path !== metricsPath || method !== 'get') continue
    const ok = getMap(getMap(operation, 'responses'), '200')
    if (!ok) continue

    const headers = ensureMap(ok, 'headers')
    headers['Content-Type'] = header(
      'Prometheus text exposition media type.',
      'text/plain; version=0.0.4; charset=utf-8'
    )
    headers['Cache-Control'] = header('Caching policy for metrics responses.', 'no-store, no-cache, max-age=0')
  }
}

/**
 * Document the 503 a readiness check returns while not ready
 */
export function addReadinessUnavailable(doc: DocumentMap, readinessPath: string): void {
  for (const { path, method, operation } of listOperations(doc)) {
    if (path !== readinessPath || method !== 'get') continue
    const responses = getMap(operation, 'responses')
    if (!responses || responses['503'] !== undefined) continue

    const ref = getRef(getJsonSchema(getMap(responses, '200')))
    if (ref === undefined) continue
    responses['503'] = { description: 'Service Unavailable', content: jsonContentRef(ref) }
  }
}

const REDIRECT_METHODS = new Set(['get', 'post', 'put', 'patch', 'delete'])

/**
 * Operations that answer with a browser redirect return 302 + Location
 */
export function rewriteRedirects(doc: DocumentMap, redirectPaths: readonly string[]): void {
  if (redirectPaths.length === 0) return

  for (const { path, method, operation } of listOperations(doc)) {
    if (!REDIRECT_METHODS.has(method)) continue
    if (!redirectPaths.some((template) => pathMatchesTemplate(path, template))) continue

    const responses = ensureMap(operation, 'responses')
    delete responses['200']
    responses['302'] = {
      description: 'Redirect to frontend success or error page.',
      headers: {
        Location: {
          description: 'Frontend success or error page URL.',
          required: true,
          schema: { type: 'string', format: 'uri' },
        },
      },
    }
  }
}

/**
 * REST error envelope returned by the gateway
 */
export function restErrorSchema(): DocumentMap {
  return {
    type: 'object',
    required: ['error'],
    properties: {
      error: {
        type: 'object',
        required: ['code', 'message', 'status'],
        properties: {
          code: { type: 'integer', format: 'int32', description: 'HTTP status code.' },
          message: { type: 'string', description: 'Human-readable error message.' },
          status: { type: 'string', description: 'gRPC status code name (e.g., INVALID_ARGUMENT).' },
        },
      },
    },
    description: 'REST error response envelope.',
  }
}

/**
 * Add the error envelope schema unless one with that name exists
 */
export function ensureErrorSchema(doc: DocumentMap, errorSchemaRef: string): void {
  const name = schemaNameFromRef(errorSchemaRef) ?? errorSchemaRef
  const schemas = ensureMap(ensureMap(doc, 'components'), 'schemas')
  if (schemas[name] === undefined) {
    schemas[name] = restErrorSchema()
  }
}

/**
 * Point every `default` response at the error envelope
 */
export function rewriteDefaultResponses(doc: DocumentMap, errorSchemaRef: string): void {
  for (const { operation } of listOperations(doc)) {
    const fallback = getMap(getMap(operation, 'responses'), 'default')
    if (!fallback) continue

    if (fallback.description === undefined) {
      fallback.description = 'Default error response'
    }
    fallback.content = jsonContentRef(errorSchemaRef)
  }
}

const CREATE_PREFIXES = ['Create', 'SignUp', 'Register']

/**
 * Resource-creating operations answer `201 Created`
 */
export function rewriteCreateResponses(doc: DocumentMap): void {
  for (const { operation } of listOperations(doc)) {
    const operationId = getString(operation, 'operationId')
    if (operationId === undefined) continue

    const methodName = operationId.slice(operationId.indexOf('_') + 1)
    if (!CREATE_PREFIXES.some((prefix) => methodName.startsWith(prefix))) continue

    const responses = getMap(operation, 'responses')
    const ok = getMap(responses, '200')
    if (!responses || !ok || responses['201'] !== undefined) continue

    delete responses['200']
    responses['201'] = { ...ok, description: 'Created' }
  }
}
