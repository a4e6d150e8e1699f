/**
 * End-to-end pipeline tests over the shop descriptor
 */

import { describe, it, expect } from 'vitest'
import { getPath, parseDocument, type DocumentMap } from '../src/document/index.js'
import { discover } from '../src/discover/index.js'
import { PatchError } from '../src/errors/index.js'
import {
  createPatchConfig,
  createPatchContext,
  NOT_IMPLEMENTED_NOTICE,
  patch,
  patchDocument,
  PHASES,
  runPhase,
  uuidStringSchema,
} from '../src/patch/index.js'
import { shopDescriptorBytes } from './fixtures/shop.js'

const SHOP_YAML = `openapi: 3.0.3
info:
  title: Shop API
  version: 0.0.1
tags:
  - name: ItemService
    description: |-
      =====
      Item catalogue service.
      Owns items and their lifecycle.
paths:
  /v1/items:
    post:
      tags: [ItemService]
      operationId: ItemService_CreateItem
      requestBody:
        required: true
        content:
          application/json:
            schema:
              $ref: '#/components/schemas/shop.v1.CreateItemRequest'
      responses:
        '200':
          description: OK
          content:
            application/json:
              schema:
                $ref: '#/components/schemas/shop.v1.Item'
        default:
          description: Default error response
          content:
            application/json:
              schema:
                $ref: '#/components/schemas/google.rpc.Status'
  /v1/items/{item_id.value}:
    get:
      operationId: ItemService_GetItem
      parameters:
        - name: item_id.value
          in: path
          required: true
          schema:
            type: string
      responses:
        '200':
          description: OK
          content:
            application/json:
              schema:
                $ref: '#/components/schemas/shop.v1.Item'
    patch:
      operationId: ItemService_UpdateItem
      parameters:
        - name: item_id.value
          in: path
          required: true
          schema:
            type: string
      requestBody:
        content:
          application/json:
            schema:
              $ref: '#/components/schemas/shop.v1.UpdateItemRequest'
      responses:
        '200':
          description: OK
          content:
            application/json:
              schema:
                $ref: '#/components/schemas/shop.v1.Item'
    delete:
      operationId: ItemService_DeleteItem
      parameters:
        - name: item_id.value
          in: path
          required: true
          schema:
            type: string
      responses:
        '200':
          description: OK
          content: {}
  /v1/items:watch:
    get:
      operationId: ItemService_WatchItems
      responses:
        '200':
          description: OK
          content:
            application/json:
              schema:
                $ref: '#/components/schemas/shop.v1.Item'
  /v1/providers/{provider}:
    get:
      operationId: ItemService_ListByProvider
      parameters:
        - name: provider
          in: path
          required: true
          schema:
            type: string
            format: enum
            enum: [PROVIDER_UNSPECIFIED, PROVIDER_GOOGLE, PROVIDER_GITHUB]
      responses:
        '200':
          description: OK
          content:
            application/json:
              schema:
                $ref: '#/components/schemas/shop.v1.ListByProviderResponse'
  /v1/checkout:
    post:
      operationId: ItemService_Checkout
      requestBody:
        content:
          application/json:
            schema:
              $ref: '#/components/schemas/shop.v1.CheckoutRequest'
      responses:
        '200':
          description: OK
          content:
            application/json:
              schema:
                $ref: '#/components/schemas/shop.v1.CheckoutResponse'
components:
  schemas:
    shop.v1.UUID:
      type: object
      properties:
        value:
          type: string
    shop.v1.Item:
      type: object
      properties:
        id:
          $ref: '#/components/schemas/shop.v1.UUID'
        name:
          type: string
        status:
          type: string
          format: enum
          enum: [ITEM_STATUS_UNSPECIFIED, ITEM_STATUS_ACTIVE, ITEM_STATUS_ARCHIVED]
        createdAt:
          type: string
    shop.v1.CreateItemRequest:
      type: object
      properties:
        name:
          type: string
        quantity:
          type: integer
          format: int32
        status:
          type: string
          format: enum
          enum: [ITEM_STATUS_UNSPECIFIED, ITEM_STATUS_ACTIVE, ITEM_STATUS_ARCHIVED]
        ownerId:
          $ref: '#/components/schemas/shop.v1.UUID'
    shop.v1.UpdateItemRequest:
      type: object
      properties:
        itemId:
          $ref: '#/components/schemas/shop.v1.UUID'
        name:
          type: string
    shop.v1.DeleteItemResponse:
      type: object
      properties: {}
    shop.v1.ListByProviderResponse:
      type: object
      properties: {}
    shop.v1.CheckoutRequest:
      type: object
      properties:
        itemId:
          $ref: '#/components/schemas/shop.v1.UUID'
    shop.v1.CheckoutResponse:
      type: object
      properties:
        redirectUrl:
          type: string
    google.rpc.Status:
      type: object
      properties:
        code:
          type: integer
          format: int32
        message:
          type: string
        details:
          type: array
          items:
            $ref: '#/components/schemas/google.protobuf.Any'
    google.protobuf.Any:
      type: object
      properties:
        '@type':
          type: string
      additionalProperties: true
`

const metadata = discover(shopDescriptorBytes())

const config = createPatchConfig({
  unimplementedMethods: ['Checkout'],
  publicMethods: ['ItemService.GetItem'],
  deprecatedMethods: ['DeleteItem'],
})

function patchedShop(): DocumentMap {
  return parseDocument(patch(SHOP_YAML, metadata, config, { outputFormat: 'json' }), 'json')
}

function catchError(fn: () => unknown): PatchError {
  try {
    fn()
  } catch (err) {
    if (err instanceof PatchError) return err
    throw err
  }
  throw new Error('expected a PatchError')
}

describe('patch', () => {
  const doc = patchedShop()

  it('should upgrade the document and flatten wrapper path templates', () => {
    expect(doc.openapi).toBe('3.1.0')
    expect(Object.keys(getPath(doc, 'paths') ?? {})).toEqual([
      '/v1/items',
      '/v1/items/{item_id}',
      '/v1/items:watch',
      '/v1/providers/{provider}',
      '/v1/checkout',
    ])
    expect(doc.tags).toEqual([{ name: 'ItemService', description: 'Item catalogue service.' }])
  })

  it('should answer creation with 201 and inline the request body', () => {
    const create = getPath(doc, 'paths', '/v1/items', 'post')
    expect(Object.keys(getPath(create ?? {}, 'responses') ?? {})).toEqual(['default', '201'])
    expect(getPath(create ?? {}, 'responses', '201')).toEqual({
      description: 'Created',
      content: { 'application/json': { schema: { $ref: '#/components/schemas/shop.v1.Item' } } },
    })
    expect(getPath(create ?? {}, 'responses', 'default')).toEqual({
      description: 'Default error response',
      content: { 'application/json': { schema: { $ref: '#/components/schemas/ErrorResponse' } } },
    })
    expect(getPath(create ?? {}, 'requestBody')).toEqual({
      required: true,
      content: {
        'application/json': {
          schema: {
            type: 'object',
            properties: {
              name: { type: 'string', minLength: 1, maxLength: 64, example: 'John Doe' },
              quantity: { type: 'integer', minimum: 1, maximum: 999, example: 1 },
              status: { type: 'string', enum: ['active', 'archived'], example: 'active' },
              ownerId: uuidStringSchema(),
            },
            required: ['name', 'status', 'ownerId'],
          },
        },
      },
    })
  })

  it('should type UUID path parameters and clear security on public operations', () => {
    const get = getPath(doc, 'paths', '/v1/items/{item_id}', 'get')
    expect(get?.parameters).toEqual([
      { name: 'item_id', in: 'path', required: true, schema: uuidStringSchema(), description: 'Resource UUID' },
    ])
    expect(get?.security).toEqual([])
  })

  it('should strip path-bound fields from the update body', () => {
    expect(
      getPath(doc, 'paths', '/v1/items/{item_id}', 'patch', 'requestBody', 'content', 'application/json', 'schema')
    ).toEqual({ type: 'object', properties: { name: { type: 'string', maxLength: 64, example: 'John Doe' } } })
  })

  it('should turn an empty 200 into 204 and flag deprecation', () => {
    const remove = getPath(doc, 'paths', '/v1/items/{item_id}', 'delete')
    expect(remove?.responses).toEqual({ '204': { description: 'No Content' } })
    expect(remove?.deprecated).toBe(true)
  })

  it('should annotate the streaming route', () => {
    const watch = getPath(doc, 'paths', '/v1/items:watch', 'get')
    expect(watch?.['x-streaming']).toBe('sse')
    expect(watch?.summary).toBe('**Streaming (SSE):** Server-sent events stream')
    expect(Object.keys(getPath(watch ?? {}, 'responses', '200', 'content') ?? {})).toEqual(['text/event-stream'])
  })

  it('should use stripped enum values without the sentinel', () => {
    expect(getPath(doc, 'paths', '/v1/providers/{provider}', 'get')?.parameters).toEqual([
      { name: 'provider', in: 'path', required: true, schema: { type: 'string', enum: ['google', 'github'] } },
    ])
  })

  it('should document the redirect and the missing implementation', () => {
    const checkout = getPath(doc, 'paths', '/v1/checkout', 'post')
    expect(checkout?.['x-not-implemented']).toBe(true)
    expect(checkout?.description).toBe(NOT_IMPLEMENTED_NOTICE)
    expect(checkout?.summary).toBe('⚠️ **Not yet implemented.** Calls return 501 Not Implemented')
    expect(Object.keys(getPath(checkout ?? {}, 'responses') ?? {})).toEqual(['302', '501'])
    expect(getPath(checkout ?? {}, 'responses', '302', 'headers', 'Location', 'required')).toBe(true)
  })

  it('should keep only reachable schemas', () => {
    expect(Object.keys(getPath(doc, 'components', 'schemas') ?? {})).toEqual([
      'shop.v1.Item',
      'shop.v1.ListByProviderResponse',
    ])
    expect(getPath(doc, 'components', 'schemas', 'shop.v1.Item')).toEqual({
      type: 'object',
      properties: {
        id: uuidStringSchema(),
        name: { type: 'string' },
        status: { type: 'string', enum: ['active', 'archived'] },
        createdAt: { type: 'string', readOnly: true },
      },
    })
  })

  it('should add bearer security once', () => {
    expect(doc.security).toEqual([{ bearerAuth: [] }])
    expect(getPath(doc, 'components', 'securitySchemes', 'bearerAuth', 'scheme')).toBe('bearer')
  })
})

describe('patchDocument', () => {
  it('should leave a patched document stable on a second run', () => {
    const doc = patchedShop()
    patchDocument(doc, metadata, config)

    expect(doc.security).toEqual([{ bearerAuth: [] }])
    expect(getPath(doc, 'paths', '/v1/checkout', 'post', 'description')).toBe(NOT_IMPLEMENTED_NOTICE)
    expect(Object.keys(getPath(doc, 'components', 'schemas') ?? {})).toHaveLength(3)
  })

  it('should reject method names that match nothing', () => {
    const doc = parseDocument(SHOP_YAML, 'yaml')
    const err = catchError(() =>
      patchDocument(doc, metadata, createPatchConfig({ unimplementedMethods: ['Refund'] }))
    )
    expect(err.code).toBe('METHOD_NOT_FOUND')
  })

  it('should reject bare names shared by several services', () => {
    const doc = parseDocument(SHOP_YAML, 'yaml')
    const err = catchError(() => patchDocument(doc, metadata, createPatchConfig({ publicMethods: ['GetItem'] })))
    expect(err.code).toBe('AMBIGUOUS_METHOD_NAME')
  })

  it('should skip security when it is switched off', () => {
    const doc = parseDocument(SHOP_YAML, 'yaml')
    patchDocument(doc, metadata, createPatchConfig({ transforms: { addSecurity: false } }))

    expect(doc.security).toBeUndefined()
    expect(getPath(doc, 'components', 'securitySchemes')).toBeUndefined()
  })
})

describe('PHASES', () => {
  const togglesOff = createPatchConfig({
    transforms: { annotateSse: false, addSecurity: false, normalizeLineEndings: false },
  })

  function phase(name: string) {
    const found = PHASES.find((p) => p.name === name)
    if (!found) throw new Error(`no phase ${name}`)
    return found
  }

  it('should run in a fixed order', () => {
    expect(PHASES.map((p) => p.name)).toEqual([
      'structural',
      'streaming',
      'responses',
      'enums',
      'markers',
      'security',
      'cleanup',
      'uuid',
      'validation',
      'path-fields',
      'request-bodies',
      'normalize',
    ])
  })

  it('should describe each phase by name, gate and body', () => {
    for (const p of PHASES) {
      expect(Object.keys(p)).toEqual(['name', 'enabled', 'run'])
    }
  })

  it('should gate toggled phases on their configuration', () => {
    expect(phase('streaming').enabled(togglesOff)).toBe(false)
    expect(phase('security').enabled(togglesOff)).toBe(false)
    expect(phase('normalize').enabled(togglesOff)).toBe(false)
    expect(phase('streaming').enabled(config)).toBe(true)
    expect(phase('security').enabled(config)).toBe(true)
    expect(phase('normalize').enabled(config)).toBe(true)
    expect(phase('responses').enabled(togglesOff)).toBe(true)
  })

  it('should skip a disabled phase without touching the document', () => {
    const doc = parseDocument(SHOP_YAML, 'yaml')
    const ran = runPhase(phase('security'), doc, createPatchContext(metadata, togglesOff))

    expect(ran).toBe(false)
    expect(doc.security).toBeUndefined()
  })

  it('should run an enabled phase', () => {
    const doc = parseDocument(SHOP_YAML, 'yaml')
    const ran = runPhase(phase('security'), doc, createPatchContext(metadata, createPatchConfig()))

    expect(ran).toBe(true)
    expect(doc.security).toEqual([{ bearerAuth: [] }])
  })
})
