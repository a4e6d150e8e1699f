/**
 * Path Field Tests
 */

import { describe, it, expect } from 'vitest'
import { getPath, type DocumentMap } from '../document/index.js'
import { enrichPathParams, stripPathFieldsFromBody } from './path-fields.js'
import { uuidStringSchema } from './uuid.js'

const ITEM_REF = '#/components/schemas/shop.v1.UpdateItemRequest'

describe('stripPathFieldsFromBody', () => {
  function doc(): DocumentMap {
    return {
      paths: {
        '/v1/items/{item_id}': {
          patch: {
            parameters: [{ name: 'item_id', in: 'path', required: true }],
            requestBody: { content: { 'application/json': { schema: { $ref: ITEM_REF } } } },
          },
        },
        '/v1/items:batchUpdate': {
          post: { requestBody: { content: { 'application/json': { schema: { $ref: ITEM_REF } } } } },
        },
      },
      components: {
        schemas: {
          'shop.v1.UpdateItemRequest': {
            type: 'object',
            properties: { itemId: { type: 'string' }, name: { type: 'string' } },
            required: ['itemId', 'name'],
          },
        },
      },
    }
  }

  it('should inline a copy without path-bound fields for that operation only', () => {
    const d = doc()
    stripPathFieldsFromBody(d)

    expect(getPath(d, 'paths', '/v1/items/{item_id}', 'patch', 'requestBody', 'content', 'application/json')).toEqual({
      schema: { type: 'object', properties: { name: { type: 'string' } }, required: ['name'] },
    })
    expect(
      getPath(d, 'paths', '/v1/items:batchUpdate', 'post', 'requestBody', 'content', 'application/json')
    ).toEqual({ schema: { $ref: ITEM_REF } })
    expect(getPath(d, 'components', 'schemas', 'shop.v1.UpdateItemRequest', 'properties')).toEqual({
      itemId: { type: 'string' },
      name: { type: 'string' },
    })
  })

  it('should drop required when nothing is left in it', () => {
    const d = doc()
    const shared = getPath(d, 'components', 'schemas', 'shop.v1.UpdateItemRequest')
    if (shared) shared.required = ['itemId']

    stripPathFieldsFromBody(d)

    const media = getPath(d, 'paths', '/v1/items/{item_id}', 'patch', 'requestBody', 'content', 'application/json')
    expect(media?.schema).toEqual({ type: 'object', properties: { name: { type: 'string' } } })
  })
})

describe('enrichPathParams', () => {
  it('should match paths and names across naming conventions', () => {
    const d: DocumentMap = {
      paths: {
        '/v1/items/{item_id}': { get: { parameters: [{ name: 'item_id', in: 'path', schema: { type: 'string' } }] } },
        '/v1/tags/{slug}': { get: { parameters: [{ name: 'slug', in: 'path', schema: { type: 'string' } }] } },
        '/v1/providers/{provider}': {
          get: { parameters: [{ name: 'provider', in: 'path', schema: { type: 'string' } }] },
        },
        '/v1/modes/{mode}': {
          get: {
            parameters: [{ name: 'mode', in: 'path', schema: { type: 'string', enum: ['MODE_UNSPECIFIED', 'fast'] } }],
          },
        },
      },
    }

    enrichPathParams(
      d,
      [
        { path: '/v1/items/{itemId.value}', params: [{ name: 'itemId.value', uuid: true }] },
        { path: '/v1/tags/{slug}', params: [{ name: 'slug', uuid: false, minLength: 3, maxLength: 40 }] },
        {
          path: '/v1/providers/{provider}',
          params: [{ name: 'provider', uuid: false, enumValues: ['PROVIDER_STRIPE', 'PROVIDER_PAYPAL'] }],
        },
      ],
      new Map([
        ['PROVIDER_STRIPE', 'stripe'],
        ['PROVIDER_PAYPAL', 'paypal'],
      ])
    )

    expect(getPath(d, 'paths', '/v1/items/{item_id}', 'get')?.parameters).toEqual([
      { name: 'item_id', in: 'path', schema: uuidStringSchema(), description: 'Resource UUID' },
    ])
    expect(getPath(d, 'paths', '/v1/tags/{slug}', 'get')?.parameters).toEqual([
      { name: 'slug', in: 'path', schema: { type: 'string', minLength: 3, maxLength: 40 } },
    ])
    expect(getPath(d, 'paths', '/v1/providers/{provider}', 'get')?.parameters).toEqual([
      { name: 'provider', in: 'path', schema: { type: 'string', enum: ['stripe', 'paypal'] } },
    ])
    expect(getPath(d, 'paths', '/v1/modes/{mode}', 'get')?.parameters).toEqual([
      { name: 'mode', in: 'path', schema: { type: 'string', enum: ['fast'] } },
    ])
  })
})
