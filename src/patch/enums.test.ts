/**
 * Enum Rewrite Tests
 */

import { describe, it, expect } from 'vitest'
import { getPath, type DocumentMap } from '../document/index.js'
import { applyEnumRewrites, isEnumSentinel, rewriteInlineEnumValues, stripEnumSentinels } from './enums.js'

function enumDoc(): DocumentMap {
  return {
    paths: {
      '/v1/items': {
        get: {
          parameters: [
            {
              name: 'status',
              in: 'query',
              schema: { type: 'string', enum: ['ITEM_STATUS_UNSPECIFIED', 'ITEM_STATUS_ACTIVE', 'ITEM_STATUS_ARCHIVED'] },
            },
          ],
        },
      },
    },
    components: {
      schemas: {
        'shop.v1.Item': {
          type: 'object',
          properties: {
            status: {
              type: 'string',
              enum: ['ITEM_STATUS_UNSPECIFIED', 'ITEM_STATUS_ACTIVE', 'ITEM_STATUS_ARCHIVED'],
              format: 'enum',
            },
            history: {
              type: 'array',
              items: { type: 'string', enum: ['ITEM_STATUS_UNSPECIFIED', 'ITEM_STATUS_ACTIVE', 'ITEM_STATUS_ARCHIVED'] },
            },
          },
        },
      },
    },
  }
}

const valueMap = new Map([
  ['ITEM_STATUS_UNSPECIFIED', 'unspecified'],
  ['ITEM_STATUS_ACTIVE', 'active'],
  ['ITEM_STATUS_ARCHIVED', 'archived'],
])

describe('isEnumSentinel', () => {
  it('should recognise both spellings of the zero value', () => {
    expect(isEnumSentinel('unspecified')).toBe(true)
    expect(isEnumSentinel('MODE_UNSPECIFIED')).toBe(true)
    expect(isEnumSentinel('mode_unspecified')).toBe(true)
    expect(isEnumSentinel('active')).toBe(false)
    expect(isEnumSentinel(0)).toBe(false)
  })
})

describe('enum rewriting', () => {
  it('should replace targeted arrays including array items', () => {
    const doc = enumDoc()
    applyEnumRewrites(doc, [
      { schema: 'shop.v1.Item', field: 'status', values: ['unspecified', 'active', 'archived'] },
      { schema: 'shop.v1.Item', field: 'history', values: ['unspecified', 'active', 'archived'] },
      { schema: 'shop.v1.Missing', field: 'status', values: ['x'] },
    ])

    const props = getPath(doc, 'components', 'schemas', 'shop.v1.Item', 'properties')
    expect(getPath(props, 'status')?.enum).toEqual(['unspecified', 'active', 'archived'])
    expect(getPath(props, 'history', 'items')?.enum).toEqual(['unspecified', 'active', 'archived'])
  })

  it('should map inline enum values through the value map', () => {
    const doc = enumDoc()
    rewriteInlineEnumValues(doc, valueMap)
    const param = getPath(doc, 'paths', '/v1/items', 'get')?.parameters
    expect(param).toEqual([
      { name: 'status', in: 'query', schema: { type: 'string', enum: ['unspecified', 'active', 'archived'] } },
    ])
  })

  it('should strip sentinels after rewriting', () => {
    const doc = enumDoc()
    rewriteInlineEnumValues(doc, valueMap)
    stripEnumSentinels(doc)

    expect(getPath(doc, 'paths', '/v1/items', 'get')?.parameters).toEqual([
      { name: 'status', in: 'query', schema: { type: 'string', enum: ['active', 'archived'] } },
    ])
    const props = getPath(doc, 'components', 'schemas', 'shop.v1.Item', 'properties')
    expect(getPath(props, 'status')?.enum).toEqual(['active', 'archived'])
    expect(getPath(props, 'history', 'items')?.enum).toEqual(['active', 'archived'])
  })

  it('should strip raw sentinels when nothing was rewritten', () => {
    const doc = enumDoc()
    stripEnumSentinels(doc)
    expect(getPath(doc, 'components', 'schemas', 'shop.v1.Item', 'properties', 'status')?.enum).toEqual([
      'ITEM_STATUS_ACTIVE',
      'ITEM_STATUS_ARCHIVED',
    ])
  })
})
