/**
 * Shop descriptor fixture
 *
 * One package with an item CRUD service, a streaming route, an enum path
 * parameter, a redirecting checkout and a second service that reuses a
 * method name.
 */

import { FieldType, encodeDescriptorSet, type FileInit } from '../../src/descriptor/index.js'

export const UUID_RULE_PATTERN = '^[0-9a-fA-F]{8}-[0-9a-fA-F]{4}-[0-9a-fA-F]{4}-[0-9a-fA-F]{4}-[0-9a-fA-F]{12}$'

const uuidField = (name: string, number: number) => ({
  name,
  number,
  type: FieldType.MESSAGE,
  typeName: '.shop.v1.UUID',
})

export const shopFile: FileInit = {
  name: 'shop/v1/shop.proto',
  package: 'shop.v1',
  enumType: [
    {
      name: 'ItemStatus',
      value: [
        { name: 'ITEM_STATUS_UNSPECIFIED', number: 0 },
        { name: 'ITEM_STATUS_ACTIVE', number: 1 },
        { name: 'ITEM_STATUS_ARCHIVED', number: 2 },
      ],
    },
    {
      name: 'Provider',
      value: [
        { name: 'PROVIDER_UNSPECIFIED', number: 0 },
        { name: 'PROVIDER_GOOGLE', number: 1 },
        { name: 'PROVIDER_GITHUB', number: 2 },
      ],
    },
    {
      name: 'Mode',
      value: [
        { name: 'A', number: 0 },
        { name: 'B', number: 1 },
      ],
    },
  ],
  messageType: [
    {
      name: 'UUID',
      field: [
        {
          name: 'value',
          number: 1,
          type: FieldType.STRING,
          options: { rules: { string: { pattern: UUID_RULE_PATTERN } } },
        },
      ],
    },
    {
      name: 'Item',
      field: [
        uuidField('id', 1),
        { name: 'name', number: 2, type: FieldType.STRING },
        { name: 'status', number: 3, type: FieldType.ENUM, typeName: '.shop.v1.ItemStatus' },
        { name: 'created_at', number: 4, type: FieldType.STRING },
      ],
    },
    {
      name: 'CreateItemRequest',
      field: [
        {
          name: 'name',
          number: 1,
          type: FieldType.STRING,
          options: { rules: { string: { minLen: 1, maxLen: 64 } } },
        },
        {
          name: 'quantity',
          number: 2,
          type: FieldType.INT32,
          options: { rules: { int32: { gte: 1, lt: 1000 } } },
        },
        {
          name: 'status',
          number: 3,
          type: FieldType.ENUM,
          typeName: '.shop.v1.ItemStatus',
          options: { rules: { enum: { notIn: [0] } } },
        },
        {
          ...uuidField('owner_id', 4),
          options: { rules: { message: { required: true } } },
        },
      ],
    },
    { name: 'GetItemRequest', field: [uuidField('item_id', 1)] },
    {
      name: 'UpdateItemRequest',
      field: [
        uuidField('item_id', 1),
        {
          name: 'name',
          number: 2,
          type: FieldType.STRING,
          options: { rules: { string: { maxLen: 64 } } },
        },
      ],
    },
    { name: 'DeleteItemRequest', field: [uuidField('item_id', 1)] },
    { name: 'DeleteItemResponse' },
    { name: 'WatchItemsRequest' },
    {
      name: 'ListByProviderRequest',
      field: [{ name: 'provider', number: 1, type: FieldType.ENUM, typeName: '.shop.v1.Provider' }],
    },
    { name: 'ListByProviderResponse', field: [] },
    { name: 'CheckoutRequest', field: [uuidField('item_id', 1)] },
    { name: 'CheckoutResponse', field: [{ name: 'redirect_url', number: 1, type: FieldType.STRING }] },
    {
      name: 'Envelope',
      nestedType: [
        {
          name: 'Header',
          nestedType: [
            {
              name: 'Meta',
              field: [
                {
                  name: 'trace_id',
                  number: 1,
                  type: FieldType.STRING,
                  options: { rules: { string: { minLen: 8 } } },
                },
              ],
            },
          ],
        },
      ],
    },
  ],
  service: [
    {
      name: 'ItemService',
      method: [
        {
          name: 'CreateItem',
          inputType: '.shop.v1.CreateItemRequest',
          outputType: '.shop.v1.Item',
          options: { http: { post: '/v1/items', body: '*' } },
        },
        {
          name: 'GetItem',
          inputType: '.shop.v1.GetItemRequest',
          outputType: '.shop.v1.Item',
          options: { http: { get: '/v1/items/{item_id.value}' } },
        },
        {
          name: 'UpdateItem',
          inputType: '.shop.v1.UpdateItemRequest',
          outputType: '.shop.v1.Item',
          options: { http: { patch: '/v1/items/{item_id.value}', body: '*' } },
        },
        {
          name: 'DeleteItem',
          inputType: '.shop.v1.DeleteItemRequest',
          outputType: '.shop.v1.DeleteItemResponse',
          options: { http: { delete: '/v1/items/{item_id.value}' } },
        },
        {
          name: 'WatchItems',
          inputType: '.shop.v1.WatchItemsRequest',
          outputType: '.shop.v1.Item',
          serverStreaming: true,
          options: { http: { get: '/v1/items:watch' } },
        },
        {
          name: 'ListByProvider',
          inputType: '.shop.v1.ListByProviderRequest',
          outputType: '.shop.v1.ListByProviderResponse',
          options: { http: { get: '/v1/providers/{provider}' } },
        },
        {
          name: 'Checkout',
          inputType: '.shop.v1.CheckoutRequest',
          outputType: '.shop.v1.CheckoutResponse',
          options: { http: { post: '/v1/checkout', body: '*' } },
        },
        {
          name: 'Reindex',
          inputType: '.shop.v1.WatchItemsRequest',
          outputType: '.shop.v1.WatchItemsRequest',
        },
      ],
    },
    {
      name: 'AdminService',
      method: [
        {
          name: 'GetItem',
          inputType: '.shop.v1.GetItemRequest',
          outputType: '.shop.v1.Item',
          options: { http: { get: '/v1/admin/items/{item_id.value}' } },
        },
      ],
    },
  ],
}

export function shopDescriptorBytes(): Uint8Array {
  return encodeDescriptorSet({ file: [shopFile] })
}
