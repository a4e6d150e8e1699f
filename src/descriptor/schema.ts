/**
 * Wire schema for compiled descriptor sets
 *
 * A trimmed copy of `descriptor.proto` that keeps only the fields discovery
 * reads. The HTTP rule on method options (field 72295728) and the
 * validation rules on field options (field 1071) are declared as plain
 * fields so their payloads survive decoding instead of being skipped as
 * unknown extensions.
 */

import protobuf from 'protobufjs'

const optional = (type: string, id: number) => ({ type, id })
const repeated = (type: string, id: number) => ({ rule: 'repeated', type, id })

const boundRules = (scalar: string) => ({
  fields: {
    lt: optional(scalar, 2),
    lte: optional(scalar, 3),
    gt: optional(scalar, 4),
    gte: optional(scalar, 5),
  },
})

export const DESCRIPTOR_SCHEMA = {
  nested: {
    FileDescriptorSet: {
      fields: {
        file: repeated('FileDescriptorProto', 1),
      },
    },
    FileDescriptorProto: {
      fields: {
        name: optional('string', 1),
        package: optional('string', 2),
        messageType: repeated('DescriptorProto', 4),
        enumType: repeated('EnumDescriptorProto', 5),
        service: repeated('ServiceDescriptorProto', 6),
      },
    },
    DescriptorProto: {
      fields: {
        name: optional('string', 1),
        field: repeated('FieldDescriptorProto', 2),
        nestedType: repeated('DescriptorProto', 3),
        enumType: repeated('EnumDescriptorProto', 4),
      },
    },
    FieldDescriptorProto: {
      fields: {
        name: optional('string', 1),
        number: optional('int32', 3),
        label: optional('int32', 4),
        type: optional('int32', 5),
        typeName: optional('string', 6),
        options: optional('FieldOptions', 8),
      },
    },
    FieldOptions: {
      fields: {
        rules: optional('FieldRules', 1071),
      },
    },
    FieldRules: {
      fields: {
        int32: optional('Int32Rules', 3),
        uint32: optional('UInt32Rules', 5),
        uint64: optional('UInt64Rules', 6),
        string: optional('StringRules', 14),
        enum: optional('EnumRules', 16),
        message: optional('MessageRules', 17),
      },
    },
    MessageRules: {
      fields: {
        required: optional('bool', 2),
      },
    },
    StringRules: {
      fields: {
        minLen: optional('uint64', 2),
        maxLen: optional('uint64', 3),
        pattern: optional('string', 6),
        in: repeated('string', 10),
        uuid: optional('bool', 22),
      },
    },
    Int32Rules: boundRules('int32'),
    UInt32Rules: boundRules('uint32'),
    UInt64Rules: boundRules('uint64'),
    EnumRules: {
      fields: {
        notIn: repeated('int32', 4),
      },
    },
    EnumDescriptorProto: {
      fields: {
        name: optional('string', 1),
        value: repeated('EnumValueDescriptorProto', 2),
      },
    },
    EnumValueDescriptorProto: {
      fields: {
        name: optional('string', 1),
        number: optional('int32', 2),
      },
    },
    ServiceDescriptorProto: {
      fields: {
        name: optional('string', 1),
        method: repeated('MethodDescriptorProto', 2),
      },
    },
    MethodDescriptorProto: {
      fields: {
        name: optional('string', 1),
        inputType: optional('string', 2),
        outputType: optional('string', 3),
        options: optional('MethodOptions', 4),
        clientStreaming: optional('bool', 5),
        serverStreaming: optional('bool', 6),
      },
    },
    MethodOptions: {
      fields: {
        http: optional('HttpRule', 72295728),
      },
    },
    HttpRule: {
      oneofs: {
        pattern: { oneof: ['get', 'put', 'post', 'delete', 'patch'] },
      },
      fields: {
        selector: optional('string', 1),
        get: optional('string', 2),
        put: optional('string', 3),
        post: optional('string', 4),
        delete: optional('string', 5),
        patch: optional('string', 6),
        body: optional('string', 7),
        additionalBindings: repeated('HttpRule', 11),
      },
    },
  },
}

const root = protobuf.Root.fromJSON(DESCRIPTOR_SCHEMA)

/**
 * Message type used to decode and encode descriptor sets
 */
export const FileDescriptorSetType = root.lookupType('FileDescriptorSet')
