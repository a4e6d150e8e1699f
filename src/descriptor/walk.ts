/**
 * Descriptor traversal
 */

import type { DescriptorSet, EnumDescriptor, FieldDescriptor, FileDescriptor, MessageDescriptor } from './types.js'

export interface MessageEntry {
  readonly message: MessageDescriptor
  /** Dotted name without leading dot, e.g. `pkg.Outer.Inner` */
  readonly fullName: string
  readonly file: FileDescriptor
}

export interface EnumEntry {
  readonly enumType: EnumDescriptor
  /** Dotted name without leading dot, e.g. `pkg.Outer.Status` */
  readonly fullName: string
  readonly file: FileDescriptor
  /** True for enums declared at file level */
  readonly topLevel: boolean
}

function qualify(scope: string, name: string): string {
  return scope ? `${scope}.${name}` : name
}

/**
 * Every message of a file, depth first, nested messages at any depth included
 */
export function* walkMessages(file: FileDescriptor): Generator<MessageEntry> {
  function* visit(messages: readonly MessageDescriptor[], scope: string): Generator<MessageEntry> {
    for (const message of messages) {
      const fullName = qualify(scope, message.name)
      yield { message, fullName, file }
      yield* visit(message.nestedType, fullName)
    }
  }
  yield* visit(file.messageType, file.package)
}

/**
 * Every enum of a file: file-level enums first, then enums nested in messages
 */
export function* walkEnums(file: FileDescriptor): Generator<EnumEntry> {
  for (const enumType of file.enumType) {
    yield { enumType, fullName: qualify(file.package, enumType.name), file, topLevel: true }
  }
  for (const { message, fullName } of walkMessages(file)) {
    for (const enumType of message.enumType) {
      yield { enumType, fullName: qualify(fullName, enumType.name), file, topLevel: false }
    }
  }
}

/**
 * Index of fully-qualified message name (with leading dot) to its fields
 */
export function buildMessageIndex(set: DescriptorSet): Map<string, readonly FieldDescriptor[]> {
  const index = new Map<string, readonly FieldDescriptor[]>()
  for (const file of set.file) {
    for (const { message, fullName } of walkMessages(file)) {
      index.set(`.${fullName}`, message.field)
    }
  }
  return index
}
