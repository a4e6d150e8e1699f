/**
 * Discovered Metadata Types
 */

import type { HttpVerb } from '../descriptor/index.js'

/**
 * Server-streaming method exposed over HTTP
 */
export interface StreamingOp {
  readonly verb: HttpVerb
  /** Path template as declared on the HTTP rule */
  readonly path: string
}

/**
 * Short method name and the operation id the document uses for it
 */
export interface OperationEntry {
  /** Service name, unqualified */
  readonly service: string
  /** Method name, unqualified */
  readonly method: string
  /** `Service_Method` */
  readonly operationId: string
}

interface ConstraintBase {
  /** Property name in lowerCamelCase */
  readonly field: string
  readonly required: boolean
}

/**
 * Length, pattern and allowed-value rules of a string field
 */
export interface StringConstraint extends ConstraintBase {
  readonly kind: 'string'
  readonly minLength?: number
  readonly maxLength?: number
  readonly pattern?: string
  readonly enumValues: readonly string[]
  readonly uuid: boolean
}

/**
 * Inclusive bounds of an integer field. `signed` records which proto
 * scalar the bounds came from.
 */
export interface NumericConstraint extends ConstraintBase {
  readonly kind: 'numeric'
  readonly signed: boolean
  readonly minimum?: number
  readonly maximum?: number
}

/**
 * Required-only rule (enum `not_in: [0]`, message `required`, or an
 * unsigned range too wide to publish)
 */
export interface PresenceConstraint extends ConstraintBase {
  readonly kind: 'presence'
  readonly uuid: boolean
}

export type FieldConstraint = StringConstraint | NumericConstraint | PresenceConstraint

export interface SchemaConstraints {
  /** Component schema name, e.g. `pkg.v1.CreateUserRequest` */
  readonly schema: string
  readonly fields: readonly FieldConstraint[]
}

/**
 * Stripped values for one enum-typed property of a schema
 */
export interface EnumRewrite {
  readonly schema: string
  readonly field: string
  readonly values: readonly string[]
}

export interface PathParamConstraint {
  /** Placeholder with its root segment in lowerCamelCase, e.g. `userId.value` */
  readonly name: string
  readonly uuid: boolean
  readonly minLength?: number
  readonly maxLength?: number
  /** Declared enum value names, sentinel removed, when the field is an enum */
  readonly enumValues?: readonly string[]
}

export interface PathParams {
  /** Path template with lowerCamelCase placeholders */
  readonly path: string
  readonly params: readonly PathParamConstraint[]
}

/**
 * Everything discovery learns from a descriptor set
 */
export interface ProtoMetadata {
  readonly streamingOps: readonly StreamingOp[]
  readonly operationIds: readonly OperationEntry[]
  readonly fieldConstraints: readonly SchemaConstraints[]
  readonly enumRewrites: readonly EnumRewrite[]
  /** Raw enum value name to its stripped, lowercased form */
  readonly enumValueMap: ReadonlyMap<string, string>
  /** Paths (as declared) whose response carries a `redirect_url` */
  readonly redirectPaths: readonly string[]
  /** Schema name of the UUID wrapper message, if one was found */
  readonly uuidSchema?: string
  readonly pathParamConstraints: readonly PathParams[]
}

/**
 * Build a frozen metadata value, filling absent collections with empty ones
 */
export function createMetadata(partial: Partial<ProtoMetadata> = {}): ProtoMetadata {
  return Object.freeze({
    streamingOps: partial.streamingOps ?? [],
    operationIds: partial.operationIds ?? [],
    fieldConstraints: partial.fieldConstraints ?? [],
    enumRewrites: partial.enumRewrites ?? [],
    enumValueMap: partial.enumValueMap ?? new Map<string, string>(),
    redirectPaths: partial.redirectPaths ?? [],
    ...(partial.uuidSchema !== undefined && { uuidSchema: partial.uuidSchema }),
    pathParamConstraints: partial.pathParamConstraints ?? [],
  })
}
