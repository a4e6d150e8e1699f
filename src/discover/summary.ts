/**
 * Human-readable metadata report
 */

import type { FieldConstraint, ProtoMetadata } from './types.js'

function describeConstraint(c: FieldConstraint): string {
  const parts: string[] = [c.kind]
  if (c.required) parts.push('required')
  switch (c.kind) {
    case 'string':
      if (c.minLength !== undefined) parts.push(`minLength=${c.minLength}`)
      if (c.maxLength !== undefined) parts.push(`maxLength=${c.maxLength}`)
      if (c.pattern !== undefined) parts.push(`pattern=${c.pattern}`)
      if (c.enumValues.length > 0) parts.push(`in=[${c.enumValues.join(', ')}]`)
      if (c.uuid) parts.push('uuid')
      break
    case 'numeric':
      parts.push(c.signed ? 'signed' : 'unsigned')
      if (c.minimum !== undefined) parts.push(`minimum=${c.minimum}`)
      if (c.maximum !== undefined) parts.push(`maximum=${c.maximum}`)
      break
    case 'presence':
      if (c.uuid) parts.push('uuid')
      break
  }
  return `${c.field}: ${parts.join(' ')}`
}

/**
 * Render discovered metadata as indented text, one line per entry
 */
export function summarizeMetadata(metadata: ProtoMetadata): string {
  const lines: string[] = []

  lines.push(`Streaming operations (${metadata.streamingOps.length}):`)
  for (const op of metadata.streamingOps) {
    lines.push(`  ${op.verb} ${op.path}`)
  }

  lines.push(`Operation ids (${metadata.operationIds.length}):`)
  for (const entry of metadata.operationIds) {
    lines.push(`  ${entry.service}.${entry.method} -> ${entry.operationId}`)
  }

  lines.push(`Field constraints (${metadata.fieldConstraints.length} schemas):`)
  for (const schema of metadata.fieldConstraints) {
    lines.push(`  ${schema.schema}`)
    for (const field of schema.fields) {
      lines.push(`    ${describeConstraint(field)}`)
    }
  }

  lines.push(`Enum rewrites (${metadata.enumRewrites.length}):`)
  for (const rewrite of metadata.enumRewrites) {
    lines.push(`  ${rewrite.schema}.${rewrite.field}: [${rewrite.values.join(', ')}]`)
  }

  lines.push(`Redirect paths (${metadata.redirectPaths.length}):`)
  for (const path of metadata.redirectPaths) {
    lines.push(`  ${path}`)
  }

  lines.push(`UUID schema: ${metadata.uuidSchema ?? '(none)'}`)

  lines.push(`Path parameters (${metadata.pathParamConstraints.length}):`)
  for (const entry of metadata.pathParamConstraints) {
    lines.push(`  ${entry.path}`)
    for (const param of entry.params) {
      const parts: string[] = []
      if (param.uuid) parts.push('uuid')
      if (param.minLength !== undefined) parts.push(`minLength=${param.minLength}`)
      if (param.maxLength !== undefined) parts.push(`maxLength=${param.maxLength}`)
      if (param.enumValues) parts.push(`enum=[${param.enumValues.join(', ')}]`)
      lines.push(`    ${param.name}${parts.length > 0 ? `: ${parts.join(' ')}` : ''}`)
    }
  }

  return `${lines.join('\n')}\n`
}
