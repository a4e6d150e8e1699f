/**
 * Error Factories
 *
 * Pre-built helpers for every failure the tool reports.
 */

import { PatchError } from './error.js'

/**
 * Source position inside a text document
 */
export interface SourcePosition {
  line: number
  column: number
}

/**
 * Pre-built error factories for consistent error handling
 *
 * @example
 * ```typescript
 * throw Errors.methodNotFound('GetUser')
 * // Creates: { code: 'METHOD_NOT_FOUND', exitCode: 1, message: "method 'GetUser' not found ..." }
 * ```
 */
export const Errors = {
  /**
   * Descriptor set bytes are malformed
   */
  descriptorDecode(reason: string, cause?: unknown): PatchError {
    return new PatchError('DESCRIPTOR_DECODE', `failed to decode descriptor set: ${reason}`, undefined, {
      cause,
    })
  },

  /**
   * HTTP rule body names a single field
   * @param method - Fully-qualified method the rule belongs to
   * @param selector - The offending body selector
   */
  unsupportedBodySelector(method: string, selector: string): PatchError {
    return new PatchError(
      'UNSUPPORTED_BODY_SELECTOR',
      `unsupported body selector '${selector}' on ${method}; only "*" and "" are supported`,
      { method, selector }
    )
  },

  /**
   * Document text could not be parsed
   */
  documentParse(
    format: 'json' | 'yaml',
    reason: string,
    position?: SourcePosition,
    cause?: unknown
  ): PatchError {
    const where = position ? ` at line ${position.line}, column ${position.column}` : ''
    return new PatchError(
      'DOCUMENT_PARSE',
      `invalid ${format.toUpperCase()}${where}: ${reason}`,
      { format, position },
      { cause }
    )
  },

  /**
   * Document tree could not be serialized
   */
  documentSerialize(format: 'json' | 'yaml', cause: unknown): PatchError {
    return new PatchError(
      'DOCUMENT_SERIALIZE',
      `failed to serialize ${format.toUpperCase()}: ${String(cause)}`,
      { format },
      { cause }
    )
  },

  /**
   * Configured method name is unknown
   */
  methodNotFound(name: string): PatchError {
    return new PatchError(
      'METHOD_NOT_FOUND',
      `method '${name}' not found in proto descriptors; check spelling or verify it has an HTTP annotation`,
      { name }
    )
  },

  /**
   * Bare method name exists in several services
   */
  ambiguousMethodName(name: string, candidates: string[]): PatchError {
    return new PatchError(
      'AMBIGUOUS_METHOD_NAME',
      `ambiguous method name '${name}' matches multiple services: [${candidates.join(', ')}]; use qualified 'Service.Method' syntax to disambiguate`,
      { name, candidates }
    )
  },

  /**
   * Project config failed validation
   * @param issues - One entry per failing path
   */
  configInvalid(path: string, issues: Array<{ path: string; message: string }>): PatchError {
    const message = issues.map((i) => `${i.path || '(root)'}: ${i.message}`).join('; ')
    return new PatchError('CONFIG_INVALID', `invalid config ${path}: ${message}`, { path, issues })
  },

  /**
   * Build template carries no version option
   */
  versionPlaceholderMissing(path: string): PatchError {
    return new PatchError(
      'VERSION_PLACEHOLDER_MISSING',
      `no 'version=' plugin option found in ${path}`,
      { path }
    )
  },

  /**
   * File system failure
   */
  io(action: 'read' | 'write', path: string, cause: unknown): PatchError {
    const reason = cause instanceof Error ? cause.message : String(cause)
    return new PatchError('IO_ERROR', `failed to ${action} ${path}: ${reason}`, { action, path }, {
      cause,
    })
  },

  /**
   * Bad command-line usage
   */
  invalidArgument(message: string): PatchError {
    return new PatchError('INVALID_ARGUMENT', message)
  },
}
