/**
 * Error Codes
 *
 * Central definition of every error the tool can raise, with a string
 * identifier and the process exit status the CLI reports for it.
 *
 * Exit Status Ranges:
 * - 1: Input or processing failure (bad descriptor, document, config)
 * - 2: Usage error (bad command-line arguments)
 */

/**
 * Error code definition with string identifier and exit status
 */
export interface ErrorCodeDef {
  /** String identifier (e.g., 'METHOD_NOT_FOUND') */
  code: string
  /** Process exit status */
  exitCode: number
  /** Default message */
  message: string
}

/**
 * All error codes
 */
export const ErrorCodes = {
  // ─────────────────────────────────────────────────────────────
  // Input decoding
  // ─────────────────────────────────────────────────────────────

  /** Descriptor set bytes could not be decoded */
  DESCRIPTOR_DECODE: {
    code: 'DESCRIPTOR_DECODE',
    exitCode: 1,
    message: 'Failed to decode descriptor set',
  },

  /** HTTP rule selects a single field as the request body */
  UNSUPPORTED_BODY_SELECTOR: {
    code: 'UNSUPPORTED_BODY_SELECTOR',
    exitCode: 1,
    message: 'Unsupported body selector',
  },

  /** API document is not valid YAML or JSON */
  DOCUMENT_PARSE: {
    code: 'DOCUMENT_PARSE',
    exitCode: 1,
    message: 'Failed to parse document',
  },

  /** API document could not be written back to text */
  DOCUMENT_SERIALIZE: {
    code: 'DOCUMENT_SERIALIZE',
    exitCode: 1,
    message: 'Failed to serialize document',
  },

  // ─────────────────────────────────────────────────────────────
  // Configuration
  // ─────────────────────────────────────────────────────────────

  /** Configured method name matches no operation */
  METHOD_NOT_FOUND: {
    code: 'METHOD_NOT_FOUND',
    exitCode: 1,
    message: 'Method not found',
  },

  /** Bare method name matches operations in several services */
  AMBIGUOUS_METHOD_NAME: {
    code: 'AMBIGUOUS_METHOD_NAME',
    exitCode: 1,
    message: 'Ambiguous method name',
  },

  /** Project config file failed validation */
  CONFIG_INVALID: {
    code: 'CONFIG_INVALID',
    exitCode: 1,
    message: 'Invalid configuration',
  },

  /** Build template has nothing to replace */
  VERSION_PLACEHOLDER_MISSING: {
    code: 'VERSION_PLACEHOLDER_MISSING',
    exitCode: 1,
    message: 'No version placeholder found',
  },

  // ─────────────────────────────────────────────────────────────
  // Environment
  // ─────────────────────────────────────────────────────────────

  /** File could not be read or written */
  IO_ERROR: {
    code: 'IO_ERROR',
    exitCode: 1,
    message: 'I/O error',
  },

  /** Bad command-line usage */
  INVALID_ARGUMENT: {
    code: 'INVALID_ARGUMENT',
    exitCode: 2,
    message: 'Invalid argument',
  },
} as const satisfies Record<string, ErrorCodeDef>

/**
 * Error code type (string union)
 */
export type ErrorCode = keyof typeof ErrorCodes

function isErrorCode(code: string): code is ErrorCode {
  return Object.prototype.hasOwnProperty.call(ErrorCodes, code)
}

/**
 * Get error code definition by string code
 */
export function getErrorCode(code: string): ErrorCodeDef {
  if (isErrorCode(code)) {
    return ErrorCodes[code]
  }

  return {
    code,
    exitCode: 1,
    message: code,
  }
}

/**
 * Get the exit status for a string code
 */
export function getExitCodeForCode(code: string): number {
  return getErrorCode(code).exitCode
}
