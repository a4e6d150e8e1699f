/**
 * PatchError
 *
 * The single error type raised by discovery, resolution and the pipeline.
 */

import { type ErrorCode, getExitCodeForCode } from './codes.js'

export class PatchError extends Error {
  /**
   * Process exit status the CLI uses for this error
   */
  public readonly exitCode: number

  constructor(
    /** String error code (e.g., 'METHOD_NOT_FOUND') */
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: unknown,
    options?: { cause?: unknown }
  ) {
    super(message, options)
    this.name = 'PatchError'
    this.exitCode = getExitCodeForCode(code)
  }

  /**
   * Convert to plain object for serialization
   */
  toJSON(): { code: string; exitCode: number; message: string; details?: unknown } {
    return {
      code: this.code,
      exitCode: this.exitCode,
      message: this.message,
      ...(this.details !== undefined && { details: this.details }),
    }
  }
}

/**
 * Check whether a value is a PatchError, optionally with a given code
 */
export function isPatchError(value: unknown, code?: ErrorCode): value is PatchError {
  return value instanceof PatchError && (code === undefined || value.code === code)
}
