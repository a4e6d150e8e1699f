/**
 * Error Module
 *
 * Error type, factories and error code definitions.
 */

export { Errors, type SourcePosition } from './factories.js'
export { PatchError, isPatchError } from './error.js'

export {
  ErrorCodes,
  type ErrorCode,
  type ErrorCodeDef,
  getErrorCode,
  getExitCodeForCode,
} from './codes.js'
