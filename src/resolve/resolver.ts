/**
 * Method-name resolution
 *
 * Maps user-supplied method names to the operation ids used in the
 * document. `Service.Method` matches exactly; a bare `Method` must be
 * unique across all services.
 */

import { Errors } from '../errors/index.js'
import { operationIdFor, type OperationEntry } from '../discover/index.js'

/**
 * Resolve one method name to its operation id
 *
 * @throws PatchError (METHOD_NOT_FOUND, AMBIGUOUS_METHOD_NAME)
 */
export function resolveMethodName(name: string, operations: readonly OperationEntry[]): string {
  const dot = name.indexOf('.')
  if (dot !== -1) {
    const operationId = operationIdFor(name.slice(0, dot), name.slice(dot + 1))
    if (operations.some((op) => op.operationId === operationId)) {
      return operationId
    }
    throw Errors.methodNotFound(name)
  }

  const matches = operations.filter((op) => op.method === name)
  if (matches.length === 0) {
    throw Errors.methodNotFound(name)
  }
  if (matches.length > 1) {
    throw Errors.ambiguousMethodName(
      name,
      matches.map((op) => `${op.service}.${op.method}`)
    )
  }
  return matches[0].operationId
}

/**
 * Resolve a list of method names, failing on the first bad one
 */
export function resolveMethodNames(names: readonly string[], operations: readonly OperationEntry[]): string[] {
  return names.map((name) => resolveMethodName(name, operations))
}
