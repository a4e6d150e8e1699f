/**
 * Method-Name Resolver Tests
 */

import { describe, it, expect } from 'vitest'
import { resolveMethodName, resolveMethodNames } from './index.js'
import { PatchError } from '../errors/index.js'
import type { OperationEntry } from '../discover/index.js'

const operations: OperationEntry[] = [
  { service: 'UserService', method: 'GetUser', operationId: 'UserService_GetUser' },
  { service: 'UserService', method: 'List', operationId: 'UserService_List' },
  { service: 'TeamService', method: 'List', operationId: 'TeamService_List' },
]

function catchError(fn: () => unknown): PatchError {
  try {
    fn()
  } catch (err) {
    if (err instanceof PatchError) return err
    throw err
  }
  throw new Error('expected a PatchError')
}

describe('resolveMethodName', () => {
  it('should resolve a unique bare name', () => {
    expect(resolveMethodName('GetUser', operations)).toBe('UserService_GetUser')
  })

  it('should resolve a qualified name exactly', () => {
    expect(resolveMethodName('TeamService.List', operations)).toBe('TeamService_List')
  })

  it('should report unknown qualified names', () => {
    const err = catchError(() => resolveMethodName('TeamService.GetUser', operations))
    expect(err.code).toBe('METHOD_NOT_FOUND')
    expect(err.details).toEqual({ name: 'TeamService.GetUser' })
  })

  it('should report unknown bare names', () => {
    expect(catchError(() => resolveMethodName('Delete', operations)).code).toBe('METHOD_NOT_FOUND')
  })

  it('should list every candidate of an ambiguous name', () => {
    const err = catchError(() => resolveMethodName('List', operations))
    expect(err.code).toBe('AMBIGUOUS_METHOD_NAME')
    expect(err.details).toEqual({ name: 'List', candidates: ['UserService.List', 'TeamService.List'] })
    expect(err.message).toContain("use qualified 'Service.Method' syntax")
  })
})

describe('resolveMethodNames', () => {
  it('should keep input order', () => {
    expect(resolveMethodNames(['UserService.List', 'GetUser'], operations)).toEqual([
      'UserService_List',
      'UserService_GetUser',
    ])
  })

  it('should fail on the first bad name', () => {
    expect(() => resolveMethodNames(['GetUser', 'Nope'], operations)).toThrow("method 'Nope' not found")
  })

  it('should accept an empty list', () => {
    expect(resolveMethodNames([], operations)).toEqual([])
  })
})
