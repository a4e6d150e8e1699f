/**
 * Project Config Tests
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest'
import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { PatchError } from '../errors/index.js'
import { loadProjectConfig, parseProjectConfig, projectConfigToPatchConfig } from './index.js'

const CONFIG_YAML = `
error_schema_ref: '#/components/schemas/ApiError'
unimplemented_methods: [Checkout]
public_methods:
  - ItemService.GetItem
servers:
  - url: https://api.example.com
    description: Production
info:
  contact:
    email: api@example.com
  terms_of_service: https://example.com/terms
transforms:
  add_security: false
  annotate_sse: false
`

async function rejection(promise: Promise<unknown>): Promise<PatchError> {
  try {
    await promise
  } catch (err) {
    if (err instanceof PatchError) return err
    throw err
  }
  throw new Error('expected a PatchError')
}

function thrown(fn: () => unknown): PatchError {
  try {
    fn()
  } catch (err) {
    if (err instanceof PatchError) return err
    throw err
  }
  throw new Error('expected a PatchError')
}

describe('parseProjectConfig', () => {
  it('should accept a valid file', () => {
    const config = parseProjectConfig(CONFIG_YAML, 'patch.yaml')
    expect(config.unimplemented_methods).toEqual(['Checkout'])
    expect(config.servers).toEqual([{ url: 'https://api.example.com', description: 'Production' }])
    expect(config.transforms).toEqual({ add_security: false, annotate_sse: false })
  })

  it('should treat an empty file as an empty config', () => {
    expect(parseProjectConfig('', 'patch.yaml')).toEqual({})
  })

  it('should reject unknown keys', () => {
    const err = thrown(() => parseProjectConfig('bogus: 1\n', 'patch.yaml'))
    expect(err.code).toBe('CONFIG_INVALID')
    expect(err.message).toBe("invalid config patch.yaml: (root): Unrecognized key(s) in object: 'bogus'")
  })

  it('should name the failing path', () => {
    const err = thrown(() => parseProjectConfig('transforms:\n  add_security: yes\n', 'patch.yaml'))
    expect(err.message).toBe('invalid config patch.yaml: transforms.add_security: Expected boolean, received string')
  })

  it('should report YAML syntax errors as invalid config', () => {
    const err = thrown(() => parseProjectConfig('servers: [\n', 'patch.yaml'))
    expect(err.code).toBe('CONFIG_INVALID')
  })
})

describe('loadProjectConfig', () => {
  let dir: string

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), 'patch-config-'))
    await writeFile(join(dir, 'patch.yaml'), CONFIG_YAML)
  })

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it('should read the file from disk', async () => {
    const config = await loadProjectConfig(join(dir, 'patch.yaml'))
    expect(config.public_methods).toEqual(['ItemService.GetItem'])
  })

  it('should raise an IO error for a missing file', async () => {
    const err = await rejection(loadProjectConfig(join(dir, 'missing.yaml')))
    expect(err.code).toBe('IO_ERROR')
    expect(err.exitCode).toBe(1)
  })
})

describe('projectConfigToPatchConfig', () => {
  it('should fill defaults from an empty config', () => {
    const config = projectConfigToPatchConfig()
    expect(config.errorSchemaRef).toBe('#/components/schemas/ErrorResponse')
    expect(config.unimplementedMethods).toEqual([])
    expect(config.transforms.addSecurity).toBe(true)
  })

  it('should append method lists and let overrides win', () => {
    const project = parseProjectConfig(CONFIG_YAML, 'patch.yaml')
    const config = projectConfigToPatchConfig(project, {
      unimplementedMethods: ['Refund'],
      errorSchemaRef: '#/components/schemas/Problem',
      transforms: { annotateSse: true, inlineRequestBodies: false },
    })

    expect(config.unimplementedMethods).toEqual(['Checkout', 'Refund'])
    expect(config.publicMethods).toEqual(['ItemService.GetItem'])
    expect(config.errorSchemaRef).toBe('#/components/schemas/Problem')
    expect(config.servers).toEqual([{ url: 'https://api.example.com', description: 'Production' }])
    expect(config.info).toEqual({
      contact: { email: 'api@example.com' },
      license: undefined,
      termsOfService: 'https://example.com/terms',
      externalDocs: undefined,
    })
    expect(config.transforms).toEqual({
      upgradeTo31: true,
      injectServers: true,
      annotateSse: true,
      rewriteCreateResponses: true,
      injectValidation: true,
      annotateFieldAccess: true,
      addSecurity: false,
      flattenUuidRefs: true,
      inlineRequestBodies: false,
      normalizeLineEndings: true,
    })
  })
})
