/**
 * CLI commands
 *
 * Each command reads its inputs, runs to completion, and only then writes.
 * A command returns the text meant for stdout, if any.
 */

import { readFile, writeFile } from 'node:fs/promises'
import { loadProjectConfig, projectConfigToPatchConfig } from '../config/index.js'
import { discover, summarizeMetadata } from '../discover/index.js'
import { detectFormatFromPath } from '../document/index.js'
import { Errors } from '../errors/index.js'
import { patch } from '../patch/index.js'
import { createLogger } from '../utils/logger.js'
import type { DiscoverCommand, InjectVersionCommand, PatchCommand } from './args.js'
import { injectVersion, packageVersion } from './version.js'

const logger = createLogger('cli')

async function readBytes(path: string): Promise<Uint8Array> {
  try {
    return new Uint8Array(await readFile(path))
  } catch (err) {
    throw Errors.io('read', path, err)
  }
}

async function readText(path: string): Promise<string> {
  try {
    return await readFile(path, 'utf8')
  } catch (err) {
    throw Errors.io('read', path, err)
  }
}

async function writeText(path: string, text: string): Promise<void> {
  try {
    await writeFile(path, text, 'utf8')
  } catch (err) {
    throw Errors.io('write', path, err)
  }
}

/**
 * Discover metadata and run the transform pipeline over one document
 */
export async function runPatch(cmd: PatchCommand): Promise<string | undefined> {
  const metadata = discover(await readBytes(cmd.descriptor))
  const project = cmd.config !== undefined ? await loadProjectConfig(cmd.config) : {}
  const config = projectConfigToPatchConfig(project, cmd.overrides)

  const input = await readText(cmd.input)
  const output = patch(input, metadata, config, {
    outputFormat: cmd.output !== undefined ? detectFormatFromPath(cmd.output) : undefined,
  })

  if (cmd.output === undefined) return output

  await writeText(cmd.output, output)
  logger.info(
    { input: cmd.input, output: cmd.output, operations: metadata.operationIds.length },
    'Wrote patched document'
  )
  return undefined
}

/**
 * Summarize the metadata of a descriptor set
 */
export async function runDiscover(cmd: DiscoverCommand): Promise<string> {
  return summarizeMetadata(discover(await readBytes(cmd.descriptor)))
}

/**
 * Rewrite the version option of a build template in place
 */
export async function runInjectVersion(cmd: InjectVersionCommand): Promise<undefined> {
  const version = cmd.version ?? packageVersion()
  const updated = injectVersion(await readText(cmd.file), version, cmd.file)
  await writeText(cmd.file, updated)
  logger.info({ file: cmd.file, version }, 'Injected version')
  return undefined
}
