#!/usr/bin/env node
/**
 * proto-openapi-patch CLI
 *
 * Usage:
 *   proto-openapi-patch patch --descriptor api.pb --input openapi.yaml --output openapi.yaml
 *   proto-openapi-patch discover --descriptor api.pb
 *   proto-openapi-patch inject-version --file buf.gen.yaml --version 1.2.0
 *   proto-openapi-patch --debug patch ...   # Enable debug logging
 */

import { realpathSync } from 'node:fs'
import { pathToFileURL } from 'node:url'
import { PatchError } from '../errors/index.js'
import { setLogLevel } from '../utils/logger.js'
import { HELP_TEXT, parseArgs, type CliCommand } from './args.js'
import { runDiscover, runInjectVersion, runPatch } from './commands.js'
import { packageVersion } from './version.js'

export { parseArgs, HELP_TEXT, type CliCommand } from './args.js'
export { runDiscover, runInjectVersion, runPatch } from './commands.js'
export { injectVersion, packageVersion } from './version.js'

/**
 * Run one parsed command, returning the text meant for stdout
 */
export async function runCommand(cmd: CliCommand): Promise<string | undefined> {
  switch (cmd.command) {
    case 'help':
      return HELP_TEXT
    case 'version':
      return `${packageVersion()}\n`
    case 'patch':
      return runPatch(cmd)
    case 'discover':
      return runDiscover(cmd)
    case 'inject-version':
      return runInjectVersion(cmd)
  }
}

/**
 * Parse arguments, run the command, and map failures to an exit status
 */
export async function main(argv: readonly string[]): Promise<number> {
  if (argv.some(isDebugFlag)) setLogLevel('debug')
  try {
    const output = await runCommand(parseArgs(argv.filter((arg) => !isDebugFlag(arg))))
    if (output !== undefined) process.stdout.write(output)
    return 0
  } catch (err) {
    if (err instanceof PatchError) {
      process.stderr.write(`error: ${err.message}\n`)
      return err.exitCode
    }
    throw err
  }
}

function isDebugFlag(arg: string): boolean {
  return arg === '--debug' || arg === '-d'
}

function isEntryPoint(): boolean {
  const entry = process.argv[1]
  if (entry === undefined) return false
  try {
    return import.meta.url === pathToFileURL(realpathSync(entry)).href
  } catch {
    return false
  }
}

if (isEntryPoint()) {
  main(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code
    },
    (err: unknown) => {
      process.stderr.write(`error: ${err instanceof Error ? err.message : String(err)}\n`)
      process.exitCode = 1
    }
  )
}
