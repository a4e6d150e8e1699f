/**
 * Command-line argument parsing
 */

import { Errors } from '../errors/index.js'
import type { ConfigOverrides } from '../config/index.js'
import type { TransformToggles } from '../patch/index.js'

export interface PatchCommand {
  command: 'patch'
  descriptor: string
  input: string
  /** stdout when absent */
  output?: string
  config?: string
  overrides: ConfigOverrides
}

export interface DiscoverCommand {
  command: 'discover'
  descriptor: string
}

export interface InjectVersionCommand {
  command: 'inject-version'
  file: string
  /** Package version when absent */
  version?: string
}

export type CliCommand =
  | { command: 'help' }
  | { command: 'version' }
  | PatchCommand
  | DiscoverCommand
  | InjectVersionCommand

const NO_FLAGS = new Map<string, keyof TransformToggles>([
  ['--no-upgrade', 'upgradeTo31'],
  ['--no-sse', 'annotateSse'],
  ['--no-validation', 'injectValidation'],
  ['--no-security', 'addSecurity'],
  ['--no-inline', 'inlineRequestBodies'],
  ['--no-uuid-flatten', 'flattenUuidRefs'],
])

const VALUE_FLAGS = new Map<string, readonly string[]>([
  [
    'patch',
    [
      '--descriptor',
      '--input',
      '--output',
      '--config',
      '--unimplemented',
      '--public',
      '--deprecated',
      '--error-schema-ref',
    ],
  ],
  ['discover', ['--descriptor']],
  ['inject-version', ['--file', '--version']],
])

export const HELP_TEXT = `Usage: proto-openapi-patch <command> [options]

Commands:
  patch            Apply the transform pipeline to an OpenAPI document
  discover         Print the metadata found in a descriptor set
  inject-version   Set the version= plugin option in a build template

patch options:
  --descriptor <file>        Binary FileDescriptorSet (required)
  --input <file>             OpenAPI document, YAML or JSON (required)
  --output <file>            Output file; .json writes JSON (default: stdout)
  --config <file>            Project config file (YAML)
  --unimplemented <a,b>      Methods answered with 501
  --public <a,b>             Methods that need no authentication
  --deprecated <a,b>         Methods to mark deprecated
  --error-schema-ref <ref>   Shared error schema reference
  --no-upgrade               Keep the OpenAPI 3.0 version
  --no-sse                   Skip streaming annotation
  --no-validation            Skip validation constraints
  --no-security              Skip bearer authentication
  --no-inline                Keep request bodies as references
  --no-uuid-flatten          Keep the UUID wrapper schema

discover options:
  --descriptor <file>        Binary FileDescriptorSet (required)

inject-version options:
  --file <file>              Build template to update (required)
  --version <version>        Version to write (default: package version)

Global options:
  -h, --help                 Show this message
  -v, --version              Show the package version
  -d, --debug                Enable debug logging
`

function splitList(value: string): string[] {
  return value
    .split(',')
    .map((part) => part.trim())
    .filter((part) => part !== '')
}

function required(values: Map<string, string>, flag: string, command: string): string {
  const value = values.get(flag)
  if (value === undefined) {
    throw Errors.invalidArgument(`${command}: missing required option ${flag}`)
  }
  return value
}

/**
 * Parse the arguments after the executable name
 *
 * @throws PatchError (INVALID_ARGUMENT)
 */
export function parseArgs(argv: readonly string[]): CliCommand {
  const [command, ...rest] = argv

  if (command === undefined || command === '--help' || command === '-h') return { command: 'help' }
  if (command === '--version' || command === '-v') return { command: 'version' }

  const valueFlags = VALUE_FLAGS.get(command)
  if (valueFlags === undefined) {
    throw Errors.invalidArgument(`unknown command '${command}'; run with --help for usage`)
  }

  const values = new Map<string, string>()
  const disabled: Partial<Record<keyof TransformToggles, boolean>> = {}

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i]

    if (arg === '--help' || arg === '-h') return { command: 'help' }

    const toggle = NO_FLAGS.get(arg)
    if (command === 'patch' && toggle !== undefined) {
      disabled[toggle] = false
      continue
    }

    if (!valueFlags.includes(arg)) {
      throw Errors.invalidArgument(`${command}: unknown option '${arg}'`)
    }
    const value = rest[++i]
    if (value === undefined || value.startsWith('--')) {
      throw Errors.invalidArgument(`${command}: option ${arg} needs a value`)
    }
    values.set(arg, value)
  }

  if (command === 'discover') {
    return { command, descriptor: required(values, '--descriptor', command) }
  }

  if (command === 'inject-version') {
    return { command, file: required(values, '--file', command), version: values.get('--version') }
  }

  const list = (flag: string) => {
    const value = values.get(flag)
    return value === undefined ? undefined : splitList(value)
  }

  return {
    command: 'patch',
    descriptor: required(values, '--descriptor', command),
    input: required(values, '--input', command),
    output: values.get('--output'),
    config: values.get('--config'),
    overrides: {
      unimplementedMethods: list('--unimplemented'),
      publicMethods: list('--public'),
      deprecatedMethods: list('--deprecated'),
      errorSchemaRef: values.get('--error-schema-ref'),
      transforms: disabled,
    },
  }
}
