/**
 * Package version and build-template version injection
 */

import { readFileSync } from 'node:fs'
import { fileURLToPath } from 'node:url'
import { z } from 'zod'
import { Errors } from '../errors/index.js'
import { getArray, isMap, parseYaml, serializeYaml } from '../document/index.js'

const VERSION_PREFIX = 'version='

const packageJsonSchema = z.object({ version: z.string() })

/**
 * Version of this package, read from its package.json
 */
export function packageVersion(): string {
  const path = fileURLToPath(new URL('../../package.json', import.meta.url))
  let text: string
  try {
    text = readFileSync(path, 'utf8')
  } catch (err) {
    throw Errors.io('read', path, err)
  }
  return packageJsonSchema.parse(JSON.parse(text)).version
}

/**
 * Replace every `version=` plugin option of a build template
 *
 * `opt` may be a single string or a list of strings.
 *
 * @param source - File name used in error messages
 * @throws PatchError (DOCUMENT_PARSE, VERSION_PLACEHOLDER_MISSING)
 */
export function injectVersion(text: string, version: string, source = 'buf.gen.yaml'): string {
  const doc = parseYaml(text)
  const replacement = `${VERSION_PREFIX}${version}`
  let replaced = 0

  for (const plugin of getArray(doc, 'plugins') ?? []) {
    if (!isMap(plugin)) continue

    const opt = plugin.opt
    if (typeof opt === 'string' && opt.startsWith(VERSION_PREFIX)) {
      plugin.opt = replacement
      replaced++
    } else if (Array.isArray(opt)) {
      plugin.opt = opt.map((entry) => {
        if (typeof entry !== 'string' || !entry.startsWith(VERSION_PREFIX)) return entry
        replaced++
        return replacement
      })
    }
  }

  if (replaced === 0) {
    throw Errors.versionPlaceholderMissing(source)
  }
  return serializeYaml(doc)
}
