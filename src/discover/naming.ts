/**
 * Naming conversions between proto and document conventions
 */

/**
 * `user_id` -> `userId`. The first character keeps its case.
 */
export function snakeToLowerCamel(name: string): string {
  let result = ''
  let upper = false
  for (const ch of name) {
    if (ch === '_') {
      upper = true
    } else {
      result += upper ? ch.toUpperCase() : ch
      upper = false
    }
  }
  return result
}

/**
 * Camel-case the root segment of a placeholder: `user_id.value` -> `userId.value`
 */
export function placeholderToCamel(placeholder: string): string {
  const dot = placeholder.indexOf('.')
  if (dot === -1) return snakeToLowerCamel(placeholder)
  return `${snakeToLowerCamel(placeholder.slice(0, dot))}${placeholder.slice(dot)}`
}

/**
 * Camel-case every placeholder root in a path template
 *
 * `/v1/users/{user_id.value}` -> `/v1/users/{userId.value}`
 */
export function convertPathTemplateToCamel(path: string): string {
  return path.replace(/\{([^}]+)\}/g, (_, placeholder: string) => `{${placeholderToCamel(placeholder)}}`)
}

/**
 * Whether a document path key denotes the same route as a declared template
 */
export function pathMatchesTemplate(documentPath: string, template: string): boolean {
  return documentPath === template || documentPath === convertPathTemplateToCamel(template)
}

export function operationIdFor(service: string, method: string): string {
  return `${service}_${method}`
}
