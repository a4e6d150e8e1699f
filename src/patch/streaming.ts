/**
 * Phase 2: server-sent event annotation
 */

import {
  getJsonSchema,
  getPath,
  getRef,
  getString,
  isMap,
  listOperations,
  type DocumentMap,
} from '../document/index.js'
import { pathMatchesTemplate, type StreamingOp } from '../discover/index.js'
import { JSON_MEDIA_TYPE, SSE_MEDIA_TYPE } from './constants.js'

export const SSE_DESCRIPTION_PREFIX = '**Streaming (SSE):**'

const LAST_EVENT_ID = 'Last-Event-ID'

function lastEventIdParameter(): DocumentMap {
  return {
    name: LAST_EVENT_ID,
    in: 'header',
    required: false,
    description:
      'Reconnection cursor from the last received SSE event. When set, the server resumes the stream from this point.',
    schema: { type: 'string' },
  }
}

/**
 * Whether the 200 response schema references a `*Stream*` message
 */
function hasStreamResponse(operation: DocumentMap): boolean {
  const ref = getRef(getJsonSchema(getPath(operation, 'responses', '200')))
  return ref !== undefined && ref.toLowerCase().includes('stream')
}

/**
 * Rewrite one operation as an SSE endpoint
 */
export function markStreaming(operation: DocumentMap): void {
  operation['x-streaming'] = 'sse'
  operation['x-content-type'] = SSE_MEDIA_TYPE

  const content = getPath(operation, 'responses', '200', 'content')
  if (content && content[JSON_MEDIA_TYPE] !== undefined) {
    content[SSE_MEDIA_TYPE] = content[JSON_MEDIA_TYPE]
    delete content[JSON_MEDIA_TYPE]
  }

  const description = getString(operation, 'description')
  if (!description?.startsWith(SSE_DESCRIPTION_PREFIX)) {
    operation.description = `${SSE_DESCRIPTION_PREFIX} ${description ?? 'Server-sent events stream.'}`
  }

  const parameters = Array.isArray(operation.parameters) ? operation.parameters : []
  const hasLastEventId = parameters.some((p) => isMap(p) && p.name === LAST_EVENT_ID)
  if (!hasLastEventId) {
    operation.parameters = [...parameters, lastEventIdParameter()]
  }
}

/**
 * Annotate every streaming operation
 *
 * An operation streams when its method and path match a discovered
 * server-streaming binding, or when its 200 response references a schema
 * whose name contains "stream".
 */
export function annotateStreaming(doc: DocumentMap, streamingOps: readonly StreamingOp[]): void {
  for (const { path, method, operation } of listOperations(doc)) {
    const discovered = streamingOps.some(
      (op) => op.verb.toLowerCase() === method && pathMatchesTemplate(path, op.path)
    )
    if (discovered || hasStreamResponse(operation)) {
      markStreaming(operation)
    }
  }
}
