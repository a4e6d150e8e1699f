/**
 * Shared literals of the transform phases
 */

export const UUID_PATTERN = '^[0-9a-fA-F]{8}-[0-9a-fA-F]{4}-[0-9a-fA-F]{4}-[0-9a-fA-F]{4}-[0-9a-fA-F]{12}$'

export const UUID_EXAMPLE = '550e8400-e29b-41d4-a716-446655440000'

export const DATE_TIME_EXAMPLE = '2026-01-15T09:30:00Z'

export const DURATION_EXAMPLE = '300s'

export const DURATION_DESCRIPTION = `Duration in seconds with 's' suffix (e.g., "300s").`

export const JSON_MEDIA_TYPE = 'application/json'

export const SSE_MEDIA_TYPE = 'text/event-stream'

export const BEARER_SCHEME = 'bearerAuth'
