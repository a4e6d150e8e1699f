/**
 * Project Config Schema
 *
 * zod schema for the YAML project file. Keys are snake_case and unknown
 * keys are rejected at every level.
 */

import { z } from 'zod'

const methodList = z.array(z.string().min(1))

export const plainTextEndpointSchema = z
  .object({
    path: z.string().startsWith('/'),
    example: z.string().optional(),
  })
  .strict()

export const serverSchema = z
  .object({
    url: z.string().min(1),
    description: z.string().optional(),
  })
  .strict()

export const infoSchema = z
  .object({
    contact: z
      .object({
        name: z.string().optional(),
        email: z.string().optional(),
        url: z.string().optional(),
      })
      .strict()
      .optional(),
    license: z
      .object({
        name: z.string(),
        url: z.string().optional(),
      })
      .strict()
      .optional(),
    terms_of_service: z.string().optional(),
    external_docs: z
      .object({
        url: z.string(),
        description: z.string().optional(),
      })
      .strict()
      .optional(),
  })
  .strict()

export const transformsSchema = z
  .object({
    upgrade_to_3_1: z.boolean().optional(),
    inject_servers: z.boolean().optional(),
    annotate_sse: z.boolean().optional(),
    rewrite_create_responses: z.boolean().optional(),
    inject_validation: z.boolean().optional(),
    annotate_field_access: z.boolean().optional(),
    add_security: z.boolean().optional(),
    flatten_uuid_refs: z.boolean().optional(),
    inline_request_bodies: z.boolean().optional(),
    normalize_line_endings: z.boolean().optional(),
  })
  .strict()

export const projectConfigSchema = z
  .object({
    error_schema_ref: z.string().startsWith('#/').optional(),
    bearer_description: z.string().optional(),
    unimplemented_methods: methodList.optional(),
    public_methods: methodList.optional(),
    deprecated_methods: methodList.optional(),
    plain_text_endpoints: z.array(plainTextEndpointSchema).optional(),
    metrics_path: z.string().startsWith('/').optional(),
    readiness_path: z.string().startsWith('/').optional(),
    servers: z.array(serverSchema).optional(),
    info: infoSchema.optional(),
    write_only_fields: z.array(z.string()).optional(),
    read_only_fields: z.array(z.string()).optional(),
    transforms: transformsSchema.optional(),
  })
  .strict()

export type ProjectConfig = z.infer<typeof projectConfigSchema>
export type ProjectTransforms = z.infer<typeof transformsSchema>
