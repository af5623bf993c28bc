import { z } from 'zod'
import { JsonObjectSchema, JsonValueSchema } from './json'

// Error object as returned in the `errors` array of a failed response
export const ApiErrorObjectSchema = z
  .object({
    status: z.string().optional(),
    code: z.string().optional(),
    title: z.string().optional(),
    detail: z.string().optional(),
  })
  .passthrough()

export type ApiErrorObject = z.infer<typeof ApiErrorObjectSchema>

export const ApiErrorDocumentSchema = z.object({
  errors: z.array(ApiErrorObjectSchema).min(1),
})

// Every successful response wraps its payload in `data`
export const ApiDocumentSchema = z.object({
  data: JsonValueSchema,
})

export type ApiDocument = z.infer<typeof ApiDocumentSchema>

// Members other than these are kept as the API sent them
const ResourceObjectSchema = z
  .object({
    id: z.string().min(1),
    type: z.string(),
    attributes: JsonObjectSchema,
    links: JsonObjectSchema.optional(),
  })
  .catchall(JsonValueSchema)

export const TestResourceSchema = ResourceObjectSchema.extend({
  type: z.literal('test'),
})

export type TestResource = z.infer<typeof TestResourceSchema>

export const ReportResourceSchema = ResourceObjectSchema.extend({
  type: z.literal('report'),
  links: JsonObjectSchema,
})

export type ReportResource = z.infer<typeof ReportResourceSchema>

export const UserResourceSchema = ResourceObjectSchema.extend({
  type: z.literal('user'),
  attributes: z
    .object({
      api_credits: z.number(),
      api_refill: z.number(),
    })
    .catchall(JsonValueSchema),
})

export type UserResource = z.infer<typeof UserResourceSchema>
export type UserAttributes = UserResource['attributes']

export const TestResourceListSchema = z.array(TestResourceSchema)

/**
 * States reported by the API for a test. `unknown` is local only: the test
 * id is known but nothing has been fetched yet.
 */
export const KNOWN_TEST_STATES = ['unknown', 'queued', 'started', 'completed', 'error'] as const

export type KnownTestState = (typeof KNOWN_TEST_STATES)[number]

// The server is the source of truth, so unexpected states are kept verbatim
export type TestState = KnownTestState | (string & {})

export const TERMINAL_TEST_STATES: readonly TestState[] = ['completed', 'error']

export function isTerminalState(state: TestState): boolean {
  return TERMINAL_TEST_STATES.includes(state)
}
