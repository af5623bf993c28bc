import { z } from 'zod'

export const DEFAULT_BASE_URL = 'https://gtmetrix.com/api/2.0/'
export const DEFAULT_POLL_INTERVAL = 3000
export const DEFAULT_RATE_LIMIT_RETRIES = 10

// Resolved client configuration
export const ClientConfigSchema = z.object({
  apiKey: z.string().min(1, 'API key is required'),
  baseUrl: z.string().url('Must be a valid URL').default(DEFAULT_BASE_URL),
  pollInterval: z.number().int().positive().default(DEFAULT_POLL_INTERVAL), // ms between status polls
  rateLimitRetries: z.number().int().nonnegative().default(DEFAULT_RATE_LIMIT_RETRIES),
  timeout: z.number().int().positive().optional(), // upper bound for waiting on a test, in ms
})

export type ClientConfig = z.infer<typeof ClientConfigSchema>
