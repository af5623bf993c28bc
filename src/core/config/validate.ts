import { ZodError } from 'zod'
import { ClientConfig, ClientConfigSchema } from '../types'
import { ConfigValidationError } from './errors'

/**
 * Validates a raw configuration object and applies defaults
 * @throws ConfigValidationError if validation fails
 */
export default function validateConfig(config: unknown): ClientConfig {
  try {
    return ClientConfigSchema.parse(config)
  } catch (error) {
    if (error instanceof ZodError) {
      throw new ConfigValidationError('Client configuration is invalid', error.issues)
    }
    throw error
  }
}
