import { ZodError } from 'zod'
import { GTmetrixError } from '../errors'

export class ConfigValidationError extends GTmetrixError {
  constructor(
    message: string,
    public readonly validationErrors: ZodError['issues'],
  ) {
    super(message)
    this.name = 'ConfigValidationError'
  }

  /**
   * One line per issue, prefixed with the offending key
   */
  getErrorSummary(): string {
    return this.validationErrors
      .map((issue) => {
        const path = issue.path.map(String).join('.')
        return `${path ? `${path}: ` : ''}${issue.message}`
      })
      .join('\n')
  }
}

export class ConfigLoadError extends GTmetrixError {
  constructor(message: string, cause?: unknown) {
    super(message, { cause })
    this.name = 'ConfigLoadError'
  }
}
