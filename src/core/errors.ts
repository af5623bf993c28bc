import type { ApiErrorObject, JsonValue, TestState } from './types'

/**
 * Base class for every error raised by the client
 */
export class GTmetrixError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'GTmetrixError'
  }
}

/**
 * The request never produced an HTTP response (DNS, TCP, TLS, abort)
 */
export class ConnectionError extends GTmetrixError {
  constructor(
    message: string,
    public readonly url: string,
    cause: unknown,
  ) {
    super(message, { cause })
    this.name = 'ConnectionError'
  }
}

/**
 * The API answered with a status of 400 or above
 */
export class RequestError extends GTmetrixError {
  constructor(
    public readonly status: number,
    public readonly errors: ApiErrorObject[],
    public readonly url: string,
  ) {
    super(describeErrors(status, errors))
    this.name = 'RequestError'
  }

  /** API error code of the first error, e.g. `E42901` */
  get code(): string | undefined {
    return this.errors[0]?.code
  }
}

/**
 * The API answered successfully but with a body the client cannot use
 */
export class ResponseFormatError extends GTmetrixError {
  constructor(
    message: string,
    public readonly status: number,
    public readonly body: JsonValue | string | undefined,
  ) {
    super(message)
    this.name = 'ResponseFormatError'
  }
}

export class ResourceNotFoundError extends GTmetrixError {
  constructor(public readonly resource: string) {
    super(`Resource "${resource}" is not present in the report`)
    this.name = 'ResourceNotFoundError'
  }
}

export class PollTimeoutError extends GTmetrixError {
  constructor(
    public readonly testId: string,
    public readonly lastState: TestState,
    public readonly timeout: number,
  ) {
    super(`Test ${testId} did not finish within ${timeout}ms (last state: ${lastState})`)
    this.name = 'PollTimeoutError'
  }
}

export class PollAbortedError extends GTmetrixError {
  constructor(
    public readonly testId: string,
    public readonly lastState: TestState,
  ) {
    super(`Waiting for test ${testId} was aborted (last state: ${lastState})`)
    this.name = 'PollAbortedError'
  }
}

function describeErrors(status: number, errors: ApiErrorObject[]): string {
  const first = errors[0]
  return first?.detail ?? first?.title ?? `HTTP ${status}`
}

export function errorMessage(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message
  }
  return String(error)
}
