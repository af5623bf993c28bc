import { JsonObject, TestResource, TestResourceSchema, TestState, isTerminalState } from '../core/types'
import { PollAbortedError, PollTimeoutError, ResponseFormatError } from '../core/errors'
import { deepFreeze } from '../core/utils/deep-freeze'
import { secondsHeaderToMs } from '../core/utils/retry-after'
import { logger } from '../logger'
import type { ClientContext } from './context'
import { isRedirect } from './requestor'
import { Report } from './report'

export interface FetchOptions {
  /** Keep polling until the test is `completed` or `error` */
  waitForCompletion?: boolean
  /** Give up waiting after this many ms */
  timeout?: number
  /** Cancels the wait */
  signal?: AbortSignal
  /** Wait between polls when the API sends no Retry-After hint, in ms */
  pollInterval?: number
  onStateChange?: (state: TestState, test: Test) => void
}

const EMPTY_OBJECT: JsonObject = Object.freeze({})

/**
 * A single page-speed test. Its state only changes through `fetch`.
 */
export class Test {
  readonly id: string
  private resource: TestResource | undefined
  private report: Report | undefined

  constructor(
    private readonly context: ClientContext,
    source: string | TestResource,
  ) {
    if (typeof source === 'string') {
      this.id = source
    } else {
      this.id = source.id
      this.resource = deepFreeze(source)
    }
  }

  get state(): TestState {
    const state = this.resource?.attributes['state']
    return typeof state === 'string' ? state : 'unknown'
  }

  get isTerminal(): boolean {
    return isTerminalState(this.state)
  }

  /** Attributes as of the last fetch */
  get attributes(): JsonObject {
    return this.resource?.attributes ?? EMPTY_OBJECT
  }

  get links(): JsonObject {
    return this.resource?.links ?? EMPTY_OBJECT
  }

  /**
   * Refreshes the test from the API and returns its state. With
   * `waitForCompletion` it keeps polling until a terminal state is reached.
   */
  async fetch(options: FetchOptions = {}): Promise<TestState> {
    if (!options.waitForCompletion) {
      await this.refresh(options.signal)
      return this.state
    }
    return this.waitForCompletion(options)
  }

  /**
   * Resolves undefined unless the test is `completed`; a test that ended in
   * `error` has no report.
   */
  async getReport(): Promise<Report | undefined> {
    if (this.state !== 'completed') {
      return undefined
    }

    if (!this.report) {
      this.report = await Report.load(this.context, this.reportLocation())
    }
    return this.report
  }

  toJSON(): TestResource {
    return this.resource ?? { id: this.id, type: 'test', attributes: {} }
  }

  private reportLocation(): string {
    const link = this.links['report']
    if (typeof link === 'string') {
      return link
    }
    const reportId = this.attributes['report']
    return `reports/${encodeURIComponent(typeof reportId === 'string' ? reportId : this.id)}`
  }

  /**
   * One status request. Returns the Retry-After hint in ms, if any.
   */
  private async refresh(signal?: AbortSignal, onRateLimit?: (delay: number) => void): Promise<number | undefined> {
    // A finished test answers with a redirect to its report; following it
    // would hand a report body to the test parser
    const response = await this.context.requestor.requestJson(`tests/${encodeURIComponent(this.id)}`, {
      signal,
      onRateLimit,
    })
    const parsed = TestResourceSchema.safeParse(response.data)

    if (parsed.success) {
      this.resource = deepFreeze(parsed.data)
    } else if (isRedirect(response.status)) {
      logger.debug(`Test ${this.id}: ignoring ${response.status} response without test data`)
    } else {
      throw new ResponseFormatError(`API returned non-test data for test ${this.id}`, response.status, response.data)
    }

    return secondsHeaderToMs(response.headers.get('Retry-After'))
  }

  private async waitForCompletion(options: FetchOptions): Promise<TestState> {
    const { requestor, pollInterval: defaultInterval } = this.context
    const { signal, timeout, onStateChange } = options
    const pollInterval = options.pollInterval ?? defaultInterval
    const deadline = timeout === undefined ? undefined : requestor.now() + timeout
    let previous = this.state

    const checkDeadline = (delay: number): void => {
      if (deadline !== undefined && requestor.now() + delay > deadline) {
        throw new PollTimeoutError(this.id, this.state, timeout ?? 0)
      }
    }

    for (;;) {
      if (signal?.aborted) {
        throw new PollAbortedError(this.id, this.state)
      }

      let retryAfter: number | undefined
      try {
        retryAfter = await this.refresh(signal, checkDeadline)
      } catch (error) {
        if (signal?.aborted) {
          throw new PollAbortedError(this.id, this.state)
        }
        throw error
      }

      const state = this.state
      if (state !== previous) {
        logger.debug(`Test ${this.id}: ${previous} -> ${state}`)
        previous = state
        onStateChange?.(state, this)
      }

      if (isTerminalState(state)) {
        return state
      }

      const delay = retryAfter ?? pollInterval
      checkDeadline(delay)

      try {
        await requestor.sleep(delay, signal)
      } catch (error) {
        if (signal?.aborted) {
          throw new PollAbortedError(this.id, state)
        }
        throw error
      }
    }
  }
}
