import { Readable } from 'node:stream'
import type { ReadableStream } from 'node:stream/web'
import {
  ApiDocumentSchema,
  ApiErrorDocumentSchema,
  ApiErrorObject,
  DEFAULT_BASE_URL,
  DEFAULT_RATE_LIMIT_RETRIES,
  JsonValue,
} from '../core/types'
import { ConnectionError, RequestError, ResponseFormatError, errorMessage } from '../core/errors'
import { sleep as defaultSleep, SleepFunction } from '../core/utils/sleep'
import { secondsHeaderToMs } from '../core/utils/retry-after'
import { logger } from '../logger'

export const JSON_API_MEDIA_TYPE = 'application/vnd.api+json'

/** Delay for "too many tests pending" (E42900) */
const PENDING_TESTS_DELAY_MS = 3000
/** Delay for "rate limit exceeded" (E42901) when X-RateLimit-Reset is absent */
const RATE_LIMIT_DEFAULT_DELAY_MS = 3000

/**
 * The subset of a fetch `Response` the client reads. Node's global
 * `Response` satisfies it.
 */
export interface HttpResponse {
  readonly status: number
  readonly headers: { get(name: string): string | null }
  readonly body: ReadableStream<Uint8Array> | null
  text(): Promise<string>
  arrayBuffer(): Promise<ArrayBuffer>
}

export interface HttpRequestInit {
  method: HttpMethod
  headers: Record<string, string>
  body?: string
  redirect: 'manual' | 'follow'
  signal?: AbortSignal
}

export type HttpMethod = 'GET' | 'POST' | 'DELETE'

export type FetchFunction = (url: string, init: HttpRequestInit) => Promise<HttpResponse>

export interface TransportOptions {
  baseUrl?: string
  /** Defaults to Node's global fetch */
  fetch?: FetchFunction
  /** Used between rate-limit retries and status polls */
  sleep?: SleepFunction
  /** Clock used for poll deadlines */
  now?: () => number
  /** Retries after a 429 response, default 10 */
  rateLimitRetries?: number
}

export interface RequestOptions {
  method?: HttpMethod
  body?: JsonValue
  followRedirects?: boolean
  signal?: AbortSignal
  /** Called with the delay before each rate-limit wait; throwing ends the retries */
  onRateLimit?: (delay: number) => void
}

export interface JsonResponse {
  status: number
  headers: HttpResponse['headers']
  /** Always set for 2xx; for 3xx only when the body carried a document */
  data: JsonValue | undefined
}

/**
 * Makes authenticated requests against the API. One instance is created per
 * Account and shared by every Test and Report that Account produces.
 */
export class Requestor {
  readonly baseUrl: string
  readonly sleep: SleepFunction
  readonly now: () => number
  private readonly authorization: string
  private readonly apiOrigin: string
  private readonly fetchFn: FetchFunction
  private readonly rateLimitRetries: number

  constructor(apiKey: string, options: TransportOptions = {}) {
    if (typeof apiKey !== 'string' || apiKey.length === 0) {
      throw new TypeError('API key must be a non-empty string')
    }

    this.baseUrl = normalizeBaseUrl(options.baseUrl ?? DEFAULT_BASE_URL)
    this.apiOrigin = new URL(this.baseUrl).origin
    // API key is the username, password stays empty
    this.authorization = `Basic ${Buffer.from(`${apiKey}:`).toString('base64')}`
    this.fetchFn = options.fetch ?? ((url, init) => fetch(url, init))
    this.sleep = options.sleep ?? defaultSleep
    this.now = options.now ?? Date.now
    this.rateLimitRetries = options.rateLimitRetries ?? DEFAULT_RATE_LIMIT_RETRIES
  }

  /** Whether a URL belongs to the API; only those receive the API key */
  isApiUrl(url: string): boolean {
    return new URL(url).origin === this.apiOrigin
  }

  resolveUrl(path: string): string {
    if (/^https?:\/\//i.test(path)) {
      return path
    }
    return this.baseUrl + path.replace(/^\/+/, '')
  }

  /**
   * Requests a JSON:API document. Redirects are not followed unless asked
   * for, so a 3xx response reaches the caller with whatever body it had.
   */
  async requestJson(path: string, options: RequestOptions = {}): Promise<JsonResponse> {
    const response = await this.send(path, options)
    const text = await response.text()
    const data = parseDocument(text)

    if (data === undefined && !isRedirect(response.status)) {
      throw new ResponseFormatError(
        `API returned no JSON:API document for ${this.resolveUrl(path)}`,
        response.status,
        text,
      )
    }

    return { status: response.status, headers: response.headers, data }
  }

  async requestBinary(path: string, options: RequestOptions = {}): Promise<Buffer> {
    const response = await this.send(path, { followRedirects: true, ...options })
    return Buffer.from(await response.arrayBuffer())
  }

  /**
   * Follows redirects and streams the response body
   */
  async requestStream(path: string, options: RequestOptions = {}): Promise<Readable> {
    const response = await this.send(path, { followRedirects: true, ...options })
    return response.body ? Readable.fromWeb(response.body) : Readable.from([])
  }

  async requestNoContent(path: string, options: RequestOptions = {}): Promise<number> {
    const response = await this.send(path, options)
    // Drain so the connection is released
    await response.arrayBuffer()
    return response.status
  }

  private async send(path: string, options: RequestOptions, attempt = 0): Promise<HttpResponse> {
    const url = this.resolveUrl(path)
    const method = options.method ?? 'GET'
    const init: HttpRequestInit = {
      method,
      headers: {
        Accept: JSON_API_MEDIA_TYPE,
      },
      redirect: options.followRedirects ? 'follow' : 'manual',
      signal: options.signal,
    }

    if (this.isApiUrl(url)) {
      init.headers['Authorization'] = this.authorization
    }

    if (options.body !== undefined) {
      init.body = JSON.stringify(options.body)
      init.headers['Content-Type'] = JSON_API_MEDIA_TYPE
    }

    logger.debug(`${method} ${url}`)

    let response: HttpResponse
    try {
      response = await this.fetchFn(url, init)
    } catch (error) {
      throw new ConnectionError(`${method} ${url} failed: ${errorMessage(error)}`, url, error)
    }

    logger.debug(`${method} ${url} -> ${response.status}`)

    if (response.status < 400) {
      return response
    }

    const failure = new RequestError(response.status, parseErrors(await response.text()), url)
    const delay = rateLimitDelay(failure, response)

    if (delay === undefined || attempt >= this.rateLimitRetries) {
      throw failure
    }

    options.onRateLimit?.(delay)
    logger.warn(`Rate limited by the API (${failure.code}), retrying ${method} ${url} in ${delay}ms`)
    try {
      await this.sleep(delay, options.signal)
    } catch (error) {
      throw new ConnectionError(`${method} ${url} aborted while rate limited: ${errorMessage(error)}`, url, error)
    }
    return this.send(path, options, attempt + 1)
  }
}

export function isRedirect(status: number): boolean {
  return status >= 300 && status < 400
}

function normalizeBaseUrl(baseUrl: string): string {
  return baseUrl.endsWith('/') ? baseUrl : `${baseUrl}/`
}

function parseJson(text: string): unknown {
  if (text.trim() === '') {
    return undefined
  }
  try {
    return JSON.parse(text)
  } catch {
    return undefined
  }
}

function parseDocument(text: string): JsonValue | undefined {
  const result = ApiDocumentSchema.safeParse(parseJson(text))
  return result.success ? result.data.data : undefined
}

function parseErrors(text: string): ApiErrorObject[] {
  const result = ApiErrorDocumentSchema.safeParse(parseJson(text))
  return result.success ? result.data.errors : []
}

/**
 * How long to wait before retrying a 429, or undefined when the response is
 * not a retryable rate-limit error
 */
function rateLimitDelay(error: RequestError, response: HttpResponse): number | undefined {
  if (error.status !== 429) {
    return undefined
  }

  switch (error.code) {
    case 'E42900':
      return PENDING_TESTS_DELAY_MS
    case 'E42901':
      return secondsHeaderToMs(response.headers.get('X-RateLimit-Reset')) ?? RATE_LIMIT_DEFAULT_DELAY_MS
    default:
      return undefined
  }
}
