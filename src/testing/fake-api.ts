import { ReadableStream } from 'node:stream/web'
import type { FetchFunction, HttpRequestInit, HttpResponse } from '../client/requestor'
import type { JsonValue } from '../core/types'

export const TEST_BASE_URL = 'https://api.test/2.0/'

export interface FakeReply {
  status?: number
  /** Objects are sent as JSON, strings verbatim */
  body?: JsonValue | string
  bytes?: Buffer
  headers?: Record<string, string>
  /** Makes fetch reject instead of answering */
  error?: Error
}

export interface RecordedRequest {
  url: string
  method: string
  headers: Record<string, string>
  body: unknown
  redirect: HttpRequestInit['redirect']
}

export function fakeResponse(reply: FakeReply): HttpResponse {
  const headers = new Map(Object.entries(reply.headers ?? {}).map(([name, value]): [string, string] => [name.toLowerCase(), value]))
  const text =
    reply.body === undefined ? '' : typeof reply.body === 'string' ? reply.body : JSON.stringify(reply.body)
  const bytes = reply.bytes ?? Buffer.from(text)

  return {
    status: reply.status ?? 200,
    headers: { get: (name) => headers.get(name.toLowerCase()) ?? null },
    body: new ReadableStream<Uint8Array>({
      start(controller) {
        controller.enqueue(new Uint8Array(bytes))
        controller.close()
      },
    }),
    text: async () => text,
    arrayBuffer: async () => {
      const buffer = new ArrayBuffer(bytes.length)
      new Uint8Array(buffer).set(bytes)
      return buffer
    },
  }
}

/**
 * In-process stand-in for the API. Replies are queued per `METHOD url`;
 * the last reply of a route keeps being served once the queue runs dry.
 */
export class FakeApi {
  readonly requests: RecordedRequest[] = []
  private readonly routes = new Map<string, FakeReply[]>()

  constructor(readonly baseUrl: string = TEST_BASE_URL) {}

  on(method: string, path: string, ...replies: FakeReply[]): this {
    const key = this.key(method, path)
    this.routes.set(key, [...(this.routes.get(key) ?? []), ...replies])
    return this
  }

  requestsTo(method: string, path: string): RecordedRequest[] {
    const url = this.url(path)
    return this.requests.filter((request) => request.method === method && request.url === url)
  }

  readonly fetch: FetchFunction = async (url, init) => {
    this.requests.push({
      url,
      method: init.method,
      headers: { ...init.headers },
      body: init.body === undefined ? undefined : JSON.parse(init.body),
      redirect: init.redirect,
    })

    const queue = this.routes.get(`${init.method} ${url}`)
    const reply = queue && queue.length > 1 ? queue.shift() : queue?.[0]

    if (!reply) {
      return fakeResponse({
        status: 404,
        body: { errors: [{ status: '404', code: 'E40400', title: 'Not found', detail: `No route for ${url}` }] },
      })
    }
    if (reply.error) {
      throw reply.error
    }
    return fakeResponse(reply)
  }

  private url(path: string): string {
    return /^https?:\/\//.test(path) ? path : this.baseUrl + path
  }

  private key(method: string, path: string): string {
    return `${method} ${this.url(path)}`
  }
}

/**
 * Clock whose sleep advances time instantly and records each wait
 */
export class FakeClock {
  current = 0
  readonly sleeps: number[] = []

  readonly now = (): number => this.current

  readonly sleep = async (ms: number, signal?: AbortSignal): Promise<void> => {
    if (signal?.aborted) {
      throw new Error('The operation was aborted')
    }
    this.sleeps.push(ms)
    this.current += ms
  }
}

export function testResource(id: string, state: string, extra: Record<string, JsonValue> = {}) {
  return {
    type: 'test',
    id,
    attributes: { state, ...extra },
    links: {},
  } satisfies JsonValue
}

export function reportResource(id: string, attributes: Record<string, JsonValue>, links: Record<string, JsonValue>) {
  return {
    type: 'report',
    id,
    attributes,
    links,
  } satisfies JsonValue
}
