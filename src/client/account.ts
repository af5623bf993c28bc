import {
  ClientConfig,
  DEFAULT_POLL_INTERVAL,
  JsonObject,
  JsonValue,
  TestResourceListSchema,
  TestResourceSchema,
  UserAttributes,
  UserResourceSchema,
} from '../core/types'
import { ResponseFormatError } from '../core/errors'
import type { ClientContext } from './context'
import { Test } from './page-test'
import { Report } from './report'
import { Requestor, TransportOptions } from './requestor'

export interface AccountOptions extends TransportOptions {
  /** Default wait between status polls, in ms (3000) */
  pollInterval?: number
}

/**
 * Test parameters sent next to `url` (`location`, `browser`, `report`,
 * `adblock`, ...). They are not validated here; the API decides.
 */
export type TestOptions = Record<string, JsonValue | undefined>

export interface ListTestsQuery {
  /** Field to sort by, prefix with `-` for descending */
  sort?: string
  /** Sent as `filter[<key>]=<value>` */
  filter?: Record<string, string | number>
  page?: number
}

/**
 * Entry point to the API. Holds the credential and creates Tests and
 * Reports that share its transport.
 */
export class Account {
  private readonly context: ClientContext

  constructor(apiKey: string, options: AccountOptions = {}) {
    const { pollInterval = DEFAULT_POLL_INTERVAL, ...transport } = options
    this.context = Object.freeze({
      requestor: new Requestor(apiKey, transport),
      pollInterval,
    })
  }

  static fromConfig(config: ClientConfig, transport: Pick<TransportOptions, 'fetch' | 'sleep' | 'now'> = {}): Account {
    return new Account(config.apiKey, {
      ...transport,
      baseUrl: config.baseUrl,
      pollInterval: config.pollInterval,
      rateLimitRetries: config.rateLimitRetries,
    })
  }

  get baseUrl(): string {
    return this.context.requestor.baseUrl
  }

  async startTest(url: string, options: TestOptions = {}): Promise<Test> {
    if (typeof url !== 'string' || url.length === 0) {
      throw new TypeError('Test URL must be a non-empty string')
    }

    const response = await this.context.requestor.requestJson('tests', {
      method: 'POST',
      body: {
        data: {
          type: 'test',
          attributes: toTestAttributes(url, options),
        },
      },
    })

    const parsed = TestResourceSchema.safeParse(response.data)
    if (!parsed.success) {
      throw new ResponseFormatError('API returned non-test data for a started test', response.status, response.data)
    }
    return new Test(this.context, parsed.data)
  }

  /**
   * No request is made; the test stays `unknown` until fetched
   */
  testFromId(id: string): Test {
    return new Test(this.context, id)
  }

  reportFromId(id: string): Promise<Report> {
    return Report.load(this.context, `reports/${encodeURIComponent(id)}`)
  }

  /**
   * Tests started recently, in the order the API lists them
   */
  async listTests(query: ListTestsQuery = {}): Promise<Test[]> {
    const params = new URLSearchParams()
    if (query.sort !== undefined) {
      params.append('sort', query.sort)
    }
    for (const [key, value] of Object.entries(query.filter ?? {})) {
      params.append(`filter[${key}]`, String(value))
    }
    if (query.page !== undefined) {
      params.append('page[number]', String(query.page))
    }

    const search = params.toString()
    const response = await this.context.requestor.requestJson(search ? `tests?${search}` : 'tests')

    const parsed = TestResourceListSchema.safeParse(response.data)
    if (!parsed.success) {
      throw new ResponseFormatError('API returned an invalid list of tests', response.status, response.data)
    }
    return parsed.data.map((resource) => new Test(this.context, resource))
  }

  /**
   * Account details, including remaining API credits
   */
  async status(): Promise<UserAttributes> {
    const response = await this.context.requestor.requestJson('status')
    const parsed = UserResourceSchema.safeParse(response.data)
    if (!parsed.success) {
      throw new ResponseFormatError('API returned non-user data for account status', response.status, response.data)
    }
    return parsed.data.attributes
  }
}

function toTestAttributes(url: string, options: TestOptions): JsonObject {
  const attributes: JsonObject = {}
  for (const [key, value] of Object.entries(options)) {
    if (value !== undefined) {
      attributes[key] = value
    }
  }
  attributes['url'] = url
  return attributes
}
