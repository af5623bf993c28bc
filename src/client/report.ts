import { JsonObject, JsonValue, ReportResource, ReportResourceSchema, TestResourceSchema } from '../core/types'
import { ResponseFormatError } from '../core/errors'
import { deepFreeze } from '../core/utils/deep-freeze'
import type { ClientContext } from './context'
import { Test } from './page-test'
import { ResourceDestination, ResourceRef, resolveResourceUrl, toResourceRef, writeResource } from './resource'

/**
 * Read-only view of a finished report, exactly as the API returned it
 * (`id`, `type`, `attributes`, `links`).
 */
export class Report implements Iterable<[string, JsonValue]> {
  private readonly resource: Readonly<ReportResource>

  constructor(
    private readonly context: ClientContext,
    resource: ReportResource,
  ) {
    this.resource = deepFreeze(structuredClone(resource))
  }

  /**
   * GETs a report by path or URL, following redirects
   */
  static async load(context: ClientContext, location: string): Promise<Report> {
    const response = await context.requestor.requestJson(location, { followRedirects: true })
    const parsed = ReportResourceSchema.safeParse(response.data)
    if (!parsed.success) {
      throw new ResponseFormatError('API returned non-report data for a report', response.status, response.data)
    }
    return new Report(context, parsed.data)
  }

  get id(): string {
    return this.resource.id
  }

  get attributes(): JsonObject {
    return this.resource.attributes
  }

  get links(): JsonObject {
    return this.resource.links
  }

  get(key: string): JsonValue | undefined {
    return this.has(key) ? this.toRecord()[key] : undefined
  }

  has(key: string): boolean {
    return Object.hasOwn(this.resource, key)
  }

  keys(): string[] {
    return Object.keys(this.resource)
  }

  entries(): [string, JsonValue][] {
    return Object.entries(this.toRecord())
  }

  [Symbol.iterator](): Iterator<[string, JsonValue]> {
    return this.entries()[Symbol.iterator]()
  }

  /** Mutable deep copy of the raw report */
  toJSON(): ReportResource {
    return structuredClone(this.resource)
  }

  /**
   * Downloads a resource. A string is looked up in `links` first and
   * otherwise taken as a URL; unknown names fail before any request.
   * Resolves the bytes when no destination is given.
   */
  async getResource(ref: ResourceRef | string): Promise<Buffer>
  async getResource(ref: ResourceRef | string, destination: ResourceDestination): Promise<void>
  async getResource(ref: ResourceRef | string, destination?: ResourceDestination): Promise<Buffer | void> {
    const resolved = typeof ref === 'string' ? toResourceRef(ref, this.links) : ref
    const url = resolveResourceUrl(resolved, this.links)

    if (destination === undefined) {
      return this.context.requestor.requestBinary(url)
    }
    await writeResource(await this.context.requestor.requestStream(url), destination)
  }

  async delete(): Promise<void> {
    await this.context.requestor.requestNoContent(`reports/${encodeURIComponent(this.id)}`, { method: 'DELETE' })
  }

  /**
   * Starts a new test with the same parameters as this report
   */
  async retest(): Promise<Test> {
    const response = await this.context.requestor.requestJson(`reports/${encodeURIComponent(this.id)}/retest`, {
      method: 'POST',
    })
    const parsed = TestResourceSchema.safeParse(response.data)
    if (!parsed.success) {
      throw new ResponseFormatError('API returned non-test data for a retest', response.status, response.data)
    }
    return new Test(this.context, parsed.data)
  }

  private toRecord(): Record<string, JsonValue> {
    return { ...this.resource }
  }
}
