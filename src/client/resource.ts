import { createWriteStream } from 'node:fs'
import type { Readable, Writable } from 'node:stream'
import { pipeline } from 'node:stream/promises'
import type { JsonObject } from '../core/types'
import { ResourceNotFoundError } from '../core/errors'

/**
 * Names a report resource either by its key in the report's `links`
 * (`report_pdf`, `screenshot`, `video`, ...) or by a literal URL
 */
export type ResourceRef = { kind: 'key'; name: string } | { kind: 'url'; url: string }

/** File path or writable stream; omit to receive the bytes */
export type ResourceDestination = string | Writable

export const resourceKey = (name: string): ResourceRef => ({ kind: 'key', name })
export const resourceUrl = (url: string): ResourceRef => ({ kind: 'url', url })

export function isHttpUrl(value: string): boolean {
  try {
    const { protocol } = new URL(value)
    return protocol === 'http:' || protocol === 'https:'
  } catch {
    return false
  }
}

/**
 * Turns a string into a ResourceRef: a key of `links` wins, then an absolute
 * http(s) URL. Anything else is unknown.
 */
export function toResourceRef(ref: string, links: JsonObject): ResourceRef {
  if (Object.hasOwn(links, ref)) {
    return resourceKey(ref)
  }
  if (isHttpUrl(ref)) {
    return resourceUrl(ref)
  }
  throw new ResourceNotFoundError(ref)
}

/**
 * Returns the URL a ResourceRef points at. Link values may be plain URLs or
 * JSON:API link objects with an `href`.
 */
export function resolveResourceUrl(ref: ResourceRef, links: JsonObject): string {
  if (ref.kind === 'url') {
    return ref.url
  }

  const link = Object.hasOwn(links, ref.name) ? links[ref.name] : undefined
  if (typeof link === 'string') {
    return link
  }
  if (link !== null && typeof link === 'object' && !Array.isArray(link) && typeof link['href'] === 'string') {
    return link['href']
  }
  throw new ResourceNotFoundError(ref.name)
}

/**
 * Pipes a downloaded resource to a file path or stream. The file stream is
 * closed on success and destroyed on failure; a caller's stream is not ended.
 */
export async function writeResource(source: Readable, destination: ResourceDestination): Promise<void> {
  if (typeof destination === 'string') {
    await pipeline(source, createWriteStream(destination))
    return
  }

  await pipeline(source, destination, { end: false })
}
