const MIN_DELAY_MS = 1000

/**
 * Converts a header holding a number of seconds into milliseconds, never
 * below one second. Returns undefined when the header is missing or not a
 * number.
 */
export function secondsHeaderToMs(value: string | null | undefined): number | undefined {
  if (value === null || value === undefined || value.trim() === '') {
    return undefined
  }

  const seconds = Number(value)
  if (!Number.isFinite(seconds)) {
    return undefined
  }

  return Math.max(MIN_DELAY_MS, Math.round(seconds * 1000))
}
