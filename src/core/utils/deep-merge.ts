type PlainObject = Record<string, unknown>

function isPlainObject(value: unknown): value is PlainObject {
  return value !== null && typeof value === 'object' && !Array.isArray(value)
}

/**
 * Merges `override` into `base` without mutating either. Nested objects are
 * merged key by key; `undefined` in `override` keeps the base value.
 */
export function deepMerge(base: PlainObject, override: PlainObject): PlainObject {
  const result: PlainObject = { ...base }

  for (const [key, value] of Object.entries(override)) {
    if (value === undefined) continue

    const current = result[key]
    result[key] = isPlainObject(current) && isPlainObject(value) ? deepMerge(current, value) : value
  }

  return result
}
