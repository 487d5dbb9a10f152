export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value)
}

/**
 * Deep merge two objects immutably. Arrays and scalars from `source` replace
 * those in `target`; `undefined` values in `source` are skipped.
 */
export function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const result = { ...target }

  for (const key of Object.keys(source)) {
    const value = source[key]
    if (value === undefined) continue

    const existing = result[key]
    if (isPlainObject(value)) {
      result[key] = deepMerge(isPlainObject(existing) ? existing : {}, value)
    } else {
      result[key] = value
    }
  }

  return result
}
