/**
 * Satellite Inventory — JSON Output
 *
 * Both cache files and stdout use the same rendering: 2-space indent,
 * object keys sorted at every depth.
 */

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/** Copy of `value` with object keys in sorted order, arrays left in place */
export function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(sortKeys)
  if (!isPlainObject(value)) return value

  // Own properties, `__proto__` included
  return Object.fromEntries(Object.keys(value).sort().map((key) => [key, sortKeys(value[key])]))
}

export function formatJson(data: unknown): string {
  return JSON.stringify(sortKeys(data), null, 2)
}
