import { JoseError, JoseErrorCode } from '../errors/jose.error'

/**
 * @summary Serialize a value to canonical JSON (stable key ordering).
 * @param value Any JSON-serializable value.
 * @returns Canonical JSON string with lexicographically ordered object keys.
 * @throws {@link JoseError} with code `INVALID_INPUT` when circular references detected.
 */
export function canonicalStringify(value: unknown): string {
  const seen = new WeakSet<object>()
  return JSON.stringify(order(value, seen))
}

/**
 * @summary (Private) Recursively sort object keys with circular reference detection.
 */
function order(x: unknown, seen: WeakSet<object>): unknown {
  if (Array.isArray(x)) {
    if (seen.has(x)) throw circular()
    seen.add(x)
    return x.map(item => order(item, seen))
  }
  if (x && typeof x === 'object') {
    if (seen.has(x)) throw circular()
    seen.add(x)
    const obj: Record<string, unknown> = {}
    const entries = Object.entries(x).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    for (const [k, v] of entries) {
      obj[k] = order(v, seen)
    }
    return obj
  }
  return x
}

function circular(): JoseError {
  return new JoseError(
    JoseErrorCode.INVALID_INPUT,
    'Circular reference detected in canonicalStringify',
  )
}
