import { JoseError, JoseErrorCode } from '../errors/jose.error'

import { fromUtf8BytesStrict } from './encoding'

import type { Claims, JoseHeader } from '../types/jose'

/**
 * @summary Assert that a byte array doesn't exceed a maximum size.
 * @param name Descriptive name for error messages.
 * @param bytes Byte array to validate.
 * @param maxSize Maximum size in bytes.
 * @throws {@link JoseError} with code `SIZE_LIMIT_EXCEEDED` if too large.
 */
export function assertMaxSize(name: string, bytes: Uint8Array, maxSize: number): void {
  if (bytes.length > maxSize) {
    throw new JoseError(
      JoseErrorCode.SIZE_LIMIT_EXCEEDED,
      `${name} exceeds maximum size of ${maxSize} bytes (got ${bytes.length} bytes)`,
    )
  }
}

/**
 * @summary Type guard for plain JSON objects (not arrays, not null).
 */
export function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * @summary Type guard for a header carrying a string `alg`.
 * @example
 * ```ts
 * const data = JSON.parse(untrustedInput)
 * if (isJoseHeader(data)) {
 *   console.log('alg:', data.alg)
 * }
 * ```
 */
export function isJoseHeader(value: unknown): value is JoseHeader {
  return isJsonObject(value) && typeof value.alg === 'string'
}

/**
 * @summary Decode and validate a transmitted header.
 * @throws {@link JoseError} with code `MALFORMED_TOKEN` when the bytes are not a JSON
 * object with a string `alg`, or when `requireEnc` is set and `enc` is missing.
 */
export function parseHeader(bytes: Uint8Array, requireEnc = false): JoseHeader {
  const value = parseJson(bytes, 'header')
  if (!isJoseHeader(value)) {
    throw new JoseError(JoseErrorCode.MALFORMED_TOKEN, 'Token header is missing alg')
  }
  if (requireEnc && typeof value.enc !== 'string') {
    throw new JoseError(JoseErrorCode.MALFORMED_TOKEN, 'Token header is missing enc')
  }
  return value
}

/**
 * @summary Decode a claims payload.
 * @throws {@link JoseError} with code `MALFORMED_TOKEN` when not a JSON object.
 */
export function parseClaims(bytes: Uint8Array): Claims {
  const value = parseJson(bytes, 'payload')
  if (!isJsonObject(value)) {
    throw new JoseError(JoseErrorCode.MALFORMED_TOKEN, 'Token payload must be a JSON object')
  }
  return value
}

function parseJson(bytes: Uint8Array, what: 'header' | 'payload'): unknown {
  const text = fromUtf8BytesStrict(bytes)
  try {
    return JSON.parse(text)
  } catch {
    throw new JoseError(JoseErrorCode.MALFORMED_TOKEN, `Token ${what} is not valid JSON`)
  }
}
