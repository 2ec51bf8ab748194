import { Buffer } from 'node:buffer'

import { JoseError, JoseErrorCode } from '../errors/jose.error'

import { toBytes } from './bytes'

/**
 * @summary Convert a UTF-8 string to bytes.
 * @param input String to encode.
 * @returns UTF-8 byte representation.
 */
export function toUtf8Bytes(input: string): Uint8Array {
  return new TextEncoder().encode(input)
}

/**
 * @summary Convert bytes to UTF-8 string (strict mode).
 * @throws {@link JoseError} with code `MALFORMED_TOKEN` when bytes contain invalid UTF-8 sequences.
 */
export function fromUtf8BytesStrict(bytes: Uint8Array): string {
  try {
    return new TextDecoder('utf8', { fatal: true }).decode(bytes)
  } catch {
    throw new JoseError(JoseErrorCode.MALFORMED_TOKEN, 'Invalid UTF-8 sequence')
  }
}

/**
 * @summary Encode bytes or text to a base64url string (URL-safe, no padding).
 * @param input Bytes, or text which is UTF-8 encoded first.
 * @returns Base64url-encoded string.
 * @example
 * ```ts
 * base64UrlEncode('{"alg":"HS256"}') // 'eyJhbGciOiJIUzI1NiJ9'
 * ```
 */
export function base64UrlEncode(input: Uint8Array | string): string {
  const b64 = Buffer.from(toBytes(input)).toString('base64')
  return b64.replaceAll('=', '').replaceAll('+', '-').replaceAll('/', '_')
}

/**
 * @summary Decode base64url string to bytes.
 * @param input Base64url-encoded string (URL-safe, no padding).
 * @returns Decoded byte array.
 * @throws {@link JoseError} with code `MALFORMED_TOKEN` when input is malformed or not
 * the canonical encoding of its bytes.
 * @example
 * ```ts
 * const bytes = base64UrlDecode('AQID')
 * ```
 */
export function base64UrlDecode(input: string): Uint8Array {
  if (!/^[\w-]*$/.test(input)) {
    throw new JoseError(
      JoseErrorCode.MALFORMED_TOKEN,
      'Invalid base64url string: contains illegal characters',
    )
  }
  // a single trailing sextet cannot encode a whole byte
  if (input.length % 4 === 1) {
    throw new JoseError(
      JoseErrorCode.MALFORMED_TOKEN,
      'Invalid base64url string: impossible length',
    )
  }

  const pad = input.length % 4 === 0 ? '' : '='.repeat(4 - (input.length % 4))
  const b64 = input.replaceAll('-', '+').replaceAll('_', '/') + pad
  const bytes = new Uint8Array(Buffer.from(b64, 'base64'))
  // unused trailing bits must be zero, otherwise several strings decode alike
  if (base64UrlEncode(bytes) !== input) {
    throw new JoseError(
      JoseErrorCode.MALFORMED_TOKEN,
      'Invalid base64url string: non-canonical encoding',
    )
  }
  return bytes
}
