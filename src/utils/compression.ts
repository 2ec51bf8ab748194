import { deflateRawSync, inflateRawSync } from 'node:zlib'

import { JoseError, JoseErrorCode, unsupportedCompression } from '../errors/jose.error'

import type { ZipAlg } from '../types/alg'

const SUPPORTED = new Set<string>(['DEF'])

/**
 * @summary Type guard for supported `zip` header values.
 */
export function isSupportedCompression(zip: unknown): zip is ZipAlg {
  return typeof zip === 'string' && SUPPORTED.has(zip)
}

/**
 * @summary Assert that `zip` names a supported compression algorithm.
 * @throws {@link JoseError} with code `UNSUPPORTED_COMPRESSION`
 * (`Unsupported compression algorithm: <zip>`).
 */
export function assertSupportedCompression(zip: unknown): asserts zip is ZipAlg {
  if (!isSupportedCompression(zip)) throw unsupportedCompression(zip)
}

/**
 * @summary Compress bytes with raw DEFLATE (no zlib or gzip framing).
 */
export function compress(data: Uint8Array, zip: ZipAlg = 'DEF'): Uint8Array {
  assertSupportedCompression(zip)
  return new Uint8Array(deflateRawSync(data))
}

/**
 * @summary Inverse of {@link compress}.
 * @param maxOutputLength Upper bound on the inflated size.
 * @throws {@link JoseError} with code `SIZE_LIMIT_EXCEEDED` when the output would exceed
 * `maxOutputLength`, or `MALFORMED_TOKEN` when the data is not valid raw DEFLATE.
 */
export function decompress(
  data: Uint8Array,
  zip: ZipAlg = 'DEF',
  maxOutputLength?: number,
): Uint8Array {
  assertSupportedCompression(zip)
  try {
    return new Uint8Array(
      inflateRawSync(data, maxOutputLength === undefined ? {} : { maxOutputLength }),
    )
  } catch (error) {
    // zlib errors come from the host realm, so match on the code rather than the class
    if (isNodeError(error, 'ERR_BUFFER_TOO_LARGE')) {
      throw new JoseError(
        JoseErrorCode.SIZE_LIMIT_EXCEEDED,
        `Decompressed payload exceeds maximum size of ${maxOutputLength} bytes`,
      )
    }
    throw new JoseError(JoseErrorCode.MALFORMED_TOKEN, 'Invalid compressed payload', {
      error: String(error),
    })
  }
}

function isNodeError(error: unknown, code: string): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === code
}
