import { Buffer } from 'node:buffer'
import { timingSafeEqual } from 'node:crypto'

export type BinaryLike = string | Uint8Array | Buffer

/**
 * @summary Convert a string/Buffer/Uint8Array to Uint8Array.
 * @param input The value to convert; strings are UTF-8 encoded.
 * @returns A Uint8Array view of the input.
 */
export function toBytes(input: BinaryLike): Uint8Array {
  if (typeof input === 'string') {
    return new TextEncoder().encode(input)
  }
  if (input instanceof Uint8Array) {
    return input
  }
  return new Uint8Array(input)
}

/**
 * @summary Concatenate multiple byte arrays.
 * @param chunks One or more Uint8Array chunks.
 * @returns A new Uint8Array containing all chunks in order.
 */
export function concatBytes(...chunks: Uint8Array[]): Uint8Array {
  const total = chunks.reduce((n, c) => n + c.length, 0)
  const out = new Uint8Array(total)
  let offset = 0
  for (const chunk of chunks) {
    out.set(chunk, offset)
    offset += chunk.length
  }
  return out
}

/**
 * @summary Encode a non-negative integer as 8 big-endian bytes.
 */
export function uint64BE(value: number): Uint8Array {
  const out = new Uint8Array(8)
  new DataView(out.buffer).setBigUint64(0, BigInt(value), false)
  return out
}

/**
 * @summary Constant-time equality of two byte arrays.
 * @returns False when lengths differ; otherwise the result of `crypto.timingSafeEqual`.
 * @remarks Only the length is revealed through timing, never the position of a mismatch.
 */
export function constantTimeEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false
  return timingSafeEqual(a, b)
}

/**
 * @summary Overwrite the provided byte array with zeros.
 * @remarks
 * Used on per-message CEKs once a call is done with them. JavaScript gives no guarantee
 * that the engine has not copied the bytes elsewhere, so this narrows exposure rather
 * than removing it.
 */
export function zeroize(bytes: Uint8Array): void {
  bytes.fill(0)
}
