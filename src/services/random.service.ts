/* eslint-disable class-methods-use-this -- this is a service class */
import { randomBytes } from 'node:crypto'

import { Injectable } from '@nestjs/common'
import { ulid } from 'ulid'

import { JoseError, JoseErrorCode } from '../errors/jose.error'

/**
 * @summary Cryptographically secure randomness for key material and token ids.
 * @remarks
 * Every call draws fresh bytes from the operating system CSPRNG, so CEKs and IVs are
 * never shared between messages or callers.
 */
@Injectable()
export class RandomService {
  /**
   * @summary Generate cryptographically secure random bytes.
   * @param length Number of bytes to generate.
   * @throws {@link JoseError} with code `INVALID_INPUT` when length is not a positive integer.
   * @example
   * ```ts
   * const cek = random.bytes(32)
   * ```
   */
  bytes(length: number): Uint8Array {
    if (!Number.isInteger(length) || length <= 0) {
      throw new JoseError(
        JoseErrorCode.INVALID_INPUT,
        'Random length must be a positive integer',
      )
    }
    return new Uint8Array(randomBytes(length))
  }

  /**
   * @summary Generate a token identifier for the `jti` claim.
   * @returns A 26-character ULID string.
   */
  tokenId(): string {
    return ulid()
  }
}
