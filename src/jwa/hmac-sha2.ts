import { createHmac } from 'node:crypto'

import { constantTimeEqual } from '../utils/bytes'
import { requireSecret } from '../utils/keys'

import type { HmacSignatureAlgorithm } from './algorithm'
import type { HmacAlg, ShaHash } from '../types/alg'
import type { JoseKey } from '../types/key'

/**
 * @summary HS256 / HS384 / HS512.
 */
export class HmacSha2 implements HmacSignatureAlgorithm {
  readonly kind = 'signature' as const
  readonly family = 'HMAC' as const

  constructor(
    readonly id: HmacAlg,
    readonly hash: ShaHash,
    readonly digestSize: number,
  ) {}

  mac(secret: Uint8Array, data: Uint8Array): Uint8Array {
    return new Uint8Array(createHmac(this.hash, secret).update(data).digest())
  }

  sign(data: Uint8Array, key: JoseKey): Uint8Array {
    return this.mac(requireSecret(key), data)
  }

  verify(data: Uint8Array, signature: Uint8Array, key: JoseKey): boolean {
    return constantTimeEqual(this.sign(data, key), signature)
  }
}
