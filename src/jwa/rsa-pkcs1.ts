import { constants, sign, verify } from 'node:crypto'

import { requireRsaPrivateKey, requireRsaPublicKey } from '../utils/keys'

import type { RsaSignatureAlgorithm } from './algorithm'
import type { RsaSignAlg, ShaHash } from '../types/alg'
import type { JoseKey } from '../types/key'

/**
 * @summary RS256 / RS384 / RS512 (RSASSA-PKCS1-v1_5).
 */
export class RsaPkcs1 implements RsaSignatureAlgorithm {
  readonly kind = 'signature' as const
  readonly family = 'RSA' as const

  constructor(
    readonly id: RsaSignAlg,
    readonly hash: ShaHash,
  ) {}

  sign(data: Uint8Array, key: JoseKey): Uint8Array {
    const privateKey = requireRsaPrivateKey(key)
    return new Uint8Array(
      sign(this.hash, data, { key: privateKey, padding: constants.RSA_PKCS1_PADDING }),
    )
  }

  verify(data: Uint8Array, signature: Uint8Array, key: JoseKey): boolean {
    const publicKey = requireRsaPublicKey(key)
    const modulusBits = publicKey.asymmetricKeyDetails?.modulusLength
    // a signature is always exactly one modulus long
    if (modulusBits !== undefined && signature.length !== Math.ceil(modulusBits / 8)) {
      return false
    }
    return verify(
      this.hash,
      data,
      { key: publicKey, padding: constants.RSA_PKCS1_PADDING },
      signature,
    )
  }
}
