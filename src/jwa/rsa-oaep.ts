import { constants, privateDecrypt, publicEncrypt } from 'node:crypto'

import { JoseError, JoseErrorCode, JoseErrorMessage } from '../errors/jose.error'
import { requireRsaPublicKey } from '../utils/keys'

import type { KeyManagementAlgorithm } from './algorithm'
import type { JoseKey } from '../types/key'

/**
 * @summary RSA-OAEP key wrapping (SHA-1 hash and MGF1, empty label).
 * @remarks
 * Every unwrap failure surfaces as the same `INCORRECT_DECRYPTION` error with the
 * same message, whatever the cause: wrong key, missing private key, corrupted
 * ciphertext or bad padding. The underlying OpenSSL error is never attached.
 */
export class RsaOaep implements KeyManagementAlgorithm {
  readonly id = 'RSA-OAEP' as const
  readonly kind = 'key-management' as const

  wrap(cek: Uint8Array, key: JoseKey): Uint8Array {
    const publicKey = requireRsaPublicKey(key)
    return new Uint8Array(
      publicEncrypt(
        { key: publicKey, padding: constants.RSA_PKCS1_OAEP_PADDING, oaepHash: 'sha1' },
        cek,
      ),
    )
  }

  unwrap(encryptedKey: Uint8Array, key: JoseKey): Uint8Array {
    if (key.kty !== 'RSA' || !key.privateKey) throw incorrectDecryption()
    try {
      return new Uint8Array(
        privateDecrypt(
          {
            key: key.privateKey,
            padding: constants.RSA_PKCS1_OAEP_PADDING,
            oaepHash: 'sha1',
          },
          encryptedKey,
        ),
      )
    } catch {
      throw incorrectDecryption()
    }
  }
}

function incorrectDecryption(): JoseError {
  return new JoseError(
    JoseErrorCode.INCORRECT_DECRYPTION,
    JoseErrorMessage.INCORRECT_DECRYPTION,
  )
}
