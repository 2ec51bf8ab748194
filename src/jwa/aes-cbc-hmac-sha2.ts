import { randomBytes } from 'node:crypto'

import { JoseError, JoseErrorCode, JoseErrorMessage } from '../errors/jose.error'
import { concatBytes, constantTimeEqual, uint64BE } from '../utils/bytes'

import type {
  AeadResult,
  BlockCipherAlgorithm,
  ContentEncryptionAlgorithm,
  HmacSignatureAlgorithm,
} from './algorithm'

/**
 * @summary AES-CBC + HMAC-SHA2 composite authenticated encryption (A128CBC-HS256,
 * A192CBC-HS384, A256CBC-HS512).
 * @remarks
 * The CEK is `MAC_KEY || ENC_KEY`, each half the cipher key size. The tag is the
 * leftmost half of `HMAC(MAC_KEY, AAD || IV || ciphertext || AL)`, where `AL` is the
 * bit length of the AAD as a 64-bit big-endian integer.
 *
 * Decryption checks the tag in constant time before touching the cipher, and reports
 * a padding failure with the same error as a tag mismatch.
 */
export class AesCbcHmacSha2 implements ContentEncryptionAlgorithm {
  readonly kind = 'content-encryption' as const
  readonly id: string
  readonly cekLength: number
  readonly tagLength: number

  /**
   * @throws {@link JoseError} with code `UNSUPPORTED_ALGORITHM` when the MAC digest is
   * not twice the cipher key size.
   */
  constructor(
    readonly cipher: BlockCipherAlgorithm,
    readonly mac: HmacSignatureAlgorithm,
  ) {
    this.id = `${cipher.id}-${mac.id}`
    if (mac.digestSize !== cipher.keySize * 2) {
      throw new JoseError(
        JoseErrorCode.UNSUPPORTED_ALGORITHM,
        `Unsupported algorithm: ${this.id}`,
      )
    }
    this.cekLength = cipher.keySize * 2
    this.tagLength = mac.digestSize / 2
  }

  aeadEncrypt(plaintext: Uint8Array, cek: Uint8Array, aad: Uint8Array): AeadResult {
    const { macKey, encKey } = this.splitKey(cek)
    const iv = new Uint8Array(randomBytes(this.cipher.ivSize))
    const ciphertext = this.cipher.encrypt(plaintext, encKey, iv)
    const tag = this.computeTag(macKey, aad, iv, ciphertext)
    return { iv, ciphertext, tag }
  }

  /**
   * @throws {@link JoseError} with code `AUTHENTICATION_TAG_MISMATCH` when the tag does
   * not match or the padding is malformed.
   */
  aeadDecrypt(
    ciphertext: Uint8Array,
    iv: Uint8Array,
    tag: Uint8Array,
    cek: Uint8Array,
    aad: Uint8Array,
  ): Uint8Array {
    const { macKey, encKey } = this.splitKey(cek)
    const expected = this.computeTag(macKey, aad, iv, ciphertext)
    if (!constantTimeEqual(expected, tag)) throw tagMismatch()
    try {
      return this.cipher.decrypt(ciphertext, encKey, iv)
    } catch {
      throw tagMismatch()
    }
  }

  private splitKey(cek: Uint8Array): { macKey: Uint8Array; encKey: Uint8Array } {
    if (cek.length !== this.cekLength) {
      throw new JoseError(
        JoseErrorCode.INVALID_INPUT,
        `${this.id} CEK must be ${this.cekLength} bytes`,
      )
    }
    const half = this.cipher.keySize
    return { macKey: cek.subarray(0, half), encKey: cek.subarray(half) }
  }

  private computeTag(
    macKey: Uint8Array,
    aad: Uint8Array,
    iv: Uint8Array,
    ciphertext: Uint8Array,
  ): Uint8Array {
    const al = uint64BE(aad.length * 8)
    const full = this.mac.mac(macKey, concatBytes(aad, iv, ciphertext, al))
    return full.subarray(0, this.tagLength)
  }
}

function tagMismatch(): JoseError {
  return new JoseError(
    JoseErrorCode.AUTHENTICATION_TAG_MISMATCH,
    JoseErrorMessage.TAG_MISMATCH,
  )
}
