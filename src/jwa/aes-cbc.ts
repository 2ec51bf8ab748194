import { Buffer } from 'node:buffer'
import { createCipheriv, createDecipheriv } from 'node:crypto'

import { JoseError, JoseErrorCode } from '../errors/jose.error'

import type { BlockCipherAlgorithm } from './algorithm'
import type { BlockCipherAlg } from '../types/alg'

/**
 * @summary AES in CBC mode with PKCS#7 padding.
 */
export class AesCbc implements BlockCipherAlgorithm {
  readonly kind = 'block-cipher' as const
  readonly ivSize = 16

  constructor(
    readonly id: BlockCipherAlg,
    readonly keySize: number,
  ) {}

  encrypt(plaintext: Uint8Array, key: Uint8Array, iv: Uint8Array): Uint8Array {
    this.assertParams(key, iv)
    const cipher = createCipheriv(this.cipherName(), key, iv)
    return new Uint8Array(Buffer.concat([cipher.update(plaintext), cipher.final()]))
  }

  /**
   * @throws Error from `node:crypto` when the padding is malformed.
   */
  decrypt(ciphertext: Uint8Array, key: Uint8Array, iv: Uint8Array): Uint8Array {
    this.assertParams(key, iv)
    const decipher = createDecipheriv(this.cipherName(), key, iv)
    return new Uint8Array(Buffer.concat([decipher.update(ciphertext), decipher.final()]))
  }

  private cipherName(): string {
    return `aes-${this.keySize * 8}-cbc`
  }

  private assertParams(key: Uint8Array, iv: Uint8Array): void {
    if (key.length !== this.keySize) {
      throw new JoseError(
        JoseErrorCode.INVALID_INPUT,
        `${this.id} key must be ${this.keySize} bytes`,
      )
    }
    if (iv.length !== this.ivSize) {
      throw new JoseError(
        JoseErrorCode.INVALID_INPUT,
        `${this.id} IV must be ${this.ivSize} bytes`,
      )
    }
  }
}
