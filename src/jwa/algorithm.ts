import type {
  AlgorithmKind,
  BlockCipherAlg,
  HmacAlg,
  JweAlg,
  RsaSignAlg,
  ShaHash,
} from '../types/alg'
import type { JoseKey } from '../types/key'

interface AlgorithmBase<K extends AlgorithmKind> {
  readonly id: string
  readonly kind: K
}

/**
 * @summary HMAC-SHA2 signature. Also serves as the MAC half of a composite `enc`.
 */
export interface HmacSignatureAlgorithm extends AlgorithmBase<'signature'> {
  readonly id: HmacAlg
  readonly family: 'HMAC'
  readonly hash: ShaHash
  /** Digest size in bytes. */
  readonly digestSize: number
  /** Raw HMAC over `data` with a secret given as bytes. */
  mac: (secret: Uint8Array, data: Uint8Array) => Uint8Array
  sign: (data: Uint8Array, key: JoseKey) => Uint8Array
  verify: (data: Uint8Array, signature: Uint8Array, key: JoseKey) => boolean
}

/**
 * @summary RSASSA-PKCS1-v1_5 signature.
 */
export interface RsaSignatureAlgorithm extends AlgorithmBase<'signature'> {
  readonly id: RsaSignAlg
  readonly family: 'RSA'
  readonly hash: ShaHash
  sign: (data: Uint8Array, key: JoseKey) => Uint8Array
  verify: (data: Uint8Array, signature: Uint8Array, key: JoseKey) => boolean
}

export type SignatureAlgorithm = HmacSignatureAlgorithm | RsaSignatureAlgorithm

/**
 * @summary Wraps and unwraps the per-message content encryption key.
 */
export interface KeyManagementAlgorithm extends AlgorithmBase<'key-management'> {
  readonly id: JweAlg
  wrap: (cek: Uint8Array, key: JoseKey) => Uint8Array
  /** @throws {@link JoseError} `INCORRECT_DECRYPTION` on every failure cause. */
  unwrap: (encryptedKey: Uint8Array, key: JoseKey) => Uint8Array
}

/**
 * @summary Padded block cipher, the encryption half of a composite `enc`.
 */
export interface BlockCipherAlgorithm extends AlgorithmBase<'block-cipher'> {
  readonly id: BlockCipherAlg
  /** Key size in bytes. */
  readonly keySize: number
  readonly ivSize: number
  encrypt: (plaintext: Uint8Array, key: Uint8Array, iv: Uint8Array) => Uint8Array
  decrypt: (ciphertext: Uint8Array, key: Uint8Array, iv: Uint8Array) => Uint8Array
}

export interface AeadResult {
  iv: Uint8Array
  ciphertext: Uint8Array
  tag: Uint8Array
}

/**
 * @summary Authenticated content encryption built from a cipher and a MAC.
 */
export interface ContentEncryptionAlgorithm extends AlgorithmBase<'content-encryption'> {
  readonly cipher: BlockCipherAlgorithm
  readonly mac: HmacSignatureAlgorithm
  readonly cekLength: number
  readonly tagLength: number
  aeadEncrypt: (plaintext: Uint8Array, cek: Uint8Array, aad: Uint8Array) => AeadResult
  aeadDecrypt: (
    ciphertext: Uint8Array,
    iv: Uint8Array,
    tag: Uint8Array,
    cek: Uint8Array,
    aad: Uint8Array,
  ) => Uint8Array
}

export type AlgorithmDescriptor =
  | SignatureAlgorithm
  | KeyManagementAlgorithm
  | BlockCipherAlgorithm
  | ContentEncryptionAlgorithm
