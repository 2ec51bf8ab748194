import { randomBytes } from 'node:crypto'

import { expectJoseError } from '../../test/utils/assertions'
import { JoseErrorCode, JoseErrorMessage } from '../errors/jose.error'
import { toUtf8Bytes, fromUtf8BytesStrict } from '../utils/encoding'

import { AesCbc } from './aes-cbc'
import { AesCbcHmacSha2 } from './aes-cbc-hmac-sha2'
import { HmacSha2 } from './hmac-sha2'

const SUITES = [
  new AesCbcHmacSha2(new AesCbc('A128CBC', 16), new HmacSha2('HS256', 'sha256', 32)),
  new AesCbcHmacSha2(new AesCbc('A192CBC', 24), new HmacSha2('HS384', 'sha384', 48)),
  new AesCbcHmacSha2(new AesCbc('A256CBC', 32), new HmacSha2('HS512', 'sha512', 64)),
]

describe('AesCbcHmacSha2', () => {
  const aad = toUtf8Bytes('eyJhbGciOiJSU0EtT0FFUCJ9')
  const plaintext = toUtf8Bytes('{"sub":"user-1"}')

  it.each([
    ['A128CBC-HS256', 32, 16],
    ['A192CBC-HS384', 48, 24],
    ['A256CBC-HS512', 64, 32],
  ])('%s uses a %i byte CEK and a %i byte tag', (id, cekLength, tagLength) => {
    const suite = SUITES.find(s => s.id === id)
    expect(suite?.cekLength).toBe(cekLength)
    expect(suite?.tagLength).toBe(tagLength)
  })

  describe.each(SUITES.map(suite => [suite.id, suite] as const))('%s', (_id, suite) => {
    it('round-trips with the same CEK and AAD', () => {
      const cek = new Uint8Array(randomBytes(suite.cekLength))
      const { iv, ciphertext, tag } = suite.aeadEncrypt(plaintext, cek, aad)

      expect(iv).toHaveLength(16)
      expect(tag).toHaveLength(suite.tagLength)
      // 16 bytes of plaintext pad to two blocks
      expect(ciphertext).toHaveLength(32)
      expect(fromUtf8BytesStrict(suite.aeadDecrypt(ciphertext, iv, tag, cek, aad))).toBe(
        '{"sub":"user-1"}',
      )
    })

    it('draws a fresh IV for every message', () => {
      const cek = new Uint8Array(randomBytes(suite.cekLength))
      const first = suite.aeadEncrypt(plaintext, cek, aad)
      const second = suite.aeadEncrypt(plaintext, cek, aad)
      expect(first.iv).not.toEqual(second.iv)
      expect(first.ciphertext).not.toEqual(second.ciphertext)
    })

    it('rejects a modified ciphertext', () => {
      const cek = new Uint8Array(randomBytes(suite.cekLength))
      const { iv, ciphertext, tag } = suite.aeadEncrypt(plaintext, cek, aad)
      const tampered = Uint8Array.from(ciphertext)
      tampered[0] ^= 0x01
      expectJoseError(
        () => suite.aeadDecrypt(tampered, iv, tag, cek, aad),
        JoseErrorCode.AUTHENTICATION_TAG_MISMATCH,
        JoseErrorMessage.TAG_MISMATCH,
      )
    })

    it('rejects a modified IV and tag', () => {
      const cek = new Uint8Array(randomBytes(suite.cekLength))
      const { iv, ciphertext, tag } = suite.aeadEncrypt(plaintext, cek, aad)
      const badIv = Uint8Array.from(iv)
      badIv[15] ^= 0x80
      const badTag = Uint8Array.from(tag)
      badTag[badTag.length - 1] ^= 0x01
      expectJoseError(
        () => suite.aeadDecrypt(ciphertext, badIv, tag, cek, aad),
        JoseErrorCode.AUTHENTICATION_TAG_MISMATCH,
      )
      expectJoseError(
        () => suite.aeadDecrypt(ciphertext, iv, badTag, cek, aad),
        JoseErrorCode.AUTHENTICATION_TAG_MISMATCH,
      )
    })

    it('rejects different AAD', () => {
      const cek = new Uint8Array(randomBytes(suite.cekLength))
      const { iv, ciphertext, tag } = suite.aeadEncrypt(plaintext, cek, aad)
      expectJoseError(
        () => suite.aeadDecrypt(ciphertext, iv, tag, cek, toUtf8Bytes('other')),
        JoseErrorCode.AUTHENTICATION_TAG_MISMATCH,
      )
    })

    it('rejects a CEK of the wrong length', () => {
      expectJoseError(
        () => suite.aeadEncrypt(plaintext, new Uint8Array(suite.cekLength - 1), aad),
        JoseErrorCode.INVALID_INPUT,
        `${suite.id} CEK must be ${suite.cekLength} bytes`,
      )
    })
  })

  it('refuses a MAC whose digest is not twice the cipher key', () => {
    expectJoseError(
      () => new AesCbcHmacSha2(new AesCbc('A128CBC', 16), new HmacSha2('HS512', 'sha512', 64)),
      JoseErrorCode.UNSUPPORTED_ALGORITHM,
      'Unsupported algorithm: A128CBC-HS512',
    )
  })
})
