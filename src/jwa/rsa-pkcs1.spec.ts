import { OTHER_KEY, RECIPIENT_KEY, RECIPIENT_PUBLIC_KEY } from '../../test/fixtures/test-keys'
import { expectJoseError } from '../../test/utils/assertions'
import { JoseErrorCode } from '../errors/jose.error'
import { toUtf8Bytes } from '../utils/encoding'
import { secretKey } from '../utils/keys'

import { RsaPkcs1 } from './rsa-pkcs1'

describe('RsaPkcs1', () => {
  const data = toUtf8Bytes('eyJhbGciOiJSUzI1NiJ9.eyJzdWIiOiJ1c2VyLTEifQ')

  it.each([
    ['RS256', 'sha256'],
    ['RS384', 'sha384'],
    ['RS512', 'sha512'],
  ] as const)('%s signs with the private half and verifies with the public half', (id, hash) => {
    const alg = new RsaPkcs1(id, hash)
    const signature = alg.sign(data, RECIPIENT_KEY)
    expect(signature).toHaveLength(256)
    expect(alg.verify(data, signature, RECIPIENT_PUBLIC_KEY)).toBe(true)
  })

  it('is deterministic', () => {
    const alg = new RsaPkcs1('RS256', 'sha256')
    expect(alg.sign(data, RECIPIENT_KEY)).toEqual(alg.sign(data, RECIPIENT_KEY))
  })

  it('rejects a signature from another key', () => {
    const alg = new RsaPkcs1('RS256', 'sha256')
    const signature = alg.sign(data, OTHER_KEY)
    expect(alg.verify(data, signature, RECIPIENT_KEY)).toBe(false)
  })

  it('rejects a signature of the wrong length without calling into the verifier', () => {
    const alg = new RsaPkcs1('RS256', 'sha256')
    const signature = alg.sign(data, RECIPIENT_KEY)
    expect(alg.verify(data, signature.subarray(1), RECIPIENT_KEY)).toBe(false)
  })

  it('needs a private key to sign and an RSA key to verify', () => {
    const alg = new RsaPkcs1('RS256', 'sha256')
    expectJoseError(
      () => alg.sign(data, RECIPIENT_PUBLIC_KEY),
      JoseErrorCode.INVALID_INPUT,
      'RSA private key required',
    )
    expectJoseError(
      () => alg.verify(data, new Uint8Array(256), secretKey('test-secret')),
      JoseErrorCode.INVALID_INPUT,
      'RSA public key required',
    )
  })
})
