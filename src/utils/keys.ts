import { Buffer } from 'node:buffer'
import { createPrivateKey, createPublicKey } from 'node:crypto'

import { JoseError, JoseErrorCode } from '../errors/jose.error'

import { toBytes } from './bytes'

import type { JoseKey, RsaJoseKey, SecretJoseKey } from '../types/key'
import type { KeyObject } from 'node:crypto'

type KeyInput = string | Buffer | KeyObject

/**
 * @summary Build a shared-secret key for the HS* family.
 * @param secret Bytes, or text which is UTF-8 encoded.
 * @throws {@link JoseError} with code `INVALID_INPUT` when the secret is empty.
 */
export function secretKey(secret: string | Uint8Array): SecretJoseKey {
  const bytes = toBytes(secret)
  if (bytes.length === 0) {
    throw new JoseError(JoseErrorCode.INVALID_INPUT, 'Secret key must not be empty')
  }
  return { kty: 'oct', secret: Uint8Array.from(bytes) }
}

/**
 * @summary Build an RSA key from PEM text or `KeyObject`s.
 * @example
 * ```ts
 * const recipient = rsaKey({ publicKey: pemFromConfig })
 * const own = rsaKey({ privateKey: privatePem })
 * ```
 */
export function rsaKey(input: { publicKey?: KeyInput; privateKey?: KeyInput }): RsaJoseKey {
  const privateKey =
    input.privateKey === undefined ? undefined : toKeyObject(input.privateKey, 'private')
  const publicKey =
    input.publicKey === undefined ? undefined : toKeyObject(input.publicKey, 'public')
  for (const key of [privateKey, publicKey]) {
    if (key && key.asymmetricKeyType !== 'rsa') {
      throw new JoseError(JoseErrorCode.INVALID_INPUT, 'RSA key required', {
        keyType: key.asymmetricKeyType,
      })
    }
  }
  if (!privateKey && !publicKey) {
    throw new JoseError(JoseErrorCode.INVALID_INPUT, 'RSA key requires a public or private key')
  }
  return { kty: 'RSA', publicKey, privateKey }
}

function toKeyObject(input: KeyInput, type: 'public' | 'private'): KeyObject {
  if (typeof input === 'string' || Buffer.isBuffer(input)) {
    return type === 'private' ? createPrivateKey(input) : createPublicKey(input)
  }
  if (input.type !== type) {
    throw new JoseError(JoseErrorCode.INVALID_INPUT, `Expected an RSA ${type} key`)
  }
  return input
}

/**
 * @summary Return the secret bytes of an `oct` key.
 * @throws {@link JoseError} with code `INVALID_INPUT` for any other key type.
 */
export function requireSecret(key: JoseKey): Uint8Array {
  if (key.kty !== 'oct') {
    throw new JoseError(JoseErrorCode.INVALID_INPUT, 'Symmetric key required')
  }
  return key.secret
}

/**
 * @summary Return the RSA public key, derived from the private half when needed.
 * @throws {@link JoseError} with code `INVALID_INPUT` when no RSA key is available.
 */
export function requireRsaPublicKey(key: JoseKey): KeyObject {
  if (key.kty !== 'RSA') {
    throw new JoseError(JoseErrorCode.INVALID_INPUT, 'RSA public key required')
  }
  if (key.publicKey) return key.publicKey
  if (key.privateKey) return createPublicKey(key.privateKey)
  throw new JoseError(JoseErrorCode.INVALID_INPUT, 'RSA public key required')
}

/**
 * @summary Return the RSA private key.
 * @throws {@link JoseError} with code `INVALID_INPUT` when absent.
 */
export function requireRsaPrivateKey(key: JoseKey): KeyObject {
  if (key.kty !== 'RSA' || !key.privateKey) {
    throw new JoseError(JoseErrorCode.INVALID_INPUT, 'RSA private key required')
  }
  return key.privateKey
}
