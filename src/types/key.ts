import type { KeyObject } from 'node:crypto'

/**
 * @summary Shared secret for the HMAC signature family.
 */
export interface SecretJoseKey {
  kty: 'oct'
  secret: Uint8Array
}

/**
 * @summary RSA key pair; either half may be absent.
 * @remarks
 * When only the private key is present, the public half is derived from it for
 * encryption and verification.
 */
export interface RsaJoseKey {
  kty: 'RSA'
  publicKey?: KeyObject
  privateKey?: KeyObject
}

/** Key material accepted by every JOSE operation. */
export type JoseKey = SecretJoseKey | RsaJoseKey
