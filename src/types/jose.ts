import type { JweAlg, JweEnc, JwsAlg, ZipAlg } from './alg'

/** JWT claims set; `exp`, `nbf` and `iat` are seconds since the epoch. */
export type Claims = Record<string, unknown>

/**
 * @summary JOSE header. Caller-supplied members are kept verbatim next to the reserved ones.
 */
export interface JoseHeader {
  alg: string
  enc?: string
  zip?: string
  [member: string]: unknown
}

/**
 * @summary Encrypted message. `header` holds the exact transmitted header bytes.
 */
export interface JweMessage {
  readonly header: Uint8Array
  readonly encryptedKey: Uint8Array
  readonly iv: Uint8Array
  readonly ciphertext: Uint8Array
  readonly tag: Uint8Array
}

/**
 * @summary Signed message. `header` and `payload` hold the exact transmitted bytes.
 */
export interface JwsMessage {
  readonly header: Uint8Array
  readonly payload: Uint8Array
  readonly signature: Uint8Array
}

export type CompactMessage = JweMessage | JwsMessage

/** Result of a successful decrypt or verify. */
export interface Jwt {
  header: JoseHeader
  claims: Claims
}

export interface ClaimsValidationOptions {
  /** Seconds of leeway applied to `exp`, `nbf` and `iat` checks (default 0). */
  clockToleranceSeconds?: number
  /** Reject tokens whose `iat` is older than this many seconds. */
  maxAgeSeconds?: number
}

export interface JweEncryptOptions {
  alg?: JweAlg
  enc?: JweEnc
  /**
   * Extra header members. `alg` and `enc` overwrite caller keys of the same name, and a
   * `zip` member is treated like `compression`.
   */
  addHeader?: Record<string, unknown>
  /** Additional authenticated data bound to the token but not transmitted. */
  adata?: string | Uint8Array
  compression?: ZipAlg | string
  /** Serialize claims with sorted keys. */
  canonical?: boolean
}

export interface JweDecryptOptions {
  adata?: string | Uint8Array
  /** Run the claims validator (default true). */
  validateClaims?: boolean
  maxAgeSeconds?: number
  expectedAlg?: JweAlg
  expectedEnc?: JweEnc
}

export interface JwsSignOptions {
  alg?: JwsAlg
  addHeader?: Record<string, unknown>
  canonical?: boolean
}

export interface JwsVerifyOptions {
  validateClaims?: boolean
  maxAgeSeconds?: number
  expectedAlg?: JwsAlg
}

interface JwtIssueOptions {
  /** Token lifetime (e.g., `30s`, `5m`, `1h`, `1d`, `500ms`, or numeric seconds). */
  expiresIn?: string | number
  /** Delay before the token becomes valid, same format as `expiresIn`. */
  notBefore?: string | number
  /** Add a random `jti` claim. */
  jwtId?: boolean
}

export interface JwtSignOptions extends JwsSignOptions, JwtIssueOptions {}

export interface JwtEncryptOptions extends JweEncryptOptions, JwtIssueOptions {}

export interface JwtVerifyOptions extends JweDecryptOptions {
  expectedSignatureAlg?: JwsAlg
}
