/** HMAC-SHA2 signature algorithm identifiers. */
export type HmacAlg = 'HS256' | 'HS384' | 'HS512'
/** RSASSA-PKCS1-v1_5 signature algorithm identifiers. */
export type RsaSignAlg = 'RS256' | 'RS384' | 'RS512'
/** JOSE JWS algorithm identifiers supported by this library. */
export type JwsAlg = HmacAlg | RsaSignAlg
/** JOSE JWE key management algorithm supported. */
export type JweAlg = 'RSA-OAEP'
/** AES-CBC halves of the composite content encryption identifiers. */
export type BlockCipherAlg = 'A128CBC' | 'A192CBC' | 'A256CBC'
/** JOSE JWE content encryption algorithms supported. */
export type JweEnc = 'A128CBC-HS256' | 'A192CBC-HS384' | 'A256CBC-HS512'
/** JWE `zip` header values supported. */
export type ZipAlg = 'DEF'

/** Hash functions backing the SHA-2 families. */
export type ShaHash = 'sha256' | 'sha384' | 'sha512'

/** Discriminant of the algorithm descriptors held by the registry. */
export type AlgorithmKind =
  | 'signature'
  | 'key-management'
  | 'block-cipher'
  | 'content-encryption'
