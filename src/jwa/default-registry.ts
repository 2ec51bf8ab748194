import { AesCbc } from './aes-cbc'
import { HmacSha2 } from './hmac-sha2'
import { JwaRegistry } from './registry'
import { RsaOaep } from './rsa-oaep'
import { RsaPkcs1 } from './rsa-pkcs1'

/**
 * @summary Build a registry holding every algorithm this library implements.
 */
export function createDefaultJwaRegistry(): JwaRegistry {
  return new JwaRegistry([
    new HmacSha2('HS256', 'sha256', 32),
    new HmacSha2('HS384', 'sha384', 48),
    new HmacSha2('HS512', 'sha512', 64),
    new RsaPkcs1('RS256', 'sha256'),
    new RsaPkcs1('RS384', 'sha384'),
    new RsaPkcs1('RS512', 'sha512'),
    new RsaOaep(),
    new AesCbc('A128CBC', 16),
    new AesCbc('A192CBC', 24),
    new AesCbc('A256CBC', 32),
  ])
}

/** Shared default instance; immutable, safe to reuse across modules. */
export const DEFAULT_JWA_REGISTRY = createDefaultJwaRegistry()
