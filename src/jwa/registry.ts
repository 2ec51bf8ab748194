import { JoseError, JoseErrorCode } from '../errors/jose.error'

import { AesCbcHmacSha2 } from './aes-cbc-hmac-sha2'

import type {
  AlgorithmDescriptor,
  ContentEncryptionAlgorithm,
  KeyManagementAlgorithm,
  SignatureAlgorithm,
} from './algorithm'

const COMPOSITE_SEPARATOR = /[+-]/

/**
 * @summary Immutable map from JWA identifier to algorithm descriptor.
 * @remarks
 * Built once and then only read, so concurrent lookups need no coordination. Composite
 * content encryption identifiers (`A128CBC-HS256`, or `A128CBC+HS256`) that are not
 * registered verbatim resolve to a descriptor pairing the registered cipher and MAC.
 * Services receive the registry through DI (`JWA_REGISTRY`); tests build their own
 * instance instead of patching a shared one.
 */
export class JwaRegistry {
  private readonly algorithms: ReadonlyMap<string, AlgorithmDescriptor>

  /**
   * @throws {@link JoseError} with code `CONFIG_ERROR` on duplicate identifiers.
   */
  constructor(algorithms: Iterable<AlgorithmDescriptor>) {
    const map = new Map<string, AlgorithmDescriptor>()
    for (const algorithm of algorithms) {
      if (map.has(algorithm.id)) {
        throw new JoseError(
          JoseErrorCode.CONFIG_ERROR,
          `Duplicate algorithm identifier: ${algorithm.id}`,
        )
      }
      map.set(algorithm.id, algorithm)
    }
    this.algorithms = map
    Object.freeze(this)
  }

  /**
   * @summary Registered identifiers, composites excluded.
   */
  ids(): string[] {
    return [...this.algorithms.keys()]
  }

  /**
   * @summary Whether {@link lookup} would succeed for `id`.
   */
  has(id: string): boolean {
    return this.resolve(id) !== undefined
  }

  /**
   * @summary Resolve an identifier, exact match first, then as a composite pair.
   * @throws {@link JoseError} with code `UNSUPPORTED_ALGORITHM` when unresolvable.
   */
  lookup(id: string): AlgorithmDescriptor {
    const algorithm = this.resolve(id)
    if (!algorithm) {
      throw new JoseError(JoseErrorCode.UNSUPPORTED_ALGORITHM, `Unsupported algorithm: ${id}`)
    }
    return algorithm
  }

  lookupSignature(id: string): SignatureAlgorithm {
    const algorithm = this.lookup(id)
    if (algorithm.kind !== 'signature') throw wrongKind('signature', id)
    return algorithm
  }

  lookupKeyManagement(id: string): KeyManagementAlgorithm {
    const algorithm = this.lookup(id)
    if (algorithm.kind !== 'key-management') throw wrongKind('key management', id)
    return algorithm
  }

  lookupContentEncryption(id: string): ContentEncryptionAlgorithm {
    const algorithm = this.lookup(id)
    if (algorithm.kind !== 'content-encryption') {
      throw wrongKind('content encryption', id)
    }
    return algorithm
  }

  private resolve(id: string): AlgorithmDescriptor | undefined {
    const exact = this.algorithms.get(id)
    if (exact) return exact

    const parts = id.split(COMPOSITE_SEPARATOR)
    if (parts.length !== 2) return undefined
    const cipher = this.algorithms.get(parts[0])
    const mac = this.algorithms.get(parts[1])
    if (!cipher || cipher.kind !== 'block-cipher') return undefined
    if (!mac || mac.kind !== 'signature' || mac.family !== 'HMAC') return undefined
    if (mac.digestSize !== cipher.keySize * 2) return undefined
    return new AesCbcHmacSha2(cipher, mac)
  }
}

function wrongKind(kind: string, id: string): JoseError {
  return new JoseError(
    JoseErrorCode.UNSUPPORTED_ALGORITHM,
    `Unsupported ${kind} algorithm: ${id}`,
  )
}
