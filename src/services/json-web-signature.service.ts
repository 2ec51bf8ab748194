import { Inject, Injectable, Optional } from '@nestjs/common'

import { JoseError, JoseErrorCode, JoseErrorMessage } from '../errors/jose.error'
import { CLOCK, JOSE_OPTIONS, JWA_REGISTRY } from '../module/jose.tokens'
import { canonicalStringify } from '../utils/canonical'
import { validateClaims } from '../utils/claims'
import { jwsSigningInput } from '../utils/compact'
import { base64UrlEncode, toUtf8Bytes } from '../utils/encoding'
import { assertMaxSize, parseClaims, parseHeader } from '../utils/validation'

import type { JoseModuleOptions } from '../config/jose.options'
import type { JwaRegistry } from '../jwa/registry'
import type {
  Claims,
  JoseHeader,
  JwsMessage,
  JwsSignOptions,
  JwsVerifyOptions,
  Jwt,
} from '../types/jose'
import type { JoseKey } from '../types/key'
import type { Clock } from '../utils/clock'
import type { Logger } from '@nestjs/common'

/**
 * @summary JWS sign/verify with HMAC-SHA2 and RSASSA-PKCS1-v1_5.
 * @remarks
 * The signing input is `BASE64URL(header) || '.' || BASE64URL(payload)`. HMAC tags are
 * compared in constant time.
 */
@Injectable()
export class JsonWebSignatureService {
  constructor(
    @Inject(JWA_REGISTRY) private readonly registry: JwaRegistry,
    @Inject(JOSE_OPTIONS) private readonly options: Required<JoseModuleOptions>,
    @Inject(CLOCK) private readonly clock: Clock,
    @Optional() private readonly logger?: Logger,
  ) {}

  /**
   * @summary Sign a claims set.
   * @param claims JSON-serializable claims.
   * @param key A secret for `HS*`, an RSA key with its private half for `RS*`.
   * @param options `alg` (default HS256), extra header members and canonical claim
   * ordering.
   * @returns Frozen JWS message.
   * @throws {@link JoseError} with code `UNSUPPORTED_ALGORITHM` for an unknown alg, or
   * `INVALID_INPUT` when the key does not fit the algorithm family.
   * @example
   * ```ts
   * const token = serializeCompact(jws.sign({ sub: 'user-1' }, secretKey('test-secret')))
   * ```
   */
  sign(claims: Claims, key: JoseKey, options?: JwsSignOptions): JwsMessage {
    const algorithm = this.registry.lookupSignature(options?.alg ?? this.options.defaultJwsAlg)
    const header: JoseHeader = { ...options?.addHeader, alg: algorithm.id }

    const payload = toUtf8Bytes(
      options?.canonical ? canonicalStringify(claims) : JSON.stringify(claims),
    )
    assertMaxSize('payload', payload, this.options.maxTokenSize)
    const headerBytes = toUtf8Bytes(JSON.stringify(header))
    const signature = algorithm.sign(
      jwsSigningInput(base64UrlEncode(headerBytes), base64UrlEncode(payload)),
      key,
    )
    return Object.freeze({ header: headerBytes, payload, signature })
  }

  /**
   * @summary Verify a JWS message and validate its temporal claims.
   * @param jws Message produced by {@link sign} or `deserializeCompact`.
   * @param key The signing secret, or an RSA key with at least its public half.
   * @param options Claims validation switches and an optional expected alg.
   * @returns Decoded header and claims.
   * @throws {@link JoseError} with code `MALFORMED_TOKEN`, `UNSUPPORTED_ALGORITHM`,
   * `SIGNATURE_MISMATCH` (`Mismatched signatures`), `TOKEN_EXPIRED` or
   * `TOKEN_NOT_YET_VALID`.
   */
  verify(jws: JwsMessage, key: JoseKey, options?: JwsVerifyOptions): Jwt {
    const header = parseHeader(jws.header)
    const alg = header.alg
    if (options?.expectedAlg && options.expectedAlg !== alg) {
      throw new JoseError(
        JoseErrorCode.UNSUPPORTED_ALGORITHM,
        `Unexpected JWS alg (expected ${options.expectedAlg}, got ${alg})`,
      )
    }
    const algorithm = this.registry.lookupSignature(alg)
    assertMaxSize('payload', jws.payload, this.options.maxTokenSize)

    const signingInput = jwsSigningInput(
      base64UrlEncode(jws.header),
      base64UrlEncode(jws.payload),
    )
    if (!algorithm.verify(signingInput, jws.signature, key)) {
      this.logger?.debug('JWS verification failed', {
        alg,
        code: JoseErrorCode.SIGNATURE_MISMATCH,
      })
      throw new JoseError(
        JoseErrorCode.SIGNATURE_MISMATCH,
        JoseErrorMessage.SIGNATURE_MISMATCH,
      )
    }

    const claims = parseClaims(jws.payload)
    if (options?.validateClaims ?? true) {
      validateClaims(claims, this.clock.now(), {
        clockToleranceSeconds: this.options.clockToleranceSeconds,
        maxAgeSeconds: options?.maxAgeSeconds,
      })
    }
    return { header, claims }
  }
}
