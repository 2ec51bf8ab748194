import { Inject, Injectable } from '@nestjs/common'

import { JoseError, JoseErrorCode } from '../errors/jose.error'
import { CLOCK } from '../module/jose.tokens'
import { deserializeCompact, isJweMessage, serializeCompact } from '../utils/compact'
import { parseHeader } from '../utils/validation'

import { JsonWebEncryptionService } from './json-web-encryption.service'
import { JsonWebSignatureService } from './json-web-signature.service'
import { RandomService } from './random.service'

import type {
  Claims,
  JoseHeader,
  Jwt,
  JwtEncryptOptions,
  JwtSignOptions,
  JwtVerifyOptions,
} from '../types/jose'
import type { JoseKey } from '../types/key'
import type { Clock } from '../utils/clock'

const UNIT_MS = { ms: 1, s: 1000, m: 60_000, h: 3_600_000, d: 86_400_000 } as const
type TimeUnit = keyof typeof UNIT_MS

function isTimeUnit(unit: string): unit is TimeUnit {
  return Object.hasOwn(UNIT_MS, unit)
}

/**
 * @summary Convert a duration such as `30s`, `5m`, `1h`, `1d` or `500ms` into seconds.
 * @remarks Plain numbers are taken as seconds.
 * @throws {@link JoseError} with code `INVALID_INPUT` for anything else.
 */
export function parseDuration(input: string | number): number {
  if (typeof input === 'number') {
    if (!Number.isFinite(input) || input < 0) {
      throw new JoseError(JoseErrorCode.INVALID_INPUT, `Invalid duration: ${input}`)
    }
    return input
  }

  const match = /^(\d+(?:\.\d+)?)\s*(ms|[smhd])$/i.exec(input.trim())
  const unit = match?.[2]?.toLowerCase()
  if (!match || unit === undefined || !isTimeUnit(unit)) {
    throw new JoseError(JoseErrorCode.INVALID_INPUT, `Invalid duration: ${input}`)
  }
  return (Number(match[1]) * UNIT_MS[unit]) / 1000
}

/**
 * @summary JWT issuing and verification over compact strings.
 * @remarks
 * Stamps `iat`, `exp`, `nbf` and `jti` and delegates to {@link JsonWebSignatureService}
 * and {@link JsonWebEncryptionService}. Tokens are told apart by segment count: five
 * for JWE, three for JWS.
 */
@Injectable()
export class JsonWebTokenService {
  constructor(
    private readonly jws: JsonWebSignatureService,
    private readonly jwe: JsonWebEncryptionService,
    private readonly random: RandomService,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  /**
   * @summary Issue a signed JWT.
   * @param claims Caller claims; registered time claims set here take precedence.
   * @param key Signing key.
   * @param options `expiresIn`, `notBefore`, `jwtId` plus the JWS sign options.
   * @returns Compact JWS.
   * @example
   * ```ts
   * const token = jwt.sign({ sub: 'user-1' }, secretKey('test-secret'), { expiresIn: '15m' })
   * ```
   */
  sign(claims: Claims, key: JoseKey, options: JwtSignOptions = {}): string {
    const { expiresIn, notBefore, jwtId, ...jwsOptions } = options
    const stamped = this.stamp(claims, { expiresIn, notBefore, jwtId })
    return serializeCompact(this.jws.sign(stamped, key, jwsOptions))
  }

  /**
   * @summary Issue an encrypted JWT.
   * @param claims Caller claims; registered time claims set here take precedence.
   * @param key Recipient RSA key.
   * @param options `expiresIn`, `notBefore`, `jwtId` plus the JWE encrypt options.
   * @returns Compact JWE.
   */
  encrypt(claims: Claims, key: JoseKey, options: JwtEncryptOptions = {}): string {
    const { expiresIn, notBefore, jwtId, ...jweOptions } = options
    const stamped = this.stamp(claims, { expiresIn, notBefore, jwtId })
    return serializeCompact(this.jwe.encrypt(stamped, key, jweOptions))
  }

  /**
   * @summary Verify a compact JWS or decrypt a compact JWE.
   * @param token Compact token string.
   * @param key Verification or decryption key.
   * @param options JWE decrypt options; `expectedSignatureAlg` applies to JWS tokens.
   * @throws {@link JoseError} with code `MALFORMED_TOKEN` (`Malformed JWT`) when the
   * token has neither five nor three segments, and anything the delegated service throws.
   */
  verify(token: string, key: JoseKey, options: JwtVerifyOptions = {}): Jwt {
    const message = deserializeCompact(token)
    if (isJweMessage(message)) return this.jwe.decrypt(message, key, options)
    return this.jws.verify(message, key, {
      validateClaims: options.validateClaims,
      maxAgeSeconds: options.maxAgeSeconds,
      expectedAlg: options.expectedSignatureAlg,
    })
  }

  /**
   * @summary Read the header of a compact token without verifying it.
   */
  decode(token: string): JoseHeader {
    const message = deserializeCompact(token)
    return parseHeader(message.header, isJweMessage(message))
  }

  private stamp(
    claims: Claims,
    options: Pick<JwtSignOptions, 'expiresIn' | 'notBefore' | 'jwtId'>,
  ): Claims {
    const iat = Math.floor(this.clock.now())
    const stamped: Claims = { ...claims, iat }
    if (options.expiresIn !== undefined) stamped.exp = iat + parseDuration(options.expiresIn)
    if (options.notBefore !== undefined) stamped.nbf = iat + parseDuration(options.notBefore)
    if (options.jwtId) stamped.jti = this.random.tokenId()
    return stamped
  }
}
