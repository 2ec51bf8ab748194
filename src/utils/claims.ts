import { JoseError, JoseErrorCode, JoseErrorMessage } from '../errors/jose.error'

import type { Claims, ClaimsValidationOptions } from '../types/jose'

/**
 * @summary Check the temporal claims `exp`, `nbf` and (with `maxAgeSeconds`) `iat`.
 * @param claims Decoded claims set.
 * @param now Current time in seconds since the epoch.
 * @param options Leeway (default 0) and optional maximum token age.
 * @throws {@link JoseError} with code `TOKEN_EXPIRED` when `exp <= now` or the token is
 * older than `maxAgeSeconds`, `TOKEN_NOT_YET_VALID` when `nbf > now`, and
 * `INVALID_INPUT` when a temporal claim is not a number or `iat` is required but absent.
 */
export function validateClaims(
  claims: Claims,
  now: number,
  options: ClaimsValidationOptions = {},
): void {
  const leeway = options.clockToleranceSeconds ?? 0
  const exp = numericClaim(claims, 'exp')
  const nbf = numericClaim(claims, 'nbf')

  if (exp !== undefined && exp + leeway <= now) {
    throw new JoseError(JoseErrorCode.TOKEN_EXPIRED, JoseErrorMessage.TOKEN_EXPIRED, {
      exp,
    })
  }
  if (nbf !== undefined && nbf - leeway > now) {
    throw new JoseError(
      JoseErrorCode.TOKEN_NOT_YET_VALID,
      JoseErrorMessage.TOKEN_NOT_YET_VALID,
      { nbf },
    )
  }

  if (options.maxAgeSeconds !== undefined) {
    const iat = numericClaim(claims, 'iat')
    if (iat === undefined) {
      throw new JoseError(JoseErrorCode.INVALID_INPUT, 'Missing required claim: iat')
    }
    if (iat + options.maxAgeSeconds + leeway <= now) {
      throw new JoseError(JoseErrorCode.TOKEN_EXPIRED, JoseErrorMessage.TOKEN_EXPIRED, {
        iat,
      })
    }
  }
}

function numericClaim(claims: Claims, name: 'exp' | 'nbf' | 'iat'): number | undefined {
  const value = claims[name]
  if (value === undefined) return undefined
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new JoseError(JoseErrorCode.INVALID_INPUT, `Claim ${name} must be a number`)
  }
  return value
}
