import { expectJoseError } from '../../test/utils/assertions'
import { JoseErrorCode } from '../errors/jose.error'
import { AesCbc } from '../jwa/aes-cbc'
import { DEFAULT_JWA_REGISTRY } from '../jwa/default-registry'
import { HmacSha2 } from '../jwa/hmac-sha2'
import { JwaRegistry } from '../jwa/registry'
import { RsaOaep } from '../jwa/rsa-oaep'
import { fixedClock, systemClock } from '../utils/clock'

import { defaultJoseOptions, resolveJoseOptions } from './jose.options'

describe('resolveJoseOptions', () => {
  it('fills in the defaults', () => {
    const resolved = resolveJoseOptions()
    expect(resolved).toEqual(defaultJoseOptions)
    expect(resolved.defaultJweAlg).toBe('RSA-OAEP')
    expect(resolved.defaultJweEnc).toBe('A128CBC-HS256')
    expect(resolved.defaultJwsAlg).toBe('HS256')
    expect(resolved.clockToleranceSeconds).toBe(0)
    expect(resolved.maxTokenSize).toBe(1024 * 1024)
    expect(resolved.registry).toBe(DEFAULT_JWA_REGISTRY)
    expect(resolved.clock).toBe(systemClock)
  })

  it('keeps caller values', () => {
    const clock = fixedClock(1_700_000_000)
    const resolved = resolveJoseOptions({
      defaultJweEnc: 'A256CBC-HS512',
      clockToleranceSeconds: 30,
      clock,
    })
    expect(resolved.defaultJweEnc).toBe('A256CBC-HS512')
    expect(resolved.clockToleranceSeconds).toBe(30)
    expect(resolved.clock).toBe(clock)
  })

  it('rejects a negative tolerance', () => {
    expectJoseError(
      () => resolveJoseOptions({ clockToleranceSeconds: -1 }),
      JoseErrorCode.CONFIG_ERROR,
      'clockToleranceSeconds must be a non-negative number',
    )
  })

  it('rejects a non-positive size limit', () => {
    expectJoseError(
      () => resolveJoseOptions({ maxTokenSize: 0 }),
      JoseErrorCode.CONFIG_ERROR,
      'maxTokenSize must be a positive integer',
    )
  })

  it('requires the default algorithms to be registered', () => {
    const registry = new JwaRegistry([
      new RsaOaep(),
      new AesCbc('A128CBC', 16),
      new HmacSha2('HS256', 'sha256', 32),
    ])
    expect(resolveJoseOptions({ registry }).registry).toBe(registry)
    expectJoseError(
      () => resolveJoseOptions({ registry, defaultJwsAlg: 'RS256' }),
      JoseErrorCode.CONFIG_ERROR,
      'Default algorithm RS256 is not in the registry',
    )
  })
})
