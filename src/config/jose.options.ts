import { JoseError, JoseErrorCode } from '../errors/jose.error'
import { DEFAULT_JWA_REGISTRY } from '../jwa/default-registry'
import { systemClock } from '../utils/clock'

import type { JwaRegistry } from '../jwa/registry'
import type { JweAlg, JweEnc, JwsAlg } from '../types/alg'
import type { Clock } from '../utils/clock'
import type {
  InjectionToken,
  ModuleMetadata,
  OptionalFactoryDependency,
} from '@nestjs/common'

export interface JoseModuleOptions {
  defaultJweAlg?: JweAlg
  defaultJweEnc?: JweEnc
  defaultJwsAlg?: JwsAlg
  /** Leeway in seconds for `exp`/`nbf`/`iat` checks (default: 0) */
  clockToleranceSeconds?: number
  /** Maximum plaintext, payload and decompressed size in bytes (default: 1MB) */
  maxTokenSize?: number
  /** Algorithm registry; substitute one to restrict or extend the algorithm set */
  registry?: JwaRegistry
  clock?: Clock
}

export type JoseModuleAsyncOptions = Pick<ModuleMetadata, 'imports'> & {
  useFactory: (...args: unknown[]) => Promise<JoseModuleOptions> | JoseModuleOptions
  inject?: Array<InjectionToken | OptionalFactoryDependency>
}

export const defaultJoseOptions: Required<JoseModuleOptions> = {
  defaultJweAlg: 'RSA-OAEP',
  defaultJweEnc: 'A128CBC-HS256',
  defaultJwsAlg: 'HS256',
  clockToleranceSeconds: 0,
  maxTokenSize: 1024 * 1024,
  registry: DEFAULT_JWA_REGISTRY,
  clock: systemClock,
}

/**
 * @summary Merge options over {@link defaultJoseOptions} and check them.
 * @throws {@link JoseError} with code `CONFIG_ERROR` when a limit is out of range or a
 * default algorithm is missing from the registry.
 */
export function resolveJoseOptions(
  options: JoseModuleOptions = {},
): Required<JoseModuleOptions> {
  const resolved = { ...defaultJoseOptions, ...options }

  const tolerance = resolved.clockToleranceSeconds
  if (!Number.isFinite(tolerance) || tolerance < 0) {
    throw new JoseError(
      JoseErrorCode.CONFIG_ERROR,
      'clockToleranceSeconds must be a non-negative number',
    )
  }
  if (!Number.isInteger(resolved.maxTokenSize) || resolved.maxTokenSize <= 0) {
    throw new JoseError(JoseErrorCode.CONFIG_ERROR, 'maxTokenSize must be a positive integer')
  }
  const defaults = [resolved.defaultJweAlg, resolved.defaultJweEnc, resolved.defaultJwsAlg]
  for (const alg of defaults) {
    if (!resolved.registry.has(alg)) {
      throw new JoseError(
        JoseErrorCode.CONFIG_ERROR,
        `Default algorithm ${alg} is not in the registry`,
      )
    }
  }
  return resolved
}
