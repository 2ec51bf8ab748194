import { Global, Logger, Module } from '@nestjs/common'

import { resolveJoseOptions } from '../config/jose.options'
import { JsonWebEncryptionService } from '../services/json-web-encryption.service'
import { JsonWebSignatureService } from '../services/json-web-signature.service'
import { JsonWebTokenService } from '../services/json-web-token.service'
import { RandomService } from '../services/random.service'

import { CLOCK, JOSE_OPTIONS, JWA_REGISTRY } from './jose.tokens'

import type { JoseModuleAsyncOptions, JoseModuleOptions } from '../config/jose.options'
import type { JwaRegistry } from '../jwa/registry'
import type { Clock } from '../utils/clock'
import type { DynamicModule, Provider } from '@nestjs/common'

const OPTIONAL_LOGGER = { token: Logger, optional: true }

/**
 * @summary (Private) Providers shared by both registration paths, built from the
 * resolved options.
 */
function serviceProviders(): Provider[] {
  return [
    {
      provide: JWA_REGISTRY,
      useFactory: (opts: Required<JoseModuleOptions>) => opts.registry,
      inject: [JOSE_OPTIONS],
    },
    {
      provide: CLOCK,
      useFactory: (opts: Required<JoseModuleOptions>) => opts.clock,
      inject: [JOSE_OPTIONS],
    },
    RandomService,
    {
      provide: JsonWebSignatureService,
      useFactory: (
        registry: JwaRegistry,
        opts: Required<JoseModuleOptions>,
        clock: Clock,
        logger?: Logger,
      ) => new JsonWebSignatureService(registry, opts, clock, logger),
      inject: [JWA_REGISTRY, JOSE_OPTIONS, CLOCK, OPTIONAL_LOGGER],
    },
    {
      provide: JsonWebEncryptionService,
      useFactory: (
        registry: JwaRegistry,
        opts: Required<JoseModuleOptions>,
        clock: Clock,
        random: RandomService,
        logger?: Logger,
      ) => new JsonWebEncryptionService(registry, opts, clock, random, logger),
      inject: [JWA_REGISTRY, JOSE_OPTIONS, CLOCK, RandomService, OPTIONAL_LOGGER],
    },
    {
      provide: JsonWebTokenService,
      useFactory: (
        jws: JsonWebSignatureService,
        jwe: JsonWebEncryptionService,
        random: RandomService,
        clock: Clock,
      ) => new JsonWebTokenService(jws, jwe, random, clock),
      inject: [JsonWebSignatureService, JsonWebEncryptionService, RandomService, CLOCK],
    },
  ]
}

const EXPORTS = [
  JOSE_OPTIONS,
  JWA_REGISTRY,
  CLOCK,
  RandomService,
  JsonWebSignatureService,
  JsonWebEncryptionService,
  JsonWebTokenService,
]

@Global()
@Module({})
export class JoseModule {
  /**
   * @summary Register the JOSE module with synchronous options.
   * @param options Default algorithms, clock leeway, size limit, registry and clock.
   * @returns A dynamic module exporting the JOSE services and tokens.
   * @throws {@link JoseError} with code `CONFIG_ERROR` when the options are invalid.
   */
  static register(options: JoseModuleOptions = {}): DynamicModule {
    const resolved = resolveJoseOptions(options)
    return {
      module: JoseModule,
      providers: [{ provide: JOSE_OPTIONS, useValue: resolved }, ...serviceProviders()],
      exports: EXPORTS,
    }
  }

  /**
   * @summary Register the JOSE module with async factory options.
   * @param options Async factory providing {@link JoseModuleOptions}.
   * @returns A dynamic module with providers wired to the resolved options.
   */
  static registerAsync(options: JoseModuleAsyncOptions): DynamicModule {
    const asyncOptionsProvider: Provider = {
      provide: JOSE_OPTIONS,
      useFactory: async (...args: unknown[]) =>
        resolveJoseOptions(await options.useFactory(...args)),
      inject: [...(options.inject ?? [])],
    }
    return {
      module: JoseModule,
      imports: options.imports ?? [],
      providers: [asyncOptionsProvider, ...serviceProviders()],
      exports: EXPORTS,
    }
  }
}
