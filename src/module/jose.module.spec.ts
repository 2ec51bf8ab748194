import { Logger } from '@nestjs/common'
import { Test } from '@nestjs/testing'

import { HMAC_KEY } from '../../test/fixtures/test-keys'
import { JsonWebSignatureService } from '../services/json-web-signature.service'
import { secretKey } from '../utils/keys'

import { JoseModule } from './jose.module'
import { JOSE_OPTIONS } from './jose.tokens'

import type { Provider } from '@nestjs/common'

function provides(providers: Provider[] | undefined, token: unknown): boolean {
  return (providers ?? []).some(provider =>
    typeof provider === 'function' ? provider === token : provider.provide === token,
  )
}

describe('JoseModule DI', () => {
  it('register() resolves the options eagerly', () => {
    const dynamic = JoseModule.register({ clockToleranceSeconds: 5 })
    const optionsProvider = (dynamic.providers ?? []).find(
      provider => typeof provider !== 'function' && provider.provide === JOSE_OPTIONS,
    )
    expect(optionsProvider).toMatchObject({
      useValue: { clockToleranceSeconds: 5, defaultJwsAlg: 'HS256' },
    })
    expect(provides(dynamic.providers, JsonWebSignatureService)).toBe(true)
  })

  it('registerAsync() carries the factory imports', () => {
    const imported = { module: class ExternalConfigModule {} }
    const dynamic = JoseModule.registerAsync({ imports: [imported], useFactory: () => ({}) })
    expect(dynamic.imports).toEqual([imported])
    expect(provides(dynamic.providers, JOSE_OPTIONS)).toBe(true)
  })

  it('hands a provided Logger to the services', async () => {
    const logger = new Logger('JoseTest')
    const debug = jest.spyOn(logger, 'debug').mockImplementation(() => undefined)
    const loggerModule = {
      module: class LoggerModule {},
      global: true,
      providers: [{ provide: Logger, useValue: logger }],
      exports: [Logger],
    }
    const moduleRef = await Test.createTestingModule({
      imports: [loggerModule, JoseModule.register()],
    }).compile()

    const jws = moduleRef.get(JsonWebSignatureService)
    const message = jws.sign({}, HMAC_KEY)
    expect(() => jws.verify(message, secretKey('other-secret'))).toThrow()
    expect(debug).toHaveBeenCalledTimes(1)
    await moduleRef.close()
  })
})
