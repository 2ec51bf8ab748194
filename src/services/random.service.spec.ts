import { Buffer } from 'node:buffer'

import { expectJoseError } from '../../test/utils/assertions'
import { JoseErrorCode } from '../errors/jose.error'

import { RandomService } from './random.service'

describe('RandomService', () => {
  const svc = new RandomService()

  it('bytes() returns the requested length', () => {
    expect(svc.bytes(16)).toHaveLength(16)
    expect(svc.bytes(64)).toBeInstanceOf(Uint8Array)
  })

  it('bytes() draws fresh material each call', () => {
    expect(Buffer.from(svc.bytes(32)).equals(Buffer.from(svc.bytes(32)))).toBe(false)
  })

  it('bytes() rejects non-positive lengths', () => {
    for (const length of [0, -1, 1.5]) {
      expectJoseError(
        () => svc.bytes(length),
        JoseErrorCode.INVALID_INPUT,
        'Random length must be a positive integer',
      )
    }
  })

  it('tokenId() returns a ULID', () => {
    const id = svc.tokenId()
    expect(id).toMatch(/^[0-9A-HJKMNP-TV-Z]{26}$/)
    expect(svc.tokenId()).not.toBe(id)
  })
})
