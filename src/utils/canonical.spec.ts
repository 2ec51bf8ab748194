import { expectJoseError } from '../../test/utils/assertions'
import { JoseErrorCode } from '../errors/jose.error'

import { canonicalStringify } from './canonical'

describe('canonicalStringify', () => {
  it('produces stable ordering', () => {
    const a = { b: 1, a: 2, z: { y: 1, x: 2 } }
    const b = { z: { x: 2, y: 1 }, a: 2, b: 1 }
    expect(canonicalStringify(a)).toBe(canonicalStringify(b))
    expect(canonicalStringify(a)).toBe('{"a":2,"b":1,"z":{"x":2,"y":1}}')
  })

  it('keeps array order and sorts objects inside arrays', () => {
    expect(canonicalStringify({ roles: [{ z: 1, a: 0 }, 'admin'] })).toBe(
      '{"roles":[{"a":0,"z":1},"admin"]}',
    )
  })

  it('throws on circular object references', () => {
    const obj: Record<string, unknown> = { a: 1 }
    obj.self = obj
    expectJoseError(
      () => canonicalStringify(obj),
      JoseErrorCode.INVALID_INPUT,
      'Circular reference detected in canonicalStringify',
    )
  })

  it('throws on circular array references', () => {
    const arr: unknown[] = [1, 2]
    arr.push(arr)
    expectJoseError(() => canonicalStringify(arr), JoseErrorCode.INVALID_INPUT)
  })
})
