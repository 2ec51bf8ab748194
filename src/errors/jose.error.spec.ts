import {
  JoseError,
  JoseErrorCode,
  JoseErrorMessage,
  isJoseError,
  unsupportedCompression,
} from './jose.error'

describe('JoseError', () => {
  describe('construction', () => {
    it('constructs with code only', () => {
      const error = new JoseError(JoseErrorCode.MALFORMED_TOKEN)

      expect(error).toBeInstanceOf(Error)
      expect(error).toBeInstanceOf(JoseError)
      expect(error.code).toBe(JoseErrorCode.MALFORMED_TOKEN)
      expect(error.message).toBe('MALFORMED_TOKEN')
      expect(error.details).toBeUndefined()
    })

    it('constructs with code, message, and details', () => {
      const details = { alg: 'RSA-OAEP', enc: 'A128CBC-HS256' }
      const error = new JoseError(
        JoseErrorCode.INCORRECT_DECRYPTION,
        JoseErrorMessage.INCORRECT_DECRYPTION,
        details,
      )

      expect(error.code).toBe(JoseErrorCode.INCORRECT_DECRYPTION)
      expect(error.message).toBe('Incorrect decryption.')
      expect(error.details).toEqual(details)
    })

    it('has correct name property', () => {
      const error = new JoseError(JoseErrorCode.TOKEN_EXPIRED)
      expect(error.name).toBe('JoseError')
    })
  })

  describe('error propagation', () => {
    it('can be thrown and caught as Error', () => {
      expect(() => {
        throw new JoseError(JoseErrorCode.SIGNATURE_MISMATCH, 'Mismatched signatures')
      }).toThrow('Mismatched signatures')
    })
  })

  describe('helpers', () => {
    it('unsupportedCompression formats the offending value', () => {
      const error = unsupportedCompression('BAD')
      expect(error.code).toBe(JoseErrorCode.UNSUPPORTED_COMPRESSION)
      expect(error.message).toBe('Unsupported compression algorithm: BAD')
    })

    it('isJoseError narrows by code', () => {
      const error = new JoseError(JoseErrorCode.TOKEN_EXPIRED)
      expect(isJoseError(error)).toBe(true)
      expect(isJoseError(error, JoseErrorCode.TOKEN_EXPIRED)).toBe(true)
      expect(isJoseError(error, JoseErrorCode.TOKEN_NOT_YET_VALID)).toBe(false)
      expect(isJoseError(new Error('x'))).toBe(false)
    })
  })
})

describe('JoseErrorCode enum', () => {
  it('no duplicate values in enum', () => {
    const values = Object.values(JoseErrorCode)
    expect(values.length).toBe(new Set(values).size)
  })

  it('enum has correct count of codes', () => {
    expect(Object.keys(JoseErrorCode).length).toBe(11)
  })
})
