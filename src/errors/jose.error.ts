/**
 * @summary Error codes for token processing and configuration.
 */
export enum JoseErrorCode {
  MALFORMED_TOKEN = 'MALFORMED_TOKEN',
  UNSUPPORTED_ALGORITHM = 'UNSUPPORTED_ALGORITHM',
  UNSUPPORTED_COMPRESSION = 'UNSUPPORTED_COMPRESSION',
  INCORRECT_DECRYPTION = 'INCORRECT_DECRYPTION',
  AUTHENTICATION_TAG_MISMATCH = 'AUTHENTICATION_TAG_MISMATCH',
  SIGNATURE_MISMATCH = 'SIGNATURE_MISMATCH',
  TOKEN_EXPIRED = 'TOKEN_EXPIRED',
  TOKEN_NOT_YET_VALID = 'TOKEN_NOT_YET_VALID',
  INVALID_INPUT = 'INVALID_INPUT',
  SIZE_LIMIT_EXCEEDED = 'SIZE_LIMIT_EXCEEDED',
  CONFIG_ERROR = 'CONFIG_ERROR',
}

/**
 * @summary Messages callers match on verbatim.
 */
export const JoseErrorMessage = {
  MALFORMED_JWT: 'Malformed JWT',
  INCORRECT_DECRYPTION: 'Incorrect decryption.',
  TAG_MISMATCH: 'Mismatched authentication tags',
  SIGNATURE_MISMATCH: 'Mismatched signatures',
  TOKEN_EXPIRED: 'Token expired',
  TOKEN_NOT_YET_VALID: 'Token not yet valid',
} as const

/**
 * @summary Custom error carrying a {@link JoseErrorCode} and optional details.
 */
export class JoseError extends Error {
  readonly code: JoseErrorCode
  readonly details?: Record<string, unknown>

  /**
   * @summary Construct a JoseError.
   * @param code Machine-readable error code.
   * @param message Optional human-readable message.
   * @param details Optional structured details for diagnostics.
   */
  constructor(code: JoseErrorCode, message?: string, details?: Record<string, unknown>) {
    super(message ?? code)
    this.name = 'JoseError'
    this.code = code
    this.details = details
  }
}

/**
 * @summary Build the error raised for an unknown compression value.
 */
export function unsupportedCompression(zip: unknown): JoseError {
  return new JoseError(
    JoseErrorCode.UNSUPPORTED_COMPRESSION,
    `Unsupported compression algorithm: ${String(zip)}`,
  )
}

/**
 * @summary Type guard for {@link JoseError}, optionally narrowed to one code.
 */
export function isJoseError(error: unknown, code?: JoseErrorCode): error is JoseError {
  return error instanceof JoseError && (code === undefined || error.code === code)
}
