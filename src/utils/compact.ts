import { JoseError, JoseErrorCode, JoseErrorMessage } from '../errors/jose.error'

import { concatBytes, toBytes } from './bytes'
import { base64UrlDecode, base64UrlEncode, toUtf8Bytes } from './encoding'

import type { CompactMessage, JweMessage, JwsMessage } from '../types/jose'

/**
 * @summary Type guard for the five-part encrypted form.
 */
export function isJweMessage(message: CompactMessage): message is JweMessage {
  return 'encryptedKey' in message
}

/**
 * @summary Type guard for the three-part signed form.
 */
export function isJwsMessage(message: CompactMessage): message is JwsMessage {
  return 'signature' in message
}

/**
 * @summary Serialize a message to its compact, dot-joined form.
 * @remarks
 * JWE: `header.encryptedKey.iv.ciphertext.tag`; JWS: `header.payload.signature`.
 */
export function serializeCompact(message: CompactMessage): string {
  const segments = isJweMessage(message)
    ? [message.header, message.encryptedKey, message.iv, message.ciphertext, message.tag]
    : [message.header, message.payload, message.signature]
  return segments.map(segment => base64UrlEncode(segment)).join('.')
}

/**
 * @summary Split a compact token into its raw segments.
 * @returns A frozen JWE (5 segments) or JWS (3 segments) message. The header is
 * returned as raw bytes; parsing it is left to the caller.
 * @throws {@link JoseError} with code `MALFORMED_TOKEN` (`Malformed JWT`) for any other
 * segment count, or when a segment is not base64url.
 */
export function deserializeCompact(token: string): JweMessage | JwsMessage {
  const segments = token.split('.')
  if (segments.length === 5) {
    const [header, encryptedKey, iv, ciphertext, tag] = segments.map(base64UrlDecode)
    return Object.freeze({ header, encryptedKey, iv, ciphertext, tag })
  }
  if (segments.length === 3) {
    const [header, payload, signature] = segments.map(base64UrlDecode)
    return Object.freeze({ header, payload, signature })
  }
  throw new JoseError(JoseErrorCode.MALFORMED_TOKEN, JoseErrorMessage.MALFORMED_JWT, {
    segments: segments.length,
  })
}

/**
 * @summary Additional authenticated data for a JWE.
 * @param encodedHeader The header segment exactly as transmitted.
 * @param adata Optional caller-supplied data; an empty value counts as absent.
 * @returns `ASCII(encodedHeader)`, or `ASCII(encodedHeader || '.' || BASE64URL(adata))`
 * when `adata` is given.
 */
export function jweAdditionalData(
  encodedHeader: string,
  adata?: string | Uint8Array,
): Uint8Array {
  const header = toUtf8Bytes(encodedHeader)
  if (adata === undefined) return header
  const extra = toBytes(adata)
  if (extra.length === 0) return header
  return concatBytes(header, toUtf8Bytes(`.${base64UrlEncode(extra)}`))
}

/**
 * @summary JWS signing input: `ASCII(encodedHeader || '.' || encodedPayload)`.
 */
export function jwsSigningInput(encodedHeader: string, encodedPayload: string): Uint8Array {
  return toUtf8Bytes(`${encodedHeader}.${encodedPayload}`)
}
