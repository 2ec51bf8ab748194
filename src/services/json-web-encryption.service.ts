import { Inject, Injectable, Optional } from '@nestjs/common'

import { JoseError, JoseErrorCode, JoseErrorMessage } from '../errors/jose.error'
import { CLOCK, JOSE_OPTIONS, JWA_REGISTRY } from '../module/jose.tokens'
import { zeroize } from '../utils/bytes'
import { canonicalStringify } from '../utils/canonical'
import { validateClaims } from '../utils/claims'
import { jweAdditionalData } from '../utils/compact'
import { assertSupportedCompression, compress, decompress } from '../utils/compression'
import { base64UrlEncode, toUtf8Bytes } from '../utils/encoding'
import { assertMaxSize, parseClaims, parseHeader } from '../utils/validation'

import { RandomService } from './random.service'

import type { JoseModuleOptions } from '../config/jose.options'
import type { ContentEncryptionAlgorithm, KeyManagementAlgorithm } from '../jwa/algorithm'
import type { JwaRegistry } from '../jwa/registry'
import type { JweAlg, JweEnc, ZipAlg } from '../types/alg'
import type {
  Claims,
  JoseHeader,
  JweDecryptOptions,
  JweEncryptOptions,
  JweMessage,
  Jwt,
} from '../types/jose'
import type { JoseKey } from '../types/key'
import type { Clock } from '../utils/clock'
import type { Logger } from '@nestjs/common'

/**
 * @summary JWE encrypt/decrypt using RSA-OAEP for key management and
 * AES-CBC-HMAC-SHA2 for content.
 * @remarks
 * Every algorithm is resolved through the injected {@link JwaRegistry}; messages are
 * returned as frozen value objects and turned into wire form by `serializeCompact`.
 *
 * A failed key unwrap (`INCORRECT_DECRYPTION`) and a failed tag check
 * (`AUTHENTICATION_TAG_MISMATCH`) are reported as distinct errors. Callers that expose
 * decryption to untrusted parties should map both to one response, because the
 * difference can act as a padding oracle against RSA-OAEP.
 */
@Injectable()
export class JsonWebEncryptionService {
  constructor(
    @Inject(JWA_REGISTRY) private readonly registry: JwaRegistry,
    @Inject(JOSE_OPTIONS) private readonly options: Required<JoseModuleOptions>,
    @Inject(CLOCK) private readonly clock: Clock,
    private readonly random: RandomService,
    @Optional() private readonly logger?: Logger,
  ) {}

  /**
   * @summary Encrypt a claims set for the holder of `key`'s private half.
   * @param claims JSON-serializable claims.
   * @param key Recipient RSA key (public half suffices).
   * @param options alg (default RSA-OAEP), enc (default A128CBC-HS256), extra header
   * members (the reserved `alg` and `enc` always win), additional authenticated data, and
   * `compression: 'DEF'`. A `zip` header member selects compression when `compression`
   * is absent.
   * @returns Frozen JWE message.
   * @throws {@link JoseError} with code `UNSUPPORTED_COMPRESSION` before any key
   * material is generated, `UNSUPPORTED_ALGORITHM` for unknown alg/enc, and
   * `SIZE_LIMIT_EXCEEDED` when the serialized claims exceed `maxTokenSize`.
   * @example
   * ```ts
   * const token = serializeCompact(jwe.encrypt({ sub: 'user-1' }, recipientKey))
   * ```
   */
  encrypt(claims: Claims, key: JoseKey, options?: JweEncryptOptions): JweMessage {
    const zip = requestedCompression(options)

    const keyManagement = this.registry.lookupKeyManagement(
      options?.alg ?? this.options.defaultJweAlg,
    )
    const contentEncryption = this.registry.lookupContentEncryption(
      options?.enc ?? this.options.defaultJweEnc,
    )

    const header: JoseHeader = {
      ...options?.addHeader,
      alg: keyManagement.id,
      enc: contentEncryption.id,
      ...(zip ? { zip } : {}),
    }

    const serialized = toUtf8Bytes(
      options?.canonical ? canonicalStringify(claims) : JSON.stringify(claims),
    )
    assertMaxSize('plaintext', serialized, this.options.maxTokenSize)
    const plaintext = zip ? compress(serialized, zip) : serialized

    const cek = this.random.bytes(contentEncryption.cekLength)
    try {
      const encryptedKey = keyManagement.wrap(cek, key)
      const headerBytes = toUtf8Bytes(JSON.stringify(header))
      const aad = jweAdditionalData(base64UrlEncode(headerBytes), options?.adata)
      const { iv, ciphertext, tag } = contentEncryption.aeadEncrypt(plaintext, cek, aad)
      return Object.freeze({ header: headerBytes, encryptedKey, iv, ciphertext, tag })
    } finally {
      zeroize(cek)
    }
  }

  /**
   * @summary Decrypt a JWE message and validate its temporal claims.
   * @param jwe Message produced by {@link encrypt} or `deserializeCompact`.
   * @param key RSA key holding the private half.
   * @param options `adata` given at encryption time, claims validation switches, and
   * optional expected alg/enc.
   * @returns Decoded header and claims.
   * @throws {@link JoseError} with code `MALFORMED_TOKEN`, `UNSUPPORTED_ALGORITHM`,
   * `INCORRECT_DECRYPTION` (`Incorrect decryption.`), `AUTHENTICATION_TAG_MISMATCH`
   * (`Mismatched authentication tags`), `UNSUPPORTED_COMPRESSION`, `TOKEN_EXPIRED` or
   * `TOKEN_NOT_YET_VALID`.
   */
  decrypt(jwe: JweMessage, key: JoseKey, options?: JweDecryptOptions): Jwt {
    const header = parseHeader(jwe.header, true)
    const alg = header.alg
    const enc = String(header.enc)
    this.assertExpected(alg, enc, options)

    const keyManagement = this.registry.lookupKeyManagement(alg)
    const contentEncryption = this.registry.lookupContentEncryption(enc)
    assertMaxSize(
      'ciphertext',
      jwe.ciphertext,
      this.options.maxTokenSize + contentEncryption.cipher.ivSize,
    )

    let claims: Claims
    try {
      const plaintext = this.open(jwe, header, key, keyManagement, contentEncryption, options)
      claims = parseClaims(plaintext)
    } catch (error) {
      this.logger?.debug('JWE decryption failed', {
        alg,
        enc,
        code: error instanceof JoseError ? error.code : undefined,
      })
      throw error
    }

    if (options?.validateClaims ?? true) {
      validateClaims(claims, this.clock.now(), {
        clockToleranceSeconds: this.options.clockToleranceSeconds,
        maxAgeSeconds: options?.maxAgeSeconds,
      })
    }
    return { header, claims }
  }

  /**
   * @summary (Private) Unwrap, authenticate, decrypt and inflate.
   */
  private open(
    jwe: JweMessage,
    header: JoseHeader,
    key: JoseKey,
    keyManagement: KeyManagementAlgorithm,
    contentEncryption: ContentEncryptionAlgorithm,
    options?: JweDecryptOptions,
  ): Uint8Array {
    const aad = jweAdditionalData(base64UrlEncode(jwe.header), options?.adata)
    const cek = keyManagement.unwrap(jwe.encryptedKey, key)
    try {
      if (cek.length !== contentEncryption.cekLength) {
        throw new JoseError(
          JoseErrorCode.INCORRECT_DECRYPTION,
          JoseErrorMessage.INCORRECT_DECRYPTION,
        )
      }
      const plaintext = contentEncryption.aeadDecrypt(
        jwe.ciphertext,
        jwe.iv,
        jwe.tag,
        cek,
        aad,
      )
      if (header.zip === undefined) return plaintext
      // the header is authenticated by now, an unknown zip is still rejected
      assertSupportedCompression(header.zip)
      return decompress(plaintext, header.zip, this.options.maxTokenSize)
    } finally {
      zeroize(cek)
    }
  }

  private assertExpected(alg: string, enc: string, options?: JweDecryptOptions): void {
    const expectedAlg: JweAlg | undefined = options?.expectedAlg
    const expectedEnc: JweEnc | undefined = options?.expectedEnc
    if ((expectedAlg && expectedAlg !== alg) || (expectedEnc && expectedEnc !== enc)) {
      throw new JoseError(
        JoseErrorCode.UNSUPPORTED_ALGORITHM,
        `Unexpected JWE alg/enc (expected ${expectedAlg ?? 'any'}/${expectedEnc ?? 'any'}, got ${alg}/${enc})`,
      )
    }
  }
}

function requestedCompression(options?: JweEncryptOptions): ZipAlg | undefined {
  const zip: unknown = options?.compression ?? options?.addHeader?.zip
  if (zip === undefined) return undefined
  assertSupportedCompression(zip)
  return zip
}
