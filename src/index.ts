import 'reflect-metadata'

export * from './config/jose.options'
export * from './errors/jose.error'
export * from './jwa/aes-cbc'
export * from './jwa/aes-cbc-hmac-sha2'
export * from './jwa/algorithm'
export * from './jwa/default-registry'
export * from './jwa/hmac-sha2'
export * from './jwa/registry'
export * from './jwa/rsa-oaep'
export * from './jwa/rsa-pkcs1'
export * from './module/jose.module'
export * from './module/jose.tokens'
export * from './services/json-web-encryption.service'
export * from './services/json-web-signature.service'
export * from './services/json-web-token.service'
export * from './services/random.service'
export * from './types/alg'
export * from './types/jose'
export * from './types/key'
export * from './utils/bytes'
export * from './utils/canonical'
export * from './utils/claims'
export * from './utils/clock'
export * from './utils/compact'
export * from './utils/compression'
export * from './utils/encoding'
export * from './utils/keys'
export * from './utils/validation'
