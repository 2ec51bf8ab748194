export const JOSE_OPTIONS = Symbol('JOSE_OPTIONS')
export const JWA_REGISTRY = Symbol('JWA_REGISTRY')
export const CLOCK = Symbol('CLOCK')
