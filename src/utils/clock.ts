/**
 * @summary Time source for claims validation and issuance.
 */
export interface Clock {
  /** Current time in seconds since the epoch (may be fractional). */
  now: () => number
}

export const systemClock: Clock = {
  now: () => Date.now() / 1000,
}

/**
 * @summary Clock pinned to `seconds`, for tests and replay tooling.
 */
export function fixedClock(seconds: number): Clock {
  return { now: () => seconds }
}
