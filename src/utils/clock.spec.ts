import { fixedClock, systemClock } from './clock'

describe('utils/clock', () => {
  it('systemClock reports seconds since the epoch', () => {
    const before = Date.now() / 1000
    const now = systemClock.now()
    expect(now).toBeGreaterThanOrEqual(before - 1)
    expect(now).toBeLessThan(before + 60)
  })

  it('fixedClock always reports the same instant', () => {
    const clock = fixedClock(1_700_000_000)
    expect(clock.now()).toBe(1_700_000_000)
    expect(clock.now()).toBe(1_700_000_000)
  })
})
