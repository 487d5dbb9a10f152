import { describe, it, expect } from '@jest/globals'
import { ManualClock, createClock, elapsedNs, msToNs, nsToMs } from './clock'

describe('clock', () => {
  it('should never go backwards', () => {
    const clock = createClock()
    const first = clock.now()
    const second = clock.now()

    expect(second >= first).toBe(true)
  })

  it('should convert between units', () => {
    expect(msToNs(1.5)).toBe(1_500_000)
    expect(nsToMs(2_500_000)).toBe(2.5)
    expect(elapsedNs(100n, 350n)).toBe(250)
  })

  describe('ManualClock', () => {
    it('should advance only when told to', () => {
      const clock = new ManualClock(10n)

      clock.advanceMs(2)
      clock.advanceNs(5)

      expect(clock.now()).toBe(2_000_015n)
    })

    it('should refuse to move backwards', () => {
      const clock = new ManualClock()

      expect(() => clock.advanceNs(-1)).toThrow(RangeError)
    })
  })
})
