import { describe, it, expect, jest } from '@jest/globals'
import { ManualClock, createClock } from './clock'
import { ConcurrencyController, Permit } from './concurrency-controller'
import { CancelledError } from './errors'

jest.mock('../logger', () => ({
  logger: { debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() },
}))

const tick = () => new Promise<void>((resolve) => setImmediate(resolve))

describe('ConcurrencyController', () => {
  it.each([1, 10, 100])('should never admit more than %i attempts at once', async (maxInFlight) => {
    const controller = new ConcurrencyController({ maxInFlight, clock: new ManualClock() })
    let active = 0
    let maxActive = 0

    await Promise.all(
      Array.from({ length: 300 }, (_, i) =>
        controller.withPermit(async () => {
          active++
          maxActive = Math.max(maxActive, active)
          for (let n = 0; n < (i % 3) + 1; n++) await tick()
          active--
        }),
      ),
    )

    expect(maxActive).toBe(maxInFlight)
    expect(controller.getStatus()).toEqual({
      inFlight: 0,
      waiting: 0,
      admitted: 300,
      peakInFlight: maxInFlight,
    })
  })

  it('should serve waiters in arrival order', async () => {
    const controller = new ConcurrencyController({ maxInFlight: 1, clock: new ManualClock() })
    const order: string[] = []

    const first = await controller.acquire()
    const second = controller.acquire().then((permit) => {
      order.push('second')
      return permit
    })
    const third = controller.acquire().then((permit) => {
      order.push('third')
      return permit
    })

    expect(controller.getStatus().waiting).toBe(2)

    first.release()
    const secondPermit = await second
    secondPermit.release()
    const thirdPermit = await third
    thirdPermit.release()

    expect(order).toEqual(['second', 'third'])
  })

  it('should treat release as idempotent', async () => {
    const controller = new ConcurrencyController({ maxInFlight: 2, clock: new ManualClock() })
    const permit = await controller.acquire()

    permit.release()
    permit.release()

    expect(controller.getStatus().inFlight).toBe(0)
  })

  it('should release the permit when the scoped function throws', async () => {
    const controller = new ConcurrencyController({ maxInFlight: 1, clock: new ManualClock() })

    await expect(
      controller.withPermit(async () => {
        throw new Error('boom')
      }),
    ).rejects.toThrow('boom')

    expect(controller.getStatus().inFlight).toBe(0)
  })

  it('should remove an aborted waiter and reject it with CancelledError', async () => {
    const controller = new ConcurrencyController({ maxInFlight: 1, clock: new ManualClock() })
    const held = await controller.acquire()
    const abort = new AbortController()

    const pending = controller.acquire(abort.signal)
    expect(controller.getStatus().waiting).toBe(1)

    abort.abort()

    await expect(pending).rejects.toBeInstanceOf(CancelledError)
    expect(controller.getStatus().waiting).toBe(0)

    held.release()
    expect(controller.getStatus().inFlight).toBe(0)
  })

  it('should reject immediately when the signal is already aborted', async () => {
    const controller = new ConcurrencyController({ maxInFlight: 1, clock: new ManualClock() })
    const abort = new AbortController()
    abort.abort()

    await expect(controller.acquire(abort.signal)).rejects.toBeInstanceOf(CancelledError)
    expect(controller.getStatus().admitted).toBe(0)
  })

  it('should reject all waiters on close', async () => {
    const controller = new ConcurrencyController({ maxInFlight: 1, clock: new ManualClock() })
    await controller.acquire()

    const waiting = [controller.acquire(), controller.acquire()]
    controller.close()

    for (const result of await Promise.allSettled(waiting)) {
      expect(result.status).toBe('rejected')
    }
    await expect(controller.acquire()).rejects.toBeInstanceOf(CancelledError)
  })

  it('should emit admitted and released events', async () => {
    const controller = new ConcurrencyController({ maxInFlight: 1, clock: new ManualClock(42n) })
    const admitted = jest.fn()
    const released = jest.fn()
    controller.on('admitted', admitted)
    controller.on('released', released)

    const permit = await controller.acquire()
    permit.release()

    expect(admitted).toHaveBeenCalledWith({ permitId: 1, at: 42n, inFlight: 1 })
    expect(released).toHaveBeenCalledWith({ permitId: 1, inFlight: 0 })
  })

  it('should reject an invalid cap', () => {
    expect(() => new ConcurrencyController({ maxInFlight: 0, clock: new ManualClock() })).toThrow(RangeError)
  })

  describe('rate limiting', () => {
    it('should admit the burst immediately and hold the rest', async () => {
      const clock = new ManualClock()
      const controller = new ConcurrencyController({
        maxInFlight: 10,
        rateLimit: { requestsPerSecond: 1, burst: 2 },
        clock,
      })
      const permits: Permit[] = []

      const requests = Array.from({ length: 3 }, () => controller.acquire().then((permit) => permits.push(permit)))
      await tick()

      expect(permits).toHaveLength(2)
      expect(controller.getStatus().waiting).toBe(1)

      controller.close()
      await Promise.allSettled(requests)
    })

    it('should keep any one-second window at or below rate plus burst under a flood', async () => {
      const clock = createClock()
      const controller = new ConcurrencyController({
        maxInFlight: 1000,
        rateLimit: { requestsPerSecond: 5, burst: 5 },
        clock,
      })
      const admissions: bigint[] = []
      controller.on('admitted', ({ at }: { at: bigint }) => admissions.push(at))

      const requests = Array.from({ length: 1000 }, () =>
        controller.acquire().then((permit) => permit.release()),
      )

      await new Promise((resolve) => setTimeout(resolve, 1500))
      controller.close()
      const settled = await Promise.allSettled(requests)

      expect(admissions.length).toBeGreaterThanOrEqual(10)
      expect(settled.filter((result) => result.status === 'fulfilled')).toHaveLength(admissions.length)

      for (let i = 0; i < admissions.length; i++) {
        const start = admissions[i] ?? 0n
        const inWindow = admissions.filter((at) => at >= start && at - start <= 1_000_000_000n).length
        expect(inWindow).toBeLessThanOrEqual(10)
      }
    })
  })
})
