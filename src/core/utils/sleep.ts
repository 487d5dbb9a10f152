import { setTimeout as delay } from 'timers/promises'
import { CancelledError } from '../errors'

/**
 * Waits `ms` milliseconds. Rejects with CancelledError as soon as `signal`
 * aborts, including when it is already aborted.
 */
export async function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    throw new CancelledError('Sleep cancelled')
  }
  try {
    await delay(ms, undefined, { signal })
  } catch (error) {
    if (signal?.aborted) {
      throw new CancelledError('Sleep cancelled')
    }
    throw error
  }
}
