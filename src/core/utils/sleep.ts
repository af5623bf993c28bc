import { setTimeout as delay } from 'node:timers/promises'

export type SleepFunction = (ms: number, signal?: AbortSignal) => Promise<void>

/**
 * Resolves after `ms`; rejects with an AbortError once `signal` fires
 */
export const sleep: SleepFunction = async (ms, signal) => {
  await delay(ms, undefined, { signal })
}
