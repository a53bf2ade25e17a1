import { TimeoutError } from '../lib/errors'

/** Reject with TimeoutError if `p` has not settled within `ms`. The timer never outlives the race. */
export function withTimeout<T>(p: Promise<T>, ms: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(label, ms)), ms)
  })
  return Promise.race([p, timeout]).finally(() => clearTimeout(timer))
}
