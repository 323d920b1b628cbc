import { FetchAbortedError } from '../errors'

/**
 * Waits `ms` milliseconds. Rejects with FetchAbortedError as soon as `signal`
 * aborts, so a pending retry can be interrupted on shutdown.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
   return new Promise((resolve, reject) => {
      if (signal?.aborted) {
         reject(new FetchAbortedError())
         return
      }
      const onAbort = () => {
         clearTimeout(timer)
         reject(new FetchAbortedError())
      }
      const timer = setTimeout(() => {
         signal?.removeEventListener('abort', onAbort)
         resolve()
      }, ms)
      signal?.addEventListener('abort', onAbort, { once: true })
   })
}
