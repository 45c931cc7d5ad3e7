/**
 * Abort and timer helpers shared by the orchestrator and adapters
 */

/**
 * Forward aborts from `source` into `target`. Returns an unlink function.
 */
export function linkAbort(source: AbortSignal | undefined, target: AbortController): () => void {
  if (!source) {
    return () => {}
  }
  if (source.aborted) {
    target.abort(source.reason)
    return () => {}
  }
  const onAbort = () => target.abort(source.reason)
  source.addEventListener('abort', onAbort, { once: true })
  return () => source.removeEventListener('abort', onAbort)
}

/**
 * Sleep for `ms`, resolving early when `signal` aborts
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise(resolve => {
    if (signal?.aborted) {
      resolve()
      return
    }
    const onAbort = () => {
      clearTimeout(timer)
      resolve()
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort)
      resolve()
    }, ms)
    signal?.addEventListener('abort', onAbort, { once: true })
  })
}

/**
 * Wait for `promise`, but once `signal` aborts give it at most `graceMs`
 * to settle before rejecting with the abort reason.
 */
export function settleWithin<T>(
  promise: Promise<T>,
  signal: AbortSignal,
  graceMs: number
): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    let graceTimer: NodeJS.Timeout | undefined

    const onAbort = () => {
      graceTimer = setTimeout(() => reject(signal.reason), graceMs)
    }
    const done = () => {
      if (graceTimer) {
        clearTimeout(graceTimer)
      }
      signal.removeEventListener('abort', onAbort)
    }

    if (signal.aborted) {
      onAbort()
    } else {
      signal.addEventListener('abort', onAbort, { once: true })
    }

    promise.then(
      value => {
        done()
        resolve(value)
      },
      (error: unknown) => {
        done()
        reject(error)
      }
    )
  })
}
