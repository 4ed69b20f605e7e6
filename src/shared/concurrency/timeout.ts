import { TimeoutError } from "../errors"

/**
 * Wait for `promise`, rejecting with TimeoutError after `timeoutMs` or as soon
 * as `signal` aborts. The underlying operation is not cancelled; only this
 * waiter detaches from it.
 */
export function waitWithTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  message: string,
  signal?: AbortSignal
): Promise<T> {
  if (signal?.aborted) {
    return Promise.reject(abortReason(signal, message))
  }
  if (timeoutMs <= 0) {
    return Promise.reject(new TimeoutError(message))
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => {
      cleanup()
      reject(abortReason(signal, message))
    }

    const timer = setTimeout(() => {
      cleanup()
      reject(new TimeoutError(message))
    }, timeoutMs)

    const cleanup = () => {
      clearTimeout(timer)
      signal?.removeEventListener("abort", onAbort)
    }

    signal?.addEventListener("abort", onAbort, { once: true })

    promise.then(
      (value) => {
        cleanup()
        resolve(value)
      },
      (error: unknown) => {
        cleanup()
        reject(error)
      }
    )
  })
}

/**
 * Detach from `promise` when `signal` aborts. Without a signal the promise is
 * returned as is.
 */
export function detachOnAbort<T>(promise: Promise<T>, signal: AbortSignal | undefined, message: string): Promise<T> {
  if (!signal) {
    return promise
  }
  if (signal.aborted) {
    return Promise.reject(abortReason(signal, message))
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(abortReason(signal, message))
    signal.addEventListener("abort", onAbort, { once: true })

    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort)
        resolve(value)
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort)
        reject(error)
      }
    )
  })
}

function abortReason(signal: AbortSignal | undefined, message: string): Error {
  const reason: unknown = signal?.reason
  if (reason instanceof TimeoutError) {
    return reason
  }
  return new TimeoutError(message)
}
