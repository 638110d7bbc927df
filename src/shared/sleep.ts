// src/shared/sleep.ts — Abort-aware timers shared by the limiter, retries and the session manager

import { abortReason } from "../errors.js"

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>

/** Resolve after `ms`, or reject with the signal's reason as soon as it aborts. */
export const sleep: Sleep = (ms, signal) =>
  new Promise<void>((resolve, reject) => {
    if (!signal) {
      setTimeout(resolve, Math.max(0, ms))
      return
    }
    if (signal.aborted) {
      reject(abortReason(signal))
      return
    }
    const onAbort = () => {
      clearTimeout(timer)
      reject(abortReason(signal))
    }
    const timer = setTimeout(() => {
      signal.removeEventListener("abort", onAbort)
      resolve()
    }, Math.max(0, ms))
    signal.addEventListener("abort", onAbort, { once: true })
  })

/** Race a promise against an abort signal. The underlying work is not cancelled. */
export function raceAbort<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise
  if (signal.aborted) return Promise.reject(abortReason(signal))
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(abortReason(signal))
    signal.addEventListener("abort", onAbort, { once: true })
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort)
        resolve(value)
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort)
        reject(err)
      },
    )
  })
}

/** Abort `child` whenever `parent` aborts. Returns an unlink function. */
export function linkSignal(parent: AbortSignal | undefined, child: AbortController): () => void {
  if (!parent) return () => {}
  if (parent.aborted) {
    child.abort(parent.reason)
    return () => {}
  }
  const onAbort = () => child.abort(parent.reason)
  parent.addEventListener("abort", onAbort, { once: true })
  return () => parent.removeEventListener("abort", onAbort)
}
