/**
 * Shared HTTP client for provider calls
 *
 * Native fetch with a hard request timeout. Transport failures become
 * NetworkError and an expired timeout becomes TimeoutError, so the
 * orchestrator can decide on stale fallback without looking at messages.
 */

import { NetworkError, TimeoutError, errorMessage } from "../../shared/errors"

export const DEFAULT_REQUEST_TIMEOUT_MS = 15000

export async function fetchWithTimeout(
  url: string | URL,
  options: RequestInit = {},
  timeoutMs: number = DEFAULT_REQUEST_TIMEOUT_MS
): Promise<Response> {
  const controller = new AbortController()
  const timer = setTimeout(() => controller.abort(), timeoutMs)

  try {
    return await fetch(url, { ...options, signal: controller.signal })
  } catch (error: unknown) {
    if (controller.signal.aborted) {
      throw new TimeoutError(`Request to ${hostOf(url)} timed out after ${timeoutMs}ms`)
    }
    throw new NetworkError(`Request to ${hostOf(url)} failed: ${errorMessage(error)}`, error)
  } finally {
    clearTimeout(timer)
  }
}

function hostOf(url: string | URL): string {
  try {
    return new URL(url).host
  } catch {
    return String(url)
  }
}
