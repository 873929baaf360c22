// src/services/http.ts
// Text fetch helper with timeout and in-flight request de-dup.

import { NotFoundError, ReadError } from './errors'

export type FetchTextOptions = {
  /** Abort after timeoutMs. Default 12000ms. */
  timeoutMs?: number
  /** Extra headers to merge. */
  headers?: HeadersInit
  /** Name used in error messages. Defaults to the URL. */
  label?: string
}

/** In-flight de-dup map so identical calls share a single request */
const inFlight = new Map<string, Promise<string>>()

function isAbort(err: unknown) {
  return err instanceof Error && err.name === 'AbortError'
}

/**
 * Fetch a static text file with:
 * - AbortController timeout
 * - 404 mapped to NotFoundError
 * - In-flight de-duplication by URL
 *
 * No retries: a bad data file stays bad until someone fixes it.
 */
export async function fetchText(url: string, opt: FetchTextOptions = {}): Promise<string> {
  const { timeoutMs = 12000, headers, label = url } = opt

  const pending = inFlight.get(url)
  if (pending) return pending

  const attempt = async (): Promise<string> => {
    const controller = new AbortController()
    const timeout = setTimeout(() => controller.abort(), timeoutMs)

    try {
      const res = await fetch(url, { method: 'GET', headers, signal: controller.signal })
      if (res.status === 404) throw new NotFoundError(label)
      if (!res.ok) throw new ReadError(label, `HTTP ${res.status}`)
      // The dev server answers unknown paths with its index page
      const type = res.headers.get('content-type') ?? ''
      if (type.includes('text/html')) throw new NotFoundError(label)
      return await res.text()
    } catch (err) {
      if (err instanceof NotFoundError || err instanceof ReadError) throw err
      if (isAbort(err)) throw new ReadError(label, `timed out after ${timeoutMs}ms`, { cause: err })
      throw new ReadError(label, err instanceof Error ? err.message : 'request failed', { cause: err })
    } finally {
      clearTimeout(timeout)
    }
  }

  const p = attempt()
  inFlight.set(url, p)
  try {
    return await p
  } finally {
    inFlight.delete(url)
  }
}
