export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>

export type JsonResponse = {
  status: number
  ok: boolean
  /** Parsed JSON body; `undefined` when the body is empty or not JSON. */
  body: unknown
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError'
}

function parseJson(text: string): unknown {
  if (text.trim() === '') {
    return undefined
  }

  try {
    return JSON.parse(text)
  } catch {
    return undefined
  }
}

/**
 * Issues a single request and reads its body, aborting after `timeoutMs` or
 * as soon as `signal` fires. Never retries.
 */
export async function requestJson(
  fetchImpl: FetchLike,
  url: string,
  init: RequestInit,
  timeoutMs: number,
  signal?: AbortSignal
): Promise<JsonResponse> {
  const controller = new AbortController()
  const timeoutHandle = setTimeout(() => {
    controller.abort()
  }, timeoutMs)

  const forwardAbort = () => {
    controller.abort()
  }

  if (signal?.aborted) {
    controller.abort()
  } else {
    signal?.addEventListener('abort', forwardAbort, { once: true })
  }

  try {
    const response = await fetchImpl(url, { ...init, signal: controller.signal })
    const text = await response.text()
    return {
      status: response.status,
      ok: response.ok,
      body: parseJson(text)
    }
  } finally {
    clearTimeout(timeoutHandle)
    signal?.removeEventListener('abort', forwardAbort)
  }
}
