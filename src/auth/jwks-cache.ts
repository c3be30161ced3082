import type { Logger } from 'pino'
import { JwksFetchError } from './errors'
import { isAbortError, requestJson, type FetchLike, type JsonResponse } from './http'

/** A key as published in a JWKS document; validated only when it is used. */
export type JwkCandidate = Record<string, unknown>

type CacheEntry = {
  sourceUrl: string
  keys: JwkCandidate[]
  fetchedAt: number
  expiresAt: number
}

export type JwksCacheOptions = {
  logger: Logger
  fetch?: FetchLike
  ttlSec?: number
  fetchTimeoutMs?: number
  now?: () => number
}

export const JWKS_CACHE_TTL_SEC = 3600
export const JWKS_FETCH_TIMEOUT_MS = 10_000

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Holds the key set of one JWKS URL for a fixed TTL.
 *
 * There is a single entry: asking for another URL replaces it. Concurrent
 * misses are not coalesced, so two requests may both fetch and the last
 * write wins.
 */
export class JwksCache {
  private entry: CacheEntry | null = null
  private readonly fetchImpl: FetchLike
  private readonly ttlMs: number
  private readonly fetchTimeoutMs: number
  private readonly now: () => number
  private readonly logger: Logger

  constructor(options: JwksCacheOptions) {
    this.logger = options.logger
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init))
    this.ttlMs = (options.ttlSec ?? JWKS_CACHE_TTL_SEC) * 1000
    this.fetchTimeoutMs = options.fetchTimeoutMs ?? JWKS_FETCH_TIMEOUT_MS
    this.now = options.now ?? Date.now
  }

  async getKeys(sourceUrl: string, signal?: AbortSignal): Promise<JwkCandidate[]> {
    const requestedAt = this.now()
    const cached = this.entry

    if (cached && cached.sourceUrl === sourceUrl && requestedAt < cached.expiresAt) {
      this.logger.debug({ jwksUrl: sourceUrl }, 'jwks cache hit')
      return cached.keys
    }

    this.logger.info({ jwksUrl: sourceUrl }, 'jwks cache miss')
    const keys = await this.fetchKeys(sourceUrl, signal)

    const fetchedAt = this.now()
    this.entry = {
      sourceUrl,
      keys,
      fetchedAt,
      expiresAt: fetchedAt + this.ttlMs
    }

    this.logger.info(
      {
        jwksUrl: sourceUrl,
        keyCount: keys.length,
        expiresAt: new Date(this.entry.expiresAt).toISOString()
      },
      'jwks cached'
    )

    return keys
  }

  clear(): void {
    this.entry = null
  }

  private async fetchKeys(sourceUrl: string, signal?: AbortSignal): Promise<JwkCandidate[]> {
    let response: JsonResponse
    try {
      response = await requestJson(
        this.fetchImpl,
        sourceUrl,
        { method: 'GET', headers: { Accept: 'application/json' } },
        this.fetchTimeoutMs,
        signal
      )
    } catch (error) {
      const detail = isAbortError(error) ? 'request aborted' : error instanceof Error ? error.message : String(error)
      throw new JwksFetchError(`JWKS fetch failed: ${detail}`, 'network')
    }

    if (!response.ok) {
      throw new JwksFetchError(`JWKS fetch failed with status ${response.status}`, 'status', response.status)
    }

    if (!isRecord(response.body) || !Array.isArray(response.body.keys)) {
      throw new JwksFetchError('JWKS response did not include a keys array', 'payload', response.status)
    }

    return response.body.keys.filter(isRecord)
  }
}
