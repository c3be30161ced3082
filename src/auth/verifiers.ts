import type { Logger } from 'pino'
import { decodeProtectedHeader, errors, importJWK, importSPKI, jwtVerify, type KeyLike } from 'jose'
import { z } from 'zod'
import { JwksFetchError, ProviderConfigError } from './errors'
import { isAbortError, requestJson, type FetchLike } from './http'
import type { JwkCandidate, JwksCache } from './jwks-cache'
import { isAsymmetricAlgorithm, type AsymmetricAlgorithm, type Claims, type ProviderType } from './types'

export const TOKEN_EXPIRY_LEEWAY_SEC = 10
export const REMOTE_VALIDATION_TIMEOUT_MS = 5_000

export interface TokenVerifier {
  readonly method: string
  verify(token: string, signal?: AbortSignal): Promise<Claims | null>
}

type RemoteVerifierOptions = {
  url: string
  logger: Logger
  fetch?: FetchLike
  timeoutMs?: number
}

const jwkSchema = z.object({
  kty: z.enum(['RSA', 'EC', 'OKP']),
  kid: z.string().min(1),
  alg: z.string().optional(),
  use: z.string().optional(),
  n: z.string().optional(),
  e: z.string().optional(),
  crv: z.string().optional(),
  x: z.string().optional(),
  y: z.string().optional()
})

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function defaultFetch(): FetchLike {
  return (input, init) => fetch(input, init)
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

async function verifySignedToken(options: {
  token: string
  key: KeyLike
  algorithm: AsymmetricAlgorithm
  issuer?: string
  method: string
  logger: Logger
}): Promise<Claims | null> {
  try {
    const { payload } = await jwtVerify(options.token, options.key, {
      algorithms: [options.algorithm],
      issuer: options.issuer,
      clockTolerance: TOKEN_EXPIRY_LEEWAY_SEC
    })

    options.logger.info({ validationMethod: options.method, subject: payload.sub }, 'token validated')
    return { ...payload }
  } catch (error) {
    if (error instanceof errors.JWTExpired) {
      options.logger.info({ validationMethod: options.method }, 'token expired')
    } else if (error instanceof errors.JOSEError) {
      options.logger.info({ validationMethod: options.method, code: error.code }, 'invalid token')
    } else {
      options.logger.error({ validationMethod: options.method, error }, 'token validation error')
    }
    return null
  }
}

export class DisabledVerifier implements TokenVerifier {
  readonly method = 'none'

  constructor(private readonly logger: Logger) {}

  async verify(): Promise<Claims | null> {
    this.logger.debug('token verification disabled')
    return null
  }
}

export class LocalKeyVerifier implements TokenVerifier {
  readonly method = 'local'

  constructor(
    private readonly key: KeyLike,
    private readonly algorithm: AsymmetricAlgorithm,
    private readonly issuer: string | undefined,
    private readonly logger: Logger
  ) {}

  static async fromPem(
    pem: string,
    algorithm: AsymmetricAlgorithm,
    issuer: string | undefined,
    logger: Logger
  ): Promise<LocalKeyVerifier> {
    try {
      const key = await importSPKI(pem, algorithm)
      return new LocalKeyVerifier(key, algorithm, issuer, logger)
    } catch (error) {
      throw new ProviderConfigError(`JWT_PUBLIC_KEY could not be imported for ${algorithm}: ${describeError(error)}`)
    }
  }

  verify(token: string): Promise<Claims | null> {
    return verifySignedToken({
      token,
      key: this.key,
      algorithm: this.algorithm,
      issuer: this.issuer,
      method: this.method,
      logger: this.logger
    })
  }
}

/** RFC 7662 style introspection: the token is POSTed and must come back `active`. */
export class IntrospectionVerifier implements TokenVerifier {
  private readonly fetchImpl: FetchLike
  private readonly timeoutMs: number

  constructor(readonly method: 'ory' | 'keycloak', private readonly options: RemoteVerifierOptions) {
    this.fetchImpl = options.fetch ?? defaultFetch()
    this.timeoutMs = options.timeoutMs ?? REMOTE_VALIDATION_TIMEOUT_MS
  }

  async verify(token: string, signal?: AbortSignal): Promise<Claims | null> {
    const { logger, url } = this.options

    try {
      const response = await requestJson(
        this.fetchImpl,
        url,
        {
          method: 'POST',
          headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
          body: new URLSearchParams({ token }).toString()
        },
        this.timeoutMs,
        signal
      )

      if (response.status !== 200) {
        logger.info({ provider: this.method, statusCode: response.status }, 'token introspection failed')
        return null
      }

      if (!isRecord(response.body) || !response.body.active) {
        logger.info({ provider: this.method }, 'token not active')
        return null
      }

      logger.info({ validationMethod: this.method, subject: response.body.sub }, 'token validated')
      return response.body
    } catch (error) {
      logger.error(
        { provider: this.method, introspectionUrl: url, aborted: isAbortError(error), error: describeError(error) },
        'identity provider unreachable'
      )
      return null
    }
  }
}

/** OIDC userinfo: the token is presented as a bearer credential. */
export class UserinfoVerifier implements TokenVerifier {
  readonly method = 'auth0'
  private readonly fetchImpl: FetchLike
  private readonly timeoutMs: number

  constructor(private readonly options: RemoteVerifierOptions) {
    this.fetchImpl = options.fetch ?? defaultFetch()
    this.timeoutMs = options.timeoutMs ?? REMOTE_VALIDATION_TIMEOUT_MS
  }

  async verify(token: string, signal?: AbortSignal): Promise<Claims | null> {
    const { logger, url } = this.options

    try {
      const response = await requestJson(
        this.fetchImpl,
        url,
        {
          method: 'GET',
          headers: { Authorization: `Bearer ${token}` }
        },
        this.timeoutMs,
        signal
      )

      if (response.status !== 200) {
        logger.info({ provider: this.method, statusCode: response.status }, 'userinfo request failed')
        return null
      }

      if (!isRecord(response.body)) {
        logger.info({ provider: this.method }, 'userinfo response was not a JSON object')
        return null
      }

      logger.info({ validationMethod: this.method, subject: response.body.sub }, 'token validated')
      return response.body
    } catch (error) {
      logger.error(
        { provider: this.method, userinfoUrl: url, aborted: isAbortError(error), error: describeError(error) },
        'identity provider unreachable'
      )
      return null
    }
  }
}

type JwksVerifierOptions = {
  jwksUrl: string
  cache: JwksCache
  algorithm: AsymmetricAlgorithm
  issuer?: string
  logger: Logger
}

/** Verifies signatures against the provider's published key set. */
export class JwksVerifier implements TokenVerifier {
  readonly method = 'cognito_jwks'

  constructor(private readonly options: JwksVerifierOptions) {}

  async verify(token: string, signal?: AbortSignal): Promise<Claims | null> {
    const { logger } = this.options

    let kid: unknown
    try {
      kid = decodeProtectedHeader(token).kid
    } catch {
      logger.warn('token header could not be decoded')
      return null
    }

    if (typeof kid !== 'string' || kid.length === 0) {
      logger.warn('token header is missing kid')
      return null
    }

    let candidates: JwkCandidate[]
    try {
      candidates = await this.options.cache.getKeys(this.options.jwksUrl, signal)
    } catch (error) {
      if (error instanceof JwksFetchError) {
        logger.warn(
          { jwksUrl: this.options.jwksUrl, reason: error.reason, statusCode: error.status },
          'jwks fetch failed'
        )
      } else {
        logger.error({ jwksUrl: this.options.jwksUrl, error: describeError(error) }, 'jwks lookup failed')
      }
      return null
    }

    const key = await this.findKey(candidates, kid)
    if (!key) {
      logger.warn(
        { kid, availableKids: candidates.map((candidate) => candidate.kid) },
        'signing key not found in jwks'
      )
      return null
    }

    return verifySignedToken({
      token,
      key: key.key,
      algorithm: key.algorithm,
      issuer: this.options.issuer,
      method: this.method,
      logger
    })
  }

  private async findKey(
    candidates: JwkCandidate[],
    kid: string
  ): Promise<{ key: KeyLike; algorithm: AsymmetricAlgorithm } | null> {
    for (const candidate of candidates) {
      if (candidate.kid !== kid) {
        continue
      }

      const parsed = jwkSchema.safeParse(candidate)
      if (!parsed.success || parsed.data.use === 'enc') {
        this.options.logger.warn({ kid }, 'skipping unusable jwk')
        continue
      }

      const algorithm = isAsymmetricAlgorithm(parsed.data.alg) ? parsed.data.alg : this.options.algorithm

      try {
        const key = await importJWK(parsed.data, algorithm)
        if (key instanceof Uint8Array) {
          this.options.logger.warn({ kid }, 'skipping symmetric jwk')
          continue
        }
        return { key, algorithm }
      } catch (error) {
        this.options.logger.warn({ kid, error: describeError(error) }, 'skipping jwk that failed to parse')
      }
    }

    return null
  }
}

/** Tries the configured public key first and only then the remote strategy. */
export class LocalFirstVerifier implements TokenVerifier {
  readonly method: string

  constructor(
    private readonly local: LocalKeyVerifier,
    private readonly remote: TokenVerifier | null
  ) {
    this.method = remote ? `local+${remote.method}` : local.method
  }

  async verify(token: string, signal?: AbortSignal): Promise<Claims | null> {
    const claims = await this.local.verify(token)
    if (claims || !this.remote) {
      return claims
    }

    return this.remote.verify(token, signal)
  }
}

export type TokenVerifierConfig = {
  providerType: ProviderType
  providerUrl?: string
  issuer?: string
  algorithm: string
  publicKeyPem?: string
  jwksCache: JwksCache
  logger: Logger
  fetch?: FetchLike
}

function requireProviderUrl(config: TokenVerifierConfig): string {
  if (!config.providerUrl) {
    throw new ProviderConfigError(`AUTH_PROVIDER_URL is required for provider ${config.providerType}`)
  }

  return config.providerUrl.replace(/\/$/, '')
}

/**
 * Builds the verifier for the configured provider once, at startup.
 *
 * With a public key configured, the JWKS strategy is not consulted: the key
 * is authoritative for that provider.
 */
export async function createTokenVerifier(config: TokenVerifierConfig): Promise<TokenVerifier> {
  if (!isAsymmetricAlgorithm(config.algorithm)) {
    throw new ProviderConfigError(`JWT algorithm ${config.algorithm} is not an accepted asymmetric algorithm`)
  }

  const algorithm = config.algorithm
  const logger = config.logger

  if (config.providerType === 'none') {
    return new DisabledVerifier(logger)
  }

  const baseUrl = requireProviderUrl(config)
  const local = config.publicKeyPem
    ? await LocalKeyVerifier.fromPem(config.publicKeyPem, algorithm, config.issuer, logger)
    : null

  let remote: TokenVerifier | null = null
  switch (config.providerType) {
    case 'ory':
      remote = new IntrospectionVerifier('ory', {
        url: `${baseUrl}/oauth2/introspect`,
        logger,
        fetch: config.fetch
      })
      break
    case 'keycloak':
      remote = new IntrospectionVerifier('keycloak', {
        url: `${baseUrl}/protocol/openid-connect/token/introspect`,
        logger,
        fetch: config.fetch
      })
      break
    case 'auth0':
      remote = new UserinfoVerifier({
        url: `${baseUrl}/userinfo`,
        logger,
        fetch: config.fetch
      })
      break
    case 'cognito':
      remote = local
        ? null
        : new JwksVerifier({
            jwksUrl: `${baseUrl}/.well-known/jwks.json`,
            cache: config.jwksCache,
            algorithm,
            issuer: config.issuer,
            logger
          })
      break
  }

  if (local) {
    return new LocalFirstVerifier(local, remote)
  }

  logger.info({ providerType: config.providerType, method: remote?.method }, 'remote token validation configured')
  return remote ?? new DisabledVerifier(logger)
}
