import type { NextFunction, Request, Response } from 'express'
import type { Logger } from 'pino'
import { extractBearerToken } from '../auth/bearer'
import { mapClaimsToIdentity } from '../auth/claims'
import type { ProviderType } from '../auth/types'
import type { TokenVerifier } from '../auth/verifiers'
import { isPublicPath, PUBLIC_PATH_PREFIXES } from './public-paths'
import { identityStage, requestPath, type IdentityStage } from './stages'

type AuthOptions = {
  verifier: TokenVerifier
  providerType: ProviderType
  logger: Logger
  publicPaths?: readonly string[]
}

export function createAuthMiddleware(options: AuthOptions): IdentityStage {
  const publicPaths = options.publicPaths ?? PUBLIC_PATH_PREFIXES

  return identityStage(async function authMiddleware(req: Request, res: Response, next: NextFunction): Promise<void> {
    if (options.providerType === 'none') {
      req.auth = { method: 'disabled', identity: null }
      next()
      return
    }

    if (isPublicPath(requestPath(req), publicPaths)) {
      req.auth = { method: 'public', identity: null }
      next()
      return
    }

    const token = extractBearerToken(req.headers.authorization)
    if (!token) {
      res.status(401).json({ error: 'missing or invalid authorization header' })
      return
    }

    // Abort the provider call if the client goes away before we answer.
    const controller = new AbortController()
    const abortOnDisconnect = () => {
      if (!res.writableEnded) {
        controller.abort()
      }
    }
    res.once('close', abortOnDisconnect)

    try {
      const claims = await options.verifier.verify(token, controller.signal)

      if (controller.signal.aborted) {
        options.logger.info({ method: options.verifier.method }, 'client disconnected during token verification')
        return
      }

      if (!claims) {
        res.status(401).json({ error: 'invalid or expired token' })
        return
      }

      const mapped = mapClaimsToIdentity(claims, options.logger)
      if (!mapped.ok) {
        options.logger.warn({ reason: mapped.reason }, 'token claims rejected')
        res.status(401).json({ error: 'invalid token claims' })
        return
      }

      req.auth = { method: 'bearer', identity: mapped.identity }
      options.logger.debug(
        {
          userId: mapped.identity.subjectId,
          organizationId: mapped.identity.organizationId
        },
        'user authenticated'
      )

      next()
    } catch (error) {
      options.logger.warn({ error }, 'token verification failed')
      res.status(401).json({ error: 'invalid or expired token' })
    } finally {
      res.off('close', abortOnDisconnect)
    }
  })
}
