import type { NextFunction, Request, Response } from 'express'
import type { Logger } from 'pino'
import { parseUuid } from '../utils/uuid'
import { isPublicPath, PUBLIC_PATH_PREFIXES } from './public-paths'
import { identityStage, requestPath, type IdentityStage } from './stages'

type HeaderIdentityOptions = {
  logger: Logger
  publicPaths?: readonly string[]
}

/**
 * Identity stage for deployments behind a gateway that has already
 * authenticated the caller and forwards `X-User-ID`, `X-Email` and
 * `X-Selected-Org`.
 *
 * The gateway does not check organization membership, so the selected
 * organization only becomes the identity's claim here; the tenant stage
 * still has to confirm it.
 */
export function createHeaderIdentityMiddleware(options: HeaderIdentityOptions): IdentityStage {
  const publicPaths = options.publicPaths ?? PUBLIC_PATH_PREFIXES

  return identityStage(function headerIdentityMiddleware(req: Request, res: Response, next: NextFunction): void {
    if (isPublicPath(requestPath(req), publicPaths)) {
      req.auth = { method: 'public', identity: null }
      next()
      return
    }

    const rawUserId = req.get('x-user-id')
    const email = req.get('x-email')

    if (!rawUserId || !email) {
      res.status(401).json({ error: 'missing required authentication headers' })
      return
    }

    const subjectId = parseUuid(rawUserId)
    if (!subjectId) {
      res.status(400).json({ error: 'invalid user id format' })
      return
    }

    let organizationId: string | null = null
    const selectedOrg = req.get('x-selected-org')
    if (selectedOrg) {
      organizationId = parseUuid(selectedOrg)
      if (!organizationId) {
        res.status(400).json({ error: 'invalid organization id format' })
        return
      }
    }

    req.auth = {
      method: 'headers',
      identity: Object.freeze({ subjectId, email, organizationId })
    }

    options.logger.debug({ userId: subjectId, organizationId, source: 'x-selected-org' }, 'gateway identity accepted')
    next()
  })
}
