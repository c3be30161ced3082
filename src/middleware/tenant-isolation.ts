import type { NextFunction, Request, Response } from 'express'
import type { Logger } from 'pino'
import type { DbSession } from '../db/types'
import type { MembershipCheck } from '../tenancy/membership'
import { resolveOrganizationId } from '../tenancy/resolver'
import { isPublicPath, PUBLIC_PATH_PREFIXES } from './public-paths'
import { requestPath, tenantStage, type TenantStage } from './stages'

export interface MembershipChecker {
  validate(userId: string, organizationId: string, session?: DbSession): Promise<MembershipCheck>
}

type TenantIsolationOptions = {
  membership: MembershipChecker
  enforce: boolean
  logger: Logger
  publicPaths?: readonly string[]
}

/**
 * Resolves the target organization and confirms the caller belongs to it
 * before attaching `req.tenant`.
 *
 * Reads `org_id` from route params, so mount it on the parameterised path
 * when organizations are addressed in the URL.
 */
export function createTenantIsolationMiddleware(options: TenantIsolationOptions): TenantStage {
  const publicPaths = options.publicPaths ?? PUBLIC_PATH_PREFIXES

  return tenantStage(async function tenantIsolationMiddleware(
    req: Request,
    res: Response,
    next: NextFunction
  ): Promise<void> {
    if (!options.enforce) {
      next()
      return
    }

    if (isPublicPath(requestPath(req), publicPaths)) {
      next()
      return
    }

    if (!req.auth) {
      options.logger.error(
        { path: requestPath(req), method: req.method },
        'tenant isolation ran before the identity stage'
      )
      res.status(500).json({ error: 'internal server error' })
      return
    }

    const identity = req.auth.identity
    if (!identity) {
      options.logger.warn({ path: requestPath(req) }, 'tenant isolation rejected unauthenticated request')
      res.status(401).json({ error: 'authentication required for tenant-isolated endpoint' })
      return
    }

    const resolution = resolveOrganizationId(identity, { params: req.params, query: req.query })
    if (!resolution.ok) {
      options.logger.warn({ userId: identity.subjectId, status: resolution.status }, resolution.message)
      res.status(resolution.status).json({ error: resolution.message })
      return
    }

    let check: MembershipCheck
    try {
      check = await options.membership.validate(identity.subjectId, resolution.organizationId, req.dbSession)
    } catch (error) {
      next(error)
      return
    }

    if (!check.isMember) {
      options.logger.warn(
        { userId: identity.subjectId, organizationId: resolution.organizationId, source: resolution.source },
        'tenant access denied'
      )
      res.status(403).json({ error: 'user does not have access to this organization' })
      return
    }

    req.tenant = Object.freeze({
      organizationId: resolution.organizationId,
      userId: identity.subjectId,
      role: check.role
    })

    options.logger.debug(
      { userId: identity.subjectId, organizationId: resolution.organizationId, role: check.role },
      'tenant isolation validated'
    )
    next()
  })
}
