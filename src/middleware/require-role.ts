import type { NextFunction, Request, Response } from 'express'
import type { Logger } from 'pino'
import { satisfiesRole, type Role } from '../tenancy/roles'
import { requestPath } from './stages'

/**
 * Route guard on the role already attached by the tenant stage. It never
 * queries membership again.
 */
export function requireRole(required: Role, logger: Logger) {
  return function roleGuard(req: Request, res: Response, next: NextFunction): void {
    const tenant = req.tenant
    if (!tenant) {
      logger.error(
        { path: requestPath(req), method: req.method },
        'tenant context not set before role check'
      )
      res.status(500).json({ error: 'internal server error' })
      return
    }

    if (!satisfiesRole(tenant.role, required)) {
      logger.warn(
        {
          userId: tenant.userId,
          organizationId: tenant.organizationId,
          userRole: tenant.role,
          requiredRole: required,
          method: req.method,
          path: requestPath(req)
        },
        'permission denied'
      )
      res.status(403).json({ error: 'insufficient permissions' })
      return
    }

    next()
  }
}
