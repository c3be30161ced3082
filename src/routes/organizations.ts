import { Router, type NextFunction, type Request, type Response } from 'express'
import type { Logger } from 'pino'
import type { DbSession, SessionFactory } from '../db/types'
import { requireRole } from '../middleware/require-role'
import { quoteIdentifier } from '../sql/identifiers'
import { toWhereClause, withTenantFilter } from '../sql/tenant-filter'
import type { TenantContext } from '../tenancy/types'

type OrganizationsRouterOptions = {
  sessions: SessionFactory
  logger: Logger
}

type OrganizationDto = {
  id: string
  name: string
}

type MembershipDto = {
  userId: string
  role: string
}

function mapOrganizationRow(row: Record<string, unknown>): OrganizationDto {
  const id = typeof row.id === 'string' ? row.id : String(row.id ?? '')
  const name = typeof row.name === 'string' ? row.name : id

  return { id, name }
}

function mapMembershipRow(row: Record<string, unknown>): MembershipDto {
  return {
    userId: typeof row.user_id === 'string' ? row.user_id : String(row.user_id ?? ''),
    role: typeof row.role === 'string' ? row.role : String(row.role ?? '')
  }
}

function runQuery<T>(
  req: Request,
  sessions: SessionFactory,
  fn: (session: DbSession) => Promise<T>
): Promise<T> {
  return req.dbSession ? fn(req.dbSession) : sessions.withSession(fn)
}

function requireTenant(req: Request, res: Response): TenantContext | null {
  if (!req.tenant) {
    res.status(500).json({ error: 'internal server error' })
    return null
  }

  return req.tenant
}

/**
 * Organization-scoped read endpoints. Mount behind the auth pipeline on a
 * path carrying `:org_id`.
 */
export function createOrganizationsRouter(options: OrganizationsRouterOptions): Router {
  const router = Router({ mergeParams: true })

  router.get('/', async (req: Request, res: Response, next: NextFunction) => {
    const tenant = requireTenant(req, res)
    if (!tenant) {
      return
    }

    const query = withTenantFilter({ where: [], params: [] }, tenant, 'id')
    const sql = `
      SELECT ${quoteIdentifier('id')}, ${quoteIdentifier('name')}
      FROM ${quoteIdentifier('organization')}
      ${toWhereClause(query)}
      LIMIT 1
    `.trim()

    try {
      const result = await runQuery(req, options.sessions, (session) => session.query(sql, query.params))
      const row = result.rows[0]
      if (!row) {
        res.status(404).json({ error: 'organization not found' })
        return
      }

      res.json({ organization: mapOrganizationRow(row), role: tenant.role })
    } catch (error) {
      next(error)
    }
  })

  router.get('/memberships', requireRole('admin', options.logger), async (req: Request, res: Response, next: NextFunction) => {
    const tenant = requireTenant(req, res)
    if (!tenant) {
      return
    }

    const limitParam = typeof req.query.limit === 'string' ? Number(req.query.limit) : 200
    const safeLimit = Number.isFinite(limitParam)
      ? Math.max(1, Math.min(500, Math.trunc(limitParam)))
      : 200

    const query = withTenantFilter({ where: [], params: [] }, tenant)
    const sql = `
      SELECT ${quoteIdentifier('user_id')}, ${quoteIdentifier('role')}
      FROM ${quoteIdentifier('membership')}
      ${toWhereClause(query)}
      ORDER BY ${quoteIdentifier('user_id')} ASC
      LIMIT ${safeLimit}
    `.trim()

    try {
      const result = await runQuery(req, options.sessions, (session) => session.query(sql, query.params))
      res.json({ memberships: result.rows.map(mapMembershipRow) })
    } catch (error) {
      next(error)
    }
  })

  return router
}
