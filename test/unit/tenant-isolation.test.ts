import express, { type NextFunction, type Request, type Response } from 'express'
import request from 'supertest'
import pino from 'pino'
import { describe, expect, it } from 'vitest'
import type { AuthState } from '../../src/auth/types'
import type { DbSession, SessionFactory } from '../../src/db/types'
import { createErrorHandler } from '../../src/middleware/error-handler'
import { requireRole } from '../../src/middleware/require-role'
import { createTenantIsolationMiddleware } from '../../src/middleware/tenant-isolation'
import { MembershipValidator } from '../../src/tenancy/membership'
import type { TenantContext } from '../../src/tenancy/types'
import { FailingSessionFactory, FakeSession, FakeSessionFactory } from '../helpers/db'
import { ORG_A, ORG_B, USER_ID } from '../helpers/tokens'

const logger = pino({ enabled: false })

type BuildOptions = {
  auth?: AuthState
  sessions?: SessionFactory
  enforce?: boolean
  dbSession?: DbSession
}

function memberOf(organizationId: string, role = 'member') {
  return new FakeSession([{ userId: USER_ID, organizationId, role }])
}

function bearer(organizationId: string | null = null): AuthState {
  return {
    method: 'bearer',
    identity: { subjectId: USER_ID, email: 'ada@example.test', organizationId }
  }
}

function buildApp(options: BuildOptions) {
  const sessions = options.sessions ?? new FakeSessionFactory(memberOf(ORG_A))
  const tenant = createTenantIsolationMiddleware({
    membership: new MembershipValidator(sessions, logger),
    enforce: options.enforce ?? true,
    logger
  })

  const presetAuth = (req: Request, _res: Response, next: NextFunction) => {
    if (options.auth) {
      req.auth = options.auth
    }
    if (options.dbSession) {
      req.dbSession = options.dbSession
    }
    next()
  }

  const echo = (req: Request, res: Response) => {
    res.json({ tenant: req.tenant ?? null })
  }

  const app = express()
  app.use('/orgs/:org_id', presetAuth, tenant, echo)
  app.use('/scoped', presetAuth, tenant, echo)
  app.use('/health', presetAuth, tenant, echo)
  app.use(createErrorHandler(logger))
  return app
}

describe('tenant isolation middleware', () => {
  it('attaches the tenant for a member named by the token claim', async () => {
    const response = await request(buildApp({ auth: bearer(ORG_A) })).get('/scoped')

    expect(response.status).toBe(200)
    expect(response.body.tenant).toEqual({ organizationId: ORG_A, userId: USER_ID, role: 'member' })
  })

  it('resolves the organization from the path', async () => {
    const response = await request(buildApp({ auth: bearer() })).get(`/orgs/${ORG_A}`)

    expect(response.status).toBe(200)
    expect(response.body.tenant.organizationId).toBe(ORG_A)
  })

  it('resolves the organization from the query string', async () => {
    const response = await request(buildApp({ auth: bearer() })).get(`/scoped?org_id=${ORG_A}`)

    expect(response.status).toBe(200)
    expect(response.body.tenant.organizationId).toBe(ORG_A)
  })

  it('checks the claimed organization, not the one in the path', async () => {
    const response = await request(buildApp({ auth: bearer(ORG_B) })).get(`/orgs/${ORG_A}`)

    expect(response.status).toBe(403)
    expect(response.body).toEqual({ error: 'user does not have access to this organization' })
  })

  it('denies non-members', async () => {
    const response = await request(buildApp({ auth: bearer() })).get(`/orgs/${ORG_B}`)

    expect(response.status).toBe(403)
    expect(response.body).toEqual({ error: 'user does not have access to this organization' })
  })

  it('rejects malformed organization ids', async () => {
    const path = await request(buildApp({ auth: bearer() })).get('/orgs/not-a-uuid')
    const query = await request(buildApp({ auth: bearer() })).get('/scoped?org_id=not-a-uuid')

    expect(path.status).toBe(400)
    expect(path.body).toEqual({ error: 'invalid organization id format in path' })
    expect(query.status).toBe(400)
    expect(query.body).toEqual({ error: 'invalid organization id format in query' })
  })

  it('fails closed when no organization is named', async () => {
    const response = await request(buildApp({ auth: bearer() })).get('/scoped')

    expect(response.status).toBe(403)
    expect(response.body).toEqual({ error: 'organization context required but not provided' })
  })

  it('requires an authenticated identity', async () => {
    const response = await request(buildApp({ auth: { method: 'disabled', identity: null } })).get(
      `/orgs/${ORG_A}`
    )

    expect(response.status).toBe(401)
    expect(response.body).toEqual({ error: 'authentication required for tenant-isolated endpoint' })
  })

  it('answers 500 when the identity stage never ran', async () => {
    const response = await request(buildApp({})).get(`/orgs/${ORG_A}`)

    expect(response.status).toBe(500)
    expect(response.body).toEqual({ error: 'internal server error' })
  })

  it('hands database failures to the error handler', async () => {
    const response = await request(buildApp({ auth: bearer(ORG_A), sessions: new FailingSessionFactory() })).get(
      '/scoped'
    )

    expect(response.status).toBe(500)
    expect(response.body).toEqual({ error: 'internal server error' })
  })

  it('reuses a request-scoped session instead of opening one', async () => {
    const sessions = new FakeSessionFactory(new FakeSession())
    const dbSession = memberOf(ORG_A, 'owner')

    const response = await request(buildApp({ auth: bearer(ORG_A), sessions, dbSession })).get('/scoped')

    expect(response.status).toBe(200)
    expect(response.body.tenant.role).toBe('owner')
    expect(sessions.opened).toBe(0)
    expect(dbSession.queries).toHaveLength(1)
  })

  it('does nothing when enforcement is off', async () => {
    const sessions = new FakeSessionFactory(memberOf(ORG_A))

    const response = await request(buildApp({ auth: bearer(), sessions, enforce: false })).get(`/orgs/${ORG_B}`)

    expect(response.status).toBe(200)
    expect(response.body.tenant).toBeNull()
    expect(sessions.opened).toBe(0)
  })

  it('skips public paths', async () => {
    const response = await request(buildApp({})).get('/health')

    expect(response.status).toBe(200)
    expect(response.body.tenant).toBeNull()
  })
})

describe('requireRole', () => {
  function buildRoleApp(tenant: TenantContext | null) {
    const app = express()
    app.use((req: Request, _res: Response, next: NextFunction) => {
      if (tenant) {
        req.tenant = tenant
      }
      next()
    })
    app.get('/admin', requireRole('admin', logger), (_req, res) => {
      res.json({ ok: true })
    })
    return app
  }

  it('allows roles at or above the requirement', async () => {
    const owner = await request(buildRoleApp({ organizationId: ORG_A, userId: USER_ID, role: 'owner' })).get('/admin')
    const admin = await request(buildRoleApp({ organizationId: ORG_A, userId: USER_ID, role: 'admin' })).get('/admin')

    expect(owner.status).toBe(200)
    expect(admin.status).toBe(200)
  })

  it('denies lower roles', async () => {
    const response = await request(buildRoleApp({ organizationId: ORG_A, userId: USER_ID, role: 'member' })).get(
      '/admin'
    )

    expect(response.status).toBe(403)
    expect(response.body).toEqual({ error: 'insufficient permissions' })
  })

  it('answers 500 when no tenant is attached', async () => {
    const response = await request(buildRoleApp(null)).get('/admin')

    expect(response.status).toBe(500)
    expect(response.body).toEqual({ error: 'internal server error' })
  })
})
