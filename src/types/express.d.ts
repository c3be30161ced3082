import 'express-serve-static-core'
import type { AuthState } from '../auth/types'
import type { DbSession } from '../db/types'
import type { TenantContext } from '../tenancy/types'

declare module 'express-serve-static-core' {
  interface Request {
    /** Set by the identity stage; its absence means that stage never ran. */
    auth?: AuthState
    /** Set by the tenant stage after membership was confirmed. */
    tenant?: TenantContext
    /**
     * Session opened earlier in the request, for example by a middleware that
     * wraps the request in a transaction. Nothing in this service sets it; when
     * an embedding app does, the membership lookup and the organization
     * routes query through it instead of borrowing from the pool.
     */
    dbSession?: DbSession
  }
}
