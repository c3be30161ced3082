import type { Request, RequestHandler } from 'express'

/** Handlers that attach `req.auth`; they must run before any tenant stage. */
export type IdentityStage = RequestHandler & { readonly stage: 'identity' }

/** Handlers that read `req.auth` and attach `req.tenant`. */
export type TenantStage = RequestHandler & { readonly stage: 'tenant' }

export function identityStage(handler: RequestHandler): IdentityStage {
  return Object.assign(handler, { stage: 'identity' as const })
}

export function tenantStage(handler: RequestHandler): TenantStage {
  return Object.assign(handler, { stage: 'tenant' as const })
}

/**
 * The only way the two stages are mounted together: identity first, tenant
 * second.
 */
export function createAuthPipeline(identity: IdentityStage, tenant: TenantStage): RequestHandler[] {
  return [identity, tenant]
}

/** Full path of the request, independent of where the handler is mounted. */
export function requestPath(req: Request): string {
  return `${req.baseUrl}${req.path}`
}
