import type { Identity } from '../auth/types'
import { parseUuid } from '../utils/uuid'

export const ORG_ID_PARAM = 'org_id'

export type TenantSource = 'token' | 'path' | 'query'

export type TenantResolution =
  | { ok: true; organizationId: string; source: TenantSource }
  | { ok: false; status: 400 | 403; message: string }

export type TenantRequestParts = {
  params: Record<string, string | undefined>
  query: Record<string, unknown>
}

type Lookup =
  | { kind: 'absent' }
  | { kind: 'found'; organizationId: string }
  | { kind: 'malformed' }

function lookupPathParam(params: TenantRequestParts['params']): Lookup {
  if (!Object.prototype.hasOwnProperty.call(params, ORG_ID_PARAM)) {
    return { kind: 'absent' }
  }

  const organizationId = parseUuid(params[ORG_ID_PARAM])
  return organizationId ? { kind: 'found', organizationId } : { kind: 'malformed' }
}

function lookupQueryParam(query: TenantRequestParts['query']): Lookup {
  const raw = query[ORG_ID_PARAM]
  if (raw === undefined || raw === '') {
    return { kind: 'absent' }
  }

  const organizationId = typeof raw === 'string' ? parseUuid(raw) : null
  return organizationId ? { kind: 'found', organizationId } : { kind: 'malformed' }
}

/**
 * Picks the organization a request targets: token claim, then the `org_id`
 * path parameter, then the `org_id` query parameter.
 *
 * A malformed path or query value fails immediately instead of falling
 * through, and finding nothing is a 403.
 */
export function resolveOrganizationId(identity: Identity, request: TenantRequestParts): TenantResolution {
  if (identity.organizationId) {
    return { ok: true, organizationId: identity.organizationId, source: 'token' }
  }

  const fromPath = lookupPathParam(request.params)
  if (fromPath.kind === 'malformed') {
    return { ok: false, status: 400, message: 'invalid organization id format in path' }
  }
  if (fromPath.kind === 'found') {
    return { ok: true, organizationId: fromPath.organizationId, source: 'path' }
  }

  const fromQuery = lookupQueryParam(request.query)
  if (fromQuery.kind === 'malformed') {
    return { ok: false, status: 400, message: 'invalid organization id format in query' }
  }
  if (fromQuery.kind === 'found') {
    return { ok: true, organizationId: fromQuery.organizationId, source: 'query' }
  }

  return { ok: false, status: 403, message: 'organization context required but not provided' }
}
