import type { Logger } from 'pino'
import { parseUuid } from '../utils/uuid'
import type { Claims, Identity } from './types'

export type ClaimsMappingResult =
  | { ok: true; identity: Identity }
  | { ok: false; reason: string }

function firstNonEmpty(claims: Claims, names: string[]): unknown {
  for (const name of names) {
    const value = claims[name]
    if (value !== undefined && value !== null && value !== '') {
      return value
    }
  }

  return undefined
}

/**
 * Maps provider claims onto the canonical identity.
 *
 * `sub` must be a UUID and an email (or `preferred_username`) must be a
 * non-empty string. A malformed organization claim is dropped with a warning
 * because the tenant can still be resolved from the route.
 */
export function mapClaimsToIdentity(claims: Claims, logger: Logger): ClaimsMappingResult {
  if (claims.sub === undefined || claims.sub === null || claims.sub === '') {
    return { ok: false, reason: 'missing sub claim' }
  }

  const subjectId = parseUuid(claims.sub)
  if (!subjectId) {
    return { ok: false, reason: 'invalid user id format in sub claim' }
  }

  const email = firstNonEmpty(claims, ['email', 'preferred_username'])
  if (typeof email !== 'string') {
    return { ok: false, reason: 'missing email claim' }
  }

  let organizationId: string | null = null
  const orgClaim = firstNonEmpty(claims, ['org_id', 'organization_id'])
  if (orgClaim !== undefined) {
    organizationId = parseUuid(orgClaim)
    if (!organizationId) {
      logger.warn({ subjectId }, 'ignoring malformed organization claim')
    }
  }

  return {
    ok: true,
    identity: Object.freeze({ subjectId, email, organizationId })
  }
}
