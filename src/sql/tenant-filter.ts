import type { TenantContext } from '../tenancy/types'
import { TenantOwnershipError } from './errors'
import { quoteIdentifier } from './identifiers'

export type WhereBuilder = {
  where: string[]
  params: unknown[]
}

/**
 * Adds `<column> = $n` bound to the tenant's organization. Every query on
 * tenant-owned rows goes through this.
 */
export function withTenantFilter(
  query: WhereBuilder,
  tenant: TenantContext,
  column = 'organization_id'
): WhereBuilder {
  const params = [...query.params, tenant.organizationId]
  return {
    where: [...query.where, `${quoteIdentifier(column)} = $${params.length}`],
    params
  }
}

export function toWhereClause(query: WhereBuilder): string {
  return query.where.length > 0 ? `WHERE ${query.where.join(' AND ')}` : ''
}

/** Rejects payloads that name an organization other than the current tenant. */
export function assertTenantOwnership(tenant: TenantContext, organizationId: string): void {
  if (organizationId.toLowerCase() !== tenant.organizationId) {
    throw new TenantOwnershipError('cannot act on a resource of a different organization')
  }
}
