import { describe, expect, it } from 'vitest'
import { TenantOwnershipError } from '../../src/sql/errors'
import { quoteIdentifier } from '../../src/sql/identifiers'
import { assertTenantOwnership, toWhereClause, withTenantFilter } from '../../src/sql/tenant-filter'
import type { TenantContext } from '../../src/tenancy/types'
import { ORG_A, ORG_B, USER_ID } from '../helpers/tokens'

const tenant: TenantContext = { organizationId: ORG_A, userId: USER_ID, role: 'member' }

describe('withTenantFilter', () => {
  it('appends the organization predicate with the next placeholder', () => {
    const filtered = withTenantFilter({ where: ['"status" = $1'], params: ['active'] }, tenant)

    expect(filtered).toEqual({
      where: ['"status" = $1', '"organization_id" = $2'],
      params: ['active', ORG_A]
    })
    expect(toWhereClause(filtered)).toBe('WHERE "status" = $1 AND "organization_id" = $2')
  })

  it('accepts a custom column', () => {
    const filtered = withTenantFilter({ where: [], params: [] }, tenant, 'org_id')

    expect(toWhereClause(filtered)).toBe('WHERE "org_id" = $1')
    expect(filtered.params).toEqual([ORG_A])
  })

  it('does not mutate the input', () => {
    const query = { where: [], params: [] }
    withTenantFilter(query, tenant)

    expect(query).toEqual({ where: [], params: [] })
  })

  it('renders no clause for an empty builder', () => {
    expect(toWhereClause({ where: [], params: [] })).toBe('')
  })
})

describe('assertTenantOwnership', () => {
  it('accepts the current organization in any case', () => {
    expect(() => assertTenantOwnership(tenant, ORG_A.toUpperCase())).not.toThrow()
  })

  it('rejects another organization', () => {
    expect(() => assertTenantOwnership(tenant, ORG_B)).toThrow(TenantOwnershipError)
  })
})

describe('quoteIdentifier', () => {
  it('quotes and escapes identifiers', () => {
    expect(quoteIdentifier('organization_id')).toBe('"organization_id"')
    expect(quoteIdentifier('"already"')).toBe('"already"')
    expect(quoteIdentifier('we"ird')).toBe('"we""ird"')
  })

  it('quotes each part of a qualified name', () => {
    expect(quoteIdentifier('public.membership')).toBe('"public"."membership"')
  })

  it('rejects empty parts', () => {
    expect(() => quoteIdentifier('public.')).toThrow('empty SQL identifier')
  })
})
