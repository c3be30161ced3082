import { describe, expect, it } from 'vitest'
import type { Identity } from '../../src/auth/types'
import { resolveOrganizationId } from '../../src/tenancy/resolver'
import { ORG_A, ORG_B, USER_ID } from '../helpers/tokens'

function identity(organizationId: string | null = null): Identity {
  return { subjectId: USER_ID, email: 'ada@example.test', organizationId }
}

describe('resolveOrganizationId', () => {
  it('prefers the token claim over a different path parameter', () => {
    expect(resolveOrganizationId(identity(ORG_A), { params: { org_id: ORG_B }, query: {} })).toEqual({
      ok: true,
      organizationId: ORG_A,
      source: 'token'
    })
  })

  it('ignores a malformed path parameter when the claim resolves', () => {
    expect(resolveOrganizationId(identity(ORG_A), { params: { org_id: 'nope' }, query: {} })).toEqual({
      ok: true,
      organizationId: ORG_A,
      source: 'token'
    })
  })

  it('uses the path parameter before the query parameter', () => {
    expect(resolveOrganizationId(identity(), { params: { org_id: ORG_A }, query: { org_id: ORG_B } })).toEqual({
      ok: true,
      organizationId: ORG_A,
      source: 'path'
    })
  })

  it('falls back to the query parameter', () => {
    expect(resolveOrganizationId(identity(), { params: {}, query: { org_id: ORG_B.toUpperCase() } })).toEqual({
      ok: true,
      organizationId: ORG_B,
      source: 'query'
    })
  })

  it('fails with 400 on a malformed path parameter without trying the query', () => {
    expect(resolveOrganizationId(identity(), { params: { org_id: '123' }, query: { org_id: ORG_B } })).toEqual({
      ok: false,
      status: 400,
      message: 'invalid organization id format in path'
    })
  })

  it('fails with 400 on a malformed query parameter', () => {
    expect(resolveOrganizationId(identity(), { params: {}, query: { org_id: 'not-a-uuid' } })).toEqual({
      ok: false,
      status: 400,
      message: 'invalid organization id format in query'
    })
  })

  it('treats a repeated query parameter as malformed', () => {
    const result = resolveOrganizationId(identity(), { params: {}, query: { org_id: [ORG_A, ORG_B] } })

    expect(result.ok).toBe(false)
    expect(!result.ok && result.status).toBe(400)
  })

  it('treats an empty query parameter as absent', () => {
    expect(resolveOrganizationId(identity(), { params: {}, query: { org_id: '' } })).toEqual({
      ok: false,
      status: 403,
      message: 'organization context required but not provided'
    })
  })

  it('fails closed with 403 when nothing names an organization', () => {
    expect(resolveOrganizationId(identity(), { params: {}, query: {} })).toEqual({
      ok: false,
      status: 403,
      message: 'organization context required but not provided'
    })
  })
})
