export class TenantOwnershipError extends Error {
  readonly code: string
  readonly status = 403

  constructor(message: string, code = 'TENANT_OWNERSHIP_VIOLATION') {
    super(message)
    this.name = 'TenantOwnershipError'
    this.code = code
  }
}
