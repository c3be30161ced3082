import type { Role } from './roles'

export type TenantContext = Readonly<{
  organizationId: string
  userId: string
  role: Role
}>
