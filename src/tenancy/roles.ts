import { z } from 'zod'

export const roles = ['owner', 'admin', 'member'] as const

export type Role = (typeof roles)[number]

export const roleSchema = z.enum(roles)

const ROLE_RANK: Record<Role, number> = {
  owner: 3,
  admin: 2,
  member: 1
}

/**
 * Whether `actual` meets the `required` role under OWNER > ADMIN > MEMBER.
 */
export function satisfiesRole(actual: Role, required: Role): boolean {
  return ROLE_RANK[actual] >= ROLE_RANK[required]
}
