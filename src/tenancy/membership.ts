import type { Logger } from 'pino'
import type { DbSession, SessionFactory } from '../db/types'
import { roleSchema, type Role } from './roles'

export type MembershipCheck =
  | { isMember: true; role: Role }
  | { isMember: false; role: null }

const MEMBERSHIP_ROLE_SQL =
  'SELECT role FROM membership WHERE user_id = $1 AND organization_id = $2 LIMIT 1'

const NOT_A_MEMBER: MembershipCheck = { isMember: false, role: null }

export async function lookupMembership(
  session: DbSession,
  userId: string,
  organizationId: string,
  logger: Logger
): Promise<MembershipCheck> {
  const result = await session.query(MEMBERSHIP_ROLE_SQL, [userId, organizationId])
  const row = result.rows[0]
  if (!row) {
    return NOT_A_MEMBER
  }

  const role = roleSchema.safeParse(row.role)
  if (!role.success) {
    logger.error({ userId, organizationId, role: row.role }, 'membership has unknown role')
    return NOT_A_MEMBER
  }

  return { isMember: true, role: role.data }
}

/**
 * Confirms membership and fetches the role in the same query.
 *
 * A caller-supplied session is reused; otherwise one is borrowed only for
 * the lookup.
 */
export class MembershipValidator {
  constructor(
    private readonly sessions: SessionFactory,
    private readonly logger: Logger
  ) {}

  validate(userId: string, organizationId: string, session?: DbSession): Promise<MembershipCheck> {
    if (session) {
      return lookupMembership(session, userId, organizationId, this.logger)
    }

    return this.sessions.withSession((borrowed) =>
      lookupMembership(borrowed, userId, organizationId, this.logger)
    )
  }
}
