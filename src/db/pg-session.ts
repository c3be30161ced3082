import type { Pool, PoolClient } from 'pg'
import type { DbSession, QueryResultRows, SessionFactory } from './types'

export class PgSession implements DbSession {
  constructor(private readonly client: Pick<PoolClient, 'query'>) {}

  async query(sql: string, params: unknown[]): Promise<QueryResultRows> {
    const result = await this.client.query(sql, params)
    return { rows: result.rows }
  }
}

/** Checks a client out of the pool for the duration of `fn`. */
export class PgSessionFactory implements SessionFactory {
  constructor(
    private readonly pool: Pool,
    private readonly statementTimeoutMs: number
  ) {}

  async withSession<T>(fn: (session: DbSession) => Promise<T>): Promise<T> {
    const client = await this.pool.connect()

    try {
      await client.query(`SET statement_timeout = ${this.statementTimeoutMs}`)
      return await fn(new PgSession(client))
    } finally {
      client.release()
    }
  }
}
