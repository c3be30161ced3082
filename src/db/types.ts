export type QueryResultRows = {
  rows: Record<string, unknown>[]
}

/** A borrowed connection; the single handle through which a request queries. */
export interface DbSession {
  query(sql: string, params: unknown[]): Promise<QueryResultRows>
}

export interface SessionFactory {
  withSession<T>(fn: (session: DbSession) => Promise<T>): Promise<T>
}
