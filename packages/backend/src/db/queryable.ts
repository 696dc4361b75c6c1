/**
 * Minimal query surface shared by pg (Pool, PoolClient) and the in-process test database.
 * Without params the text may hold several statements (simple query protocol).
 */
export interface QueryRows {
  rows: Record<string, unknown>[];
  rowCount?: number | null;
}

export interface Queryable {
  query(text: string, params?: unknown[]): Promise<QueryRows>;
}

/** A checked-out connection; statements on it share one session. */
export interface DatabaseClient extends Queryable {
  release(): void;
}

export interface Database extends Queryable {
  connect(): Promise<DatabaseClient>;
}
