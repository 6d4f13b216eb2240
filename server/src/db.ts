import pg from 'pg'

const { Pool } = pg

/** Anything rows can be read from: the pool itself or a client checked out for a transaction. */
export type Queryable = Pick<pg.Pool, 'query'>

export function createPool(connectionString: string): pg.Pool {
  return new Pool({ connectionString })
}

const SCHEMA = [
  `CREATE TABLE IF NOT EXISTS progress_records (
    project_name TEXT NOT NULL,
    task_name TEXT NOT NULL,
    record_date TEXT NOT NULL,
    actual_progress DOUBLE PRECISION NOT NULL,
    is_backfilled BOOLEAN NOT NULL,
    start_date TEXT,
    end_date TEXT,
    assignee TEXT,
    status TEXT,
    show_label BOOLEAN NOT NULL DEFAULT TRUE,
    recorded_at TIMESTAMPTZ NOT NULL,
    PRIMARY KEY (project_name, task_name, record_date)
  )`,
  `CREATE TABLE IF NOT EXISTS plan_points (
    project_name TEXT NOT NULL,
    task_name TEXT NOT NULL,
    plan_kind TEXT NOT NULL,
    plan_date TEXT NOT NULL,
    planned_progress DOUBLE PRECISION NOT NULL,
    PRIMARY KEY (project_name, plan_kind, task_name, plan_date)
  )`,
]

export async function ensureSchema(db: Queryable): Promise<void> {
  for (const statement of SCHEMA) {
    await db.query(statement)
  }
}

/** Runs `work` on one pooled client between BEGIN and COMMIT; any throw rolls the whole unit back. */
export async function withTransaction<T>(
  pool: pg.Pool,
  work: (client: pg.PoolClient) => Promise<T>
): Promise<T> {
  const client = await pool.connect()
  try {
    await client.query('BEGIN')
    const result = await work(client)
    await client.query('COMMIT')
    return result
  } catch (err) {
    try {
      await client.query('ROLLBACK')
    } catch (rollbackErr) {
      console.error('[burnup] rollback failed', rollbackErr)
    }
    throw err
  } finally {
    client.release()
  }
}
