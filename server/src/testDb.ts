import { newDb } from 'pg-mem'
import type pg from 'pg'
import { ensureSchema } from './db.js'

/** A fresh in-process database with the schema applied, behind node-postgres' Pool API. */
export async function createTestPool(): Promise<pg.Pool> {
  const { Pool } = newDb().adapters.createPg()
  const pool: pg.Pool = new Pool()
  await ensureSchema(pool)
  return pool
}
