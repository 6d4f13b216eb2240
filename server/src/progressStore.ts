import type { DailyAverage, IsoDate, ProgressRecord, WriteMode } from '../../src/types.js'
import type { Queryable } from './db.js'
import { HistoryViolationError, ImmutableHistoryError } from './errors.js'

const RECORD_SELECT =
  'project_name, task_name, record_date, actual_progress, is_backfilled, start_date, end_date, assignee, status, show_label, recorded_at'

export interface ProgressRecordRow {
  project_name: string
  task_name: string
  record_date: string
  actual_progress: number
  is_backfilled: boolean
  start_date: string | null
  end_date: string | null
  assignee: string | null
  status: string | null
  show_label: boolean
  recorded_at: Date | string
}

function rowToRecord(row: ProgressRecordRow): ProgressRecord {
  return {
    projectName: row.project_name,
    taskName: row.task_name,
    recordDate: row.record_date,
    actualProgress: Number(row.actual_progress),
    isBackfilled: row.is_backfilled,
    recordedAt: new Date(row.recorded_at).toISOString(),
    startDate: row.start_date ?? null,
    endDate: row.end_date ?? null,
    assignee: row.assignee ?? null,
    status: row.status ?? null,
    showLabel: row.show_label,
  }
}

/** A sample to persist. `writeMode` decides the backfill flag; nothing else does. */
export interface ProgressWrite {
  projectName: string
  taskName: string
  recordDate: IsoDate
  actualProgress: number
  writeMode: WriteMode
  startDate?: IsoDate | null
  endDate?: IsoDate | null
  assignee?: string | null
  status?: string | null
  showLabel?: boolean
}

export type UpsertOutcome = 'inserted' | 'updated' | 'unchanged'

export interface RangeQuery {
  projectName: string
  taskName?: string
  from?: IsoDate
  to?: IsoDate
}

export interface HistorySummaryRow {
  date: IsoDate
  isBackfilled: boolean
  showLabel: boolean
  count: number
}

function writeValues(write: ProgressWrite, recordedAt: Date): unknown[] {
  return [
    write.projectName,
    write.taskName,
    write.recordDate,
    write.actualProgress,
    write.writeMode === 'INITIAL',
    write.startDate ?? null,
    write.endDate ?? null,
    write.assignee ?? null,
    write.status ?? null,
    write.showLabel ?? true,
    recordedAt.toISOString(),
  ]
}

const INSERT_COLUMNS =
  'project_name, task_name, record_date, actual_progress, is_backfilled, start_date, end_date, assignee, status, show_label, recorded_at'
const INSERT_PLACEHOLDERS = '$1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11'

export function staleAsOfReason(asOf: IsoDate, latest: IsoDate): string {
  return `asOf ${asOf} is before the latest recorded day ${latest}`
}

function isSameWrite(stored: ProgressRecord, write: ProgressWrite, recordedAt: Date): boolean {
  return (
    stored.actualProgress === write.actualProgress &&
    stored.isBackfilled === (write.writeMode === 'INITIAL') &&
    stored.recordedAt === recordedAt.toISOString()
  )
}

/**
 * Keyed `(project, task, record date)` progress samples. The immutability of past samples is
 * enforced here, against the caller's `asOf`, not left to callers.
 */
export class ProgressHistoryStore {
  constructor(
    private readonly db: Queryable,
    private readonly pageSize = 500
  ) {}

  async existsAny(projectName: string): Promise<boolean> {
    const res = await this.db.query('SELECT 1 FROM progress_records WHERE project_name = $1 LIMIT 1', [
      projectName,
    ])
    return res.rows.length > 0
  }

  async find(projectName: string, taskName: string, recordDate: IsoDate): Promise<ProgressRecord | null> {
    const res = await this.db.query<ProgressRecordRow>(
      `SELECT ${RECORD_SELECT} FROM progress_records
       WHERE project_name = $1 AND task_name = $2 AND record_date = $3`,
      [projectName, taskName, recordDate]
    )
    return res.rows[0] ? rowToRecord(res.rows[0]) : null
  }

  /** The newest record date of the project, or null before its first sample. */
  async latestRecordDate(projectName: string): Promise<IsoDate | null> {
    const res = await this.db.query<{ record_date: string }>(
      `SELECT record_date FROM progress_records WHERE project_name = $1
       ORDER BY record_date DESC LIMIT 1`,
      [projectName]
    )
    return res.rows[0]?.record_date ?? null
  }

  /**
   * Call inside a transaction. The key is read first; an absent key is claimed with
   * ON CONFLICT DO NOTHING and read back, so a concurrent claim falls through to the
   * comparison below. An existing key is only rewritten when dated `asOf` or later, and the
   * UPDATE re-checks that itself. `asOf` may never lie before the project's newest sample.
   */
  async upsert(write: ProgressWrite, { asOf, recordedAt }: { asOf: IsoDate; recordedAt: Date }): Promise<UpsertOutcome> {
    if (write.writeMode === 'DAILY' && write.recordDate !== asOf) {
      throw new HistoryViolationError({
        projectName: write.projectName,
        taskName: write.taskName,
        date: write.recordDate,
        storedProgress: null,
        attemptedProgress: write.actualProgress,
        reason: `daily writes are limited to ${asOf}`,
      })
    }
    const latest = await this.latestRecordDate(write.projectName)
    if (latest !== null && asOf < latest) {
      throw new HistoryViolationError({
        projectName: write.projectName,
        taskName: write.taskName,
        date: write.recordDate,
        storedProgress: null,
        attemptedProgress: write.actualProgress,
        reason: staleAsOfReason(asOf, latest),
      })
    }

    let existing = await this.find(write.projectName, write.taskName, write.recordDate)
    if (!existing) {
      await this.db.query(
        `INSERT INTO progress_records (${INSERT_COLUMNS}) VALUES (${INSERT_PLACEHOLDERS})
         ON CONFLICT (project_name, task_name, record_date) DO NOTHING`,
        writeValues(write, recordedAt)
      )
      const claimed = await this.find(write.projectName, write.taskName, write.recordDate)
      if (!claimed) {
        throw new Error(`Sample ${write.projectName} / ${write.taskName} @ ${write.recordDate} vanished during upsert`)
      }
      if (isSameWrite(claimed, write, recordedAt)) return 'inserted'
      existing = claimed
    }
    const isBackfilled = write.writeMode === 'INITIAL'
    if (existing.actualProgress === write.actualProgress && existing.isBackfilled === isBackfilled) {
      return 'unchanged'
    }
    const violation = {
      projectName: write.projectName,
      taskName: write.taskName,
      date: write.recordDate,
      storedProgress: existing.actualProgress,
      attemptedProgress: write.actualProgress,
      reason: `sample is dated before ${asOf} and cannot change`,
    }
    if (existing.recordDate < asOf) throw new ImmutableHistoryError(violation)

    const updated = await this.db.query<{ record_date: string }>(
      `UPDATE progress_records
       SET actual_progress = $4, is_backfilled = $5, start_date = $6, end_date = $7,
           assignee = $8, status = $9, show_label = $10, recorded_at = $11
       WHERE project_name = $1 AND task_name = $2 AND record_date = $3 AND record_date >= $12
       RETURNING record_date`,
      [...writeValues(write, recordedAt), asOf]
    )
    if (updated.rows.length === 0) throw new ImmutableHistoryError(violation)
    return 'updated'
  }

  /** Plain inserts for an initialization batch; a duplicate key fails the surrounding transaction. */
  async insertBatch(writes: ProgressWrite[], recordedAt: Date): Promise<number> {
    for (const write of writes) {
      await this.db.query(
        `INSERT INTO progress_records (${INSERT_COLUMNS}) VALUES (${INSERT_PLACEHOLDERS})`,
        writeValues(write, recordedAt)
      )
    }
    return writes.length
  }

  /**
   * Samples ordered by record date, then task, read page by page with a keyset. Every iteration
   * starts from the store's current state.
   */
  async *queryRange({ projectName, taskName, from, to }: RangeQuery): AsyncGenerator<ProgressRecord> {
    const filters: string[] = ['project_name = $1']
    const values: unknown[] = [projectName]
    let i = 2
    if (taskName !== undefined) {
      filters.push(`task_name = $${i++}`)
      values.push(taskName)
    }
    if (from !== undefined) {
      filters.push(`record_date >= $${i++}`)
      values.push(from)
    }
    if (to !== undefined) {
      filters.push(`record_date <= $${i++}`)
      values.push(to)
    }
    let cursor: { date: string; task: string } | null = null
    for (;;) {
      const pageFilters = [...filters]
      const pageValues = [...values]
      if (cursor) {
        pageFilters.push(`(record_date > $${i} OR (record_date = $${i} AND task_name > $${i + 1}))`)
        pageValues.push(cursor.date, cursor.task)
      }
      const res = await this.db.query<ProgressRecordRow>(
        `SELECT ${RECORD_SELECT} FROM progress_records
         WHERE ${pageFilters.join(' AND ')}
         ORDER BY record_date, task_name
         LIMIT ${this.pageSize}`,
        pageValues
      )
      for (const row of res.rows) yield rowToRecord(row)
      if (res.rows.length < this.pageSize) return
      const last = res.rows[res.rows.length - 1]
      cursor = { date: last.record_date, task: last.task_name }
    }
  }

  async listRange(query: RangeQuery): Promise<ProgressRecord[]> {
    const records: ProgressRecord[] = []
    for await (const record of this.queryRange(query)) records.push(record)
    return records
  }

  /** The actual burn-up line: mean task progress per record date. */
  async dailyAverages(projectName: string, { to }: { to?: IsoDate } = {}): Promise<DailyAverage[]> {
    const values: unknown[] = [projectName]
    let filter = ''
    if (to !== undefined) {
      filter = ' AND record_date <= $2'
      values.push(to)
    }
    const res = await this.db.query<{ record_date: string; avg_progress: number | string }>(
      `SELECT record_date, AVG(actual_progress) AS avg_progress
       FROM progress_records
       WHERE project_name = $1${filter}
       GROUP BY record_date
       ORDER BY record_date`,
      values
    )
    return res.rows.map((row) => ({ date: row.record_date, actualProgress: Number(row.avg_progress) }))
  }

  async latestPerTask(projectName: string): Promise<ProgressRecord[]> {
    const latest = new Map<string, ProgressRecord>()
    for await (const record of this.queryRange({ projectName })) {
      latest.set(record.taskName, record)
    }
    return [...latest.values()].sort((a, b) => (a.taskName < b.taskName ? -1 : a.taskName > b.taskName ? 1 : 0))
  }

  async summarize(projectName: string): Promise<HistorySummaryRow[]> {
    const res = await this.db.query<{
      record_date: string
      is_backfilled: boolean
      show_label: boolean
      record_count: number | string
    }>(
      `SELECT record_date, is_backfilled, show_label, COUNT(*) AS record_count
       FROM progress_records
       WHERE project_name = $1
       GROUP BY record_date, is_backfilled, show_label
       ORDER BY record_date`,
      [projectName]
    )
    return res.rows.map((row) => ({
      date: row.record_date,
      isBackfilled: row.is_backfilled,
      showLabel: row.show_label,
      count: Number(row.record_count),
    }))
  }

  /** Rewrites the schedule carried by every sample of a task. Progress and backfill flags stay untouched. */
  async correctSchedule(
    projectName: string,
    taskName: string,
    startDate: IsoDate,
    endDate: IsoDate
  ): Promise<number> {
    const res = await this.db.query<{ record_date: string }>(
      `UPDATE progress_records SET start_date = $3, end_date = $4
       WHERE project_name = $1 AND task_name = $2
       RETURNING record_date`,
      [projectName, taskName, startDate, endDate]
    )
    return res.rows.length
  }
}
