import type pg from 'pg'
import type {
  DailyUpdateReport,
  HistoryViolation,
  InitializeResult,
  IsoDate,
  PlanKind,
  PlanPoint,
  ProtectionStatus,
  RecentDay,
  WriteMode,
} from '../../src/types.js'
import { PROJECT_AGGREGATE_TASK } from '../../src/types.js'
import { withTransaction } from './db.js'
import {
  AlreadyInitializedError,
  HistoryViolationError,
  NotInitializedError,
  PlanAlreadySetError,
  ValidationError,
} from './errors.js'
import { PlanSnapshotStore } from './planStore.js'
import { ProgressHistoryStore, staleAsOfReason } from './progressStore.js'
import type { ProgressWrite, UpsertOutcome } from './progressStore.js'
import { checkHistoricalBatch, parsePlanPoints, parseProgressRows } from './rows.js'
import type { ParsedPlanPoint, ProgressRow } from './rows.js'
import { applyTaskFilter } from './taskFilter.js'
import type { TaskFilter } from './taskFilter.js'
import { isIsoDate } from './utils/dateUtils.js'

export interface CoordinatorOptions {
  /** Source of audit timestamps. */
  clock?: () => Date
  pageSize?: number
  /** Rejected writes kept per project for `violations`; older ones are only counted. */
  maxLoggedViolations?: number
}

export interface InitializeOptions {
  asOf: IsoDate
  initialPlan?: unknown[]
  currentPlan?: unknown[]
  filter?: TaskFilter
}

export interface DailyUpdateOptions {
  asOf: IsoDate
  currentPlan?: unknown[]
  filter?: TaskFilter
}

const RECENT_DAYS = 5
const MAX_LOGGED_VIOLATIONS = 100

function requireProjectName(projectName: string): void {
  if (projectName.trim() === '') {
    throw new ValidationError('project name is required', [])
  }
}

function requireAsOf(asOf: IsoDate, projectName: string): void {
  if (!isIsoDate(asOf)) {
    throw new ValidationError(`asOf must be a YYYY-MM-DD date, got ${asOf}`, [], projectName)
  }
}

function validPlan(projectName: string, points: unknown[] | undefined): ParsedPlanPoint[] | null {
  if (points === undefined) return null
  const { parsed, issues } = parsePlanPoints(points)
  if (issues.length > 0) {
    throw new ValidationError(`${issues.length} invalid plan point(s) for ${projectName}`, issues, projectName)
  }
  return parsed
}

function toWrite(projectName: string, row: ProgressRow, recordDate: IsoDate, writeMode: WriteMode): ProgressWrite {
  return {
    projectName,
    taskName: row.taskName,
    recordDate,
    actualProgress: row.actualProgress,
    writeMode,
    startDate: row.startDate ?? null,
    endDate: row.endDate ?? null,
    assignee: row.assignee ?? null,
    status: row.status ?? null,
    showLabel: row.showLabel,
  }
}

/**
 * Gatekeeper between ingested rows and the history. `initialize` is the only path that writes
 * past dates; `dailyUpdate` only ever writes `asOf`.
 */
export class HistoryProtectionCoordinator {
  private readonly violationLog = new Map<string, HistoryViolation[]>()
  private readonly violationCounts = new Map<string, number>()
  private readonly clock: () => Date
  private readonly pageSize: number
  private readonly maxLoggedViolations: number

  constructor(
    private readonly pool: pg.Pool,
    options: CoordinatorOptions = {}
  ) {
    this.clock = options.clock ?? (() => new Date())
    this.pageSize = options.pageSize ?? 500
    this.maxLoggedViolations = options.maxLoggedViolations ?? MAX_LOGGED_VIOLATIONS
  }

  /** Store bound to the pool, for reads outside any unit of work. */
  history(): ProgressHistoryStore {
    return new ProgressHistoryStore(this.pool, this.pageSize)
  }

  plans(): PlanSnapshotStore {
    return new PlanSnapshotStore(this.pool)
  }

  async initialize(projectName: string, rows: unknown[], options: InitializeOptions): Promise<InitializeResult> {
    requireProjectName(projectName)
    requireAsOf(options.asOf, projectName)
    const selected = applyTaskFilter(projectName, rows, options.filter)
    const { parsed, issues } = parseProgressRows(projectName, selected)
    issues.push(...checkHistoricalBatch(parsed, options.asOf))
    if (issues.length > 0) {
      issues.sort((a, b) => a.index - b.index)
      throw new ValidationError(`${issues.length} invalid row(s); nothing was written for ${projectName}`, issues, projectName)
    }
    if (parsed.length === 0) {
      throw new ValidationError(`no rows to initialize ${projectName} with`, [], projectName)
    }
    const initialPlan = validPlan(projectName, options.initialPlan)
    const currentPlan = validPlan(projectName, options.currentPlan)

    const writes = parsed.map(({ row }) => toWrite(projectName, row, row.recordDate ?? options.asOf, 'INITIAL'))
    const dates = writes.map((w) => w.recordDate).sort()
    const recordedAt = this.clock()

    const result = await withTransaction(this.pool, async (client) => {
      const progress = new ProgressHistoryStore(client, this.pageSize)
      const plans = new PlanSnapshotStore(client)
      if (await progress.existsAny(projectName)) throw new AlreadyInitializedError(projectName)
      if (initialPlan && (await plans.hasPlan(projectName, 'INITIAL'))) throw new PlanAlreadySetError(projectName)
      const written = await progress.insertBatch(writes, recordedAt)
      const initialPlanPoints = initialPlan ? await plans.writeInitialPlan(projectName, initialPlan) : 0
      const currentPlanPoints = currentPlan ? await plans.replaceCurrentPlan(projectName, currentPlan) : 0
      return {
        projectName,
        written,
        earliestDate: dates[0],
        latestDate: dates[dates.length - 1],
        initialPlanPoints,
        currentPlanPoints,
      }
    })
    console.log(
      `[burnup] initialized ${projectName}: ${result.written} backfilled sample(s) ${result.earliestDate}..${result.latestDate}`
    )
    return result
  }

  async dailyUpdate(projectName: string, rows: unknown[], options: DailyUpdateOptions): Promise<DailyUpdateReport> {
    requireProjectName(projectName)
    requireAsOf(options.asOf, projectName)
    const { asOf } = options
    const selected = applyTaskFilter(projectName, rows, options.filter)
    const { parsed, issues } = parseProgressRows(projectName, selected)
    const currentPlan = validPlan(projectName, options.currentPlan)
    const recordedAt = this.clock()

    const report = await this.guarded(() => withTransaction(this.pool, async (client) => {
      const progress = new ProgressHistoryStore(client, this.pageSize)
      if (!(await progress.existsAny(projectName))) throw new NotInitializedError(projectName)
      const latest = await progress.latestRecordDate(projectName)
      if (latest !== null && asOf < latest) {
        throw new HistoryViolationError({
          projectName,
          taskName: PROJECT_AGGREGATE_TASK,
          date: asOf,
          storedProgress: null,
          attemptedProgress: null,
          reason: staleAsOfReason(asOf, latest),
        })
      }

      const outcome: DailyUpdateReport = {
        projectName,
        asOf,
        written: 0,
        unchanged: 0,
        ignored: 0,
        violations: [],
        invalid: issues,
        currentPlanPoints: 0,
      }
      for (const { row } of parsed) {
        const recordDate = row.recordDate ?? asOf
        if (recordDate > asOf) {
          outcome.ignored++
          continue
        }
        if (recordDate < asOf) {
          const stored = await progress.find(projectName, row.taskName, recordDate)
          if (stored && stored.actualProgress === row.actualProgress) {
            outcome.ignored++
            continue
          }
          outcome.violations.push({
            projectName,
            taskName: row.taskName,
            date: recordDate,
            storedProgress: stored ? stored.actualProgress : null,
            attemptedProgress: row.actualProgress,
            reason: stored
              ? `sample is dated before ${asOf} and cannot change`
              : `daily updates cannot backfill ${recordDate}`,
          })
          continue
        }
        const result: UpsertOutcome = await progress.upsert(toWrite(projectName, row, asOf, 'DAILY'), {
          asOf,
          recordedAt,
        })
        if (result === 'unchanged') outcome.unchanged++
        else outcome.written++
      }
      if (currentPlan) {
        outcome.currentPlanPoints = await new PlanSnapshotStore(client).replaceCurrentPlan(projectName, currentPlan)
      }
      return outcome
    }))

    report.violations.forEach((violation) => this.logViolation(violation))
    console.log(
      `[burnup] daily update ${projectName} @ ${asOf}: ${report.written} written, ${report.unchanged} unchanged, ` +
        `${report.ignored} ignored, ${report.violations.length} rejected, ${report.invalid.length} invalid`
    )
    return report
  }

  /**
   * Single daily sample. Unlike `dailyUpdate`, a history violation fails the call; backfilling
   * stays with `initialize`.
   */
  async recordProgress(projectName: string, row: unknown, { asOf }: { asOf: IsoDate }): Promise<UpsertOutcome> {
    requireProjectName(projectName)
    requireAsOf(asOf, projectName)
    const { parsed, issues } = parseProgressRows(projectName, [row])
    if (issues.length > 0 || parsed.length === 0) {
      throw new ValidationError(`invalid row for ${projectName}`, issues, projectName)
    }
    const parsedRow = parsed[0].row
    const write = toWrite(projectName, parsedRow, parsedRow.recordDate ?? asOf, 'DAILY')
    return this.guarded(() =>
      withTransaction(this.pool, async (client) => {
        const progress = new ProgressHistoryStore(client, this.pageSize)
        if (!(await progress.existsAny(projectName))) throw new NotInitializedError(projectName)
        return progress.upsert(write, { asOf, recordedAt: this.clock() })
      })
    )
  }

  async writeInitialPlan(projectName: string, points: unknown[]): Promise<number> {
    requireProjectName(projectName)
    const parsed = validPlan(projectName, points) ?? []
    return withTransaction(this.pool, (client) => new PlanSnapshotStore(client).writeInitialPlan(projectName, parsed))
  }

  async replaceCurrentPlan(projectName: string, points: unknown[]): Promise<number> {
    requireProjectName(projectName)
    const parsed = validPlan(projectName, points) ?? []
    return withTransaction(this.pool, (client) => new PlanSnapshotStore(client).replaceCurrentPlan(projectName, parsed))
  }

  async readPlan(projectName: string, planKind: PlanKind): Promise<PlanPoint[]> {
    return this.plans().readPlan(projectName, planKind)
  }

  async protectionStatus(projectName: string, { asOf }: { asOf: IsoDate }): Promise<ProtectionStatus> {
    requireAsOf(asOf, projectName)
    const rows = await this.history().summarize(projectName)
    const days = new Map<IsoDate, RecentDay>()
    let totalRecords = 0
    let backfilledCount = 0
    for (const row of rows) {
      totalRecords += row.count
      if (row.isBackfilled) backfilledCount += row.count
      const day = days.get(row.date) ?? { date: row.date, taskCount: 0, labeledCount: 0, isToday: row.date === asOf }
      day.taskCount += row.count
      if (row.showLabel) day.labeledCount += row.count
      days.set(row.date, day)
    }
    const ordered = [...days.values()].sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0))
    const violationAttempts = this.violationCounts.get(projectName) ?? 0
    return {
      projectName,
      totalRecords,
      backfilledCount,
      dailyCount: totalRecords - backfilledCount,
      earliestDate: ordered.length > 0 ? ordered[0].date : null,
      latestDate: ordered.length > 0 ? ordered[ordered.length - 1].date : null,
      recordDays: ordered.length,
      hasTodayRecords: days.has(asOf),
      violationAttempts,
      hasViolationAttempts: violationAttempts > 0,
      recentDays: ordered.slice(-RECENT_DAYS),
    }
  }

  /** The most recent rejected writes seen by this process, oldest first. */
  violations(projectName: string): HistoryViolation[] {
    return [...(this.violationLog.get(projectName) ?? [])]
  }

  private async guarded<T>(work: () => Promise<T>): Promise<T> {
    try {
      return await work()
    } catch (err) {
      if (err instanceof HistoryViolationError) this.logViolation(err.violation)
      throw err
    }
  }

  private logViolation(violation: HistoryViolation): void {
    const { projectName } = violation
    const log = this.violationLog.get(projectName) ?? []
    log.push(violation)
    if (log.length > this.maxLoggedViolations) log.splice(0, log.length - this.maxLoggedViolations)
    this.violationLog.set(projectName, log)
    this.violationCounts.set(projectName, (this.violationCounts.get(projectName) ?? 0) + 1)
    console.warn(
      `[burnup] rejected write ${violation.projectName} / ${violation.taskName} @ ${violation.date}: ${violation.reason}`
    )
  }
}
