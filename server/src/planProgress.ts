import { PROJECT_AGGREGATE_TASK } from '../../src/types.js'
import type { IsoDate, PlanKind } from '../../src/types.js'
import { progressRowSchema } from './rows.js'
import type { ParsedPlanPoint, ProgressRowInput } from './rows.js'
import { daysBetween, eachDayIso, getChartBounds } from './utils/dateUtils.js'

/** The schedule and latest progress of one task, as ingestion reports it. */
export interface ScheduledTask {
  taskName: string
  startDate: IsoDate | null
  endDate: IsoDate | null
  adjustedStartDate?: IsoDate | null
  adjustedEndDate?: IsoDate | null
  actualProgress: number
  assignee?: string | null
  status?: string | null
  showLabel?: boolean
}

export function planPercentage(startDate: IsoDate, endDate: IsoDate, date: IsoDate): number {
  if (date < startDate) return 0
  if (date >= endDate) return 1
  const total = daysBetween(startDate, endDate)
  if (total === 0) return 1
  return Math.min(daysBetween(startDate, date) / total, 1)
}

/** Adjusted dates win when asked for and present; reversed ranges are swapped. */
export function resolveSchedule(
  task: ScheduledTask,
  useAdjusted: boolean
): { startDate: IsoDate; endDate: IsoDate } | null {
  let start = task.startDate
  let end = task.endDate
  if (useAdjusted) {
    if (task.adjustedStartDate) start = task.adjustedStartDate
    if (task.adjustedEndDate) end = task.adjustedEndDate
  }
  if (!start || !end) return null
  return start > end ? { startDate: end, endDate: start } : { startDate: start, endDate: end }
}

export function planProgress(
  tasks: ScheduledTask[],
  date: IsoDate,
  { useAdjusted = false }: { useAdjusted?: boolean } = {}
): number {
  let total = 0
  let counted = 0
  for (const task of tasks) {
    const schedule = resolveSchedule(task, useAdjusted)
    if (!schedule) continue
    total += planPercentage(schedule.startDate, schedule.endDate, date)
    counted++
  }
  return counted > 0 ? total / counted : 0
}

export function chartDateRange(
  tasks: ScheduledTask[],
  options: { asOf: IsoDate; bufferDays?: number; minRangeDays?: number }
): { from: IsoDate; to: IsoDate } {
  const scheduled = tasks.flatMap((task) => {
    const schedule = resolveSchedule(task, false)
    return schedule ? [schedule] : []
  })
  return getChartBounds(scheduled, options)
}

/** One project-level point per day of `range`. INITIAL reads original dates, CURRENT adjusted ones. */
export function buildPlanBaseline(
  tasks: ScheduledTask[],
  kind: PlanKind,
  range: { from: IsoDate; to: IsoDate }
): ParsedPlanPoint[] {
  const useAdjusted = kind === 'CURRENT'
  return eachDayIso(range.from, range.to).map((date) => ({
    taskName: PROJECT_AGGREGATE_TASK,
    date,
    plannedProgress: planProgress(tasks, date, { useAdjusted }),
  }))
}

/**
 * History for a project that arrives without any: project progress rises linearly from the
 * earliest start date to `asOf`, each task weighted by its share of the mean and capped at
 * its current progress.
 */
export function synthesizeBackfill(tasks: ScheduledTask[], asOf: IsoDate): ProgressRowInput[] {
  if (tasks.length === 0) return []
  const starts = tasks.flatMap((t) => (t.startDate ? [t.startDate] : []))
  let first = starts.length > 0 ? starts.reduce((a, b) => (b < a ? b : a)) : asOf
  if (first > asOf) first = asOf
  const dates = eachDayIso(first, asOf)
  const mean = tasks.reduce((sum, t) => sum + t.actualProgress, 0) / tasks.length
  const perDay = mean / dates.length

  const rows: ProgressRowInput[] = []
  dates.forEach((recordDate, i) => {
    const projectProgress = Math.min(perDay * (i + 1), mean)
    for (const task of tasks) {
      const weight = mean > 0 ? task.actualProgress / mean : 1
      rows.push({
        taskName: task.taskName,
        recordDate,
        actualProgress: Math.min(projectProgress * weight, task.actualProgress),
        startDate: task.startDate,
        endDate: task.endDate,
        adjustedStartDate: task.adjustedStartDate,
        adjustedEndDate: task.adjustedEndDate,
        assignee: task.assignee,
        status: task.status,
        showLabel: task.showLabel,
      })
    }
  })
  return rows
}

/**
 * Latest snapshot per task out of raw ingested rows, for plan derivation. Undated rows count
 * as `asOf`. Rows that fail to parse are skipped here; the write path reports them.
 */
export function tasksFromRows(rows: unknown[], asOf: IsoDate): ScheduledTask[] {
  const latest = new Map<string, { recordDate: IsoDate; task: ScheduledTask }>()
  for (const raw of rows) {
    const result = progressRowSchema.safeParse(raw)
    if (!result.success) continue
    const row = result.data
    const recordDate = row.recordDate ?? asOf
    const previous = latest.get(row.taskName)
    if (previous && previous.recordDate > recordDate) continue
    latest.set(row.taskName, {
      recordDate,
      task: {
        taskName: row.taskName,
        startDate: row.startDate ?? null,
        endDate: row.endDate ?? null,
        adjustedStartDate: row.adjustedStartDate ?? null,
        adjustedEndDate: row.adjustedEndDate ?? null,
        actualProgress: row.actualProgress,
        assignee: row.assignee ?? null,
        status: row.status ?? null,
        showLabel: row.showLabel,
      },
    })
  }
  return [...latest.values()].map((entry) => entry.task)
}

export function hasSchedules(tasks: ScheduledTask[]): boolean {
  return tasks.some((task) => resolveSchedule(task, false) !== null)
}
