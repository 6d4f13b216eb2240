import { z } from 'zod'
import type { IsoDate } from '../../src/types.js'
import { ValidationError } from './errors.js'
import { isoDateSchema, progressRowSchema } from './rows.js'

/** Restricts an ingested batch to the tasks scheduled in a year, or inside a date window. */
export const taskFilterSchema = z.object({
  year: z.number().int().min(1900).max(9999).optional(),
  from: isoDateSchema.optional(),
  to: isoDateSchema.optional(),
})

export type TaskFilter = z.infer<typeof taskFilterSchema>

interface Schedule {
  startDate: IsoDate
  endDate: IsoDate
}

function scheduleOf(raw: unknown): Schedule | null | 'unparsed' {
  const result = progressRowSchema.safeParse(raw)
  if (!result.success) return 'unparsed'
  const { startDate, endDate } = result.data
  if (!startDate || !endDate) return null
  return { startDate, endDate }
}

/** Starts in the year, ends in it, or spans it. */
export function isWithinYear({ startDate, endDate }: Schedule, year: number): boolean {
  const first = `${year}-01-01`
  const last = `${year}-12-31`
  const startsIn = startDate >= first && startDate <= last
  const endsIn = endDate >= first && endDate <= last
  const spans = startDate < first && endDate > last
  return startsIn || endsIn || spans
}

/** Starts no earlier than `from` and ends no later than `to`. */
export function isWithinWindow({ startDate, endDate }: Schedule, { from, to }: { from?: IsoDate; to?: IsoDate }): boolean {
  if (from !== undefined && startDate < from) return false
  if (to !== undefined && endDate > to) return false
  return true
}

/** Every year touched by a start or end date of the batch, ascending. */
export function yearsCovered(rows: unknown[]): number[] {
  const years = new Set<number>()
  for (const raw of rows) {
    const schedule = scheduleOf(raw)
    if (schedule === null || schedule === 'unparsed') continue
    years.add(Number(schedule.startDate.slice(0, 4)))
    years.add(Number(schedule.endDate.slice(0, 4)))
  }
  return [...years].sort((a, b) => a - b)
}

/**
 * Drops the rows a filter excludes. `year` wins over `from`/`to`. Rows without a schedule cannot
 * be placed and are dropped once any filter is set; rows that fail to parse are kept so the write
 * path reports them.
 */
export function applyTaskFilter(projectName: string, rows: unknown[], filter: TaskFilter = {}): unknown[] {
  const { year, from, to } = filter
  if (year === undefined && from === undefined && to === undefined) return rows

  if (year !== undefined) {
    const years = yearsCovered(rows)
    if (years.length === 0) {
      throw new ValidationError(`No scheduled tasks available to filter for ${projectName}`, [], projectName)
    }
    if (!years.includes(year)) {
      throw new ValidationError(
        `Year ${year} not found in data. Available years: ${years.join(', ')}`,
        [],
        projectName
      )
    }
  }

  const kept = rows.filter((raw) => {
    const schedule = scheduleOf(raw)
    if (schedule === 'unparsed') return true
    if (schedule === null) return false
    return year !== undefined ? isWithinYear(schedule, year) : isWithinWindow(schedule, { from, to })
  })
  if (year !== undefined && kept.length === 0) {
    throw new ValidationError(`No tasks found for year ${year}`, [], projectName)
  }
  if (kept.length < rows.length) {
    const scope = year !== undefined ? `year ${year}` : `${from ?? '…'}..${to ?? '…'}`
    console.log(`[burnup] ${projectName}: filtered ${rows.length} to ${kept.length} row(s) for ${scope}`)
  }
  return kept
}
