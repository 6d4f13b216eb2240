import {
  addDays,
  parseISO,
  differenceInCalendarDays,
  eachDayOfInterval,
  format,
  isValid,
  startOfDay,
} from 'date-fns'
import type { IsoDate } from '../../../src/types.js'

const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/

export function toIsoDate(date: Date): IsoDate {
  return format(date, 'yyyy-MM-dd')
}

export function today(): IsoDate {
  return toIsoDate(startOfDay(new Date()))
}

/** True for real calendar dates only: `2024-02-30` is rejected. */
export function isIsoDate(value: string): boolean {
  if (!ISO_DATE_PATTERN.test(value)) return false
  const parsed = parseISO(value)
  return isValid(parsed) && toIsoDate(parsed) === value
}

export function addDaysIso(date: IsoDate, days: number): IsoDate {
  return toIsoDate(addDays(parseISO(date), days))
}

/** Signed whole days from `from` to `to`. */
export function daysBetween(from: IsoDate, to: IsoDate): number {
  return differenceInCalendarDays(parseISO(to), parseISO(from))
}

export function eachDayIso(from: IsoDate, to: IsoDate): IsoDate[] {
  if (to < from) return []
  return eachDayOfInterval({ start: parseISO(from), end: parseISO(to) }).map(toIsoDate)
}

export function isWithinRange(date: IsoDate, range: { from?: IsoDate; to?: IsoDate }): boolean {
  if (range.from !== undefined && date < range.from) return false
  if (range.to !== undefined && date > range.to) return false
  return true
}

export interface ChartBoundsOptions {
  asOf: IsoDate
  bufferDays?: number
  minRangeDays?: number
}

/**
 * Chart window around a set of task schedules: earliest start and latest end padded by
 * `bufferDays`, widened evenly on both sides to at least `minRangeDays`.
 */
export function getChartBounds(
  tasks: { startDate: IsoDate; endDate: IsoDate }[],
  { asOf, bufferDays = 5, minRangeDays = 30 }: ChartBoundsOptions
): { from: IsoDate; to: IsoDate } {
  if (tasks.length === 0) {
    return { from: addDaysIso(asOf, -minRangeDays), to: addDaysIso(asOf, minRangeDays) }
  }
  let min = tasks[0].startDate
  let max = tasks[0].endDate
  tasks.forEach((t) => {
    if (t.startDate < min) min = t.startDate
    if (t.endDate > max) max = t.endDate
  })
  let from = addDaysIso(min, -bufferDays)
  let to = addDaysIso(max, bufferDays)
  const span = daysBetween(from, to)
  if (span < minRangeDays) {
    const extra = Math.floor((minRangeDays - span) / 2)
    from = addDaysIso(from, -extra)
    to = addDaysIso(to, extra)
  }
  return { from, to }
}
