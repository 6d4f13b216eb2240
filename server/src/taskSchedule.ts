import type pg from 'pg'
import type { ScheduleCorrection } from '../../src/types.js'
import { withTransaction } from './db.js'
import { ProgressHistoryStore } from './progressStore.js'
import { isIsoDate } from './utils/dateUtils.js'

/** Exit status calling tooling reports for each outcome. */
export const SCHEDULE_EXIT_CODES: Record<ScheduleCorrection['status'], number> = {
  updated: 0,
  invalid_date_range: 1,
  not_found: 2,
}

/**
 * Overwrites the stored start and end date of a task across all of its samples. Progress values
 * and backfill flags are left alone.
 */
export async function correctTaskSchedule(
  pool: pg.Pool,
  projectName: string,
  taskName: string,
  startDate: string,
  endDate: string
): Promise<ScheduleCorrection> {
  if (!isIsoDate(startDate) || !isIsoDate(endDate)) {
    return {
      status: 'invalid_date_range',
      code: 'INVALID_DATE_RANGE',
      message: `Invalid date '${isIsoDate(startDate) ? endDate : startDate}'. Expected format YYYY-MM-DD.`,
    }
  }
  if (startDate > endDate) {
    return {
      status: 'invalid_date_range',
      code: 'INVALID_DATE_RANGE',
      message: `Start date ${startDate} is after end date ${endDate}.`,
    }
  }
  const updatedRecords = await withTransaction(pool, (client) =>
    new ProgressHistoryStore(client).correctSchedule(projectName, taskName, startDate, endDate)
  )
  if (updatedRecords === 0) {
    return {
      status: 'not_found',
      code: 'TASK_NOT_FOUND',
      message: `No stored samples for ${projectName} / ${taskName}.`,
    }
  }
  console.log(`[burnup] schedule of ${projectName} / ${taskName} set to ${startDate}..${endDate} (${updatedRecords} samples)`)
  return { status: 'updated', updatedRecords }
}
