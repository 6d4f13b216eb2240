import { z } from 'zod'
import { PROJECT_AGGREGATE_TASK } from '../../src/types.js'
import type { IsoDate, RowIssue } from '../../src/types.js'
import { isIsoDate } from './utils/dateUtils.js'

export const isoDateSchema = z.string().refine(isIsoDate, { message: 'expected a YYYY-MM-DD date' })

/** One ingested task row. Only the task, its progress and its record date drive history writes. */
export const progressRowSchema = z.object({
  projectName: z.string().trim().min(1).optional(),
  taskName: z.string().trim().min(1, 'task name is required'),
  recordDate: isoDateSchema.optional(),
  actualProgress: z.number().finite().min(0, 'progress below 0').max(1, 'progress above 1'),
  startDate: isoDateSchema.nullish(),
  endDate: isoDateSchema.nullish(),
  adjustedStartDate: isoDateSchema.nullish(),
  adjustedEndDate: isoDateSchema.nullish(),
  assignee: z.string().nullish(),
  status: z.string().nullish(),
  showLabel: z.boolean().default(true),
})

export type ProgressRowInput = z.input<typeof progressRowSchema>
export type ProgressRow = z.output<typeof progressRowSchema>

export const planPointSchema = z.object({
  taskName: z.string().trim().min(1).default(PROJECT_AGGREGATE_TASK),
  date: isoDateSchema,
  plannedProgress: z.number().finite().min(0).max(1),
})

export type PlanPointInput = z.input<typeof planPointSchema>
export type ParsedPlanPoint = z.output<typeof planPointSchema>

export interface ParsedRow {
  index: number
  row: ProgressRow
}

function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || 'row'}: ${issue.message}`).join('; ')
}

function taskNameOf(raw: unknown): string | null {
  if (typeof raw === 'object' && raw !== null && 'taskName' in raw && typeof raw.taskName === 'string') {
    return raw.taskName
  }
  return null
}

/** Parses each row on its own; bad rows become issues, good rows keep their batch index. */
export function parseProgressRows(
  projectName: string,
  rows: unknown[]
): { parsed: ParsedRow[]; issues: RowIssue[] } {
  const parsed: ParsedRow[] = []
  const issues: RowIssue[] = []
  rows.forEach((raw, index) => {
    const result = progressRowSchema.safeParse(raw)
    if (!result.success) {
      issues.push({ index, taskName: taskNameOf(raw), message: describeIssues(result.error) })
      return
    }
    const row = result.data
    if (row.projectName !== undefined && row.projectName !== projectName) {
      issues.push({
        index,
        taskName: row.taskName,
        message: `row belongs to project ${row.projectName}, not ${projectName}`,
      })
      return
    }
    parsed.push({ index, row })
  })
  return { parsed, issues }
}

/** Extra checks for a historical batch: every row dated, none after `asOf`, keys unique. */
export function checkHistoricalBatch(parsed: ParsedRow[], asOf: IsoDate): RowIssue[] {
  const issues: RowIssue[] = []
  const seen = new Set<string>()
  for (const { index, row } of parsed) {
    if (row.recordDate === undefined) {
      issues.push({ index, taskName: row.taskName, message: 'recordDate is required' })
      continue
    }
    if (row.recordDate > asOf) {
      issues.push({ index, taskName: row.taskName, message: `recordDate ${row.recordDate} is after ${asOf}` })
      continue
    }
    const key = `${row.taskName}\u0000${row.recordDate}`
    if (seen.has(key)) {
      issues.push({ index, taskName: row.taskName, message: `duplicate sample for ${row.recordDate}` })
      continue
    }
    seen.add(key)
  }
  return issues
}

export function parsePlanPoints(points: unknown[]): { parsed: ParsedPlanPoint[]; issues: RowIssue[] } {
  const parsed: ParsedPlanPoint[] = []
  const issues: RowIssue[] = []
  const seen = new Set<string>()
  points.forEach((raw, index) => {
    const result = planPointSchema.safeParse(raw)
    if (!result.success) {
      issues.push({ index, taskName: taskNameOf(raw), message: describeIssues(result.error) })
      return
    }
    const key = `${result.data.taskName}\u0000${result.data.date}`
    if (seen.has(key)) {
      issues.push({ index, taskName: result.data.taskName, message: `duplicate plan point for ${result.data.date}` })
      return
    }
    seen.add(key)
    parsed.push(result.data)
  })
  return { parsed, issues }
}
