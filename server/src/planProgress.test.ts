import { describe, expect, it } from 'vitest'
import {
  buildPlanBaseline,
  chartDateRange,
  hasSchedules,
  planPercentage,
  planProgress,
  resolveSchedule,
  synthesizeBackfill,
  tasksFromRows,
} from './planProgress.js'
import type { ScheduledTask } from './planProgress.js'

function task(taskName: string, startDate: string | null, endDate: string | null, actualProgress = 0): ScheduledTask {
  return { taskName, startDate, endDate, actualProgress }
}

describe('planPercentage', () => {
  it('is linear between start and end', () => {
    expect(planPercentage('2024-01-01', '2024-01-11', '2023-12-31')).toBe(0)
    expect(planPercentage('2024-01-01', '2024-01-11', '2024-01-01')).toBe(0)
    expect(planPercentage('2024-01-01', '2024-01-11', '2024-01-06')).toBe(0.5)
    expect(planPercentage('2024-01-01', '2024-01-11', '2024-01-11')).toBe(1)
    expect(planPercentage('2024-01-01', '2024-01-11', '2024-02-01')).toBe(1)
  })

  it('treats a one-day task as due on its day', () => {
    expect(planPercentage('2024-01-05', '2024-01-05', '2024-01-05')).toBe(1)
  })
})

describe('planProgress', () => {
  const tasks: ScheduledTask[] = [
    { ...task('T1', '2024-01-01', '2024-01-11'), adjustedEndDate: '2024-01-21' },
    task('T2', '2024-01-06', '2024-01-16'),
    task('Unscheduled', null, null),
  ]

  it('averages scheduled tasks only', () => {
    expect(planProgress(tasks, '2024-01-06')).toBe(0.25)
    expect(planProgress([task('T', null, '2024-01-02')], '2024-01-06')).toBe(0)
  })

  it('reads adjusted dates when asked', () => {
    expect(planProgress([tasks[0]], '2024-01-06', { useAdjusted: true })).toBe(0.25)
  })

  it('swaps reversed schedules', () => {
    expect(resolveSchedule(task('T', '2024-01-10', '2024-01-01'), false)).toEqual({
      startDate: '2024-01-01',
      endDate: '2024-01-10',
    })
    expect(hasSchedules([task('T', null, null)])).toBe(false)
    expect(hasSchedules(tasks)).toBe(true)
  })
})

describe('buildPlanBaseline', () => {
  it('emits one project-level point per day', () => {
    const points = buildPlanBaseline([task('T1', '2024-01-01', '2024-01-03')], 'INITIAL', {
      from: '2024-01-01',
      to: '2024-01-03',
    })
    expect(points).toEqual([
      { taskName: '*', date: '2024-01-01', plannedProgress: 0 },
      { taskName: '*', date: '2024-01-02', plannedProgress: 0.5 },
      { taskName: '*', date: '2024-01-03', plannedProgress: 1 },
    ])
  })

  it('follows adjusted dates for the current plan', () => {
    const delayed = { ...task('T1', '2024-01-01', '2024-01-03'), adjustedEndDate: '2024-01-05' }
    const range = { from: '2024-01-03', to: '2024-01-03' }
    expect(buildPlanBaseline([delayed], 'INITIAL', range)[0].plannedProgress).toBe(1)
    expect(buildPlanBaseline([delayed], 'CURRENT', range)[0].plannedProgress).toBe(0.5)
  })

  it('sizes the chart range from original schedules', () => {
    expect(chartDateRange([task('T1', '2024-03-01', '2024-03-11')], { asOf: '2024-03-05' })).toEqual({
      from: '2024-02-20',
      to: '2024-03-21',
    })
  })
})

describe('synthesizeBackfill', () => {
  it('ramps each task up to its current progress by asOf', () => {
    const rows = synthesizeBackfill(
      [task('T1', '2024-01-01', '2024-01-10', 0.6), task('T2', '2024-01-02', '2024-01-10', 0.2)],
      '2024-01-04'
    )
    expect(rows).toHaveLength(8)
    expect(rows.map((r) => r.recordDate)).toEqual([
      '2024-01-01',
      '2024-01-01',
      '2024-01-02',
      '2024-01-02',
      '2024-01-03',
      '2024-01-03',
      '2024-01-04',
      '2024-01-04',
    ])
    expect(rows[0].actualProgress).toBeCloseTo(0.15)
    expect(rows[1].actualProgress).toBeCloseTo(0.05)
    expect(rows[6].actualProgress).toBeCloseTo(0.6)
    expect(rows[7].actualProgress).toBeCloseTo(0.2)
    expect(rows.every((r) => r.actualProgress <= 0.6)).toBe(true)
  })

  it('produces a single asOf row per task when no task has started', () => {
    const rows = synthesizeBackfill([task('T1', null, null, 0)], '2024-01-04')
    expect(rows).toEqual([expect.objectContaining({ taskName: 'T1', recordDate: '2024-01-04', actualProgress: 0 })])
    expect(synthesizeBackfill([], '2024-01-04')).toEqual([])
  })
})

describe('tasksFromRows', () => {
  it('keeps the latest valid row of each task', () => {
    const tasks = tasksFromRows([
      { taskName: 'T1', recordDate: '2024-01-02', actualProgress: 0.4, startDate: '2024-01-01', endDate: '2024-01-09' },
      { taskName: 'T1', recordDate: '2024-01-01', actualProgress: 0.1 },
      { taskName: 'T2', actualProgress: 2 },
      { taskName: 'T3', actualProgress: 0.3 },
    ], '2024-01-03')
    expect(tasks.map((t) => [t.taskName, t.actualProgress, t.endDate])).toEqual([
      ['T1', 0.4, '2024-01-09'],
      ['T3', 0.3, null],
    ])
  })
})
