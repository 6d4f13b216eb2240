import { describe, expect, it } from 'vitest'
import { addDaysIso, daysBetween, eachDayIso, getChartBounds, isIsoDate, isWithinRange } from './dateUtils.js'

describe('isIsoDate', () => {
  it('accepts real calendar dates', () => {
    expect(isIsoDate('2024-02-29')).toBe(true)
    expect(isIsoDate('2024-12-31')).toBe(true)
  })

  it('rejects impossible dates and other shapes', () => {
    expect(isIsoDate('2023-02-29')).toBe(false)
    expect(isIsoDate('2024-02-30')).toBe(false)
    expect(isIsoDate('2024-1-5')).toBe(false)
    expect(isIsoDate('05/01/2024')).toBe(false)
    expect(isIsoDate('')).toBe(false)
  })
})

describe('day arithmetic', () => {
  it('crosses month ends and leap days', () => {
    expect(addDaysIso('2024-02-28', 2)).toBe('2024-03-01')
    expect(addDaysIso('2024-03-01', -1)).toBe('2024-02-29')
    expect(daysBetween('2024-01-01', '2024-03-01')).toBe(60)
    expect(daysBetween('2024-03-01', '2024-01-01')).toBe(-60)
  })

  it('lists every day of an inclusive range', () => {
    expect(eachDayIso('2024-01-30', '2024-02-02')).toEqual(['2024-01-30', '2024-01-31', '2024-02-01', '2024-02-02'])
    expect(eachDayIso('2024-02-02', '2024-01-30')).toEqual([])
  })

  it('treats missing range ends as open', () => {
    expect(isWithinRange('2024-01-05', {})).toBe(true)
    expect(isWithinRange('2024-01-05', { from: '2024-01-05', to: '2024-01-05' })).toBe(true)
    expect(isWithinRange('2024-01-04', { from: '2024-01-05' })).toBe(false)
    expect(isWithinRange('2024-01-06', { to: '2024-01-05' })).toBe(false)
  })
})

describe('getChartBounds', () => {
  it('centres a window on asOf when there are no tasks', () => {
    expect(getChartBounds([], { asOf: '2024-03-05' })).toEqual({ from: '2024-02-04', to: '2024-04-04' })
  })

  it('pads the schedule span and widens short spans evenly', () => {
    const bounds = getChartBounds([{ startDate: '2024-03-01', endDate: '2024-03-11' }], { asOf: '2024-03-05' })
    expect(bounds).toEqual({ from: '2024-02-20', to: '2024-03-21' })
  })

  it('leaves long spans at their padded size', () => {
    const bounds = getChartBounds(
      [
        { startDate: '2024-01-10', endDate: '2024-02-10' },
        { startDate: '2024-02-01', endDate: '2024-04-01' },
      ],
      { asOf: '2024-03-01', bufferDays: 2 }
    )
    expect(bounds).toEqual({ from: '2024-01-08', to: '2024-04-03' })
  })
})
