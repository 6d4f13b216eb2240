import { describe, expect, it } from 'vitest'
import type { TaskAnchor } from '../../src/types.js'
import {
  LayoutDegradedWarning,
  annotationsOverlap,
  fanSlot,
  horizontalOffsets,
  layoutAnnotations,
  wrapText,
} from './annotationLayout.js'
import { addDaysIso } from './utils/dateUtils.js'

function anchor(taskName: string, anchorDate: string, overrides: Partial<TaskAnchor> = {}): TaskAnchor {
  return { taskName, anchorDate, displayText: `ProjA - ${taskName}`, showLabel: true, ...overrides }
}

function expectNoOverlaps(result: ReturnType<typeof layoutAnnotations>): void {
  const { annotations } = result
  for (let i = 0; i < annotations.length; i++) {
    for (let j = i + 1; j < annotations.length; j++) {
      expect(annotationsOverlap(annotations[i], annotations[j])).toBe(false)
    }
  }
}

describe('wrapText', () => {
  it('keeps short text on one line', () => {
    expect(wrapText('ProjA - T1')).toEqual(['ProjA - T1'])
  })

  it('breaks at spaces', () => {
    expect(wrapText('Alpha Project - Database migration')).toEqual(['Alpha Project -', 'Database migration'])
  })

  it('cuts words longer than a line', () => {
    expect(wrapText('abcdefghijklmnopqrstuvwxyz', 10)).toEqual(['abcdefghij', 'klmnopqrst', 'uvwxyz'])
    expect(wrapText('ab abcdefghijklmno', 10)).toEqual(['ab', 'abcdefghij', 'klmno'])
  })
})

describe('fan slots and offsets', () => {
  it('alternates above and below the baseline', () => {
    expect([0, 1, 2, 3, 4].map(fanSlot)).toEqual([0, 1, -1, 2, -2])
  })

  it('spreads offsets evenly up to the maximum spread', () => {
    expect(horizontalOffsets(1)).toEqual([0])
    expect(horizontalOffsets(2)).toEqual([-1, 1])
    expect(horizontalOffsets(3)).toEqual([-2, 0, 2])
    expect(horizontalOffsets(5)).toEqual([-3, -1.5, 0, 1.5, 3])
  })
})

describe('layoutAnnotations', () => {
  it('fans five consecutive days into one group', () => {
    const anchors = ['T1', 'T2', 'T3', 'T4', 'T5'].map((name, i) => anchor(name, addDaysIso('2024-03-01', i)))
    const result = layoutAnnotations(anchors)

    expect(result.origin).toBe('2024-03-01')
    expect(result.groupCount).toBe(1)
    expect(result.iterations).toBe(0)
    expect(result.warning).toBeNull()
    expect(result.annotations.map((a) => a.y)).toEqual([0, 1, -1, 2, -2])
    expect(result.annotations.map((a) => a.x)).toEqual([-3, -0.5, 2, 4.5, 7])
    expect(result.annotations[3].connectorTarget).toEqual({ date: '2024-03-04', x: 3, y: 0 })
    expect(result.annotations[0].width).toBe(4)
  })

  it('chains anchors within the window and splits beyond it', () => {
    expect(layoutAnnotations([anchor('A', '2024-03-01'), anchor('B', '2024-03-04')]).groupCount).toBe(1)
    expect(layoutAnnotations([anchor('A', '2024-03-01'), anchor('B', '2024-03-08')]).groupCount).toBe(2)
    expect(
      layoutAnnotations([anchor('A', '2024-03-01'), anchor('B', '2024-03-04'), anchor('C', '2024-03-08')]).groupCount
    ).toBe(1)
    expect(layoutAnnotations([anchor('A', '2024-03-01'), anchor('B', '2024-03-06')]).groupCount).toBe(1)
    expect(layoutAnnotations([anchor('A', '2024-03-01'), anchor('B', '2024-03-06')], { windowDays: 4 }).groupCount).toBe(2)
  })

  it('does not depend on input order', () => {
    const anchors = [
      anchor('Design', '2024-03-02'),
      anchor('Build', '2024-03-02'),
      anchor('Test', '2024-03-05'),
      anchor('Launch', '2024-03-20'),
      anchor('Docs', '2024-03-18'),
    ]
    const shuffled = [anchors[3], anchors[0], anchors[4], anchors[2], anchors[1]]
    expect(JSON.stringify(layoutAnnotations(shuffled))).toBe(JSON.stringify(layoutAnnotations(anchors)))
    expect(layoutAnnotations(anchors).annotations.map((a) => a.taskName)).toEqual([
      'Build',
      'Design',
      'Test',
      'Docs',
      'Launch',
    ])
  })

  it('skips hidden labels and anchors outside the range', () => {
    const result = layoutAnnotations(
      [
        anchor('T1', '2024-03-01'),
        anchor('T2', '2024-03-02', { showLabel: false }),
        anchor('T3', '2024-03-10'),
        anchor('T4', '2024-04-01'),
      ],
      { range: { from: '2024-03-01', to: '2024-03-31' } }
    )
    expect(result.annotations.map((a) => a.taskName)).toEqual(['T1', 'T3'])
    expect(result.groupCount).toBe(2)
  })

  it('returns an empty layout when nothing is visible', () => {
    expect(layoutAnnotations([anchor('T1', '2024-03-01', { showLabel: false })])).toEqual({
      origin: null,
      annotations: [],
      groupCount: 0,
      iterations: 0,
      warning: null,
    })
  })

  it('lifts the later of two colliding labels from different groups', () => {
    const text = 'Alpha Project - Database migration'
    const result = layoutAnnotations([
      anchor('A', '2024-03-01', { displayText: text }),
      anchor('B', '2024-03-07', { displayText: text }),
    ])
    expect(result.groupCount).toBe(2)
    expect(result.iterations).toBe(1)
    expect(result.annotations.map((a) => [a.taskName, a.x, a.y])).toEqual([
      ['A', 0, 0],
      ['B', 6, 1],
    ])
    expect(result.annotations[0].lines).toEqual(['Alpha Project -', 'Database migration'])
    expect(result.annotations[0].width).toBeCloseTo(7.2)
    expectNoOverlaps(result)
  })

  it('resolves collisions between neighbouring fans', () => {
    const anchors = [1, 2, 3, 9, 10, 11].map((day) =>
      anchor(`Task ${day}`, `2024-05-${String(day).padStart(2, '0')}`, { displayText: `Proj - Task ${day}` })
    )
    const result = layoutAnnotations(anchors, { charWidthDays: 0.7 })
    expect(result.groupCount).toBe(2)
    expect(result.warning).toBeNull()
    expect(result.iterations).toBe(5)
    expect(result.annotations.map((a) => a.y)).toEqual([0, 1, -1, 2, 3, -2])
    expectNoOverlaps(result)
  })

  it('stacks wide labels until they clear each other', () => {
    const anchors = [0, 1, 2].map((i) => anchor(`T${i}`, addDaysIso('2024-01-01', 6 * i), { displayText: 'x'.repeat(120) }))
    const result = layoutAnnotations(anchors, { maxLineLength: 200 })
    expect(result.annotations.map((a) => a.y)).toEqual([0, 1, 2])
    expect(result.iterations).toBe(3)
    expect(result.warning).toBeNull()
  })

  it('gives up after three moves per label and reports what still overlaps', () => {
    const anchors = Array.from({ length: 8 }, (_, i) =>
      anchor(`T${i}`, addDaysIso('2024-01-01', 6 * i), { displayText: 'x'.repeat(120) })
    )
    const result = layoutAnnotations(anchors, { maxLineLength: 200 })
    expect(result.iterations).toBe(24)
    expect(result.warning).toBeInstanceOf(LayoutDegradedWarning)
    expect(result.warning?.code).toBe('LAYOUT_DEGRADED')
    expect(result.warning?.iterations).toBe(24)
    expect(result.warning?.unresolved).toContainEqual(['T5', 'T6'])
    expect(result.annotations).toHaveLength(8)
  })
})
