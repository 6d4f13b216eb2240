import type { IsoDate, PlacedAnnotation, TaskAnchor } from '../../src/types.js'
import { daysBetween, isWithinRange } from './utils/dateUtils.js'

export interface LayoutOptions {
  /** Anchors at most this many days after the previous one share a fan group. */
  windowDays?: number
  range?: { from?: IsoDate; to?: IsoDate }
  charWidthDays?: number
  minLabelWidthDays?: number
  maxLineLength?: number
  maxHorizontalSpread?: number
}

const DEFAULTS = {
  windowDays: 5,
  charWidthDays: 0.4,
  minLabelWidthDays: 2,
  maxLineLength: 20,
  maxHorizontalSpread: 6,
}

/** Collision resolution ran out of moves; the placement is returned as it stood. */
export class LayoutDegradedWarning {
  readonly code = 'LAYOUT_DEGRADED'
  readonly message: string

  constructor(
    readonly iterations: number,
    readonly unresolved: [string, string][]
  ) {
    this.message = `Annotation layout stopped after ${iterations} moves with ${unresolved.length} overlapping label pair(s)`
  }
}

export interface LayoutResult {
  origin: IsoDate | null
  annotations: PlacedAnnotation[]
  groupCount: number
  iterations: number
  warning: LayoutDegradedWarning | null
}

interface Placement {
  anchor: TaskAnchor
  groupId: number
  day: number
  horizontalOffset: number
  y: number
  width: number
  lines: string[]
}

/** Breaks at spaces into lines of at most `maxLength`; words longer than that are cut. */
export function wrapText(text: string, maxLength = DEFAULTS.maxLineLength): string[] {
  if (text.length <= maxLength) return [text]
  const lines: string[] = []
  let current = ''
  for (const word of text.split(' ')) {
    const candidate = current ? `${current} ${word}` : word
    if (candidate.length <= maxLength) {
      current = candidate
      continue
    }
    if (current) lines.push(current)
    let rest = word
    while (rest.length > maxLength) {
      lines.push(rest.slice(0, maxLength))
      rest = rest.slice(maxLength)
    }
    current = rest
  }
  if (current) lines.push(current)
  return lines
}

function compareAnchors(a: TaskAnchor, b: TaskAnchor): number {
  if (a.anchorDate !== b.anchorDate) return a.anchorDate < b.anchorDate ? -1 : 1
  if (a.taskName !== b.taskName) return a.taskName < b.taskName ? -1 : 1
  if (a.displayText !== b.displayText) return a.displayText < b.displayText ? -1 : 1
  return 0
}

/** Chain clustering over anchors already sorted by date. */
export function groupByProximity(sorted: TaskAnchor[], windowDays = DEFAULTS.windowDays): TaskAnchor[][] {
  const groups: TaskAnchor[][] = []
  let previous: TaskAnchor | null = null
  for (const anchor of sorted) {
    const current = groups[groups.length - 1]
    if (previous && current && daysBetween(previous.anchorDate, anchor.anchorDate) <= windowDays) {
      current.push(anchor)
    } else {
      groups.push([anchor])
    }
    previous = anchor
  }
  return groups
}

/** 0, +1, -1, +2, -2, ... */
export function fanSlot(index: number): number {
  if (index === 0) return 0
  return index % 2 === 1 ? (index + 1) / 2 : -(index / 2)
}

export function horizontalOffsets(groupSize: number, maxSpread = DEFAULTS.maxHorizontalSpread): number[] {
  if (groupSize <= 1) return [0]
  const spread = Math.min(maxSpread, 2 * (groupSize - 1))
  return Array.from({ length: groupSize }, (_, i) => -spread / 2 + (spread * i) / (groupSize - 1))
}

function centre(p: Placement): number {
  return p.day + p.horizontalOffset
}

interface Box {
  x: number
  y: number
  width: number
}

function boxesOverlap(a: Box, b: Box): boolean {
  return Math.abs(a.x - b.x) < (a.width + b.width) / 2 && Math.abs(a.y - b.y) < 1
}

function overlaps(a: Placement, b: Placement): boolean {
  return boxesOverlap({ x: centre(a), y: a.y, width: a.width }, { x: centre(b), y: b.y, width: b.width })
}

function firstCollision(placements: Placement[]): [number, number] | null {
  for (let i = 0; i < placements.length; i++) {
    for (let j = i + 1; j < placements.length; j++) {
      if (overlaps(placements[i], placements[j])) return [i, j]
    }
  }
  return null
}

function allCollisions(placements: Placement[]): [string, string][] {
  const pairs: [string, string][] = []
  for (let i = 0; i < placements.length; i++) {
    for (let j = i + 1; j < placements.length; j++) {
      if (overlaps(placements[i], placements[j])) {
        pairs.push([placements[i].anchor.taskName, placements[j].anchor.taskName])
      }
    }
  }
  return pairs
}

/**
 * Places one label per visible anchor. The result depends only on the set of anchors, never
 * on their input order. Overlaps are resolved by pushing the later label of a colliding pair
 * one slot away from the baseline, at most `3 × anchors` times.
 */
export function layoutAnnotations(anchors: TaskAnchor[], options: LayoutOptions = {}): LayoutResult {
  const opts = {
    windowDays: options.windowDays ?? DEFAULTS.windowDays,
    range: options.range ?? {},
    charWidthDays: options.charWidthDays ?? DEFAULTS.charWidthDays,
    minLabelWidthDays: options.minLabelWidthDays ?? DEFAULTS.minLabelWidthDays,
    maxLineLength: options.maxLineLength ?? DEFAULTS.maxLineLength,
    maxHorizontalSpread: options.maxHorizontalSpread ?? DEFAULTS.maxHorizontalSpread,
  }
  const visible = anchors
    .filter((a) => a.showLabel && isWithinRange(a.anchorDate, opts.range))
    .sort(compareAnchors)
  if (visible.length === 0) {
    return { origin: null, annotations: [], groupCount: 0, iterations: 0, warning: null }
  }

  const origin = visible[0].anchorDate
  const groups = groupByProximity(visible, opts.windowDays)
  const placements: Placement[] = []
  groups.forEach((group, groupId) => {
    const offsets = horizontalOffsets(group.length, opts.maxHorizontalSpread)
    group.forEach((anchor, index) => {
      const lines = wrapText(anchor.displayText, opts.maxLineLength)
      const longest = Math.max(...lines.map((line) => line.length))
      placements.push({
        anchor,
        groupId,
        day: daysBetween(origin, anchor.anchorDate),
        horizontalOffset: offsets[index],
        y: fanSlot(index),
        width: Math.max(opts.minLabelWidthDays, longest * opts.charWidthDays),
        lines,
      })
    })
  })

  const cap = 3 * placements.length
  let iterations = 0
  let warning: LayoutDegradedWarning | null = null
  for (;;) {
    const pair = firstCollision(placements)
    if (!pair) break
    if (iterations >= cap) {
      warning = new LayoutDegradedWarning(iterations, allCollisions(placements))
      break
    }
    const later = placements[pair[1]]
    later.y = later.y >= 0 ? later.y + 1 : later.y - 1
    iterations++
  }

  const annotations = placements.map((p) => ({
    taskName: p.anchor.taskName,
    anchorDate: p.anchor.anchorDate,
    groupId: p.groupId,
    x: centre(p),
    y: p.y,
    horizontalOffset: p.horizontalOffset,
    width: p.width,
    lines: p.lines,
    connectorTarget: { date: p.anchor.anchorDate, x: p.day, y: 0 as const },
  }))
  return { origin, annotations, groupCount: groups.length, iterations, warning }
}

/** True when the two placed labels' boxes intersect; boxes are one slot tall. */
export function annotationsOverlap(a: PlacedAnnotation, b: PlacedAnnotation): boolean {
  return boxesOverlap(a, b)
}
