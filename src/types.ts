/** Calendar date, `YYYY-MM-DD`. */
export type IsoDate = string

export type WriteMode = 'INITIAL' | 'DAILY'

export type PlanKind = 'INITIAL' | 'CURRENT'

/** Task name used for project-level plan baselines. */
export const PROJECT_AGGREGATE_TASK = '*'

export interface ProgressRecord {
  projectName: string
  taskName: string
  recordDate: IsoDate
  actualProgress: number // 0..1
  isBackfilled: boolean
  recordedAt: string // ISO timestamp of the write
  startDate: IsoDate | null
  endDate: IsoDate | null
  assignee: string | null
  status: string | null
  showLabel: boolean
}

export interface PlanPoint {
  projectName: string
  taskName: string
  planKind: PlanKind
  date: IsoDate
  plannedProgress: number // 0..1
}

export interface DailyAverage {
  date: IsoDate
  actualProgress: number
}

export interface RecentDay {
  date: IsoDate
  taskCount: number
  labeledCount: number
  isToday: boolean
}

export interface ProtectionStatus {
  projectName: string
  totalRecords: number
  backfilledCount: number
  dailyCount: number
  earliestDate: IsoDate | null
  latestDate: IsoDate | null
  recordDays: number
  hasTodayRecords: boolean
  violationAttempts: number
  hasViolationAttempts: boolean
  recentDays: RecentDay[]
}

export interface InitializeResult {
  projectName: string
  written: number
  earliestDate: IsoDate
  latestDate: IsoDate
  initialPlanPoints: number
  currentPlanPoints: number
}

export interface RowIssue {
  index: number
  taskName: string | null
  message: string
}

export interface HistoryViolation {
  projectName: string
  taskName: string
  date: IsoDate
  storedProgress: number | null
  /** Null when the whole update was refused rather than one sample. */
  attemptedProgress: number | null
  reason: string
}

export interface DailyUpdateReport {
  projectName: string
  asOf: IsoDate
  written: number
  unchanged: number
  ignored: number
  violations: HistoryViolation[]
  invalid: RowIssue[]
  currentPlanPoints: number
}

export interface TaskAnchor {
  taskName: string
  anchorDate: IsoDate
  displayText: string
  showLabel: boolean
}

export interface PlacedAnnotation {
  taskName: string
  anchorDate: IsoDate
  groupId: number
  x: number // days from the layout origin, label centre
  y: number // slot index, positive above the baseline
  horizontalOffset: number
  width: number // days
  lines: string[]
  connectorTarget: { date: IsoDate; x: number; y: 0 }
}

export type ScheduleCorrection =
  | { status: 'updated'; updatedRecords: number }
  | { status: 'invalid_date_range'; code: 'INVALID_DATE_RANGE'; message: string }
  | { status: 'not_found'; code: 'TASK_NOT_FOUND'; message: string }
