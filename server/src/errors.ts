import type { HistoryViolation, IsoDate, RowIssue } from '../../src/types.js'

export type BurnupErrorCode =
  | 'VALIDATION_ERROR'
  | 'NOT_INITIALIZED'
  | 'ALREADY_INITIALIZED'
  | 'HISTORY_VIOLATION'
  | 'IMMUTABLE_HISTORY'
  | 'PLAN_ALREADY_SET'

export interface ErrorDetails {
  projectName?: string
  taskName?: string
  date?: IsoDate
  reason: string
}

export class BurnupError extends Error {
  constructor(
    readonly code: BurnupErrorCode,
    message: string,
    readonly details: ErrorDetails
  ) {
    super(message)
    this.name = new.target.name
  }
}

export class ValidationError extends BurnupError {
  constructor(
    message: string,
    readonly issues: RowIssue[],
    projectName?: string
  ) {
    super('VALIDATION_ERROR', message, { projectName, reason: message })
  }
}

export class NotInitializedError extends BurnupError {
  constructor(projectName: string) {
    super('NOT_INITIALIZED', `Project ${projectName} has no history yet; initialize it first`, {
      projectName,
      reason: 'not initialized',
    })
  }
}

export class AlreadyInitializedError extends BurnupError {
  constructor(projectName: string) {
    super('ALREADY_INITIALIZED', `Project ${projectName} already has history`, {
      projectName,
      reason: 'already initialized',
    })
  }
}

export class HistoryViolationError extends BurnupError {
  readonly violation: HistoryViolation

  constructor(violation: HistoryViolation, code: 'HISTORY_VIOLATION' | 'IMMUTABLE_HISTORY' = 'HISTORY_VIOLATION') {
    super(
      code,
      `${violation.projectName} / ${violation.taskName} @ ${violation.date}: ${violation.reason}`,
      {
        projectName: violation.projectName,
        taskName: violation.taskName,
        date: violation.date,
        reason: violation.reason,
      }
    )
    this.violation = violation
  }
}

/** Raised at the storage boundary when a stored past sample would change. */
export class ImmutableHistoryError extends HistoryViolationError {
  constructor(violation: HistoryViolation) {
    super(violation, 'IMMUTABLE_HISTORY')
  }
}

export class PlanAlreadySetError extends BurnupError {
  constructor(projectName: string) {
    super('PLAN_ALREADY_SET', `Initial plan for ${projectName} is already set`, {
      projectName,
      reason: 'initial plan is frozen',
    })
  }
}
