import type { ProgressRecord, TaskAnchor } from '../../src/types.js'

export function annotationLabel(projectName: string, taskName: string): string {
  return `${projectName} - ${taskName}`
}

/**
 * One anchor per task from its latest sample. The label hangs off the task's due date, or off
 * the latest sample's date when no schedule was ever recorded.
 */
export function buildTaskAnchors(projectName: string, latestSamples: ProgressRecord[]): TaskAnchor[] {
  return latestSamples.map((record) => ({
    taskName: record.taskName,
    anchorDate: record.endDate ?? record.recordDate,
    displayText: annotationLabel(projectName, record.taskName),
    showLabel: record.showLabel,
  }))
}
