import type { PlanKind, PlanPoint } from '../../src/types.js'
import type { Queryable } from './db.js'
import { PlanAlreadySetError } from './errors.js'
import type { ParsedPlanPoint } from './rows.js'

export interface PlanPointRow {
  project_name: string
  task_name: string
  plan_kind: PlanKind
  plan_date: string
  planned_progress: number
}

function rowToPlanPoint(row: PlanPointRow): PlanPoint {
  return {
    projectName: row.project_name,
    taskName: row.task_name,
    planKind: row.plan_kind,
    date: row.plan_date,
    plannedProgress: Number(row.planned_progress),
  }
}

/** INITIAL is the frozen baseline; CURRENT is the latest forecast and is replaced wholesale. */
export class PlanSnapshotStore {
  constructor(private readonly db: Queryable) {}

  async hasPlan(projectName: string, planKind: PlanKind): Promise<boolean> {
    const res = await this.db.query(
      'SELECT 1 FROM plan_points WHERE project_name = $1 AND plan_kind = $2 LIMIT 1',
      [projectName, planKind]
    )
    return res.rows.length > 0
  }

  /** Call inside a transaction. */
  async writeInitialPlan(projectName: string, points: ParsedPlanPoint[]): Promise<number> {
    if (await this.hasPlan(projectName, 'INITIAL')) throw new PlanAlreadySetError(projectName)
    return this.insertPoints(projectName, 'INITIAL', points)
  }

  /** Call inside a transaction, so stale forecast points never outlive the delete. */
  async replaceCurrentPlan(projectName: string, points: ParsedPlanPoint[]): Promise<number> {
    await this.db.query('DELETE FROM plan_points WHERE project_name = $1 AND plan_kind = $2', [
      projectName,
      'CURRENT',
    ])
    return this.insertPoints(projectName, 'CURRENT', points)
  }

  async readPlan(projectName: string, planKind: PlanKind): Promise<PlanPoint[]> {
    const res = await this.db.query<PlanPointRow>(
      `SELECT project_name, task_name, plan_kind, plan_date, planned_progress
       FROM plan_points
       WHERE project_name = $1 AND plan_kind = $2
       ORDER BY plan_date, task_name`,
      [projectName, planKind]
    )
    return res.rows.map(rowToPlanPoint)
  }

  private async insertPoints(projectName: string, planKind: PlanKind, points: ParsedPlanPoint[]): Promise<number> {
    for (const point of points) {
      await this.db.query(
        `INSERT INTO plan_points (project_name, task_name, plan_kind, plan_date, planned_progress)
         VALUES ($1, $2, $3, $4, $5)`,
        [projectName, point.taskName, planKind, point.date, point.plannedProgress]
      )
    }
    return points.length
  }
}
