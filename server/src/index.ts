import express from 'express'
import cors from 'cors'
import type pg from 'pg'
import { z } from 'zod'
import type { PlanKind } from '../../src/types.js'
import { layoutAnnotations } from './annotationLayout.js'
import { BurnupError, ValidationError } from './errors.js'
import type { HistoryProtectionCoordinator } from './historyCoordinator.js'
import { buildPlanBaseline, chartDateRange, hasSchedules, synthesizeBackfill, tasksFromRows } from './planProgress.js'
import { isoDateSchema } from './rows.js'
import { buildTaskAnchors } from './taskAnchors.js'
import { applyTaskFilter, taskFilterSchema } from './taskFilter.js'
import { correctTaskSchedule, SCHEDULE_EXIT_CODES } from './taskSchedule.js'
import { today as systemToday } from './utils/dateUtils.js'

export interface AppDeps {
  pool: pg.Pool
  coordinator: HistoryProtectionCoordinator
  annotationWindowDays?: number
  /** Default `asOf` when a request names none. */
  today?: () => string
}

const initializeBody = taskFilterSchema.extend({
  asOf: isoDateSchema.optional(),
  rows: z.array(z.unknown()).default([]),
  synthesize: z.boolean().default(false),
})

const dailyUpdateBody = taskFilterSchema.extend({
  asOf: isoDateSchema.optional(),
  rows: z.array(z.unknown()).default([]),
})

const planBody = z.object({ points: z.array(z.unknown()) })

const scheduleBody = z.object({ startDate: z.string(), endDate: z.string() })

const historyQuery = z.object({
  task: z.string().min(1).optional(),
  from: isoDateSchema.optional(),
  to: isoDateSchema.optional(),
})

const annotationQuery = z.object({
  from: isoDateSchema.optional(),
  to: isoDateSchema.optional(),
  windowDays: z.coerce.number().int().min(0).optional(),
})

const planKindParam = z
  .string()
  .transform((kind) => kind.toUpperCase())
  .pipe(z.enum(['INITIAL', 'CURRENT']))

const ERROR_STATUS: Record<BurnupError['code'], number> = {
  VALIDATION_ERROR: 400,
  NOT_INITIALIZED: 404,
  ALREADY_INITIALIZED: 409,
  HISTORY_VIOLATION: 409,
  IMMUTABLE_HISTORY: 409,
  PLAN_ALREADY_SET: 409,
}

function badRequest(res: express.Response, error: z.ZodError) {
  const message = error.issues.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`).join('; ')
  return res.status(400).json({ error: message, code: 'VALIDATION_ERROR' })
}

function sendError(res: express.Response, err: unknown, fallback: string) {
  if (err instanceof BurnupError) {
    const issues = err instanceof ValidationError ? err.issues : undefined
    return res.status(ERROR_STATUS[err.code]).json({ error: err.message, code: err.code, details: err.details, issues })
  }
  console.error('[burnup]', err)
  return res.status(500).json({ error: fallback })
}

export function createApp({ pool, coordinator, annotationWindowDays = 5, today = systemToday }: AppDeps) {
  const app = express()
  app.use(cors())
  app.use(express.json({ limit: '5mb' }))
  app.use('/api', (_req, res, next) => {
    res.set('Cache-Control', 'no-store')
    next()
  })

  app.post('/api/projects/:project/initialize', async (req, res) => {
    const body = initializeBody.safeParse(req.body)
    if (!body.success) return badRequest(res, body.error)
    try {
      const { project } = req.params
      const { year, from, to } = body.data
      const asOf = body.data.asOf ?? today()
      const selected = applyTaskFilter(project, body.data.rows, { year, from, to })
      const tasks = tasksFromRows(selected, asOf)
      const rows = body.data.synthesize ? synthesizeBackfill(tasks, asOf) : selected
      let initialPlan: unknown[] | undefined
      let currentPlan: unknown[] | undefined
      if (hasSchedules(tasks)) {
        const range = chartDateRange(tasks, { asOf })
        initialPlan = buildPlanBaseline(tasks, 'INITIAL', range)
        currentPlan = buildPlanBaseline(tasks, 'CURRENT', range)
      }
      const result = await coordinator.initialize(project, rows, { asOf, initialPlan, currentPlan })
      res.status(201).json(result)
    } catch (err) {
      return sendError(res, err, 'Failed to initialize project')
    }
  })

  app.post('/api/projects/:project/daily-update', async (req, res) => {
    const body = dailyUpdateBody.safeParse(req.body)
    if (!body.success) return badRequest(res, body.error)
    try {
      const { project } = req.params
      const { year, from, to } = body.data
      const asOf = body.data.asOf ?? today()
      const selected = applyTaskFilter(project, body.data.rows, { year, from, to })
      const tasks = tasksFromRows(selected, asOf)
      const currentPlan = hasSchedules(tasks)
        ? buildPlanBaseline(tasks, 'CURRENT', chartDateRange(tasks, { asOf }))
        : undefined
      const report = await coordinator.dailyUpdate(project, selected, { asOf, currentPlan })
      res.json(report)
    } catch (err) {
      return sendError(res, err, 'Failed to apply daily update')
    }
  })

  app.get('/api/projects/:project/status', async (req, res) => {
    const query = z.object({ asOf: isoDateSchema.optional() }).safeParse(req.query)
    if (!query.success) return badRequest(res, query.error)
    try {
      const status = await coordinator.protectionStatus(req.params.project, { asOf: query.data.asOf ?? today() })
      res.json(status)
    } catch (err) {
      return sendError(res, err, 'Failed to load protection status')
    }
  })

  app.get('/api/projects/:project/history', async (req, res) => {
    const query = historyQuery.safeParse(req.query)
    if (!query.success) return badRequest(res, query.error)
    try {
      const records = await coordinator.history().listRange({
        projectName: req.params.project,
        taskName: query.data.task,
        from: query.data.from,
        to: query.data.to,
      })
      res.json(records)
    } catch (err) {
      return sendError(res, err, 'Failed to load history')
    }
  })

  app.get('/api/projects/:project/actual', async (req, res) => {
    const query = z.object({ to: isoDateSchema.optional() }).safeParse(req.query)
    if (!query.success) return badRequest(res, query.error)
    try {
      const averages = await coordinator.history().dailyAverages(req.params.project, { to: query.data.to ?? today() })
      res.json(averages)
    } catch (err) {
      return sendError(res, err, 'Failed to load actual progress')
    }
  })

  app.get('/api/projects/:project/plans/:kind', async (req, res) => {
    const kind = planKindParam.safeParse(req.params.kind)
    if (!kind.success) return badRequest(res, kind.error)
    try {
      const planKind: PlanKind = kind.data
      res.json(await coordinator.readPlan(req.params.project, planKind))
    } catch (err) {
      return sendError(res, err, 'Failed to load plan')
    }
  })

  app.post('/api/projects/:project/plans/initial', async (req, res) => {
    const body = planBody.safeParse(req.body)
    if (!body.success) return badRequest(res, body.error)
    try {
      const points = await coordinator.writeInitialPlan(req.params.project, body.data.points)
      res.status(201).json({ points })
    } catch (err) {
      return sendError(res, err, 'Failed to write initial plan')
    }
  })

  app.put('/api/projects/:project/plans/current', async (req, res) => {
    const body = planBody.safeParse(req.body)
    if (!body.success) return badRequest(res, body.error)
    try {
      const points = await coordinator.replaceCurrentPlan(req.params.project, body.data.points)
      res.json({ points })
    } catch (err) {
      return sendError(res, err, 'Failed to replace current plan')
    }
  })

  app.get('/api/projects/:project/annotations', async (req, res) => {
    const query = annotationQuery.safeParse(req.query)
    if (!query.success) return badRequest(res, query.error)
    try {
      const { project } = req.params
      const latest = await coordinator.history().latestPerTask(project)
      const layout = layoutAnnotations(buildTaskAnchors(project, latest), {
        windowDays: query.data.windowDays ?? annotationWindowDays,
        range: { from: query.data.from, to: query.data.to },
      })
      if (layout.warning) console.warn(`[burnup] ${project}: ${layout.warning.message}`)
      res.json(layout)
    } catch (err) {
      return sendError(res, err, 'Failed to lay out annotations')
    }
  })

  app.patch('/api/projects/:project/tasks/:task/schedule', async (req, res) => {
    const body = scheduleBody.safeParse(req.body)
    if (!body.success) return badRequest(res, body.error)
    try {
      const { project, task } = req.params
      const outcome = await correctTaskSchedule(pool, project, task, body.data.startDate, body.data.endDate)
      const exitCode = SCHEDULE_EXIT_CODES[outcome.status]
      if (outcome.status === 'updated') return res.json({ ...outcome, exitCode })
      res.status(outcome.status === 'not_found' ? 404 : 400).json({ ...outcome, error: outcome.message, exitCode })
    } catch (err) {
      return sendError(res, err, 'Failed to correct task schedule')
    }
  })

  return app
}
