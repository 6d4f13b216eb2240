import type {
  DailyAverage,
  DailyUpdateReport,
  InitializeResult,
  IsoDate,
  PlacedAnnotation,
  PlanKind,
  PlanPoint,
  ProgressRecord,
  ProtectionStatus,
  ScheduleCorrection,
} from './types.js'

const API = process.env.BURNUP_API_URL ?? 'http://localhost:3001/api'

export class ApiError extends Error {
  constructor(
    message: string,
    readonly status: number,
    readonly code: string | null
  ) {
    super(message)
    this.name = 'ApiError'
  }
}

async function request<T>(path: string, init?: RequestInit): Promise<T> {
  const res = await fetch(`${API}${path}`, {
    ...init,
    headers: { 'Content-Type': 'application/json', ...init?.headers },
  })
  if (!res.ok) {
    const err = (await res.json().catch(() => ({}))) as { error?: string; code?: string }
    throw new ApiError(err.error ?? `Request failed: ${res.status}`, res.status, err.code ?? null)
  }
  return res.json() as Promise<T>
}

function projectPath(projectName: string): string {
  return `/projects/${encodeURIComponent(projectName)}`
}

function queryString(params: Record<string, string | number | undefined>): string {
  const search = new URLSearchParams()
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) search.set(key, String(value))
  }
  const text = search.toString()
  return text ? `?${text}` : ''
}

export async function initializeProject(
  projectName: string,
  rows: unknown[],
  options: { asOf?: IsoDate; synthesize?: boolean; year?: number; from?: IsoDate; to?: IsoDate } = {}
): Promise<InitializeResult> {
  return request<InitializeResult>(`${projectPath(projectName)}/initialize`, {
    method: 'POST',
    body: JSON.stringify({ ...options, rows }),
  })
}

export async function dailyUpdate(projectName: string, rows: unknown[], asOf?: IsoDate): Promise<DailyUpdateReport> {
  return request<DailyUpdateReport>(`${projectPath(projectName)}/daily-update`, {
    method: 'POST',
    body: JSON.stringify({ asOf, rows }),
  })
}

export async function getProtectionStatus(projectName: string, asOf?: IsoDate): Promise<ProtectionStatus> {
  return request<ProtectionStatus>(`${projectPath(projectName)}/status${queryString({ asOf })}`)
}

export async function getHistory(
  projectName: string,
  filter: { task?: string; from?: IsoDate; to?: IsoDate } = {}
): Promise<ProgressRecord[]> {
  return request<ProgressRecord[]>(`${projectPath(projectName)}/history${queryString(filter)}`)
}

export async function getActualProgress(projectName: string, to?: IsoDate): Promise<DailyAverage[]> {
  return request<DailyAverage[]>(`${projectPath(projectName)}/actual${queryString({ to })}`)
}

export async function getPlan(projectName: string, kind: PlanKind): Promise<PlanPoint[]> {
  return request<PlanPoint[]>(`${projectPath(projectName)}/plans/${kind.toLowerCase()}`)
}

export async function replaceCurrentPlan(
  projectName: string,
  points: { taskName?: string; date: IsoDate; plannedProgress: number }[]
): Promise<number> {
  const res = await request<{ points: number }>(`${projectPath(projectName)}/plans/current`, {
    method: 'PUT',
    body: JSON.stringify({ points }),
  })
  return res.points
}

export interface AnnotationLayout {
  origin: IsoDate | null
  annotations: PlacedAnnotation[]
  groupCount: number
  iterations: number
  warning: { code: string; message: string; iterations: number; unresolved: [string, string][] } | null
}

export async function getAnnotations(
  projectName: string,
  options: { from?: IsoDate; to?: IsoDate; windowDays?: number } = {}
): Promise<AnnotationLayout> {
  return request<AnnotationLayout>(`${projectPath(projectName)}/annotations${queryString(options)}`)
}

/** Never throws for the two expected refusals; they come back as their own outcomes. */
export async function correctTaskSchedule(
  projectName: string,
  taskName: string,
  startDate: IsoDate,
  endDate: IsoDate
): Promise<ScheduleCorrection> {
  try {
    return await request<ScheduleCorrection>(
      `${projectPath(projectName)}/tasks/${encodeURIComponent(taskName)}/schedule`,
      { method: 'PATCH', body: JSON.stringify({ startDate, endDate }) }
    )
  } catch (err) {
    if (err instanceof ApiError && err.code === 'TASK_NOT_FOUND') {
      return { status: 'not_found', code: 'TASK_NOT_FOUND', message: err.message }
    }
    if (err instanceof ApiError && err.code === 'INVALID_DATE_RANGE') {
      return { status: 'invalid_date_range', code: 'INVALID_DATE_RANGE', message: err.message }
    }
    throw err
  }
}
