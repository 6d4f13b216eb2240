import { afterEach, describe, expect, it, vi } from 'vitest'
import { ApiError, correctTaskSchedule, dailyUpdate, getHistory, getPlan } from './client.js'

function jsonResponse(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } })
}

describe('burnup client', () => {
  afterEach(() => {
    vi.unstubAllGlobals()
  })

  it('posts daily updates as JSON', async () => {
    const fetchMock = vi.fn().mockResolvedValue(jsonResponse(200, { written: 1 }))
    vi.stubGlobal('fetch', fetchMock)

    await dailyUpdate('Proj A', [{ taskName: 'T1', actualProgress: 0.2 }], '2024-01-03')

    expect(fetchMock).toHaveBeenCalledWith('http://localhost:3001/api/projects/Proj%20A/daily-update', {
      method: 'POST',
      body: JSON.stringify({ asOf: '2024-01-03', rows: [{ taskName: 'T1', actualProgress: 0.2 }] }),
      headers: { 'Content-Type': 'application/json' },
    })
  })

  it('builds query strings from the filters that are set', async () => {
    const fetchMock = vi.fn().mockImplementation(async () => jsonResponse(200, []))
    vi.stubGlobal('fetch', fetchMock)

    await getHistory('ProjA', { task: 'T1', to: '2024-01-02' })
    await getPlan('ProjA', 'CURRENT')

    expect(fetchMock.mock.calls.map((call) => call[0])).toEqual([
      'http://localhost:3001/api/projects/ProjA/history?task=T1&to=2024-01-02',
      'http://localhost:3001/api/projects/ProjA/plans/current',
    ])
  })

  it('raises the server message with its code', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn().mockResolvedValue(jsonResponse(404, { error: 'Project ProjA has no history yet', code: 'NOT_INITIALIZED' }))
    )
    const attempt = dailyUpdate('ProjA', [])
    await expect(attempt).rejects.toBeInstanceOf(ApiError)
    await expect(attempt).rejects.toMatchObject({
      message: 'Project ProjA has no history yet',
      status: 404,
      code: 'NOT_INITIALIZED',
    })
  })

  it('turns schedule refusals into outcomes', async () => {
    vi.stubGlobal(
      'fetch',
      vi
        .fn()
        .mockResolvedValueOnce(
          jsonResponse(404, { status: 'not_found', code: 'TASK_NOT_FOUND', error: 'No stored samples for ProjA / T9.' })
        )
        .mockResolvedValueOnce(jsonResponse(200, { status: 'updated', updatedRecords: 3, exitCode: 0 }))
        .mockResolvedValueOnce(jsonResponse(500, { error: 'Failed to correct task schedule' }))
    )

    expect(await correctTaskSchedule('ProjA', 'T9', '2024-01-01', '2024-01-02')).toEqual({
      status: 'not_found',
      code: 'TASK_NOT_FOUND',
      message: 'No stored samples for ProjA / T9.',
    })
    expect(await correctTaskSchedule('ProjA', 'T1', '2024-01-01', '2024-01-02')).toMatchObject({
      status: 'updated',
      updatedRecords: 3,
    })
    await expect(correctTaskSchedule('ProjA', 'T1', '2024-01-01', '2024-01-02')).rejects.toMatchObject({
      status: 500,
      code: null,
    })
  })
})
