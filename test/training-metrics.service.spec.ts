import { InternalServerErrorException } from '@nestjs/common'
import { TrainingMetricsService, computeTrainingMetrics } from '../src/training-metrics/training-metrics.service'
import { metricsSnapshotSchema } from '../src/training-metrics/training-metrics.schema'
import type { Run } from '../src/types/run.types'

const run = (day: string, km: number, minutes: number): Run => ({
  startTime: new Date(`${day}T07:00:00.000Z`),
  distanceM: km * 1000,
  durationSec: minutes * 60,
  avgHr: null,
})

// Four ISO weeks starting Monday 2024-03-04
const history: Run[] = [
  run('2024-03-05', 8, 48),
  run('2024-03-09', 12, 78),
  run('2024-03-12', 6, 30),
  run('2024-03-16', 14, 91),
  run('2024-03-19', 8, 44),
  run('2024-03-20', 5, 30),
  run('2024-03-23', 16, 104),
  run('2024-03-26', 10, 50),
  run('2024-03-27', 6, 36),
  run('2024-03-30', 20, 130),
]

describe('TrainingMetricsService', () => {
  const service = new TrainingMetricsService()

  it('returns the empty snapshot for no runs', () => {
    const result = service.compute([])

    expect(metricsSnapshotSchema.safeParse(result).success).toBe(true)
    expect(result).toEqual({
      lookback_days: 28,
      run_count: 0,
      total_distance_km: 0,
      weekly_distance: [],
      weekly_frequency: [],
      acwr: null,
      longest_run_pct: null,
      rest_days_last_14: 14,
      back_to_back_runs_last_14: 0,
      easy_pct: 0,
      hard_pct: 0,
    })
  })

  it('computes the full snapshot over a four-week history', () => {
    expect(service.compute(history)).toEqual({
      lookback_days: 28,
      run_count: 10,
      total_distance_km: 105,
      weekly_distance: [20, 20, 29, 36],
      weekly_frequency: [2, 2, 3, 3],
      acwr: 1.98,
      longest_run_pct: 0.38,
      rest_days_last_14: 8,
      back_to_back_runs_last_14: 2,
      easy_pct: 77.1,
      hard_pct: 15.2,
    })
  })

  it('anchors the lookback window on the latest run', () => {
    const result = service.compute(history, { lookbackDays: 7 })

    expect(result.run_count).toBe(4)
    expect(result.total_distance_km).toBe(52)
    expect(result.weekly_distance).toEqual([16, 36])
    expect(result.weekly_frequency).toEqual([1, 3])
    expect(result.acwr).toBe(4)
    expect(result.rest_days_last_14).toBe(10)
    expect(result.back_to_back_runs_last_14).toBe(1)
  })

  it('handles a single run', () => {
    const result = computeTrainingMetrics([run('2024-03-30', 10, 50)])

    expect(result.acwr).toBe(4)
    expect(result.longest_run_pct).toBe(1)
    expect(result.rest_days_last_14).toBe(13)
    expect(result.easy_pct).toBe(70)
    expect(result.hard_pct).toBe(0)
  })

  it('is deterministic for the same history', () => {
    expect(computeTrainingMetrics(history)).toEqual(computeTrainingMetrics([...history]))
  })

  it('throws when the snapshot violates its schema', () => {
    expect(() => service.compute(history, { lookbackDays: 0 })).toThrow(InternalServerErrorException)
  })
})
