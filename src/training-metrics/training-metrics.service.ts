import { Injectable, InternalServerErrorException, Logger } from '@nestjs/common'
import type { Run } from '../types/run.types'
import type { MetricsSnapshot } from './training-metrics.types'
import { metricsSnapshotSchema } from './training-metrics.schema'
import {
  DAY_MS,
  countBackToBackRunsLast14,
  countRestDaysLast14,
  filterLookback,
  intensitySplitByPace,
  roundTo,
  sumDistanceM,
  weeklyBuckets,
} from './training-metrics.utils'

export const DEFAULT_LOOKBACK_DAYS = 28
const ACUTE_DAYS = 7
const CHRONIC_WEEKS = 4

/**
 * Folds an ascending run history into the flat metrics snapshot consumed by
 * the risk rules. The window is anchored on the latest run, never on "now",
 * so the same history always yields the same snapshot.
 */
export function computeTrainingMetrics(
  runs: readonly Run[],
  lookbackDays: number = DEFAULT_LOOKBACK_DAYS,
): MetricsSnapshot {
  const retained = filterLookback(runs, lookbackDays)
  const weeks = weeklyBuckets(retained)

  const last = retained[retained.length - 1]
  const acuteFrom = last ? last.startTime.getTime() - ACUTE_DAYS * DAY_MS : 0
  const acute = retained.filter((r) => r.startTime.getTime() >= acuteFrom)

  const dist7 = sumDistanceM(acute)
  const dist28 = sumDistanceM(retained)
  const chronicWeekly = dist28 / CHRONIC_WEEKS
  const longest = acute.reduce((max, r) => Math.max(max, r.distanceM), 0)

  return {
    lookback_days: lookbackDays,
    run_count: retained.length,
    total_distance_km: roundTo(dist28 / 1000, 2),
    weekly_distance: weeks.map((w) => roundTo(w.distanceM / 1000, 2)),
    weekly_frequency: weeks.map((w) => w.runCount),
    acwr: chronicWeekly > 0 ? roundTo(dist7 / chronicWeekly, 2) : null,
    longest_run_pct: dist7 > 0 ? roundTo(longest / dist7, 2) : null,
    rest_days_last_14: countRestDaysLast14(retained),
    back_to_back_runs_last_14: countBackToBackRunsLast14(retained),
    ...intensitySplitByPace(retained),
  }
}

@Injectable()
export class TrainingMetricsService {
  private readonly logger = new Logger(TrainingMetricsService.name)

  compute(runs: readonly Run[], opts?: { lookbackDays?: number }): MetricsSnapshot {
    const lookbackDays = opts?.lookbackDays ?? DEFAULT_LOOKBACK_DAYS
    const result = computeTrainingMetrics(runs, lookbackDays)

    const parsed = metricsSnapshotSchema.safeParse(result)
    if (!parsed.success) {
      throw new InternalServerErrorException(
        `MetricsSnapshot validation failed: ${JSON.stringify(parsed.error.format())}`,
      )
    }

    this.logger.debug(
      `metrics: runs=${parsed.data.run_count} lookback=${lookbackDays} acwr=${parsed.data.acwr ?? 'n/a'}`,
    )
    return parsed.data
  }
}
