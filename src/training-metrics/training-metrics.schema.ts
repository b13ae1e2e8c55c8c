import { z } from 'zod'

const nonNegative = z.number().finite().nonnegative()
const count = z.number().int().nonnegative()

export const metricsSnapshotSchema = z.object({
  lookback_days: z.number().int().positive(),
  run_count: count,
  total_distance_km: nonNegative,
  weekly_distance: z.array(nonNegative),
  weekly_frequency: z.array(count),
  acwr: nonNegative.nullable(),
  longest_run_pct: nonNegative.max(1).nullable(),
  rest_days_last_14: count.max(14),
  back_to_back_runs_last_14: count.max(13),
  easy_pct: nonNegative.max(100),
  hard_pct: nonNegative.max(100),
})
