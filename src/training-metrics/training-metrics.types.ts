export type WeeklyBucket = {
  weekStart: Date
  distanceM: number
  runCount: number
}

export type IntensitySplit = {
  easy_pct: number
  hard_pct: number
}

// Key names are part of the wire contract with the narrative and report layers.
export type MetricsSnapshot = {
  lookback_days: number
  run_count: number
  total_distance_km: number
  weekly_distance: number[] // km per ISO week, ascending
  weekly_frequency: number[]
  acwr: number | null
  longest_run_pct: number | null
  rest_days_last_14: number
  back_to_back_runs_last_14: number
} & IntensitySplit
