import type { MetricInput, RiskInputs } from './risk-flags.types'

export type MetricsMapping = Record<string, unknown>

export const isMetricsMapping = (value: unknown): value is MetricsMapping =>
  typeof value === 'object' && value !== null && !Array.isArray(value)

const isNonNegativeNumber = (v: unknown): v is number => typeof v === 'number' && Number.isFinite(v) && v >= 0

const isCount = (v: unknown): v is number => isNonNegativeNumber(v) && Number.isInteger(v)

const isDistanceList = (v: unknown): v is number[] => Array.isArray(v) && v.every(isNonNegativeNumber)

const readMetric = <T>(metrics: MetricsMapping, key: string, guard: (v: unknown) => v is T): MetricInput<T> => {
  const raw = metrics[key]
  if (raw === undefined || raw === null) return { status: 'missing' }
  return guard(raw) ? { status: 'present', value: raw } : { status: 'invalid', raw }
}

/**
 * Reads the untyped metrics mapping into per-metric missing/invalid/present
 * states. Keys the rules do not use are ignored.
 */
export function readRiskInputs(metrics: MetricsMapping): RiskInputs {
  return {
    acwr: readMetric(metrics, 'acwr', isNonNegativeNumber),
    weekly_distance: readMetric(metrics, 'weekly_distance', isDistanceList),
    longest_run_pct: readMetric(metrics, 'longest_run_pct', isNonNegativeNumber),
    easy_pct: readMetric(metrics, 'easy_pct', isNonNegativeNumber),
    hard_pct: readMetric(metrics, 'hard_pct', isNonNegativeNumber),
    rest_days_last_14: readMetric(metrics, 'rest_days_last_14', isCount),
    back_to_back_runs_last_14: readMetric(metrics, 'back_to_back_runs_last_14', isCount),
  }
}
