import type { Run, RunBatch } from '../types/run.types'

export const paceSecPerKm = (run: Run): number => {
  const km = run.distanceM / 1000
  if (km <= 0) return Number.POSITIVE_INFINITY
  return run.durationSec / km
}

export const isValidRun = (run: Run): boolean =>
  Number.isFinite(run.startTime.getTime()) &&
  Number.isFinite(run.distanceM) &&
  Number.isFinite(run.durationSec) &&
  run.distanceM > 0 &&
  run.durationSec > 0

/**
 * Drops runs that are not valid training data points and orders the rest by
 * start time. The input array is left untouched.
 */
export const toRunBatch = (candidates: readonly Run[]): RunBatch => {
  const runs = candidates
    .filter(isValidRun)
    .sort((a, b) => a.startTime.getTime() - b.startTime.getTime())
  return { runs, dropped: candidates.length - runs.length }
}
