/**
 * One completed run. `startTime` carries the run's own wall clock in its UTC
 * fields: a run logged at 07:30 local time reads 07:30 through getUTCHours().
 */
export type Run = {
  readonly startTime: Date
  readonly distanceM: number
  readonly durationSec: number
  readonly avgHr: number | null
}

export type RunBatch = {
  runs: Run[]
  dropped: number
}
