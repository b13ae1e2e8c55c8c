import type { Run } from '../types/run.types'
import { paceSecPerKm } from '../utils/runs'
import type { IntensitySplit, WeeklyBucket } from './training-metrics.types'

export const DAY_MS = 24 * 60 * 60 * 1000

const RECENT_DAYS = 14
const HARD_PERCENTILE = 0.15
const EASY_PERCENTILE = 0.6
const MIN_RUNS_FOR_PACE_SPLIT = 3

const TIE_PROBE_DIGITS = 20

/**
 * Rounds half to even on the exact binary value. `toFixed` alone resolves
 * exact ties (0.125, 64.25) upward.
 */
export const roundTo = (value: number, decimals: number): number => {
  const rounded = Number(value.toFixed(decimals))
  const expanded = Math.abs(value).toFixed(decimals + TIE_PROBE_DIGITS)
  const cut = expanded.length - TIE_PROBE_DIGITS
  const isTie = expanded[cut] === '5' && /^0*$/.test(expanded.slice(cut + 1))
  if (!isTie) return rounded

  const kept = expanded.slice(0, cut).replace(/\.$/, '')
  const lastDigit = Number(kept[kept.length - 1])
  if (lastDigit % 2 === 1) return rounded
  return value < 0 ? -Number(kept) : Number(kept)
}

// Calendar day number on the run's own clock.
export const dayIndex = (d: Date): number => Math.floor(d.getTime() / DAY_MS)

/**
 * Start of the ISO week (Monday 00:00) containing `d`
 */
export const getWeekStart = (d: Date): Date => {
  const date = new Date(Date.UTC(d.getUTCFullYear(), d.getUTCMonth(), d.getUTCDate()))
  const day = date.getUTCDay() || 7 // Monday = 1, Sunday = 7
  date.setUTCDate(date.getUTCDate() - (day - 1))
  return date
}

export const sumDistanceM = (runs: readonly Run[]): number => runs.reduce((s, r) => s + r.distanceM, 0)

/**
 * Keeps runs that started no earlier than `days` before the last run.
 * Runs must already be in ascending start-time order.
 */
export const filterLookback = (runs: readonly Run[], days: number): Run[] => {
  const last = runs[runs.length - 1]
  if (!last) return []
  const cutoff = last.startTime.getTime() - days * DAY_MS
  return runs.filter((r) => r.startTime.getTime() >= cutoff)
}

export const weeklyBuckets = (runs: readonly Run[]): WeeklyBucket[] => {
  const byWeek = new Map<number, WeeklyBucket>()
  for (const r of runs) {
    const weekStart = getWeekStart(r.startTime)
    const key = weekStart.getTime()
    const bucket = byWeek.get(key) ?? { weekStart, distanceM: 0, runCount: 0 }
    bucket.distanceM += r.distanceM
    bucket.runCount += 1
    byWeek.set(key, bucket)
  }
  return [...byWeek.values()].sort((a, b) => a.weekStart.getTime() - b.weekStart.getTime())
}

// Distinct run days within the 14 days ending on the last run's day, ascending.
const recentRunDays = (runs: readonly Run[]): number[] => {
  const last = runs[runs.length - 1]
  if (!last) return []
  const lastDay = dayIndex(last.startTime)
  const days = new Set<number>()
  for (const r of runs) {
    const day = dayIndex(r.startTime)
    if (lastDay - day <= RECENT_DAYS - 1) days.add(day)
  }
  return [...days].sort((a, b) => a - b)
}

export const countRestDaysLast14 = (runs: readonly Run[]): number => {
  if (runs.length === 0) return RECENT_DAYS
  return RECENT_DAYS - recentRunDays(runs).length
}

export const countBackToBackRunsLast14 = (runs: readonly Run[]): number => {
  const days = recentRunDays(runs)
  let pairs = 0
  for (let i = 1; i < days.length; i++) {
    const prev = days[i - 1]
    const cur = days[i]
    if (prev !== undefined && cur !== undefined && cur - prev === 1) pairs += 1
  }
  return pairs
}

const percentileValue = (sorted: readonly number[], pct: number): number => {
  const idx = Math.max(0, Math.min(sorted.length - 1, roundTo((sorted.length - 1) * pct, 0)))
  return sorted[idx] ?? Number.NaN
}

/**
 * Distance-weighted easy/hard split against the runner's own pace
 * distribution: the fastest 15th percentile and quicker counts as hard, the
 * 60th percentile and slower as easy. Runs in between only add to the total.
 */
export const intensitySplitByPace = (runs: readonly Run[]): IntensitySplit => {
  if (runs.length === 0) return { easy_pct: 0, hard_pct: 0 }

  const paceRuns = runs
    .filter((r) => r.distanceM > 0)
    .map((r) => ({ pace: paceSecPerKm(r), distanceM: r.distanceM }))
  if (paceRuns.length < MIN_RUNS_FOR_PACE_SPLIT) {
    // not enough history to place a run within the runner's own range
    return { easy_pct: 70, hard_pct: 0 }
  }

  const paces = paceRuns.map((p) => p.pace).sort((a, b) => a - b) // lower = faster
  const hardCut = percentileValue(paces, HARD_PERCENTILE)
  const easyCut = percentileValue(paces, EASY_PERCENTILE)

  let hardM = 0
  let easyM = 0
  let totalM = 0
  for (const { pace, distanceM } of paceRuns) {
    totalM += distanceM
    if (pace <= hardCut) {
      hardM += distanceM
    } else if (pace >= easyCut) {
      easyM += distanceM
    }
  }

  if (totalM <= 0) return { easy_pct: 0, hard_pct: 0 }

  return {
    easy_pct: roundTo((easyM / totalM) * 100, 1),
    hard_pct: roundTo((hardM / totalM) * 100, 1),
  }
}
