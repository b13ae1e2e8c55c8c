import type { Run } from '../types/run.types'
import {
  countBackToBackRunsLast14,
  countRestDaysLast14,
  filterLookback,
  getWeekStart,
  intensitySplitByPace,
  roundTo,
  weeklyBuckets,
} from './training-metrics.utils'

const run = (day: string, km: number, minutes: number): Run => ({
  startTime: new Date(`${day}T07:00:00.000Z`),
  distanceM: km * 1000,
  durationSec: minutes * 60,
  avgHr: null,
})

describe('TrainingMetricsUtils', () => {
  describe('roundTo', () => {
    it('rounds exact ties to the even digit', () => {
      expect(roundTo(0.125, 2)).toBe(0.12)
      expect(roundTo(0.375, 2)).toBe(0.38)
      expect(roundTo(64.25, 1)).toBe(64.2)
      expect(roundTo(27.75, 1)).toBe(27.8)
      expect(roundTo(2.5, 0)).toBe(2)
      expect(roundTo(3.5, 0)).toBe(4)
      expect(roundTo(30 * 0.15, 0)).toBe(4)
    })

    it('rounds non-ties to the nearest value', () => {
      expect(roundTo(1.005, 2)).toBe(1)
      expect(roundTo(1.98412, 2)).toBe(1.98)
      expect(roundTo(72.2222, 1)).toBe(72.2)
    })
  })

  describe('getWeekStart', () => {
    it('returns Monday 00:00 for a mid-week date', () => {
      expect(getWeekStart(new Date('2024-03-07T18:30:00.000Z')).toISOString()).toBe('2024-03-04T00:00:00.000Z')
    })

    it('maps Sunday to the preceding Monday', () => {
      expect(getWeekStart(new Date('2024-03-10T23:59:00.000Z')).toISOString()).toBe('2024-03-04T00:00:00.000Z')
    })
  })

  describe('filterLookback', () => {
    it('keeps runs exactly on the cutoff', () => {
      const runs = [run('2024-03-01', 5, 30), run('2024-03-02', 5, 30), run('2024-03-09', 5, 30)]
      expect(filterLookback(runs, 7).map((r) => r.startTime.toISOString().slice(0, 10))).toEqual([
        '2024-03-02',
        '2024-03-09',
      ])
    })

    it('returns an empty list for no runs', () => {
      expect(filterLookback([], 28)).toEqual([])
    })
  })

  describe('weeklyBuckets', () => {
    it('groups runs by ISO week in ascending order', () => {
      const buckets = weeklyBuckets([run('2024-03-05', 8, 48), run('2024-03-10', 12, 78), run('2024-03-11', 6, 30)])
      expect(buckets.map((b) => [b.weekStart.toISOString().slice(0, 10), b.distanceM, b.runCount])).toEqual([
        ['2024-03-04', 20000, 2],
        ['2024-03-11', 6000, 1],
      ])
    })
  })

  describe('rest days and back-to-back runs', () => {
    it('counts 14 rest days and no pairs for an empty history', () => {
      expect(countRestDaysLast14([])).toBe(14)
      expect(countBackToBackRunsLast14([])).toBe(0)
    })

    it('counts distinct run days only', () => {
      const runs = [run('2024-03-10', 5, 30), run('2024-03-10', 3, 20), run('2024-03-11', 5, 30)]
      expect(countRestDaysLast14(runs)).toBe(12)
      expect(countBackToBackRunsLast14(runs)).toBe(1)
    })

    it('ignores run days older than the 14-day window', () => {
      const runs = [run('2024-03-16', 5, 30), run('2024-03-17', 5, 30), run('2024-03-30', 5, 30)]
      // 03-17 is the first day of the window ending 03-30, 03-16 falls outside
      expect(countRestDaysLast14(runs)).toBe(12)
      expect(countBackToBackRunsLast14(runs)).toBe(0)
    })

    it('counts every adjacent pair in a streak', () => {
      const runs = ['2024-03-25', '2024-03-26', '2024-03-27', '2024-03-28'].map((d) => run(d, 5, 30))
      expect(countBackToBackRunsLast14(runs)).toBe(3)
    })
  })

  describe('intensitySplitByPace', () => {
    it('returns zeros for no runs', () => {
      expect(intensitySplitByPace([])).toEqual({ easy_pct: 0, hard_pct: 0 })
    })

    it('falls back to 70/0 with fewer than three runs', () => {
      expect(intensitySplitByPace([run('2024-03-05', 8, 48), run('2024-03-06', 5, 25)])).toEqual({
        easy_pct: 70,
        hard_pct: 0,
      })
    })

    it('weights the split by distance', () => {
      const runs = [
        run('2024-03-23', 16, 104), // 6:30/km
        run('2024-03-26', 10, 50), // 5:00/km
        run('2024-03-27', 6, 36), // 6:00/km
        run('2024-03-30', 20, 130), // 6:30/km
      ]
      // hard cut 300 s/km, easy cut 390 s/km, the 6 km run is unclassified
      expect(intensitySplitByPace(runs)).toEqual({ easy_pct: 69.2, hard_pct: 19.2 })
    })

    it('counts a pace on both cuts as hard', () => {
      const runs = [run('2024-03-01', 5, 25), run('2024-03-02', 5, 25), run('2024-03-03', 5, 25)]
      expect(intensitySplitByPace(runs)).toEqual({ easy_pct: 0, hard_pct: 100 })
    })
  })
})
