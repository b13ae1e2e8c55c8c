import { BadRequestException } from '@nestjs/common'
import { XMLParser, XMLValidator } from 'fast-xml-parser'
import type { ParsedTcx, TcxActivity, Trackpoint } from '../types/tcx.types'
import type { Run, RunBatch } from '../types/run.types'
import { toRunBatch } from '../utils/runs'
import { parseWallClock } from './run-timestamp'

type XmlNode = Record<string, unknown>

const isNode = (value: unknown): value is XmlNode =>
  typeof value === 'object' && value !== null && !Array.isArray(value)

const children = (node: unknown, key: string): XmlNode[] => {
  if (!isNode(node)) return []
  const value = node[key]
  if (value === undefined) return []
  return (Array.isArray(value) ? value : [value]).filter(isNode)
}

const parser = new XMLParser({
  ignoreAttributes: false,
  removeNSPrefix: true,
  parseTagValue: true,
  parseAttributeValue: true,
})

export const parseTcx = (xml: string): ParsedTcx => {
  const doc: unknown = parser.parse(xml)
  const root = children(doc, 'TrainingCenterDatabase')
  const activities = root.flatMap((db) => children(db, 'Activities')).flatMap((a) => children(a, 'Activity'))

  return {
    activities: activities.map((activity): TcxActivity => {
      const trackpoints: Trackpoint[] = []
      for (const lap of children(activity, 'Lap')) {
        for (const track of children(lap, 'Track')) {
          for (const tp of children(track, 'Trackpoint')) {
            const time = typeof tp.Time === 'string' ? tp.Time.trim() : null
            if (!time) continue
            const distance = tp.DistanceMeters
            const hrValue = isNode(tp.HeartRateBpm) ? tp.HeartRateBpm.Value : tp.HeartRateBpm

            const point: Trackpoint = { time }
            if (typeof distance === 'number') point.distanceMeters = distance
            if (typeof hrValue === 'number') point.heartRateBpm = Math.round(hrValue)
            trackpoints.push(point)
          }
        }
      }
      const sport = activity['@_Sport']
      return { sport: typeof sport === 'string' ? sport : null, trackpoints }
    }),
  }
}

export type TrackSummary = {
  startTime: Date | null
  durationSec: number
  distanceM: number
  avgHr: number | null
}

export const summarizeTrackpoints = (trackpoints: Trackpoint[]): TrackSummary => {
  const timed = trackpoints
    .map((tp) => ({ tp, ms: new Date(tp.time).getTime() }))
    .filter((t) => Number.isFinite(t.ms))
    .sort((a, b) => a.ms - b.ms)
  const heartRates = trackpoints.map((tp) => tp.heartRateBpm).filter((hr): hr is number => hr !== undefined)
  const distances = trackpoints.map((tp) => tp.distanceMeters).filter((d): d is number => d !== undefined)

  const first = timed[0]
  const last = timed[timed.length - 1]

  return {
    startTime: first ? parseWallClock(first.tp.time) : null,
    durationSec: first && last ? (last.ms - first.ms) / 1000 : 0,
    distanceM: distances.length > 1 ? Math.max(...distances) - Math.min(...distances) : distances[0] ?? 0,
    avgHr:
      heartRates.length > 0 ? Math.round(heartRates.reduce((sum, hr) => sum + hr, 0) / heartRates.length) : null,
  }
}

const isRunningActivity = (activity: TcxActivity): boolean =>
  activity.sport === null || activity.sport.toLowerCase() === 'running'

/**
 * One run per running activity in the file.
 */
export function parseTcxRuns(xml: string): RunBatch {
  if (XMLValidator.validate(xml) !== true) {
    throw new BadRequestException('Invalid TCX file')
  }

  const candidates: Run[] = []
  for (const activity of parseTcx(xml).activities.filter(isRunningActivity)) {
    const summary = summarizeTrackpoints(activity.trackpoints)
    if (!summary.startTime) continue
    candidates.push({
      startTime: summary.startTime,
      distanceM: summary.distanceM,
      durationSec: summary.durationSec,
      avgHr: summary.avgHr,
    })
  }
  return toRunBatch(candidates)
}
