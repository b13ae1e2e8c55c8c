import { BadRequestException } from '@nestjs/common'
import { z } from 'zod'
import type { Run, RunBatch } from '../types/run.types'
import { toRunBatch } from '../utils/runs'

// fit-file-parser ships CommonJS without typings; its output is narrowed with zod below.
const fitFileParser = require('fit-file-parser')

type FitParserOptions = {
  force: boolean
  speedUnit: string
  lengthUnit: string
  elapsedRecordField: boolean
  mode: 'list' | 'cascade' | 'both'
}

type FitParserInstance = {
  parse: (content: Buffer, callback: (error: unknown, data: unknown) => void) => void
}

const FitParser: new (options: FitParserOptions) => FitParserInstance = fitFileParser.default ?? fitFileParser

const fitTimestamp = z.union([z.date(), z.string(), z.number()]).transform((v) => new Date(v))

const fitSessionSchema = z.object({
  sport: z.unknown().optional(),
  start_time: fitTimestamp.nullish(),
  timestamp: fitTimestamp.nullish(),
  total_distance: z.number().nullish(),
  total_timer_time: z.number().nullish(),
  total_elapsed_time: z.number().nullish(),
  avg_heart_rate: z.number().nullish(),
})

const fitActivitySchema = z.object({
  timestamp: fitTimestamp.nullish(),
  total_timer_time: z.number().nullish(),
  total_distance: z.number().nullish(),
})

const fitDataSchema = z.object({
  sessions: z.array(fitSessionSchema).optional(),
  activity: z.union([fitActivitySchema, z.array(fitActivitySchema)]).optional(),
})

type FitData = z.infer<typeof fitDataSchema>

const RUNNING_SPORTS = new Set(['running', 'run'])

const isRunningSport = (sport: unknown): boolean =>
  sport === undefined || sport === null || RUNNING_SPORTS.has(String(sport).toLowerCase())

const validDate = (d: Date | null | undefined): Date | null => (d && Number.isFinite(d.getTime()) ? d : null)

const decodeFit = (content: Buffer): Promise<unknown> =>
  new Promise((resolve, reject) => {
    const parser = new FitParser({
      force: true,
      speedUnit: 'm/s',
      lengthUnit: 'm',
      elapsedRecordField: true,
      mode: 'list',
    })
    parser.parse(content, (error, data) => {
      if (error) {
        const message = error instanceof Error ? error.message : String(error)
        reject(new BadRequestException(`Failed to parse FIT file: ${message}`))
        return
      }
      resolve(data)
    })
  })

const runsFromSessions = (data: FitData): Run[] => {
  const runs: Run[] = []
  for (const s of data.sessions ?? []) {
    if (!isRunningSport(s.sport)) continue

    const startTime = validDate(s.start_time) ?? validDate(s.timestamp)
    const durationSec = s.total_timer_time ?? s.total_elapsed_time
    if (!startTime || s.total_distance == null || durationSec == null) continue

    runs.push({
      startTime,
      distanceM: s.total_distance,
      durationSec,
      avgHr: s.avg_heart_rate ?? null,
    })
  }
  return runs
}

// Activity messages rarely carry distance; used only when no session qualifies.
const runsFromActivity = (data: FitData): Run[] => {
  const activities = data.activity === undefined ? [] : Array.isArray(data.activity) ? data.activity : [data.activity]
  const runs: Run[] = []
  for (const a of activities) {
    const startTime = validDate(a.timestamp)
    if (!startTime || a.total_distance == null || a.total_timer_time == null) continue
    runs.push({ startTime, distanceM: a.total_distance, durationSec: a.total_timer_time, avgHr: null })
  }
  return runs
}

/**
 * Decodes a FIT activity file. FIT timestamps are UTC and are used as-is.
 */
export async function parseFitRuns(content: Buffer): Promise<RunBatch> {
  const parsed = fitDataSchema.safeParse(await decodeFit(content))
  if (!parsed.success) {
    throw new BadRequestException('Failed to parse FIT file: unexpected message layout')
  }

  const fromSessions = runsFromSessions(parsed.data)
  return toRunBatch(fromSessions.length > 0 ? fromSessions : runsFromActivity(parsed.data))
}
