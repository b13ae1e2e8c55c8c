import { BadRequestException } from '@nestjs/common'
import { parse } from 'csv-parse'
import { z } from 'zod'
import type { Run, RunBatch } from '../types/run.types'
import { toRunBatch } from '../utils/runs'
import type { DistanceUnit } from './ingestion.types'
import { parseDurationSec, parseWallClock } from './run-timestamp'

const METERS_PER: Record<DistanceUnit, number> = { m: 1, km: 1000, mi: 1609.344 }

type ColumnMapping = { startTime: string; duration: string; avgHr: string }

// First match wins. Distance is resolved separately so the unit can be read off its name.
const CANDIDATES: readonly ColumnMapping[] = [
  { startTime: 'date', duration: 'time', avgHr: 'avg_hr' },
  { startTime: 'activity_date', duration: 'time', avgHr: 'average_heart_rate' },
  { startTime: 'start_time', duration: 'elapsed_time', avgHr: 'avg_hr' },
  { startTime: 'start_time', duration: 'time', avgHr: 'avg_hr' },
]

const recordsSchema = z.array(z.record(z.string()))

export const normalizeHeader = (col: string): string => col.trim().toLowerCase().replace(/[ -]/g, '_')

export const distanceUnitFor = (column: string, fallback: DistanceUnit): DistanceUnit => {
  if (column.endsWith('_km') || column.includes('kilometer')) return 'km'
  if (column.endsWith('_mi') || column.includes('mile')) return 'mi'
  if (column.endsWith('_m') || column.includes('meter')) return 'm'
  return fallback
}

const findDistanceColumn = (columns: readonly string[]): string | undefined =>
  columns.find((c) => c === 'distance') ?? columns.find((c) => c.startsWith('distance_'))

type CsvTable = { columns: string[]; records: Record<string, string>[] }

// The header comes from the parser itself so quoted names survive even without data rows.
const readTable = (content: string): Promise<CsvTable> =>
  new Promise((resolve, reject) => {
    let columns: string[] = []
    parse(
      content,
      {
        bom: true,
        columns: (header: string[]) => {
          columns = header.map(normalizeHeader)
          return columns
        },
        trim: true,
        skip_empty_lines: true,
        relax_column_count: true,
      },
      (err, records) => {
        if (err) {
          reject(new BadRequestException(`Invalid CSV: ${err.message}`))
          return
        }
        const parsed = recordsSchema.safeParse(records)
        if (!parsed.success) {
          reject(new BadRequestException('Invalid CSV: unexpected record shape'))
          return
        }
        resolve({ columns, records: parsed.data })
      },
    )
  })

/**
 * Parses a watch-export CSV (one row per activity) into runs.
 */
export async function parseCsvRuns(
  content: string,
  opts: { defaultUnit: DistanceUnit },
): Promise<RunBatch> {
  const { columns, records } = await readTable(content)

  const distanceColumn = findDistanceColumn(columns)
  const mapping = CANDIDATES.find((c) => columns.includes(c.startTime) && columns.includes(c.duration))
  if (!mapping || !distanceColumn) {
    throw new BadRequestException(
      `Could not map CSV columns automatically. Columns found (normalized): ${columns.join(', ')}`,
    )
  }

  const metersPerUnit = METERS_PER[distanceUnitFor(distanceColumn, opts.defaultUnit)]

  const candidates: Run[] = records.map((row, i) => {
    const rowNo = i + 2 // header is line 1
    const rawStart = row[mapping.startTime] ?? ''
    const startTime = parseWallClock(rawStart)
    if (!startTime) {
      throw new BadRequestException(`Row ${rowNo}: could not parse start time "${rawStart}"`)
    }

    const rawDuration = row[mapping.duration] ?? ''
    const durationSec = parseDurationSec(rawDuration)
    if (durationSec === null) {
      throw new BadRequestException(`Row ${rowNo}: could not parse duration "${rawDuration}"`)
    }

    // thousands separators show up in some exports; an unreadable distance drops the row
    const distance = Number((row[distanceColumn] ?? '').replace(/,/g, ''))

    const rawHr = row[mapping.avgHr]?.trim()
    const hr = rawHr ? Number(rawHr) : Number.NaN

    return {
      startTime,
      distanceM: distance * metersPerUnit,
      durationSec,
      avgHr: Number.isFinite(hr) ? hr : null,
    }
  })

  return toRunBatch(candidates)
}
