import { BadRequestException, Injectable, Logger } from '@nestjs/common'
import { envString } from '../utils/env'
import type { RunBatch } from '../types/run.types'
import type { DistanceUnit, IngestionResult, RunFileFormat, UploadedRunFile } from './ingestion.types'
import { parseCsvRuns } from './csv-runs.parser'
import { parseFitRuns } from './fit-runs.parser'
import { parseTcxRuns } from './tcx-runs.parser'

const EXTENSIONS = new Map<string, RunFileFormat>([
  ['csv', 'csv'],
  ['fit', 'fit'],
  ['tcx', 'tcx'],
])

const isDistanceUnit = (value: string): value is DistanceUnit => value === 'm' || value === 'km' || value === 'mi'

export const detectFormat = (filename: string): RunFileFormat | null => {
  const dot = filename.lastIndexOf('.')
  if (dot < 0) return null
  return EXTENSIONS.get(filename.slice(dot + 1).toLowerCase()) ?? null
}

@Injectable()
export class RunIngestionService {
  private readonly logger = new Logger(RunIngestionService.name)

  private csvDistanceUnit(): DistanceUnit {
    const unit = envString('CSV_DISTANCE_UNIT', 'km').toLowerCase()
    return isDistanceUnit(unit) ? unit : 'km'
  }

  private async parse(format: RunFileFormat, file: UploadedRunFile): Promise<RunBatch> {
    switch (format) {
      case 'csv':
        return parseCsvRuns(file.buffer.toString('utf8'), { defaultUnit: this.csvDistanceUnit() })
      case 'fit':
        return parseFitRuns(file.buffer)
      case 'tcx':
        return parseTcxRuns(file.buffer.toString('utf8'))
    }
  }

  async ingest(file: UploadedRunFile): Promise<IngestionResult> {
    const format = detectFormat(file.originalname)
    if (!format) {
      throw new BadRequestException('Unsupported file type. Expected .csv, .fit or .tcx')
    }
    if (file.buffer.length === 0) {
      throw new BadRequestException('Uploaded file is empty')
    }

    const batch = await this.parse(format, file)
    this.logger.log(`ingested ${format}: kept=${batch.runs.length} dropped=${batch.dropped}`)
    return { format, ...batch }
  }
}
