import type { RunBatch } from '../types/run.types'

export type RunFileFormat = 'csv' | 'fit' | 'tcx'

export type DistanceUnit = 'm' | 'km' | 'mi'

export type UploadedRunFile = {
  originalname: string
  buffer: Buffer
}

export type IngestionResult = RunBatch & { format: RunFileFormat }
