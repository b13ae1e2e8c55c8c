import type { MetricsSnapshot } from '../training-metrics/training-metrics.types'
import type { RiskAssessment } from '../risk-flags/risk-flags.types'
import type { Narrative } from '../narrative/narrative.types'

export type AnalysisOptions = {
  lookbackDays?: number
  runnerName?: string
  narrative?: boolean
}

export type AnalysisResult = {
  runnerName: string
  generatedAtIso: string
  droppedRuns: number
  metrics: MetricsSnapshot
  risk: RiskAssessment
  narrative?: Narrative
}
