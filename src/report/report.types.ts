import type { MetricsSnapshot } from '../training-metrics/training-metrics.types'
import type { RiskAssessment } from '../risk-flags/risk-flags.types'
import type { NarrativeSections } from '../narrative/narrative.types'

export type ReportFormat = 'markdown' | 'pdf'

export type ReportPayload = {
  runnerName: string
  generatedAtIso: string
  metrics: MetricsSnapshot
  risk: RiskAssessment
  narrative: NarrativeSections
}

export type RenderedReport = {
  contentType: string
  filename: string
  body: Buffer
}
