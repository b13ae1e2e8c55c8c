import type { MetricsSnapshot } from '../training-metrics/training-metrics.types'
import type { RiskAssessment } from '../risk-flags/risk-flags.types'

export type NarrativeProvider = 'stub' | 'openai'

export type NarrativeSections = {
  interpretation: string
  recommendations: string
  takeaways: string
}

export type Narrative = NarrativeSections & {
  raw: string
  provider: NarrativeProvider
}

export type NarrativeInput = {
  metrics: MetricsSnapshot
  risk: RiskAssessment
}
