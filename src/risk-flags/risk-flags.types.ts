export type RiskFlag =
  | 'volume_spike'
  | 'undertraining'
  | 'long_run_dominance'
  | 'insufficient_easy_running'
  | 'excessive_hard_running'
  | 'insufficient_recovery'

export type RiskLevel = 'low' | 'moderate' | 'high'

// Wire shape read by the narrative prompt and the report renderers.
export type RiskAssessment = {
  risk_level: RiskLevel
  risk_flags: RiskFlag[]
  limitations: string[]
  flag_details: Partial<Record<RiskFlag, string>>
}

export type MetricInput<T> =
  | { status: 'missing' }
  | { status: 'invalid'; raw: unknown }
  | { status: 'present'; value: T }

export type RiskInputs = {
  acwr: MetricInput<number>
  weekly_distance: MetricInput<number[]>
  longest_run_pct: MetricInput<number>
  easy_pct: MetricInput<number>
  hard_pct: MetricInput<number>
  rest_days_last_14: MetricInput<number>
  back_to_back_runs_last_14: MetricInput<number>
}

export type RuleOutcome = {
  triggered: boolean
  limitations: string[]
}

export type RiskRule = {
  flag: RiskFlag
  detail: string
  evaluate: (inputs: RiskInputs) => RuleOutcome
}
