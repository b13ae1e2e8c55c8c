import type { RiskFlag } from '../risk-flags/risk-flags.types'
import type { Narrative, NarrativeInput, NarrativeSections } from './narrative.types'
import { joinNarrativeSections } from './narrative.prompt'

const RECOMMENDATIONS: Record<RiskFlag, string> = {
  volume_spike: 'Hold weekly volume steady for the next week before adding more.',
  undertraining: 'Add one short easy run per week to rebuild consistency.',
  long_run_dominance: 'Cap the long run at about a third of the weekly volume.',
  insufficient_easy_running: 'Run most sessions at a conversational pace.',
  excessive_hard_running: 'Limit hard efforts to one or two sessions per week.',
  insufficient_recovery: 'Schedule at least two full rest days in the next fortnight.',
}

/**
 * Deterministic narrative built only from the assessment, used when no
 * text-generation provider is configured.
 */
export function buildStubNarrative({ metrics, risk }: NarrativeInput): Narrative {
  const flags = risk.risk_flags

  const interpretation = [
    `Overall risk level: ${risk.risk_level}.`,
    `${metrics.run_count} runs over the last ${metrics.lookback_days} days, acute:chronic ratio ${metrics.acwr ?? 'n/a'}.`,
    flags.length > 0 ? `Flags raised: ${flags.join(', ')}.` : 'No risk flags were raised.',
    ...flags.flatMap((f) => risk.flag_details[f] ?? []),
  ].join('\n')

  const recommendations =
    flags.length > 0
      ? flags.map((f) => `- ${RECOMMENDATIONS[f]}`).join('\n')
      : '- Keep the current structure and progress volume gradually.'

  const takeaways = [
    `- Risk level: ${risk.risk_level}.`,
    risk.limitations.length > 0
      ? `- ${risk.limitations.length} check(s) ran with limited data.`
      : '- All checks ran on complete data.',
  ].join('\n')

  const sections: NarrativeSections = { interpretation, recommendations, takeaways }
  return { ...sections, raw: joinNarrativeSections(sections), provider: 'stub' }
}
