import type { MetricInput, RiskAssessment, RiskFlag, RiskInputs, RiskLevel, RiskRule, RuleOutcome } from './risk-flags.types'

const ACWR_SPIKE = 1.5
const WEEK_OVER_WEEK_SPIKE = 1.25
const ACWR_UNDERTRAINING = 0.8
const LONG_RUN_SHARE = 0.4
const MIN_EASY_PCT = 65
const MAX_HARD_PCT = 20
const MIN_REST_DAYS = 1
const MAX_BACK_TO_BACK = 5

const pass = (limitations: string[] = []): RuleOutcome => ({ triggered: false, limitations })
const skip = (note: string): RuleOutcome => pass([note])

/**
 * Fewer than two points counts as flat. With two points the last must not
 * exceed the previous one, with three or more it is compared against the
 * mean of the two preceding weeks.
 */
export function isTrendFlatOrDecreasing(weekly: readonly number[]): boolean {
  const last = weekly[weekly.length - 1]
  const prev = weekly[weekly.length - 2]
  if (last === undefined || prev === undefined) return true
  const before = weekly[weekly.length - 3]
  if (before === undefined) return last <= prev
  return last <= (prev + before) / 2
}

// Single-threshold rule over one metric.
const thresholdRule = (
  flag: RiskFlag,
  detail: string,
  read: (inputs: RiskInputs) => MetricInput<number>,
  notes: { missing: string; invalid: string },
  triggers: (value: number) => boolean,
): RiskRule => ({
  flag,
  detail,
  evaluate: (inputs) => {
    const input = read(inputs)
    if (input.status === 'missing') return skip(notes.missing)
    if (input.status === 'invalid') return skip(notes.invalid)
    return { triggered: triggers(input.value), limitations: [] }
  },
})

const volumeSpike: RiskRule = {
  flag: 'volume_spike',
  detail:
    'Training volume increased sharply relative to your recent baseline. ' +
    'Sudden spikes elevate short-term injury and fatigue risk.',
  evaluate: ({ acwr, weekly_distance: weekly }) => {
    const acwrInvalid = 'acwr invalid; acute:chronic spike check skipped.'
    const weeklyInvalid = 'weekly_distance values invalid; spike check skipped.'

    const weeklyUsable = weekly.status === 'present' && weekly.value.length > 0
    if (acwr.status !== 'present' && !weeklyUsable) {
      if (weekly.status !== 'invalid') {
        return skip('Missing acwr and weekly_distance; cannot assess volume spikes reliably.')
      }
      return skip(
        acwr.status === 'invalid'
          ? 'acwr and weekly_distance values invalid; volume spike check skipped.'
          : 'Missing acwr and weekly_distance values invalid; volume spike check skipped.',
      )
    }

    // Each sub-check runs on whatever input is usable.
    const limitations: string[] = []
    let triggered = false

    if (acwr.status === 'present') {
      triggered = acwr.value >= ACWR_SPIKE
    } else if (acwr.status === 'invalid') {
      limitations.push(acwrInvalid)
    }

    if (weekly.status === 'invalid') {
      limitations.push(weeklyInvalid)
    } else if (weekly.status === 'present') {
      const last = weekly.value[weekly.value.length - 1]
      const prev = weekly.value[weekly.value.length - 2]
      if (last !== undefined && prev !== undefined && prev > 0 && last >= WEEK_OVER_WEEK_SPIKE * prev) {
        triggered = true
      }
    }

    return { triggered, limitations }
  },
}

const undertraining: RiskRule = {
  flag: 'undertraining',
  detail:
    'Recent training load is below your longer-term baseline and appears flat or declining. ' +
    'This can reduce fitness and make harder efforts feel disproportionately taxing.',
  evaluate: ({ acwr, weekly_distance: weekly }) => {
    const weeklyShort = weekly.status === 'missing' || (weekly.status === 'present' && weekly.value.length < 2)
    if (acwr.status === 'invalid' && weekly.status === 'invalid') {
      return skip('acwr and weekly_distance values invalid; undertraining check skipped.')
    }
    if (weekly.status === 'invalid') {
      return skip(
        acwr.status === 'missing'
          ? 'Missing acwr and weekly_distance values invalid; undertraining check skipped.'
          : 'weekly_distance values invalid; undertraining check skipped.',
      )
    }
    if (acwr.status === 'invalid') {
      return skip(
        weeklyShort
          ? 'acwr invalid and insufficient weekly_distance; undertraining check skipped.'
          : 'acwr invalid; undertraining check skipped.',
      )
    }
    if (acwr.status === 'missing' || weekly.status === 'missing' || weekly.value.length < 2) {
      return skip('Missing acwr or sufficient weekly_distance; undertraining check may be incomplete.')
    }
    return { triggered: acwr.value < ACWR_UNDERTRAINING && isTrendFlatOrDecreasing(weekly.value), limitations: [] }
  },
}

const longRunDominance = thresholdRule(
  'long_run_dominance',
  'A large share of your weekly volume is concentrated in one run. ' +
    'When the long run dominates the week, connective tissues often have less time to adapt.',
  (inputs) => inputs.longest_run_pct,
  {
    missing: 'Missing longest_run_pct; cannot assess long-run dominance.',
    invalid: 'longest_run_pct invalid; long-run dominance check skipped.',
  },
  (pct) => pct >= LONG_RUN_SHARE,
)

const insufficientEasyRunning = thresholdRule(
  'insufficient_easy_running',
  'A relatively low portion of your running is truly easy. ' +
    'Too much moderate/hard running can accumulate fatigue and limit recovery between sessions.',
  (inputs) => inputs.easy_pct,
  {
    missing: 'Missing easy_pct; cannot assess easy-running balance.',
    invalid: 'easy_pct invalid; easy-running balance check skipped.',
  },
  (pct) => pct < MIN_EASY_PCT,
)

const excessiveHardRunning = thresholdRule(
  'excessive_hard_running',
  'A relatively high portion of your mileage is hard intensity. ' +
    'Sustained high-intensity volume is effective but increases recovery demand and injury risk.',
  (inputs) => inputs.hard_pct,
  {
    missing: 'Missing hard_pct; cannot assess hard-running proportion.',
    invalid: 'hard_pct invalid; hard-running proportion check skipped.',
  },
  (pct) => pct >= MAX_HARD_PCT,
)

const insufficientRecovery: RiskRule = {
  flag: 'insufficient_recovery',
  detail:
    'Recent training has limited recovery spacing (few rest days and/or frequent back-to-back runs). ' +
    'Insufficient recovery increases fatigue and can make small issues linger into injuries.',
  evaluate: ({ rest_days_last_14: rest, back_to_back_runs_last_14: b2b }) => {
    if (rest.status === 'missing' && b2b.status === 'missing') {
      return skip('Missing rest_days_last_14 and back_to_back_runs_last_14; cannot assess recovery density.')
    }
    if (rest.status !== 'present' && b2b.status !== 'present') {
      return skip('rest_days_last_14 and back_to_back_runs_last_14 missing or invalid; recovery density check skipped.')
    }

    const limitations: string[] = []
    if (rest.status === 'invalid') limitations.push('rest_days_last_14 invalid; recovery density check incomplete.')
    if (b2b.status === 'invalid') {
      limitations.push('back_to_back_runs_last_14 invalid; recovery density check incomplete.')
    }

    const triggered =
      (rest.status === 'present' && rest.value <= MIN_REST_DAYS) ||
      (b2b.status === 'present' && b2b.value >= MAX_BACK_TO_BACK)
    return { triggered, limitations }
  },
}

export const RISK_RULES: readonly RiskRule[] = [
  volumeSpike,
  undertraining,
  longRunDominance,
  insufficientEasyRunning,
  excessiveHardRunning,
  insufficientRecovery,
]

export function determineRiskLevel(flags: readonly RiskFlag[]): RiskLevel {
  const set = new Set(flags)
  if (set.size >= 4 || (set.has('volume_spike') && set.has('insufficient_recovery'))) return 'high'
  if (set.size >= 2) return 'moderate'
  return 'low'
}

export function evaluateRiskFlags(inputs: RiskInputs, rules: readonly RiskRule[] = RISK_RULES): RiskAssessment {
  const triggered: RiskRule[] = []
  const limitations = new Set<string>()

  for (const rule of rules) {
    const outcome = rule.evaluate(inputs)
    if (outcome.triggered) triggered.push(rule)
    outcome.limitations.forEach((note) => limitations.add(note))
  }

  triggered.sort((a, b) => (a.flag < b.flag ? -1 : a.flag > b.flag ? 1 : 0))
  const riskFlags = triggered.map((r) => r.flag)

  const flagDetails: Partial<Record<RiskFlag, string>> = {}
  for (const rule of triggered) flagDetails[rule.flag] = rule.detail

  return {
    risk_level: determineRiskLevel(riskFlags),
    risk_flags: riskFlags,
    limitations: [...limitations].sort(),
    flag_details: flagDetails,
  }
}
