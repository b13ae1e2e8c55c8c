import { buildUserPrompt, joinNarrativeSections, splitNarrativeSections } from './narrative.prompt'
import type { NarrativeInput } from './narrative.types'

const input: NarrativeInput = {
  metrics: {
    lookback_days: 28,
    run_count: 2,
    total_distance_km: 18,
    weekly_distance: [18],
    weekly_frequency: [2],
    acwr: 4,
    longest_run_pct: 0.56,
    rest_days_last_14: 12,
    back_to_back_runs_last_14: 0,
    easy_pct: 70,
    hard_pct: 0,
  },
  risk: {
    risk_level: 'moderate',
    risk_flags: ['long_run_dominance', 'volume_spike'],
    limitations: [],
    flag_details: { long_run_dominance: 'a', volume_spike: 'b' },
  },
}

describe('NarrativePrompt', () => {
  it('embeds metrics and risk with sorted keys and no flag details', () => {
    const prompt = buildUserPrompt(input)
    const json = prompt.split('JSON:\n')[1]?.trim()

    expect(json).toBe(
      '{"metrics":{"acwr":4,"back_to_back_runs_last_14":0,"easy_pct":70,"hard_pct":0,"longest_run_pct":0.56,' +
        '"lookback_days":28,"rest_days_last_14":12,"run_count":2,"total_distance_km":18,"weekly_distance":[18],' +
        '"weekly_frequency":[2]},"risk":{"limitations":[],"risk_flags":["long_run_dominance","volume_spike"],' +
        '"risk_level":"moderate"}}',
    )
    expect(prompt).toContain('Return EXACTLY three sections with headers:\nINTERPRETATION:\nRECOMMENDATIONS:\nTAKEAWAYS:\n')
  })

  it('splits the three sections', () => {
    const text = 'Preamble\nINTERPRETATION:\n Load is rising.\nRECOMMENDATIONS:\n- Hold volume.\nTAKEAWAYS:\n- Be patient.\n'
    expect(splitNarrativeSections(text)).toEqual({
      ok: true,
      sections: { interpretation: 'Load is rising.', recommendations: '- Hold volume.', takeaways: '- Be patient.' },
    })
  })

  it('reports the first missing header', () => {
    expect(splitNarrativeSections('INTERPRETATION: x\nTAKEAWAYS: y')).toEqual({
      ok: false,
      missingHeader: 'RECOMMENDATIONS:',
    })
  })

  it('requires the headers in order', () => {
    expect(splitNarrativeSections('TAKEAWAYS: a\nINTERPRETATION: b\nRECOMMENDATIONS: c')).toEqual({
      ok: false,
      missingHeader: 'TAKEAWAYS:',
    })
  })

  it('joins sections back into splittable text', () => {
    const sections = { interpretation: 'i', recommendations: 'r', takeaways: 't' }
    expect(splitNarrativeSections(joinNarrativeSections(sections))).toEqual({ ok: true, sections })
  })
})
