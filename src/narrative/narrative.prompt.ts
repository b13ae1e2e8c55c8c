import stableStringify from 'fast-json-stable-stringify'
import type { NarrativeInput, NarrativeSections } from './narrative.types'

export const SECTION_HEADERS = ['INTERPRETATION:', 'RECOMMENDATIONS:', 'TAKEAWAYS:'] as const

export const SYSTEM_PROMPT = [
  'You are an experienced endurance training analyst specializing in recreational runners.',
  'You interpret provided training metrics and deterministic risk flags.',
  '',
  'You do NOT calculate metrics.',
  'You do NOT invent missing data.',
  'You ONLY analyze the metrics explicitly provided.',
  '',
  'Tone: professional, calm, evidence-based, non-alarmist, plain English.',
].join('\n')

export function buildUserPrompt({ metrics, risk }: NarrativeInput): string {
  // flag_details stays out: the model gets flags, not prewritten explanations
  const payload = {
    metrics,
    risk: {
      risk_level: risk.risk_level,
      risk_flags: risk.risk_flags,
      limitations: risk.limitations,
    },
  }

  return [
    'Analyze the following JSON (metrics + risk flags). Use established endurance training principles.',
    'Rules:',
    '- Use only provided metrics/flags',
    '- Respect the provided risk_flags',
    '- Keep recommendations conservative and actionable',
    '- If limitations exist, acknowledge briefly',
    '',
    'Return EXACTLY three sections with headers:',
    ...SECTION_HEADERS,
    '',
    'JSON:',
    stableStringify(payload),
    '',
  ].join('\n')
}

export type SplitResult = { ok: true; sections: NarrativeSections } | { ok: false; missingHeader: string }

/**
 * Splits model output on the three section headers, which must appear in order.
 */
export function splitNarrativeSections(text: string): SplitResult {
  const [interpretationHeader, recommendationsHeader, takeawaysHeader] = SECTION_HEADERS

  const i1 = text.indexOf(interpretationHeader)
  if (i1 < 0) return { ok: false, missingHeader: interpretationHeader }
  const i2 = text.indexOf(recommendationsHeader, i1 + interpretationHeader.length)
  if (i2 < 0) return { ok: false, missingHeader: recommendationsHeader }
  const i3 = text.indexOf(takeawaysHeader, i2 + recommendationsHeader.length)
  if (i3 < 0) return { ok: false, missingHeader: takeawaysHeader }

  return {
    ok: true,
    sections: {
      interpretation: text.slice(i1 + interpretationHeader.length, i2).trim(),
      recommendations: text.slice(i2 + recommendationsHeader.length, i3).trim(),
      takeaways: text.slice(i3 + takeawaysHeader.length).trim(),
    },
  }
}

export const joinNarrativeSections = (sections: NarrativeSections): string =>
  [
    SECTION_HEADERS[0],
    sections.interpretation,
    '',
    SECTION_HEADERS[1],
    sections.recommendations,
    '',
    SECTION_HEADERS[2],
    sections.takeaways,
    '',
  ].join('\n')
