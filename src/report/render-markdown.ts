import type { ReportPayload } from './report.types'

// Models sometimes wrap a whole section in bold.
export const cleanSection = (text: string): string => {
  let t = text.trim()
  if (t.startsWith('**')) t = t.replace(/^\*+/, '').trim()
  if (t.endsWith('**')) t = t.replace(/\*+$/, '').trim()
  return t
}

const bulletList = (items: readonly string[]): string =>
  items.length === 0 ? '_None_' : items.map((x) => `- ${x}`).join('\n')

const show = (value: number | null): string => (value === null ? 'n/a' : String(value))

export function renderMarkdown({ runnerName, generatedAtIso, metrics, risk, narrative }: ReportPayload): string {
  const details = risk.risk_flags.flatMap((flag) => {
    const detail = risk.flag_details[flag]
    return detail === undefined ? [] : [`**${flag}** — ${detail}`]
  })

  return [
    `# Running Coach Report — ${runnerName}`,
    '',
    `**Generated:** ${generatedAtIso}`,
    '',
    '---',
    '',
    '## Summary',
    `- **Risk level:** **${risk.risk_level}**`,
    `- **Runs in last ${metrics.lookback_days} days:** ${metrics.run_count}`,
    `- **Total distance (km):** ${metrics.total_distance_km}`,
    `- **ACWR:** ${show(metrics.acwr)}`,
    `- **Longest run share:** ${show(metrics.longest_run_pct)}`,
    `- **Rest days (last 14):** ${metrics.rest_days_last_14}`,
    `- **Back-to-back run days (last 14):** ${metrics.back_to_back_runs_last_14}`,
    `- **Easy %:** ${metrics.easy_pct} | **Hard %:** ${metrics.hard_pct}`,
    '',
    '---',
    '',
    '## Risk flags',
    bulletList(risk.risk_flags),
    '',
    '### Flag details',
    bulletList(details),
    '',
    '### Limitations',
    bulletList(risk.limitations),
    '',
    '---',
    '',
    '## Interpretation',
    cleanSection(narrative.interpretation),
    '',
    '---',
    '',
    '## Recommendations',
    cleanSection(narrative.recommendations),
    '',
    '---',
    '',
    '## Key takeaways',
    cleanSection(narrative.takeaways),
    '',
  ].join('\n')
}
