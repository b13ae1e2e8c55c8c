import { z } from 'zod'

export const riskFlagSchema = z.enum([
  'volume_spike',
  'undertraining',
  'long_run_dominance',
  'insufficient_easy_running',
  'excessive_hard_running',
  'insufficient_recovery',
])

export const riskAssessmentSchema = z
  .object({
    risk_level: z.enum(['low', 'moderate', 'high']),
    risk_flags: z.array(riskFlagSchema),
    limitations: z.array(z.string().min(1)),
    flag_details: z.record(riskFlagSchema, z.string().min(1)),
  })
  .superRefine((value, ctx) => {
    const flags = new Set<string>(value.risk_flags)
    const detailed = Object.keys(value.flag_details)
    if (flags.size !== value.risk_flags.length) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['risk_flags'], message: 'duplicate flag' })
    }
    if (detailed.length !== flags.size || !detailed.every((k) => flags.has(k))) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['flag_details'], message: 'flag_details must match risk_flags' })
    }
  })
