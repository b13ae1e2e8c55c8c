import { z } from 'zod'

const contentPartSchema = z.object({
  type: z.string().optional(),
  text: z.union([z.string(), z.object({ value: z.string() })]).nullish(),
})

// Only the parts of a Responses API result that carry text.
export const responseTextSchema = z.object({
  output_text: z.string().nullish(),
  output: z
    .array(z.object({ content: z.array(contentPartSchema).nullish() }))
    .nullish(),
})
