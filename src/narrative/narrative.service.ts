import { BadGatewayException, Injectable, InternalServerErrorException, Logger } from '@nestjs/common'
import OpenAI from 'openai'
import { envNumber, envString } from '../utils/env'
import type { Narrative, NarrativeInput, NarrativeProvider } from './narrative.types'
import { SYSTEM_PROMPT, buildUserPrompt, splitNarrativeSections } from './narrative.prompt'
import { responseTextSchema } from './narrative.schema'
import { buildStubNarrative } from './narrative.stub'

export const extractResponseOutputText = (response: unknown): string | undefined => {
  const parsed = responseTextSchema.safeParse(response)
  if (!parsed.success) return undefined

  const direct = parsed.data.output_text
  if (typeof direct === 'string' && direct.trim().length > 0) return direct

  for (const item of parsed.data.output ?? []) {
    for (const part of item.content ?? []) {
      const text = typeof part.text === 'string' ? part.text : part.text?.value
      if (typeof text === 'string' && text.trim().length > 0) return text
    }
  }
  return undefined
}

@Injectable()
export class NarrativeService {
  private readonly logger = new Logger(NarrativeService.name)

  private getProvider(): NarrativeProvider {
    return envString('NARRATIVE_PROVIDER', 'stub').toLowerCase() === 'openai' ? 'openai' : 'stub'
  }

  private async callOpenAI(input: NarrativeInput): Promise<Narrative> {
    const apiKey = process.env.OPENAI_API_KEY
    if (!apiKey || !apiKey.trim()) {
      throw new InternalServerErrorException('OPENAI_API_KEY missing')
    }

    const client = new OpenAI({
      apiKey,
      timeout: envNumber('OPENAI_TIMEOUT_MS', 30000, { min: 1, integer: true }),
      maxRetries: envNumber('OPENAI_MAX_RETRIES', 2, { min: 0, integer: true }),
    })

    let response: unknown
    try {
      response = await client.responses.create({
        model: envString('OPENAI_MODEL', 'gpt-4o-mini'),
        instructions: SYSTEM_PROMPT,
        input: buildUserPrompt(input),
        temperature: envNumber('OPENAI_TEMPERATURE', 0.4, { min: 0 }),
        max_output_tokens: envNumber('OPENAI_MAX_OUTPUT_TOKENS', 1200, { min: 1, integer: true }),
      })
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err)
      throw new BadGatewayException(`Narrative provider call failed: ${message}`)
    }

    const text = extractResponseOutputText(response)
    if (text === undefined) {
      throw new BadGatewayException('Narrative provider returned no text')
    }

    const split = splitNarrativeSections(text)
    if (!split.ok) {
      throw new BadGatewayException(`Narrative response missing section header: ${split.missingHeader}`)
    }

    return { ...split.sections, raw: text, provider: 'openai' }
  }

  async generate(input: NarrativeInput): Promise<Narrative> {
    const provider = this.getProvider()
    this.logger.log(`narrative provider=${provider} flags=${input.risk.risk_flags.length}`)
    return provider === 'openai' ? this.callOpenAI(input) : buildStubNarrative(input)
  }
}
