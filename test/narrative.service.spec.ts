import type { NarrativeInput } from '../src/narrative/narrative.types'
import { SYSTEM_PROMPT } from '../src/narrative/narrative.prompt'

const input: NarrativeInput = {
  metrics: {
    lookback_days: 28,
    run_count: 10,
    total_distance_km: 105,
    weekly_distance: [20, 20, 29, 36],
    weekly_frequency: [2, 2, 3, 3],
    acwr: 1.98,
    longest_run_pct: 0.38,
    rest_days_last_14: 1,
    back_to_back_runs_last_14: 2,
    easy_pct: 77.1,
    hard_pct: 15.2,
  },
  risk: {
    risk_level: 'high',
    risk_flags: ['insufficient_recovery', 'volume_spike'],
    limitations: [],
    flag_details: {
      insufficient_recovery: 'Recovery is short.',
      volume_spike: 'Volume jumped.',
    },
  },
}

const ENV_KEYS = [
  'NARRATIVE_PROVIDER',
  'OPENAI_API_KEY',
  'OPENAI_MODEL',
  'OPENAI_TEMPERATURE',
  'OPENAI_MAX_OUTPUT_TOKENS',
  'OPENAI_TIMEOUT_MS',
  'OPENAI_MAX_RETRIES',
] as const

describe('NarrativeService', () => {
  const savedEnv = Object.fromEntries(ENV_KEYS.map((k) => [k, process.env[k]]))

  afterEach(() => {
    for (const key of ENV_KEYS) {
      const value = savedEnv[key]
      if (value === undefined) delete process.env[key]
      else process.env[key] = value
    }
  })

  describe('stub provider', () => {
    it('builds the sections from the assessment', async () => {
      delete process.env.NARRATIVE_PROVIDER
      const { NarrativeService } = require('../src/narrative/narrative.service')
      const service = new NarrativeService()

      const narrative = await service.generate(input)

      expect(narrative.provider).toBe('stub')
      expect(narrative.interpretation).toBe(
        [
          'Overall risk level: high.',
          '10 runs over the last 28 days, acute:chronic ratio 1.98.',
          'Flags raised: insufficient_recovery, volume_spike.',
          'Recovery is short.',
          'Volume jumped.',
        ].join('\n'),
      )
      expect(narrative.recommendations).toBe(
        '- Schedule at least two full rest days in the next fortnight.\n' +
          '- Hold weekly volume steady for the next week before adding more.',
      )
      expect(narrative.takeaways).toBe('- Risk level: high.\n- All checks ran on complete data.')
      expect(narrative.raw.startsWith('INTERPRETATION:\nOverall risk level: high.')).toBe(true)
    })
  })

  describe('openai provider (mocked)', () => {
    let service: { generate: (input: NarrativeInput) => Promise<Record<string, string>> }
    let mockResponsesCreate: jest.Mock
    let mockOpenAIConstructor: jest.Mock

    beforeEach(() => {
      jest.resetModules()

      mockResponsesCreate = jest.fn()
      mockOpenAIConstructor = jest.fn().mockImplementation(() => ({
        responses: { create: mockResponsesCreate },
      }))
      jest.doMock('openai', () => mockOpenAIConstructor)

      const { NarrativeService } = require('../src/narrative/narrative.service')
      service = new NarrativeService()

      process.env.NARRATIVE_PROVIDER = 'openai'
      process.env.OPENAI_API_KEY = 'test-secret'
      delete process.env.OPENAI_MODEL
      delete process.env.OPENAI_TEMPERATURE
      delete process.env.OPENAI_MAX_OUTPUT_TOKENS
      delete process.env.OPENAI_TIMEOUT_MS
      delete process.env.OPENAI_MAX_RETRIES
    })

    afterEach(() => {
      jest.dontMock('openai')
    })

    // the service is re-required per test, so exceptions are matched by message

    it('splits output_text into sections', async () => {
      mockResponsesCreate.mockResolvedValue({
        output_text: 'INTERPRETATION:\n**Load is up.**\nRECOMMENDATIONS:\n- Rest more.\nTAKEAWAYS:\n- Ease off.',
      })

      const narrative = await service.generate(input)

      expect(narrative).toEqual({
        interpretation: '**Load is up.**',
        recommendations: '- Rest more.',
        takeaways: '- Ease off.',
        raw: 'INTERPRETATION:\n**Load is up.**\nRECOMMENDATIONS:\n- Rest more.\nTAKEAWAYS:\n- Ease off.',
        provider: 'openai',
      })
      expect(mockOpenAIConstructor).toHaveBeenCalledWith({ apiKey: 'test-secret', timeout: 30000, maxRetries: 2 })

      const request = mockResponsesCreate.mock.calls[0][0]
      expect(request.model).toBe('gpt-4o-mini')
      expect(request.temperature).toBe(0.4)
      expect(request.max_output_tokens).toBe(1200)
      expect(request.instructions).toBe(SYSTEM_PROMPT)
      expect(request.input).toContain('"risk_level":"high"')
      expect(request.input).not.toContain('flag_details')
    })

    it('reads text from the output content parts', async () => {
      process.env.OPENAI_MODEL = 'gpt-4.1-mini'
      process.env.OPENAI_TEMPERATURE = 'warm'
      mockResponsesCreate.mockResolvedValue({
        output: [
          { type: 'reasoning', summary: [] },
          {
            type: 'message',
            content: [{ type: 'output_text', text: 'INTERPRETATION: a RECOMMENDATIONS: b TAKEAWAYS: c' }],
          },
        ],
      })

      const narrative = await service.generate(input)

      expect(narrative.takeaways).toBe('c')
      const request = mockResponsesCreate.mock.calls[0][0]
      expect(request.model).toBe('gpt-4.1-mini')
      expect(request.temperature).toBe(0.4)
    })

    it('fails with a bad gateway when a header is missing', async () => {
      mockResponsesCreate.mockResolvedValue({ output_text: 'INTERPRETATION: a\nRECOMMENDATIONS: b' })

      await expect(service.generate(input)).rejects.toThrow('Narrative response missing section header: TAKEAWAYS:')
    })

    it('fails with a bad gateway when the call fails', async () => {
      mockResponsesCreate.mockRejectedValue(new Error('socket hang up'))

      await expect(service.generate(input)).rejects.toThrow('Narrative provider call failed: socket hang up')
    })

    it('requires an API key', async () => {
      process.env.OPENAI_API_KEY = '  '

      await expect(service.generate(input)).rejects.toThrow('OPENAI_API_KEY missing')
      expect(mockOpenAIConstructor).not.toHaveBeenCalled()
    })
  })
})
