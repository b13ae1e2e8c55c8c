import { Controller, Get } from '@nestjs/common'
import { RISK_RULES } from './risk-flags/risk-flags-rules'
import { DEFAULT_LOOKBACK_DAYS } from './training-metrics/training-metrics.service'

@Controller()
export class AppController {
  @Get()
  getRoot() {
    return {
      status: 'ok',
      service: 'run-load-risk',
      defaultLookbackDays: DEFAULT_LOOKBACK_DAYS,
      rules: RISK_RULES.map((rule) => rule.flag),
    }
  }

  @Get('health')
  health() {
    return { status: 'ok' }
  }
}
