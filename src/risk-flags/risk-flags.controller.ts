import { Body, Controller, HttpCode, Post } from '@nestjs/common'
import { RiskFlagsService } from './risk-flags.service'

@Controller('risk-flags')
export class RiskFlagsController {
  constructor(private readonly riskFlags: RiskFlagsService) {}

  // The body stays untyped: unknown keys and wrong types become limitations.
  @Post()
  @HttpCode(200)
  assess(@Body() metrics: unknown) {
    return this.riskFlags.assess(metrics)
  }
}
