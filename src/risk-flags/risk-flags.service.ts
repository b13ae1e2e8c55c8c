import { BadRequestException, Injectable, InternalServerErrorException, Logger } from '@nestjs/common'
import type { RiskAssessment } from './risk-flags.types'
import { riskAssessmentSchema } from './risk-flags.schema'
import { isMetricsMapping, readRiskInputs } from './risk-flags.inputs'
import { evaluateRiskFlags } from './risk-flags-rules'

@Injectable()
export class RiskFlagsService {
  private readonly logger = new Logger(RiskFlagsService.name)

  /**
   * Evaluates every risk rule over a metrics mapping. Missing or malformed
   * metrics end up in `limitations`; only a value that is not a mapping at
   * all is rejected.
   */
  assess(metrics: unknown): RiskAssessment {
    if (!isMetricsMapping(metrics)) {
      throw new BadRequestException('Metrics must be a JSON object')
    }

    const result = evaluateRiskFlags(readRiskInputs(metrics))

    const parsed = riskAssessmentSchema.safeParse(result)
    if (!parsed.success) {
      throw new InternalServerErrorException(
        `RiskAssessment validation failed: ${JSON.stringify(parsed.error.format())}`,
      )
    }

    this.logger.debug(
      `risk: level=${parsed.data.risk_level} flags=${parsed.data.risk_flags.length} limitations=${parsed.data.limitations.length}`,
    )
    return parsed.data
  }
}
