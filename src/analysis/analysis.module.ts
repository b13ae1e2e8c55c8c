import { Module } from '@nestjs/common'
import { ClockModule } from '../clock/clock.module'
import { IngestionModule } from '../ingestion/ingestion.module'
import { NarrativeModule } from '../narrative/narrative.module'
import { ReportModule } from '../report/report.module'
import { RiskFlagsModule } from '../risk-flags/risk-flags.module'
import { TrainingMetricsModule } from '../training-metrics/training-metrics.module'
import { AnalysisController } from './analysis.controller'
import { AnalysisService } from './analysis.service'

@Module({
  imports: [ClockModule, TrainingMetricsModule, RiskFlagsModule, NarrativeModule, IngestionModule, ReportModule],
  controllers: [AnalysisController],
  providers: [AnalysisService],
})
export class AnalysisModule {}
