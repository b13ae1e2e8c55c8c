import { Module } from '@nestjs/common'
import { AppController } from './app.controller'
import { AnalysisModule } from './analysis/analysis.module'
import { RiskFlagsModule } from './risk-flags/risk-flags.module'

@Module({
  imports: [RiskFlagsModule, AnalysisModule],
  controllers: [AppController],
})
export class AppModule {}
