import { Module } from '@nestjs/common'
import { TrainingMetricsService } from './training-metrics.service'

@Module({
  providers: [TrainingMetricsService],
  exports: [TrainingMetricsService],
})
export class TrainingMetricsModule {}
