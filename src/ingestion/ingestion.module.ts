import { Module } from '@nestjs/common'
import { RunIngestionService } from './run-ingestion.service'

@Module({
  providers: [RunIngestionService],
  exports: [RunIngestionService],
})
export class IngestionModule {}
