import { BadRequestException, Inject, Injectable, Logger } from '@nestjs/common'
import type { Clock } from '../clock/clock'
import { CLOCK } from '../clock/clock'
import { parseWallClock } from '../ingestion/run-timestamp'
import { RunIngestionService } from '../ingestion/run-ingestion.service'
import type { UploadedRunFile } from '../ingestion/ingestion.types'
import { NarrativeService } from '../narrative/narrative.service'
import { ReportService } from '../report/report.service'
import type { RenderedReport, ReportFormat } from '../report/report.types'
import { RiskFlagsService } from '../risk-flags/risk-flags.service'
import { DEFAULT_LOOKBACK_DAYS, TrainingMetricsService } from '../training-metrics/training-metrics.service'
import type { Run, RunBatch } from '../types/run.types'
import { envNumber } from '../utils/env'
import { toRunBatch } from '../utils/runs'
import type { AnalysisOptions, AnalysisResult } from './analysis.types'
import type { AnalyzeRunsDto, RunDto } from './dto/analyze-runs.dto'

const DEFAULT_RUNNER_NAME = 'Runner'

@Injectable()
export class AnalysisService {
  private readonly logger = new Logger(AnalysisService.name)

  constructor(
    private readonly trainingMetrics: TrainingMetricsService,
    private readonly riskFlags: RiskFlagsService,
    private readonly narratives: NarrativeService,
    private readonly ingestion: RunIngestionService,
    private readonly reports: ReportService,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  private defaultLookbackDays(): number {
    return envNumber('DEFAULT_LOOKBACK_DAYS', DEFAULT_LOOKBACK_DAYS, { min: 1, integer: true })
  }

  toRuns(dtos: readonly RunDto[]): Run[] {
    return dtos.map((dto, i) => {
      const startTime = parseWallClock(dto.startTime)
      if (!startTime) {
        throw new BadRequestException(`runs[${i}].startTime could not be parsed: "${dto.startTime}"`)
      }
      return {
        startTime,
        distanceM: dto.distanceM,
        durationSec: dto.durationSec,
        avgHr: dto.avgHr ?? null,
      }
    })
  }

  private async analyzeBatch(batch: RunBatch, opts: AnalysisOptions): Promise<AnalysisResult> {
    const lookbackDays = opts.lookbackDays ?? this.defaultLookbackDays()
    const metrics = this.trainingMetrics.compute(batch.runs, { lookbackDays })
    const risk = this.riskFlags.assess(metrics)

    const result: AnalysisResult = {
      runnerName: opts.runnerName?.trim() || DEFAULT_RUNNER_NAME,
      generatedAtIso: this.clock.now().toISOString(),
      droppedRuns: batch.dropped,
      metrics,
      risk,
    }

    this.logger.log(
      `analysis: runs=${batch.runs.length} dropped=${batch.dropped} lookback=${lookbackDays} ` +
        `risk=${risk.risk_level} flags=${risk.risk_flags.length}`,
    )

    if (opts.narrative) {
      result.narrative = await this.narratives.generate({ metrics, risk })
    }
    return result
  }

  analyze(runs: readonly Run[], opts: AnalysisOptions = {}): Promise<AnalysisResult> {
    return this.analyzeBatch(toRunBatch(runs), opts)
  }

  async analyzeRequest(dto: AnalyzeRunsDto): Promise<AnalysisResult> {
    return this.analyze(this.toRuns(dto.runs), {
      lookbackDays: dto.lookbackDays,
      runnerName: dto.runnerName,
      narrative: dto.narrative,
    })
  }

  async analyzeUpload(file: UploadedRunFile, opts: AnalysisOptions = {}): Promise<AnalysisResult> {
    const ingested = await this.ingestion.ingest(file)
    return this.analyzeBatch(ingested, opts)
  }

  async report(dto: AnalyzeRunsDto, format: ReportFormat): Promise<RenderedReport> {
    const result = await this.analyzeRequest({ ...dto, narrative: false })
    const narrative = await this.narratives.generate({ metrics: result.metrics, risk: result.risk })
    return this.reports.render(
      {
        runnerName: result.runnerName,
        generatedAtIso: result.generatedAtIso,
        metrics: result.metrics,
        risk: result.risk,
        narrative,
      },
      format,
    )
  }
}
