import {
  BadRequestException,
  Body,
  Controller,
  HttpCode,
  Post,
  Query,
  StreamableFile,
  UploadedFile,
  UseInterceptors,
  UsePipes,
  ValidationPipe,
} from '@nestjs/common'
import { FileInterceptor } from '@nestjs/platform-express'
import type { Express } from 'express'
import { AnalysisService } from './analysis.service'
import { AnalyzeRunsDto } from './dto/analyze-runs.dto'
import type { ReportFormat } from '../report/report.types'

const parseLookbackDays = (raw?: string): number | undefined => {
  if (raw === undefined) return undefined
  const parsed = Number(raw)
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new BadRequestException('Invalid lookbackDays')
  }
  return parsed
}

const parseFlag = (raw?: string): boolean => raw === 'true' || raw === '1'

const parseFormat = (raw?: string): ReportFormat => {
  const format = (raw ?? 'markdown').toLowerCase()
  if (format === 'markdown' || format === 'md') return 'markdown'
  if (format === 'pdf') return 'pdf'
  throw new BadRequestException('Invalid format. Expected markdown or pdf')
}

@Controller('analysis')
export class AnalysisController {
  constructor(private readonly analysis: AnalysisService) {}

  @Post()
  @HttpCode(200)
  @UsePipes(new ValidationPipe({ whitelist: true, forbidNonWhitelisted: true }))
  analyze(@Body() dto: AnalyzeRunsDto) {
    return this.analysis.analyzeRequest(dto)
  }

  @Post('upload')
  @HttpCode(200)
  @UseInterceptors(FileInterceptor('file'))
  async upload(
    @UploadedFile() file: Express.Multer.File | undefined,
    @Query('lookbackDays') lookbackDays?: string,
    @Query('runnerName') runnerName?: string,
    @Query('narrative') narrative?: string,
  ) {
    if (!file) {
      throw new BadRequestException('Missing file')
    }
    return this.analysis.analyzeUpload(
      { originalname: file.originalname, buffer: file.buffer },
      {
        lookbackDays: parseLookbackDays(lookbackDays),
        runnerName,
        narrative: parseFlag(narrative),
      },
    )
  }

  @Post('report')
  @HttpCode(200)
  @UsePipes(new ValidationPipe({ whitelist: true, forbidNonWhitelisted: true }))
  async report(@Body() dto: AnalyzeRunsDto, @Query('format') format?: string): Promise<StreamableFile> {
    const report = await this.analysis.report(dto, parseFormat(format))
    return new StreamableFile(report.body, {
      type: report.contentType,
      disposition: `attachment; filename="${report.filename}"`,
    })
  }
}
