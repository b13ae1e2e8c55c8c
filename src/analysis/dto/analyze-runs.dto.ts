import { Type } from 'class-transformer'
import {
  IsArray,
  IsBoolean,
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  MaxLength,
  Min,
  ValidateNested,
} from 'class-validator'

export class RunDto {
  // Wall-clock timestamp, e.g. 2024-03-04T07:30:00 (an offset is accepted and ignored)
  @IsString()
  @IsNotEmpty()
  startTime!: string

  @IsNumber({ allowNaN: false, allowInfinity: false })
  distanceM!: number

  @IsNumber({ allowNaN: false, allowInfinity: false })
  durationSec!: number

  @IsNumber({ allowNaN: false, allowInfinity: false })
  @IsOptional()
  avgHr?: number | null
}

export class AnalyzeRunsDto {
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => RunDto)
  runs!: RunDto[]

  @IsInt()
  @Min(1)
  @IsOptional()
  lookbackDays?: number

  @IsString()
  @MaxLength(120)
  @IsOptional()
  runnerName?: string

  @IsBoolean()
  @IsOptional()
  narrative?: boolean
}
