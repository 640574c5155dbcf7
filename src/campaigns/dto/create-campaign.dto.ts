import {
  ArrayMaxSize,
  ArrayNotEmpty,
  IsArray,
  IsEnum,
  IsInt,
  IsNumber,
  IsOptional,
  IsPositive,
  IsString,
  MaxLength,
  Min,
} from 'class-validator';
import { CoverageProfile } from '../../coverage/interfaces/coverage.interface';

export class CreateCampaignDto {
  /** Density table key such as `los-angeles-ca`, or free text for a fallback unit */
  @IsString()
  @MaxLength(120)
  region!: string;

  @IsString()
  @IsOptional()
  @MaxLength(255)
  regionLabel?: string;

  @IsArray()
  @ArrayNotEmpty()
  @ArrayMaxSize(20)
  @IsString({ each: true })
  @MaxLength(100, { each: true })
  keywords!: string[];

  @IsNumber()
  @IsPositive()
  costCeiling!: number;

  @IsEnum(CoverageProfile)
  @IsOptional()
  profile?: CoverageProfile;

  @IsInt()
  @Min(1)
  @IsOptional()
  maxUnits?: number;
}
