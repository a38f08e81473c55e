import { Type } from 'class-transformer';
import {
  ArrayNotEmpty,
  IsArray,
  IsBoolean,
  IsEnum,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Length,
  Max,
  Min,
  ValidateNested,
} from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { InformationRelevance } from '../interfaces/information.interface';

export class LocalizationContextDto {
  @ApiProperty({ example: '+385911234567' })
  @IsString()
  @IsNotEmpty()
  whatsappNumber!: string;

  @ApiProperty({ example: 'HR' })
  @IsString()
  @Length(2, 2)
  countryCode!: string;

  @ApiProperty({ example: 'Croatia' })
  @IsString()
  countryName!: string;

  @ApiProperty({ example: ['hr'] })
  @IsArray()
  @IsString({ each: true })
  languages!: string[];

  @ApiPropertyOptional({ example: 123 })
  @IsOptional()
  @IsInt()
  @Min(1)
  farmerId?: number;

  @ApiPropertyOptional({ example: 'hr' })
  @IsOptional()
  @IsString()
  preferredLanguage?: string;

  @ApiPropertyOptional({ example: 'Europe/Zagreb' })
  @IsOptional()
  @IsString()
  timezone?: string;

  @ApiPropertyOptional({ example: ['continental'] })
  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  agriculturalZones?: string[];
}

export class InformationQueryDto {
  @ApiProperty({ example: 'When should I spray my wheat against fusarium?' })
  @IsString()
  @IsNotEmpty()
  queryText!: string;

  @ApiProperty({ type: LocalizationContextDto })
  @ValidateNested()
  @Type(() => LocalizationContextDto)
  context!: LocalizationContextDto;

  @ApiPropertyOptional({
    enum: InformationRelevance,
    isArray: true,
    description: 'Tiers to query; all by default',
  })
  @IsOptional()
  @IsArray()
  @ArrayNotEmpty()
  @IsEnum(InformationRelevance, { each: true })
  requiredRelevanceLevels?: InformationRelevance[];

  @ApiPropertyOptional({ example: 5, minimum: 1, maximum: 20 })
  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(20)
  maxItemsPerLevel?: number;

  @ApiPropertyOptional({ example: true, description: 'Attach item metadata to the response' })
  @IsOptional()
  @IsBoolean()
  includeMetadata?: boolean;
}
