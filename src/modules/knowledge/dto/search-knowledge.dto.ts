import { Type } from 'class-transformer';
import {
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

export class KnowledgeFiltersDto {
  @ApiPropertyOptional({ description: 'Document type', example: 'pesticide' })
  @IsOptional()
  @IsString()
  documentType?: string;

  @ApiPropertyOptional({ description: 'Crop (case-insensitive)', example: 'wheat' })
  @IsOptional()
  @IsString()
  crop?: string;

  @ApiPropertyOptional({ description: 'Active substance or product (case-insensitive)', example: 'prosaro' })
  @IsOptional()
  @IsString()
  chemical?: string;

  @ApiPropertyOptional({ description: 'Document language', example: 'hr' })
  @IsOptional()
  @IsString()
  language?: string;

  @ApiPropertyOptional({ description: 'ISO country code, or GLOBAL', example: 'HR' })
  @IsOptional()
  @IsString()
  @Length(2, 6)
  countryCode?: string;
}

export class SearchKnowledgeDto {
  @ApiProperty({
    description: 'Search query, in any language',
    example: 'Koliko je karenca za Prosaro u pšenici?',
  })
  @IsString()
  @IsNotEmpty()
  query!: string;

  @ApiPropertyOptional({ type: KnowledgeFiltersDto })
  @IsOptional()
  @ValidateNested()
  @Type(() => KnowledgeFiltersDto)
  filters?: KnowledgeFiltersDto;

  @ApiPropertyOptional({ description: 'Number of results (1-50)', example: 5 })
  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(50)
  topK?: number;
}
