import { Type } from 'class-transformer';
import {
  ArrayMaxSize,
  ArrayNotEmpty,
  IsArray,
  IsIn,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Length,
  Min,
  ValidateNested,
} from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { PROTECTION_TYPES } from '../interfaces/knowledge.interface';

export class AddDocumentDto {
  @ApiProperty({
    description: 'Document text',
    example: 'Prosaro: karenca za pšenicu je 35 dana.',
  })
  @IsString()
  @IsNotEmpty()
  text!: string;

  @ApiPropertyOptional({ description: 'Where the document comes from', example: 'fis' })
  @IsOptional()
  @IsString()
  source?: string;

  @ApiPropertyOptional({ description: 'Document type', example: 'pesticide' })
  @IsOptional()
  @IsString()
  documentType?: string;

  @ApiPropertyOptional({ description: 'Document language', example: 'hr' })
  @IsOptional()
  @IsString()
  language?: string;

  @ApiPropertyOptional({ description: 'ISO country code; omit for global documents', example: 'HR' })
  @IsOptional()
  @IsString()
  @Length(2, 6)
  countryCode?: string;

  @ApiPropertyOptional({ example: 'wheat' })
  @IsOptional()
  @IsString()
  crop?: string;

  @ApiPropertyOptional({ example: 'Prosaro' })
  @IsOptional()
  @IsString()
  chemical?: string;

  @ApiPropertyOptional({ description: 'Pre-harvest interval in days', example: 35 })
  @IsOptional()
  @IsInt()
  @Min(0)
  phiDays?: number;

  @ApiPropertyOptional({ enum: [...PROTECTION_TYPES], example: 'fungicides' })
  @IsOptional()
  @IsIn(PROTECTION_TYPES)
  protectionType?: string;

  @ApiPropertyOptional({ example: 'fusarium head blight' })
  @IsOptional()
  @IsString()
  targetPest?: string;

  @ApiPropertyOptional({ example: '1 l/ha' })
  @IsOptional()
  @IsString()
  dosage?: string;

  @ApiPropertyOptional({ example: 'beginning of flowering' })
  @IsOptional()
  @IsString()
  applicationTiming?: string;
}

export class BulkIndexDocumentsDto {
  @ApiProperty({ description: 'Documents to index', type: [AddDocumentDto] })
  @IsArray()
  @ArrayNotEmpty()
  @ArrayMaxSize(500)
  @ValidateNested({ each: true })
  @Type(() => AddDocumentDto)
  documents!: AddDocumentDto[];
}
