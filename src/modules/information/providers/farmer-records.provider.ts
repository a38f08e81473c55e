import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Farmer, Field } from '../../database/entities';
import { InformationProvider } from './information-provider.interface';
import {
  InformationItem,
  InformationQuery,
  InformationRelevance,
} from '../interfaces/information.interface';

/**
 * Farmer-specific facts from the farmer database: the farmer's fields and
 * what is growing on them.
 */
@Injectable()
export class FarmerRecordsProvider implements InformationProvider {
  private readonly logger = new Logger(FarmerRecordsProvider.name);

  constructor(
    @InjectRepository(Farmer)
    private farmerRepository: Repository<Farmer>,
    @InjectRepository(Field)
    private fieldRepository: Repository<Field>,
  ) {}

  async fetchFarmerItems(query: InformationQuery): Promise<InformationItem[]> {
    const { farmerId, whatsappNumber } = query.context;
    if (typeof farmerId !== 'number') return [];

    const farmer = await this.farmerRepository.findOne({ where: { id: farmerId } });
    if (!farmer) {
      this.logger.warn(`Farmer ${farmerId} not found`);
      return [];
    }
    // the caller's number must own the record
    if (farmer.whatsappNumber !== whatsappNumber) {
      this.logger.warn(`Farmer ${farmerId} does not belong to the requesting number`);
      return [];
    }

    const fields = await this.fieldRepository.find({
      where: { farmerId },
      order: { name: 'ASC' },
    });

    return fields.map((field) => ({
      content: describeField(field),
      relevance: InformationRelevance.FARMER_SPECIFIC,
      farmerId,
      countryCode: farmer.countryCode,
      language: farmer.preferredLanguage ?? undefined,
      sourceType: 'database',
      metadata: { table: 'fields', fieldId: field.id },
    }));
  }
}

export function describeField(field: Field): string {
  const parts = [`Field "${field.name}": ${field.crop ?? 'no crop recorded'}`];
  if (field.areaHectares !== null) {
    parts.push(`${field.areaHectares} ha`);
  }
  if (field.plantingDate) {
    parts.push(`planted ${field.plantingDate}`);
  }
  return parts.join(', ');
}
