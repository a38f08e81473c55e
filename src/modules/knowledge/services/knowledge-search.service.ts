// modules/knowledge/services/knowledge-search.service.ts
import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { LlmService } from '../../llm/llm.service';
import { VectorDbService } from '../../vectordb/vectordb.service';
import { errorMessage } from '../../../common/utils/error.util';
import { buildFilter, readString, toKnowledgeDocument, toProtectionType } from '../knowledge.mapper';
import {
  CropProtectionGroups,
  CropProtectionResult,
  KnowledgeDocument,
  KnowledgeFilters,
  PesticideInfoResult,
} from '../interfaces/knowledge.interface';

@Injectable()
export class KnowledgeSearchService {
  private readonly logger = new Logger(KnowledgeSearchService.name);
  private readonly topK: number;
  private readonly defaultLanguage: string;

  constructor(
    private configService: ConfigService,
    private vectorDbService: VectorDbService,
    private llmService: LlmService,
  ) {
    this.topK = this.configService.get<number>('knowledge.topK') || 5;
    this.defaultLanguage = this.configService.get<string>('knowledge.defaultLanguage') || 'hr';
  }

  /**
   * Semantic search over the knowledge base. Query text may be in any language.
   * Failures are logged and read as "nothing found".
   */
  async search(
    query: string,
    filters?: KnowledgeFilters,
    topK: number = this.topK,
  ): Promise<KnowledgeDocument[]> {
    try {
      const embedding = await this.llmService.generateEmbedding(query);
      const matches = await this.vectorDbService.search(
        embedding,
        topK,
        filters ? buildFilter(filters) : undefined,
      );

      const documents = matches.map((match) => toKnowledgeDocument(match, this.defaultLanguage));

      this.logger.log(`🔍 Found ${documents.length} documents for query: ${query}`);
      return documents;
    } catch (error) {
      this.logger.error(`Knowledge search error: ${errorMessage(error)}`);
      return [];
    }
  }

  /**
   * Pre-harvest interval lookup, e.g. "Koliko je karenca za Prosaro u pšenici?"
   */
  async searchPesticideInfo(chemical: string, crop?: string): Promise<PesticideInfoResult> {
    try {
      const query = crop ? `${chemical} ${crop}` : chemical;
      const filters: KnowledgeFilters = { documentType: 'pesticide', chemical };
      if (crop) {
        filters.crop = crop;
      }

      const documents = await this.search(query, filters, 3);

      const withPhi = documents.find((doc) => doc.phiDays !== undefined);
      if (withPhi && withPhi.phiDays !== undefined) {
        return {
          found: true,
          pesticideInfo: {
            chemical,
            crop: crop || withPhi.crop || '',
            phiDays: withPhi.phiDays,
            source: withPhi.source,
            additionalInfo: withPhi.text,
          },
          documents,
        };
      }

      return {
        found: false,
        message: `No PHI information found for ${chemical}`,
        documents,
      };
    } catch (error) {
      this.logger.error(`Pesticide search error: ${errorMessage(error)}`);
      return { found: false, error: errorMessage(error) };
    }
  }

  /**
   * Crop protection recommendations grouped by protection type
   */
  async searchCropProtection(crop: string, problem?: string): Promise<CropProtectionResult> {
    try {
      const query = problem ? `${crop} protection ${problem}` : `${crop} protection`;
      const documents = await this.search(query, { documentType: 'crop_protection', crop }, 5);

      const groups: CropProtectionGroups = {
        fungicides: [],
        insecticides: [],
        herbicides: [],
        general: [],
      };

      for (const doc of documents) {
        const { metadata } = doc;
        groups[toProtectionType(readString(metadata, 'protection_type'))].push({
          chemical: readString(metadata, 'chemical') ?? '',
          target: readString(metadata, 'target_pest') ?? '',
          dosage: readString(metadata, 'dosage') ?? '',
          timing: readString(metadata, 'application_timing') ?? '',
          text: doc.text,
        });
      }

      return groups;
    } catch (error) {
      this.logger.error(`Crop protection search error: ${errorMessage(error)}`);
      return { error: errorMessage(error) };
    }
  }
}
