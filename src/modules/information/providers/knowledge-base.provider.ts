import { Injectable } from '@nestjs/common';
import { KnowledgeSearchService } from '../../knowledge/services';
import {
  GLOBAL_COUNTRY_CODE,
  KnowledgeDocument,
} from '../../knowledge/interfaces/knowledge.interface';
import { InformationProvider } from './information-provider.interface';
import {
  InformationItem,
  InformationQuery,
  InformationRelevance,
} from '../interfaces/information.interface';

/**
 * Country and global knowledge from the document index. Only the query text
 * and the country code leave the service; farmer records never do.
 */
@Injectable()
export class KnowledgeBaseProvider implements InformationProvider {
  constructor(private readonly knowledgeSearchService: KnowledgeSearchService) {}

  async fetchCountryItems(query: InformationQuery): Promise<InformationItem[]> {
    const documents = await this.knowledgeSearchService.search(
      query.queryText,
      { countryCode: query.context.countryCode },
      query.maxItemsPerLevel,
    );
    return documents.map((doc) => toItem(doc, InformationRelevance.COUNTRY_SPECIFIC));
  }

  async fetchGlobalItems(query: InformationQuery): Promise<InformationItem[]> {
    const documents = await this.knowledgeSearchService.search(
      query.queryText,
      { countryCode: GLOBAL_COUNTRY_CODE },
      query.maxItemsPerLevel,
    );
    return documents.map((doc) => toItem(doc, InformationRelevance.GLOBAL));
  }
}

function toItem(doc: KnowledgeDocument, relevance: InformationRelevance): InformationItem {
  const countryCode = doc.metadata.country_code;
  return {
    content: doc.text,
    relevance,
    countryCode:
      relevance === InformationRelevance.COUNTRY_SPECIFIC && typeof countryCode === 'string'
        ? countryCode
        : undefined,
    language: doc.language,
    sourceType: 'rag',
    metadata: {
      documentId: doc.id,
      document: doc.source,
      documentType: doc.documentType,
      relevanceScore: doc.score,
    },
  };
}
