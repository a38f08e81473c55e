import { Injectable } from '@nestjs/common';
import { LlmService } from '../../llm/llm.service';
import { InformationProvider } from './information-provider.interface';
import {
  InformationItem,
  InformationQuery,
  InformationRelevance,
} from '../interfaces/information.interface';

const EXTERNAL_PROMPT =
  'You provide general, location-independent agricultural knowledge. ' +
  'Answer in at most five sentences. If you are unsure, say so.';

/**
 * General knowledge from the chat model. Receives the question text only.
 */
@Injectable()
export class ExternalKnowledgeProvider implements InformationProvider {
  constructor(private readonly llmService: LlmService) {}

  async fetchGlobalItems(query: InformationQuery): Promise<InformationItem[]> {
    const answer = await this.llmService.generateResponse(
      [{ role: 'user', content: query.queryText }],
      EXTERNAL_PROMPT,
      0.3,
    );

    if (!answer.trim()) return [];

    return [
      {
        content: answer.trim(),
        relevance: InformationRelevance.GLOBAL,
        sourceType: 'external',
        metadata: { provider: 'llm' },
      },
    ];
  }
}
