// modules/information/services/answer.service.ts
import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { LlmService } from '../../llm/llm.service';
import { InformationHierarchyService } from './information-hierarchy.service';
import { InformationQueryInput, InformationResult } from '../interfaces/information.interface';
import { SerializedInformationResult, serializeResult } from '../information-result.util';

export interface AnswerResult {
  answer: string;
  result: SerializedInformationResult;
}

const SECTIONS: Array<{ key: 'farmerItems' | 'countryItems' | 'globalItems'; title: string }> = [
  { key: 'farmerItems', title: 'Farmer-specific information' },
  { key: 'countryItems', title: 'Country-specific information' },
  { key: 'globalItems', title: 'General information' },
];

/**
 * Answers a farmer's question grounded in the information hierarchy
 */
@Injectable()
export class AnswerService {
  private readonly logger = new Logger(AnswerService.name);
  private readonly instructions: string;
  private readonly temperature: number;

  constructor(
    private configService: ConfigService,
    private hierarchyService: InformationHierarchyService,
    private llmService: LlmService,
  ) {
    this.instructions = this.configService.get<string>('hierarchy.instructions') || '';
    this.temperature = this.configService.get<number>('llm.temperature') ?? 0.3;
  }

  async answer(input: InformationQueryInput): Promise<AnswerResult> {
    const startTime = Date.now();
    const result = await this.hierarchyService.queryInformation(input);

    const answer = await this.llmService.generateResponse(
      [{ role: 'user', content: result.query.queryText }],
      this.buildSystemPrompt(result),
      this.temperature,
    );

    this.logger.log(
      `💬 Answered query ${result.metadata.queryId} with ${result.metadata.totalItems} items in ${Date.now() - startTime}ms`,
    );

    return { answer, result: serializeResult(result) };
  }

  buildSystemPrompt(result: InformationResult): string {
    const parts = [this.instructions];

    const language = result.query.context.preferredLanguage;
    if (language) {
      parts.push(`Answer in the language with code "${language}".`);
    }

    const context = this.buildContext(result);
    parts.push(
      context ||
        'No information was found in the knowledge base. Say so, then answer from general agronomy knowledge.',
    );

    return parts.filter((part) => part.length > 0).join('\n\n');
  }

  /**
   * Numbered context, most specific tier first
   */
  buildContext(result: InformationResult): string {
    let counter = 0;
    const sections: string[] = [];

    for (const { key, title } of SECTIONS) {
      const items = result[key];
      if (items.length === 0) continue;
      const lines = items.map((item) => `[${++counter}] ${item.content}`);
      sections.push(`${title}:\n${lines.join('\n')}`);
    }

    if (sections.length === 0) return '';
    return `Relevant information (most specific first):\n\n${sections.join('\n\n')}`;
  }
}
