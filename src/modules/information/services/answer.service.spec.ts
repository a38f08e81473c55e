import { ConfigService } from '@nestjs/config';
import { Test, TestingModule } from '@nestjs/testing';
import { AnswerService } from './answer.service';
import { InformationHierarchyService } from './information-hierarchy.service';
import { LlmService } from '../../llm/llm.service';
import {
  InformationItem,
  InformationRelevance,
  InformationResult,
} from '../interfaces/information.interface';

function buildResult(
  items: Partial<Pick<InformationResult, 'farmerItems' | 'countryItems' | 'globalItems'>>,
  preferredLanguage?: string,
): InformationResult {
  return {
    query: {
      queryText: 'When do I spray wheat?',
      context: {
        whatsappNumber: '+385910000000',
        countryCode: 'HR',
        countryName: 'Croatia',
        languages: ['hr'],
        preferredLanguage,
      },
      requiredRelevanceLevels: [InformationRelevance.GLOBAL],
      maxItemsPerLevel: 5,
      includeMetadata: false,
    },
    farmerItems: items.farmerItems ?? [],
    countryItems: items.countryItems ?? [],
    globalItems: items.globalItems ?? [],
    metadata: {
      queryId: 'q-1',
      queryTimestamp: '2024-05-01T08:00:00.000Z',
      sourcesUsed: [],
      totalItems: 0,
      contextHash: 'abc',
      cached: false,
    },
  };
}

function item(content: string, relevance: InformationRelevance): InformationItem {
  return { content, relevance, sourceType: 'rag' };
}

describe('AnswerService', () => {
  let service: AnswerService;
  const queryInformation = jest.fn();
  const generateResponse = jest.fn();

  async function createService(instructions?: string): Promise<AnswerService> {
    const config: Record<string, unknown> = {
      'hierarchy.instructions': instructions,
      'llm.temperature': 0.2,
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        AnswerService,
        { provide: ConfigService, useValue: { get: jest.fn((key: string) => config[key]) } },
        { provide: InformationHierarchyService, useValue: { queryInformation } },
        { provide: LlmService, useValue: { generateResponse } },
      ],
    }).compile();

    return module.get<AnswerService>(AnswerService);
  }

  beforeEach(async () => {
    jest.clearAllMocks();
    service = await createService('You are an agronomist.');
  });

  describe('buildContext', () => {
    it('numbers items across tiers, skipping empty ones', () => {
      const result = buildResult({
        farmerItems: [item('Field "North": wheat', InformationRelevance.FARMER_SPECIFIC)],
        globalItems: [
          item('Spray at flowering', InformationRelevance.GLOBAL),
          item('Use resistant varieties', InformationRelevance.GLOBAL),
        ],
      });

      expect(service.buildContext(result)).toBe(
        'Relevant information (most specific first):\n\n' +
          'Farmer-specific information:\n[1] Field "North": wheat\n\n' +
          'General information:\n[2] Spray at flowering\n[3] Use resistant varieties',
      );
    });

    it('is empty when nothing was found', () => {
      expect(service.buildContext(buildResult({}))).toBe('');
    });
  });

  describe('buildSystemPrompt', () => {
    it('joins instructions, language and context', () => {
      const result = buildResult(
        { countryItems: [item('HR advisory', InformationRelevance.COUNTRY_SPECIFIC)] },
        'hr',
      );

      expect(service.buildSystemPrompt(result)).toBe(
        'You are an agronomist.\n\n' +
          'Answer in the language with code "hr".\n\n' +
          'Relevant information (most specific first):\n\n' +
          'Country-specific information:\n[1] HR advisory',
      );
    });

    it('falls back when there is no context or instructions', async () => {
      const bare = await createService();

      expect(bare.buildSystemPrompt(buildResult({}))).toBe(
        'No information was found in the knowledge base. Say so, then answer from general agronomy knowledge.',
      );
    });
  });

  describe('answer', () => {
    it('asks the model with the grounded prompt', async () => {
      const result = buildResult({
        globalItems: [item('Spray at flowering', InformationRelevance.GLOBAL)],
      });
      queryInformation.mockResolvedValue(result);
      generateResponse.mockResolvedValue('Spray at early flowering.');

      const response = await service.answer({
        queryText: 'When do I spray wheat?',
        context: result.query.context,
      });

      expect(generateResponse).toHaveBeenCalledWith(
        [{ role: 'user', content: 'When do I spray wheat?' }],
        service.buildSystemPrompt(result),
        0.2,
      );
      expect(response.answer).toBe('Spray at early flowering.');
      expect(response.result.items.global).toEqual([
        { content: 'Spray at flowering', source: 'rag' },
      ]);
      expect(response.result.metadata.queryId).toBe('q-1');
    });
  });
});
