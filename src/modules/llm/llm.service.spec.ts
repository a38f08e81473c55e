import { ServiceUnavailableException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Test, TestingModule } from '@nestjs/testing';
import { LlmService } from './llm.service';

const mockCreate = jest.fn();
const mockFeatureExtraction = jest.fn();

jest.mock('groq-sdk', () => ({
  __esModule: true,
  default: jest.fn().mockImplementation(() => ({
    chat: { completions: { create: mockCreate } },
  })),
}));

jest.mock('@huggingface/inference', () => ({
  InferenceClient: jest.fn().mockImplementation(() => ({
    featureExtraction: mockFeatureExtraction,
  })),
}));

describe('LlmService', () => {
  let service: LlmService;

  beforeEach(async () => {
    mockCreate.mockReset();
    mockFeatureExtraction.mockReset();

    const config: Record<string, unknown> = {
      'llm.groq.apiKey': 'test-groq-key',
      'llm.groq.model': 'test-model',
      'llm.huggingface.apiKey': 'test-hf-key',
      'llm.maxTokens': 256,
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        LlmService,
        { provide: ConfigService, useValue: { get: jest.fn((key: string) => config[key]) } },
      ],
    }).compile();

    service = module.get<LlmService>(LlmService);
  });

  describe('generateEmbedding', () => {
    it('returns a flat embedding as is', async () => {
      mockFeatureExtraction.mockResolvedValue([0.1, 0.2, 0.3]);

      await expect(service.generateEmbedding('wheat')).resolves.toEqual([0.1, 0.2, 0.3]);
    });

    it('unwraps a batch of one', async () => {
      mockFeatureExtraction.mockResolvedValue([[0.4, 0.5]]);

      await expect(service.generateEmbedding('wheat')).resolves.toEqual([0.4, 0.5]);
    });

    it('rejects an unexpected shape', async () => {
      mockFeatureExtraction.mockResolvedValue([[[0.1]]]);

      await expect(service.generateEmbedding('wheat')).rejects.toThrow(
        'Unexpected embedding format from Hugging Face API',
      );
    });

    it('opens the circuit after five failures', async () => {
      mockFeatureExtraction.mockRejectedValue(new Error('timeout'));

      for (let i = 0; i < 5; i++) {
        await expect(service.generateEmbedding('wheat')).rejects.toThrow('timeout');
      }

      expect(service.getCircuitBreakerStatus().huggingface.isOpen).toBe(true);
      await expect(service.generateEmbedding('wheat')).rejects.toBeInstanceOf(
        ServiceUnavailableException,
      );
      expect(mockFeatureExtraction).toHaveBeenCalledTimes(5);
    });
  });

  describe('generateResponse', () => {
    it('sends the system prompt first and returns the completion text', async () => {
      mockCreate.mockResolvedValue({ choices: [{ message: { content: 'Spray in the evening.' } }] });

      const answer = await service.generateResponse(
        [{ role: 'user', content: 'When to spray?' }],
        'You are an agronomist.',
        0.2,
      );

      expect(answer).toBe('Spray in the evening.');
      expect(mockCreate).toHaveBeenCalledWith({
        model: 'test-model',
        messages: [
          { role: 'system', content: 'You are an agronomist.' },
          { role: 'user', content: 'When to spray?' },
        ],
        temperature: 0.2,
        max_tokens: 256,
      });
    });

    it('returns an empty string when the model sends no content', async () => {
      mockCreate.mockResolvedValue({ choices: [] });

      await expect(
        service.generateResponse([{ role: 'user', content: 'Hello' }]),
      ).resolves.toBe('');
    });

    it('resets the failure count after a success', async () => {
      mockCreate.mockRejectedValueOnce(new Error('rate limited'));
      mockCreate.mockResolvedValueOnce({ choices: [{ message: { content: 'ok' } }] });

      await expect(service.generateResponse([{ role: 'user', content: 'a' }])).rejects.toThrow(
        'rate limited',
      );
      expect(service.getCircuitBreakerStatus().groq.failures).toBe(1);

      await service.generateResponse([{ role: 'user', content: 'b' }]);
      expect(service.getCircuitBreakerStatus().groq.failures).toBe(0);
    });
  });
});
