// modules/llm/llm.service.ts
import { Injectable, Logger, ServiceUnavailableException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Groq from 'groq-sdk';
import { InferenceClient } from '@huggingface/inference';

/**
 * Circuit Breaker State
 */
export interface CircuitBreakerState {
  failures: number;
  lastFailure: number;
  isOpen: boolean;
}

export type LlmProvider = 'groq' | 'huggingface';

export interface ChatMessage {
  role: 'user' | 'assistant';
  content: string;
}

function isNumberArray(value: unknown): value is number[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'number');
}

@Injectable()
export class LlmService {
  private readonly logger = new Logger(LlmService.name);
  private readonly groq: Groq;
  private readonly hfClient: InferenceClient;

  // Cache config values to avoid repeated lookups
  private readonly model: string;
  private readonly embeddingModel: string;
  private readonly maxTokens: number;

  // Circuit Breaker configuration
  private readonly FAILURE_THRESHOLD = 5;
  private readonly RECOVERY_TIMEOUT = 30000; // 30 seconds

  private circuitBreakers = new Map<LlmProvider, CircuitBreakerState>([
    ['groq', { failures: 0, lastFailure: 0, isOpen: false }],
    ['huggingface', { failures: 0, lastFailure: 0, isOpen: false }],
  ]);

  constructor(private configService: ConfigService) {
    this.groq = new Groq({
      apiKey: this.configService.get<string>('llm.groq.apiKey'),
    });

    this.hfClient = new InferenceClient(
      this.configService.get<string>('llm.huggingface.apiKey') || '',
    );

    this.model = this.configService.get<string>('llm.groq.model') || 'llama-3.3-70b-versatile';
    this.embeddingModel =
      this.configService.get<string>('llm.huggingface.embeddingModel') ||
      'sentence-transformers/all-MiniLM-L6-v2';
    this.maxTokens = this.configService.get<number>('llm.maxTokens') || 1024;

    this.logger.log(`✅ LLM Service initialized with Groq (${this.model})`);
  }

  /**
   * Check if circuit is open (preventing calls)
   */
  private isCircuitOpen(service: LlmProvider): boolean {
    const breaker = this.circuitBreakers.get(service);
    if (!breaker) return false;

    if (breaker.isOpen) {
      if (Date.now() - breaker.lastFailure > this.RECOVERY_TIMEOUT) {
        this.logger.log(`🔄 Circuit breaker for ${service} entering half-open state`);
        breaker.isOpen = false;
        breaker.failures = 0;
        return false;
      }
      return true;
    }
    return false;
  }

  /**
   * Record a failure and potentially open the circuit
   */
  private recordFailure(service: LlmProvider): void {
    const breaker = this.circuitBreakers.get(service);
    if (!breaker) return;

    breaker.failures++;
    breaker.lastFailure = Date.now();

    if (breaker.failures >= this.FAILURE_THRESHOLD) {
      breaker.isOpen = true;
      this.logger.warn(`🔴 Circuit breaker OPEN for ${service} after ${breaker.failures} failures`);
    }
  }

  /**
   * Record a success and reset failures
   */
  private recordSuccess(service: LlmProvider): void {
    const breaker = this.circuitBreakers.get(service);
    if (!breaker) return;

    if (breaker.failures > 0) {
      this.logger.log(`✅ Circuit breaker for ${service} recovered`);
    }
    breaker.failures = 0;
    breaker.isOpen = false;
  }

  /**
   * Generate embeddings using Hugging Face Inference API.
   * The vector length must match EMBEDDING_DIMENSION of the index.
   */
  async generateEmbedding(text: string): Promise<number[]> {
    if (this.isCircuitOpen('huggingface')) {
      throw new ServiceUnavailableException(
        'HuggingFace API temporarily unavailable (circuit open)',
      );
    }

    try {
      const result = await this.hfClient.featureExtraction({
        model: this.embeddingModel,
        inputs: text,
        provider: 'hf-inference',
      });

      // Single input comes back either flat or wrapped in a batch of one
      const embedding = isNumberArray(result)
        ? result
        : Array.isArray(result) && isNumberArray(result[0])
          ? result[0]
          : null;

      if (!embedding) {
        throw new Error('Unexpected embedding format from Hugging Face API');
      }

      this.recordSuccess('huggingface');
      return embedding;
    } catch (error) {
      this.recordFailure('huggingface');
      this.logger.error('Embedding generation failed:', error);
      throw error;
    }
  }

  /**
   * Generate a response using Groq
   */
  async generateResponse(
    messages: ChatMessage[],
    systemPrompt?: string,
    temperature: number = 0.7,
  ): Promise<string> {
    if (this.isCircuitOpen('groq')) {
      throw new ServiceUnavailableException('Groq API temporarily unavailable (circuit open)');
    }

    try {
      const groqMessages: Array<{ role: 'system' | 'user' | 'assistant'; content: string }> = [];

      if (systemPrompt) {
        groqMessages.push({ role: 'system', content: systemPrompt });
      }
      groqMessages.push(...messages);

      const response = await this.groq.chat.completions.create({
        model: this.model,
        messages: groqMessages,
        temperature,
        max_tokens: this.maxTokens,
      });

      this.recordSuccess('groq');
      return response.choices[0]?.message?.content || '';
    } catch (error) {
      this.recordFailure('groq');
      this.logger.error('LLM generation failed:', error);
      throw error;
    }
  }

  /**
   * Get circuit breaker status for monitoring
   */
  getCircuitBreakerStatus(): Record<LlmProvider, CircuitBreakerState> {
    const status: Record<string, CircuitBreakerState> = {};
    this.circuitBreakers.forEach((state, service) => {
      status[service] = { ...state };
    });
    return {
      groq: status.groq,
      huggingface: status.huggingface,
    };
  }
}
