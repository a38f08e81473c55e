// modules/pinecone/pinecone.service.ts
import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  IndexStatsDescription,
  Pinecone,
  RecordMetadata,
  type Index,
} from '@pinecone-database/pinecone';
import { DependencyHealth } from '../../common/interfaces/health.interface';
import { errorMessage } from '../../common/utils/error.util';

const SERVERLESS_CLOUDS = ['aws', 'gcp', 'azure'] as const;
type ServerlessCloud = (typeof SERVERLESS_CLOUDS)[number];

function isServerlessCloud(value: string): value is ServerlessCloud {
  return SERVERLESS_CLOUDS.some((cloud) => cloud === value);
}

@Injectable()
export class PineconeService {
  private readonly logger = new Logger(PineconeService.name);
  private readonly pinecone: Pinecone;
  private readonly indexName: string;
  private readonly dimension: number;
  private readonly cloud: ServerlessCloud;
  private readonly region: string;

  constructor(private configService: ConfigService) {
    const apiKey = this.configService.get<string>('vectorDb.pinecone.apiKey') || '';

    this.pinecone = new Pinecone({ apiKey });
    this.indexName =
      this.configService.get<string>('vectorDb.pinecone.indexName') || 'agro-knowledge';
    this.dimension = this.configService.get<number>('embedding.dimension') || 384;

    const cloud = this.configService.get<string>('vectorDb.pinecone.cloud') || 'aws';
    this.cloud = isServerlessCloud(cloud) ? cloud : 'aws';
    this.region = this.configService.get<string>('vectorDb.pinecone.region') || 'us-east-1';

    this.logger.log('✅ Pinecone client initialized');
  }

  /**
   * Check if the index already exists
   */
  async indexExists(): Promise<boolean> {
    try {
      const indexList = await this.pinecone.listIndexes();
      const exists = indexList.indexes?.some((index) => index.name === this.indexName) || false;

      if (exists) {
        this.logger.log(`✅ Index "${this.indexName}" already exists`);
      } else {
        this.logger.log(`ℹ️ Index "${this.indexName}" does not exist`);
      }

      return exists;
    } catch (error) {
      this.logger.error('❌ Error checking index existence:', error);
      return false;
    }
  }

  /**
   * Create the Pinecone index if it doesn't exist
   */
  async createIndexIfNotExists(): Promise<void> {
    const exists = await this.indexExists();

    if (exists) {
      this.logger.log('⏭️ Skipping index creation - already exists');
      return;
    }

    try {
      this.logger.log(`📝 Creating Pinecone index: ${this.indexName} (${this.dimension} dims)`);

      await this.pinecone.createIndex({
        name: this.indexName,
        dimension: this.dimension,
        metric: 'cosine',
        spec: {
          serverless: {
            cloud: this.cloud,
            region: this.region,
          },
        },
      });

      this.logger.log(`✅ Index "${this.indexName}" created successfully`);

      await this.waitForIndexReady();
    } catch (error) {
      this.logger.error('❌ Failed to create index:', error);
      throw error;
    }
  }

  /**
   * Wait for the index to be ready after creation
   */
  private async waitForIndexReady(maxAttempts: number = 30): Promise<void> {
    this.logger.log('⏳ Waiting for index to be ready...');

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      try {
        await this.getIndex().describeIndexStats();
        this.logger.log('✅ Index is ready!');
        return;
      } catch {
        this.logger.log(`⏳ Waiting... (${attempt}/${maxAttempts})`);
        await new Promise((resolve) => setTimeout(resolve, 10000));
      }
    }

    throw new Error(
      `Index "${this.indexName}" failed to become ready after ${maxAttempts} attempts`,
    );
  }

  /**
   * Get index statistics
   */
  async getIndexStats(): Promise<IndexStatsDescription> {
    try {
      return await this.getIndex().describeIndexStats();
    } catch (error) {
      this.logger.error('❌ Failed to get index stats:', error);
      throw error;
    }
  }

  /**
   * Health check for Pinecone connectivity
   */
  async isHealthy(): Promise<DependencyHealth> {
    const start = Date.now();
    try {
      await this.getIndex().describeIndexStats();
      return { healthy: true, latencyMs: Date.now() - start };
    } catch (error) {
      return { healthy: false, error: errorMessage(error) };
    }
  }

  /**
   * Data-plane handle on the knowledge index
   */
  getIndex(): Index<RecordMetadata> {
    return this.pinecone.index<RecordMetadata>(this.indexName);
  }

  /**
   * Get the Pinecone client instance (for control-plane operations)
   */
  getClient(): Pinecone {
    return this.pinecone;
  }

  /**
   * Get the index name
   */
  getIndexName(): string {
    return this.indexName;
  }
}
