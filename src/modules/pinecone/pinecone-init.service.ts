// modules/pinecone/pinecone-init.service.ts
import { Injectable, OnModuleInit, Logger } from '@nestjs/common';
import { PineconeService } from './pinecone.service';

@Injectable()
export class PineconeInitService implements OnModuleInit {
  private readonly logger = new Logger(PineconeInitService.name);

  constructor(private readonly pineconeService: PineconeService) {}

  async onModuleInit() {
    try {
      this.logger.log('🚀 Initializing knowledge index...');
      await this.pineconeService.createIndexIfNotExists();
      this.logger.log('✅ Knowledge index ready');
    } catch (error) {
      // Search degrades to empty results until the index exists
      this.logger.error('❌ Failed to initialize Pinecone:', error);
    }
  }
}
