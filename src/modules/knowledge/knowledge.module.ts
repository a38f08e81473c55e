import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { KnowledgeController } from './knowledge.controller';
import { KnowledgeIndexingService, KnowledgeSearchService } from './services';
import { VectordbModule } from '../vectordb/vectordb.module';
import { LlmModule } from '../llm/llm.module';
import { PineconeModule } from '../pinecone/pinecone.module';
import { KnowledgeDocumentEntity } from '../database/entities';

@Module({
  imports: [
    TypeOrmModule.forFeature([KnowledgeDocumentEntity]),
    VectordbModule,
    LlmModule,
    PineconeModule,
  ],
  controllers: [KnowledgeController],
  providers: [KnowledgeSearchService, KnowledgeIndexingService],
  exports: [KnowledgeSearchService, KnowledgeIndexingService],
})
export class KnowledgeModule {}
