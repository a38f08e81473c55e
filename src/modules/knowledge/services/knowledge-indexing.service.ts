// modules/knowledge/services/knowledge-indexing.service.ts
import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { LlmService } from '../../llm/llm.service';
import { VectorDbService } from '../../vectordb/vectordb.service';
import { KnowledgeDocumentEntity } from '../../database/entities';
import { buildDocumentId, buildMetadata, readString } from '../knowledge.mapper';
import { BulkIndexStats, NewKnowledgeDocument } from '../interfaces/knowledge.interface';

const BULK_BATCH_SIZE = 5;

@Injectable()
export class KnowledgeIndexingService {
  private readonly logger = new Logger(KnowledgeIndexingService.name);
  private readonly defaultLanguage: string;

  constructor(
    private configService: ConfigService,
    private vectorDbService: VectorDbService,
    private llmService: LlmService,
    @InjectRepository(KnowledgeDocumentEntity)
    private documentRepository: Repository<KnowledgeDocumentEntity>,
  ) {
    this.defaultLanguage = this.configService.get<string>('knowledge.defaultLanguage') || 'hr';
  }

  /**
   * Index one document (Pinecone + registry). A registry failure removes a
   * newly written vector again; a re-indexed one is left in place. Returns
   * false instead of throwing so bulk runs can count.
   */
  async addDocument(document: NewKnowledgeDocument): Promise<boolean> {
    const docId = buildDocumentId(document);
    let vectorCreated = false;

    try {
      const existing = await this.documentRepository.findOne({ where: { id: docId } });
      const embedding = await this.llmService.generateEmbedding(document.text);
      const indexedAt = new Date();
      const metadata = buildMetadata(document, this.defaultLanguage, indexedAt);

      await this.vectorDbService.upsertDocument({ id: docId, embedding, metadata });
      vectorCreated = !existing;

      // text already lives in the content column
      const { text: _text, ...registryMetadata } = metadata;
      await this.documentRepository.save({
        id: docId,
        content: document.text,
        source: readString(metadata, 'source'),
        documentType: readString(metadata, 'document_type'),
        language: readString(metadata, 'language'),
        countryCode: readString(metadata, 'country_code'),
        metadata: registryMetadata,
        isActive: true,
        indexedAt,
      });

      this.logger.log(`✅ Added document ${docId} to knowledge base`);
      return true;
    } catch (error) {
      this.logger.error(`Error adding document ${docId}:`, error);

      if (vectorCreated) {
        await this.vectorDbService
          .deleteDocument(docId)
          .catch((e: unknown) => this.logger.error('Rollback failed for Pinecone:', e));
      }
      return false;
    }
  }

  /**
   * Index many documents, a few at a time
   */
  async bulkIndexDocuments(documents: NewKnowledgeDocument[]): Promise<BulkIndexStats> {
    const stats: BulkIndexStats = { total: documents.length, success: 0, failed: 0 };

    for (let i = 0; i < documents.length; i += BULK_BATCH_SIZE) {
      const batch = documents.slice(i, i + BULK_BATCH_SIZE);
      const results = await Promise.allSettled(batch.map((doc) => this.addDocument(doc)));

      for (const result of results) {
        if (result.status === 'fulfilled' && result.value) {
          stats.success++;
        } else {
          stats.failed++;
        }
      }
    }

    this.logger.log(`📚 Bulk indexing complete: ${JSON.stringify(stats)}`);
    return stats;
  }

  async listDocuments(limit: number = 50, offset: number = 0): Promise<KnowledgeDocumentEntity[]> {
    return this.documentRepository.find({
      where: { isActive: true },
      order: { indexedAt: 'DESC' },
      take: Math.min(limit, 100),
      skip: offset,
    });
  }

  async deleteDocument(id: string): Promise<void> {
    const existing = await this.documentRepository.findOne({ where: { id } });
    if (!existing) {
      throw new NotFoundException(`Document ${id} not found`);
    }

    await this.vectorDbService.deleteDocument(id);
    await this.documentRepository.delete({ id });
    this.logger.log(`🗑️ Document ${id} removed from knowledge base`);
  }
}
