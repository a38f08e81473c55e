// modules/vectordb/vectordb.service.ts
import { Injectable, Logger } from '@nestjs/common';
import {
  VectorDocument,
  VectorFilter,
  VectorIndexInfo,
  VectorIndexStats,
  VectorSearchResult,
} from './interfaces/vector/vector.interface';
import { PineconeService } from '../pinecone/pinecone.service';

@Injectable()
export class VectorDbService {
  private readonly logger = new Logger(VectorDbService.name);

  constructor(private pineconeService: PineconeService) {}

  /**
   * Store a document in the vector database
   */
  async upsertDocument(doc: VectorDocument): Promise<void> {
    try {
      await this.pineconeService.getIndex().upsert([
        {
          id: doc.id,
          values: doc.embedding,
          metadata: doc.metadata,
        },
      ]);

      this.logger.log(`📝 Document stored: ${doc.id}`);
    } catch (error) {
      this.logger.error('Failed to upsert document:', error);
      throw error;
    }
  }

  /**
   * Search for similar documents with metadata filtering
   */
  async search(
    queryEmbedding: number[],
    topK: number = 5,
    filter?: VectorFilter,
  ): Promise<VectorSearchResult[]> {
    try {
      const results = await this.pineconeService.getIndex().query({
        vector: queryEmbedding,
        topK,
        includeMetadata: true,
        ...(filter && Object.keys(filter).length > 0 ? { filter } : {}),
      });

      return results.matches.map((match) => ({
        id: match.id,
        score: match.score ?? 0,
        metadata: match.metadata ?? {},
      }));
    } catch (error) {
      this.logger.error('Search failed:', error);
      throw error;
    }
  }

  /**
   * Delete a document
   */
  async deleteDocument(id: string): Promise<void> {
    try {
      await this.pineconeService.getIndex().deleteOne(id);
      this.logger.log(`🗑️  Document deleted: ${id}`);
    } catch (error) {
      this.logger.error('Delete failed:', error);
      throw error;
    }
  }

  /**
   * Get index statistics
   */
  async getIndexStats(): Promise<VectorIndexStats> {
    const stats = await this.pineconeService.getIndexStats();
    const namespaces: VectorIndexStats['namespaces'] = {};
    for (const [name, summary] of Object.entries(stats.namespaces ?? {})) {
      namespaces[name] = { recordCount: summary.recordCount };
    }

    return {
      totalVectors: stats.totalRecordCount ?? 0,
      dimension: stats.dimension ?? 0,
      indexFullness: stats.indexFullness ?? 0,
      namespaces,
    };
  }

  /**
   * Get index information
   */
  async getIndexInfo(): Promise<VectorIndexInfo> {
    try {
      const pinecone = this.pineconeService.getClient();
      const indexName = this.pineconeService.getIndexName();
      const indexList = await pinecone.listIndexes();
      const indexInfo = indexList.indexes?.find((idx) => idx.name === indexName);

      if (!indexInfo) {
        throw new Error(`Index ${indexName} not found`);
      }

      return {
        name: indexInfo.name,
        dimension: indexInfo.dimension,
        metric: indexInfo.metric,
        host: indexInfo.host,
        status: indexInfo.status.ready ? 'Ready' : indexInfo.status.state,
      };
    } catch (error) {
      this.logger.error('Failed to get index info:', error);
      throw error;
    }
  }
}
