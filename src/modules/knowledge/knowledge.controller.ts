// modules/knowledge/knowledge.controller.ts
import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Post,
  Query,
} from '@nestjs/common';
import { ApiBody, ApiOperation, ApiParam, ApiQuery, ApiResponse, ApiTags } from '@nestjs/swagger';
import { Throttle } from '@nestjs/throttler';
import { InjectDataSource } from '@nestjs/typeorm';
import { DataSource } from 'typeorm';
import { KnowledgeIndexingService, KnowledgeSearchService } from './services';
import { SearchKnowledgeDto } from './dto/search-knowledge.dto';
import { AddDocumentDto, BulkIndexDocumentsDto } from './dto/add-document.dto';
import { ListDocumentsQueryDto } from './dto/list-documents.dto';
import { buildDocumentId } from './knowledge.mapper';
import { VectorDbService } from '../vectordb/vectordb.service';
import { PineconeService } from '../pinecone/pinecone.service';
import { RedisService } from '../redis/redis.service';
import { DependencyHealth } from '../../common/interfaces/health.interface';
import { errorMessage } from '../../common/utils/error.util';

@ApiTags('knowledge')
@Controller({ path: 'knowledge', version: '1' })
export class KnowledgeController {
  constructor(
    private readonly searchService: KnowledgeSearchService,
    private readonly indexingService: KnowledgeIndexingService,
    private readonly vectorDbService: VectorDbService,
    private readonly pineconeService: PineconeService,
    private readonly redisService: RedisService,
    @InjectDataSource() private readonly dataSource: DataSource,
  ) {}

  /**
   * POST /knowledge/search - Semantic search with optional metadata filters
   */
  @Post('search')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Search the agricultural knowledge base' })
  @ApiBody({ type: SearchKnowledgeDto })
  @ApiResponse({ status: 200, description: 'Matching documents, best first' })
  async search(@Body() dto: SearchKnowledgeDto) {
    const documents = await this.searchService.search(dto.query, dto.filters, dto.topK);
    return {
      success: true,
      data: documents,
      count: documents.length,
    };
  }

  /**
   * GET /knowledge/pesticides/:chemical - Pre-harvest interval lookup
   */
  @Get('pesticides/:chemical')
  @ApiOperation({ summary: 'Pesticide information with pre-harvest interval (PHI)' })
  @ApiParam({ name: 'chemical', example: 'Prosaro' })
  @ApiQuery({ name: 'crop', required: false, example: 'wheat' })
  async pesticideInfo(@Param('chemical') chemical: string, @Query('crop') crop?: string) {
    return this.searchService.searchPesticideInfo(chemical, crop || undefined);
  }

  /**
   * GET /knowledge/crop-protection/:crop - Protection recommendations by type
   */
  @Get('crop-protection/:crop')
  @ApiOperation({ summary: 'Crop protection recommendations grouped by protection type' })
  @ApiParam({ name: 'crop', example: 'wheat' })
  @ApiQuery({ name: 'problem', required: false, example: 'fusarium' })
  async cropProtection(@Param('crop') crop: string, @Query('problem') problem?: string) {
    return this.searchService.searchCropProtection(crop, problem || undefined);
  }

  /**
   * POST /knowledge/documents - Index a single document
   */
  @Post('documents')
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({ summary: 'Add a document to the knowledge base' })
  @ApiBody({ type: AddDocumentDto })
  async addDocument(@Body() dto: AddDocumentDto) {
    const success = await this.indexingService.addDocument(dto);
    return {
      success,
      id: buildDocumentId(dto),
    };
  }

  /**
   * POST /knowledge/documents/bulk - Index many documents (e.g. a FIS export)
   */
  @Post('documents/bulk')
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({ summary: 'Bulk index documents' })
  @ApiBody({ type: BulkIndexDocumentsDto })
  @Throttle({ default: { limit: 3, ttl: 60000 } }) // 3 per minute
  async bulkIndex(@Body() dto: BulkIndexDocumentsDto) {
    return this.indexingService.bulkIndexDocuments(dto.documents);
  }

  /**
   * GET /knowledge/documents - List indexed documents
   */
  @Get('documents')
  @ApiOperation({ summary: 'List indexed documents, newest first' })
  async listDocuments(@Query() query: ListDocumentsQueryDto) {
    const documents = await this.indexingService.listDocuments(query.limit, query.offset);
    return {
      success: true,
      data: documents,
      count: documents.length,
    };
  }

  /**
   * DELETE /knowledge/documents/:id - Remove a document from index and registry
   */
  @Delete('documents/:id')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: 'Delete an indexed document' })
  @ApiResponse({ status: 404, description: 'Document not found' })
  async deleteDocument(@Param('id') id: string) {
    await this.indexingService.deleteDocument(id);
  }

  /**
   * GET /knowledge/index - Pinecone index info and statistics
   */
  @Get('index')
  @ApiOperation({ summary: 'Get knowledge index info and statistics' })
  async getIndex() {
    const [info, stats] = await Promise.all([
      this.vectorDbService.getIndexInfo(),
      this.vectorDbService.getIndexStats(),
    ]);
    return {
      success: true,
      data: { ...info, ...stats },
    };
  }

  /**
   * GET /knowledge/health - Health check with dependency verification
   */
  @Get('health')
  @ApiOperation({ summary: 'Health check with all dependencies' })
  async health() {
    const checks = await Promise.allSettled([
      this.checkPostgres(),
      this.redisService.isHealthy(),
      this.pineconeService.isHealthy(),
    ]);

    const [postgres, redis, pinecone] = checks.map(
      (result): DependencyHealth =>
        result.status === 'fulfilled' ? result.value : { healthy: false, error: 'Check failed' },
    );

    const allHealthy = [postgres, redis, pinecone].every((dep) => dep.healthy);

    return {
      status: allHealthy ? 'healthy' : 'degraded',
      timestamp: new Date().toISOString(),
      service: 'Agricultural Knowledge Service',
      dependencies: { postgres, redis, pinecone },
    };
  }

  private async checkPostgres(): Promise<DependencyHealth> {
    const start = Date.now();
    try {
      await this.dataSource.query('SELECT 1');
      return { healthy: true, latencyMs: Date.now() - start };
    } catch (error) {
      return { healthy: false, error: errorMessage(error) };
    }
  }
}
