import { Test, TestingModule } from '@nestjs/testing';
import { VectorDbService } from './vectordb.service';
import { PineconeService } from '../pinecone/pinecone.service';

describe('VectorDbService', () => {
  let service: VectorDbService;
  const index = { upsert: jest.fn(), query: jest.fn(), deleteOne: jest.fn() };
  const pineconeService = {
    getIndex: jest.fn(() => index),
    getIndexStats: jest.fn(),
  };

  beforeEach(async () => {
    jest.clearAllMocks();

    const module: TestingModule = await Test.createTestingModule({
      providers: [VectorDbService, { provide: PineconeService, useValue: pineconeService }],
    }).compile();

    service = module.get<VectorDbService>(VectorDbService);
  });

  it('upserts a single record', async () => {
    index.upsert.mockResolvedValue(undefined);

    await service.upsertDocument({ id: 'fis_1', embedding: [0.1], metadata: { text: 'x' } });

    expect(index.upsert).toHaveBeenCalledWith([
      { id: 'fis_1', values: [0.1], metadata: { text: 'x' } },
    ]);
  });

  describe('search', () => {
    it('omits an empty filter', async () => {
      index.query.mockResolvedValue({ matches: [] });

      await service.search([0.1], 3, {});

      expect(index.query).toHaveBeenCalledWith({ vector: [0.1], topK: 3, includeMetadata: true });
    });

    it('passes a filter and defaults missing score and metadata', async () => {
      index.query.mockResolvedValue({
        matches: [{ id: 'a' }, { id: 'b', score: 0.4, metadata: { crop: 'wheat' } }],
      });

      const results = await service.search([0.1], 5, { crop: 'wheat' });

      expect(index.query).toHaveBeenCalledWith({
        vector: [0.1],
        topK: 5,
        includeMetadata: true,
        filter: { crop: 'wheat' },
      });
      expect(results).toEqual([
        { id: 'a', score: 0, metadata: {} },
        { id: 'b', score: 0.4, metadata: { crop: 'wheat' } },
      ]);
    });

    it('rethrows query errors', async () => {
      index.query.mockRejectedValue(new Error('timeout'));

      await expect(service.search([0.1])).rejects.toThrow('timeout');
    });
  });

  it('summarises index stats', async () => {
    pineconeService.getIndexStats.mockResolvedValue({
      totalRecordCount: 12,
      dimension: 384,
      indexFullness: 0,
      namespaces: { '': { recordCount: 12 } },
    });

    await expect(service.getIndexStats()).resolves.toEqual({
      totalVectors: 12,
      dimension: 384,
      indexFullness: 0,
      namespaces: { '': { recordCount: 12 } },
    });
  });
});
