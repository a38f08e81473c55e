import { createHash } from 'crypto';
import { getAllItemsByPriority, hashContext, serializeResult } from './information-result.util';
import {
  InformationRelevance,
  InformationResult,
  LocalizationContext,
} from './interfaces/information.interface';

const context: LocalizationContext = {
  whatsappNumber: '+385910000000',
  countryCode: 'HR',
  countryName: 'Croatia',
  languages: ['hr'],
  farmerId: 7,
};

function buildResult(includeMetadata: boolean): InformationResult {
  return {
    query: {
      queryText: 'fusarium in wheat',
      context,
      requiredRelevanceLevels: [InformationRelevance.GLOBAL],
      maxItemsPerLevel: 5,
      includeMetadata,
    },
    farmerItems: [
      {
        content: 'Field "North": wheat',
        relevance: InformationRelevance.FARMER_SPECIFIC,
        sourceType: 'database',
        metadata: { table: 'fields', fieldId: 3 },
      },
    ],
    countryItems: [
      { content: 'HR advisory', relevance: InformationRelevance.COUNTRY_SPECIFIC, sourceType: 'rag' },
    ],
    globalItems: [
      {
        content: 'Spray at flowering',
        relevance: InformationRelevance.GLOBAL,
        sourceType: 'rag',
        metadata: { documentId: 'fis_1' },
      },
    ],
    metadata: {
      queryId: 'q-1',
      queryTimestamp: '2024-05-01T08:00:00.000Z',
      sourcesUsed: ['farmer_specific', 'country_specific', 'global'],
      totalItems: 3,
      contextHash: 'abc',
      cached: false,
    },
  };
}

describe('information result utils', () => {
  it('lists items most specific first', () => {
    expect(getAllItemsByPriority(buildResult(true)).map((i) => i.content)).toEqual([
      'Field "North": wheat',
      'HR advisory',
      'Spray at flowering',
    ]);
  });

  describe('hashContext', () => {
    it('hashes number, country and preferred language', () => {
      const expected = createHash('sha256')
        .update('+385910000000:HR:hr')
        .digest('hex')
        .slice(0, 16);

      expect(hashContext({ ...context, preferredLanguage: 'hr' })).toBe(expected);
    });

    it('uses an empty language when none is preferred', () => {
      const expected = createHash('sha256').update('+385910000000:HR:').digest('hex').slice(0, 16);

      expect(hashContext(context)).toBe(expected);
    });

    it('ignores the farmer id', () => {
      expect(hashContext({ ...context, farmerId: 99 })).toBe(hashContext(context));
    });
  });

  describe('serializeResult', () => {
    it('includes item metadata when asked', () => {
      expect(serializeResult(buildResult(true))).toEqual({
        query: 'fusarium in wheat',
        farmerId: 7,
        countryCode: 'HR',
        items: {
          farmerSpecific: [
            {
              content: 'Field "North": wheat',
              source: 'database',
              metadata: { table: 'fields', fieldId: 3 },
            },
          ],
          countrySpecific: [{ content: 'HR advisory', source: 'rag' }],
          global: [
            { content: 'Spray at flowering', source: 'rag', metadata: { documentId: 'fis_1' } },
          ],
        },
        metadata: buildResult(true).metadata,
      });
    });

    it('leaves metadata out otherwise', () => {
      const serialized = serializeResult(buildResult(false));

      expect(serialized.items.farmerSpecific).toEqual([
        { content: 'Field "North": wheat', source: 'database' },
      ]);
      expect(serialized.items.global).toEqual([{ content: 'Spray at flowering', source: 'rag' }]);
    });

    it('reports a missing farmer as null', () => {
      const result = buildResult(true);
      result.query.context = { ...context, farmerId: undefined };

      expect(serializeResult(result).farmerId).toBeNull();
    });
  });
});
