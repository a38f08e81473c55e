import {
  buildDocumentId,
  buildFilter,
  buildMetadata,
  toKnowledgeDocument,
  toProtectionType,
} from './knowledge.mapper';

describe('knowledge mapper', () => {
  describe('buildFilter', () => {
    it('maps known filters to metadata keys', () => {
      expect(
        buildFilter({
          documentType: 'pesticide',
          crop: 'Wheat',
          chemical: 'PROSARO',
          language: 'hr',
          countryCode: 'hr',
        }),
      ).toEqual({
        document_type: 'pesticide',
        crop: 'wheat',
        chemical: 'prosaro',
        language: 'hr',
        country_code: 'HR',
      });
    });

    it('returns an empty filter for empty input', () => {
      expect(buildFilter({})).toEqual({});
    });

    it('leaves out empty values', () => {
      expect(buildFilter({ crop: '', documentType: 'seed' })).toEqual({ document_type: 'seed' });
    });
  });

  describe('buildDocumentId', () => {
    it('is stable for the same source and text', () => {
      const first = buildDocumentId({ text: 'Prosaro 35 days', source: 'fis' });
      const second = buildDocumentId({ text: 'Prosaro 35 days', source: 'fis' });

      expect(first).toBe(second);
      expect(first).toMatch(/^fis_[0-9a-f]{16}$/);
    });

    it('uses the default source when none is given', () => {
      expect(buildDocumentId({ text: 'anything' })).toMatch(/^manual_[0-9a-f]{16}$/);
    });

    it('differs for different text', () => {
      expect(buildDocumentId({ text: 'a', source: 'fis' })).not.toBe(
        buildDocumentId({ text: 'b', source: 'fis' }),
      );
    });
  });

  describe('buildMetadata', () => {
    const indexedAt = new Date('2024-03-01T10:00:00.000Z');

    it('applies defaults for a bare document', () => {
      expect(buildMetadata({ text: 'Rotate crops.' }, 'hr', indexedAt)).toEqual({
        text: 'Rotate crops.',
        source: 'manual',
        document_type: 'general',
        language: 'hr',
        country_code: 'GLOBAL',
        indexed_at: '2024-03-01T10:00:00.000Z',
      });
    });

    it('keeps agricultural fields, lower-casing crop and chemical', () => {
      expect(
        buildMetadata(
          {
            text: 'Prosaro in wheat: PHI 35 days.',
            source: 'fis',
            documentType: 'pesticide',
            language: 'en',
            countryCode: 'hr',
            crop: 'Wheat',
            chemical: 'Prosaro',
            phiDays: 35,
            protectionType: 'fungicides',
            targetPest: 'fusarium',
            dosage: '1 l/ha',
            applicationTiming: 'flowering',
          },
          'hr',
          indexedAt,
        ),
      ).toEqual({
        text: 'Prosaro in wheat: PHI 35 days.',
        source: 'fis',
        document_type: 'pesticide',
        language: 'en',
        country_code: 'HR',
        indexed_at: '2024-03-01T10:00:00.000Z',
        crop: 'wheat',
        chemical: 'prosaro',
        phi_days: 35,
        protection_type: 'fungicides',
        target_pest: 'fusarium',
        dosage: '1 l/ha',
        application_timing: 'flowering',
      });
    });

    it('keeps a zero-day interval', () => {
      expect(buildMetadata({ text: 't', phiDays: 0 }, 'hr', indexedAt).phi_days).toBe(0);
    });
  });

  describe('toKnowledgeDocument', () => {
    it('fills defaults for missing metadata', () => {
      expect(toKnowledgeDocument({ id: 'doc-1', score: 0.5, metadata: {} }, 'hr')).toEqual({
        id: 'doc-1',
        score: 0.5,
        text: '',
        source: 'unknown',
        documentType: 'general',
        language: 'hr',
        metadata: {},
      });
    });

    it('takes the configured language when metadata has none', () => {
      expect(toKnowledgeDocument({ id: 'doc-3', score: 0.1, metadata: {} }, 'sl').language).toBe('sl');
    });

    it('extracts crop, chemical and PHI when present', () => {
      const metadata = {
        text: 'Prosaro PHI 35',
        source: 'fis',
        document_type: 'pesticide',
        language: 'hr',
        crop: 'wheat',
        chemical: 'prosaro',
        phi_days: 35,
      };

      expect(toKnowledgeDocument({ id: 'doc-2', score: 0.9, metadata }, 'en')).toEqual({
        id: 'doc-2',
        score: 0.9,
        text: 'Prosaro PHI 35',
        source: 'fis',
        documentType: 'pesticide',
        language: 'hr',
        metadata,
        crop: 'wheat',
        chemical: 'prosaro',
        phiDays: 35,
      });
    });
  });

  describe('toProtectionType', () => {
    it('accepts known types', () => {
      expect(toProtectionType('herbicides')).toBe('herbicides');
    });

    it('falls back to general', () => {
      expect(toProtectionType('acaricides')).toBe('general');
      expect(toProtectionType(undefined)).toBe('general');
    });
  });
});
