import { createHash } from 'crypto';
import { RecordMetadata } from '@pinecone-database/pinecone';
import { VectorFilter, VectorSearchResult } from '../vectordb/interfaces/vector/vector.interface';
import {
  GLOBAL_COUNTRY_CODE,
  KnowledgeDocument,
  KnowledgeFilters,
  NewKnowledgeDocument,
  PROTECTION_TYPES,
  ProtectionType,
} from './interfaces/knowledge.interface';

export const DEFAULT_SOURCE = 'manual';
export const DEFAULT_DOCUMENT_TYPE = 'general';

export function readString(metadata: RecordMetadata, key: string): string | undefined {
  const value = metadata[key];
  return typeof value === 'string' ? value : undefined;
}

export function readNumber(metadata: RecordMetadata, key: string): number | undefined {
  const value = metadata[key];
  return typeof value === 'number' ? value : undefined;
}

export function toProtectionType(value: string | undefined): ProtectionType {
  return PROTECTION_TYPES.find((type) => type === value) ?? 'general';
}

/**
 * Vector id derived from source and text, so re-indexing the same text
 * overwrites instead of duplicating.
 */
export function buildDocumentId(document: Pick<NewKnowledgeDocument, 'text' | 'source'>): string {
  const digest = createHash('sha256').update(document.text, 'utf8').digest('hex');
  return `${document.source || DEFAULT_SOURCE}_${digest.slice(0, 16)}`;
}

/**
 * Pinecone filter from user filters. Unknown keys are dropped.
 */
export function buildFilter(filters: KnowledgeFilters): VectorFilter {
  const filter: VectorFilter = {};

  if (filters.documentType) {
    filter.document_type = filters.documentType;
  }
  if (filters.crop) {
    filter.crop = filters.crop.toLowerCase();
  }
  if (filters.chemical) {
    filter.chemical = filters.chemical.toLowerCase();
  }
  if (filters.language) {
    filter.language = filters.language;
  }
  if (filters.countryCode) {
    filter.country_code = filters.countryCode.toUpperCase();
  }

  return filter;
}

export function buildMetadata(
  document: NewKnowledgeDocument,
  defaultLanguage: string,
  indexedAt: Date,
): RecordMetadata {
  const metadata: RecordMetadata = {
    text: document.text,
    source: document.source || DEFAULT_SOURCE,
    document_type: document.documentType || DEFAULT_DOCUMENT_TYPE,
    language: document.language || defaultLanguage,
    country_code: (document.countryCode || GLOBAL_COUNTRY_CODE).toUpperCase(),
    indexed_at: indexedAt.toISOString(),
  };

  if (document.crop) metadata.crop = document.crop.toLowerCase();
  if (document.chemical) metadata.chemical = document.chemical.toLowerCase();
  if (document.phiDays !== undefined) metadata.phi_days = document.phiDays;
  if (document.protectionType) metadata.protection_type = document.protectionType;
  if (document.targetPest) metadata.target_pest = document.targetPest;
  if (document.dosage) metadata.dosage = document.dosage;
  if (document.applicationTiming) metadata.application_timing = document.applicationTiming;

  return metadata;
}

export function toKnowledgeDocument(
  match: VectorSearchResult,
  defaultLanguage: string,
): KnowledgeDocument {
  const { metadata } = match;
  const document: KnowledgeDocument = {
    id: match.id,
    score: match.score,
    text: readString(metadata, 'text') ?? '',
    source: readString(metadata, 'source') ?? 'unknown',
    documentType: readString(metadata, 'document_type') ?? DEFAULT_DOCUMENT_TYPE,
    language: readString(metadata, 'language') ?? defaultLanguage,
    metadata,
  };

  const crop = readString(metadata, 'crop');
  if (crop !== undefined) document.crop = crop;
  const chemical = readString(metadata, 'chemical');
  if (chemical !== undefined) document.chemical = chemical;
  const phiDays = readNumber(metadata, 'phi_days');
  if (phiDays !== undefined) document.phiDays = phiDays;

  return document;
}
