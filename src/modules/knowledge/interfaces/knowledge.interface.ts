import { RecordMetadata } from '@pinecone-database/pinecone';

/** Country code stored on documents that apply everywhere */
export const GLOBAL_COUNTRY_CODE = 'GLOBAL';

export const PROTECTION_TYPES = ['fungicides', 'insecticides', 'herbicides', 'general'] as const;
export type ProtectionType = (typeof PROTECTION_TYPES)[number];

export interface KnowledgeFilters {
  documentType?: string;
  crop?: string;
  chemical?: string;
  language?: string;
  countryCode?: string;
}

/**
 * A document as submitted for indexing. Only `text` is required; the rest
 * become filterable metadata.
 */
export interface NewKnowledgeDocument {
  text: string;
  source?: string;
  documentType?: string;
  language?: string;
  countryCode?: string;
  crop?: string;
  chemical?: string;
  /** Pre-harvest interval ("karenca") in days */
  phiDays?: number;
  protectionType?: string;
  targetPest?: string;
  dosage?: string;
  applicationTiming?: string;
}

export interface KnowledgeDocument {
  id: string;
  score: number;
  text: string;
  source: string;
  documentType: string;
  language: string;
  metadata: RecordMetadata;
  crop?: string;
  chemical?: string;
  phiDays?: number;
}

export interface PesticideInfo {
  chemical: string;
  crop: string;
  phiDays: number;
  source: string;
  additionalInfo: string;
}

export type PesticideInfoResult =
  | { found: true; pesticideInfo: PesticideInfo; documents: KnowledgeDocument[] }
  | { found: false; message: string; documents: KnowledgeDocument[] }
  | { found: false; error: string };

export interface CropProtectionEntry {
  chemical: string;
  target: string;
  dosage: string;
  timing: string;
  text: string;
}

export type CropProtectionGroups = Record<ProtectionType, CropProtectionEntry[]>;

export type CropProtectionResult = CropProtectionGroups | { error: string };

export interface BulkIndexStats {
  total: number;
  success: number;
  failed: number;
}
