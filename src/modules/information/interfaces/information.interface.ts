/**
 * Relevance tiers of the information hierarchy. Farmer-specific facts
 * outrank country-specific ones, which outrank global knowledge.
 */
export enum InformationRelevance {
  FARMER_SPECIFIC = 'FARMER',
  COUNTRY_SPECIFIC = 'COUNTRY',
  GLOBAL = 'GLOBAL',
}

export enum RelevancePriority {
  FARMER_SPECIFIC = 1,
  COUNTRY_SPECIFIC = 2,
  GLOBAL = 3,
}

export type RelevanceLevelName = 'farmer_specific' | 'country_specific' | 'global';

export type InformationSourceType = 'database' | 'rag' | 'external' | 'cache';

export interface InformationItem {
  content: string;
  relevance: InformationRelevance;
  farmerId?: number;
  countryCode?: string;
  language?: string;
  sourceType: string;
  metadata?: Record<string, unknown>;
}

export interface LocalizationContext {
  whatsappNumber: string;
  countryCode: string;
  countryName: string;
  languages: string[];
  farmerId?: number;
  preferredLanguage?: string;
  timezone?: string;
  agriculturalZones?: string[];
}

export interface InformationSource {
  sourceId: string;
  sourceType: InformationSourceType;
  sourceName: string;
  canAccessFarmerData: boolean;
  canAccessCountryData: boolean;
  canAccessGlobalData: boolean;
  metadata: Record<string, unknown>;
}

export interface InformationQuery {
  queryText: string;
  context: LocalizationContext;
  requiredRelevanceLevels: InformationRelevance[];
  maxItemsPerLevel: number;
  includeMetadata: boolean;
}

/** What callers pass in; omitted fields take the configured defaults */
export type InformationQueryInput = Pick<InformationQuery, 'queryText' | 'context'> &
  Partial<Omit<InformationQuery, 'queryText' | 'context'>>;

export interface InformationResultMetadata {
  queryId: string;
  queryTimestamp: string;
  sourcesUsed: RelevanceLevelName[];
  totalItems: number;
  contextHash: string;
  cached: boolean;
}

export interface InformationResult {
  query: InformationQuery;
  farmerItems: InformationItem[];
  countryItems: InformationItem[];
  globalItems: InformationItem[];
  metadata: InformationResultMetadata;
}

export interface SourceCapabilities {
  farmerData: boolean;
  countryData: boolean;
  globalData: boolean;
  sourceType: InformationSourceType;
}

export const ALL_RELEVANCE_LEVELS: InformationRelevance[] = [
  InformationRelevance.FARMER_SPECIFIC,
  InformationRelevance.COUNTRY_SPECIFIC,
  InformationRelevance.GLOBAL,
];

export function createInformationSource(
  init: Pick<InformationSource, 'sourceId' | 'sourceType' | 'sourceName'> &
    Partial<InformationSource>,
): InformationSource {
  return {
    canAccessFarmerData: false,
    canAccessCountryData: true,
    canAccessGlobalData: true,
    metadata: {},
    ...init,
  };
}
