import { createHash } from 'crypto';
import {
  InformationItem,
  InformationResult,
  InformationResultMetadata,
  LocalizationContext,
} from './interfaces/information.interface';

export interface SerializedItem {
  content: string;
  source: string;
  metadata?: Record<string, unknown>;
}

export interface SerializedInformationResult {
  query: string;
  farmerId: number | null;
  countryCode: string;
  items: {
    farmerSpecific: SerializedItem[];
    countrySpecific: SerializedItem[];
    global: SerializedItem[];
  };
  metadata: InformationResultMetadata;
}

/**
 * All items, most specific tier first
 */
export function getAllItemsByPriority(result: InformationResult): InformationItem[] {
  return [...result.farmerItems, ...result.countryItems, ...result.globalItems];
}

/**
 * Stable short hash of who is asking, used in cache keys and logs
 */
export function hashContext(context: LocalizationContext): string {
  const contextStr = `${context.whatsappNumber}:${context.countryCode}:${context.preferredLanguage ?? ''}`;
  return createHash('sha256').update(contextStr).digest('hex').slice(0, 16);
}

export function serializeResult(result: InformationResult): SerializedInformationResult {
  const { includeMetadata } = result.query;
  const toSerialized = (item: InformationItem): SerializedItem =>
    includeMetadata && item.metadata
      ? { content: item.content, source: item.sourceType, metadata: item.metadata }
      : { content: item.content, source: item.sourceType };

  return {
    query: result.query.queryText,
    farmerId: result.query.context.farmerId ?? null,
    countryCode: result.query.context.countryCode,
    items: {
      farmerSpecific: result.farmerItems.map(toSerialized),
      countrySpecific: result.countryItems.map(toSerialized),
      global: result.globalItems.map(toSerialized),
    },
    metadata: result.metadata,
  };
}
