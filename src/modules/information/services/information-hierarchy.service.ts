// modules/information/services/information-hierarchy.service.ts
import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createHash } from 'crypto';
import { v4 as uuidv4 } from 'uuid';
import { RedisService } from '../../redis/redis.service';
import {
  ExternalKnowledgeProvider,
  FarmerRecordsProvider,
  InformationProvider,
  KnowledgeBaseProvider,
} from '../providers';
import {
  ALL_RELEVANCE_LEVELS,
  InformationItem,
  InformationQuery,
  InformationQueryInput,
  InformationRelevance,
  InformationResult,
  InformationSource,
  LocalizationContext,
  RelevanceLevelName,
  RelevancePriority,
  SourceCapabilities,
  createInformationSource,
} from '../interfaces/information.interface';
import { getAllItemsByPriority, hashContext } from '../information-result.util';
import { errorMessage } from '../../../common/utils/error.util';

interface RegisteredSource {
  source: InformationSource;
  provider?: InformationProvider;
}

interface LevelSpec {
  relevance: InformationRelevance;
  priority: RelevancePriority;
  name: RelevanceLevelName;
  appliesTo: (context: LocalizationContext) => boolean;
  canAccess: (source: InformationSource) => boolean;
  fetch: (
    provider: InformationProvider,
    query: InformationQuery,
  ) => Promise<InformationItem[]> | undefined;
}

const LEVELS: LevelSpec[] = [
  {
    relevance: InformationRelevance.FARMER_SPECIFIC,
    priority: RelevancePriority.FARMER_SPECIFIC,
    name: 'farmer_specific',
    appliesTo: (context) => typeof context.farmerId === 'number',
    canAccess: (source) => source.canAccessFarmerData,
    fetch: (provider, query) => provider.fetchFarmerItems?.(query),
  },
  {
    relevance: InformationRelevance.COUNTRY_SPECIFIC,
    priority: RelevancePriority.COUNTRY_SPECIFIC,
    name: 'country_specific',
    appliesTo: (context) => Boolean(context.countryCode),
    canAccess: (source) => source.canAccessCountryData,
    fetch: (provider, query) => provider.fetchCountryItems?.(query),
  },
  {
    relevance: InformationRelevance.GLOBAL,
    priority: RelevancePriority.GLOBAL,
    name: 'global',
    appliesTo: () => true,
    canAccess: (source) => source.canAccessGlobalData,
    fetch: (provider, query) => provider.fetchGlobalItems?.(query),
  },
];

type CachedResult = Omit<InformationResult, 'query'>;

/**
 * Three-tier information hierarchy. Sources declare which tiers they may
 * serve; every item is checked against those declarations before it is used.
 */
@Injectable()
export class InformationHierarchyService {
  private readonly logger = new Logger(InformationHierarchyService.name);
  private readonly sources = new Map<string, RegisteredSource>();
  private readonly maxItemsPerLevel: number;
  private readonly cacheTtl: number;

  constructor(
    private configService: ConfigService,
    private redisService: RedisService,
    farmerRecordsProvider: FarmerRecordsProvider,
    knowledgeBaseProvider: KnowledgeBaseProvider,
    externalKnowledgeProvider: ExternalKnowledgeProvider,
  ) {
    this.maxItemsPerLevel = this.configService.get<number>('hierarchy.maxItemsPerLevel') || 5;
    this.cacheTtl = this.configService.get<number>('hierarchy.cacheTtl') ?? 300;
    const externalEnabled = this.configService.get<boolean>('hierarchy.externalEnabled') ?? false;

    this.registerSource(
      createInformationSource({
        sourceId: 'farmer_db',
        sourceType: 'database',
        sourceName: 'Farmer Database',
        canAccessFarmerData: true,
        canAccessCountryData: true,
        canAccessGlobalData: false,
      }),
      farmerRecordsProvider,
    );

    this.registerSource(
      createInformationSource({
        sourceId: 'rag_knowledge',
        sourceType: 'rag',
        sourceName: 'Agricultural Knowledge Base',
        canAccessFarmerData: false,
        canAccessCountryData: true,
        canAccessGlobalData: true,
      }),
      knowledgeBaseProvider,
    );

    // Global only: nothing farmer- or country-specific may reach it
    this.registerSource(
      createInformationSource({
        sourceId: 'external_search',
        sourceType: 'external',
        sourceName: 'External Agricultural Knowledge',
        canAccessFarmerData: false,
        canAccessCountryData: false,
        canAccessGlobalData: true,
      }),
      externalEnabled ? externalKnowledgeProvider : undefined,
    );
  }

  /**
   * Register (or replace) an information source
   */
  registerSource(source: InformationSource, provider?: InformationProvider): void {
    this.sources.set(source.sourceId, { source, provider });
    this.logger.log(`Registered information source: ${source.sourceName}`);
  }

  /**
   * Query every tier the caller asked for, most specific first
   */
  async queryInformation(input: InformationQueryInput): Promise<InformationResult> {
    const query: InformationQuery = {
      queryText: input.queryText,
      context: input.context,
      requiredRelevanceLevels: input.requiredRelevanceLevels ?? [...ALL_RELEVANCE_LEVELS],
      maxItemsPerLevel: input.maxItemsPerLevel ?? this.maxItemsPerLevel,
      includeMetadata: input.includeMetadata ?? true,
    };

    const contextHash = hashContext(query.context);
    const cacheKey = this.cacheKey(query, contextHash);

    if (cacheKey) {
      const cached = await this.redisService.get<CachedResult>(cacheKey);
      if (cached) {
        this.logger.log(`⚡ Hierarchy cache hit for context ${contextHash}`);
        return { query, ...cached, metadata: { ...cached.metadata, cached: true } };
      }
    }

    const result: InformationResult = {
      query,
      farmerItems: [],
      countryItems: [],
      globalItems: [],
      metadata: {
        queryId: uuidv4(),
        queryTimestamp: '',
        sourcesUsed: [],
        totalItems: 0,
        contextHash,
        cached: false,
      },
    };

    const levels = [...LEVELS].sort((a, b) => a.priority - b.priority);
    for (const level of levels) {
      if (!query.requiredRelevanceLevels.includes(level.relevance)) continue;
      if (!level.appliesTo(query.context)) continue;

      const items = await this.queryLevel(level, query);
      const limited = items.slice(0, query.maxItemsPerLevel);

      switch (level.relevance) {
        case InformationRelevance.FARMER_SPECIFIC:
          result.farmerItems = limited;
          break;
        case InformationRelevance.COUNTRY_SPECIFIC:
          result.countryItems = limited;
          break;
        case InformationRelevance.GLOBAL:
          result.globalItems = limited;
          break;
      }

      if (items.length > 0) {
        result.metadata.sourcesUsed.push(level.name);
      }
    }

    result.metadata.queryTimestamp = new Date().toISOString();
    result.metadata.totalItems = getAllItemsByPriority(result).length;

    this.logQuery(result);

    if (cacheKey) {
      const { query: _query, ...toCache } = result;
      await this.redisService
        .set(cacheKey, toCache, this.cacheTtl)
        .catch((e: unknown) =>
          this.logger.warn(`Failed to cache hierarchy result: ${errorMessage(e)}`),
        );
    }

    return result;
  }

  private async queryLevel(level: LevelSpec, query: InformationQuery): Promise<InformationItem[]> {
    const items: InformationItem[] = [];

    for (const { source, provider } of this.sources.values()) {
      if (!level.canAccess(source) || !provider) continue;

      const pending = level.fetch(provider, query);
      if (!pending) continue;

      this.logger.debug(`Querying ${level.name} data from ${source.sourceName}`);
      try {
        const fetched = await pending;
        items.push(...fetched.filter((item) => this.validatePrivacyCompliance(item, source)));
      } catch (error) {
        this.logger.warn(`${source.sourceName} failed for ${level.name}: ${errorMessage(error)}`);
      }
    }

    return items;
  }

  /**
   * An item may only come from a source cleared for its tier
   */
  validatePrivacyCompliance(item: InformationItem, source: InformationSource): boolean {
    if (item.relevance === InformationRelevance.FARMER_SPECIFIC && !source.canAccessFarmerData) {
      this.logger.error(
        `Privacy violation: ${source.sourceName} attempted to provide farmer data`,
      );
      return false;
    }

    if (item.relevance === InformationRelevance.COUNTRY_SPECIFIC && !source.canAccessCountryData) {
      this.logger.error(
        `Privacy violation: ${source.sourceName} attempted to provide country data`,
      );
      return false;
    }

    return true;
  }

  getSourceCapabilities(): Record<string, SourceCapabilities> {
    const capabilities: Record<string, SourceCapabilities> = {};
    for (const [sourceId, { source }] of this.sources) {
      capabilities[sourceId] = {
        farmerData: source.canAccessFarmerData,
        countryData: source.canAccessCountryData,
        globalData: source.canAccessGlobalData,
        sourceType: source.sourceType,
      };
    }
    return capabilities;
  }

  private cacheKey(query: InformationQuery, contextHash: string): string | null {
    if (this.cacheTtl <= 0) return null;

    const queryHash = createHash('sha256')
      .update(
        JSON.stringify([
          query.queryText,
          query.context.farmerId ?? null,
          [...query.requiredRelevanceLevels].sort(),
          query.maxItemsPerLevel,
        ]),
      )
      .digest('hex')
      .slice(0, 16);

    return `hierarchy:${contextHash}:${queryHash}`;
  }

  /**
   * Transparency log: one JSON line per query
   */
  private logQuery(result: InformationResult): void {
    const logEntry = {
      timestamp: result.metadata.queryTimestamp,
      query: result.query.queryText,
      farmer_id: result.query.context.farmerId ?? null,
      country: result.query.context.countryCode,
      items_found: {
        farmer: result.farmerItems.length,
        country: result.countryItems.length,
        global: result.globalItems.length,
      },
    };
    this.logger.log(`Information query completed: ${JSON.stringify(logEntry)}`);
  }
}
