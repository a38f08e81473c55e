import { RecordMetadata } from '@pinecone-database/pinecone';

export interface VectorDocument {
  id: string;
  embedding: number[];
  metadata: RecordMetadata;
}

export interface VectorSearchResult {
  id: string;
  score: number;
  metadata: RecordMetadata;
}

/** Equality filter on metadata keys */
export type VectorFilter = Record<string, string | number | boolean>;

export interface VectorIndexStats {
  totalVectors: number;
  dimension: number;
  indexFullness: number;
  namespaces: Record<string, { recordCount: number }>;
}

export interface VectorIndexInfo {
  name: string;
  dimension?: number;
  metric: string;
  host: string;
  status: string;
}
