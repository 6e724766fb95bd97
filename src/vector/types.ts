import type { VectorBackendKind } from "../types.js";

export type FilterValue = string | number | boolean;

/** Flat AND-equality over top-level metadata fields. */
export type MetadataFilter = Record<string, FilterValue>;

export interface CollectionModelInfo {
  embeddingModel: string;
  embeddingModelVersion: string;
}

export interface VectorRecordInput {
  id: string;
  vector: number[];
  document: string;
  metadata: object;
}

export interface StoredRecord {
  id: string;
  document: string;
  metadata: Record<string, unknown>;
}

export interface QueryHit extends StoredRecord {
  /** Lower is closer; similarity is `1 - distance`. */
  distance: number;
}

export type GetSelector = { ids: string[] } | { filter?: MetadataFilter; limit?: number };

export interface QueryOptions {
  filter?: MetadataFilter;
  limit: number;
}

export interface VectorIndex {
  readonly kind: VectorBackendKind;
  /** Create the collection when missing; existing model info is left alone. */
  ensureCollection(name: string, dimensions: number, info: CollectionModelInfo): Promise<void>;
  upsert(name: string, records: VectorRecordInput[]): Promise<void>;
  get(name: string, selector: GetSelector): Promise<StoredRecord[]>;
  query(name: string, vector: number[], options: QueryOptions): Promise<QueryHit[]>;
  /** Returns the number of records that existed and were removed. */
  delete(name: string, ids: string[]): Promise<number>;
  count(name: string): Promise<number>;
  /** Replace the metadata of existing records; vectors and documents are untouched. */
  updateMetadata(name: string, ids: string[], payloads: object[]): Promise<void>;
  collectionInfo(name: string): Promise<CollectionModelInfo | null>;
  setCollectionInfo(name: string, info: CollectionModelInfo): Promise<void>;
  close(): Promise<void>;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length === 0 || b.length === 0 || a.length !== b.length) return 0;
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}
