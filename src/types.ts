export type LifecycleStatus = "active" | "superseded" | "deleted";
export type KnowledgeCollection = "facts" | "files" | "learnings";
export type LearningCategory = "general" | "preference" | "fact" | "skill" | "correction";
export type VectorBackendKind = "sqlite" | "qdrant";
export type ScalarValue = string | number | boolean;

export const LEARNING_CATEGORIES: readonly LearningCategory[] = [
  "general",
  "preference",
  "fact",
  "skill",
  "correction",
];

export const KNOWLEDGE_COLLECTIONS: readonly KnowledgeCollection[] = ["facts", "files", "learnings"];

export interface RankWeights {
  relevance: number;
  importance: number;
  reliability: number;
  recency: number;
  frequency: number;
  priority: number;
}

export interface BlendWeights {
  semantic: number;
  keyword: number;
}

export interface CollectionTtlDays {
  facts: number;
  files: number;
  learnings: number;
}

export interface MemvaultConfig {
  debug: boolean;
  // Vector index
  vectorBackend: VectorBackendKind;
  /** SQLite database file; ":memory:" keeps everything in process. */
  sqlitePath: string;
  qdrantUrl: string;
  qdrantApiKey: string | undefined;
  // Embeddings
  embeddingModel: string;
  embeddingModelVersion: string;
  /** Fixed dimensionality; when unset it is probed once from the model. */
  embeddingDimensions: number | undefined;
  embeddingApiKey: string | undefined;
  /** OpenAI-compatible endpoint (local servers included). */
  embeddingBaseUrl: string | undefined;
  // Upstream chunking (callers split files before addFileChunk)
  chunkSize: number;
  chunkOverlap: number;
  maxTextLength: number;
  // Retrieval
  topK: number;
  rankWeights: RankWeights;
  recencyWindowDays: number;
  blendWeights: BlendWeights;
  // Contradiction detection
  contradictionSimilarityThreshold: number;
  contradictionCandidates: number;
  graphLinkContradictions: boolean;
  // Skills
  skillConfidenceDefault: number;
  skillConfidenceMin: number;
  skillSearchTopK: number;
  skillUsageBoostRate: number;
  // Graph
  graphMaxDepth: number;
  graphMaxNeighbors: number;
  graphMaxNodes: number;
  graphRelationshipTypes: string[];
  // Lifecycle
  ttlDays: CollectionTtlDays;
  reindexCheckIntervalSeconds: number;
  schedulerEnabled: boolean;
}

export interface ContradictionRef {
  id: string;
  text: string;
  similarity: number;
  learningKey: string;
}

export interface KnowledgeMetadata {
  workspaceId: string;
  agentName?: string;
  modelName?: string;
  category?: string;
  status: LifecycleStatus;
  version: number;
  learningKey?: string;
  priority?: string;
  importance?: number;
  reliability?: number;
  frequency?: number;
  source?: string;
  createdAt: string;
  /** Epoch seconds, scanned by the TTL sweep. */
  createdAtTs: number;
  updatedAt?: string;
  supersededAt?: string;
  supersededBy?: string;
  deletedAt?: string;
  previousVersionId?: string;
  conflictDetected?: boolean;
  contradictions?: ContradictionRef[];
  fileName?: string;
  fileId?: string;
  chunkIndex?: number;
  folder?: string;
  pinned?: boolean;
  pinnedAt?: string;
  extra?: Record<string, ScalarValue>;
}

export interface KnowledgeEntry {
  id: string;
  text: string;
  collection: KnowledgeCollection;
  metadata: KnowledgeMetadata;
}

export interface AddLearningInput {
  text: string;
  modelName: string;
  agentName: string;
  category?: string;
  metadata?: Record<string, unknown>;
  workspaceId?: string;
}

export interface AddLearningResult {
  id: string;
  version: number;
  learningKey: string;
  /** Workspace the entry was stored under, from the input or its metadata. */
  workspaceId: string;
  conflictDetected: boolean;
  previousVersionId: string | null;
  contradictions: ContradictionRef[];
}

export interface SearchHit {
  id: string;
  text: string;
  /** Composite rank score in [0,1]. */
  score: number;
  similarity: number;
  /** Semantic/keyword blend fed into the rank score. */
  relevance: number;
  source: KnowledgeCollection;
  metadata: KnowledgeMetadata;
}

export interface FactSearchOptions {
  topK?: number;
  agentName?: string;
  workspaceId?: string;
  includeFiles?: boolean;
  minPriority?: string;
}

export interface LearningSearchOptions {
  modelName: string;
  workspaceId?: string;
  category?: string;
  topK?: number;
  minPriority?: string;
}

export interface FileSummary {
  fileName: string;
  chunksCount: number;
  folder: string;
  pinned: boolean;
  status: LifecycleStatus;
}

export interface LearningStats {
  totalLearnings: number;
  activeLearnings: number;
  byModel: Record<string, number>;
  byCategory: Record<string, number>;
}

export type AuditEventType =
  | "fact_added"
  | "file_chunk_added"
  | "learning_added"
  | "learning_superseded"
  | "learnings_deleted"
  | "learning_versions_reconciled"
  | "file_deleted"
  | "file_restored"
  | "file_pinned"
  | "file_moved"
  | "file_renamed"
  | "file_purged";

export interface AuditEvent {
  id: string;
  eventType: AuditEventType;
  modelName: string;
  workspaceId: string;
  entryId: string;
  createdAt: string;
  details: Record<string, ScalarValue>;
}

export interface RetrievalMetricsSnapshot {
  searchRequestsTotal: number;
  searchErrorsTotal: number;
  searchResultsTotal: number;
  searchLatencyMsTotal: number;
  avgLatencyMs: number;
  avgResultsPerRequest: number;
}

export interface RelationshipEdge {
  id: string;
  sourceId: string;
  sourceType: string;
  targetId: string;
  targetType: string;
  relationshipType: string;
  metadata: Record<string, ScalarValue>;
  workspaceId: string;
  createdAt: string;
}

export interface CreateRelationshipInput {
  sourceId: string;
  targetId: string;
  relationshipType: string;
  sourceType?: string;
  targetType?: string;
  metadata?: Record<string, unknown>;
  workspaceId?: string;
}

export interface TraversalNode {
  nodeId: string;
  depth: number;
  relationships: RelationshipEdge[];
}

export interface TraversalResult {
  startNodeId: string;
  nodes: TraversalNode[];
  totalRelationships: number;
  maxDepthReached: number;
}

export interface SkillEntry {
  id: string;
  canonicalId: string;
  goal: string;
  steps: string[];
  examples: string[];
  constraints: string[];
  sources: string[];
  confidence: number;
  version: number;
  tags: string[];
  status: LifecycleStatus;
  modelName: string;
  workspaceId: string;
  usageCount: number;
  createdAt: string;
  updatedAt: string;
  previousVersionId?: string;
  deletedAt?: string;
}

export interface SkillSearchHit extends SkillEntry {
  relevance: number;
}

export interface CreateSkillInput {
  goal: string;
  steps?: string[];
  examples?: string[];
  constraints?: string[];
  sources?: string[];
  confidence?: number;
  tags?: string[];
  modelName?: string;
  workspaceId?: string;
}

export type UpdateSkillInput = Partial<
  Pick<CreateSkillInput, "goal" | "steps" | "examples" | "constraints" | "sources" | "confidence" | "tags">
>;

export interface SkillWriteResult {
  id: string;
  canonicalId: string;
  version: number;
  previousVersionId: string | null;
}

export interface CleanupResult {
  totalDeleted: number;
  byCollection: Partial<Record<KnowledgeCollection, number>>;
}

export interface CollectionReindexStatus {
  storedModel: string;
  storedVersion: string;
  currentModel: string;
  currentVersion: string;
  needsReindex: boolean;
}

export interface ReindexStatus {
  needsReindex: boolean;
  collections: Record<KnowledgeCollection, CollectionReindexStatus>;
}

export interface EmbeddingStatus {
  modelName: string;
  modelVersion: string;
  vectorSize: number;
  status: "loaded" | "unavailable";
  collections: Record<KnowledgeCollection, number>;
}
