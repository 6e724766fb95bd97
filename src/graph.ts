import { randomUUID } from "node:crypto";
import { COLLECTIONS } from "./collections.js";
import type { Embedder } from "./embedding.js";
import { InvalidRelationshipTypeError, SelfLoopError, ValidationError } from "./errors.js";
import { log } from "./logger.js";
import { roundScore } from "./ranking.js";
import { StoredEdgeSchema } from "./schemas.js";
import type {
  CreateRelationshipInput,
  MemvaultConfig,
  RelationshipEdge,
  ScalarValue,
  TraversalNode,
  TraversalResult,
} from "./types.js";
import type { MetadataFilter, StoredRecord, VectorIndex } from "./vector/types.js";

export type GraphConfig = Pick<
  MemvaultConfig,
  "graphMaxDepth" | "graphMaxNeighbors" | "graphMaxNodes" | "graphRelationshipTypes"
>;

export interface RelationshipFilter {
  workspaceId?: string;
  relationshipType?: string;
}

/** Persistence seam for edges. Neighbor lookup is one call whatever the backend can OR-filter. */
export interface EdgeStore {
  insert(edge: RelationshipEdge, vector: number[], description: string): Promise<void>;
  get(id: string): Promise<RelationshipEdge | null>;
  delete(id: string): Promise<boolean>;
  list(filter: RelationshipFilter): Promise<RelationshipEdge[]>;
  /** Edges where the node is source or target, deduplicated by edge id. */
  neighbors(nodeId: string, relationshipType: string | undefined, limit: number): Promise<RelationshipEdge[]>;
}

function decodeEdge(record: StoredRecord): RelationshipEdge | null {
  const parsed = StoredEdgeSchema.safeParse(record.metadata);
  if (!parsed.success) {
    log.debug(`skipping undecodable relationship ${record.id}`);
    return null;
  }
  const { kind: _kind, ...edge } = parsed.data;
  return { id: record.id, ...edge };
}

function decodeEdges(records: StoredRecord[]): RelationshipEdge[] {
  const out: RelationshipEdge[] = [];
  for (const record of records) {
    const edge = decodeEdge(record);
    if (edge) out.push(edge);
  }
  return out;
}

/**
 * Edges kept in a vector-index collection. The index filters by AND only,
 * so neighbors are two queries (as source, as target) merged here.
 */
export class VectorEdgeStore implements EdgeStore {
  constructor(
    private readonly index: VectorIndex,
    private readonly collection: string = COLLECTIONS.relationships,
  ) {}

  async insert(edge: RelationshipEdge, vector: number[], description: string): Promise<void> {
    const { id, ...payload } = edge;
    await this.index.upsert(this.collection, [
      { id, vector, document: description, metadata: { kind: "relationship", ...payload } },
    ]);
  }

  async get(id: string): Promise<RelationshipEdge | null> {
    const [record] = await this.index.get(this.collection, { ids: [id] });
    return record ? decodeEdge(record) : null;
  }

  async delete(id: string): Promise<boolean> {
    return (await this.index.delete(this.collection, [id])) > 0;
  }

  async list(filter: RelationshipFilter): Promise<RelationshipEdge[]> {
    const where: MetadataFilter = { kind: "relationship" };
    if (filter.workspaceId !== undefined) where.workspaceId = filter.workspaceId;
    if (filter.relationshipType) where.relationshipType = filter.relationshipType;
    return decodeEdges(await this.index.get(this.collection, { filter: where }));
  }

  async neighbors(nodeId: string, relationshipType: string | undefined, limit: number): Promise<RelationshipEdge[]> {
    const typeFilter: MetadataFilter = relationshipType ? { relationshipType } : {};
    const outgoing = await this.index.get(this.collection, {
      filter: { sourceId: nodeId, ...typeFilter },
      limit,
    });
    const incoming = await this.index.get(this.collection, {
      filter: { targetId: nodeId, ...typeFilter },
      limit,
    });

    const seen = new Set<string>();
    const merged: RelationshipEdge[] = [];
    for (const edge of decodeEdges([...outgoing, ...incoming])) {
      if (seen.has(edge.id)) continue;
      seen.add(edge.id);
      merged.push(edge);
    }
    return merged.slice(0, limit);
  }
}

function scalarMetadata(raw: Record<string, unknown> | undefined): Record<string, ScalarValue> {
  const out: Record<string, ScalarValue> = {};
  for (const [key, value] of Object.entries(raw ?? {})) {
    if (typeof value === "string" || typeof value === "boolean") out[key] = value;
    else if (typeof value === "number" && Number.isFinite(value)) out[key] = value;
    else log.debug(`dropping non-scalar relationship metadata key ${key}`);
  }
  return out;
}

export interface NeighborOptions {
  relationshipType?: string;
  maxResults?: number;
}

export interface TraverseOptions {
  /** Omitted: the configured ceiling. 0 returns only the start node. */
  maxDepth?: number;
  relationshipTypes?: string[];
  maxNodes?: number;
}

/** Typed, directed relationships between knowledge nodes with bounded BFS. */
export class GraphEngine {
  constructor(
    private readonly store: EdgeStore,
    private readonly embedder: Embedder,
    private readonly config: GraphConfig,
  ) {}

  get relationshipTypes(): readonly string[] {
    return this.config.graphRelationshipTypes;
  }

  async createRelationship(input: CreateRelationshipInput): Promise<{ id: string; status: "created" }> {
    const sourceId = input.sourceId.trim();
    const targetId = input.targetId.trim();
    const relationshipType = input.relationshipType.trim();
    if (!sourceId || !targetId) throw new ValidationError("sourceId and targetId are required");
    if (!this.config.graphRelationshipTypes.includes(relationshipType)) {
      throw new InvalidRelationshipTypeError(relationshipType, this.config.graphRelationshipTypes);
    }
    if (sourceId === targetId) throw new SelfLoopError(sourceId);

    const sourceType = input.sourceType?.trim() || "knowledge";
    const targetType = input.targetType?.trim() || "knowledge";
    const description = `${sourceType}:${sourceId} ${relationshipType} ${targetType}:${targetId}`;
    const edge: RelationshipEdge = {
      id: randomUUID(),
      sourceId,
      sourceType,
      targetId,
      targetType,
      relationshipType,
      metadata: scalarMetadata(input.metadata),
      workspaceId: input.workspaceId ?? "",
      createdAt: new Date().toISOString(),
    };

    const vector = await this.embedder.embed(description);
    await this.store.insert(edge, vector, description);
    log.debug(`relationship ${edge.id}: ${description}`);
    return { id: edge.id, status: "created" };
  }

  async createContradictionRelationship(
    newId: string,
    existingId: string,
    similarity: number,
    workspaceId?: string,
  ): Promise<{ id: string; status: "created" }> {
    return this.createRelationship({
      sourceId: newId,
      targetId: existingId,
      relationshipType: "contradicts",
      metadata: { similarity: roundScore(similarity) },
      workspaceId,
    });
  }

  async getNeighbors(nodeId: string, options: NeighborOptions = {}): Promise<RelationshipEdge[]> {
    const limit = Math.max(1, options.maxResults ?? this.config.graphMaxNeighbors);
    try {
      return await this.store.neighbors(nodeId, options.relationshipType, limit);
    } catch (err) {
      log.error(`neighbor lookup for ${nodeId} failed`, err);
      return [];
    }
  }

  async traverse(startNodeId: string, options: TraverseOptions = {}): Promise<TraversalResult> {
    const ceiling = this.config.graphMaxDepth;
    const depthLimit =
      options.maxDepth === undefined ? ceiling : Math.min(Math.max(0, Math.floor(options.maxDepth)), ceiling);
    const maxNodes = Math.max(1, options.maxNodes ?? this.config.graphMaxNodes);
    const types = options.relationshipTypes ?? [];

    const queue: Array<[string, number]> = [[startNodeId, 0]];
    const visited = new Set<string>([startNodeId]);
    const nodes: TraversalNode[] = [];
    const edgeIds = new Set<string>();
    let maxDepthReached = 0;

    while (queue.length > 0) {
      const next = queue.shift();
      if (!next) break;
      const [nodeId, depth] = next;
      if (depth > depthLimit) continue;

      const relationships =
        types.length === 1
          ? await this.getNeighbors(nodeId, { relationshipType: types[0] })
          : (await this.getNeighbors(nodeId)).filter(
              (e) => types.length === 0 || types.includes(e.relationshipType),
            );

      nodes.push({ nodeId, depth, relationships });
      maxDepthReached = Math.max(maxDepthReached, depth);
      for (const edge of relationships) edgeIds.add(edge.id);

      if (depth >= depthLimit) continue;
      for (const edge of relationships) {
        const other = edge.sourceId === nodeId ? edge.targetId : edge.sourceId;
        if (visited.has(other)) continue;
        if (nodes.length + queue.length >= maxNodes) break;
        visited.add(other);
        queue.push([other, depth + 1]);
      }
    }

    return { startNodeId, nodes, totalRelationships: edgeIds.size, maxDepthReached };
  }

  async getRelationship(id: string): Promise<RelationshipEdge | null> {
    try {
      return await this.store.get(id);
    } catch (err) {
      log.error(`loading relationship ${id} failed`, err);
      return null;
    }
  }

  /** Hard delete; false when the edge does not exist. */
  async deleteRelationship(id: string): Promise<boolean> {
    return this.store.delete(id);
  }

  async listRelationships(filter: RelationshipFilter = {}): Promise<RelationshipEdge[]> {
    try {
      return await this.store.list(filter);
    } catch (err) {
      log.error("listing relationships failed", err);
      return [];
    }
  }
}
