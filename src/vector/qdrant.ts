import { createHash } from "node:crypto";
import { z } from "zod";
import type {
  CollectionModelInfo,
  GetSelector,
  MetadataFilter,
  QueryHit,
  QueryOptions,
  StoredRecord,
  VectorIndex,
  VectorRecordInput,
} from "./types.js";

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface QdrantOptions {
  url: string;
  apiKey?: string;
  fetchImpl?: FetchLike;
  /** Collection holding per-collection embedding-model info. */
  infoCollection?: string;
}

const DOCUMENT_KEY = "document";
const SCROLL_PAGE = 256;

const PointSchema = z.object({
  id: z.union([z.string(), z.number()]),
  payload: z.record(z.unknown()).nullish(),
});
const ScoredPointSchema = PointSchema.extend({ score: z.number() });

const PointsResponse = z.object({ result: z.array(PointSchema) });
const ScrollResponse = z.object({
  result: z.object({
    points: z.array(PointSchema),
    next_page_offset: z.union([z.string(), z.number()]).nullish(),
  }),
});
const SearchResponse = z.object({ result: z.array(ScoredPointSchema) });
const CountResponse = z.object({ result: z.object({ count: z.number() }) });

type QdrantPoint = z.infer<typeof PointSchema>;

/** Stable UUID-shaped point id for a collection name. */
function nameToPointId(name: string): string {
  const hex = createHash("sha1").update(name).digest("hex");
  return `${hex.slice(0, 8)}-${hex.slice(8, 12)}-${hex.slice(12, 16)}-${hex.slice(16, 20)}-${hex.slice(20, 32)}`;
}

function toQdrantFilter(filter: MetadataFilter | undefined): Record<string, unknown> | undefined {
  const entries = Object.entries(filter ?? {});
  if (entries.length === 0) return undefined;
  return { must: entries.map(([key, value]) => ({ key, match: { value } })) };
}

function toStored(point: QdrantPoint): StoredRecord {
  const payload = point.payload ?? {};
  const { [DOCUMENT_KEY]: document, ...metadata } = payload;
  return {
    id: String(point.id),
    document: typeof document === "string" ? document : "",
    metadata,
  };
}

/**
 * Qdrant REST backend. Payloads carry the metadata fields at top level plus
 * the document text; cosine scores are turned into distances.
 */
export class QdrantVectorIndex implements VectorIndex {
  readonly kind = "qdrant" as const;
  private readonly baseUrl: string;
  private readonly headers: Record<string, string>;
  private readonly fetchImpl: FetchLike;
  private readonly infoCollection: string;
  private infoReady = false;

  constructor(options: QdrantOptions) {
    this.baseUrl = options.url.replace(/\/+$/, "");
    this.headers = { "Content-Type": "application/json" };
    if (options.apiKey) this.headers["api-key"] = options.apiKey;
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    this.infoCollection = options.infoCollection ?? "memvault_collections";
  }

  private async request(method: string, route: string, body?: unknown): Promise<unknown> {
    const res = await this.fetchImpl(`${this.baseUrl}${route}`, {
      method,
      headers: this.headers,
      ...(body !== undefined ? { body: JSON.stringify(body) } : {}),
    });
    if (!res.ok) {
      const text = await res.text().catch(() => "");
      throw new Error(`qdrant ${method} ${route} failed: ${res.status} ${text}`.trim());
    }
    return res.json();
  }

  private async collectionExists(name: string): Promise<boolean> {
    const res = await this.fetchImpl(`${this.baseUrl}/collections/${encodeURIComponent(name)}`, {
      method: "GET",
      headers: this.headers,
    });
    if (res.status === 404) return false;
    if (!res.ok) throw new Error(`qdrant GET /collections/${name} failed: ${res.status}`);
    return true;
  }

  private async createCollection(name: string, size: number): Promise<void> {
    await this.request("PUT", `/collections/${encodeURIComponent(name)}`, {
      vectors: { size, distance: "Cosine" },
    });
  }

  private async ensureInfoCollection(): Promise<void> {
    if (this.infoReady) return;
    if (!(await this.collectionExists(this.infoCollection))) {
      await this.createCollection(this.infoCollection, 1);
    }
    this.infoReady = true;
  }

  async ensureCollection(name: string, dimensions: number, info: CollectionModelInfo): Promise<void> {
    if (!(await this.collectionExists(name))) {
      await this.createCollection(name, dimensions);
    }
    if ((await this.collectionInfo(name)) === null) {
      await this.setCollectionInfo(name, info);
    }
  }

  async upsert(name: string, records: VectorRecordInput[]): Promise<void> {
    if (records.length === 0) return;
    await this.request("PUT", `/collections/${encodeURIComponent(name)}/points?wait=true`, {
      points: records.map((r) => ({
        id: r.id,
        vector: r.vector,
        payload: { ...r.metadata, [DOCUMENT_KEY]: r.document },
      })),
    });
  }

  async get(name: string, selector: GetSelector): Promise<StoredRecord[]> {
    const route = `/collections/${encodeURIComponent(name)}/points`;
    if ("ids" in selector) {
      if (selector.ids.length === 0) return [];
      const raw = await this.request("POST", route, { ids: selector.ids, with_payload: true, with_vector: false });
      return PointsResponse.parse(raw).result.map(toStored);
    }

    const out: StoredRecord[] = [];
    const filter = toQdrantFilter(selector.filter);
    let offset: string | number | null | undefined;
    do {
      const remaining = selector.limit !== undefined ? selector.limit - out.length : SCROLL_PAGE;
      if (remaining <= 0) break;
      const raw = await this.request("POST", `${route}/scroll`, {
        limit: Math.min(SCROLL_PAGE, remaining),
        with_payload: true,
        with_vector: false,
        ...(filter ? { filter } : {}),
        ...(offset !== undefined && offset !== null ? { offset } : {}),
      });
      const page = ScrollResponse.parse(raw).result;
      out.push(...page.points.map(toStored));
      offset = page.next_page_offset;
    } while (offset !== undefined && offset !== null);
    return out;
  }

  async query(name: string, vector: number[], options: QueryOptions): Promise<QueryHit[]> {
    const filter = toQdrantFilter(options.filter);
    const raw = await this.request("POST", `/collections/${encodeURIComponent(name)}/points/search`, {
      vector,
      limit: Math.max(1, options.limit),
      with_payload: true,
      ...(filter ? { filter } : {}),
    });
    return SearchResponse.parse(raw).result.map((point) => ({
      ...toStored(point),
      distance: 1 - point.score,
    }));
  }

  async delete(name: string, ids: string[]): Promise<number> {
    if (ids.length === 0) return 0;
    const existing = await this.get(name, { ids });
    if (existing.length === 0) return 0;
    await this.request("POST", `/collections/${encodeURIComponent(name)}/points/delete?wait=true`, {
      points: existing.map((r) => r.id),
    });
    return existing.length;
  }

  async count(name: string): Promise<number> {
    const raw = await this.request("POST", `/collections/${encodeURIComponent(name)}/points/count`, {
      exact: true,
    });
    return CountResponse.parse(raw).result.count;
  }

  async updateMetadata(name: string, ids: string[], payloads: object[]): Promise<void> {
    if (ids.length !== payloads.length) {
      throw new Error(`updateMetadata: ${ids.length} ids but ${payloads.length} payloads`);
    }
    if (ids.length === 0) return;
    const documents = new Map((await this.get(name, { ids })).map((r) => [r.id, r.document]));
    for (let i = 0; i < ids.length; i++) {
      const document = documents.get(ids[i]);
      if (document === undefined) continue;
      await this.request("PUT", `/collections/${encodeURIComponent(name)}/points/payload?wait=true`, {
        points: [ids[i]],
        payload: { ...payloads[i], [DOCUMENT_KEY]: document },
      });
    }
  }

  async collectionInfo(name: string): Promise<CollectionModelInfo | null> {
    await this.ensureInfoCollection();
    const [record] = await this.get(this.infoCollection, { ids: [nameToPointId(name)] });
    if (!record) return null;
    const { embeddingModel, embeddingModelVersion } = record.metadata;
    if (typeof embeddingModel !== "string" || typeof embeddingModelVersion !== "string") return null;
    return { embeddingModel, embeddingModelVersion };
  }

  async setCollectionInfo(name: string, info: CollectionModelInfo): Promise<void> {
    await this.ensureInfoCollection();
    await this.upsert(this.infoCollection, [
      { id: nameToPointId(name), vector: [1], document: name, metadata: { ...info } },
    ]);
  }

  async close(): Promise<void> {
    this.infoReady = false;
  }
}
