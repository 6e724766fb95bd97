import path from "node:path";
import { mkdirSync } from "node:fs";
import Database from "better-sqlite3";
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
import { cosineSimilarity, isRecord } from "./types.js";

export const SQLITE_TABLES_SQL = `
CREATE TABLE IF NOT EXISTS collections (
  name TEXT PRIMARY KEY,
  dimensions INTEGER NOT NULL,
  embedding_model TEXT NOT NULL,
  embedding_model_version TEXT NOT NULL,
  created_at TEXT NOT NULL
);
CREATE TABLE IF NOT EXISTS records (
  collection TEXT NOT NULL,
  id TEXT NOT NULL,
  document TEXT NOT NULL,
  metadata TEXT NOT NULL,
  vector TEXT NOT NULL,
  PRIMARY KEY (collection, id)
);
`;

interface RecordRow {
  id: string;
  document: string;
  metadata: string;
  vector: string;
}

interface CollectionRow {
  embedding_model: string;
  embedding_model_version: string;
}

const FILTER_KEY = /^[A-Za-z_][A-Za-z0-9_]*$/;

function buildWhere(name: string, filter: MetadataFilter | undefined): { sql: string; params: Array<string | number> } {
  const clauses = ["collection = ?"];
  const params: Array<string | number> = [name];
  for (const [key, value] of Object.entries(filter ?? {})) {
    if (!FILTER_KEY.test(key)) throw new Error(`invalid filter key: ${key}`);
    clauses.push(`json_extract(metadata, '$.${key}') = ?`);
    params.push(typeof value === "boolean" ? (value ? 1 : 0) : value);
  }
  return { sql: clauses.join(" AND "), params };
}

function parseMetadata(raw: string): Record<string, unknown> {
  const parsed: unknown = JSON.parse(raw);
  return isRecord(parsed) ? parsed : {};
}

function parseVector(raw: string): number[] {
  const parsed: unknown = JSON.parse(raw);
  if (!Array.isArray(parsed)) return [];
  return parsed.filter((n): n is number => typeof n === "number");
}

function toStored(row: RecordRow): StoredRecord {
  return { id: row.id, document: row.document, metadata: parseMetadata(row.metadata) };
}

/**
 * Vector index on a single SQLite file. Vectors are stored as JSON text and
 * searched by brute-force cosine similarity.
 */
export class SqliteVectorIndex implements VectorIndex {
  readonly kind = "sqlite" as const;
  private readonly db: Database.Database;

  constructor(filePath: string) {
    if (filePath !== ":memory:") {
      mkdirSync(path.dirname(path.resolve(filePath)), { recursive: true });
    }
    this.db = new Database(filePath);
    this.db.exec("PRAGMA journal_mode=WAL;");
    this.db.exec(SQLITE_TABLES_SQL);
  }

  async ensureCollection(name: string, dimensions: number, info: CollectionModelInfo): Promise<void> {
    this.db
      .prepare(
        `INSERT OR IGNORE INTO collections(name, dimensions, embedding_model, embedding_model_version, created_at)
         VALUES (?,?,?,?,?)`,
      )
      .run(name, dimensions, info.embeddingModel, info.embeddingModelVersion, new Date().toISOString());
  }

  async upsert(name: string, records: VectorRecordInput[]): Promise<void> {
    const insert = this.db.prepare(
      "INSERT OR REPLACE INTO records(collection, id, document, metadata, vector) VALUES (?,?,?,?,?)",
    );
    const tx = this.db.transaction((rows: VectorRecordInput[]) => {
      for (const r of rows) {
        insert.run(name, r.id, r.document, JSON.stringify(r.metadata), JSON.stringify(r.vector));
      }
    });
    tx(records);
  }

  async get(name: string, selector: GetSelector): Promise<StoredRecord[]> {
    if ("ids" in selector) {
      if (selector.ids.length === 0) return [];
      const placeholders = selector.ids.map(() => "?").join(",");
      const rows = this.db
        .prepare<Array<string>, RecordRow>(
          `SELECT id, document, metadata, vector FROM records WHERE collection = ? AND id IN (${placeholders})`,
        )
        .all(name, ...selector.ids);
      return rows.map(toStored);
    }
    const where = buildWhere(name, selector.filter);
    const limit = selector.limit !== undefined ? ` LIMIT ${Math.max(0, Math.floor(selector.limit))}` : "";
    const rows = this.db
      .prepare<Array<string | number>, RecordRow>(
        `SELECT id, document, metadata, vector FROM records WHERE ${where.sql} ORDER BY rowid${limit}`,
      )
      .all(...where.params);
    return rows.map(toStored);
  }

  async query(name: string, vector: number[], options: QueryOptions): Promise<QueryHit[]> {
    const where = buildWhere(name, options.filter);
    const rows = this.db
      .prepare<Array<string | number>, RecordRow>(
        `SELECT id, document, metadata, vector FROM records WHERE ${where.sql}`,
      )
      .all(...where.params);

    return rows
      .map((row) => ({
        ...toStored(row),
        distance: 1 - cosineSimilarity(vector, parseVector(row.vector)),
      }))
      .sort((a, b) => a.distance - b.distance)
      .slice(0, Math.max(0, options.limit));
  }

  async delete(name: string, ids: string[]): Promise<number> {
    if (ids.length === 0) return 0;
    const remove = this.db.prepare("DELETE FROM records WHERE collection = ? AND id = ?");
    const tx = this.db.transaction((batch: string[]) => {
      let removed = 0;
      for (const id of batch) removed += remove.run(name, id).changes;
      return removed;
    });
    return tx(ids);
  }

  async count(name: string): Promise<number> {
    const row = this.db
      .prepare<[string], { n: number }>("SELECT COUNT(*) AS n FROM records WHERE collection = ?")
      .get(name);
    return row?.n ?? 0;
  }

  async updateMetadata(name: string, ids: string[], payloads: object[]): Promise<void> {
    if (ids.length !== payloads.length) {
      throw new Error(`updateMetadata: ${ids.length} ids but ${payloads.length} payloads`);
    }
    const update = this.db.prepare("UPDATE records SET metadata = ? WHERE collection = ? AND id = ?");
    const tx = this.db.transaction(() => {
      ids.forEach((id, i) => update.run(JSON.stringify(payloads[i]), name, id));
    });
    tx();
  }

  async collectionInfo(name: string): Promise<CollectionModelInfo | null> {
    const row = this.db
      .prepare<[string], CollectionRow>(
        "SELECT embedding_model, embedding_model_version FROM collections WHERE name = ?",
      )
      .get(name);
    if (!row) return null;
    return { embeddingModel: row.embedding_model, embeddingModelVersion: row.embedding_model_version };
  }

  async setCollectionInfo(name: string, info: CollectionModelInfo): Promise<void> {
    this.db
      .prepare("UPDATE collections SET embedding_model = ?, embedding_model_version = ? WHERE name = ?")
      .run(info.embeddingModel, info.embeddingModelVersion, name);
  }

  async close(): Promise<void> {
    if (this.db.open) this.db.close();
  }
}
