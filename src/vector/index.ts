import type { MemvaultConfig } from "../types.js";
import { QdrantVectorIndex } from "./qdrant.js";
import { SqliteVectorIndex } from "./sqlite.js";
import type { VectorIndex } from "./types.js";

export function createVectorIndex(
  config: Pick<MemvaultConfig, "vectorBackend" | "sqlitePath" | "qdrantUrl" | "qdrantApiKey">,
): VectorIndex {
  switch (config.vectorBackend) {
    case "sqlite":
      return new SqliteVectorIndex(config.sqlitePath);
    case "qdrant":
      return new QdrantVectorIndex({ url: config.qdrantUrl, apiKey: config.qdrantApiKey });
  }
}

export { QdrantVectorIndex } from "./qdrant.js";
export { SqliteVectorIndex } from "./sqlite.js";
export type * from "./types.js";
export { cosineSimilarity, isRecord } from "./types.js";
