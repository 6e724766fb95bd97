import OpenAI from "openai";
import { log } from "./logger.js";
import type { MemvaultConfig } from "./types.js";

export interface Embedder {
  readonly model: string;
  readonly version: string;
  /** Vector length; resolved once and cached. */
  dimensions(): Promise<number>;
  embed(text: string): Promise<number[]>;
  embedBatch(texts: string[]): Promise<number[][]>;
}

const MAX_INPUT_CHARS = 8000;
const BATCH_SIZE = 64;

/** Embeddings from any OpenAI-compatible endpoint. */
export class OpenAiEmbedder implements Embedder {
  readonly model: string;
  readonly version: string;
  private readonly client: OpenAI;
  private readonly requestedDims: number | undefined;
  private dims: number | undefined;

  constructor(
    config: Pick<
      MemvaultConfig,
      "embeddingModel" | "embeddingModelVersion" | "embeddingDimensions" | "embeddingApiKey" | "embeddingBaseUrl"
    >,
  ) {
    this.model = config.embeddingModel;
    this.version = config.embeddingModelVersion;
    this.requestedDims = config.embeddingDimensions;
    this.dims = config.embeddingDimensions;
    if (!config.embeddingApiKey && !config.embeddingBaseUrl) {
      log.warn("no embedding API key configured; requests will fail until OPENAI_API_KEY is set");
    }
    this.client = new OpenAI({
      apiKey: config.embeddingApiKey ?? "unset",
      ...(config.embeddingBaseUrl ? { baseURL: config.embeddingBaseUrl } : {}),
    });
  }

  async dimensions(): Promise<number> {
    if (this.dims === undefined) {
      const probe = await this.embed("dimension probe");
      this.dims = probe.length;
      log.debug(`embedding model ${this.model} produces ${this.dims}-dim vectors`);
    }
    return this.dims;
  }

  async embed(text: string): Promise<number[]> {
    const [vector] = await this.embedBatch([text]);
    if (!vector) throw new Error(`embedding model ${this.model} returned no vector`);
    return vector;
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    const out: number[][] = [];
    for (let i = 0; i < texts.length; i += BATCH_SIZE) {
      const batch = texts.slice(i, i + BATCH_SIZE).map((t) => t.slice(0, MAX_INPUT_CHARS));
      const res = await this.client.embeddings.create({
        model: this.model,
        input: batch,
        ...(this.requestedDims !== undefined ? { dimensions: this.requestedDims } : {}),
      });
      const ordered = [...res.data].sort((a, b) => a.index - b.index);
      for (const item of ordered) out.push(item.embedding);
    }
    return out;
  }
}
