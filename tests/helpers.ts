import { parseConfig } from "../src/config.js";
import type { Embedder } from "../src/embedding.js";
import { MemoryEngine } from "../src/engine.js";
import { initLogger, type LoggerBackend } from "../src/logger.js";
import type { MemvaultConfig } from "../src/types.js";
import { SqliteVectorIndex } from "../src/vector/sqlite.js";

export const DIMS = 16;

/** Unit-free test vector: the given leading components, zero-padded to DIMS. */
export function vec(...values: number[]): number[] {
  return [...values, ...new Array<number>(Math.max(0, DIMS - values.length)).fill(0)];
}

function fnv1a(text: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < text.length; i++) {
    hash ^= text.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

function mulberry32(seed: number): () => number {
  let a = seed;
  return () => {
    a = (a + 0x6d2b79f5) | 0;
    let t = Math.imul(a ^ (a >>> 15), 1 | a);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Deterministic embedder. Texts registered with `set` get that vector;
 * anything else gets a pseudo-random vector seeded by the text.
 */
export class FakeEmbedder implements Embedder {
  private readonly fixed = new Map<string, number[]>();
  calls = 0;
  fail = false;
  failDimensions = false;

  constructor(
    readonly model = "fake-embed",
    readonly version = "1",
  ) {}

  set(text: string, vector: number[]): this {
    this.fixed.set(text, vector);
    return this;
  }

  async dimensions(): Promise<number> {
    if (this.failDimensions) throw new Error("embedder offline");
    return DIMS;
  }

  async embed(text: string): Promise<number[]> {
    this.calls += 1;
    if (this.fail) throw new Error("embedder offline");
    const fixed = this.fixed.get(text);
    if (fixed) return fixed;
    const next = mulberry32(fnv1a(text));
    return Array.from({ length: DIMS }, () => next() * 2 - 1);
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    const out: number[][] = [];
    for (const text of texts) out.push(await this.embed(text));
    return out;
  }
}

export interface CapturedLogs {
  info: string[];
  warn: string[];
  error: string[];
  debug: string[];
}

export function captureLogs(debug = false): CapturedLogs {
  const logs: CapturedLogs = { info: [], warn: [], error: [], debug: [] };
  const backend: LoggerBackend = {
    info(msg: unknown) {
      logs.info.push(String(msg));
    },
    warn(msg: unknown) {
      logs.warn.push(String(msg));
    },
    error(msg: unknown) {
      logs.error.push(String(msg));
    },
    debug(msg: unknown) {
      logs.debug.push(String(msg));
    },
  };
  initLogger(backend, debug);
  return logs;
}

export function testConfig(overrides: Partial<MemvaultConfig> = {}): MemvaultConfig {
  return {
    ...parseConfig({ sqlitePath: ":memory:", schedulerEnabled: false }),
    ...overrides,
  };
}

export interface TestEngine {
  engine: MemoryEngine;
  embedder: FakeEmbedder;
  index: SqliteVectorIndex;
  logs: CapturedLogs;
}

export async function createTestEngine(overrides: Partial<MemvaultConfig> = {}): Promise<TestEngine> {
  const logs = captureLogs();
  const embedder = new FakeEmbedder();
  const index = new SqliteVectorIndex(":memory:");
  const engine = new MemoryEngine(testConfig(overrides), { index, embedder });
  await engine.initialize();
  return { engine, embedder, index, logs };
}
