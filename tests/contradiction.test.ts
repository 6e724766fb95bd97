import test from "node:test";
import assert from "node:assert/strict";
import { ContradictionDetector } from "../src/contradiction.js";
import type { VectorIndex } from "../src/vector/types.js";
import { SqliteVectorIndex } from "../src/vector/sqlite.js";
import { captureLogs } from "./helpers.js";

const CONFIG = { contradictionSimilarityThreshold: 0.85, contradictionCandidates: 5 };
const INFO = { embeddingModel: "fake-embed", embeddingModelVersion: "1" };

function learning(id: string, document: string, vector: number[], overrides: Record<string, unknown> = {}) {
  return {
    id,
    vector,
    document,
    metadata: {
      modelName: "m",
      workspaceId: "",
      status: "active",
      learningKey: "global::m::fact",
      ...overrides,
    },
  };
}

async function indexWith(...records: ReturnType<typeof learning>[]): Promise<SqliteVectorIndex> {
  const index = new SqliteVectorIndex(":memory:");
  await index.ensureCollection("learnings", 2, INFO);
  await index.upsert("learnings", records);
  return index;
}

test("flags close but different active learnings of the same model", async () => {
  captureLogs();
  const index = await indexWith(learning("old", "The deploy target is staging", [1, 0]));
  const detector = new ContradictionDetector(index, "learnings", CONFIG);

  const found = await detector.detect({
    text: "The deploy target is production",
    vector: [0.95, Math.sqrt(1 - 0.95 * 0.95)],
    modelName: "m",
    workspaceId: "",
  });
  assert.deepEqual(found, [
    { id: "old", text: "The deploy target is staging", similarity: 0.95, learningKey: "global::m::fact" },
  ]);
});

test("similarity below the threshold is not a contradiction", async () => {
  captureLogs();
  const index = await indexWith(learning("old", "Tabs for indentation", [1, 0]));
  const detector = new ContradictionDetector(index, "learnings", CONFIG);

  const found = await detector.detect({ text: "Use dark mode", vector: [0.5, Math.sqrt(0.75)], modelName: "m", workspaceId: "" });
  assert.deepEqual(found, []);
});

test("identical text after normalization is not a contradiction", async () => {
  captureLogs();
  const index = await indexWith(learning("old", "Use  Tabs", [1, 0]));
  const detector = new ContradictionDetector(index, "learnings", CONFIG);

  const found = await detector.detect({ text: " use tabs ", vector: [1, 0], modelName: "m", workspaceId: "" });
  assert.deepEqual(found, []);
});

test("excluded, inactive, other-model and other-workspace entries are skipped", async () => {
  captureLogs();
  const index = await indexWith(
    learning("prev", "A was true", [1, 0]),
    learning("gone", "B was true", [1, 0], { status: "superseded" }),
    learning("other-model", "C was true", [1, 0], { modelName: "n" }),
    learning("other-ws", "D was true", [1, 0], { workspaceId: "w1" }),
  );
  const detector = new ContradictionDetector(index, "learnings", CONFIG);

  const found = await detector.detect({
    text: "Something new",
    vector: [1, 0],
    modelName: "m",
    workspaceId: "",
    excludeId: "prev",
  });
  assert.deepEqual(found, []);
});

test("an empty collection yields no candidates", async () => {
  captureLogs();
  const index = await indexWith();
  const detector = new ContradictionDetector(index, "learnings", CONFIG);
  assert.deepEqual(await detector.detect({ text: "x", vector: [1, 0], modelName: "m", workspaceId: "" }), []);
});

test("backend failures degrade to no contradictions with a warning", async () => {
  const logs = captureLogs();
  const broken: VectorIndex = new SqliteVectorIndex(":memory:");
  await broken.close();
  const detector = new ContradictionDetector(broken, "learnings", CONFIG);

  assert.deepEqual(await detector.detect({ text: "x", vector: [1, 0], modelName: "m", workspaceId: "" }), []);
  assert.equal(logs.warn.length, 1);
  assert.match(logs.warn[0], /^\[memvault\] contradiction detection failed: /);
});
