import test from "node:test";
import assert from "node:assert/strict";
import { setTimeout as sleep } from "node:timers/promises";
import { LifecycleManager } from "../src/lifecycle.js";
import { SqliteVectorIndex } from "../src/vector/sqlite.js";
import { FakeEmbedder, captureLogs, createTestEngine, vec } from "./helpers.js";

const DAY_MS = 86_400_000;

test("expired ids are those older than the TTL; a TTL of 0 never expires", async () => {
  const { engine } = await createTestEngine();
  const id = await engine.knowledge.addFact("Old news");
  const later = Date.now() + 91 * DAY_MS;

  assert.deepEqual(await engine.lifecycle.getExpiredIds("facts", 90, later), [id]);
  assert.deepEqual(await engine.lifecycle.getExpiredIds("facts", 90), []);
  assert.deepEqual(await engine.lifecycle.getExpiredIds("facts", 0, later), []);
  await engine.close();
});

test("cleanupExpired applies each collection's TTL", async () => {
  const { engine } = await createTestEngine({ ttlDays: { facts: 90, files: 30, learnings: 0 } });
  await engine.knowledge.addFact("fact");
  await engine.knowledge.addFile("notes.md", "Chunk.");
  await engine.knowledge.addLearning({ text: "learning", modelName: "m", agentName: "a" });

  const result = await engine.lifecycle.cleanupExpired("all", Date.now() + 31 * DAY_MS);
  assert.deepEqual(result, { totalDeleted: 1, byCollection: { facts: 0, files: 1, learnings: 0 } });
  assert.deepEqual(await engine.knowledge.getStats(), { facts: 1, files: 0, learnings: 1 });

  const facts = await engine.lifecycle.cleanupExpired("facts", Date.now() + 100 * DAY_MS);
  assert.deepEqual(facts, { totalDeleted: 1, byCollection: { facts: 1 } });
  await engine.close();
});

test("a model change is detected and reindexing re-embeds in place", async () => {
  const { engine, index } = await createTestEngine();
  const first = await engine.knowledge.addFact("Cache TTL is five minutes", { importance: 0.8 });
  await engine.knowledge.addFact("Deploys happen on Tuesdays");

  assert.equal((await engine.lifecycle.checkReindexNeeded()).needsReindex, false);
  assert.equal(await engine.lifecycle.reindexCollection("facts"), 0);

  const nextEmbedder = new FakeEmbedder("fake-embed-2", "1").set("Cache TTL is five minutes", vec(0, 0, 1));
  const upgraded = new LifecycleManager({ index, embedder: nextEmbedder, config: engine.config });

  const status = await upgraded.checkReindexNeeded();
  assert.equal(status.needsReindex, true);
  assert.deepEqual(status.collections.facts, {
    storedModel: "fake-embed",
    storedVersion: "1",
    currentModel: "fake-embed-2",
    currentVersion: "1",
    needsReindex: true,
  });

  assert.equal(await upgraded.reindexCollection("facts"), 2);
  assert.deepEqual(await index.collectionInfo("facts"), { embeddingModel: "fake-embed-2", embeddingModelVersion: "1" });
  const after = await upgraded.checkReindexNeeded();
  assert.equal(after.collections.facts.needsReindex, false);
  assert.equal(after.collections.files.needsReindex, true);

  const [hit] = await index.query("facts", vec(0, 0, 1), { limit: 1 });
  assert.equal(hit.id, first);
  assert.equal(hit.distance, 0);
  assert.equal(hit.metadata.importance, 0.8);
  await engine.close();
});

test("forced reindex runs even when the model is current", async () => {
  const { engine } = await createTestEngine();
  await engine.knowledge.addLearning({ text: "x", modelName: "m", agentName: "a" });
  assert.equal(await engine.lifecycle.reindexCollection("learnings", true), 1);
  await engine.close();
});

test("embedding status reports the model and record counts", async () => {
  const { engine, embedder } = await createTestEngine();
  await engine.knowledge.addFact("one");
  await engine.knowledge.addFact("two");

  assert.deepEqual(await engine.lifecycle.getEmbeddingStatus(), {
    modelName: "fake-embed",
    modelVersion: "1",
    vectorSize: 16,
    status: "loaded",
    collections: { facts: 2, files: 0, learnings: 0 },
  });

  embedder.failDimensions = true;
  const down = await engine.lifecycle.getEmbeddingStatus();
  assert.equal(down.status, "unavailable");
  assert.equal(down.vectorSize, 0);
  await engine.close();
});

test("tick reconciles learning versions", async () => {
  const { engine, index } = await createTestEngine();
  await engine.knowledge.addLearning({ text: "current", modelName: "m", agentName: "a", category: "fact" });
  await index.upsert("learnings", [
    {
      id: "dup",
      vector: vec(1),
      document: "duplicate",
      metadata: { learningKey: "global::m::fact", modelName: "m", status: "active", version: 1, createdAtTs: 1 },
    },
  ]);

  await engine.lifecycle.tick();
  const [dup] = await index.get("learnings", { ids: ["dup"] });
  assert.equal(dup.metadata.status, "superseded");
  await engine.close();
});

test("start and stop are idempotent", async () => {
  const { engine } = await createTestEngine();
  engine.lifecycle.start();
  engine.lifecycle.start();
  assert.equal(engine.lifecycle.isRunning, true);
  engine.lifecycle.stop();
  engine.lifecycle.stop();
  assert.equal(engine.lifecycle.isRunning, false);
  await engine.close();
});

test("the scheduler keeps running after a failed tick", async () => {
  const logs = captureLogs();
  const index = new SqliteVectorIndex(":memory:");
  await index.close();
  const lifecycle = new LifecycleManager({
    index,
    embedder: new FakeEmbedder(),
    config: { ttlDays: { facts: 90, files: 30, learnings: 0 }, reindexCheckIntervalSeconds: 0.01 },
  });

  lifecycle.start();
  await sleep(200);
  lifecycle.stop();

  const failures = logs.error.filter((line) => line.startsWith("[memvault] lifecycle tick failed:"));
  assert.ok(failures.length >= 2, `expected repeated ticks, saw ${failures.length}`);
});
