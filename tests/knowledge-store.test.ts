import test from "node:test";
import assert from "node:assert/strict";
import { ValidationError } from "../src/errors.js";
import { createTestEngine, vec } from "./helpers.js";

const PORT_80 = "Port is 80";
const PORT_8080 = "Port is 8080";

test("a second learning for the same key supersedes the first", async () => {
  const { engine, embedder } = await createTestEngine();
  embedder.set(PORT_80, vec(1, 0.1)).set(PORT_8080, vec(1, 0.2)).set("port", vec(1, 0));
  const knowledge = engine.knowledge;

  const first = await knowledge.addLearning({ text: PORT_80, modelName: "m", agentName: "a", category: "fact" });
  assert.equal(first.version, 1);
  assert.equal(first.learningKey, "global::m::fact");
  assert.equal(first.conflictDetected, false);
  assert.equal(first.previousVersionId, null);

  const second = await knowledge.addLearning({ text: PORT_8080, modelName: "m", agentName: "a", category: "fact" });
  assert.equal(second.version, 2);
  assert.equal(second.conflictDetected, true);
  assert.equal(second.previousVersionId, first.id);
  assert.deepEqual(second.contradictions, []);

  const hits = await knowledge.searchLearnings("port", { modelName: "m" });
  assert.deepEqual(
    hits.map((h) => [h.id, h.text, h.metadata.version]),
    [[second.id, PORT_8080, 2]],
  );

  const versions = await knowledge.listVersions("m");
  assert.deepEqual(
    versions.map((v) => [v.id, v.metadata.version, v.metadata.status]),
    [
      [first.id, 1, "superseded"],
      [second.id, 2, "active"],
    ],
  );
  assert.equal(versions[0].metadata.supersededBy, second.id);
  assert.equal(versions[1].metadata.previousVersionId, first.id);
  await engine.close();
});

test("rewording that only changes case and spacing is not a conflict", async () => {
  const { engine } = await createTestEngine();
  await engine.knowledge.addLearning({ text: "Use tabs", modelName: "m", agentName: "a", category: "preference" });
  const again = await engine.knowledge.addLearning({
    text: "  use   TABS ",
    modelName: "m",
    agentName: "a",
    category: "preference",
  });
  assert.equal(again.version, 2);
  assert.equal(again.conflictDetected, false);
  await engine.close();
});

test("each learning key keeps exactly one active version", async () => {
  const { engine } = await createTestEngine();
  const results = [];
  for (let i = 1; i <= 5; i++) {
    results.push(await engine.knowledge.addLearning({ text: `Retry limit is ${i}`, modelName: "m", agentName: "a" }));
  }
  assert.deepEqual(
    results.map((r) => r.version),
    [1, 2, 3, 4, 5],
  );
  const versions = await engine.knowledge.listVersions("m");
  assert.equal(versions.filter((v) => v.metadata.status === "active").length, 1);
  assert.equal(versions.length, 5);
  await engine.close();
});

test("concurrent writes to one key still produce consecutive versions", async () => {
  const { engine } = await createTestEngine();
  const results = await Promise.all(
    ["one", "two", "three"].map((word) =>
      engine.knowledge.addLearning({ text: `Answer ${word}`, modelName: "m", agentName: "a", category: "fact" }),
    ),
  );
  assert.deepEqual(results.map((r) => r.version).sort(), [1, 2, 3]);
  const versions = await engine.knowledge.listVersions("m");
  assert.equal(versions.filter((v) => v.metadata.status === "active").length, 1);
  await engine.close();
});

test("learning keys are scoped by workspace and model", async () => {
  const { engine } = await createTestEngine();
  const global = await engine.knowledge.addLearning({ text: "x", modelName: "m", agentName: "a" });
  const scoped = await engine.knowledge.addLearning({ text: "y", modelName: "m", agentName: "a", workspaceId: "w1" });
  const other = await engine.knowledge.addLearning({ text: "z", modelName: "n", agentName: "a" });
  assert.equal(global.learningKey, "global::m::general");
  assert.equal(scoped.learningKey, "w1::m::general");
  assert.equal(other.learningKey, "global::n::general");
  assert.deepEqual(
    [global.version, scoped.version, other.version],
    [1, 1, 1],
  );
  await engine.close();
});

test("unknown categories fall back to general with a warning", async () => {
  const { engine, logs } = await createTestEngine();
  const result = await engine.knowledge.addLearning({ text: "x", modelName: "m", agentName: "a", category: "trivia" });
  assert.equal(result.learningKey, "global::m::general");
  assert.ok(logs.warn.includes("[memvault] unknown learning category 'trivia'; using 'general'"));
  await engine.close();
});

test("blank input stores nothing", async () => {
  const { engine } = await createTestEngine();
  assert.deepEqual(await engine.knowledge.addLearning({ text: "   ", modelName: "m", agentName: "a" }), {
    id: "",
    version: 0,
    learningKey: "",
    workspaceId: "",
    conflictDetected: false,
    previousVersionId: null,
    contradictions: [],
  });
  assert.equal(await engine.knowledge.addFact(""), "");
  assert.equal(await engine.knowledge.addFact("\u0000\u0000"), "");
  assert.deepEqual(await engine.knowledge.getStats(), { facts: 0, files: 0, learnings: 0 });
  await engine.close();
});

test("NUL bytes are stripped before storage", async () => {
  const { engine, index } = await createTestEngine();
  const id = await engine.knowledge.addFact("a\u0000b");
  const [record] = await index.get("facts", { ids: [id] });
  assert.equal(record.document, "ab");
  await engine.close();
});

test("oversized text and invalid metadata are rejected", async () => {
  const { engine } = await createTestEngine({ maxTextLength: 10 });
  await assert.rejects(engine.knowledge.addFact("x".repeat(11)), ValidationError);
  await assert.rejects(engine.knowledge.addFact("ok", { importance: 2 }), ValidationError);
  await assert.rejects(engine.knowledge.addFact("ok", { nested: { a: 1 } }), ValidationError);
  assert.equal(await engine.knowledge.addFact("x".repeat(10)) !== "", true);
  await engine.close();
});

test("unknown metadata keys are kept under extra", async () => {
  const { engine, index } = await createTestEngine();
  const id = await engine.knowledge.addFact("Release train leaves on Friday", {
    team: "core",
    importance: 0.9,
    workspaceId: "w1",
  });
  const [record] = await index.get("facts", { ids: [id] });
  assert.deepEqual(record.metadata.extra, { team: "core" });
  assert.equal(record.metadata.importance, 0.9);
  assert.equal(record.metadata.workspaceId, "w1");
  assert.equal(record.metadata.status, "active");
  assert.equal(record.metadata.version, 1);
  await engine.close();
});

test("searchFacts ranks by the composite score and filters by priority", async () => {
  const { engine, embedder } = await createTestEngine();
  embedder.set("alpha one", vec(1, 0)).set("alpha two", vec(0, 1)).set("alpha", vec(1, 0));
  await engine.knowledge.addFact("alpha two", { priority: "archived" });
  await engine.knowledge.addFact("alpha one", { priority: "critical" });

  const hits = await engine.knowledge.searchFacts("alpha");
  assert.deepEqual(
    hits.map((h) => [h.text, h.score, h.similarity, h.relevance, h.source]),
    [
      ["alpha one", 0.85, 1, 1, "facts"],
      ["alpha two", 0.36, 0, 0.2, "facts"],
    ],
  );

  const important = await engine.knowledge.searchFacts("alpha", { minPriority: "normal" });
  assert.deepEqual(
    important.map((h) => h.text),
    ["alpha one"],
  );
  const top = await engine.knowledge.searchFacts("alpha", { topK: 1 });
  assert.deepEqual(
    top.map((h) => h.text),
    ["alpha one"],
  );
  await engine.close();
});

test("searchFacts filters by agent and workspace and dedupes by text", async () => {
  const { engine, embedder } = await createTestEngine();
  embedder.set("shared note", vec(1, 0)).set("bob note", vec(1, 0)).set("note", vec(1, 0));
  await engine.knowledge.addFact("shared note", { agentName: "alice" });
  await engine.knowledge.addFact("shared note", { agentName: "alice" });
  await engine.knowledge.addFact("bob note", { agentName: "bob" });
  await engine.knowledge.addFact("shared note", { agentName: "alice", workspaceId: "w1" });

  const alice = await engine.knowledge.searchFacts("note", { agentName: "alice" });
  assert.deepEqual(
    alice.map((h) => h.text),
    ["shared note"],
  );
  const workspace = await engine.knowledge.searchFacts("note", { workspaceId: "w1" });
  assert.deepEqual(
    workspace.map((h) => h.metadata.workspaceId),
    ["w1"],
  );
  await engine.close();
});

test("file chunks are only searched when includeFiles is set", async () => {
  const { engine, embedder } = await createTestEngine();
  embedder.set("deploy runbook", vec(1, 0)).set("deploy", vec(1, 0));
  await engine.knowledge.addFileChunk("deploy runbook", { fileName: "runbook.md", chunkIndex: 0 });

  assert.deepEqual(await engine.knowledge.searchFacts("deploy"), []);
  const withFiles = await engine.knowledge.searchFacts("deploy", { includeFiles: true });
  assert.deepEqual(
    withFiles.map((h) => [h.text, h.source]),
    [["deploy runbook", "files"]],
  );
  await engine.close();
});

test("retrieval metrics count requests, results and failures", async () => {
  const { engine, embedder } = await createTestEngine();
  await engine.knowledge.addFact("alpha");
  await engine.knowledge.searchFacts("alpha");
  embedder.fail = true;
  assert.deepEqual(await engine.knowledge.searchFacts("alpha"), []);

  const metrics = engine.knowledge.getRetrievalMetrics();
  assert.equal(metrics.searchRequestsTotal, 2);
  assert.equal(metrics.searchErrorsTotal, 1);
  assert.equal(metrics.searchResultsTotal, 1);
  assert.equal(metrics.avgResultsPerRequest, 0.5);
  await engine.close();
});

test("deleteModelLearnings soft-deletes active entries and is idempotent", async () => {
  const { engine } = await createTestEngine();
  await engine.knowledge.addLearning({ text: "A", modelName: "m", agentName: "a", category: "fact" });
  await engine.knowledge.addLearning({ text: "B", modelName: "m", agentName: "a", category: "fact" });
  await engine.knowledge.addLearning({ text: "C", modelName: "m", agentName: "a", category: "preference" });
  await engine.knowledge.addLearning({ text: "D", modelName: "n", agentName: "a", category: "fact" });

  assert.equal(await engine.knowledge.deleteModelLearnings("m", { category: "preference" }), 1);
  assert.equal(await engine.knowledge.deleteModelLearnings("m"), 1);
  assert.equal(await engine.knowledge.deleteModelLearnings("m"), 0);
  assert.deepEqual(await engine.knowledge.searchLearnings("A", { modelName: "m" }), []);

  const [latest] = await engine.knowledge.listAuditLogs({ modelName: "m", limit: 1 });
  assert.equal(latest.eventType, "learnings_deleted");
  assert.deepEqual(latest.details, { count: 1 });

  const stats = await engine.knowledge.getLearningStats();
  assert.deepEqual(stats, { totalLearnings: 4, activeLearnings: 1, byModel: { n: 1 }, byCategory: { fact: 1 } });
  await engine.close();
});

test("writes are audited newest first", async () => {
  const { engine } = await createTestEngine();
  const first = await engine.knowledge.addLearning({ text: "v1", modelName: "m", agentName: "a" });
  const second = await engine.knowledge.addLearning({ text: "v2", modelName: "m", agentName: "a" });

  const events = await engine.knowledge.listAuditLogs({ modelName: "m" });
  assert.deepEqual(
    events.map((e) => [e.eventType, e.entryId]),
    [
      ["learning_added", second.id],
      ["learning_superseded", first.id],
      ["learning_added", first.id],
    ],
  );
  assert.deepEqual(events[1].details, { supersededBy: second.id, learningKey: "global::m::general" });
  await engine.close();
});

test("reconcileLearningVersions repairs keys with several active entries", async () => {
  const { engine, index, embedder } = await createTestEngine();
  const kept = await engine.knowledge.addLearning({ text: "current", modelName: "m", agentName: "a", category: "fact" });
  await index.upsert("learnings", [
    {
      id: "rogue",
      vector: await embedder.embed("stale"),
      document: "stale",
      metadata: {
        workspaceId: "",
        modelName: "m",
        category: "fact",
        learningKey: "global::m::fact",
        status: "active",
        version: 1,
        createdAt: "2020-01-01T00:00:00.000Z",
        createdAtTs: 1577836800,
      },
    },
  ]);

  assert.equal(await engine.knowledge.reconcileLearningVersions(), 1);
  assert.equal(await engine.knowledge.reconcileLearningVersions(), 0);

  const [rogue] = await index.get("learnings", { ids: ["rogue"] });
  assert.equal(rogue.metadata.status, "superseded");
  assert.equal(rogue.metadata.supersededBy, kept.id);
  const [event] = await engine.knowledge.listAuditLogs({ limit: 1 });
  assert.equal(event.eventType, "learning_versions_reconciled");
  assert.equal(event.entryId, kept.id);
  await engine.close();
});

test("a failed write of the new version leaves the previous version active", async () => {
  const { engine, index, embedder } = await createTestEngine();
  embedder.set(PORT_80, vec(1, 0.1)).set("port", vec(1, 0));
  const first = await engine.knowledge.addLearning({ text: PORT_80, modelName: "m", agentName: "a", category: "fact" });

  const upsert = index.upsert.bind(index);
  index.upsert = async (name, records) => {
    if (name === "learnings") throw new Error("disk full");
    return upsert(name, records);
  };
  await assert.rejects(
    engine.knowledge.addLearning({ text: PORT_8080, modelName: "m", agentName: "a", category: "fact" }),
    /disk full/,
  );
  index.upsert = upsert;

  const versions = await engine.knowledge.listVersions("m");
  assert.deepEqual(
    versions.map((v) => [v.id, v.metadata.status, v.metadata.supersededBy]),
    [[first.id, "active", undefined]],
  );
  assert.equal(await engine.knowledge.reconcileLearningVersions(), 0);
  const hits = await engine.knowledge.searchLearnings("port", { modelName: "m" });
  assert.deepEqual(
    hits.map((h) => h.id),
    [first.id],
  );
  await engine.close();
});

test("a failed supersede is repaired by reconciliation in favour of the new version", async () => {
  const { engine, index } = await createTestEngine();
  const first = await engine.knowledge.addLearning({ text: PORT_80, modelName: "m", agentName: "a", category: "fact" });

  const updateMetadata = index.updateMetadata.bind(index);
  index.updateMetadata = async () => {
    throw new Error("disk full");
  };
  await assert.rejects(
    engine.knowledge.addLearning({ text: PORT_8080, modelName: "m", agentName: "a", category: "fact" }),
    /disk full/,
  );
  index.updateMetadata = updateMetadata;

  const before = await engine.knowledge.listVersions("m");
  assert.deepEqual(
    before.map((v) => [v.metadata.version, v.metadata.status]),
    [
      [1, "active"],
      [2, "active"],
    ],
  );

  assert.equal(await engine.knowledge.reconcileLearningVersions(), 1);
  const after = await engine.knowledge.listVersions("m");
  assert.deepEqual(
    after.map((v) => [v.metadata.version, v.metadata.status]),
    [
      [1, "superseded"],
      [2, "active"],
    ],
  );
  assert.equal(after[0].id, first.id);
  assert.equal(after[0].metadata.supersededBy, after[1].id);
  await engine.close();
});
