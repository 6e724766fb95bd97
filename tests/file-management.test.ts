import test from "node:test";
import assert from "node:assert/strict";
import { chunkText } from "../src/chunking.js";
import { ValidationError } from "../src/errors.js";
import { createTestEngine } from "./helpers.js";

const NOTES = "First sentence here. Second sentence here. Third one.";

test("short text is a single trimmed chunk; blank text has none", () => {
  assert.deepEqual(chunkText("  hello  ", { chunkSize: 500, chunkOverlap: 50 }), [{ content: "hello", index: 0 }]);
  assert.deepEqual(chunkText("   ", { chunkSize: 500, chunkOverlap: 50 }), []);
});

test("sentences are packed into chunks up to the size budget", () => {
  assert.deepEqual(chunkText(NOTES, { chunkSize: 40, chunkOverlap: 0 }), [
    { content: "First sentence here.", index: 0 },
    { content: "Second sentence here. Third one.", index: 1 },
  ]);
});

test("trailing sentences are repeated as overlap", () => {
  assert.deepEqual(chunkText("aaaa. bbbb. cccc.", { chunkSize: 12, chunkOverlap: 5 }), [
    { content: "aaaa. bbbb.", index: 0 },
    { content: "bbbb. cccc.", index: 1 },
  ]);
});

test("a sentence longer than the budget is cut into windows", () => {
  assert.deepEqual(
    chunkText("abcdefghij", { chunkSize: 4, chunkOverlap: 1 }).map((c) => c.content),
    ["abcd", "defg", "ghij"],
  );
});

test("addFile stores every chunk under one file id", async () => {
  const { engine, index } = await createTestEngine({ chunkSize: 40, chunkOverlap: 0 });
  const ids = await engine.knowledge.addFile(" notes.md ", NOTES, { folder: "docs" });
  assert.equal(ids.length, 2);

  const chunks = await index.get("files", { ids });
  const fileIds = new Set(chunks.map((c) => c.metadata.fileId));
  assert.equal(fileIds.size, 1);
  assert.deepEqual(chunks.map((c) => c.metadata.chunkIndex).sort(), [0, 1]);

  assert.deepEqual(await engine.knowledge.listFiles(), [
    { fileName: "notes.md", chunksCount: 2, folder: "docs", pinned: false, status: "active" },
  ]);
  await engine.close();
});

test("file chunks require a file name", async () => {
  const { engine } = await createTestEngine();
  await assert.rejects(engine.knowledge.addFileChunk("orphan chunk", {}), ValidationError);
  await assert.rejects(engine.knowledge.addFile("  ", "content"), ValidationError);
  await engine.close();
});

test("soft delete and restore are idempotent and hide chunks from search", async () => {
  const { engine } = await createTestEngine({ chunkSize: 40, chunkOverlap: 0 });
  await engine.knowledge.addFile("notes.md", NOTES);

  assert.equal(await engine.knowledge.softDeleteFile("notes.md"), 2);
  assert.equal(await engine.knowledge.softDeleteFile("notes.md"), 0);
  assert.deepEqual(await engine.knowledge.searchFacts("sentence", { includeFiles: true }), []);
  assert.equal((await engine.knowledge.listFiles())[0].status, "deleted");

  assert.equal(await engine.knowledge.restoreFile("notes.md"), 2);
  assert.equal(await engine.knowledge.restoreFile("notes.md"), 0);
  const hits = await engine.knowledge.searchFacts("sentence", { includeFiles: true });
  assert.equal(hits.length, 2);
  assert.equal(hits[0].metadata.deletedAt, undefined);
  assert.equal((await engine.knowledge.listFiles())[0].status, "active");
  await engine.close();
});

test("pinning sets and clears the pinned priority", async () => {
  const { engine, index } = await createTestEngine();
  const [id] = await engine.knowledge.addFile("plan.md", "Ship it.");

  assert.equal(await engine.knowledge.pinFile("plan.md", true), 1);
  let [chunk] = await index.get("files", { ids: [id] });
  assert.equal(chunk.metadata.pinned, true);
  assert.equal(chunk.metadata.priority, "pinned");
  assert.equal(typeof chunk.metadata.pinnedAt, "string");
  assert.equal((await engine.knowledge.listFiles())[0].pinned, true);

  assert.equal(await engine.knowledge.pinFile("plan.md", false), 1);
  [chunk] = await index.get("files", { ids: [id] });
  assert.equal(chunk.metadata.pinned, false);
  assert.equal(chunk.metadata.priority, "normal");
  assert.equal("pinnedAt" in chunk.metadata, false);
  await engine.close();
});

test("move and rename rewrite every chunk and are audited", async () => {
  const { engine } = await createTestEngine({ chunkSize: 40, chunkOverlap: 0 });
  await engine.knowledge.addFile("notes.md", NOTES);

  assert.equal(await engine.knowledge.moveFile("notes.md", " archive "), 2);
  assert.equal(await engine.knowledge.renameFile("notes.md", "   "), 0);
  assert.equal(await engine.knowledge.renameFile(" notes.md ", "renamed.md"), 2);
  assert.equal(await engine.knowledge.renameFile("notes.md", "again.md"), 0);

  assert.deepEqual(await engine.knowledge.listFiles(), [
    { fileName: "renamed.md", chunksCount: 2, folder: "archive", pinned: false, status: "active" },
  ]);
  const [event] = await engine.knowledge.listAuditLogs({ limit: 1 });
  assert.equal(event.eventType, "file_renamed");
  assert.deepEqual(event.details, { fileName: "notes.md", chunks: 2, newFileName: "renamed.md" });
  await engine.close();
});

test("file operations are scoped to a workspace when one is given", async () => {
  const { engine } = await createTestEngine();
  await engine.knowledge.addFile("shared.md", "Workspace one.", { workspaceId: "w1" });
  await engine.knowledge.addFile("shared.md", "Workspace two.", { workspaceId: "w2" });

  assert.equal(await engine.knowledge.softDeleteFile("shared.md", "w1"), 1);
  assert.deepEqual(
    (await engine.knowledge.listFiles("w1")).map((f) => f.status),
    ["deleted"],
  );
  assert.deepEqual(
    (await engine.knowledge.listFiles("w2")).map((f) => f.status),
    ["active"],
  );
  await engine.close();
});

test("purge hard-deletes chunks by name or file id", async () => {
  const { engine } = await createTestEngine({ chunkSize: 40, chunkOverlap: 0 });
  await engine.knowledge.addFile("notes.md", NOTES);
  await engine.knowledge.addFile("other.md", "Keep me.", { fileId: "file-2" });

  assert.equal(await engine.knowledge.purgeFile("notes.md"), 2);
  assert.equal(await engine.knowledge.purgeFile("notes.md"), 0);
  assert.equal(await engine.knowledge.purgeFileChunks("file-2"), 1);
  assert.deepEqual(await engine.knowledge.getStats(), { facts: 0, files: 0, learnings: 0 });

  const [event] = await engine.knowledge.listAuditLogs({ limit: 1 });
  assert.equal(event.eventType, "file_purged");
  assert.deepEqual(event.details, { fileId: "file-2", chunks: 1 });
  await engine.close();
});
