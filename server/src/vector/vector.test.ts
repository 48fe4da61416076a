/**
 * Vector Store & Index Tests
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import Database from "better-sqlite3";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { VectorStore, cosineSimilarity } from "./sqlite-store.js";
import { VectorIndex, DOCUMENTS } from "./index.js";
import { Embedder } from "./embedder.js";
import { StorageUnavailableError } from "../errors.js";
import { FakeEmbeddingClient } from "../testing/fakes.js";
import type { LeafChunk } from "../chunking/index.js";

const retrieval = { alwaysOnWindow: 3, documentResults: 4, conversationResults: 3 };
const embedderSettings = { batchSize: 128, maxInFlight: 4, initialBackoffMs: 1, maxBackoffMs: 1, maxAttempts: 1 };

function leaf(id: string, parentId: string, text: string, header: string): LeafChunk {
  return {
    id,
    sourceId: "plan",
    filename: "plan.md",
    text,
    headerPath: [header],
    level: 1,
    contextHeader: `[Source: plan.md > ${header}]`,
    parentId,
    parentText: `parent ${parentId}`,
    leafIndex: 0,
    tokens: 5,
  };
}

// ============================================
// STORE
// ============================================

describe("VectorStore", () => {
  let store: VectorStore;

  beforeEach(() => {
    store = VectorStore.open(":memory:");
    store.upsert("c", [
      { id: "a", vector: [1, 0], document: "A", metadata: { kind: "x", n: 1 } },
      { id: "b", vector: [0, 1], document: "B", metadata: { kind: "y", n: 2 } },
      { id: "c", vector: [1, 1], document: "C", metadata: { kind: "x", n: 3 } },
    ]);
  });

  afterEach(() => {
    store.close();
  });

  it("ranks by cosine similarity", () => {
    const matches = store.query("c", [1, 0], 2);
    expect(matches.map((m) => m.id)).toEqual(["a", "c"]);
    expect(matches[0].score).toBeCloseTo(1);
    expect(matches[1].score).toBeCloseTo(Math.SQRT1_2);
  });

  it("applies equality and $lt filters", () => {
    expect(store.query("c", [1, 0], 5, { kind: "x" }).map((m) => m.id)).toEqual(["a", "c"]);
    expect(store.query("c", [0, 1], 5, { n: { $lt: 3 } }).map((m) => m.id)).toEqual(["b", "a"]);
  });

  it("replaces on upsert and scopes by collection", () => {
    store.upsert("c", [{ id: "a", vector: [0, 1], document: "A2", metadata: { kind: "z" } }]);
    store.upsert("other", [{ id: "a", vector: [1, 0], document: "O", metadata: {} }]);

    expect(store.count("c")).toBe(3);
    expect(store.count("other")).toBe(1);
    expect(store.query("c", [0, 1], 1)[0].metadata).toEqual({ kind: "z" });
  });

  it("deletes by metadata", () => {
    expect(store.deleteWhere("c", { kind: "x" })).toBe(2);
    expect(store.count("c")).toBe(1);
  });

  it("reports a closed store as unavailable", () => {
    store.close();
    expect(() => store.count("c")).toThrow(StorageUnavailableError);
  });
});

describe("VectorStore on disk", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "framewise-vectors-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("reports metadata it cannot decode as unavailable storage", () => {
    const file = path.join(dir, "vectors.db");
    const store = VectorStore.open(file);
    store.upsert("c", [{ id: "a", vector: [1, 0], document: "A", metadata: { kind: "x" } }]);
    const raw = new Database(file);
    raw.prepare("UPDATE vectors SET metadata = ? WHERE id = ?").run('{"kind":[1]}', "a");
    raw.close();

    try {
      expect(() => store.query("c", [1, 0], 1)).toThrow(StorageUnavailableError);
      expect(() => store.deleteWhere("c", { kind: "x" })).toThrow(StorageUnavailableError);
      expect(store.count("c")).toBe(1);
    } finally {
      store.close();
    }
  });
});

describe("cosineSimilarity", () => {
  it("is zero for a zero vector", () => {
    expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
  });
});

// ============================================
// INDEX
// ============================================

describe("VectorIndex", () => {
  let fake: FakeEmbeddingClient;
  let index: VectorIndex;

  beforeEach(() => {
    fake = new FakeEmbeddingClient();
    index = new VectorIndex(VectorStore.open(":memory:"), new Embedder(fake, embedderSettings), retrieval);
  });

  afterEach(() => {
    index.close();
  });

  it("returns each parent once, closest leaf first", async () => {
    await index.addDocumentChunks([
      leaf("plan#0", "P1", "budget approvals need two signatures", "Budget"),
      leaf("plan#1", "P1", "budget approvals take a week", "Budget"),
      leaf("plan#2", "P2", "hiring plan for engineers", "Hiring"),
    ]);

    const hits = await index.searchDocuments("budget approvals");

    expect(hits.map((h) => h.parentId)).toEqual(["P1", "P2"]);
    expect(hits[0]).toMatchObject({ parentText: "parent P1", contextHeader: "[Source: plan.md > Budget]", headerPath: ["Budget"], sourceId: "plan" });
    expect(fake.calls[0].texts[0]).toBe("[Source: plan.md > Budget]\nbudget approvals need two signatures");
    expect(fake.calls[1]).toEqual({ texts: ["budget approvals"], inputType: "query" });
  });

  it("removes a document's chunks by source id", async () => {
    await index.addDocumentChunks([leaf("plan#0", "P1", "one", "A"), leaf("plan#1", "P2", "two", "B")]);
    expect(index.removeDocument("plan")).toBe(2);
    expect(await index.searchDocuments("one")).toEqual([]);
  });

  it("searches only turns older than the always-on window, in turn order", async () => {
    for (let turn = 1; turn <= 5; turn++) {
      await index.indexTurn({
        turnNumber: turn,
        userMessage: `user ${turn}`,
        assistantResponse: `assistant ${turn}`,
        summary: turn === 2 ? "pricing discussion" : "pricing and churn",
        activeProbe: turn === 1 ? "Why Now" : null,
        activeMode: null,
      });
    }

    const hits = await index.searchConversations("pricing", 6);

    expect(hits.map((h) => h.turnNumber)).toEqual([1, 2]);
    expect(hits[0]).toMatchObject({ userMessage: "user 1", assistantResponse: "assistant 1", activeProbe: "Why Now", activeMode: null });
  });

  it("skips the embedding call when no turn is old enough", async () => {
    await index.indexTurn({ turnNumber: 1, userMessage: "u", assistantResponse: "a", summary: "s", activeProbe: null, activeMode: null });
    const before = fake.calls.length;

    expect(await index.searchConversations("anything", 3)).toEqual([]);
    expect(fake.calls.length).toBe(before);
  });

  it("is inert without an embedder", async () => {
    const disabled = new VectorIndex(VectorStore.open(":memory:"), null, retrieval);
    expect(disabled.enabled).toBe(false);
    expect(await disabled.addDocumentChunks([leaf("plan#0", "P1", "x", "A")])).toBe(0);
    expect(await disabled.searchDocuments("x")).toEqual([]);
    disabled.close();
  });

  it("stores leaves in the documents collection", async () => {
    const store = VectorStore.open(":memory:");
    const local = new VectorIndex(store, new Embedder(fake, embedderSettings), retrieval);
    await local.addDocumentChunks([leaf("plan#0", "P1", "x", "A")]);
    expect(store.count(DOCUMENTS)).toBe(1);
    local.close();
  });
});
