/**
 * Conversation Registry Tests
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { ConversationRegistry, fileResources, memoryResources } from "./registry.js";
import { PRIMING_MESSAGE } from "./engine.js";
import { DEFAULT_SETTINGS } from "../config.js";
import { InvalidSnapshotError } from "../errors.js";
import { KnowledgeIndex } from "../knowledge/catalog.js";
import { Embedder } from "../vector/index.js";
import { FakeEmbeddingClient, ScriptedLLMClient, textResponse } from "../testing/fakes.js";

describe("ConversationRegistry", () => {
  let router: ScriptedLLMClient;
  let executor: ScriptedLLMClient;
  let registry: ConversationRegistry;

  beforeEach(() => {
    router = new ScriptedLLMClient();
    executor = new ScriptedLLMClient();
    registry = new ConversationRegistry({
      clients: { router, executor, summarizer: null },
      knowledge: new KnowledgeIndex({ probes: [], patterns: [] }),
      settings: DEFAULT_SETTINGS,
      resources: memoryResources(null, DEFAULT_SETTINGS.retrieval),
    });
  });

  afterEach(async () => {
    await registry.closeAll();
  });

  it("creates conversations with their own ids and names", () => {
    const a = registry.create({ projectName: "Onboarding" });
    const b = registry.create();

    expect(a.id).not.toBe(b.id);
    expect(registry.get(a.id)).toBe(a);
    expect(registry.size).toBe(2);
    expect(a.engine.current.projectName).toBe("Onboarding");
    expect(b.engine.current.projectName).toBeNull();
  });

  it("keeps conversation state apart", async () => {
    const a = registry.create();
    const b = registry.create();
    a.engine.primingMessage();
    router.push(textResponse(JSON.stringify({ next_action: "ask_questions" })));
    executor.push(textResponse("Who churns first?"));

    await a.handleMessage("We lose admins");

    expect(a.engine.current.messages.map((m) => m.content)).toEqual([PRIMING_MESSAGE, "We lose admins", "Who churns first?"]);
    expect(b.engine.current.messages).toEqual([]);
    expect(b.engine.current.turnCount).toBe(0);
  });

  it("closes and forgets a conversation", async () => {
    const a = registry.create();

    expect(await registry.close(a.id)).toBe(true);
    expect(registry.get(a.id)).toBeUndefined();
    expect(await registry.close(a.id)).toBe(false);
  });

  it("reopens a snapshot in place when the conversation is still open", async () => {
    const a = registry.create({ projectName: "Onboarding" });
    const snapshot = { ...(await a.snapshot()), turnCount: 4 };

    expect(await registry.open(snapshot)).toBe(a);
    expect(a.engine.current.turnCount).toBe(4);
    expect(registry.size).toBe(1);
  });

  it("rejects a snapshot whose id cannot name a directory", async () => {
    await expect(registry.open({ schemaVersion: "1.0", id: "../../etc" })).rejects.toBeInstanceOf(InvalidSnapshotError);
    expect(registry.size).toBe(0);
  });
});

describe("ConversationRegistry on disk", () => {
  let dataDir: string;

  beforeEach(() => {
    dataDir = mkdtempSync(join(tmpdir(), "framewise-registry-"));
  });

  afterEach(() => {
    rmSync(dataDir, { recursive: true, force: true });
  });

  function registryWith(router: ScriptedLLMClient, executor: ScriptedLLMClient): ConversationRegistry {
    const embedder = new Embedder(new FakeEmbeddingClient(), DEFAULT_SETTINGS.embedding);
    return new ConversationRegistry({
      clients: { router, executor, summarizer: null },
      knowledge: new KnowledgeIndex({ probes: [], patterns: [] }),
      settings: DEFAULT_SETTINGS,
      resources: fileResources(dataDir, embedder, DEFAULT_SETTINGS.retrieval),
    });
  }

  it("finds documents ingested before a restart once reopened", async () => {
    const router = new ScriptedLLMClient();
    const executor = new ScriptedLLMClient();
    const before = registryWith(router, executor);
    const worker = before.create();
    await worker.ingestDocument({ sourceId: "plan", filename: "plan.md", content: "# Pricing\n\nSeat pricing rose in March." });
    const snapshot: unknown = JSON.parse(JSON.stringify(await worker.snapshot()));
    await before.closeAll();

    const after = registryWith(router, executor);
    const reopened = await after.open(snapshot);
    router.push(textResponse(JSON.stringify({ next_action: "ask_questions", requires_retrieval: true })));
    executor.push(textResponse("When in March?"));
    await reopened.handleMessage("What happened to seat pricing?");
    await after.closeAll();

    expect(reopened.id).toBe(worker.id);
    expect(reopened.engine.current.project.fileSummaries.map((f) => f.sourceId)).toEqual(["plan"]);
    const prompt = executor.requests[0].messages.map((m) => m.content).join("\n");
    expect(prompt).toContain("## Retrieved Document Context\n[Source: plan.md > Pricing]\n# Pricing\n\nSeat pricing rose in March.");
  });
});
