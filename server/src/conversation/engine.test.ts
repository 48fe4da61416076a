/**
 * Conversation Engine Tests
 *
 * Full turns against scripted role clients, an in-memory vector store
 * and in-memory uploads.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import {
  ConversationEngine,
  EMPTY_MESSAGE_RESPONSE,
  PRIMING_MESSAGE,
  STORAGE_FAILURE_MESSAGE,
} from "./engine.js";
import { createConversationState } from "./state.js";
import { DEFAULT_SETTINGS, type EngineSettings } from "../config.js";
import { InvalidSnapshotError } from "../errors.js";
import { MemoryUploadStore } from "../ingestion/uploads.js";
import { KnowledgeIndex } from "../knowledge/catalog.js";
import { TEMPORARY_ISSUE_MESSAGE } from "../pipeline/executor/executor.js";
import { CONVERSATIONS, Embedder, VectorIndex, VectorStore } from "../vector/index.js";
import { FakeEmbeddingClient, ScriptedLLMClient, textResponse, toolCall, toolResponse } from "../testing/fakes.js";

const settings: EngineSettings = {
  ...DEFAULT_SETTINGS,
  embedding: { ...DEFAULT_SETTINGS.embedding, initialBackoffMs: 1, maxBackoffMs: 1, maxAttempts: 1 },
  timeouts: { routerMs: 1_000, executorMs: 1_000, summarizerMs: 1_000 },
};

const knowledge = new KnowledgeIndex({
  probes: [{ name: "Why Now", mode: "discover_frame", text: "Ask what changed recently." }],
  patterns: [],
});

function routed(raw: Record<string, unknown>) {
  return textResponse(JSON.stringify({ next_action: "ask_questions", ...raw }));
}

const SUMMARY_FALLBACK_WARNING =
  "Conversation summary not updated (update_conversation_summary not called); synthesized from structured state";

describe("ConversationEngine", () => {
  let router: ScriptedLLMClient;
  let executor: ScriptedLLMClient;
  let summarizer: ScriptedLLMClient;
  let store: VectorStore;
  let index: VectorIndex;
  let engine: ConversationEngine;

  beforeEach(() => {
    router = new ScriptedLLMClient();
    executor = new ScriptedLLMClient();
    summarizer = new ScriptedLLMClient();
    store = VectorStore.open(":memory:");
    index = new VectorIndex(store, new Embedder(new FakeEmbeddingClient(), settings.embedding), settings.retrieval);
    engine = new ConversationEngine(createConversationState("c1"), {
      clients: { router, executor, summarizer },
      knowledge,
      index,
      uploads: new MemoryUploadStore(),
      settings,
    });
  });

  afterEach(() => {
    store.close();
  });

  /** Scripts one turn whose executor replies with plain text. */
  function script(reply: string, decision: Record<string, unknown> = {}): void {
    router.push(routed(decision));
    executor.push(textResponse(reply));
  }

  it("records the priming message once as turn 0", () => {
    expect(engine.primingMessage()).toBe(PRIMING_MESSAGE);
    engine.primingMessage();
    expect(engine.current.messages).toEqual([{ role: "assistant", content: PRIMING_MESSAGE, turn: 0 }]);
    expect(engine.current.turnCount).toBe(0);
  });

  it("runs a turn and commits messages, decision and summary", async () => {
    router.push(routed({ requires_retrieval: true }));
    executor.push(
      toolResponse([toolCall("update_conversation_summary", { summary: "Team is framing admin churn." })]),
      textResponse("Who churns first?"),
    );

    const result = await engine.handleMessage("  We lose admins after onboarding  ");

    expect(result).toEqual({
      status: "ok",
      turn: 1,
      response: "Who churns first?",
      decision: expect.objectContaining({ nextAction: "ask_questions", requiresRetrieval: true }),
      retrievalMode: "full",
      mutations: [{ tool: "update_conversation_summary", result: "Conversation summary updated" }],
      artifact: null,
      warnings: [],
    });
    const state = engine.current;
    expect(state.turnCount).toBe(1);
    expect(state.messages).toEqual([
      { role: "user", content: "We lose admins after onboarding", turn: 1 },
      { role: "assistant", content: "Who churns first?", turn: 1 },
    ]);
    expect(state.routing.conversationSummary).toBe("Team is framing admin churn.");
    expect(state.routing.summaryUpdatedTurn).toBe(1);
    expect(state.routing.lastDecision?.nextAction).toBe("ask_questions");
  });

  it("rejects an empty message without routing", async () => {
    const result = await engine.handleMessage("   ");

    expect(result.status).toBe("failed");
    expect(result.response).toBe(EMPTY_MESSAGE_RESPONSE);
    expect(router.requests).toHaveLength(0);
    expect(engine.current.turnCount).toBe(0);
  });

  it("enters a mode and uses that mode's prompt on the same turn", async () => {
    script("Let's frame it.", { next_action: "enter_mode", enter_mode: "discover_frame" });

    await engine.handleMessage("Here is the problem");

    const prompt = executor.requests[0].messages[1].content;
    expect(prompt.startsWith("You are operating in the Discover & Frame mode.")).toBe(true);
    const state = engine.current;
    expect(state.phase).toBe("mode_active");
    expect(state.activeMode).toBe("discover_frame");
    expect(state.routing.criticalMassReached).toBe(true);
    expect(state.routing.modeTurnCount).toBe(1);
  });

  it("ignores a request to enter a second mode", async () => {
    engine.current.phase = "mode_active";
    engine.current.activeMode = "discover_frame";
    script("Still framing.", { next_action: "enter_mode", enter_mode: "solution_evaluation" });

    const result = await engine.handleMessage("Can we evaluate a fix?");

    expect(engine.current.activeMode).toBe("discover_frame");
    expect(result.warnings).toEqual([
      "Ignored request to enter solution_evaluation while discover_frame is active",
      SUMMARY_FALLBACK_WARNING,
    ]);
  });

  it("clears solution fields when the router completes solution evaluation", async () => {
    engine.current.phase = "mode_active";
    engine.current.activeMode = "solution_evaluation";
    engine.current.facts.skeleton.setSolutionInfo("Guided setup", "Checklist for new admins");
    engine.current.facts.skeleton.setProblemStatement("Admins churn in week one");
    script("Evaluation wrapped up.", { next_action: "complete_mode" });

    await engine.handleMessage("That covers it");

    const state = engine.current;
    expect(state.phase).toBe("gathering");
    expect(state.activeMode).toBeNull();
    expect(state.facts.skeletonValue.solutionName).toBeNull();
    expect(state.facts.skeletonValue.problemStatement).toBe("Admins churn in week one");
  });

  it("synthesizes a summary when the executor did not write one", async () => {
    script("Tell me more.");

    const result = await engine.handleMessage("We lose admins");

    expect(result.warnings).toEqual([SUMMARY_FALLBACK_WARNING]);
    expect(engine.current.routing.conversationSummary).toBe(
      "Turn 1, gathering context. Problem not yet framed. Latest message: We lose admins",
    );
    expect(engine.current.routing.summaryUpdatedTurn).toBe(1);
  });

  it("aborts the turn without committing when storage is unavailable", async () => {
    store.close();
    router.push(routed({ requires_retrieval: true }));

    const result = await engine.handleMessage("We lose admins");

    expect(result).toEqual({
      status: "failed",
      turn: 0,
      response: STORAGE_FAILURE_MESSAGE,
      decision: expect.objectContaining({ nextAction: "ask_questions" }),
      retrievalMode: null,
      mutations: [],
      artifact: null,
      warnings: [],
    });
    expect(engine.current.turnCount).toBe(0);
    expect(engine.current.messages).toEqual([]);
    expect(engine.current.routing.lastDecision).toBeNull();
    expect(executor.requests).toHaveLength(0);
  });

  it("keeps the turn committed when generation fails", async () => {
    router.push(routed({}));
    executor.push(new Error("provider down"));

    const result = await engine.handleMessage("We lose admins");

    expect(result.status).toBe("ok");
    expect(result.response).toBe(TEMPORARY_ISSUE_MESSAGE);
    expect(result.warnings).toEqual(["Generation failed: provider down", SUMMARY_FALLBACK_WARNING]);
    expect(engine.current.messages.map((m) => m.content)).toEqual(["We lose admins", TEMPORARY_ISSUE_MESSAGE]);
  });

  it("flags micro-synthesis every third turn", async () => {
    const due: boolean[] = [];
    for (const text of ["one", "two", "three", "four"]) {
      script(`reply ${text}`);
      await engine.handleMessage(text);
      due.push(engine.current.routing.microSynthesisDue);
    }
    expect(due).toEqual([false, false, true, false]);
  });

  it("indexes every turn under its summary", async () => {
    script("reply one");
    summarizer.push(textResponse("The user raised pricing."));

    await engine.handleMessage("one");

    expect(summarizer.requests).toHaveLength(1);
    expect(summarizer.requests[0].messages[0].content).toContain("User: one");
    expect(store.count(CONVERSATIONS)).toBe(1);
  });

  it("keeps every earlier turn either always on or retrievable", async () => {
    const words = ["one", "two", "three", "four", "five", "six"];
    for (const word of words) {
      script(`reply budget ${word}`);
      await engine.handleMessage(`budget ${word}`);
    }

    const prompt = executor.requests[5].messages.map((m) => m.content).join("\n");
    // Turns 1 and 2 come back from search, turns 3 to 5 are the always-on window
    expect(prompt).toContain("Turn 1:\nUser: budget one\nAssistant: reply budget one");
    expect(prompt).toContain("Turn 2:\nUser: budget two\nAssistant: reply budget two");
    for (const word of ["three", "four", "five"]) {
      expect(prompt).toContain(`**USER:** budget ${word}\n\n**ASSISTANT:** reply budget ${word}`);
    }
    expect(prompt).not.toContain("Turn 3:");
    expect(store.count(CONVERSATIONS)).toBe(6);
  });

  it("only logs when turn indexing fails", async () => {
    for (const text of ["one", "two", "three"]) {
      script(`reply ${text}`);
      await engine.handleMessage(text);
    }
    expect(store.count(CONVERSATIONS)).toBe(3);
    script("reply four", { requires_retrieval: false });
    summarizer.push(textResponse("The user raised pricing."));
    const embeddings = new FakeEmbeddingClient();
    embeddings.failures.push(new Error("embedding outage"));
    const failing = new ConversationEngine(engine.current, {
      clients: { router, executor, summarizer },
      knowledge,
      index: new VectorIndex(store, new Embedder(embeddings, settings.embedding), settings.retrieval),
      uploads: new MemoryUploadStore(),
      settings,
    });

    const result = await failing.handleMessage("four");

    expect(result.status).toBe("ok");
    expect(result.response).toBe("reply four");
    expect(store.count(CONVERSATIONS)).toBe(3);
  });

  it("ingests a document and lists it in the project context", async () => {
    const result = await engine.ingestDocument({
      sourceId: "plan",
      filename: "plan.md",
      content: "# Pricing\n\nSeat pricing rose in March.",
    });

    expect(result.ok).toBe(true);
    expect(engine.current.project.fileSummaries.map((f) => f.sourceId)).toEqual(["plan"]);
    expect(await engine.removeDocument("plan")).toBe(true);
    expect(engine.current.project.fileSummaries).toEqual([]);
  });

  it("restores a snapshot into a fresh conversation", async () => {
    script("Tell me more.");
    await engine.handleMessage("We lose admins");
    engine.current.facts.registerAssumption(
      { claim: "Admins churn early", category: "value", impact: "high", confidence: "guessed", basis: "user", surfacedBy: "Why Now" },
      1,
    );
    const snapshot = JSON.parse(JSON.stringify(engine.snapshot()));

    const other = new ConversationEngine(createConversationState("c2"), {
      clients: { router, executor, summarizer },
      knowledge,
      index,
      uploads: new MemoryUploadStore(),
      settings,
    });
    other.restore(snapshot);

    expect(other.id).toBe("c2");
    expect(other.current.turnCount).toBe(1);
    expect(other.current.messages).toEqual(engine.current.messages);
    expect(other.current.facts.query().map((a) => a.id)).toEqual(["A1"]);
    expect(other.current.routing.conversationSummary).toBe(engine.current.routing.conversationSummary);
  });

  it("keeps its state when a snapshot is invalid", () => {
    engine.current.turnCount = 4;
    expect(() => engine.restore({ schemaVersion: "1.0" })).toThrow(InvalidSnapshotError);
    expect(engine.current.turnCount).toBe(4);
  });
});
