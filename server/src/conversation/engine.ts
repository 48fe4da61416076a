/**
 * Conversation Engine
 *
 * Runs one turn end to end:
 *
 *   route → transition (draft) → assemble → commit → execute → reply → bookkeeping
 *
 * Nothing is written to the conversation until the bundle is assembled,
 * so a storage failure during retrieval leaves the turn unapplied. Once
 * committed, executor mutations stay even if generation fails later.
 */

import type { EngineSettings } from "../config.js";
import { StorageUnavailableError, errorMessage } from "../errors.js";
import { DocumentIngestor } from "../ingestion/ingest.js";
import type { IngestRequest, IngestResult } from "../ingestion/types.js";
import type { UploadStore } from "../ingestion/uploads.js";
import type { KnowledgeIndex } from "../knowledge/catalog.js";
import type { ILLMClient } from "../llm/types.js";
import { createComponentLogger } from "../logging.js";
import { ContextAssembler, type ContextBundle, type RetrievalMode } from "../pipeline/context/assembler.js";
import type { MutationRecord } from "../pipeline/executor/context.js";
import { TurnExecutor } from "../pipeline/executor/executor.js";
import type { RoutingDecision } from "../pipeline/routing/decision.js";
import { TurnRouter } from "../pipeline/routing/router.js";
import { applyTransition, commitModeState, modeStateOf, type ModeState } from "../pipeline/routing/transition.js";
import type { VectorIndex } from "../vector/index.js";
import { restoreConversation, snapshotConversation, type ConversationSnapshot } from "./snapshot.js";
import type { ConversationState, RenderedArtifact } from "./state.js";
import { summarizeTurn, synthesizeSummary } from "./summary.js";

const log = createComponentLogger("conversation.engine");

export const PRIMING_MESSAGE = [
  "New project. Before we get into a specific problem, help me understand the landscape.",
  "",
  "Tell me about the team and the context around this work:",
  "- Who is on the team and what does each person own?",
  "- Who are the key stakeholders and who makes the decisions?",
  "- Which systems, tools or data sources are involved?",
  "- Any terminology or acronyms I should know?",
  "- What are the current objectives or priorities?",
  "- Are there known challenges or political dynamics?",
  "",
  "The more context I have up front, the sharper my questions will be. If you would rather start with the problem itself, go ahead and we can fill in the context along the way.",
].join("\n");

export const STORAGE_FAILURE_MESSAGE =
  "Sorry, I couldn't reach this project's storage, so nothing from this message was applied. Please try again.";
export const EMPTY_MESSAGE_RESPONSE = "There is no message to respond to. Please type something.";

export interface EngineClients {
  router: ILLMClient;
  executor: ILLMClient;
  /** Turn and file summaries; excerpts are used when null */
  summarizer: ILLMClient | null;
}

export interface EngineDeps {
  clients: EngineClients;
  knowledge: KnowledgeIndex;
  index: VectorIndex;
  uploads: UploadStore;
  settings: EngineSettings;
}

export interface TurnResult {
  status: "ok" | "failed";
  /** 0 when the turn was not committed */
  turn: number;
  response: string;
  decision: RoutingDecision | null;
  retrievalMode: RetrievalMode | null;
  mutations: MutationRecord[];
  artifact: RenderedArtifact | null;
  warnings: string[];
}

export class ConversationEngine {
  private readonly router: TurnRouter;
  private readonly assembler: ContextAssembler;
  private readonly executor: TurnExecutor;
  private readonly ingestor: DocumentIngestor;

  constructor(
    private state: ConversationState,
    private readonly deps: EngineDeps,
  ) {
    const { settings } = deps;
    this.router = new TurnRouter(deps.clients.router, deps.knowledge, {
      timeoutMs: settings.timeouts.routerMs,
      maxEnrichments: settings.maxEnrichments,
    });
    this.assembler = new ContextAssembler(deps.index, deps.knowledge, settings.retrieval);
    this.executor = new TurnExecutor(deps.clients.executor, {
      maxIterations: settings.maxToolIterations,
      timeoutMs: settings.timeouts.executorMs,
      maxSummaryChars: settings.maxSummaryChars,
    });
    this.ingestor = new DocumentIngestor({
      uploads: deps.uploads,
      index: deps.index,
      summarizer: deps.clients.summarizer,
      chunking: settings.chunking,
      summarizerTimeoutMs: settings.timeouts.summarizerMs,
    });
  }

  get id(): string {
    return this.state.id;
  }

  /** Live state; callers outside the worker must treat it as read-only. */
  get current(): ConversationState {
    return this.state;
  }

  /** Welcome text for a fresh conversation, recorded once as turn 0. */
  primingMessage(): string {
    if (this.state.messages.length === 0) {
      this.state.messages.push({ role: "assistant", content: PRIMING_MESSAGE, turn: 0 });
    }
    return PRIMING_MESSAGE;
  }

  // ============================================
  // TURN
  // ============================================

  async handleMessage(message: string): Promise<TurnResult> {
    const text = message.trim();
    if (!text) return failedTurn(EMPTY_MESSAGE_RESPONSE, null);

    const turn = this.state.turnCount + 1;
    const turnLog = log.child({ conversationId: this.state.id, turn });
    const warnings: string[] = [];
    turnLog.info("Turn started", { chars: text.length, phase: this.state.phase, activeMode: this.state.activeMode });

    const decision = await this.router.route(text, this.state);
    const transition = applyTransition(modeStateOf(this.state), decision);

    let bundle: ContextBundle;
    try {
      bundle = await this.assembler.assemble(text, decision, turn, this.draft(turn, transition.next));
    } catch (e) {
      if (!(e instanceof StorageUnavailableError)) throw e;
      turnLog.error("Storage unavailable, turn not applied", e);
      return failedTurn(STORAGE_FAILURE_MESSAGE, decision);
    }

    // Commit
    this.state.turnCount = turn;
    this.state.messages.push({ role: "user", content: text, turn });
    commitModeState(this.state, transition.next);
    this.state.routing.lastDecision = decision;
    this.state.routing.activeProbe = decision.activeGuidanceKey;

    const { event } = transition;
    if (event.type === "entered") {
      turnLog.info("Entered mode", { mode: event.mode });
    } else if (event.type === "completed") {
      const cleared = this.state.facts.clearModeFields(event.mode);
      turnLog.info("Router completed mode", { mode: event.mode, cleared });
    } else if (event.type === "ignored") {
      turnLog.warn("Mode entry ignored", { requested: event.requested, active: event.active });
      warnings.push(`Ignored request to enter ${event.requested} while ${event.active} is active`);
    }

    const execution = await this.executor.execute(text, decision, bundle, this.state);
    this.state.messages.push({ role: "assistant", content: execution.response, turn });
    if (execution.error) warnings.push(`Generation failed: ${execution.error.message}`);
    if (execution.hitIterationLimit) warnings.push("Tool iteration limit reached; response was synthesized without further tool calls");

    // Bookkeeping
    const routing = this.state.routing;
    routing.microSynthesisDue = turn % this.deps.settings.microSynthesisEvery === 0;
    if (this.state.activeMode) routing.modeTurnCount += 1;

    if (!execution.summaryUpdated) {
      const reason = execution.summaryRejection ?? "update_conversation_summary not called";
      turnLog.warn("Conversation summary missing, synthesizing from state", { reason });
      routing.conversationSummary = synthesizeSummary(this.state, text, this.deps.settings.maxSummaryChars);
      routing.summaryUpdatedTurn = turn;
      warnings.push(`Conversation summary not updated (${reason}); synthesized from structured state`);
    }

    await this.indexTurn(turn, text, execution.response);

    turnLog.info("Turn finished", {
      retrievalMode: bundle.retrievalMode,
      mutations: execution.mutations.length,
      warnings: warnings.length,
    });

    return {
      status: "ok",
      turn,
      response: execution.response,
      decision,
      retrievalMode: bundle.retrievalMode,
      mutations: execution.mutations,
      artifact: execution.artifact,
      warnings,
    };
  }

  /** The state as the turn will see it once committed. Shares everything else. */
  private draft(turn: number, mode: ModeState): ConversationState {
    return {
      ...this.state,
      turnCount: turn,
      phase: mode.phase,
      activeMode: mode.activeMode,
      routing: { ...this.state.routing, criticalMassReached: mode.criticalMassReached, modeTurnCount: mode.modeTurnCount },
    };
  }

  /** Every turn is indexed; search only reaches it once it leaves the always-on window. */
  private async indexTurn(turn: number, userMessage: string, assistantResponse: string): Promise<void> {
    const { index, clients, settings } = this.deps;
    if (!index.enabled) return;
    try {
      const summary = await summarizeTurn(clients.summarizer, userMessage, assistantResponse, settings.timeouts.summarizerMs);
      await index.indexTurn({
        turnNumber: turn,
        userMessage,
        assistantResponse,
        summary,
        activeProbe: this.state.routing.activeProbe,
        activeMode: this.state.activeMode,
      });
    } catch (e) {
      log.warn("Turn indexing failed", { conversationId: this.state.id, turn, error: errorMessage(e) });
    }
  }

  // ============================================
  // DOCUMENTS
  // ============================================

  ingestDocument(request: IngestRequest): Promise<IngestResult> {
    return this.ingestor.ingest(request, this.state.project);
  }

  removeDocument(sourceId: string): Promise<boolean> {
    return this.ingestor.remove(sourceId, this.state.project);
  }

  // ============================================
  // PERSISTENCE
  // ============================================

  snapshot(): ConversationSnapshot {
    return snapshotConversation(this.state);
  }

  /** Replaces the whole state; throws InvalidSnapshotError and keeps the old state on bad input. */
  restore(snapshot: unknown): void {
    this.state = restoreConversation(snapshot, { id: this.state.id, cascadeDepth: this.deps.settings.cascadeDepth });
  }

  close(): void {
    this.deps.index.close();
  }
}

function failedTurn(response: string, decision: RoutingDecision | null): TurnResult {
  return { status: "failed", turn: 0, response, decision, retrievalMode: null, mutations: [], artifact: null, warnings: [] };
}
