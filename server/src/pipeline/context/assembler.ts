/**
 * Context: Retrieval Assembler
 *
 * Builds the typed bundle the executor generates from. Always-on state
 * is formatted from the conversation; guidance comes from the knowledge
 * catalog; retrieved documents and earlier exchanges come from the
 * vector index unless the router said the turn needs none.
 */

import type { RetrievalSettings } from "../../config.js";
import type { ChatMessage, ConversationState } from "../../conversation/state.js";
import {
  formatMessages,
  formatOrgContext,
  formatProjectContext,
  formatRoutingContext,
  recentMessages,
} from "../../conversation/state.js";
import { FramewiseError, StorageUnavailableError, errorMessage } from "../../errors.js";
import { formatAssumptionRegister, formatSkeleton } from "../../facts/format.js";
import type { KnowledgeIndex } from "../../knowledge/catalog.js";
import { createComponentLogger } from "../../logging.js";
import type { ConversationHit, DocumentHit, VectorIndex } from "../../vector/index.js";
import type { RoutingDecision } from "../routing/decision.js";

const log = createComponentLogger("context.assembler");

// ── Types ───────────────────────────────────────────────────────────

export type RetrievalMode = "full" | "bypass" | "disabled" | "degraded";

export interface AlwaysOnContext {
  projectContext: string;
  orgContext: string;
  conversationSummary: string;
  assumptions: string;
  skeleton: string;
  routing: string;
  recentTurns: ChatMessage[];
}

export interface GuidanceUnit {
  key: string;
  text: string;
}

export interface ContextBundle {
  alwaysOn: AlwaysOnContext;
  guidance: { activeProbe: GuidanceUnit | null; patterns: GuidanceUnit[] };
  retrieved: { documents: DocumentHit[]; conversations: ConversationHit[] };
  retrievalMode: RetrievalMode;
}

// ── Assembly ────────────────────────────────────────────────────────

export class ContextAssembler {
  constructor(
    private readonly index: VectorIndex,
    private readonly knowledge: KnowledgeIndex,
    private readonly retrieval: RetrievalSettings,
  ) {}

  /**
   * Only StorageUnavailableError escapes. Any other failure empties just
   * the source that failed and marks the bundle "degraded".
   */
  async assemble(userMessage: string, decision: RoutingDecision, turnNumber: number, state: ConversationState): Promise<ContextBundle> {
    const alwaysOn = this.alwaysOn(state, turnNumber);
    const activeProbe = this.lookupProbe(decision);
    const empty = { documents: [], conversations: [] };

    if (!decision.requiresRetrieval) {
      log.info("Retrieval bypassed", { turn: turnNumber });
      return { alwaysOn, guidance: { activeProbe, patterns: [] }, retrieved: empty, retrievalMode: "bypass" };
    }

    const guidance = { activeProbe, patterns: this.lookupPatterns(decision) };
    if (!this.index.enabled) {
      return { alwaysOn, guidance, retrieved: empty, retrievalMode: "disabled" };
    }

    const documentQuery = activeProbe ? `${userMessage} ${activeProbe.key}` : userMessage;
    const [documents, conversations] = await Promise.allSettled([
      this.index.searchDocuments(documentQuery, this.retrieval.documentResults),
      this.index.searchConversations(userMessage, turnNumber, this.retrieval.conversationResults),
    ]);
    const retrieved = {
      documents: settledHits(documents, "documents", turnNumber),
      conversations: settledHits(conversations, "conversations", turnNumber),
    };
    const degraded = documents.status === "rejected" || conversations.status === "rejected";
    log.debug("Retrieved context", { turn: turnNumber, documents: retrieved.documents.length, conversations: retrieved.conversations.length });
    return { alwaysOn, guidance, retrieved, retrievalMode: degraded ? "degraded" : "full" };
  }

  /** Recent turns are the window before turnNumber, which searchConversations starts below. */
  private alwaysOn(state: ConversationState, turnNumber: number): AlwaysOnContext {
    return {
      projectContext: formatProjectContext(state.project),
      orgContext: formatOrgContext(state.org),
      conversationSummary: state.routing.conversationSummary,
      assumptions: formatAssumptionRegister(state.facts.query()),
      skeleton: formatSkeleton(state.facts.skeletonValue),
      routing: formatRoutingContext(state),
      recentTurns: recentMessages(state, this.retrieval.alwaysOnWindow, turnNumber),
    };
  }

  private lookupProbe(decision: RoutingDecision): GuidanceUnit | null {
    if (!decision.activeGuidanceKey) return null;
    const result = this.knowledge.lookup("probe", decision.activeGuidanceKey);
    return result.found ? { key: result.key, text: result.text } : null;
  }

  private lookupPatterns(decision: RoutingDecision): GuidanceUnit[] {
    const units: GuidanceUnit[] = [];
    for (const key of decision.triggeredPatternKeys) {
      const result = this.knowledge.lookup("pattern", key);
      if (result.found && !units.some((u) => u.key === result.key)) units.push({ key: result.key, text: result.text });
    }
    return units;
  }
}

function settledHits<T>(result: PromiseSettledResult<T[]>, source: string, turn: number): T[] {
  if (result.status === "fulfilled") return result.value;
  const error: unknown = result.reason;
  if (error instanceof StorageUnavailableError || !(error instanceof FramewiseError)) throw error;
  log.warn("Retrieval failed, continuing without it", { turn, source, category: error.category, error: errorMessage(error) });
  return [];
}

// ── Rendering ───────────────────────────────────────────────────────

function renderDocuments(hits: DocumentHit[]): string {
  return hits.map((h) => `${h.contextHeader}\n${h.parentText}`).join("\n\n");
}

function renderConversations(hits: ConversationHit[]): string {
  return hits
    .map((t) => {
      const probe = t.activeProbe ? ` (Probe: ${t.activeProbe})` : "";
      return `Turn ${t.turnNumber}${probe}:\nUser: ${t.userMessage}\nAssistant: ${t.assistantResponse}`;
    })
    .join("\n\n");
}

/** Guidance and retrieved sections; empty sections are left out. */
export function renderGuidance(bundle: ContextBundle): string {
  const parts: string[] = [];
  const { guidance, retrieved } = bundle;
  if (guidance.activeProbe) parts.push(`## Active Probe\n${guidance.activeProbe.text}`);
  if (guidance.patterns.length > 0) parts.push(`## Triggered Patterns\n${guidance.patterns.map((p) => p.text).join("\n\n")}`);
  if (retrieved.documents.length > 0) parts.push(`## Retrieved Document Context\n${renderDocuments(retrieved.documents)}`);
  if (retrieved.conversations.length > 0) parts.push(`## Earlier Relevant Exchanges\n${renderConversations(retrieved.conversations)}`);
  if (bundle.retrievalMode === "degraded") parts.push("_Part of the retrieved context was unavailable this turn._");
  return parts.join("\n\n");
}

/**
 * Prompt-template fields for the executor. The bundle stays typed up to
 * this point; only here does it become text.
 */
export function renderBundle(bundle: ContextBundle): Record<string, string> {
  const { alwaysOn } = bundle;
  return {
    "Org Context": alwaysOn.orgContext,
    "Project Context": alwaysOn.projectContext,
    "Conversation Summary": alwaysOn.conversationSummary || "(No summary yet)",
    "Assumption Register": alwaysOn.assumptions,
    "Document Skeleton": alwaysOn.skeleton,
    "Routing State": alwaysOn.routing,
    "Recent Turns": formatMessages(alwaysOn.recentTurns) || "(No earlier turns)",
    Guidance: renderGuidance(bundle) || "(No guidance selected for this turn)",
  };
}
