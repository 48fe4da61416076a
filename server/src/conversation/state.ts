/**
 * Conversation State
 *
 * Everything one conversation owns. A single worker mutates it; nothing
 * here is shared between conversations.
 */

import type { ArtifactType } from "../artifacts/render.js";
import { FactStore } from "../facts/store.js";
import type { ConversationMode } from "../facts/skeleton.js";
import type { ProjectState } from "../ingestion/types.js";
import type { RoutingDecision } from "../pipeline/routing/decision.js";

export type Phase = "gathering" | "mode_active";

export interface ChatMessage {
  role: "user" | "assistant";
  content: string;
  /** 0 for the priming message */
  turn: number;
}

export interface ProbeFired {
  name: string;
  summary: string;
  turn: number;
}

export interface PatternFired {
  name: string;
  reason: string;
  turn: number;
}

export interface RoutingContext {
  /** Replaced each turn by the executor's summary tool */
  conversationSummary: string;
  /** Turn that last wrote conversationSummary; 0 before the first */
  summaryUpdatedTurn: number;
  probesFired: ProbeFired[];
  patternsFired: PatternFired[];
  lastDecision: RoutingDecision | null;
  /** Probe the router last selected, carried into turn records */
  activeProbe: string | null;
  microSynthesisDue: boolean;
  criticalMassReached: boolean;
  modeTurnCount: number;
}

export interface OrgContext {
  company: string | null;
  publicContext: string;
  internalContext: string;
  lastEnrichedDomain: string;
  enrichmentCount: number;
}

export interface RenderedArtifact {
  type: ArtifactType;
  markdown: string;
  turn: number;
}

export interface ConversationState {
  id: string;
  projectName: string | null;
  createdAt: string;
  messages: ChatMessage[];
  turnCount: number;
  phase: Phase;
  activeMode: ConversationMode | null;
  facts: FactStore;
  routing: RoutingContext;
  org: OrgContext;
  project: ProjectState;
  latestArtifact: RenderedArtifact | null;
}

export function emptyRoutingContext(): RoutingContext {
  return {
    conversationSummary: "",
    summaryUpdatedTurn: 0,
    probesFired: [],
    patternsFired: [],
    lastDecision: null,
    activeProbe: null,
    microSynthesisDue: false,
    criticalMassReached: false,
    modeTurnCount: 0,
  };
}

export function emptyOrgContext(): OrgContext {
  return { company: null, publicContext: "", internalContext: "", lastEnrichedDomain: "", enrichmentCount: 0 };
}

export function createConversationState(
  id: string,
  options: { projectName?: string | null; cascadeDepth?: number; now?: Date } = {},
): ConversationState {
  return {
    id,
    projectName: options.projectName ?? null,
    createdAt: (options.now ?? new Date()).toISOString(),
    messages: [],
    turnCount: 0,
    phase: "gathering",
    activeMode: null,
    facts: new FactStore(options.cascadeDepth),
    routing: emptyRoutingContext(),
    org: emptyOrgContext(),
    project: { fileSummaries: [] },
    latestArtifact: null,
  };
}

/** The first user message, which the router keeps in view as the original ask. */
export function originalInput(state: ConversationState): string {
  return state.messages.find((m) => m.role === "user")?.content ?? "";
}

/**
 * Messages of the `window` turns before `currentTurn`, which defaults to
 * the next turn. The priming message never counts.
 */
export function recentMessages(state: ConversationState, window: number, currentTurn = state.turnCount + 1): ChatMessage[] {
  if (window <= 0) return [];
  const firstTurn = currentTurn - window;
  return state.messages.filter((m) => m.turn > 0 && m.turn >= firstTurn && m.turn < currentTurn);
}

// ============================================
// FORMATTERS
// ============================================

export function formatOrgContext(org: OrgContext): string {
  if (!org.company && !org.publicContext && !org.internalContext) {
    return "(No organizational context yet. On the first turn, use update_org_context to populate public knowledge about the user's company/domain.)";
  }
  const parts: string[] = [];
  if (org.company) parts.push(`Organization: ${org.company}`);
  if (org.publicContext) parts.push(`Public context:\n${org.publicContext}`);
  if (org.internalContext) parts.push(`Internal context (user-provided):\n${org.internalContext}`);
  return parts.join("\n\n");
}

export function formatProjectContext(project: ProjectState): string {
  if (project.fileSummaries.length === 0) return "No project context available yet.";
  return ["## Available Documents", ...project.fileSummaries.map((f) => `- **${f.filename}**: ${f.summary}`)].join("\n");
}

export function formatRoutingContext(state: ConversationState): string {
  const r = state.routing;
  const probes = r.probesFired.map((p) => `${p.name} (turn ${p.turn})`).join(", ") || "none";
  const patterns = r.patternsFired.map((p) => `${p.name} (turn ${p.turn})`).join(", ") || "none";
  return [
    `Turn count: ${state.turnCount}`,
    `Current phase: ${state.phase}`,
    `Active mode: ${state.activeMode ?? "none"}`,
    `Turns in current mode: ${r.modeTurnCount}`,
    `Probes fired: ${probes}`,
    `Patterns fired: ${patterns}`,
    `Micro-synthesis due: ${r.microSynthesisDue}`,
    `Critical mass reached: ${r.criticalMassReached}`,
  ].join("\n");
}

export function formatMessages(messages: ChatMessage[], clip?: number): string {
  return messages
    .map((m) => {
      const text = clip !== undefined && m.content.length > clip ? `${m.content.slice(0, clip)}...` : m.content;
      // Long pasted input is fenced off so it reads as material, not instructions
      const content = m.role === "user" && text.length > 500 ? `<user_context>\n${text}\n</user_context>` : text;
      return `**${m.role.toUpperCase()}:** ${content}`;
    })
    .join("\n\n");
}
