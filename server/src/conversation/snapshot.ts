/**
 * Conversation Snapshots
 *
 * A snapshot is the whole conversation state as plain JSON. Restoring
 * validates it and lays it over a fresh state, so fields added after the
 * snapshot was written come back with their defaults.
 */

import { z } from "zod";
import { ARTIFACT_TYPES } from "../artifacts/render.js";
import { InvalidSnapshotError } from "../errors.js";
import { FactStore } from "../facts/store.js";
import {
  ASSUMPTION_CATEGORIES,
  ASSUMPTION_STATUSES,
  CONFIDENCE_LEVELS,
  GO_NO_GO,
  IMPACT_LEVELS,
  RISK_LEVELS,
  STAKEHOLDER_TYPES,
  VALIDATION_APPROACHES,
  type FactStoreSnapshot,
} from "../facts/types.js";
import type { ProjectState } from "../ingestion/types.js";
import { createComponentLogger } from "../logging.js";
import { NEXT_ACTIONS } from "../pipeline/routing/decision.js";
import type { ChatMessage, ConversationState, OrgContext, RenderedArtifact, RoutingContext } from "./state.js";

const log = createComponentLogger("conversation.snapshot");

export const SNAPSHOT_VERSION = "1.0";

export interface ConversationSnapshot {
  schemaVersion: string;
  id: string;
  projectName: string | null;
  createdAt: string;
  savedAt: string;
  messages: ChatMessage[];
  turnCount: number;
  phase: ConversationState["phase"];
  activeMode: ConversationState["activeMode"];
  facts: FactStoreSnapshot;
  routing: RoutingContext;
  org: OrgContext;
  project: ProjectState;
  latestArtifact: RenderedArtifact | null;
}

// ============================================
// SCHEMA
// ============================================

const MODES = ["discover_frame", "solution_evaluation"] as const;

const stringList = z.array(z.string()).default([]);

/** Conversation ids name directories under the data dir */
const conversationId = z.string().regex(/^[A-Za-z0-9_-]{1,64}$/, "must be 1-64 letters, digits, _ or -");
const turn = z.number().int().nonnegative();

const assumptionSchema = z.object({
  id: z.string().regex(/^A\d+$/),
  claim: z.string(),
  category: z.enum(ASSUMPTION_CATEGORIES),
  impact: z.enum(IMPACT_LEVELS),
  confidence: z.enum(CONFIDENCE_LEVELS),
  status: z.enum(ASSUMPTION_STATUSES),
  basis: z.string().default(""),
  surfacedBy: z.string().default(""),
  dependsOn: stringList,
  dependents: stringList,
  recommendedAction: z.string().default(""),
  impliedStakeholders: stringList,
  createdTurn: turn.default(0),
  lastUpdatedTurn: turn.default(0),
});

const riskSchema = z.object({
  level: z.enum(RISK_LEVELS),
  summary: z.string(),
  evidenceFor: stringList,
  evidenceAgainst: stringList,
});

const skeletonSchema = z.object({
  problemStatement: z.string().nullable().default(null),
  targetAudience: z.string().nullable().default(null),
  stakeholders: z
    .array(
      z.object({
        id: z.string(),
        name: z.string(),
        type: z.enum(STAKEHOLDER_TYPES),
        validated: z.boolean().default(false),
        notes: z.string().default(""),
      }),
    )
    .default([]),
  successMetrics: z
    .object({
      leading: z.string().nullable().default(null),
      lagging: z.string().nullable().default(null),
      antiMetric: z.string().nullable().default(null),
    })
    .default({}),
  decisionCriteria: z.object({ proceed_if: stringList, do_not_proceed_if: stringList }).default({}),
  constraints: stringList,
  solutionName: z.string().nullable().default(null),
  solutionDescription: z.string().nullable().default(null),
  buildVsBuy: z.string().nullable().default(null),
  risks: z
    .object({
      value: riskSchema.optional(),
      usability: riskSchema.optional(),
      feasibility: riskSchema.optional(),
      viability: riskSchema.optional(),
    })
    .default({}),
  validationPlan: z
    .object({
      riskiestAssumption: z.string(),
      approach: z.enum(VALIDATION_APPROACHES),
      description: z.string(),
      timeline: z.string().nullable().default(null),
      successCriteria: z.string(),
    })
    .nullable()
    .default(null),
  goNoGo: z
    .object({ recommendation: z.enum(GO_NO_GO), conditions: stringList, dealbreakers: stringList })
    .nullable()
    .default(null),
});

const decisionSchema = z.object({
  nextAction: z.enum(NEXT_ACTIONS),
  enterMode: z.enum(MODES).nullable().default(null),
  activeGuidanceKey: z.string().nullable().default(null),
  triggeredPatternKeys: stringList,
  requiresRetrieval: z.boolean().default(true),
  conflictFlags: stringList,
  highRiskUnprobed: stringList,
  microSynthesisDue: z.boolean().default(false),
  enrichmentNeeded: z.boolean().default(false),
  enrichmentQuery: z.string().default(""),
  reasoning: z.string().default(""),
});

export const snapshotSchema = z.object({
  schemaVersion: z.string(),
  id: conversationId,
  projectName: z.string().nullable().default(null),
  createdAt: z.string().default(""),
  savedAt: z.string().default(""),
  messages: z.array(z.object({ role: z.enum(["user", "assistant"]), content: z.string(), turn })).default([]),
  turnCount: turn.default(0),
  phase: z.enum(["gathering", "mode_active"]).default("gathering"),
  activeMode: z.enum(MODES).nullable().default(null),
  facts: z
    .object({
      assumptions: z.array(assumptionSchema).default([]),
      assumptionCounter: turn.default(0),
      skeleton: skeletonSchema.default({}),
      stakeholderCounter: turn.default(0),
    })
    .default({}),
  routing: z
    .object({
      conversationSummary: z.string().default(""),
      summaryUpdatedTurn: turn.default(0),
      probesFired: z.array(z.object({ name: z.string(), summary: z.string().default(""), turn })).default([]),
      patternsFired: z.array(z.object({ name: z.string(), reason: z.string().default(""), turn })).default([]),
      lastDecision: decisionSchema.nullable().default(null),
      activeProbe: z.string().nullable().default(null),
      microSynthesisDue: z.boolean().default(false),
      criticalMassReached: z.boolean().default(false),
      modeTurnCount: turn.default(0),
    })
    .default({}),
  org: z
    .object({
      company: z.string().nullable().default(null),
      publicContext: z.string().default(""),
      internalContext: z.string().default(""),
      lastEnrichedDomain: z.string().default(""),
      enrichmentCount: turn.default(0),
    })
    .default({}),
  project: z
    .object({
      fileSummaries: z
        .array(
          z.object({
            sourceId: z.string(),
            filename: z.string(),
            summary: z.string(),
            chunkCount: turn.default(0),
            uploadedAt: z.string().default(""),
          }),
        )
        .default([]),
    })
    .default({}),
  latestArtifact: z.object({ type: z.enum(ARTIFACT_TYPES), markdown: z.string(), turn }).nullable().default(null),
});

// ============================================
// SAVE / RESTORE
// ============================================

export function snapshotConversation(state: ConversationState, now: Date = new Date()): ConversationSnapshot {
  return structuredClone({
    schemaVersion: SNAPSHOT_VERSION,
    id: state.id,
    projectName: state.projectName,
    createdAt: state.createdAt,
    savedAt: now.toISOString(),
    messages: state.messages,
    turnCount: state.turnCount,
    phase: state.phase,
    activeMode: state.activeMode,
    facts: state.facts.snapshot(),
    routing: state.routing,
    org: state.org,
    project: state.project,
    latestArtifact: state.latestArtifact,
  });
}

function invalid(error: z.ZodError): InvalidSnapshotError {
  const issues = error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
  return new InvalidSnapshotError(`Invalid snapshot: ${issues}`);
}

/** The conversation id a snapshot was saved under. */
export function snapshotId(input: unknown): string {
  const parsed = z.object({ id: conversationId }).safeParse(input);
  if (!parsed.success) throw invalid(parsed.error);
  return parsed.data.id;
}

/**
 * Validates a snapshot and rebuilds the state it describes. With `id` the
 * state is loaded into that conversation instead of the one it was saved
 * under.
 */
export function restoreConversation(input: unknown, options: { id?: string; cascadeDepth: number }): ConversationState {
  const parsed = snapshotSchema.safeParse(input);
  if (!parsed.success) throw invalid(parsed.error);
  const snap = parsed.data;
  const major = snap.schemaVersion.split(".")[0];
  if (major !== SNAPSHOT_VERSION.split(".")[0]) {
    throw new InvalidSnapshotError(`Unsupported snapshot version ${snap.schemaVersion} (expected ${SNAPSHOT_VERSION})`);
  }
  if (snap.schemaVersion !== SNAPSHOT_VERSION) {
    log.warn("Snapshot version differs, restoring over defaults", { found: snap.schemaVersion, expected: SNAPSHOT_VERSION });
  }

  // phase and activeMode must agree; the mode wins
  const phase = snap.activeMode ? "mode_active" : "gathering";
  const facts = {
    ...snap.facts,
    stakeholderCounter: Math.max(snap.facts.stakeholderCounter, snap.facts.skeleton.stakeholders.length),
  };

  const id = options.id ?? snap.id;
  log.info("Restored conversation", {
    conversationId: id,
    snapshotId: snap.id,
    turnCount: snap.turnCount,
    assumptions: facts.assumptions.length,
  });

  return {
    id,
    projectName: snap.projectName,
    createdAt: snap.createdAt || new Date().toISOString(),
    messages: snap.messages,
    turnCount: snap.turnCount,
    phase,
    activeMode: snap.activeMode,
    facts: FactStore.restore(facts, options.cascadeDepth),
    routing: { ...snap.routing, modeTurnCount: snap.activeMode ? snap.routing.modeTurnCount : 0 },
    org: snap.org,
    project: snap.project,
    latestArtifact: snap.latestArtifact,
  };
}
