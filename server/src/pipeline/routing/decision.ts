/**
 * Routing Decision
 *
 * The router answers in snake_case JSON; the schema validates it and
 * hands the rest of the engine a camelCase decision.
 */

import { z } from "zod";

export const NEXT_ACTIONS = [
  "ask_questions",
  "micro_synthesize",
  "enter_mode",
  "continue_mode",
  "flag_conflict",
  "complete_mode",
] as const;

export type NextAction = (typeof NEXT_ACTIONS)[number];

const stringList = z.array(z.string()).nullish().transform((v) => v ?? []);

export const rawDecisionSchema = z.object({
  next_action: z.enum(NEXT_ACTIONS),
  enter_mode: z.enum(["discover_frame", "solution_evaluation"]).nullish(),
  active_guidance_key: z.string().nullish(),
  triggered_pattern_keys: stringList,
  requires_retrieval: z.boolean().nullish(),
  conflict_flags: stringList,
  high_risk_unprobed: stringList,
  micro_synthesis_due: z.boolean().nullish(),
  enrichment_needed: z.boolean().nullish(),
  enrichment_query: z.string().nullish(),
  reasoning: z.string().nullish(),
});

export const routingDecisionSchema = rawDecisionSchema.transform((raw) => ({
  nextAction: raw.next_action,
  enterMode: raw.enter_mode ?? null,
  activeGuidanceKey: raw.active_guidance_key?.trim() || null,
  triggeredPatternKeys: raw.triggered_pattern_keys,
  requiresRetrieval: raw.requires_retrieval ?? true,
  conflictFlags: raw.conflict_flags,
  highRiskUnprobed: raw.high_risk_unprobed,
  microSynthesisDue: raw.micro_synthesis_due ?? false,
  enrichmentNeeded: raw.enrichment_needed ?? false,
  enrichmentQuery: raw.enrichment_query?.trim() ?? "",
  reasoning: raw.reasoning ?? "",
}));

export type RoutingDecision = z.output<typeof routingDecisionSchema>;

/** Used whenever the router cannot produce a valid decision. */
export function conservativeDecision(reasoning: string): RoutingDecision {
  return {
    nextAction: "ask_questions",
    enterMode: null,
    activeGuidanceKey: null,
    triggeredPatternKeys: [],
    requiresRetrieval: true,
    conflictFlags: [],
    highRiskUnprobed: [],
    microSynthesisDue: false,
    enrichmentNeeded: false,
    enrichmentQuery: "",
    reasoning,
  };
}
