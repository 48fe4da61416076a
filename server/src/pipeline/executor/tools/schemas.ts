/**
 * Command Argument Schemas
 *
 * One zod schema per executor command. Field names follow the tool
 * definitions the model sees (snake_case); handlers read the parsed
 * values only.
 */

import { z } from "zod";
import { ARTIFACT_TYPES } from "../../../artifacts/render.js";
import {
  ASSUMPTION_CATEGORIES,
  ASSUMPTION_STATUSES,
  CONFIDENCE_LEVELS,
  CRITERIA_TYPES,
  GO_NO_GO,
  IMPACT_LEVELS,
  RISK_DIMENSIONS,
  RISK_LEVELS,
  STAKEHOLDER_TYPES,
  VALIDATION_APPROACHES,
} from "../../../facts/types.js";

const text = z.string().trim().min(1);
const assumptionId = z.string().trim().regex(/^A\d+$/, "expected an assumption id like A3");
const textList = z.array(text);

export const registerAssumptionArgs = z.object({
  claim: text,
  type: z.enum(ASSUMPTION_CATEGORIES),
  impact: z.enum(IMPACT_LEVELS),
  confidence: z.enum(CONFIDENCE_LEVELS),
  basis: text,
  surfaced_by: text,
  depends_on: z.array(z.string().trim()).default([]),
  recommended_action: z.string().default(""),
  implied_stakeholders: textList.default([]),
});

export const updateAssumptionStatusArgs = z.object({
  assumption_id: assumptionId,
  new_status: z.enum(ASSUMPTION_STATUSES),
  reason: text,
});

export const updateAssumptionConfidenceArgs = z.object({
  assumption_id: assumptionId,
  new_confidence: z.enum(CONFIDENCE_LEVELS),
  reason: text,
});

export const textArgs = z.object({ text });

export const addStakeholderArgs = z.object({
  name: text,
  type: z.enum(STAKEHOLDER_TYPES),
  validated: z.boolean().optional(),
  notes: z.string().optional(),
});

export const updateSuccessMetricsArgs = z
  .object({ leading: text.optional(), lagging: text.optional(), anti_metric: text.optional() })
  .refine((m) => m.leading !== undefined || m.lagging !== undefined || m.anti_metric !== undefined, {
    message: "provide at least one of leading, lagging, anti_metric",
  });

export const addDecisionCriteriaArgs = z.object({
  criteria_type: z.enum(CRITERIA_TYPES),
  condition: text,
});

export const addConstraintArgs = z.object({ constraint: text });

export const setSolutionInfoArgs = z.object({
  solution_name: text,
  solution_description: text,
  build_vs_buy: z.string().trim().optional(),
});

export const setRiskAssessmentArgs = z.object({
  dimension: z.enum(RISK_DIMENSIONS),
  level: z.enum(RISK_LEVELS),
  summary: text,
  evidence_for: textList.optional(),
  evidence_against: textList.optional(),
});

export const setValidationPlanArgs = z.object({
  riskiest_assumption: assumptionId,
  approach: z.enum(VALIDATION_APPROACHES),
  description: text,
  timeline: z.string().trim().optional(),
  success_criteria: text,
});

export const setGoNoGoArgs = z.object({
  recommendation: z.enum(GO_NO_GO),
  conditions: textList,
  dealbreakers: textList,
});

export const recordProbeFiredArgs = z.object({
  probe_name: text,
  summary: z.string().trim().default(""),
});

export const recordPatternFiredArgs = z.object({
  pattern_name: text,
  trigger_reason: text,
});

/** Length is checked by the handler so the rejection can name the limit. */
export const updateConversationSummaryArgs = z.object({ summary: z.string() });

export const updateOrgContextArgs = z.object({
  company: text,
  domain: text,
  public_context: z.string().trim().optional(),
  internal_context: z.string().trim().optional(),
});

export const generateArtifactArgs = z.object({ artifact_type: z.enum(ARTIFACT_TYPES) });

export const completeModeArgs = z.object({
  mode_completed: z.string().trim().optional(),
  summary: text,
});
