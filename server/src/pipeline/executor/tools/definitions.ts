/**
 * Executor Tool Definitions
 *
 * Declarative schemas for the 19 commands the executor model may call.
 * Handlers live separately in ./handlers/; argument validation lives in
 * ./schemas.ts.
 */

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
import type { ToolDefinition } from "../../../llm/types.js";

function tool(name: string, description: string, properties: Record<string, unknown>, required: string[] = []): ToolDefinition {
  return {
    type: "function",
    function: { name, description, parameters: { type: "object", properties, required } },
  };
}

const str = (description?: string) => (description ? { type: "string", description } : { type: "string" });
const oneOf = (values: readonly string[], description?: string) => ({ type: "string", enum: [...values], ...(description ? { description } : {}) });
const strList = (description: string) => ({ type: "array", items: { type: "string" }, description });

// ── Assumptions ───────────────────────────────────────────

const assumptions: ToolDefinition[] = [
  tool(
    "register_assumption",
    "Register a new assumption discovered during analysis. Call this whenever you identify something that is being assumed but not validated.",
    {
      claim: str("The specific assumption being made"),
      type: oneOf(ASSUMPTION_CATEGORIES),
      impact: oneOf(IMPACT_LEVELS, "High = if wrong, changes whether to pursue at all. Medium = changes approach. Low = refines details."),
      confidence: oneOf(CONFIDENCE_LEVELS),
      basis: str("Where this assumption came from"),
      surfaced_by: str("Which probe or pattern identified this"),
      depends_on: strList("IDs of assumptions this depends on (e.g. A1)"),
      recommended_action: str("What to do about this assumption"),
      implied_stakeholders: strList("Stakeholders implied by this assumption"),
    },
    ["claim", "type", "impact", "confidence", "basis", "surfaced_by"],
  ),
  tool(
    "update_assumption_status",
    "Update the status of an existing assumption when new information confirms or invalidates it. Invalidation flags active dependents as at_risk.",
    { assumption_id: str(), new_status: oneOf(ASSUMPTION_STATUSES), reason: str() },
    ["assumption_id", "new_status", "reason"],
  ),
  tool(
    "update_assumption_confidence",
    "Update the confidence level of an existing assumption.",
    { assumption_id: str(), new_confidence: oneOf(CONFIDENCE_LEVELS), reason: str() },
    ["assumption_id", "new_confidence", "reason"],
  ),
];

// ── Problem framing ───────────────────────────────────────

const framing: ToolDefinition[] = [
  tool("update_problem_statement", "Set or update the problem statement in the document skeleton.", { text: str() }, ["text"]),
  tool("update_target_audience", "Set or update the target audience.", { text: str() }, ["text"]),
  tool(
    "add_stakeholder",
    "Add a stakeholder to the document skeleton. Adding an existing name updates that stakeholder.",
    { name: str(), type: oneOf(STAKEHOLDER_TYPES), validated: { type: "boolean" }, notes: str() },
    ["name", "type"],
  ),
  tool("update_success_metrics", "Set or update success metrics. Only include the fields you want to change.", {
    leading: str(),
    lagging: str(),
    anti_metric: str(),
  }),
  tool(
    "add_decision_criteria",
    "Add a proceed/don't-proceed criterion.",
    { criteria_type: oneOf(CRITERIA_TYPES), condition: str("Specific, measurable condition") },
    ["criteria_type", "condition"],
  ),
  tool(
    "add_constraint",
    "Record a hard constraint on any solution (budget, deadline, regulation, platform, headcount).",
    { constraint: str("The constraint, stated concretely") },
    ["constraint"],
  ),
];

// ── Solution evaluation ───────────────────────────────────

const evaluation: ToolDefinition[] = [
  tool(
    "set_solution_info",
    "Set the solution name, description and optionally a build-vs-buy assessment. Call on the first solution evaluation turn.",
    {
      solution_name: str("Name of the solution being evaluated"),
      solution_description: str("2-3 sentence summary of the proposed solution"),
      build_vs_buy: str("Build vs buy assessment summary (optional)"),
    },
    ["solution_name", "solution_description"],
  ),
  tool(
    "set_risk_assessment",
    "Set or update the assessment of one risk dimension (value, usability, feasibility, viability).",
    {
      dimension: oneOf(RISK_DIMENSIONS, "Which risk dimension to assess"),
      level: oneOf(RISK_LEVELS),
      summary: str("1-2 sentence assessment of this risk dimension"),
      evidence_for: strList("Evidence supporting low risk"),
      evidence_against: strList("Evidence supporting high risk"),
    },
    ["dimension", "level", "summary"],
  ),
  tool(
    "set_validation_plan",
    "Set the recommended validation approach for the riskiest assumption.",
    {
      riskiest_assumption: str("Assumption ID (e.g. A5)"),
      approach: oneOf(VALIDATION_APPROACHES),
      description: str("Specific validation plan"),
      timeline: str("Estimated duration"),
      success_criteria: str("What 'validated' looks like"),
    },
    ["riskiest_assumption", "approach", "description", "success_criteria"],
  ),
  tool(
    "set_go_no_go",
    "Set the go/no-go recommendation with conditions and dealbreakers. Call when the evaluation is complete, before generating the artifact.",
    {
      recommendation: oneOf(GO_NO_GO),
      conditions: strList("What must be true for 'go'"),
      dealbreakers: strList("What would make this 'no_go'"),
    },
    ["recommendation", "conditions", "dealbreakers"],
  ),
];

// ── Session ───────────────────────────────────────────────

const session: ToolDefinition[] = [
  tool(
    "record_probe_fired",
    "Record that a diagnostic probe was explored this turn. Say in the summary whether its completion criteria are satisfied or still open.",
    {
      probe_name: str("Probe name from the guidance catalog"),
      summary: str("What was learned and whether the probe's completion criteria are met"),
    },
    ["probe_name"],
  ),
  tool(
    "record_pattern_fired",
    "Record that a domain pattern's trigger conditions are clearly met and it now informs the analysis.",
    {
      pattern_name: str("Pattern name from the guidance catalog"),
      trigger_reason: str("Why the trigger conditions were met"),
    },
    ["pattern_name", "trigger_reason"],
  ),
  tool(
    "update_conversation_summary",
    "Replace the rolling conversation summary. Call at the END of every turn with 2-3 sentences: what is established, what remains open, what changed this turn.",
    { summary: str("2-3 sentence cumulative summary of the conversation") },
    ["summary"],
  ),
  tool(
    "update_org_context",
    "Update the organizational context. Call on the first turn with public knowledge about the company and domain, when the user shares internal context, or when the problem moves to a materially different domain.",
    {
      company: str("Company or organization name"),
      domain: str("The domain or functional area this context covers"),
      public_context: str("Public knowledge: org structure, competitive landscape, relevant history"),
      internal_context: str("User-provided internal details (appended to what exists)"),
    },
    ["company", "domain"],
  ),
];

// ── Deliverables ──────────────────────────────────────────

const deliverables: ToolDefinition[] = [
  tool(
    "generate_artifact",
    "Render the document skeleton into a formatted artifact. The user sees the rendered document; you receive a confirmation only.",
    { artifact_type: oneOf(ARTIFACT_TYPES) },
    ["artifact_type"],
  ),
  tool(
    "complete_mode",
    "Signal that the active mode's work is done, after the final artifact and closing recommendations. Returns the conversation to context gathering.",
    {
      mode_completed: str("Which mode just completed"),
      summary: str("Brief summary of what was accomplished"),
    },
    ["summary"],
  ),
];

export const EXECUTOR_TOOLS: ToolDefinition[] = [...assumptions, ...framing, ...evaluation, ...session, ...deliverables];
