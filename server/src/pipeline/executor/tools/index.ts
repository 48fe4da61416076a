/**
 * Executor Tools: Registry
 *
 * Maps every tool name in EXECUTOR_TOOLS to its handler. The tool loop
 * rejects any other name.
 */

import type { ToolHandler } from "../../../tool-loop/types.js";
import type { ExecutorContext } from "../context.js";
import { generateArtifact } from "./handlers/artifact.js";
import { registerAssumption, updateAssumptionConfidence, updateAssumptionStatus } from "./handlers/assumptions.js";
import {
  completeModeCommand,
  recordPatternFired,
  recordProbeFired,
  updateConversationSummary,
  updateOrgContext,
} from "./handlers/session.js";
import {
  addConstraint,
  addDecisionCriteria,
  addStakeholder,
  setGoNoGo,
  setRiskAssessment,
  setSolutionInfo,
  setValidationPlan,
  updateProblemStatement,
  updateSuccessMetrics,
  updateTargetAudience,
} from "./handlers/skeleton.js";

export { EXECUTOR_TOOLS } from "./definitions.js";
export { ARTIFACT_ACK } from "./handlers/artifact.js";

export const EXECUTOR_HANDLERS: ReadonlyMap<string, ToolHandler<ExecutorContext>> = new Map([
  ["register_assumption", registerAssumption],
  ["update_assumption_status", updateAssumptionStatus],
  ["update_assumption_confidence", updateAssumptionConfidence],
  ["update_problem_statement", updateProblemStatement],
  ["update_target_audience", updateTargetAudience],
  ["add_stakeholder", addStakeholder],
  ["update_success_metrics", updateSuccessMetrics],
  ["add_decision_criteria", addDecisionCriteria],
  ["add_constraint", addConstraint],
  ["set_solution_info", setSolutionInfo],
  ["set_risk_assessment", setRiskAssessment],
  ["set_validation_plan", setValidationPlan],
  ["set_go_no_go", setGoNoGo],
  ["record_probe_fired", recordProbeFired],
  ["record_pattern_fired", recordPatternFired],
  ["update_conversation_summary", updateConversationSummary],
  ["update_org_context", updateOrgContext],
  ["generate_artifact", generateArtifact],
  ["complete_mode", completeModeCommand],
]);
