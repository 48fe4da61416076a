/**
 * Handlers: finding skeleton
 *
 * One single-field setter per command. Setters report whether anything
 * changed so repeats are not recorded as mutations.
 */

import { defineCommand, type CommandOutcome } from "../command.js";
import {
  addConstraintArgs,
  addDecisionCriteriaArgs,
  addStakeholderArgs,
  setGoNoGoArgs,
  setRiskAssessmentArgs,
  setSolutionInfoArgs,
  setValidationPlanArgs,
  textArgs,
  updateSuccessMetricsArgs,
} from "../schemas.js";

function outcome(content: string, changed: boolean): CommandOutcome {
  return { content, applied: changed };
}

export const updateProblemStatement = defineCommand("update_problem_statement", textArgs, (ctx, input) =>
  outcome("Problem statement updated", ctx.state.facts.skeleton.setProblemStatement(input.text)),
);

export const updateTargetAudience = defineCommand("update_target_audience", textArgs, (ctx, input) =>
  outcome("Target audience updated", ctx.state.facts.skeleton.setTargetAudience(input.text)),
);

export const addStakeholder = defineCommand("add_stakeholder", addStakeholderArgs, (ctx, input) => {
  const { id, created } = ctx.state.facts.skeleton.addStakeholder(input);
  return created ? `Added stakeholder ${id}: ${input.name}` : `Updated stakeholder ${id}: ${input.name}`;
});

export const updateSuccessMetrics = defineCommand("update_success_metrics", updateSuccessMetricsArgs, (ctx, input) =>
  outcome(
    "Success metrics updated",
    ctx.state.facts.skeleton.setSuccessMetrics({ leading: input.leading, lagging: input.lagging, antiMetric: input.anti_metric }),
  ),
);

export const addDecisionCriteria = defineCommand("add_decision_criteria", addDecisionCriteriaArgs, (ctx, input) => {
  const added = ctx.state.facts.skeleton.addDecisionCriterion(input.criteria_type, input.condition);
  return added
    ? `Added ${input.criteria_type}: ${input.condition}`
    : outcome(`${input.criteria_type} already includes: ${input.condition}`, false);
});

export const addConstraint = defineCommand("add_constraint", addConstraintArgs, (ctx, input) => {
  const added = ctx.state.facts.skeleton.addConstraint(input.constraint);
  return added ? `Added constraint: ${input.constraint}` : outcome(`Constraint already recorded: ${input.constraint}`, false);
});

export const setSolutionInfo = defineCommand("set_solution_info", setSolutionInfoArgs, (ctx, input) =>
  outcome(
    `Solution info set: ${input.solution_name}`,
    ctx.state.facts.skeleton.setSolutionInfo(input.solution_name, input.solution_description, input.build_vs_buy || undefined),
  ),
);

export const setRiskAssessment = defineCommand("set_risk_assessment", setRiskAssessmentArgs, (ctx, input) =>
  outcome(
    `Set ${input.dimension} risk: ${input.level}: ${input.summary}`,
    ctx.state.facts.skeleton.setRiskAssessment(input.dimension, {
      level: input.level,
      summary: input.summary,
      evidenceFor: input.evidence_for,
      evidenceAgainst: input.evidence_against,
    }),
  ),
);

export const setValidationPlan = defineCommand("set_validation_plan", setValidationPlanArgs, (ctx, input) => {
  let content = `Validation plan set: ${input.approach} for ${input.riskiest_assumption}`;
  // The plan is kept either way; an unknown id is pointed out so the model can register it
  if (!ctx.state.facts.hasAssumption(input.riskiest_assumption)) {
    content += `\nNote: ${input.riskiest_assumption} is not in the assumption register`;
  }
  const changed = ctx.state.facts.skeleton.setValidationPlan({
    riskiestAssumption: input.riskiest_assumption,
    approach: input.approach,
    description: input.description,
    timeline: input.timeline || null,
    successCriteria: input.success_criteria,
  });
  return outcome(content, changed);
});

export const setGoNoGo = defineCommand("set_go_no_go", setGoNoGoArgs, (ctx, input) =>
  outcome(
    `Go/no-go set: ${input.recommendation}`,
    ctx.state.facts.skeleton.setGoNoGo({
      recommendation: input.recommendation,
      conditions: input.conditions,
      dealbreakers: input.dealbreakers,
    }),
  ),
);
