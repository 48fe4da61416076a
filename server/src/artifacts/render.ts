/**
 * Artifact Rendering
 *
 * Renders the finding skeleton and the live assumptions into the two
 * markdown deliverables. Rendering refuses (with the list of empty
 * fields) when the skeleton is not far enough along.
 */

import { RISK_DIMENSIONS, type Assumption, type FindingSkeleton, type RiskDimension } from "../facts/types.js";

export const ARTIFACT_TYPES = ["problem_brief", "solution_evaluation_brief"] as const;
export type ArtifactType = (typeof ARTIFACT_TYPES)[number];

export type RenderResult =
  | { ok: true; type: ArtifactType; markdown: string }
  | { ok: false; type: ArtifactType; missing: string[]; warning: string };

const NOT_DEFINED = "_Not yet defined_";

const REQUIRED_TOOLS: Record<ArtifactType, string> = {
  problem_brief: "update_problem_statement, add_stakeholder, update_success_metrics, and add_decision_criteria",
  solution_evaluation_brief: "set_solution_info, set_risk_assessment, and set_go_no_go",
};

export function missingFields(type: ArtifactType, s: FindingSkeleton): string[] {
  const missing: string[] = [];
  if (type === "problem_brief") {
    if (!s.problemStatement) missing.push("problem_statement");
    if (s.stakeholders.length === 0) missing.push("stakeholders");
    const m = s.successMetrics;
    if (!m.leading && !m.lagging && !m.antiMetric) missing.push("success_metrics");
    if (!s.decisionCriteria.proceed_if.length && !s.decisionCriteria.do_not_proceed_if.length) missing.push("decision_criteria");
  } else {
    if (!s.solutionName) missing.push("solution_name");
    if (!s.risks.value) missing.push("value_risk");
    if (!s.goNoGo) missing.push("go_no_go");
  }
  return missing;
}

export function renderArtifact(type: ArtifactType, skeleton: FindingSkeleton, assumptions: Assumption[]): RenderResult {
  const missing = missingFields(type, skeleton);
  if (missing.length) {
    const warning =
      `WARNING: The following skeleton fields are empty: ${missing.join(", ")}. ` +
      `Call ${REQUIRED_TOOLS[type]} before calling generate_artifact again.`;
    return { ok: false, type, missing, warning };
  }
  const live = assumptions.filter((a) => a.status === "active" || a.status === "at_risk");
  const markdown = type === "problem_brief" ? renderProblemBrief(skeleton, live) : renderSolutionEvaluation(skeleton, live);
  return { ok: true, type, markdown };
}

function bullets(items: string[]): string {
  return items.map((item) => `- ${item}`).join("\n");
}

function renderProblemBrief(s: FindingSkeleton, live: Assumption[]): string {
  const stakeholders = s.stakeholders
    .map((st) => `- ${st.validated ? "✅" : "⬜"} **${st.name}** (${st.type})${st.notes ? `: ${st.notes}` : ""}`)
    .join("\n");

  const rows = live.map((a) => `| ${a.id} | ${a.claim} | ${a.impact} | ${a.confidence} | ${a.status} |`).join("\n");

  const metrics: string[] = [];
  if (s.successMetrics.leading) metrics.push(`- **Leading:** ${s.successMetrics.leading}`);
  if (s.successMetrics.lagging) metrics.push(`- **Lagging:** ${s.successMetrics.lagging}`);
  if (s.successMetrics.antiMetric) metrics.push(`- **Anti-metric:** ${s.successMetrics.antiMetric}`);

  const sections = [
    "# Problem Brief",
    `## Problem Statement\n${s.problemStatement ?? NOT_DEFINED}`,
    `## Target Audience\n${s.targetAudience ?? NOT_DEFINED}`,
    `## Stakeholders\n${stakeholders || "_None identified yet_"}`,
    "## Key Assumptions\n\n| ID | Claim | Impact | Confidence | Status |\n|----|-------|--------|------------|--------|\n" +
      (rows || "| — | No assumptions registered yet | — | — | — |"),
    `## Success Metrics\n${metrics.join("\n") || NOT_DEFINED}`,
  ];
  if (s.constraints.length) sections.push(`## Constraints\n${bullets(s.constraints)}`);
  sections.push(
    "## Decision Criteria\n\n" +
      `**Worth pursuing IF:**\n${bullets(s.decisionCriteria.proceed_if) || NOT_DEFINED}\n\n` +
      `**Do NOT invest IF:**\n${bullets(s.decisionCriteria.do_not_proceed_if) || NOT_DEFINED}`,
  );
  return sections.join("\n\n") + "\n";
}

const RISK_TITLES: Record<RiskDimension, string> = {
  value: "Value Risk",
  usability: "Usability Risk",
  feasibility: "Feasibility Risk",
  viability: "Viability Risk",
};

function renderRisk(dimension: RiskDimension, s: FindingSkeleton): string {
  const risk = s.risks[dimension];
  const title = RISK_TITLES[dimension];
  if (!risk) return `### ${title}: _Not assessed_`;
  let text = `### ${title}: ${risk.level.toUpperCase()}\n${risk.summary}`;
  if (risk.evidenceFor.length) text += `\n\n**Supporting evidence:**\n${bullets(risk.evidenceFor)}`;
  if (risk.evidenceAgainst.length) text += `\n\n**Concerns:**\n${bullets(risk.evidenceAgainst)}`;
  return text;
}

function renderSolutionEvaluation(s: FindingSkeleton, live: Assumption[]): string {
  const rows = live
    .map((a) => `| ${a.id} | ${a.claim} | ${a.impact} | ${a.confidence} | ${a.recommendedAction} |`)
    .join("\n");

  let plan = NOT_DEFINED;
  if (s.validationPlan) {
    const vp = s.validationPlan;
    plan = `**Approach:** ${vp.approach} (tests ${vp.riskiestAssumption})\n${vp.description}`;
    if (vp.timeline) plan += `\n\n**Timeline:** ${vp.timeline}`;
    if (vp.successCriteria) plan += `\n\n**Success criteria:** ${vp.successCriteria}`;
  }

  const recommendation = (s.goNoGo?.recommendation ?? "not yet determined").toUpperCase().replace(/_/g, " ");

  return (
    [
      `# Solution Evaluation: ${s.solutionName ?? "_Unnamed_"}`,
      `## Executive Summary\n${s.solutionDescription ?? "_No description_"}`,
      `## Problem-Solution Fit\nEvaluated against: ${s.problemStatement ?? "_No problem statement defined_"}`,
      `## Risk Assessment\n\n${RISK_DIMENSIONS.map((d) => renderRisk(d, s)).join("\n\n")}`,
      `## Build vs. Buy Consideration\n${s.buildVsBuy ?? "_Not applicable or not assessed_"}`,
      "## Key Assumptions Requiring Validation\n\n" +
        "| ID | Assumption | Impact | Confidence | Recommended Validation |\n|----|-----------|--------|------------|----------------------|\n" +
        (rows || "| — | No assumptions registered | — | — | — |"),
      `## Recommended Validation Approach\n${plan}`,
      "## Go/No-Go Assessment\n" +
        `**Recommendation: ${recommendation}**\n\n` +
        `**Proceed IF:**\n${bullets(s.goNoGo?.conditions ?? []) || NOT_DEFINED}\n\n` +
        `**Do NOT proceed IF:**\n${bullets(s.goNoGo?.dealbreakers ?? []) || NOT_DEFINED}`,
    ].join("\n\n") + "\n"
  );
}
