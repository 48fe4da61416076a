/**
 * Fact Store Formatters
 *
 * Text views of the store for prompts: a compact routing summary, the
 * full register for the executor, and a skeleton digest.
 */

import { RISK_DIMENSIONS, type Assumption, type FindingSkeleton } from "./types.js";

/** One line per assumption; high-impact guesses are flagged. */
export function formatAssumptionSummary(assumptions: Assumption[]): string {
  if (assumptions.length === 0) return "No assumptions registered yet.";
  return assumptions
    .map((a) => {
      const flag = a.impact === "high" && a.confidence === "guessed" ? "🔴 " : "";
      return `${flag}${a.id}: [${a.impact}/${a.confidence}/${a.status}] ${a.claim}`;
    })
    .join("\n");
}

export function formatAssumptionRegister(assumptions: Assumption[]): string {
  if (assumptions.length === 0) return "No assumptions registered yet.";
  return assumptions
    .map((a) => {
      const deps = a.dependsOn.length ? a.dependsOn.join(", ") : "none";
      const action = a.recommendedAction || "none";
      return [
        `- **${a.id}** [${a.category}] ${a.claim}`,
        `  Impact: ${a.impact} | Confidence: ${a.confidence} | Status: ${a.status}`,
        `  Basis: ${a.basis} | Surfaced by: ${a.surfacedBy}`,
        `  Depends on: ${deps} | Action: ${action}`,
      ].join("\n");
    })
    .join("\n");
}

function titleCase(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1);
}

export function formatSkeleton(s: FindingSkeleton): string {
  const parts: string[] = [];
  if (s.problemStatement) parts.push(`Problem: ${s.problemStatement}`);
  if (s.targetAudience) parts.push(`Audience: ${s.targetAudience}`);
  if (s.stakeholders.length) {
    parts.push("Stakeholders:\n" + s.stakeholders.map((st) => `  - ${st.name} (${st.type})${st.validated ? " ✓" : ""}`).join("\n"));
  }
  const m = s.successMetrics;
  if (m.leading || m.lagging || m.antiMetric) {
    parts.push(`Metrics: Leading=${m.leading ?? "-"}, Lagging=${m.lagging ?? "-"}, Anti=${m.antiMetric ?? "-"}`);
  }
  if (s.decisionCriteria.proceed_if.length) parts.push("Proceed IF: " + s.decisionCriteria.proceed_if.join("; "));
  if (s.decisionCriteria.do_not_proceed_if.length) parts.push("Do NOT IF: " + s.decisionCriteria.do_not_proceed_if.join("; "));
  if (s.constraints.length) parts.push("Constraints: " + s.constraints.join("; "));
  if (s.solutionName) parts.push(`Solution: ${s.solutionName}`);
  if (s.solutionDescription) parts.push(`Description: ${s.solutionDescription}`);
  if (s.buildVsBuy) parts.push(`Build vs buy: ${s.buildVsBuy}`);
  for (const dim of RISK_DIMENSIONS) {
    const risk = s.risks[dim];
    if (risk) parts.push(`${titleCase(dim)} Risk: ${risk.level}: ${risk.summary}`);
  }
  if (s.validationPlan) parts.push(`Validation: ${s.validationPlan.approach} for ${s.validationPlan.riskiestAssumption}`);
  if (s.goNoGo) parts.push(`Go/No-Go: ${s.goNoGo.recommendation}`);
  return parts.length ? parts.join("\n") : "Document skeleton is empty.";
}
