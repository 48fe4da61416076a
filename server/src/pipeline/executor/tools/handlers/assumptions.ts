/**
 * Handlers: assumption graph
 *
 * register_assumption, update_assumption_status, update_assumption_confidence
 */

import type { CascadeReport } from "../../../../facts/types.js";
import { defineCommand } from "../command.js";
import { registerAssumptionArgs, updateAssumptionConfidenceArgs, updateAssumptionStatusArgs } from "../schemas.js";

export const registerAssumption = defineCommand("register_assumption", registerAssumptionArgs, (ctx, input) => {
  const result = ctx.state.facts.registerAssumption(
    {
      claim: input.claim,
      category: input.type,
      impact: input.impact,
      confidence: input.confidence,
      basis: input.basis,
      surfacedBy: input.surfaced_by,
      dependsOn: input.depends_on,
      recommendedAction: input.recommended_action,
      impliedStakeholders: input.implied_stakeholders,
    },
    ctx.turn,
  );

  if (result.existing) {
    return { content: `Assumption ${result.id} already registered: ${input.claim}`, applied: false };
  }
  let content = `Registered assumption ${result.id}: ${input.claim}`;
  if (result.droppedDependencies.length) {
    content += `\nIgnored unknown dependencies: ${result.droppedDependencies.join(", ")}`;
  }
  return content;
});

function describeCascade(report: CascadeReport): string {
  const lines = report.effects.map((e) =>
    e.change === "at_risk" ? `${e.id} flagged as at_risk` : `${e.id} confidence upgraded to informed`,
  );
  if (report.truncated) lines.push("further dependents beyond the cascade depth were not updated");
  return lines.join("; ");
}

export const updateAssumptionStatus = defineCommand("update_assumption_status", updateAssumptionStatusArgs, (ctx, input) => {
  const report = ctx.state.facts.updateStatus(input.assumption_id, input.new_status, input.reason, ctx.turn);
  if (!report.changed) {
    return { content: `${report.id} is already ${report.status}; nothing changed`, applied: false };
  }
  const cascade = describeCascade(report);
  const head = `Updated ${report.id} status to ${report.status}: ${input.reason}`;
  return cascade ? `${head}\nCascade: ${cascade}` : head;
});

export const updateAssumptionConfidence = defineCommand("update_assumption_confidence", updateAssumptionConfidenceArgs, (ctx, input) => {
  const result = ctx.state.facts.updateConfidence(input.assumption_id, input.new_confidence, input.reason, ctx.turn);
  if (!result.changed) {
    return { content: `${input.assumption_id} confidence is already ${input.new_confidence}; nothing changed`, applied: false };
  }
  return `Updated ${input.assumption_id} confidence to ${input.new_confidence}: ${input.reason}`;
});
