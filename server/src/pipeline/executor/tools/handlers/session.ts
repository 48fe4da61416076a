/**
 * Handlers: routing history, rolling summary, org context, mode exit
 */

import { completeMode, commitModeState, modeStateOf } from "../../../routing/transition.js";
import { defineCommand } from "../command.js";
import {
  completeModeArgs,
  recordPatternFiredArgs,
  recordProbeFiredArgs,
  updateConversationSummaryArgs,
  updateOrgContextArgs,
} from "../schemas.js";

export const recordProbeFired = defineCommand("record_probe_fired", recordProbeFiredArgs, (ctx, input) => {
  ctx.state.routing.probesFired.push({ name: input.probe_name, summary: input.summary, turn: ctx.turn });
  return `Recorded probe fired: ${input.probe_name}`;
});

export const recordPatternFired = defineCommand("record_pattern_fired", recordPatternFiredArgs, (ctx, input) => {
  const fired = ctx.state.routing.patternsFired;
  if (fired.some((p) => p.name.toLowerCase() === input.pattern_name.toLowerCase())) {
    return { content: `Pattern already recorded: ${input.pattern_name}`, applied: false };
  }
  fired.push({ name: input.pattern_name, reason: input.trigger_reason, turn: ctx.turn });
  return `Recorded pattern fired: ${input.pattern_name}`;
});

export const updateConversationSummary = defineCommand("update_conversation_summary", updateConversationSummaryArgs, (ctx, input) => {
  const summary = input.summary.trim();
  if (!summary) {
    ctx.summaryRejection = "empty summary";
    return { content: "Error: summary is empty. Write 2-3 sentences on what is established, what is open and what changed this turn.", applied: false };
  }
  if (summary.length > ctx.maxSummaryChars) {
    ctx.summaryRejection = `summary of ${summary.length} characters`;
    return {
      content: `Error: summary is ${summary.length} characters; keep it under ${ctx.maxSummaryChars}. Call update_conversation_summary again with a shorter summary.`,
      applied: false,
    };
  }
  ctx.state.routing.conversationSummary = summary;
  ctx.state.routing.summaryUpdatedTurn = ctx.turn;
  ctx.summaryUpdated = true;
  ctx.summaryRejection = null;
  return "Conversation summary updated";
});

function appendBlock(existing: string, addition: string | undefined): string {
  if (!addition) return existing;
  return existing ? `${existing}\n\n${addition}` : addition;
}

export const updateOrgContext = defineCommand("update_org_context", updateOrgContextArgs, (ctx, input) => {
  const org = ctx.state.org;
  org.company = input.company;
  org.lastEnrichedDomain = input.domain;
  org.publicContext = appendBlock(org.publicContext, input.public_context);
  org.internalContext = appendBlock(org.internalContext, input.internal_context);
  org.enrichmentCount += 1;
  return `Org context updated for ${input.company} / ${input.domain}`;
});

export const completeModeCommand = defineCommand("complete_mode", completeModeArgs, (ctx, input) => {
  const { next, event } = completeMode(modeStateOf(ctx.state));
  if (event.type !== "completed") {
    return { content: "No mode is active; nothing to complete", applied: false };
  }
  commitModeState(ctx.state, next);
  const cleared = ctx.state.facts.clearModeFields(event.mode);
  let content = `Mode ${event.mode} complete. System returned to context gathering. Summary: ${input.summary}`;
  if (cleared.length) content += `\nCleared: ${cleared.join(", ")}`;
  return content;
});
