/**
 * Turn summaries
 *
 * Two kinds: the short summary a past turn is embedded under, and the
 * rolling conversation summary synthesized from structured state when the
 * executor did not write one.
 */

import { errorMessage } from "../errors.js";
import { chatWithTimeout } from "../llm/timeout.js";
import type { ILLMClient } from "../llm/types.js";
import { createComponentLogger } from "../logging.js";
import { loadPrompt } from "../prompt-template.js";
import type { ConversationState } from "./state.js";

const log = createComponentLogger("conversation.summary");

const TURN_CLIP = 1_000;
const EXCERPT_CLIP = 200;

function clip(text: string, max: number): string {
  const trimmed = text.trim().replace(/\s+/g, " ");
  return trimmed.length > max ? `${trimmed.slice(0, max)}...` : trimmed;
}

export function turnExcerpt(userMessage: string, assistantResponse: string): string {
  return `User: ${clip(userMessage, EXCERPT_CLIP)} Assistant: ${clip(assistantResponse, EXCERPT_CLIP)}`;
}

/**
 * 1-2 sentences describing one exchange, used as the text a turn record
 * is embedded under. Falls back to a clipped excerpt of both messages.
 */
export async function summarizeTurn(
  client: ILLMClient | null,
  userMessage: string,
  assistantResponse: string,
  timeoutMs: number,
): Promise<string> {
  if (!client) return turnExcerpt(userMessage, assistantResponse);
  try {
    const prompt = await loadPrompt("conversation/turn-summary.md", {
      "User Message": userMessage.slice(0, TURN_CLIP),
      "Assistant Response": assistantResponse.slice(0, TURN_CLIP),
    });
    const response = await chatWithTimeout(
      client,
      [{ role: "user", content: prompt }],
      { maxTokens: 100, temperature: 0 },
      { operation: "turn summary", timeoutMs },
    );
    const summary = response.content.trim();
    if (summary) return summary;
    log.warn("Summarizer returned empty text for turn");
  } catch (e) {
    log.warn("Turn summary failed, using excerpt", { error: errorMessage(e) });
  }
  return turnExcerpt(userMessage, assistantResponse);
}

/**
 * Rolling summary built from structured state alone. Stands in when the
 * executor skipped update_conversation_summary or had it rejected.
 */
export function synthesizeSummary(state: ConversationState, userMessage: string, maxChars: number): string {
  const skeleton = state.facts.skeletonValue;
  const assumptions = state.facts.query();
  const count = (status: string) => assumptions.filter((a) => a.status === status).length;

  const parts = [
    state.activeMode ? `Turn ${state.turnCount}, working in ${state.activeMode} mode.` : `Turn ${state.turnCount}, gathering context.`,
    skeleton.problemStatement ? `Problem: ${clip(skeleton.problemStatement, EXCERPT_CLIP)}.` : "Problem not yet framed.",
  ];
  if (assumptions.length > 0) {
    parts.push(
      `Assumptions: ${assumptions.length} registered (${count("active")} active, ${count("at_risk")} at risk, ${count("invalidated")} invalidated, ${count("confirmed")} confirmed).`,
    );
  }
  if (skeleton.solutionName) parts.push(`Solution under evaluation: ${clip(skeleton.solutionName, EXCERPT_CLIP)}.`);
  if (skeleton.goNoGo) parts.push(`Recommendation: ${skeleton.goNoGo.recommendation}.`);
  parts.push(`Latest message: ${clip(userMessage, EXCERPT_CLIP)}`);

  const summary = parts.join(" ");
  return summary.length > maxChars ? summary.slice(0, maxChars) : summary;
}
