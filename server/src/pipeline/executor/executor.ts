/**
 * Turn Executor
 *
 * Phase two of a turn. Builds the phase prompt from the context bundle,
 * runs the tool loop with the executor commands, and turns the loop's
 * outcome into the reply the user sees. Mutations applied before a
 * failure stay applied.
 */

import type { ConversationState, RenderedArtifact } from "../../conversation/state.js";
import { MODEL_ROLE_CONFIGS } from "../../llm/config.js";
import type { ILLMClient, LLMMessage } from "../../llm/types.js";
import { createComponentLogger } from "../../logging.js";
import { loadPrompt } from "../../prompt-template.js";
import { runToolLoop } from "../../tool-loop/index.js";
import { renderBundle, type ContextBundle } from "../context/assembler.js";
import type { RoutingDecision } from "../routing/decision.js";
import { createExecutorContext, type MutationRecord } from "./context.js";
import { EXECUTOR_HANDLERS, EXECUTOR_TOOLS } from "./tools/index.js";

const log = createComponentLogger("turn-executor");

export const MID_RESPONSE_ERROR_NOTICE =
  "\n\n---\n⚠️ I encountered an error mid-response. What I've shared above is still valid. Please try sending your next message and I'll continue.";
export const TEMPORARY_ISSUE_MESSAGE =
  "I hit a temporary issue processing your message. Your conversation state is preserved. Please try again.";
export const EMPTY_RESPONSE_MESSAGE =
  "I processed your input but couldn't generate a visible response. This usually means the analysis was very detailed. Please try asking a follow-up question.";

export interface ExecutorSettings {
  maxIterations: number;
  timeoutMs: number;
  maxSummaryChars: number;
}

export interface ExecutionResult {
  /** What the user sees, notices included */
  response: string;
  mutations: MutationRecord[];
  artifact: RenderedArtifact | null;
  summaryUpdated: boolean;
  summaryRejection: string | null;
  toolCalls: number;
  hitIterationLimit: boolean;
  error: Error | null;
}

// ============================================
// PROMPTS
// ============================================

function phasePrompt(state: ConversationState): string {
  switch (state.activeMode) {
    case "discover_frame":
      return "pipeline/executor/discover-frame.md";
    case "solution_evaluation":
      return "pipeline/executor/solution-evaluation.md";
    default:
      return "pipeline/executor/gathering.md";
  }
}

/** The decision as the prompts refer to it (snake_case keys). */
export function formatDecision(decision: RoutingDecision): string {
  return JSON.stringify(
    {
      next_action: decision.nextAction,
      enter_mode: decision.enterMode,
      active_probe: decision.activeGuidanceKey,
      triggered_patterns: decision.triggeredPatternKeys,
      conflict_flags: decision.conflictFlags,
      high_risk_unprobed: decision.highRiskUnprobed,
      micro_synthesis_due: decision.microSynthesisDue,
      enrichment_needed: decision.enrichmentNeeded,
      enrichment_query: decision.enrichmentQuery,
      reasoning: decision.reasoning,
    },
    null,
    2,
  );
}

export async function buildExecutorMessages(
  message: string,
  decision: RoutingDecision,
  bundle: ContextBundle,
  state: ConversationState,
): Promise<LLMMessage[]> {
  const system = await loadPrompt("pipeline/executor/system.md", {});
  const turnPrompt = await loadPrompt(phasePrompt(state), {
    ...renderBundle(bundle),
    "Turn Count": String(state.turnCount),
    "First Mode Turn": state.routing.modeTurnCount === 0 ? "yes" : "no",
    "Routing Decision": formatDecision(decision),
    "User Message": message.length > 500 ? `<user_context>\n${message}\n</user_context>` : message,
  });
  return [
    { role: "system", content: system },
    { role: "user", content: turnPrompt },
  ];
}

// ============================================
// EXECUTOR
// ============================================

export class TurnExecutor {
  constructor(
    private readonly client: ILLMClient,
    private readonly settings: ExecutorSettings,
  ) {}

  /** Never throws for generation failures; see ExecutionResult.error. */
  async execute(message: string, decision: RoutingDecision, bundle: ContextBundle, state: ConversationState): Promise<ExecutionResult> {
    const ctx = createExecutorContext(state, this.settings.maxSummaryChars);
    const messages = await buildExecutorMessages(message, decision, bundle, state);
    const role = MODEL_ROLE_CONFIGS.executor;

    const loop = await runToolLoop({
      client: this.client,
      messages,
      tools: EXECUTOR_TOOLS,
      handlers: EXECUTOR_HANDLERS,
      context: ctx,
      maxIterations: this.settings.maxIterations,
      maxTokens: role.maxTokens,
      temperature: role.temperature,
      timeoutMs: this.settings.timeoutMs,
      label: "executor",
    });

    let response = loop.output.trim();
    if (loop.error) {
      log.error("Executor generation failed", loop.error, { conversationId: state.id, mutations: ctx.mutations.length });
      response = response ? `${response}${MID_RESPONSE_ERROR_NOTICE}` : TEMPORARY_ISSUE_MESSAGE;
    } else if (!response) {
      log.warn("Executor returned no visible text", { conversationId: state.id, toolCalls: loop.toolCallsMade.length });
      response = EMPTY_RESPONSE_MESSAGE;
    }

    log.info("Executor finished", {
      conversationId: state.id,
      iterations: loop.iterations,
      toolCalls: loop.toolCallsMade.length,
      mutations: ctx.mutations.length,
      summaryUpdated: ctx.summaryUpdated,
    });

    return {
      response,
      mutations: ctx.mutations,
      artifact: ctx.artifact,
      summaryUpdated: ctx.summaryUpdated,
      summaryRejection: ctx.summaryRejection,
      toolCalls: loop.toolCallsMade.length,
      hitIterationLimit: loop.hitIterationLimit,
      error: loop.error,
    };
  }
}
