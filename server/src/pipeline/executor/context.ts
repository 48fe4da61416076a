/**
 * Executor Tool Context
 *
 * What every command handler receives: the conversation it mutates and
 * a per-turn record of what was applied.
 */

import type { ConversationState, RenderedArtifact } from "../../conversation/state.js";

export interface MutationRecord {
  tool: string;
  /** The result text the model saw */
  result: string;
}

export interface ExecutorContext {
  state: ConversationState;
  /** Turn number stamped on every mutation */
  turn: number;
  mutations: MutationRecord[];
  /** True once update_conversation_summary was accepted this turn */
  summaryUpdated: boolean;
  /** Last rejection message from the summary tool, if any */
  summaryRejection: string | null;
  maxSummaryChars: number;
  /** Set by generate_artifact when rendering succeeds */
  artifact: RenderedArtifact | null;
}

export function createExecutorContext(state: ConversationState, maxSummaryChars: number): ExecutorContext {
  return {
    state,
    turn: state.turnCount,
    mutations: [],
    summaryUpdated: false,
    summaryRejection: null,
    maxSummaryChars,
    artifact: null,
  };
}
