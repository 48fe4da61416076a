/**
 * Phase State Machine
 *
 *   gathering ──enterMode(m)──▶ mode_active(m)
 *   mode_active(m) ──complete_mode──▶ gathering
 *
 * A request to enter a mode while another is active is ignored.
 */

import type { ConversationMode } from "../../facts/skeleton.js";
import type { ConversationState, Phase } from "../../conversation/state.js";
import type { RoutingDecision } from "./decision.js";

export interface ModeState {
  phase: Phase;
  activeMode: ConversationMode | null;
  criticalMassReached: boolean;
  modeTurnCount: number;
}

export type TransitionEvent =
  | { type: "none" }
  | { type: "entered"; mode: ConversationMode }
  | { type: "completed"; mode: ConversationMode }
  | { type: "ignored"; requested: ConversationMode; active: ConversationMode };

export function enterMode(current: ModeState, mode: ConversationMode): { next: ModeState; event: TransitionEvent } {
  if (current.activeMode === mode) return { next: current, event: { type: "none" } };
  if (current.activeMode) {
    return { next: current, event: { type: "ignored", requested: mode, active: current.activeMode } };
  }
  return {
    next: {
      phase: "mode_active",
      activeMode: mode,
      criticalMassReached: current.criticalMassReached || mode === "discover_frame",
      modeTurnCount: 0,
    },
    event: { type: "entered", mode },
  };
}

export function completeMode(current: ModeState): { next: ModeState; event: TransitionEvent } {
  if (!current.activeMode) return { next: current, event: { type: "none" } };
  return {
    next: { ...current, phase: "gathering", activeMode: null, modeTurnCount: 0 },
    event: { type: "completed", mode: current.activeMode },
  };
}

/** Pure: returns the next state and what happened. */
export function applyTransition(current: ModeState, decision: RoutingDecision): { next: ModeState; event: TransitionEvent } {
  if (decision.nextAction === "complete_mode") return completeMode(current);
  if (decision.enterMode) return enterMode(current, decision.enterMode);
  return { next: current, event: { type: "none" } };
}

/** Reads the mode fields out of a conversation. */
export function modeStateOf(state: ConversationState): ModeState {
  return {
    phase: state.phase,
    activeMode: state.activeMode,
    criticalMassReached: state.routing.criticalMassReached,
    modeTurnCount: state.routing.modeTurnCount,
  };
}

export function commitModeState(state: ConversationState, next: ModeState): void {
  state.phase = next.phase;
  state.activeMode = next.activeMode;
  state.routing.criticalMassReached = next.criticalMassReached;
  state.routing.modeTurnCount = next.modeTurnCount;
}
