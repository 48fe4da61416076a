/**
 * Repeat Detection
 *
 * Tracks tool+argument pairs across one loop. A call identical to an
 * earlier one is flagged so the loop can tell the model to move on.
 */

import { createComponentLogger } from "../logging.js";

const log = createComponentLogger("tool-loop.stuck");

export interface RepeatTracker {
  seen: Set<string>;
}

export function createRepeatTracker(): RepeatTracker {
  return { seen: new Set() };
}

/** Returns the names of calls in this batch that repeat an earlier call. */
export function findRepeats(tracker: RepeatTracker, calls: { name: string; arguments: string }[], label: string): string[] {
  const repeats: string[] = [];
  for (const call of calls) {
    const key = `${call.name}:${call.arguments}`;
    if (tracker.seen.has(key)) repeats.push(call.name);
    tracker.seen.add(key);
  }
  if (repeats.length > 0) log.warn("Repeated tool calls", { label, tools: repeats });
  return repeats;
}

export function repeatWarning(repeats: string[]): string {
  return `⚠️ You already called ${[...new Set(repeats)].join(", ")} with the same arguments. Do NOT repeat the same tool call. Move on.`;
}
