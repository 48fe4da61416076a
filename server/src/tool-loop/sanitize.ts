/**
 * Message Sanitization
 *
 * Providers reject a conversation in which an assistant message with
 * tool_calls is not followed by a result for every call. Repairs the
 * history in place with placeholder results.
 */

import { createComponentLogger } from "../logging.js";
import type { LLMMessage } from "../llm/types.js";

const log = createComponentLogger("tool-loop.sanitize");

export function sanitizeMessages(messages: LLMMessage[]): number {
  let patched = 0;
  for (let i = 0; i < messages.length; i++) {
    const calls = messages[i].tool_calls;
    if (messages[i].role !== "assistant" || !calls?.length) continue;

    const answered = new Set<string>();
    let j = i + 1;
    for (; j < messages.length && messages[j].role === "tool"; j++) {
      const id = messages[j].tool_call_id;
      if (id) answered.add(id);
    }

    const missing = calls.filter((c) => !answered.has(c.id));
    if (missing.length === 0) continue;
    log.warn("Patching missing tool results", { assistantIdx: i, missing: missing.length });
    messages.splice(
      j,
      0,
      ...missing.map((c): LLMMessage => ({ role: "tool", content: "(no result: tool execution was skipped)", tool_call_id: c.id })),
    );
    patched += missing.length;
  }
  return patched;
}
