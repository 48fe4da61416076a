/**
 * Tool Loop: Generic Execution Engine
 *
 * 1. Sanitize messages
 * 2. Send messages + tools to the model (time-bounded)
 * 3. Dispatch each tool call to its handler
 * 4. Push results back as role:"tool" messages
 * 5. Warn on repeated calls
 * 6. Repeat until the model stops calling tools or the iteration guard trips
 * 7. On the guard: one text-only synthesis pass
 *
 * A failed generation call ends the loop without throwing; the result
 * carries the error and the text gathered so far.
 */

import { errorMessage } from "../errors.js";
import { chatWithTimeout } from "../llm/timeout.js";
import type { ToolCall } from "../llm/types.js";
import { createComponentLogger } from "../logging.js";
import { sanitizeMessages } from "./sanitize.js";
import { createRepeatTracker, findRepeats, repeatWarning } from "./stuck-detection.js";
import type { ToolCallRecord, ToolHandlerResult, ToolLoopOptions, ToolLoopResult } from "./types.js";

const log = createComponentLogger("tool-loop");

const SYNTHESIS_INSTRUCTION =
  "Respond to the user now with what you have established so far. Do NOT call tools and do NOT mention any internal limits.";

/** Normalize handler return to ToolHandlerResult. */
function normalizeResult(raw: string | ToolHandlerResult): ToolHandlerResult {
  return typeof raw === "string" ? { content: raw } : raw;
}

function decodeArguments(raw: string): { ok: true; value: unknown } | { ok: false } {
  if (!raw.trim()) return { ok: true, value: {} };
  try {
    return { ok: true, value: JSON.parse(raw) };
  } catch {
    return { ok: false };
  }
}

export async function runToolLoop<C>(options: ToolLoopOptions<C>): Promise<ToolLoopResult> {
  const { client, messages, tools, maxIterations, maxTokens, temperature = 0.3, timeoutMs } = options;
  const label = options.label ?? "tool-loop";

  const texts: string[] = [];
  const displayed: string[] = [];
  const output: string[] = [];
  const toolCallsMade: ToolCallRecord[] = [];
  const repeats = createRepeatTracker();
  let iterations = 0;
  let hitIterationLimit = false;

  const generate = async (withTools: boolean) => {
    sanitizeMessages(messages);
    iterations++;
    return chatWithTimeout(
      client,
      messages,
      { maxTokens, temperature, tools: withTools ? tools : undefined },
      { operation: label, timeoutMs },
    );
  };

  try {
    for (let iteration = 1; ; iteration++) {
      if (iteration > maxIterations) {
        hitIterationLimit = true;
        break;
      }
      log.debug(`Tool loop iteration ${iteration}/${maxIterations}`, { label });

      const response = await generate(true);
      const toolCalls: ToolCall[] = response.toolCalls ?? [];
      const textContent = response.content.trim();
      if (textContent) {
        texts.push(textContent);
        output.push(textContent);
      }

      log.info(`LLM response (iteration ${iteration})`, {
        label,
        model: response.model,
        contentLength: textContent.length,
        tools: toolCalls.map((c) => c.function.name),
        inputTokens: response.usage?.inputTokens,
        outputTokens: response.usage?.outputTokens,
      });

      if (toolCalls.length === 0) break;

      messages.push({ role: "assistant", content: response.content, tool_calls: toolCalls });
      const repeated = findRepeats(repeats, toolCalls.map((c) => ({ name: c.function.name, arguments: c.function.arguments })), label);

      // In order: later calls may read what earlier ones wrote
      for (const call of toolCalls) {
        const record = await dispatch(call, options);
        toolCallsMade.push({ tool: call.function.name, args: record.args, result: record.result.content, success: record.success });
        if (record.result.display) {
          displayed.push(record.result.display);
          output.push(record.result.display);
        }
        messages.push({ role: "tool", content: record.result.content, tool_call_id: call.id });
      }

      if (repeated.length > 0) messages.push({ role: "user", content: repeatWarning(repeated) });
    }

    if (hitIterationLimit) {
      log.warn("Tool loop hit max iterations, running synthesis pass", { label, maxIterations });
      messages.push({ role: "user", content: SYNTHESIS_INSTRUCTION });
      const synthesis = await generate(false);
      const text = synthesis.content.trim();
      if (text) {
        texts.push(text);
        output.push(text);
      }
    }
  } catch (e) {
    const error = e instanceof Error ? e : new Error(String(e));
    log.warn("Tool loop generation failed", { label, iterations, error: errorMessage(e) });
    return { iterations, text: texts.join("\n\n"), displayed, output: output.join("\n\n"), toolCallsMade, hitIterationLimit, error };
  }

  return { iterations, text: texts.join("\n\n"), displayed, output: output.join("\n\n"), toolCallsMade, hitIterationLimit, error: null };
}

async function dispatch<C>(call: ToolCall, options: ToolLoopOptions<C>): Promise<{ args: unknown; result: ToolHandlerResult; success: boolean }> {
  const name = call.function.name;
  const handler = options.handlers.get(name);
  if (!handler) {
    log.warn("No handler registered for tool", { tool: name });
    return { args: null, result: { content: `Error: unknown tool ${name}` }, success: false };
  }

  const decoded = decodeArguments(call.function.arguments);
  if (!decoded.ok) {
    log.warn("Failed to parse tool arguments", { tool: name });
    return { args: null, result: { content: `Error: arguments for ${name} are not valid JSON` }, success: false };
  }

  try {
    const result = normalizeResult(await handler(options.context, decoded.value));
    return { args: decoded.value, result, success: !result.content.startsWith("Error:") };
  } catch (err) {
    log.warn("Tool handler failed", { tool: name, error: errorMessage(err) });
    return { args: decoded.value, result: { content: `Error: ${errorMessage(err)}` }, success: false };
  }
}
