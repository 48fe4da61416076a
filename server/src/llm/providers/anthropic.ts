/**
 * Anthropic LLM Client
 *
 * Uses the Anthropic Messages API with system message separation.
 */

import { z } from "zod";
import type { ILLMClient, LLMMessage, LLMRequestOptions, LLMResponse, LLMProvider, ToolCall, ToolDefinition } from "../types.js";
import { PROVIDER_CONFIGS } from "../config.js";
import { ProviderError } from "../../errors.js";
import { retryAfterMs } from "../resilience/retry.js";

// ============================================
// WIRE FORMAT
// ============================================

type AnthropicContentBlock =
  | { type: "text"; text: string }
  | { type: "tool_use"; id: string; name: string; input: unknown }
  | { type: "tool_result"; tool_use_id: string; content: string };

interface AnthropicMessage {
  role: "user" | "assistant";
  content: string | AnthropicContentBlock[];
}

const textBlockSchema = z.object({ type: z.literal("text"), text: z.string() });
const toolUseBlockSchema = z.object({ type: z.literal("tool_use"), id: z.string(), name: z.string(), input: z.unknown() });

// Other block kinds (thinking, ...) are skipped
const responseSchema = z.object({
  content: z.array(z.object({ type: z.string() }).passthrough()).default([]),
  usage: z.object({ input_tokens: z.number(), output_tokens: z.number() }).partial().optional(),
});

/**
 * Convert OpenAI-style tool definitions to Anthropic format.
 * OpenAI: { type: "function", function: { name, description, parameters } }
 * Anthropic: { name, description, input_schema }
 */
function toAnthropicTools(tools: ToolDefinition[]) {
  return tools.map((t) => ({
    name: t.function.name,
    description: t.function.description ?? "",
    input_schema: t.function.parameters ?? { type: "object", properties: {} },
  }));
}

function parseToolInput(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return {};
  }
}

/**
 * Format LLMMessages for the Anthropic Messages API.
 * Handles assistant messages with tool_calls and tool result messages.
 */
export function formatMessagesForAnthropic(messages: LLMMessage[]): AnthropicMessage[] {
  const result: AnthropicMessage[] = [];

  for (let i = 0; i < messages.length; i++) {
    const m = messages[i];
    if (m.role === "system") continue; // System handled separately

    if (m.role === "assistant" && m.tool_calls?.length) {
      const content: AnthropicContentBlock[] = [];
      if (m.content) content.push({ type: "text", text: m.content });
      for (const tc of m.tool_calls) {
        content.push({ type: "tool_use", id: tc.id, name: tc.function.name, input: parseToolInput(tc.function.arguments) });
      }
      result.push({ role: "assistant", content });
    } else if (m.role === "tool") {
      // Anthropic expects ALL tool results for a turn in a single user message.
      const toolResults: AnthropicContentBlock[] = [];
      let j = i;
      while (j < messages.length && messages[j].role === "tool") {
        toolResults.push({ type: "tool_result", tool_use_id: messages[j].tool_call_id ?? "", content: messages[j].content });
        j++;
      }
      i = j - 1;
      result.push({ role: "user", content: toolResults });
    } else {
      result.push({ role: m.role === "assistant" ? "assistant" : "user", content: m.content });
    }
  }

  return result;
}

export class AnthropicClient implements ILLMClient {
  provider: LLMProvider = "anthropic";
  private baseUrl: string;

  constructor(private readonly apiKey: string, baseUrl?: string) {
    this.baseUrl = baseUrl ?? PROVIDER_CONFIGS.anthropic.baseUrl;
  }

  async chat(messages: LLMMessage[], options?: LLMRequestOptions): Promise<LLMResponse> {
    const model = options?.model ?? PROVIDER_CONFIGS.anthropic.defaultModel;

    // Separate system messages from others (Anthropic API requirement)
    const system = messages.filter((m) => m.role === "system").map((m) => m.content).join("\n\n");

    const body: Record<string, unknown> = {
      model,
      system: system || undefined,
      messages: formatMessagesForAnthropic(messages),
      temperature: options?.temperature ?? 0.5,
      max_tokens: options?.maxTokens ?? 4096,
    };

    if (options?.tools?.length) {
      body.tools = toAnthropicTools(options.tools);
    }

    const response = await fetch(`${this.baseUrl}/v1/messages`, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        "x-api-key": this.apiKey,
        "anthropic-version": "2023-06-01",
      },
      body: JSON.stringify(body),
      signal: options?.signal,
    });

    if (!response.ok) {
      throw new ProviderError("Anthropic", response.status, await response.text(), retryAfterMs(response.headers.get("retry-after")));
    }

    const parsed = responseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error(`Anthropic API returned an unexpected payload: ${parsed.error.message}`);
    }
    const data = parsed.data;

    let textContent = "";
    const toolCalls: ToolCall[] = [];
    for (const raw of data.content) {
      const text = textBlockSchema.safeParse(raw);
      if (text.success) {
        textContent += text.data.text;
        continue;
      }
      const toolUse = toolUseBlockSchema.safeParse(raw);
      if (toolUse.success) {
        toolCalls.push({
          id: toolUse.data.id,
          type: "function",
          function: { name: toolUse.data.name, arguments: JSON.stringify(toolUse.data.input ?? {}) },
        });
      }
    }

    return {
      content: textContent,
      model,
      provider: "anthropic",
      usage: {
        inputTokens: data.usage?.input_tokens ?? 0,
        outputTokens: data.usage?.output_tokens ?? 0,
      },
      toolCalls: toolCalls.length ? toolCalls : undefined,
    };
  }
}
