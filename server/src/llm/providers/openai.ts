/**
 * OpenAI Chat Completions Client
 *
 * Generation fallback when the primary provider is unavailable.
 */

import { z } from "zod";
import type { ILLMClient, LLMMessage, LLMRequestOptions, LLMResponse, LLMProvider, ToolCall } from "../types.js";
import { PROVIDER_CONFIGS } from "../config.js";
import { ProviderError } from "../../errors.js";
import { retryAfterMs } from "../resilience/retry.js";

const responseSchema = z.object({
  choices: z.array(
    z.object({
      message: z.object({
        content: z.string().nullable().optional(),
        tool_calls: z
          .array(
            z.object({
              id: z.string(),
              function: z.object({ name: z.string(), arguments: z.string() }),
            }),
          )
          .optional(),
      }),
    }),
  ).min(1),
  usage: z.object({ prompt_tokens: z.number(), completion_tokens: z.number() }).partial().optional(),
});

/**
 * Format LLMMessages into the chat completions message shape.
 */
export function formatMessagesForOpenAI(messages: LLMMessage[]): Record<string, unknown>[] {
  return messages.map((m) => {
    const msg: Record<string, unknown> = { role: m.role, content: m.content };
    if (m.role === "assistant" && m.tool_calls?.length) msg.tool_calls = m.tool_calls;
    if (m.role === "tool" && m.tool_call_id) msg.tool_call_id = m.tool_call_id;
    return msg;
  });
}

export class OpenAIClient implements ILLMClient {
  provider: LLMProvider = "openai";
  private baseUrl: string;

  constructor(private readonly apiKey: string, baseUrl?: string) {
    this.baseUrl = baseUrl ?? PROVIDER_CONFIGS.openai.baseUrl;
  }

  async chat(messages: LLMMessage[], options?: LLMRequestOptions): Promise<LLMResponse> {
    const model = options?.model ?? PROVIDER_CONFIGS.openai.defaultModel;

    const body: Record<string, unknown> = {
      model,
      messages: formatMessagesForOpenAI(messages),
      temperature: options?.temperature ?? 0.5,
      max_tokens: options?.maxTokens ?? 4096,
      stream: false,
    };
    if (options?.tools?.length) body.tools = options.tools;
    if (options?.responseFormat === "json_object") body.response_format = { type: "json_object" };

    const response = await fetch(`${this.baseUrl}/chat/completions`, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        Authorization: `Bearer ${this.apiKey}`,
      },
      body: JSON.stringify(body),
      signal: options?.signal,
    });

    if (!response.ok) {
      throw new ProviderError("OpenAI", response.status, await response.text(), retryAfterMs(response.headers.get("retry-after")));
    }

    const parsed = responseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error(`openai API returned an unexpected payload: ${parsed.error.message}`);
    }
    const data = parsed.data;
    const message = data.choices[0].message;

    const toolCalls: ToolCall[] = (message.tool_calls ?? []).map((tc) => ({
      id: tc.id,
      type: "function",
      function: { name: tc.function.name, arguments: tc.function.arguments },
    }));

    return {
      content: message.content ?? "",
      model,
      provider: "openai",
      usage: {
        inputTokens: data.usage?.prompt_tokens ?? 0,
        outputTokens: data.usage?.completion_tokens ?? 0,
      },
      toolCalls: toolCalls.length ? toolCalls : undefined,
    };
  }
}
