/**
 * In-process stand-ins for the generation and embedding services.
 * Only tests import this module.
 */

import type { ILLMClient, LLMMessage, LLMRequestOptions, LLMResponse, LLMProvider, ToolCall } from "../llm/types.js";
import type { EmbeddingClient, EmbeddingInputType } from "../vector/embedding-client.js";

// ============================================
// EMBEDDINGS
// ============================================

export const FAKE_DIMENSIONS = 64;

function bucket(word: string): number {
  let h = 0;
  for (const ch of word) h = (h * 31 + ch.charCodeAt(0)) >>> 0;
  return h % FAKE_DIMENSIONS;
}

/** Bag-of-words vector: texts sharing words land close together. */
export function bagOfWords(text: string): number[] {
  const vector = new Array<number>(FAKE_DIMENSIONS).fill(0);
  for (const word of text.toLowerCase().match(/[a-z0-9]+/g) ?? []) vector[bucket(word)] += 1;
  return vector;
}

export class FakeEmbeddingClient implements EmbeddingClient {
  readonly calls: { texts: string[]; inputType: EmbeddingInputType }[] = [];
  /** Errors thrown by the next calls, in order */
  readonly failures: Error[] = [];

  async embed(texts: string[], inputType: EmbeddingInputType): Promise<number[][]> {
    this.calls.push({ texts: [...texts], inputType });
    const failure = this.failures.shift();
    if (failure) throw failure;
    return texts.map(bagOfWords);
  }
}

// ============================================
// GENERATION
// ============================================

export type ScriptStep = LLMResponse | Error | ((messages: LLMMessage[], options?: LLMRequestOptions) => LLMResponse | Promise<LLMResponse>);

export function textResponse(content: string, provider: LLMProvider = "anthropic"): LLMResponse {
  return { content, model: "scripted", provider };
}

let callCounter = 0;

export function toolCall(name: string, args: Record<string, unknown>): ToolCall {
  callCounter += 1;
  return { id: `call_${callCounter}`, type: "function", function: { name, arguments: JSON.stringify(args) } };
}

export function toolResponse(calls: ToolCall[], content = ""): LLMResponse {
  return { content, model: "scripted", provider: "anthropic", toolCalls: calls };
}

/**
 * Replays a fixed script of responses. Running past the end of the
 * script is a test bug and throws.
 */
export class ScriptedLLMClient implements ILLMClient {
  provider: LLMProvider = "anthropic";
  readonly requests: { messages: LLMMessage[]; options?: LLMRequestOptions }[] = [];

  constructor(private readonly script: ScriptStep[] = []) {}

  push(...steps: ScriptStep[]): this {
    this.script.push(...steps);
    return this;
  }

  get remaining(): number {
    return this.script.length;
  }

  async chat(messages: LLMMessage[], options?: LLMRequestOptions): Promise<LLMResponse> {
    this.requests.push({ messages: messages.map((m) => ({ ...m })), options });
    const step = this.script.shift();
    if (step === undefined) throw new Error("ScriptedLLMClient: script exhausted");
    if (step instanceof Error) throw step;
    if (typeof step === "function") return step(messages, options);
    return step;
  }
}
