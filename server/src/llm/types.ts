/**
 * LLM Types
 *
 * Messages and tool calls use the OpenAI chat shape throughout; the
 * Anthropic client translates at its edge.
 */

export type LLMProvider = "anthropic" | "openai";

/**
 * Why a model is chosen, not which one:
 *
 *   router      one small JSON decision per turn
 *   executor    tool loop and the user-facing reply
 *   summarizer  turn and file summaries for the vector index
 */
export type ModelRole = "router" | "executor" | "summarizer";

// ============================================
// MESSAGES
// ============================================

export interface ToolCall {
  id: string;
  type: "function";
  function: {
    name: string;
    /** JSON-encoded arguments as the model produced them; may not parse */
    arguments: string;
  };
}

export interface LLMMessage {
  role: "system" | "user" | "assistant" | "tool";
  content: string;
  /** assistant only */
  tool_calls?: ToolCall[];
  /** tool only: the call this message answers */
  tool_call_id?: string;
}

export interface ToolDefinition {
  type: "function";
  function: {
    name: string;
    description?: string;
    /** JSON Schema for the arguments */
    parameters?: Record<string, unknown>;
  };
}

// ============================================
// REQUESTS
// ============================================

export interface LLMRequestOptions {
  model?: string;
  temperature?: number;
  maxTokens?: number;
  tools?: ToolDefinition[];
  /** OpenAI honours json_object; Anthropic relies on the prompt */
  responseFormat?: "json_object" | "text";
  signal?: AbortSignal;
}

export interface LLMResponse {
  content: string;
  model: string;
  provider: LLMProvider;
  usage?: { inputTokens: number; outputTokens: number };
  toolCalls?: ToolCall[];
}

export interface ILLMClient {
  readonly provider: LLMProvider;
  chat(messages: LLMMessage[], options?: LLMRequestOptions): Promise<LLMResponse>;
}

// ============================================
// CONFIGURATION
// ============================================

export interface LLMProviderConfig {
  provider: LLMProvider;
  baseUrl: string;
  defaultModel: string;
}

export interface ModelRoleConfig {
  role: ModelRole;
  provider: LLMProvider;
  model: string;
  temperature: number;
  maxTokens: number;
}

export interface LLMClientOptions {
  provider: LLMProvider;
  apiKey?: string;
  baseUrl?: string;
}
