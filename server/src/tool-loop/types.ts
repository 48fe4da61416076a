/**
 * Tool Loop: Shared Types
 *
 * Generic types for the tool execution loop. The caller supplies a
 * handler registry, tool definitions and whatever context its handlers
 * need; the loop knows nothing about the domain.
 */

import type { ILLMClient, LLMMessage, ToolDefinition } from "../llm/types.js";

/**
 * Rich result from a tool handler.
 */
export interface ToolHandlerResult {
  /** Text sent back to the model as the tool result. */
  content: string;
  /** Text shown to the user as-is, never seen by the model. */
  display?: string;
}

/**
 * A tool handler: takes the caller's context and the decoded arguments
 * (unvalidated), returns the result for the model. Handlers report bad
 * input as a result string rather than throwing.
 */
export type ToolHandler<C> = (ctx: C, args: unknown) => string | ToolHandlerResult | Promise<string | ToolHandlerResult>;

export interface ToolCallRecord {
  tool: string;
  args: unknown;
  result: string;
  success: boolean;
}

export interface ToolLoopOptions<C> {
  client: ILLMClient;
  messages: LLMMessage[];
  tools: ToolDefinition[];
  handlers: ReadonlyMap<string, ToolHandler<C>>;
  /** Passed to every handler. */
  context: C;
  maxIterations: number;
  maxTokens: number;
  temperature?: number;
  /** Bound on each generation call. */
  timeoutMs: number;
  /** Name used in logs and timeout errors. */
  label?: string;
}

export interface ToolLoopResult {
  /** Generation calls made, synthesis pass included. */
  iterations: number;
  /** Model text from every iteration, in order. */
  text: string;
  /** Handler output meant for the user, in call order. */
  displayed: string[];
  /** Model text and displayed output interleaved in the order produced. */
  output: string;
  toolCallsMade: ToolCallRecord[];
  /** True when the iteration guard ended the loop. */
  hitIterationLimit: boolean;
  /** Set when a generation call failed; effects of earlier tool calls stay applied. */
  error: Error | null;
}
