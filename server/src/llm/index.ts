/**
 * LLM Module: Barrel Export
 *
 * Structure:
 *   types.ts     Pure type definitions (no runtime values)
 *   config.ts    Provider configs, model roles, fallback chains
 *   factory.ts   Client creation functions
 *   providers/   Provider client implementations
 *   resilience/  Retry logic + resilient client wrapper
 */

export type {
  LLMProvider,
  LLMMessage,
  LLMRequestOptions,
  LLMResponse,
  LLMProviderConfig,
  ILLMClient,
  ModelRole,
  ModelRoleConfig,
  LLMClientOptions,
  ToolDefinition,
  ToolCall,
} from "./types.js";

export { PROVIDER_CONFIGS, MODEL_ROLE_CONFIGS, FALLBACK_CHAINS, type FallbackEntry } from "./config.js";
export { createLLMClient, createClientForRole, createRoleClients, apiKeyFor, type RoleClients } from "./factory.js";
export { AnthropicClient, OpenAIClient } from "./providers/index.js";
export { isRetryableError, ResilientLLMClient } from "./resilience/index.js";
export { chatWithTimeout, withTimeout } from "./timeout.js";
