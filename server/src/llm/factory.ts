/**
 * LLM Client Factory
 *
 * Creates provider-specific clients and the resilient per-role clients
 * the engine uses. Each provider implementation lives in ./providers/.
 */

import { createComponentLogger } from "../logging.js";
import type { ApiKeys } from "../config.js";
import type { LLMProvider, LLMClientOptions, ILLMClient, ModelRole } from "./types.js";
import { MODEL_ROLE_CONFIGS, FALLBACK_CHAINS } from "./config.js";
import { AnthropicClient } from "./providers/anthropic.js";
import { OpenAIClient } from "./providers/openai.js";
import { ResilientLLMClient } from "./resilience/resilient-client.js";

const log = createComponentLogger("llm.factory");

// ============================================
// LLM CLIENT FACTORY
// ============================================

export function createLLMClient(options: LLMClientOptions): ILLMClient {
  const { provider, apiKey, baseUrl } = options;
  switch (provider) {
    case "anthropic":
      if (!apiKey) throw new Error("Anthropic requires an API key");
      return new AnthropicClient(apiKey, baseUrl);
    case "openai":
      if (!apiKey) throw new Error("OpenAI requires an API key");
      return new OpenAIClient(apiKey, baseUrl);
  }
}

export function apiKeyFor(keys: ApiKeys, provider: LLMProvider): string | undefined {
  return provider === "anthropic" ? keys.anthropic : keys.openai;
}

/**
 * The three role clients a conversation engine needs.
 */
export interface RoleClients {
  router: ILLMClient;
  executor: ILLMClient;
  summarizer: ILLMClient;
}

/**
 * Create a ResilientLLMClient for a role. When the role's primary provider
 * has no key, the first fallback with a key becomes the primary.
 */
export function createClientForRole(role: ModelRole, keys: ApiKeys): ILLMClient {
  const candidates: LLMProvider[] = [MODEL_ROLE_CONFIGS[role].provider, ...FALLBACK_CHAINS[role].map((f) => f.provider)];
  const provider = candidates.find((p) => apiKeyFor(keys, p));
  if (!provider) {
    throw new Error(`No API key available for the ${role} role (set ANTHROPIC_API_KEY or OPENAI_API_KEY)`);
  }
  if (provider !== MODEL_ROLE_CONFIGS[role].provider) {
    log.warn("Primary provider has no key, starting from fallback", { role, provider });
  }

  const primary = createLLMClient({ provider, apiKey: apiKeyFor(keys, provider) });
  return new ResilientLLMClient(
    primary,
    role,
    (fallbackProvider, apiKey) => createLLMClient({ provider: fallbackProvider, apiKey }),
    (p) => apiKeyFor(keys, p),
  );
}

export function createRoleClients(keys: ApiKeys): RoleClients {
  return {
    router: createClientForRole("router", keys),
    executor: createClientForRole("executor", keys),
    summarizer: createClientForRole("summarizer", keys),
  };
}
