/**
 * LLM Configuration: Providers, Model Roles + Fallback Chains
 *
 * Role configs define which provider/model handles each step of a turn.
 * Fallback chains list alternatives when the primary provider is unavailable.
 */

import type { LLMProvider, LLMProviderConfig, ModelRole, ModelRoleConfig } from "./types.js";

// ============================================
// PROVIDERS
// ============================================

export const PROVIDER_CONFIGS: Record<LLMProvider, LLMProviderConfig> = {
  anthropic: {
    provider: "anthropic",
    baseUrl: "https://api.anthropic.com",
    defaultModel: "claude-sonnet-4-20250514",
  },
  openai: {
    provider: "openai",
    baseUrl: "https://api.openai.com/v1",
    defaultModel: "gpt-4o",
  },
};

// ============================================
// MODEL ROLE CONFIGS
// ============================================

export const MODEL_ROLE_CONFIGS: Record<ModelRole, ModelRoleConfig> = {
  router: {
    role: "router",
    provider: "anthropic",
    model: "claude-3-5-haiku-20241022",
    temperature: 0.0,
    maxTokens: 500,
  },
  executor: {
    role: "executor",
    provider: "anthropic",
    model: "claude-sonnet-4-20250514",
    temperature: 0.3,
    maxTokens: 8096,
  },
  summarizer: {
    role: "summarizer",
    provider: "anthropic",
    model: "claude-3-5-haiku-20241022",
    temperature: 0.0,
    maxTokens: 200,
  },
};

// ============================================
// FALLBACK CHAINS
// ============================================

export interface FallbackEntry {
  provider: LLMProvider;
  model: string;
  temperature: number;
  maxTokens: number;
}

/**
 * Ordered fallback chains per role. Does NOT include the primary provider
 * (that's in MODEL_ROLE_CONFIGS). Order matters: first match wins.
 */
export const FALLBACK_CHAINS: Record<ModelRole, FallbackEntry[]> = {
  router: [
    { provider: "openai", model: "gpt-4o-mini", temperature: 0.0, maxTokens: 500 },
  ],
  executor: [
    { provider: "openai", model: "gpt-4o", temperature: 0.3, maxTokens: 8096 },
  ],
  summarizer: [
    { provider: "openai", model: "gpt-4o-mini", temperature: 0.0, maxTokens: 200 },
  ],
};
