/**
 * Server Configuration
 *
 * Environment variables, API keys and the engine's tuning constants.
 * Importable by any module that needs config without pulling in the
 * full server. No other module reads process.env (logging aside).
 */

import { config as loadDotenv } from "dotenv";
import { resolve, dirname, join } from "node:path";
import { homedir } from "node:os";
import { fileURLToPath } from "node:url";
import { z } from "zod";

// Load .env from project root (ESM compatible)
const __dirname = dirname(fileURLToPath(import.meta.url));
loadDotenv({ path: resolve(__dirname, "../../.env") });

// ============================================
// TYPES
// ============================================

export interface ApiKeys {
  anthropic?: string;
  openai?: string;
  voyage?: string;
}

export interface RetrievalSettings {
  /** Raw turns always included in the bundle; older turns are only reachable by search */
  alwaysOnWindow: number;
  documentResults: number;
  conversationResults: number;
}

export interface EmbeddingSettings {
  model: string;
  dimensions: number;
  batchSize: number;
  maxInFlight: number;
  initialBackoffMs: number;
  maxBackoffMs: number;
  maxAttempts: number;
  timeoutMs: number;
}

export interface ChunkingSettings {
  minTokens: number;
  maxTokens: number;
  parentMaxTokens: number;
}

export interface EngineSettings {
  retrieval: RetrievalSettings;
  embedding: EmbeddingSettings;
  chunking: ChunkingSettings;
  /** Depth bound for invalidation cascades */
  cascadeDepth: number;
  maxToolIterations: number;
  /** Turns between micro-synthesis checkpoints */
  microSynthesisEvery: number;
  /** Org-context re-enrichments allowed per conversation */
  maxEnrichments: number;
  /** Longest rolling summary the summary tool accepts */
  maxSummaryChars: number;
  timeouts: {
    routerMs: number;
    executorMs: number;
    summarizerMs: number;
  };
}

export interface EngineConfig extends EngineSettings {
  port: number;
  dataDir: string;
  apiKeys: ApiKeys;
}

// ============================================
// DEFAULTS
// ============================================

export const DEFAULT_SETTINGS: EngineSettings = {
  retrieval: {
    alwaysOnWindow: 3,
    documentResults: 4,
    conversationResults: 3,
  },
  embedding: {
    model: "voyage-3",
    dimensions: 1024,
    batchSize: 128,
    maxInFlight: 4,
    initialBackoffMs: 2_000,
    maxBackoffMs: 60_000,
    maxAttempts: 5,
    timeoutMs: 30_000,
  },
  chunking: {
    minTokens: 100,
    maxTokens: 500,
    parentMaxTokens: 2_000,
  },
  cascadeDepth: 8,
  maxToolIterations: 10,
  microSynthesisEvery: 3,
  maxEnrichments: 3,
  maxSummaryChars: 1_500,
  timeouts: {
    routerMs: 20_000,
    executorMs: 120_000,
    summarizerMs: 20_000,
  },
};

// ============================================
// LOADING
// ============================================

const optionalKey = z
  .string()
  .trim()
  .optional()
  .transform((v) => (v ? v : undefined));

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  FRAMEWISE_DATA_DIR: z.string().trim().min(1).optional(),
  ANTHROPIC_API_KEY: optionalKey,
  OPENAI_API_KEY: optionalKey,
  VOYAGE_API_KEY: optionalKey,
});

/**
 * Build the engine configuration from an environment map.
 * Throws when a present variable is malformed (e.g. PORT=abc).
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Invalid environment: ${issues}`);
  }
  const vars = parsed.data;
  const dataDir = vars.FRAMEWISE_DATA_DIR ?? join(homedir(), ".framewise");

  return Object.freeze({
    ...DEFAULT_SETTINGS,
    port: vars.PORT,
    dataDir: dataDir.startsWith("~") ? join(homedir(), dataDir.slice(1)) : dataDir,
    apiKeys: {
      anthropic: vars.ANTHROPIC_API_KEY,
      openai: vars.OPENAI_API_KEY,
      voyage: vars.VOYAGE_API_KEY,
    },
  });
}
