/**
 * Framewise Server - Main Entry Point
 *
 * Loads configuration, builds the role clients and the conversation
 * registry, and serves the HTTP API.
 */

import { serve } from "@hono/node-server";
import { createApp } from "./app.js";
import { loadConfig } from "./config.js";
import { ConversationRegistry, fileResources } from "./conversation/registry.js";
import { getKnowledgeIndex } from "./knowledge/catalog.js";
import { createRoleClients } from "./llm/index.js";
import { createComponentLogger, getServerLogger, initServerLogging } from "./logging.js";
import { Embedder, VoyageEmbeddingClient } from "./vector/index.js";

initServerLogging();
const log = createComponentLogger("main");

// ============================================
// CONFIGURATION
// ============================================

const config = loadConfig();
const clients = createRoleClients(config.apiKeys);

const embedder = config.apiKeys.voyage
  ? new Embedder(new VoyageEmbeddingClient(config.apiKeys.voyage, config.embedding), config.embedding)
  : null;
if (!embedder) log.warn("VOYAGE_API_KEY not set, retrieval disabled; turns use the always-on context only");

const registry = new ConversationRegistry({
  clients,
  knowledge: getKnowledgeIndex(),
  settings: config,
  resources: fileResources(config.dataDir, embedder, config.retrieval),
});

// ============================================
// HTTP API
// ============================================

const app = createApp(registry);

serve({ fetch: app.fetch, port: config.port }, () => {
  log.info("HTTP API running", { url: `http://localhost:${config.port}`, dataDir: config.dataDir, retrieval: embedder !== null });
});

// Graceful shutdown
async function shutdown(signal: string): Promise<void> {
  log.info("Shutting down", { signal, conversations: registry.size });
  try {
    await registry.closeAll();
    await getServerLogger().close();
  } catch (e) {
    log.error("Shutdown did not complete cleanly", e);
  }
  process.exit(0);
}

process.on("SIGINT", () => void shutdown("SIGINT"));
process.on("SIGTERM", () => void shutdown("SIGTERM"));
