/**
 * HTTP Application
 *
 * Builds the hono app around a conversation registry. Kept apart from
 * index.ts so tests can drive it with app.request().
 */

import { Hono } from "hono";
import { cors } from "hono/cors";
import type { ConversationRegistry } from "./conversation/registry.js";
import { registerApiRoutes } from "./routes/api.js";
import { registerConversationRoutes } from "./routes/conversations.js";

export function createApp(registry: ConversationRegistry): Hono {
  const app = new Hono();

  // Middleware
  app.use("*", cors());

  registerApiRoutes(app, () => ({ conversations: registry.size }));
  registerConversationRoutes(app, registry);

  return app;
}
