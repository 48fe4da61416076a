/**
 * API Routes
 *
 * Health check and the error boundary every route shares.
 */

import type { Hono } from "hono";
import { FramewiseError, StorageUnavailableError, errorMessage } from "../errors.js";
import { createComponentLogger } from "../logging.js";

const log = createComponentLogger("routes");

export const SERVICE_INFO = { service: "Framewise", version: "0.1.0" } as const;

/** HTTP status for an error that escaped a route. */
export function statusForError(error: unknown): 400 | 500 | 502 | 503 {
  if (error instanceof StorageUnavailableError) return 503;
  if (error instanceof FramewiseError) {
    switch (error.category) {
      case "rejected":
      case "malformed":
      case "unknown_reference":
      case "conversion":
        return 400;
      case "transient":
        return 502;
      default:
        return 500;
    }
  }
  return 500;
}

export function registerApiRoutes(app: Hono, status: () => { conversations: number }): void {
  // Health check
  app.get("/", (c) => c.json({ ...SERVICE_INFO, status: "running", ...status() }));

  app.onError((err, c) => {
    const code = statusForError(err);
    if (code === 500) log.error("Unhandled route error", err, { path: c.req.path, method: c.req.method });
    else log.warn("Route error", { path: c.req.path, method: c.req.method, status: code, error: errorMessage(err) });
    return c.json({ error: code === 500 ? "Internal server error" : errorMessage(err) }, code);
  });
}
