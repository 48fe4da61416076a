/**
 * Conversation Routes
 *
 * Thin adapter over the conversation registry. Every call that touches a
 * conversation goes through its worker so it queues behind running turns.
 */

import type { Context, Hono } from "hono";
import { z } from "zod";
import { DOCUMENT_FORMATS } from "../chunking/types.js";
import type { ConversationRegistry } from "../conversation/registry.js";
import type { ConversationWorker } from "../conversation/worker.js";
import { InvalidSnapshotError } from "../errors.js";
import type { IngestRequest } from "../ingestion/types.js";
import { createComponentLogger } from "../logging.js";

const log = createComponentLogger("routes.conversations");

/** Largest request body accepted for document uploads */
export const MAX_UPLOAD_BYTES = 25 * 1024 * 1024;

const createBody = z.object({ projectName: z.string().trim().min(1).optional() });
const messageBody = z.object({ message: z.string().trim().min(1, "message is required") });
const documentBody = z.object({
  sourceId: z.string().trim().min(1).optional(),
  filename: z.string().trim().min(1).optional(),
  content: z.string(),
  format: z.enum(DOCUMENT_FORMATS).default("markdown"),
});

async function readJson(c: Context): Promise<{ ok: true; value: unknown } | { ok: false }> {
  try {
    const value: unknown = await c.req.json();
    return { ok: true, value };
  } catch {
    return { ok: false };
  }
}

function issuesOf(error: z.ZodError): string {
  return error.issues.map((i) => (i.path.length ? `${i.path.join(".")}: ${i.message}` : i.message)).join("; ");
}

/** Multipart `file` upload, or a JSON body carrying the text itself. */
async function readDocument(c: Context): Promise<{ ok: true; request: IngestRequest } | { ok: false; error: string }> {
  const contentType = c.req.header("content-type") ?? "";
  if (contentType.startsWith("multipart/form-data")) {
    const body = await c.req.parseBody();
    const file = body["file"];
    if (!(file instanceof File)) {
      return { ok: false, error: "No file provided. Send multipart form-data with field name 'file'" };
    }
    const sourceId = body["sourceId"];
    return {
      ok: true,
      request: {
        sourceId: typeof sourceId === "string" && sourceId.trim() ? sourceId.trim() : undefined,
        filename: file.name || "upload",
        content: new Uint8Array(await file.arrayBuffer()),
      },
    };
  }

  const json = await readJson(c);
  if (!json.ok) return { ok: false, error: "Body must be JSON or multipart form-data" };
  const parsed = documentBody.safeParse(json.value);
  if (!parsed.success) return { ok: false, error: issuesOf(parsed.error) };
  const { sourceId, filename, content, format } = parsed.data;
  return { ok: true, request: { sourceId, filename: filename ?? sourceId ?? "document", content, format } };
}

export function registerConversationRoutes(app: Hono, registry: ConversationRegistry): void {
  const withWorker = (c: Context): ConversationWorker | undefined => registry.get(c.req.param("id"));
  const notFound = (c: Context) => c.json({ error: "Conversation not found" }, 404);

  // Create a conversation
  app.post("/api/conversations", async (c) => {
    const json = c.req.header("content-type")?.includes("application/json") ? await readJson(c) : { ok: true as const, value: {} };
    if (!json.ok) return c.json({ error: "Body must be JSON" }, 400);
    const parsed = createBody.safeParse(json.value);
    if (!parsed.success) return c.json({ error: issuesOf(parsed.error) }, 400);

    const worker = registry.create({ projectName: parsed.data.projectName });
    const primingMessage = worker.engine.primingMessage();
    return c.json({ id: worker.id, primingMessage }, 201);
  });

  // Reopen a saved conversation under its own id
  app.post("/api/conversations/open", async (c) => {
    const json = await readJson(c);
    if (!json.ok) return c.json({ error: "Body must be JSON" }, 400);
    let worker: ConversationWorker;
    try {
      worker = await registry.open(json.value);
    } catch (e) {
      if (e instanceof InvalidSnapshotError) return c.json({ error: e.message }, 400);
      throw e;
    }
    return c.json({ id: worker.id, turnCount: worker.engine.current.turnCount }, 201);
  });

  app.delete("/api/conversations/:id", async (c) => {
    const closed = await registry.close(c.req.param("id"));
    if (!closed) return notFound(c);
    return c.json({ id: c.req.param("id"), closed });
  });

  // One turn
  app.post("/api/conversations/:id/messages", async (c) => {
    const worker = withWorker(c);
    if (!worker) return notFound(c);
    const json = await readJson(c);
    if (!json.ok) return c.json({ error: "Body must be JSON" }, 400);
    const parsed = messageBody.safeParse(json.value);
    if (!parsed.success) return c.json({ error: issuesOf(parsed.error) }, 400);

    const result = await worker.handleMessage(parsed.data.message);
    return c.json(result, result.status === "ok" ? 200 : 503);
  });

  // ============================================
  // DOCUMENTS
  // ============================================

  app.post("/api/conversations/:id/documents", async (c) => {
    const worker = withWorker(c);
    if (!worker) return notFound(c);

    const contentLength = Number.parseInt(c.req.header("content-length") ?? "0", 10);
    if (contentLength > MAX_UPLOAD_BYTES) {
      return c.json({ error: `Request too large. Maximum is ${MAX_UPLOAD_BYTES / 1024 / 1024} MB.` }, 413);
    }

    const document = await readDocument(c);
    if (!document.ok) return c.json({ error: document.error }, 400);

    const result = await worker.ingestDocument(document.request);
    log.info("Document upload handled", { conversationId: worker.id, sourceId: result.sourceId, ok: result.ok });
    return c.json(result, result.ok ? 201 : 422);
  });

  app.delete("/api/conversations/:id/documents/:sourceId", async (c) => {
    const worker = withWorker(c);
    if (!worker) return notFound(c);
    const sourceId = c.req.param("sourceId");
    const removed = await worker.removeDocument(sourceId);
    if (!removed) return c.json({ error: `Document ${sourceId} not found` }, 404);
    return c.json({ sourceId, removed });
  });

  // ============================================
  // STATE
  // ============================================

  app.get("/api/conversations/:id/snapshot", async (c) => {
    const worker = withWorker(c);
    if (!worker) return notFound(c);
    return c.json(await worker.snapshot());
  });

  app.put("/api/conversations/:id/snapshot", async (c) => {
    const worker = withWorker(c);
    if (!worker) return notFound(c);
    const json = await readJson(c);
    if (!json.ok) return c.json({ error: "Body must be JSON" }, 400);
    try {
      await worker.restore(json.value);
    } catch (e) {
      if (e instanceof InvalidSnapshotError) return c.json({ error: e.message }, 400);
      throw e;
    }
    return c.json({ id: worker.id, restored: true, turnCount: worker.engine.current.turnCount });
  });

  app.get("/api/conversations/:id/artifact", (c) => {
    const worker = withWorker(c);
    if (!worker) return notFound(c);
    const artifact = worker.engine.current.latestArtifact;
    if (!artifact) return c.json({ error: "No artifact rendered yet" }, 404);
    return c.json(artifact);
  });
}
