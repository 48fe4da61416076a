/**
 * Conversation Worker
 *
 * Serializes everything that touches one conversation. Each task waits
 * for the one before it, so a turn never sees an ingestion half-applied
 * and two turns never interleave. A failed task rejects only its own
 * caller; the chain keeps going.
 */

import type { IngestRequest, IngestResult } from "../ingestion/types.js";
import { createComponentLogger } from "../logging.js";
import { errorMessage } from "../errors.js";
import type { ConversationEngine, TurnResult } from "./engine.js";
import type { ConversationSnapshot } from "./snapshot.js";

const log = createComponentLogger("conversation.worker");

export class ConversationWorker {
  private tail: Promise<void> = Promise.resolve();
  private queued = 0;

  constructor(readonly engine: ConversationEngine) {}

  get id(): string {
    return this.engine.id;
  }

  /** Tasks queued or running */
  get pending(): number {
    return this.queued;
  }

  run<T>(label: string, task: (engine: ConversationEngine) => Promise<T> | T): Promise<T> {
    this.queued += 1;
    const result = this.tail.then(() => task(this.engine));
    this.tail = result.then(
      () => {
        this.queued -= 1;
      },
      (e: unknown) => {
        this.queued -= 1;
        log.warn("Conversation task failed", { conversationId: this.id, task: label, error: errorMessage(e) });
      },
    );
    return result;
  }

  handleMessage(message: string): Promise<TurnResult> {
    return this.run("turn", (engine) => engine.handleMessage(message));
  }

  ingestDocument(request: IngestRequest): Promise<IngestResult> {
    return this.run("ingest", (engine) => engine.ingestDocument(request));
  }

  removeDocument(sourceId: string): Promise<boolean> {
    return this.run("remove-document", (engine) => engine.removeDocument(sourceId));
  }

  snapshot(): Promise<ConversationSnapshot> {
    return this.run("snapshot", (engine) => engine.snapshot());
  }

  restore(snapshot: unknown): Promise<void> {
    return this.run("restore", (engine) => engine.restore(snapshot));
  }

  /** Waits for queued work, then releases the engine's storage. */
  close(): Promise<void> {
    return this.run("close", (engine) => engine.close());
  }
}
