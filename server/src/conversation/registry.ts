/**
 * Conversation Registry
 *
 * Creates and owns one worker per conversation. Each conversation gets its
 * own state, vector store and upload store; the only things shared are
 * the stateless clients and the read-only knowledge catalog.
 */

import { join } from "node:path";
import { nanoid } from "nanoid";
import type { EngineSettings, RetrievalSettings } from "../config.js";
import { FileUploadStore, MemoryUploadStore, type UploadStore } from "../ingestion/uploads.js";
import type { KnowledgeIndex } from "../knowledge/catalog.js";
import { createComponentLogger } from "../logging.js";
import { Embedder, VectorIndex, VectorStore } from "../vector/index.js";
import { ConversationEngine, type EngineClients } from "./engine.js";
import { restoreConversation, snapshotId } from "./snapshot.js";
import { createConversationState, type ConversationState } from "./state.js";
import { ConversationWorker } from "./worker.js";

const log = createComponentLogger("conversation.registry");

export interface ConversationResources {
  index: VectorIndex;
  uploads: UploadStore;
}

export type ResourceFactory = (conversationId: string) => ConversationResources;

/** Per-conversation SQLite vectors and upload directory under dataDir. */
export function fileResources(dataDir: string, embedder: Embedder | null, retrieval: RetrievalSettings): ResourceFactory {
  return (conversationId) => {
    const dir = join(dataDir, "conversations", conversationId);
    return {
      index: new VectorIndex(VectorStore.open(join(dir, "vectors.db")), embedder, retrieval),
      uploads: new FileUploadStore(join(dir, "uploads")),
    };
  };
}

export function memoryResources(embedder: Embedder | null, retrieval: RetrievalSettings): ResourceFactory {
  return () => ({
    index: new VectorIndex(VectorStore.open(":memory:"), embedder, retrieval),
    uploads: new MemoryUploadStore(),
  });
}

export interface RegistryDeps {
  clients: EngineClients;
  knowledge: KnowledgeIndex;
  settings: EngineSettings;
  resources: ResourceFactory;
}

export class ConversationRegistry {
  private readonly workers = new Map<string, ConversationWorker>();

  constructor(private readonly deps: RegistryDeps) {}

  create(options: { projectName?: string | null } = {}): ConversationWorker {
    const state = createConversationState(nanoid(16), {
      projectName: options.projectName ?? null,
      cascadeDepth: this.deps.settings.cascadeDepth,
    });
    const worker = this.start(state);
    log.info("Conversation created", { conversationId: state.id, projectName: state.projectName });
    return worker;
  }

  /**
   * Reopens a saved conversation under the id it was saved with, so its
   * vectors and uploads are attached again. A conversation already open
   * under that id is restored in place.
   */
  async open(snapshot: unknown): Promise<ConversationWorker> {
    const id = snapshotId(snapshot);
    const live = this.workers.get(id);
    if (live) {
      await live.restore(snapshot);
      return live;
    }
    const state = restoreConversation(snapshot, { cascadeDepth: this.deps.settings.cascadeDepth });
    const worker = this.start(state);
    log.info("Conversation reopened", { conversationId: id, turnCount: state.turnCount, documents: state.project.fileSummaries.length });
    return worker;
  }

  private start(state: ConversationState): ConversationWorker {
    const { index, uploads } = this.deps.resources(state.id);
    const engine = new ConversationEngine(state, {
      clients: this.deps.clients,
      knowledge: this.deps.knowledge,
      index,
      uploads,
      settings: this.deps.settings,
    });
    const worker = new ConversationWorker(engine);
    this.workers.set(state.id, worker);
    log.debug("Conversation resources attached", { conversationId: state.id, retrieval: index.enabled });
    return worker;
  }

  get(id: string): ConversationWorker | undefined {
    return this.workers.get(id);
  }

  get size(): number {
    return this.workers.size;
  }

  /** Returns false for an unknown id. */
  async close(id: string): Promise<boolean> {
    const worker = this.workers.get(id);
    if (!worker) return false;
    this.workers.delete(id);
    await worker.close();
    log.info("Conversation closed", { conversationId: id });
    return true;
  }

  async closeAll(): Promise<void> {
    await Promise.all([...this.workers.keys()].map((id) => this.close(id)));
  }
}
