/**
 * Vector Index
 *
 * Two collections over one store: "documents" (leaf chunks, returned as
 * deduplicated parents) and "conversations" (turn summaries, returned as
 * full exchanges in chronological order). Without an embedder the index
 * is disabled and every search returns nothing.
 */

import type { RetrievalSettings } from "../config.js";
import type { LeafChunk } from "../chunking/index.js";
import { createComponentLogger } from "../logging.js";
import type { Embedder } from "./embedder.js";
import type { Metadata, VectorStore } from "./sqlite-store.js";

const log = createComponentLogger("vector.index");

export const DOCUMENTS = "documents";
export const CONVERSATIONS = "conversations";

export interface DocumentHit {
  parentId: string;
  parentText: string;
  contextHeader: string;
  headerPath: string[];
  sourceId: string;
  filename: string;
  score: number;
}

export interface TurnRecord {
  turnNumber: number;
  userMessage: string;
  assistantResponse: string;
  /** What gets embedded */
  summary: string;
  activeProbe: string | null;
  activeMode: string | null;
}

export interface ConversationHit extends TurnRecord {
  score: number;
}

function str(metadata: Metadata, key: string): string {
  const value = metadata[key];
  return typeof value === "string" ? value : "";
}

function num(metadata: Metadata, key: string): number {
  const value = metadata[key];
  return typeof value === "number" ? value : 0;
}

function headerPathOf(metadata: Metadata): string[] {
  try {
    const parsed: unknown = JSON.parse(str(metadata, "headerPath"));
    return Array.isArray(parsed) ? parsed.filter((h): h is string => typeof h === "string") : [];
  } catch {
    return [];
  }
}

export class VectorIndex {
  constructor(
    private readonly store: VectorStore,
    private readonly embedder: Embedder | null,
    private readonly retrieval: RetrievalSettings,
  ) {}

  get enabled(): boolean {
    return this.embedder !== null;
  }

  /** Embeds and stores leaves; returns how many were indexed. */
  async addDocumentChunks(chunks: LeafChunk[]): Promise<number> {
    if (!this.embedder || chunks.length === 0) return 0;
    const texts = chunks.map((c) => `${c.contextHeader}\n${c.text}`);
    const vectors = await this.embedder.embed(texts, "document");
    this.store.upsert(
      DOCUMENTS,
      chunks.map((c, i) => ({
        id: c.id,
        vector: vectors[i],
        document: texts[i],
        metadata: {
          sourceId: c.sourceId,
          filename: c.filename,
          headerPath: JSON.stringify(c.headerPath),
          contextHeader: c.contextHeader,
          parentId: c.parentId,
          parentText: c.parentText,
          leafIndex: c.leafIndex,
        },
      })),
    );
    log.info("Indexed document chunks", { sourceId: chunks[0].sourceId, count: chunks.length });
    return chunks.length;
  }

  removeDocument(sourceId: string): number {
    const removed = this.store.deleteWhere(DOCUMENTS, { sourceId });
    log.info("Removed document chunks", { sourceId, removed });
    return removed;
  }

  async indexTurn(record: TurnRecord): Promise<boolean> {
    if (!this.embedder) return false;
    const vector = await this.embedder.embedOne(record.summary, "document");
    this.store.upsert(CONVERSATIONS, [
      {
        id: `turn_${record.turnNumber}`,
        vector,
        document: record.summary,
        metadata: {
          turnNumber: record.turnNumber,
          activeProbe: record.activeProbe ?? "",
          activeMode: record.activeMode ?? "",
          userMessage: record.userMessage,
          assistantResponse: record.assistantResponse,
        },
      },
    ]);
    log.debug("Indexed turn", { turn: record.turnNumber });
    return true;
  }

  /**
   * Over-fetches 2k leaves, keeps the closest leaf per parent and returns
   * up to k parents by descending score.
   */
  async searchDocuments(query: string, k = this.retrieval.documentResults): Promise<DocumentHit[]> {
    if (!this.embedder || k <= 0 || this.store.count(DOCUMENTS) === 0) return [];
    const vector = await this.embedder.embedOne(query, "query");

    const seen = new Set<string>();
    const hits: DocumentHit[] = [];
    for (const match of this.store.query(DOCUMENTS, vector, k * 2)) {
      const parentId = str(match.metadata, "parentId");
      if (seen.has(parentId)) continue;
      seen.add(parentId);
      hits.push({
        parentId,
        parentText: str(match.metadata, "parentText"),
        contextHeader: str(match.metadata, "contextHeader"),
        headerPath: headerPathOf(match.metadata),
        sourceId: str(match.metadata, "sourceId"),
        filename: str(match.metadata, "filename"),
        score: match.score,
      });
      if (hits.length >= k) break;
    }
    return hits.sort((a, b) => b.score - a.score);
  }

  /**
   * Turns older than the always-on window, most similar first, then
   * re-sorted by turn number.
   */
  async searchConversations(query: string, currentTurn: number, k = this.retrieval.conversationResults): Promise<ConversationHit[]> {
    const threshold = currentTurn - this.retrieval.alwaysOnWindow;
    if (!this.embedder || k <= 0 || threshold <= 0 || this.store.count(CONVERSATIONS) === 0) return [];
    const vector = await this.embedder.embedOne(query, "query");

    return this.store
      .query(CONVERSATIONS, vector, k, { turnNumber: { $lt: threshold } })
      .map((match) => {
        const probe = str(match.metadata, "activeProbe");
        const mode = str(match.metadata, "activeMode");
        return {
          turnNumber: num(match.metadata, "turnNumber"),
          userMessage: str(match.metadata, "userMessage"),
          assistantResponse: str(match.metadata, "assistantResponse"),
          summary: match.document,
          activeProbe: probe || null,
          activeMode: mode || null,
          score: match.score,
        };
      })
      .sort((a, b) => a.turnNumber - b.turnNumber);
  }

  close(): void {
    this.store.close();
  }
}

export { Embedder } from "./embedder.js";
export { VectorStore, cosineSimilarity, type MetadataFilter, type VectorMatch, type VectorRecord } from "./sqlite-store.js";
export { VoyageEmbeddingClient, type EmbeddingClient, type EmbeddingInputType } from "./embedding-client.js";
