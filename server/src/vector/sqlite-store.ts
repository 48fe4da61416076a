/**
 * SQLite Vector Store
 *
 * Collection-scoped vectors with JSON metadata in one better-sqlite3
 * database per conversation. Ranking is brute-force cosine similarity,
 * which is plenty for a single project's documents and turns.
 */

import Database from "better-sqlite3";
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import { z } from "zod";
import { StorageUnavailableError } from "../errors.js";
import { createComponentLogger } from "../logging.js";

const log = createComponentLogger("vector.store");

export type MetadataValue = string | number | boolean;
export type Metadata = Record<string, MetadataValue>;

/** Equality per key, or `{ $lt: n }` for numeric keys. */
export type MetadataFilter = Record<string, MetadataValue | { $lt: number }>;

export interface VectorRecord {
  id: string;
  vector: number[];
  document: string;
  metadata: Metadata;
}

export interface VectorMatch {
  id: string;
  document: string;
  metadata: Metadata;
  score: number;
}

interface Row {
  id: string;
  embedding: Buffer;
  document: string;
  metadata: string;
}

interface StoredRecord {
  id: string;
  document: string;
  metadata: Metadata;
  embedding: Float32Array;
}

const metadataSchema = z.record(z.union([z.string(), z.number(), z.boolean()]));

export function cosineSimilarity(a: ArrayLike<number>, b: ArrayLike<number>): number {
  let dot = 0;
  let normA = 0;
  let normB = 0;
  const n = Math.min(a.length, b.length);
  for (let i = 0; i < n; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

export function matchesFilter(metadata: Metadata, filter: MetadataFilter | undefined): boolean {
  if (!filter) return true;
  return Object.entries(filter).every(([key, condition]) => {
    const value = metadata[key];
    if (typeof condition === "object") return typeof value === "number" && value < condition.$lt;
    return value === condition;
  });
}

function toBlob(vector: number[]): Buffer {
  return Buffer.from(new Float32Array(vector).buffer);
}

function fromBlob(blob: Buffer): Float32Array {
  // Copy into a fresh, aligned buffer
  return new Float32Array(new Uint8Array(blob).buffer);
}

export class VectorStore {
  private db: Database.Database | null;

  private constructor(db: Database.Database, readonly location: string) {
    this.db = db;
  }

  /** Opens (creating if needed) the store at path; ":memory:" for tests. */
  static open(location: string): VectorStore {
    try {
      if (location !== ":memory:") mkdirSync(dirname(location), { recursive: true });
      const db = new Database(location);
      db.pragma("journal_mode = WAL");
      db.exec(`
        CREATE TABLE IF NOT EXISTS vectors (
          collection TEXT NOT NULL,
          id TEXT NOT NULL,
          embedding BLOB NOT NULL,
          document TEXT NOT NULL,
          metadata TEXT NOT NULL,
          PRIMARY KEY (collection, id)
        )
      `);
      log.debug("Vector store opened", { location });
      return new VectorStore(db, location);
    } catch (e) {
      throw new StorageUnavailableError(`Cannot open vector store at ${location}: ${e instanceof Error ? e.message : String(e)}`, { cause: e });
    }
  }

  private use<T>(operation: string, fn: (db: Database.Database) => T): T {
    if (!this.db) throw new StorageUnavailableError(`Vector store at ${this.location} is closed (${operation})`);
    try {
      return fn(this.db);
    } catch (e) {
      throw new StorageUnavailableError(`Vector store ${operation} failed: ${e instanceof Error ? e.message : String(e)}`, { cause: e });
    }
  }

  upsert(collection: string, records: VectorRecord[]): void {
    this.use("upsert", (db) => {
      const stmt = db.prepare(
        "INSERT OR REPLACE INTO vectors (collection, id, embedding, document, metadata) VALUES (?, ?, ?, ?, ?)",
      );
      const insertAll = db.transaction((rows: VectorRecord[]) => {
        for (const r of rows) stmt.run(collection, r.id, toBlob(r.vector), r.document, JSON.stringify(r.metadata));
      });
      insertAll(records);
    });
  }

  /** Undecodable metadata counts as a storage failure like any other read error. */
  private records(collection: string): StoredRecord[] {
    return this.use("read", (db) =>
      db
        .prepare<[string], Row>("SELECT id, embedding, document, metadata FROM vectors WHERE collection = ?")
        .all(collection)
        .map((row) => ({
          id: row.id,
          document: row.document,
          metadata: metadataSchema.parse(JSON.parse(row.metadata)),
          embedding: fromBlob(row.embedding),
        })),
    );
  }

  /** Top-k matches by cosine similarity among records passing the filter. */
  query(collection: string, vector: number[], k: number, filter?: MetadataFilter): VectorMatch[] {
    if (k <= 0) return [];
    return this.records(collection)
      .filter((r) => matchesFilter(r.metadata, filter))
      .map((r) => ({ id: r.id, document: r.document, metadata: r.metadata, score: cosineSimilarity(vector, r.embedding) }))
      .sort((a, b) => b.score - a.score || a.id.localeCompare(b.id))
      .slice(0, k);
  }

  /** Returns the number of records removed. */
  deleteWhere(collection: string, filter: MetadataFilter): number {
    const ids = this.records(collection)
      .filter((r) => matchesFilter(r.metadata, filter))
      .map((r) => r.id);
    if (ids.length === 0) return 0;
    this.use("delete", (db) => {
      const stmt = db.prepare("DELETE FROM vectors WHERE collection = ? AND id = ?");
      db.transaction((toDelete: string[]) => {
        for (const id of toDelete) stmt.run(collection, id);
      })(ids);
    });
    return ids.length;
  }

  count(collection: string): number {
    return this.use("count", (db) => {
      const row = db.prepare<[string], { n: number }>("SELECT COUNT(*) AS n FROM vectors WHERE collection = ?").get(collection);
      return row?.n ?? 0;
    });
  }

  close(): void {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }
}
