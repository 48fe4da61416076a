/**
 * Raw upload storage. The original bytes are written before any
 * conversion runs, so a document that fails to parse is still kept.
 */

import { mkdir, readFile, readdir, rm, writeFile } from "node:fs/promises";
import { basename, join } from "node:path";
import { StorageUnavailableError, errorMessage } from "../errors.js";

export interface StoredUpload {
  sourceId: string;
  filename: string;
  bytes: Uint8Array;
}

export interface UploadStore {
  put(upload: StoredUpload): Promise<void>;
  get(sourceId: string): Promise<StoredUpload | undefined>;
  /** Returns false when nothing was stored under the id */
  delete(sourceId: string): Promise<boolean>;
}

const SOURCE_ID = /^[A-Za-z0-9_-][A-Za-z0-9._-]{0,127}$/;

export function isValidSourceId(sourceId: string): boolean {
  return SOURCE_ID.test(sourceId) && !sourceId.includes("..");
}

/** Keeps only the last path segment and drops characters unsafe on disk. */
export function safeFilename(filename: string): string {
  const name = basename(filename.replace(/\\/g, "/")).replace(/[^A-Za-z0-9._ -]/g, "_").trim();
  return name && name !== "." && name !== ".." ? name : "upload";
}

// ============================================
// FILE SYSTEM
// ============================================

/** One directory per source id under the conversation's uploads dir. */
export class FileUploadStore implements UploadStore {
  constructor(private readonly root: string) {}

  private dirFor(sourceId: string): string {
    if (!isValidSourceId(sourceId)) throw new Error(`Invalid source id: ${sourceId}`);
    return join(this.root, sourceId);
  }

  async put(upload: StoredUpload): Promise<void> {
    const dir = this.dirFor(upload.sourceId);
    try {
      await rm(dir, { recursive: true, force: true });
      await mkdir(dir, { recursive: true });
      await writeFile(join(dir, safeFilename(upload.filename)), upload.bytes);
    } catch (e) {
      throw new StorageUnavailableError(`Could not store upload ${upload.sourceId}: ${errorMessage(e)}`, { cause: e });
    }
  }

  async get(sourceId: string): Promise<StoredUpload | undefined> {
    const dir = this.dirFor(sourceId);
    let entries: string[];
    try {
      entries = await readdir(dir);
    } catch {
      return undefined;
    }
    const filename = entries[0];
    if (filename === undefined) return undefined;
    const bytes = await readFile(join(dir, filename));
    return { sourceId, filename, bytes: new Uint8Array(bytes) };
  }

  async delete(sourceId: string): Promise<boolean> {
    const existing = await this.get(sourceId);
    await rm(this.dirFor(sourceId), { recursive: true, force: true });
    return existing !== undefined;
  }
}

// ============================================
// IN MEMORY
// ============================================

export class MemoryUploadStore implements UploadStore {
  private readonly uploads = new Map<string, StoredUpload>();

  async put(upload: StoredUpload): Promise<void> {
    this.uploads.set(upload.sourceId, { ...upload, bytes: new Uint8Array(upload.bytes) });
  }

  async get(sourceId: string): Promise<StoredUpload | undefined> {
    return this.uploads.get(sourceId);
  }

  async delete(sourceId: string): Promise<boolean> {
    return this.uploads.delete(sourceId);
  }

  get size(): number {
    return this.uploads.size;
  }
}
