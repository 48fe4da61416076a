/**
 * Document Ingestion
 *
 * store raw bytes → convert → chunk → embed/upsert → summarize → record.
 * Conversion and embedding failures skip the one document; the raw file
 * stays stored and the conversation keeps working. Storage failures are
 * fatal and propagate.
 */

import { nanoid } from "nanoid";
import type { ChunkingSettings } from "../config.js";
import { chunkDocument, formatFromFilename } from "../chunking/index.js";
import { DocumentConversionError, FramewiseError, StorageUnavailableError, errorMessage } from "../errors.js";
import type { ILLMClient } from "../llm/types.js";
import { createComponentLogger } from "../logging.js";
import type { VectorIndex } from "../vector/index.js";
import { summarizeDocument } from "./summary.js";
import type { FileSummary, IngestRequest, IngestResult, ProjectState } from "./types.js";
import { isValidSourceId, type UploadStore } from "./uploads.js";

const log = createComponentLogger("ingestion");

export interface IngestorDeps {
  uploads: UploadStore;
  index: VectorIndex;
  summarizer: ILLMClient | null;
  chunking: ChunkingSettings;
  summarizerTimeoutMs: number;
  now?: () => Date;
}

export class DocumentIngestor {
  private readonly now: () => Date;

  constructor(private readonly deps: IngestorDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  async ingest(request: IngestRequest, project: ProjectState): Promise<IngestResult> {
    const sourceId = request.sourceId ?? nanoid(12);
    const { filename } = request;
    if (!isValidSourceId(sourceId)) {
      return { ok: false, sourceId, filename, error: `Invalid source id: ${sourceId}`, category: "rejected" };
    }

    const bytes = typeof request.content === "string" ? new TextEncoder().encode(request.content) : request.content;
    await this.deps.uploads.put({ sourceId, filename, bytes });

    // Previous chunks of this source go first so a failed re-ingest leaves nothing stale behind
    this.deps.index.removeDocument(sourceId);
    this.dropSummary(project, sourceId);

    const format = request.format ?? formatFromFilename(filename);
    if (!format) {
      return this.failed(sourceId, filename, new DocumentConversionError(filename, "unsupported file type"));
    }

    let markdown: string;
    let chunkCount: number;
    try {
      const chunked = await chunkDocument({ sourceId, filename, content: request.content, format }, this.deps.chunking);
      markdown = chunked.markdown;
      chunkCount = chunked.chunks.length;
      const indexed = await this.deps.index.addDocumentChunks(chunked.chunks);
      if (indexed < chunkCount) log.warn("Vector index disabled, document not searchable", { sourceId });
    } catch (e) {
      if (e instanceof StorageUnavailableError) throw e;
      return this.failed(sourceId, filename, e);
    }

    const summary = await summarizeDocument(this.deps.summarizer, filename, markdown, this.deps.summarizerTimeoutMs);
    const entry: FileSummary = { sourceId, filename, summary, chunkCount, uploadedAt: this.now().toISOString() };
    project.fileSummaries.push(entry);

    log.info("Ingested document", { sourceId, filename, format, chunkCount });
    return { ok: true, sourceId, filename, chunkCount, summary };
  }

  /** Deletes chunks, raw bytes and the file summary. Returns false for an unknown source. */
  async remove(sourceId: string, project: ProjectState): Promise<boolean> {
    const chunks = this.deps.index.removeDocument(sourceId);
    const stored = await this.deps.uploads.delete(sourceId);
    const listed = this.dropSummary(project, sourceId);
    log.info("Removed document", { sourceId, chunks });
    return stored || listed || chunks > 0;
  }

  private dropSummary(project: ProjectState, sourceId: string): boolean {
    const before = project.fileSummaries.length;
    project.fileSummaries = project.fileSummaries.filter((f) => f.sourceId !== sourceId);
    return project.fileSummaries.length !== before;
  }

  private failed(sourceId: string, filename: string, error: unknown): IngestResult {
    const category = error instanceof FramewiseError ? error.category : "conversion";
    log.warn("Document skipped", { sourceId, filename, category, error: errorMessage(error) });
    return {
      ok: false,
      sourceId,
      filename,
      category,
      error: `${errorMessage(error).replace(/\.$/, "")}. The file has been saved but won't be searchable.`,
    };
  }
}

export { FileUploadStore, MemoryUploadStore, isValidSourceId, safeFilename, type UploadStore, type StoredUpload } from "./uploads.js";
export { fallbackSummary, summarizeDocument } from "./summary.js";
export type { FileSummary, IngestRequest, IngestResult, ProjectState } from "./types.js";
