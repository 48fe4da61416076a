import type { DocumentFormat } from "../chunking/index.js";
import type { ErrorCategory } from "../errors.js";

export interface FileSummary {
  sourceId: string;
  filename: string;
  summary: string;
  chunkCount: number;
  uploadedAt: string;
}

/** Per-conversation record of what has been uploaded */
export interface ProjectState {
  fileSummaries: FileSummary[];
}

export interface IngestRequest {
  /** Generated when omitted */
  sourceId?: string;
  filename: string;
  content: string | Uint8Array;
  /** Inferred from the filename when omitted */
  format?: DocumentFormat;
}

export type IngestResult =
  | { ok: true; sourceId: string; filename: string; chunkCount: number; summary: string }
  | { ok: false; sourceId: string; filename: string; error: string; category: ErrorCategory };
