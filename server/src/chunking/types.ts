/**
 * Chunking Types
 */

export const DOCUMENT_FORMATS = ["markdown", "text", "html", "docx"] as const;
export type DocumentFormat = (typeof DOCUMENT_FORMATS)[number];

/** A run of markdown under one header (or the preamble before the first). */
export interface SectionSpan {
  text: string;
  /** Ancestor headers including this one, e.g. ["Findings", "Segments"] */
  headerPath: string[];
  /** 1–3 for #–###, 0 for the preamble */
  level: number;
  /** Position of the originating section; pieces split from one section share it */
  section: number;
}

export interface ChunkThresholds {
  minTokens: number;
  maxTokens: number;
  parentMaxTokens: number;
}

export interface LeafChunk {
  /** `${sourceId}#${n}` */
  id: string;
  sourceId: string;
  filename: string;
  text: string;
  headerPath: string[];
  level: number;
  /** "[Source: file.md > Findings > Segments]" */
  contextHeader: string;
  parentId: string;
  parentText: string;
  leafIndex: number;
  tokens: number;
}
