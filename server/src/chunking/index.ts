/**
 * Chunking Pipeline
 *
 * convert → split → enforce sizes → parent/child. Deterministic for a
 * given input and thresholds.
 */

import { createComponentLogger } from "../logging.js";
import { convertDocument } from "./convert.js";
import { buildParentChild } from "./parents.js";
import { enforceSizes, splitSections } from "./sections.js";
import type { ChunkThresholds, DocumentFormat, LeafChunk } from "./types.js";

const log = createComponentLogger("chunking");

export * from "./types.js";
export { convertDocument, formatFromFilename, isDocumentFormat, htmlToMarkdown } from "./convert.js";
export { splitSections, enforceSizes } from "./sections.js";
export { buildParentChild, contextHeaderFor } from "./parents.js";
export { estimateTokens } from "./tokens.js";

export function chunkMarkdown(markdown: string, source: { sourceId: string; filename: string }, thresholds: ChunkThresholds): LeafChunk[] {
  const sections = splitSections(markdown);
  const leaves = enforceSizes(sections, thresholds.minTokens, thresholds.maxTokens);
  const chunks = buildParentChild(leaves, thresholds.parentMaxTokens, source);
  if (chunks.length === 0) {
    log.warn("No chunks produced", { sourceId: source.sourceId, filename: source.filename });
  } else {
    const avg = Math.floor(chunks.reduce((sum, c) => sum + c.tokens, 0) / chunks.length);
    log.info("Chunked document", { sourceId: source.sourceId, sections: sections.length, leaves: chunks.length, avgTokens: avg });
  }
  return chunks;
}

/** Throws DocumentConversionError when the document cannot be read. */
export async function chunkDocument(
  input: { sourceId: string; filename: string; content: string | Uint8Array; format: DocumentFormat },
  thresholds: ChunkThresholds,
): Promise<{ markdown: string; chunks: LeafChunk[] }> {
  const markdown = await convertDocument(input.content, input.format, input.filename);
  return { markdown, chunks: chunkMarkdown(markdown, input, thresholds) };
}
