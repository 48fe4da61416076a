/**
 * Parent/Child Grouping
 *
 * Contiguous leaves from the same section share a parent, split further
 * when the parent would exceed parentMaxTokens. Retrieval searches
 * leaves and returns parents.
 */

import { createHash } from "node:crypto";
import { estimateTokens } from "./tokens.js";
import type { LeafChunk, SectionSpan } from "./types.js";

export function parentIdFor(sourceId: string, ordinal: number, parentText: string): string {
  return createHash("sha256").update(`${sourceId}\u0000${ordinal}\u0000${parentText}`).digest("hex").slice(0, 16);
}

export function contextHeaderFor(filename: string, headerPath: string[]): string {
  return headerPath.length ? `[Source: ${filename} > ${headerPath.join(" > ")}]` : `[Source: ${filename}]`;
}

function groupBySection(leaves: SectionSpan[], parentMaxTokens: number): SectionSpan[][] {
  const groups: SectionSpan[][] = [];
  let current: SectionSpan[] = [];
  let currentTokens = 0;
  for (const leaf of leaves) {
    const tokens = estimateTokens(leaf.text);
    const sameSection = current.length > 0 && current[0].section === leaf.section;
    if (sameSection && currentTokens + tokens <= parentMaxTokens) {
      current.push(leaf);
      currentTokens += tokens;
      continue;
    }
    if (current.length) groups.push(current);
    current = [leaf];
    currentTokens = tokens;
  }
  if (current.length) groups.push(current);
  return groups;
}

export function buildParentChild(
  leaves: SectionSpan[],
  parentMaxTokens: number,
  source: { sourceId: string; filename: string },
): LeafChunk[] {
  const chunks: LeafChunk[] = [];
  groupBySection(leaves, parentMaxTokens).forEach((group, ordinal) => {
    const parentText = group.map((leaf) => leaf.text).join("\n\n");
    const parentId = parentIdFor(source.sourceId, ordinal, parentText);
    group.forEach((leaf, leafIndex) => {
      chunks.push({
        id: `${source.sourceId}#${chunks.length}`,
        sourceId: source.sourceId,
        filename: source.filename,
        text: leaf.text,
        headerPath: leaf.headerPath,
        level: leaf.level,
        contextHeader: contextHeaderFor(source.filename, leaf.headerPath),
        parentId,
        parentText,
        leafIndex,
        tokens: estimateTokens(leaf.text),
      });
    });
  });
  return chunks;
}
