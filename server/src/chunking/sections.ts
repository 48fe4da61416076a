/**
 * Section Splitting and Size Enforcement
 */

import { estimateTokens } from "./tokens.js";
import type { SectionSpan } from "./types.js";

const HEADER = /^(#{1,3})[ \t]+(.+?)[ \t#]*$/gm;

/**
 * Split markdown at #–### headers. Each span includes its header line and
 * carries the header stack above it; text before the first header becomes
 * an "Introduction" span at level 0.
 */
export function splitSections(markdown: string): SectionSpan[] {
  const matches = [...markdown.matchAll(HEADER)];
  if (matches.length === 0) {
    const text = markdown.trim();
    return text ? [{ text, headerPath: ["Introduction"], level: 0, section: 0 }] : [];
  }

  const spans: SectionSpan[] = [];
  const preamble = markdown.slice(0, matches[0].index).trim();
  if (preamble) spans.push({ text: preamble, headerPath: ["Introduction"], level: 0, section: 0 });

  const stack: { level: number; title: string }[] = [];
  matches.forEach((match, i) => {
    const level = match[1].length;
    const title = match[2].trim();
    const start = match.index ?? 0;
    const end = i + 1 < matches.length ? matches[i + 1].index ?? markdown.length : markdown.length;

    while (stack.length && stack[stack.length - 1].level >= level) stack.pop();
    stack.push({ level, title });

    spans.push({
      text: markdown.slice(start, end).trim(),
      headerPath: stack.map((h) => h.title),
      level,
      section: spans.length,
    });
  });
  return spans;
}

/** Greedily pack segments into groups no larger than maxTokens. */
function packSegments(segments: string[], maxTokens: number, separator: string): string[][] {
  const groups: string[][] = [];
  let current: string[] = [];
  for (const segment of segments) {
    if (current.length && estimateTokens([...current, segment].join(separator)) > maxTokens) {
      groups.push(current);
      current = [segment];
    } else {
      current.push(segment);
    }
  }
  if (current.length) groups.push(current);
  return groups;
}

/** Shifts segments from the group before an undersized last group while both stay in bounds. */
function balanceTail(groups: string[][], minTokens: number, maxTokens: number, separator: string): void {
  const last = groups[groups.length - 1];
  const previous = groups[groups.length - 2];
  if (!last || !previous) return;
  const size = (group: string[]) => estimateTokens(group.join(separator));
  while (previous.length > 1 && size(last) < minTokens) {
    const segment = previous[previous.length - 1];
    if (size([segment, ...last]) > maxTokens || size(previous.slice(0, -1)) < minTokens) break;
    previous.pop();
    last.unshift(segment);
  }
}

function pack(segments: string[], minTokens: number, maxTokens: number, separator: string): string[] {
  const groups = packSegments(segments, maxTokens, separator);
  balanceTail(groups, minTokens, maxTokens, separator);
  return groups.map((group) => group.join(separator));
}

function isHeaderLine(paragraph: string): boolean {
  return !paragraph.includes("\n") && /^#{1,3}[ \t]+\S/.test(paragraph);
}

/** Paragraphs, with a header line joined to the paragraph below it. */
function paragraphUnits(text: string): string[] {
  const units: string[] = [];
  let header = "";
  for (const paragraph of text.split(/\n{2,}/).map((p) => p.trim()).filter(Boolean)) {
    if (isHeaderLine(paragraph)) {
      header = header ? `${header}\n\n${paragraph}` : paragraph;
      continue;
    }
    units.push(header ? `${header}\n\n${paragraph}` : paragraph);
    header = "";
  }
  if (header) units.push(header);
  return units;
}

/** Sentences of one unit; leading header lines stay on the first sentence. */
function sentenceSegments(unit: string): string[] {
  const match = unit.match(/^((?:#{1,3}[ \t]+[^\n]*\n+)+)([\s\S]+)$/);
  if (!match) return unit.split(/(?<=[.!?])\s+/).filter(Boolean);
  const [first, ...rest] = match[2].split(/(?<=[.!?])\s+/).filter(Boolean);
  return first === undefined ? [unit] : [`${match[1]}${first}`, ...rest];
}

function splitOversized(span: SectionSpan, minTokens: number, maxTokens: number): SectionSpan[] {
  const pieces: string[] = [];
  for (const group of pack(paragraphUnits(span.text), minTokens, maxTokens, "\n\n")) {
    if (estimateTokens(group) <= maxTokens) {
      pieces.push(group);
      continue;
    }
    // Only a single unit overflows; a lone sentence above maxTokens stays whole.
    pieces.push(...pack(sentenceSegments(group), minTokens, maxTokens, " "));
  }
  return pieces.map((text) => ({ ...span, text }));
}

function sameParent(a: SectionSpan, b: SectionSpan): boolean {
  const pa = a.headerPath.slice(0, -1);
  const pb = b.headerPath.slice(0, -1);
  return pa.length === pb.length && pa.every((h, i) => h === pb[i]);
}

/** Siblings share level and ancestors; pieces of one section always qualify. */
function canMerge(a: SectionSpan, b: SectionSpan, maxTokens: number): boolean {
  const related = a.section === b.section || (a.level === b.level && sameParent(a, b));
  return related && estimateTokens(`${a.text}\n\n${b.text}`) <= maxTokens;
}

function merge(a: SectionSpan, b: SectionSpan): SectionSpan {
  return { ...a, text: `${a.text}\n\n${b.text}` };
}

/**
 * Bring spans within [minTokens, maxTokens]: oversized spans split at
 * paragraphs, then sentences, with header lines kept on the text below
 * them; undersized spans absorb following siblings
 * while the result still fits; a trailing undersized span folds back
 * into its previous sibling.
 */
export function enforceSizes(spans: SectionSpan[], minTokens: number, maxTokens: number): SectionSpan[] {
  const sized = spans.flatMap((span) => (estimateTokens(span.text) > maxTokens ? splitOversized(span, minTokens, maxTokens) : [span]));

  const merged: SectionSpan[] = [];
  let i = 0;
  while (i < sized.length) {
    let current = sized[i];
    i += 1;
    while (estimateTokens(current.text) < minTokens && i < sized.length && canMerge(current, sized[i], maxTokens)) {
      current = merge(current, sized[i]);
      i += 1;
    }
    merged.push(current);
  }

  const last = merged[merged.length - 1];
  const previous = merged[merged.length - 2];
  if (last && previous && estimateTokens(last.text) < minTokens && canMerge(previous, last, maxTokens)) {
    merged.splice(merged.length - 2, 2, merge(previous, last));
  }
  return merged;
}
