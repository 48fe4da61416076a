/**
 * Chunking Pipeline Tests
 *
 * Header splitting, size bounds, parent grouping, determinism and
 * conversion failures.
 */

import { describe, it, expect } from "vitest";
import { chunkMarkdown, convertDocument, enforceSizes, splitSections, estimateTokens, formatFromFilename } from "./index.js";
import { DocumentConversionError } from "../errors.js";

const source = { sourceId: "doc-1", filename: "notes.md" };

function words(n: number, word = "word"): string {
  return Array.from({ length: n }, () => word).join(" ");
}

function normalize(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

// ============================================
// TOKENS
// ============================================

describe("estimateTokens", () => {
  it("floors words times 1.3", () => {
    expect(estimateTokens("one two three")).toBe(3);
    expect(estimateTokens(words(10))).toBe(13);
    expect(estimateTokens("  \n ")).toBe(0);
  });
});

// ============================================
// SPLITTING
// ============================================

describe("splitSections", () => {
  it("tracks the header stack and keeps the preamble", () => {
    const spans = splitSections("Preface text\n# Guide\nbody\n## Setup\nsteps\n### Linux\napt\n## Usage\nrun it");

    expect(spans.map((s) => s.headerPath)).toEqual([
      ["Introduction"],
      ["Guide"],
      ["Guide", "Setup"],
      ["Guide", "Setup", "Linux"],
      ["Guide", "Usage"],
    ]);
    expect(spans.map((s) => s.level)).toEqual([0, 1, 2, 3, 2]);
    expect(spans[2].text).toBe("## Setup\nsteps");
  });

  it("treats header-less text as one introduction span", () => {
    expect(splitSections("just prose\n\nmore prose")).toEqual([
      { text: "just prose\n\nmore prose", headerPath: ["Introduction"], level: 0, section: 0 },
    ]);
    expect(splitSections("   ")).toEqual([]);
  });
});

// ============================================
// SIZE ENFORCEMENT
// ============================================

describe("enforceSizes", () => {
  it("merges undersized siblings", () => {
    const spans = splitSections("## A\nshort one.\n## B\nshort two.");
    const result = enforceSizes(spans, 50, 500);

    expect(result).toHaveLength(1);
    expect(result[0].text).toBe("## A\nshort one.\n\n## B\nshort two.");
    expect(result[0].headerPath).toEqual(["A"]);
  });

  it("does not merge across header levels", () => {
    const result = enforceSizes(splitSections("# Top\nx\n## Child\ny"), 50, 500);
    expect(result.map((s) => s.headerPath)).toEqual([["Top"], ["Top", "Child"]]);
  });

  it("folds a trailing undersized span into its previous sibling", () => {
    const spans = splitSections(`## A\n${words(12)}\n## B\nok.`);
    const result = enforceSizes(spans, 10, 100);

    expect(result).toHaveLength(1);
    expect(result[0].text).toBe(`## A\n${words(12)}\n\n## B\nok.`);
  });

  it("splits oversized spans at sentences, keeping the header on the first piece", () => {
    const sentence = "Alpha beta gamma delta epsilon.";
    const paragraph = Array.from({ length: 6 }, () => sentence).join(" ");
    const spans = splitSections(`## S\n\n${paragraph}`);

    const result = enforceSizes(spans, 5, 20);

    expect(result.map((s) => s.text)).toEqual([`## S\n\n${sentence} ${sentence}`, [sentence, sentence, sentence].join(" "), sentence]);
    for (const leaf of result) {
      expect(estimateTokens(leaf.text)).toBeGreaterThanOrEqual(5);
      expect(estimateTokens(leaf.text)).toBeLessThanOrEqual(20);
    }
    expect(normalize(result.map((s) => s.text).join(" "))).toBe(normalize(spans[0].text));
  });

  it("moves sentences into an undersized last piece", () => {
    const sentence = "Alpha beta gamma delta epsilon.";
    const paragraph = Array.from({ length: 7 }, () => sentence).join(" ");

    const result = enforceSizes(splitSections(paragraph), 10, 20);

    expect(result.map((s) => estimateTokens(s.text))).toEqual([19, 13, 13]);
    expect(normalize(result.map((s) => s.text).join(" "))).toBe(paragraph);
  });

  it("keeps a single sentence whole even above max", () => {
    const longSentence = words(30);
    const result = enforceSizes(splitSections(longSentence), 5, 20);

    expect(result).toHaveLength(1);
    expect(result[0].text).toBe(longSentence);
  });
});

// ============================================
// PARENT / CHILD
// ============================================

describe("chunkMarkdown", () => {
  const thresholds = { minTokens: 10, maxTokens: 500, parentMaxTokens: 2000 };
  const doc = [
    "# H1",
    `Overview of the quarterly planning process ${words(8, "detail")}`,
    "## H2a",
    `Budget owners submit requests by the first week ${words(8, "budget")}`,
    "## H2b",
    `Finance consolidates requests and reviews them with leadership ${words(8, "review")}`,
  ].join("\n");

  it("groups one parent per section with header breadcrumbs", () => {
    const chunks = chunkMarkdown(doc, source, thresholds);

    expect(chunks).toHaveLength(3);
    expect(new Set(chunks.map((c) => c.parentId)).size).toBe(3);
    expect(chunks.map((c) => c.headerPath)).toEqual([["H1"], ["H1", "H2a"], ["H1", "H2b"]]);
    expect(chunks[1].contextHeader).toBe("[Source: notes.md > H1 > H2a]");
    expect(chunks.map((c) => c.id)).toEqual(["doc-1#0", "doc-1#1", "doc-1#2"]);
    expect(chunks.every((c) => c.leafIndex === 0 && c.parentText === c.text)).toBe(true);
  });

  it("reassembles each parent from its leaves in order", () => {
    const sentence = "Alpha beta gamma delta epsilon.";
    const big = `## S\n\n${Array.from({ length: 6 }, () => sentence).join(" ")}`;
    const chunks = chunkMarkdown(big, source, { minTokens: 5, maxTokens: 20, parentMaxTokens: 2000 });

    expect(new Set(chunks.map((c) => c.parentId)).size).toBe(1);
    expect(chunks.map((c) => c.leafIndex)).toEqual([0, 1, 2]);
    const rebuilt = chunks.map((c) => c.text).join(" ");
    expect(normalize(rebuilt)).toBe(normalize(chunks[0].parentText));
  });

  it("starts a new parent when parentMaxTokens would be exceeded", () => {
    const sentence = "Alpha beta gamma delta epsilon.";
    const big = `## S\n\n${Array.from({ length: 6 }, () => sentence).join(" ")}`;
    const chunks = chunkMarkdown(big, source, { minTokens: 5, maxTokens: 20, parentMaxTokens: 25 });

    // leaves of 15, 19 and 6 tokens: [15] then [19 + 6]
    expect(chunks.map((c) => c.tokens)).toEqual([15, 19, 6]);
    expect(chunks.map((c) => c.leafIndex)).toEqual([0, 0, 1]);
    expect(chunks[1].parentId).toBe(chunks[2].parentId);
    expect(chunks[0].parentId).not.toBe(chunks[1].parentId);
  });

  it("is deterministic and scoped by source id", () => {
    const first = chunkMarkdown(doc, source, thresholds);
    const second = chunkMarkdown(doc, source, thresholds);
    const other = chunkMarkdown(doc, { sourceId: "doc-2", filename: "notes.md" }, thresholds);

    expect(second).toEqual(first);
    expect(other[0].parentId).not.toBe(first[0].parentId);
  });
});

// ============================================
// CONVERSION
// ============================================

describe("convertDocument", () => {
  it("passes markdown and text through", async () => {
    expect(await convertDocument(Buffer.from("# Hi\n"), "markdown", "a.md")).toBe("# Hi\n");
    expect(await convertDocument("plain", "text", "a.txt")).toBe("plain");
  });

  it("converts html to markdown", async () => {
    const md = await convertDocument("<h1>Title</h1><p>Hello <strong>world</strong></p>", "html", "page.html");
    expect(md).toContain("# Title");
    expect(md).toContain("Hello **world**");
  });

  it("wraps docx parser failures", async () => {
    const attempt = convertDocument(Buffer.from("not a zip archive"), "docx", "broken.docx");
    await expect(attempt).rejects.toBeInstanceOf(DocumentConversionError);
    await expect(convertDocument(Buffer.from("x"), "docx", "broken.docx")).rejects.toThrow(/^Could not convert broken\.docx: /);
  });

  it("maps file extensions to formats", () => {
    expect(formatFromFilename("Plan.DOCX")).toBe("docx");
    expect(formatFromFilename("readme.markdown")).toBe("markdown");
    expect(formatFromFilename("sheet.xlsx")).toBeUndefined();
  });
});
