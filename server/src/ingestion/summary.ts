import type { ILLMClient } from "../llm/types.js";
import { chatWithTimeout } from "../llm/timeout.js";
import { createComponentLogger } from "../logging.js";
import { loadPrompt } from "../prompt-template.js";
import { errorMessage } from "../errors.js";

const log = createComponentLogger("ingestion.summary");

const PREVIEW_CHARS = 3_000;
const FALLBACK_WORDS = 60;

export function fallbackSummary(markdown: string): string {
  const words = markdown.replace(/[#*_>`|]/g, " ").split(/\s+/).filter(Boolean);
  if (words.length === 0) return "Empty document.";
  const head = words.slice(0, FALLBACK_WORDS).join(" ");
  return words.length > FALLBACK_WORDS ? `${head}...` : head;
}

/**
 * One-paragraph description of an uploaded document for the always-on
 * context. Falls back to the opening words when the summarizer fails.
 */
export async function summarizeDocument(
  client: ILLMClient | null,
  filename: string,
  markdown: string,
  timeoutMs: number,
): Promise<string> {
  if (!client) return fallbackSummary(markdown);
  try {
    const prompt = await loadPrompt("ingestion/file-summary.md", {
      Filename: filename,
      Content: markdown.slice(0, PREVIEW_CHARS),
    });
    const response = await chatWithTimeout(
      client,
      [{ role: "user", content: prompt }],
      { maxTokens: 200, temperature: 0 },
      { operation: "file summary", timeoutMs },
    );
    const summary = response.content.trim();
    if (summary) return summary;
    log.warn("Summarizer returned empty text", { filename });
  } catch (e) {
    log.warn("File summary failed, using opening words", { filename, error: errorMessage(e) });
  }
  return fallbackSummary(markdown);
}
