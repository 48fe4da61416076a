/**
 * Document Conversion
 *
 * Everything becomes markdown before chunking: docx through mammoth to
 * HTML, HTML through the unified rehype → remark pipeline.
 */

import mammoth from "mammoth";
import { unified } from "unified";
import rehypeParse from "rehype-parse";
import rehypeRemark from "rehype-remark";
import remarkStringify from "remark-stringify";
import { DocumentConversionError } from "../errors.js";
import { createComponentLogger } from "../logging.js";
import { DOCUMENT_FORMATS, type DocumentFormat } from "./types.js";

const log = createComponentLogger("chunking.convert");

export function isDocumentFormat(value: string): value is DocumentFormat {
  return DOCUMENT_FORMATS.some((format) => format === value);
}

/** Format from a filename extension, or undefined when unsupported. */
export function formatFromFilename(filename: string): DocumentFormat | undefined {
  const ext = filename.toLowerCase().match(/\.[^.]+$/)?.[0] ?? "";
  switch (ext) {
    case ".md":
    case ".markdown":
      return "markdown";
    case ".txt":
      return "text";
    case ".html":
    case ".htm":
      return "html";
    case ".docx":
      return "docx";
    default:
      return undefined;
  }
}

function asText(content: string | Uint8Array): string {
  return typeof content === "string" ? content : Buffer.from(content).toString("utf-8");
}

export async function htmlToMarkdown(html: string): Promise<string> {
  const file = await unified().use(rehypeParse).use(rehypeRemark).use(remarkStringify).process(html);
  return String(file);
}

/**
 * Convert one document to markdown. Parser failures are wrapped in
 * DocumentConversionError; the caller keeps the raw bytes.
 */
export async function convertDocument(content: string | Uint8Array, format: DocumentFormat, filename: string): Promise<string> {
  switch (format) {
    case "markdown":
    case "text":
      return asText(content);
    case "html":
      try {
        return await htmlToMarkdown(asText(content));
      } catch (e) {
        throw new DocumentConversionError(filename, e instanceof Error ? e.message : String(e), { cause: e });
      }
    case "docx": {
      if (typeof content === "string") {
        throw new DocumentConversionError(filename, "docx content must be binary");
      }
      try {
        const result = await mammoth.convertToHtml({ buffer: Buffer.from(content) });
        if (result.messages.length) {
          log.debug("docx conversion messages", { filename, messages: result.messages.map((m) => m.message) });
        }
        return await htmlToMarkdown(result.value);
      } catch (e) {
        throw new DocumentConversionError(filename, e instanceof Error ? e.message : String(e), { cause: e });
      }
    }
  }
}
