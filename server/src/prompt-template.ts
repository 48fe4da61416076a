/**
 * Prompt Template Helper
 *
 * Reads .md prompt files and injects values into |* Field *| placeholders.
 *
 * Usage:
 *   const prompt = await loadPrompt("pipeline/routing/router.md", {
 *     "Conversation Summary": summary,
 *     "Assumptions": assumptionSummary,
 *   });
 */

import { readFile } from "node:fs/promises";
import { resolve, dirname } from "node:path";
import { fileURLToPath } from "node:url";
import { createComponentLogger } from "./logging.js";

const log = createComponentLogger("prompt-template");

const __dirname = dirname(fileURLToPath(import.meta.url));

const templateCache = new Map<string, string>();

/**
 * Inject field values into a template string.
 * Fields are matched case-insensitively; unresolved placeholders become
 * `[MISSING: Name]` and are logged.
 */
export function renderTemplate(template: string, fields: Record<string, string>, label = "inline"): string {
  const lookup = new Map(Object.entries(fields).map(([k, v]) => [k.toLowerCase(), v]));
  return template.replace(/\|\*\s*([^*]+?)\s*\*\|/g, (_match, fieldName: string) => {
    const key = fieldName.trim();
    const value = lookup.get(key.toLowerCase());
    if (value !== undefined) return value;
    log.warn("Unresolved prompt placeholder", { field: key, template: label });
    return `[MISSING: ${key}]`;
  });
}

/**
 * Load a prompt template from a .md file relative to src/ and inject field values.
 * Templates are read once per process.
 */
export async function loadPrompt(relativePath: string, fields: Record<string, string>): Promise<string> {
  const fullPath = resolve(__dirname, relativePath);

  let template = templateCache.get(fullPath);
  if (template === undefined) {
    try {
      template = await readFile(fullPath, "utf-8");
    } catch (e) {
      log.error("Failed to read prompt template", e, { path: fullPath });
      throw new Error(`Prompt template not found: ${fullPath}`);
    }
    templateCache.set(fullPath, template);
  }

  return renderTemplate(template, fields, relativePath);
}
