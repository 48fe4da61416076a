/**
 * Knowledge Index
 *
 * Static guidance units (probes and patterns) addressed by name. The
 * catalog is trusted configuration read once from catalog.json; lookups
 * never touch the vector index.
 */

import { readFileSync } from "node:fs";
import { resolve, dirname } from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import type { ConversationMode } from "../facts/skeleton.js";
import { createComponentLogger } from "../logging.js";

const log = createComponentLogger("knowledge");

const __dirname = dirname(fileURLToPath(import.meta.url));

export type GuidanceKind = "probe" | "pattern";

export type LookupResult = { found: true; key: string; text: string } | { found: false; key: string };

const entrySchema = z.object({
  name: z.string().min(1),
  mode: z.enum(["discover_frame", "solution_evaluation"]),
  text: z.string().min(1),
});

const catalogSchema = z.object({
  probes: z.array(entrySchema),
  patterns: z.array(entrySchema),
});

export type CatalogData = z.infer<typeof catalogSchema>;
type Entry = z.infer<typeof entrySchema>;

export class KnowledgeIndex {
  private readonly tables: Record<GuidanceKind, Map<string, Entry>>;
  private readonly folded: Record<GuidanceKind, Map<string, Entry>>;

  constructor(data: CatalogData) {
    const parsed = catalogSchema.parse(data);
    this.tables = { probe: new Map(), pattern: new Map() };
    this.folded = { probe: new Map(), pattern: new Map() };
    for (const [kind, entries] of [["probe", parsed.probes], ["pattern", parsed.patterns]] as const) {
      for (const entry of entries) {
        this.tables[kind].set(entry.name, entry);
        this.folded[kind].set(entry.name.toLowerCase(), entry);
      }
    }
  }

  /** Exact key first, then case-insensitive. */
  lookup(kind: GuidanceKind, key: string): LookupResult {
    const trimmed = key.trim();
    const entry = this.tables[kind].get(trimmed) ?? this.folded[kind].get(trimmed.toLowerCase());
    return entry ? { found: true, key: entry.name, text: entry.text } : { found: false, key: trimmed };
  }

  /** Canonical name for a key, or undefined when the catalog has no such entry. */
  resolve(kind: GuidanceKind, key: string): string | undefined {
    const result = this.lookup(kind, key);
    return result.found ? result.key : undefined;
  }

  keys(kind: GuidanceKind, mode?: ConversationMode): string[] {
    return [...this.tables[kind].values()].filter((e) => !mode || e.mode === mode).map((e) => e.name);
  }
}

let defaultIndex: KnowledgeIndex | null = null;

/** Process-wide index built from catalog.json beside this module. */
export function getKnowledgeIndex(): KnowledgeIndex {
  if (!defaultIndex) {
    const path = resolve(__dirname, "catalog.json");
    const data: unknown = JSON.parse(readFileSync(path, "utf-8"));
    defaultIndex = new KnowledgeIndex(catalogSchema.parse(data));
    log.info("Knowledge catalog loaded", {
      probes: defaultIndex.keys("probe").length,
      patterns: defaultIndex.keys("pattern").length,
    });
  }
  return defaultIndex;
}
