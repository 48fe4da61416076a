/**
 * Turn Router: Routing LLM Call
 *
 * One bounded call per turn that decides the next action, mode entry,
 * guidance keys and whether retrieval is needed. Any failure (timeout,
 * transport, unparseable or invalid JSON) yields the conservative
 * default so the turn always proceeds.
 */

import type { ConversationState } from "../../conversation/state.js";
import { formatMessages, formatRoutingContext, originalInput, recentMessages } from "../../conversation/state.js";
import { RoutingParseError, errorMessage } from "../../errors.js";
import { formatAssumptionSummary } from "../../facts/format.js";
import type { KnowledgeIndex } from "../../knowledge/catalog.js";
import { chatWithTimeout } from "../../llm/timeout.js";
import type { ILLMClient } from "../../llm/types.js";
import { createComponentLogger } from "../../logging.js";
import { loadPrompt } from "../../prompt-template.js";
import { conservativeDecision, routingDecisionSchema, type RoutingDecision } from "./decision.js";
import { isFillerMessage } from "./filler.js";

const log = createComponentLogger("turn-router");

const RECENT_TURNS = 3;
const RECENT_MESSAGE_CLIP = 600;

export interface RouterSettings {
  timeoutMs: number;
  maxEnrichments: number;
}

// ============================================
// PARSING
// ============================================

/** Strips a markdown fence and any prose around the outermost object. */
export function parseRoutingResponse(raw: string): RoutingDecision {
  let text = raw.trim();
  const fenced = text.match(/^```(?:json)?\s*\n([\s\S]*?)\n?```\s*$/);
  if (fenced) text = fenced[1].trim();
  const start = text.indexOf("{");
  const end = text.lastIndexOf("}");
  if (start === -1 || end <= start) throw new RoutingParseError("No JSON object in routing response", raw);

  let json: unknown;
  try {
    json = JSON.parse(text.slice(start, end + 1));
  } catch (e) {
    throw new RoutingParseError(`Routing response is not valid JSON: ${errorMessage(e)}`, raw);
  }
  const parsed = routingDecisionSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new RoutingParseError(`Routing response failed validation: ${issues}`, raw);
  }
  return parsed.data;
}

// ============================================
// DETERMINISTIC CHECKS
// ============================================

function sameDomain(a: string, b: string): boolean {
  const norm = (s: string) => s.toLowerCase().replace(/[^a-z0-9]+/g, " ").trim();
  return norm(a) === norm(b);
}

/**
 * Applies the checks the model is not trusted with: catalog keys must
 * exist, acknowledgments skip retrieval, enrichment is capped and must
 * name a new domain.
 */
export function enforceDecision(
  decision: RoutingDecision,
  message: string,
  state: ConversationState,
  knowledge: KnowledgeIndex,
  maxEnrichments: number,
): RoutingDecision {
  const result = { ...decision };

  if (result.activeGuidanceKey) {
    const probe = knowledge.resolve("probe", result.activeGuidanceKey);
    if (!probe) log.warn("Router named an unknown probe, clearing it", { key: result.activeGuidanceKey });
    result.activeGuidanceKey = probe ?? null;
  }

  const patterns: string[] = [];
  for (const key of result.triggeredPatternKeys) {
    const pattern = knowledge.resolve("pattern", key);
    if (!pattern) log.warn("Router named an unknown pattern, dropping it", { key });
    else if (!patterns.includes(pattern)) patterns.push(pattern);
  }
  result.triggeredPatternKeys = patterns;

  if (isFillerMessage(message)) result.requiresRetrieval = false;

  if (result.enrichmentNeeded) {
    const { enrichmentCount, lastEnrichedDomain } = state.org;
    const allowed =
      enrichmentCount < maxEnrichments &&
      result.enrichmentQuery !== "" &&
      !sameDomain(result.enrichmentQuery, lastEnrichedDomain);
    if (!allowed) {
      log.info("Enrichment request declined", { enrichmentCount, query: result.enrichmentQuery, lastEnrichedDomain });
      result.enrichmentNeeded = false;
    }
  }

  return result;
}

// ============================================
// ROUTER
// ============================================

export class TurnRouter {
  constructor(
    private readonly client: ILLMClient,
    private readonly knowledge: KnowledgeIndex,
    private readonly settings: RouterSettings,
  ) {}

  private async buildPrompt(message: string, state: ConversationState): Promise<string> {
    const first = originalInput(state);
    return loadPrompt("pipeline/routing/router.md", {
      "Original Input": first || message,
      "Conversation Summary": state.routing.conversationSummary || "(No summary yet, first turn)",
      "Routing State": formatRoutingContext(state),
      "Org Domain": state.org.lastEnrichedDomain || "(none)",
      "Enrichment Count": String(state.org.enrichmentCount),
      "Max Enrichments": String(this.settings.maxEnrichments),
      "Assumption Summary": formatAssumptionSummary(state.facts.query()),
      "Recent Messages": formatMessages(recentMessages(state, RECENT_TURNS), RECENT_MESSAGE_CLIP) || "(none)",
      "User Message": message,
      "Probe Keys": this.knowledge.keys("probe", state.activeMode ?? undefined).join(", "),
      "Pattern Keys": this.knowledge.keys("pattern", state.activeMode ?? undefined).join(", "),
    });
  }

  async route(message: string, state: ConversationState): Promise<RoutingDecision> {
    let decision: RoutingDecision;
    try {
      const prompt = await this.buildPrompt(message, state);
      const response = await chatWithTimeout(
        this.client,
        [
          { role: "system", content: "You are a routing engine. Respond ONLY with valid JSON. No markdown, no explanation." },
          { role: "user", content: prompt },
        ],
        { maxTokens: 500, temperature: 0.1, responseFormat: "json_object" },
        { operation: "router", timeoutMs: this.settings.timeoutMs },
      );
      log.info("Routing LLM call complete", {
        model: response.model,
        inputTokens: response.usage?.inputTokens,
        outputTokens: response.usage?.outputTokens,
      });
      decision = parseRoutingResponse(response.content);
    } catch (e) {
      const raw = e instanceof RoutingParseError ? e.raw.slice(0, 500) : undefined;
      log.warn("Routing failed, using conservative default", { error: errorMessage(e), raw });
      decision = conservativeDecision(`Routing error or parse failure, defaulting to questions: ${errorMessage(e)}`);
    }

    const enforced = enforceDecision(decision, message, state, this.knowledge, this.settings.maxEnrichments);
    log.info("Routing decision", {
      turn: state.turnCount + 1,
      nextAction: enforced.nextAction,
      enterMode: enforced.enterMode,
      probe: enforced.activeGuidanceKey,
      patterns: enforced.triggeredPatternKeys,
      requiresRetrieval: enforced.requiresRetrieval,
    });
    return enforced;
  }
}
