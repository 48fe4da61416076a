/**
 * Resilient LLM Client
 *
 * One role's client. A retryable failure from the primary provider moves
 * the same call down the role's fallback chain, skipping providers without
 * a key. When every candidate fails the primary's error is rethrown, since
 * that is the one the caller configured for.
 *
 * Calls without an explicit model get the role's model for the primary
 * provider, so the router and summarizer stay on their small models.
 */

import { errorMessage } from "../../errors.js";
import { createComponentLogger } from "../../logging.js";
import { FALLBACK_CHAINS, MODEL_ROLE_CONFIGS } from "../config.js";
import { fallbackDelayMs, getRuntimeFallbacks, isRetryableError, sleep } from "./retry.js";
import type { ILLMClient, LLMMessage, LLMProvider, LLMRequestOptions, LLMResponse, ModelRole } from "../types.js";

const log = createComponentLogger("llm.resilient");

export type ClientFactory = (provider: LLMProvider, apiKey: string) => ILLMClient;
export type KeyLookup = (provider: LLMProvider) => string | undefined;

export class ResilientLLMClient implements ILLMClient {
  readonly provider: LLMProvider;
  private readonly model: string | undefined;

  constructor(
    private readonly primary: ILLMClient,
    private readonly role: ModelRole,
    private readonly createClient: ClientFactory,
    private readonly keyFor: KeyLookup,
  ) {
    this.provider = primary.provider;
    const configured = MODEL_ROLE_CONFIGS[role];
    this.model =
      configured.provider === primary.provider
        ? configured.model
        : FALLBACK_CHAINS[role].find((entry) => entry.provider === primary.provider)?.model;
  }

  async chat(messages: LLMMessage[], options?: LLMRequestOptions): Promise<LLMResponse> {
    let primaryError: unknown;
    try {
      return await this.primary.chat(messages, { ...options, model: options?.model ?? this.model });
    } catch (e) {
      // An aborted caller has given up; a fallback would outlive its deadline
      if (options?.signal?.aborted || !isRetryableError(e)) throw e;
      primaryError = e;
    }

    const fallbacks = getRuntimeFallbacks(this.role, this.primary.provider).flatMap((entry) => {
      const apiKey = this.keyFor(entry.provider);
      return apiKey ? [{ entry, apiKey }] : [];
    });
    log.warn("Primary provider failed", {
      role: this.role,
      provider: this.primary.provider,
      fallbacks: fallbacks.length,
      error: errorMessage(primaryError).slice(0, 200),
    });
    if (fallbacks.length === 0) throw primaryError;

    const delay = fallbackDelayMs(primaryError);
    if (delay > 0) await sleep(delay);

    for (const { entry, apiKey } of fallbacks) {
      if (options?.signal?.aborted) break;
      try {
        const response = await this.createClient(entry.provider, apiKey).chat(messages, {
          ...options,
          model: entry.model,
          temperature: options?.temperature ?? entry.temperature,
          maxTokens: options?.maxTokens ?? entry.maxTokens,
        });
        log.info("Fallback provider answered", { role: this.role, provider: entry.provider, model: entry.model });
        return response;
      } catch (e) {
        log.warn("Fallback provider failed", { role: this.role, provider: entry.provider, error: errorMessage(e).slice(0, 200) });
      }
    }
    throw primaryError;
  }
}
