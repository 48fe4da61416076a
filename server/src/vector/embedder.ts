/**
 * Embedder
 *
 * Batches texts, keeps a bounded number of batches in flight and retries
 * each batch independently on transient failures. Output order matches
 * input order.
 */

import type { EmbeddingSettings } from "../config.js";
import { EmbeddingRateLimitError, isTransientError } from "../errors.js";
import { backoffDelayMs, sleep } from "../llm/resilience/retry.js";
import { createComponentLogger } from "../logging.js";
import type { EmbeddingClient, EmbeddingInputType } from "./embedding-client.js";

const log = createComponentLogger("vector.embedder");

export type EmbedderSettings = Pick<EmbeddingSettings, "batchSize" | "maxInFlight" | "initialBackoffMs" | "maxBackoffMs" | "maxAttempts">;

export class Embedder {
  constructor(
    private readonly client: EmbeddingClient,
    private readonly settings: EmbedderSettings,
    private readonly wait: (ms: number) => Promise<void> = sleep,
  ) {}

  async embed(texts: string[], inputType: EmbeddingInputType = "document"): Promise<number[][]> {
    if (texts.length === 0) return [];

    const batches: string[][] = [];
    for (let i = 0; i < texts.length; i += this.settings.batchSize) {
      batches.push(texts.slice(i, i + this.settings.batchSize));
    }

    const results: number[][][] = [];
    let next = 0;
    const worker = async (): Promise<void> => {
      while (next < batches.length) {
        const index = next++;
        results[index] = await this.embedBatch(batches[index], inputType, index);
      }
    };

    const lanes = Math.min(this.settings.maxInFlight, batches.length);
    await Promise.all(Array.from({ length: lanes }, () => worker()));
    return results.flat();
  }

  async embedOne(text: string, inputType: EmbeddingInputType = "query"): Promise<number[]> {
    const [vector] = await this.embed([text], inputType);
    return vector;
  }

  private async embedBatch(batch: string[], inputType: EmbeddingInputType, index: number): Promise<number[][]> {
    for (let attempt = 1; ; attempt++) {
      try {
        return await this.client.embed(batch, inputType);
      } catch (error) {
        if (!isTransientError(error) || attempt >= this.settings.maxAttempts) throw error;
        const hinted = error instanceof EmbeddingRateLimitError ? error.retryAfterMs : 0;
        const delay = Math.max(hinted, backoffDelayMs(attempt, this.settings.initialBackoffMs, this.settings.maxBackoffMs));
        log.warn("Embedding batch failed, retrying", {
          batch: index,
          attempt,
          delayMs: delay,
          error: error instanceof Error ? error.message : String(error),
        });
        await this.wait(delay);
      }
    }
  }
}
