/**
 * Embedding Client
 *
 * Voyage embeddings over plain fetch. Failures are classified so the
 * embedder can tell what to retry: 429 and 5xx (and network/timeouts)
 * are transient, any other 4xx is rejected.
 */

import { z } from "zod";
import { EmbeddingRateLimitError, EmbeddingRequestError, EmbeddingServerError } from "../errors.js";
import type { EmbeddingSettings } from "../config.js";
import { retryAfterMs } from "../llm/resilience/retry.js";

export type EmbeddingInputType = "document" | "query";

export interface EmbeddingClient {
  embed(texts: string[], inputType: EmbeddingInputType): Promise<number[][]>;
}

const VOYAGE_BASE_URL = "https://api.voyageai.com/v1";

const responseSchema = z.object({
  data: z.array(z.object({ embedding: z.array(z.number()), index: z.number().int() })),
});

export class VoyageEmbeddingClient implements EmbeddingClient {
  constructor(
    private readonly apiKey: string,
    private readonly settings: Pick<EmbeddingSettings, "model" | "dimensions" | "timeoutMs">,
    private readonly baseUrl = VOYAGE_BASE_URL,
  ) {}

  async embed(texts: string[], inputType: EmbeddingInputType): Promise<number[][]> {
    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}/embeddings`, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Authorization: `Bearer ${this.apiKey}`,
        },
        body: JSON.stringify({
          input: texts,
          model: this.settings.model,
          input_type: inputType,
          output_dimension: this.settings.dimensions,
        }),
        signal: AbortSignal.timeout(this.settings.timeoutMs),
      });
    } catch (e) {
      const reason = e instanceof Error && e.name === "TimeoutError" ? `timed out after ${this.settings.timeoutMs}ms` : String(e);
      throw new EmbeddingServerError(`Embedding request failed: ${reason}`, 0);
    }

    if (!response.ok) {
      const body = await response.text();
      const message = `Voyage API error: ${response.status} ${body}`;
      if (response.status === 429) throw new EmbeddingRateLimitError(message, retryAfterMs(response.headers.get("retry-after")));
      if (response.status >= 500) throw new EmbeddingServerError(message, response.status);
      throw new EmbeddingRequestError(message, response.status);
    }

    const parsed = responseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new EmbeddingServerError(`Voyage API returned an unexpected payload: ${parsed.error.message}`, response.status);
    }
    const vectors = [...parsed.data.data].sort((a, b) => a.index - b.index).map((d) => d.embedding);
    if (vectors.length !== texts.length) {
      throw new EmbeddingServerError(`Voyage API returned ${vectors.length} embeddings for ${texts.length} inputs`, response.status);
    }
    return vectors;
  }
}
