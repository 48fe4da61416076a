import { describe, it, expect, vi, afterEach } from "vitest";
import { Embedder } from "./embedder.js";
import { VoyageEmbeddingClient, type EmbeddingClient } from "./embedding-client.js";
import { EmbeddingRateLimitError, EmbeddingRequestError, EmbeddingServerError } from "../errors.js";
import { FakeEmbeddingClient, bagOfWords } from "../testing/fakes.js";

const settings = { batchSize: 2, maxInFlight: 2, initialBackoffMs: 2_000, maxBackoffMs: 60_000, maxAttempts: 5 };
const noWait = async (): Promise<void> => {};

// ============================================
// EMBEDDER
// ============================================

describe("Embedder", () => {
  it("batches and preserves input order", async () => {
    const client = new FakeEmbeddingClient();
    const embedder = new Embedder(client, settings, noWait);
    const texts = ["a one", "b two", "c three", "d four", "e five"];

    const vectors = await embedder.embed(texts);

    expect(client.calls.map((c) => c.texts.length)).toEqual([2, 2, 1]);
    expect(vectors).toEqual(texts.map(bagOfWords));
  });

  it("keeps at most maxInFlight batches running", async () => {
    let active = 0;
    let peak = 0;
    const slow: EmbeddingClient = {
      async embed(texts) {
        active += 1;
        peak = Math.max(peak, active);
        await new Promise((resolve) => setTimeout(resolve, 5));
        active -= 1;
        return texts.map(() => [1]);
      },
    };

    const vectors = await new Embedder(slow, settings, noWait).embed(["1", "2", "3", "4", "5", "6", "7"]);

    expect(vectors).toHaveLength(7);
    expect(peak).toBe(2);
  });

  it("retries transient failures with backoff, honouring retry-after", async () => {
    const client = new FakeEmbeddingClient();
    client.failures.push(new EmbeddingRateLimitError("slow down", 5_000), new EmbeddingServerError("boom", 503));
    const wait = vi.fn(async (_ms: number) => {});

    const vectors = await new Embedder(client, settings, wait).embed(["hello"]);

    expect(vectors).toEqual([bagOfWords("hello")]);
    expect(wait.mock.calls.map(([ms]) => ms)).toEqual([5_000, 4_000]);
    expect(client.calls).toHaveLength(3);
  });

  it("fails fast on rejected requests", async () => {
    const client = new FakeEmbeddingClient();
    client.failures.push(new EmbeddingRequestError("bad input", 400));
    const wait = vi.fn(noWait);

    await expect(new Embedder(client, settings, wait).embed(["x"])).rejects.toBeInstanceOf(EmbeddingRequestError);
    expect(client.calls).toHaveLength(1);
    expect(wait).not.toHaveBeenCalled();
  });

  it("gives up after maxAttempts", async () => {
    const client = new FakeEmbeddingClient();
    client.failures.push(new EmbeddingServerError("down", 502), new EmbeddingServerError("still down", 502));
    const wait = vi.fn(noWait);

    await expect(new Embedder(client, { ...settings, maxAttempts: 2 }, wait).embed(["x"])).rejects.toThrow("still down");
    expect(wait).toHaveBeenCalledTimes(1);
  });
});

// ============================================
// VOYAGE CLIENT
// ============================================

describe("VoyageEmbeddingClient", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  const client = new VoyageEmbeddingClient("test-key", { model: "voyage-3", dimensions: 2, timeoutMs: 1_000 });

  it("sends the batch and reorders vectors by index", async () => {
    const fetchMock = vi.fn(async (_url: string, _init: RequestInit) =>
      new Response(JSON.stringify({ data: [{ embedding: [0, 1], index: 1 }, { embedding: [1, 0], index: 0 }] }), { status: 200 }),
    );
    vi.stubGlobal("fetch", fetchMock);

    const vectors = await client.embed(["first", "second"], "document");

    expect(vectors).toEqual([[1, 0], [0, 1]]);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("https://api.voyageai.com/v1/embeddings");
    expect(JSON.parse(String(init.body))).toEqual({ input: ["first", "second"], model: "voyage-3", input_type: "document", output_dimension: 2 });
  });

  it("classifies HTTP failures", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => new Response("busy", { status: 429, headers: { "retry-after": "3" } })));
    const limited = await client.embed(["x"], "query").catch((e: unknown) => e);
    expect(limited).toBeInstanceOf(EmbeddingRateLimitError);
    expect(limited instanceof EmbeddingRateLimitError && limited.retryAfterMs).toBe(3_000);

    vi.stubGlobal("fetch", vi.fn(async () => new Response("oops", { status: 503 })));
    await expect(client.embed(["x"], "query")).rejects.toBeInstanceOf(EmbeddingServerError);

    vi.stubGlobal("fetch", vi.fn(async () => new Response("bad model", { status: 400 })));
    await expect(client.embed(["x"], "query")).rejects.toThrow("Voyage API error: 400 bad model");
  });

  it("treats network failures as transient", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => {
      throw new TypeError("fetch failed");
    }));
    await expect(client.embed(["x"], "query")).rejects.toBeInstanceOf(EmbeddingServerError);
  });
});
