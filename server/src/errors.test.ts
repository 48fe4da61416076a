import { describe, it, expect } from "vitest";
import {
  EmbeddingRateLimitError,
  EmbeddingRequestError,
  FactNotFoundError,
  GenerationTimeoutError,
  StorageUnavailableError,
  isTransientError,
} from "./errors.js";

describe("engine errors", () => {
  it("names instances after their class", () => {
    expect(new FactNotFoundError("A9").name).toBe("FactNotFoundError");
    expect(new FactNotFoundError("A9").message).toBe("Assumption A9 not found");
  });

  it("classifies transient failures", () => {
    expect(isTransientError(new EmbeddingRateLimitError("429"))).toBe(true);
    expect(isTransientError(new GenerationTimeoutError("router", 20000))).toBe(true);
    expect(isTransientError(new EmbeddingRequestError("400", 400))).toBe(false);
    expect(isTransientError(new Error("plain"))).toBe(false);
  });

  it("marks storage failures as fatal", () => {
    expect(new StorageUnavailableError("db closed").category).toBe("fatal");
  });
});
