export { ResilientLLMClient, type ClientFactory, type KeyLookup } from "./resilient-client.js";
export { isRetryableError, retryAfterMs, fallbackDelayMs, backoffDelayMs, getRuntimeFallbacks, sleep } from "./retry.js";
