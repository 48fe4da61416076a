/**
 * Bounded generation calls. Every role call the engine makes goes
 * through here so a hung provider surfaces as GenerationTimeoutError.
 */

import { GenerationTimeoutError } from "../errors.js";
import type { ILLMClient, LLMMessage, LLMRequestOptions, LLMResponse } from "./types.js";

/** Race a promise against a timeout; the abort fires before the rejection. */
export function withTimeout<T>(promise: Promise<T>, ms: number, operation: string, controller?: AbortController): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      controller?.abort();
      reject(new GenerationTimeoutError(operation, ms));
    }, ms);
    promise.then(
      (val) => { clearTimeout(timer); resolve(val); },
      (err: unknown) => { clearTimeout(timer); reject(err); },
    );
  });
}

export function chatWithTimeout(
  client: ILLMClient,
  messages: LLMMessage[],
  options: LLMRequestOptions,
  limit: { operation: string; timeoutMs: number },
): Promise<LLMResponse> {
  const controller = new AbortController();
  const signal = options.signal ? AbortSignal.any([options.signal, controller.signal]) : controller.signal;
  return withTimeout(client.chat(messages, { ...options, signal }), limit.timeoutMs, limit.operation, controller);
}
