/**
 * Provider Implementations: Barrel Export
 */

export { AnthropicClient, formatMessagesForAnthropic } from "./anthropic.js";
export { OpenAIClient, formatMessagesForOpenAI } from "./openai.js";
