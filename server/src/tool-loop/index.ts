/**
 * Tool Loop: Public API
 */

export { runToolLoop } from "./loop.js";
export { sanitizeMessages } from "./sanitize.js";
export type { ToolCallRecord, ToolHandler, ToolHandlerResult, ToolLoopOptions, ToolLoopResult } from "./types.js";
