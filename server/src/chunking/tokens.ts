/** Word-count heuristic; close enough for boundary decisions. */
export function estimateTokens(text: string): number {
  const words = text.split(/\s+/).filter(Boolean).length;
  return Math.floor(words * 1.3);
}
