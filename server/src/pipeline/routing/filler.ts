/**
 * Acknowledgment detection. A message made only of these words carries
 * nothing worth searching for.
 */

const FILLER_WORDS = new Set([
  "yes", "yeah", "yep", "yup", "sure", "ok", "okay", "k", "alright", "right",
  "continue", "go", "on", "ahead", "proceed", "next", "keep", "going",
  "sounds", "good", "great", "perfect", "cool", "fine", "got", "it",
  "makes", "sense", "thanks", "thank", "you", "please", "lets", "let's", "do", "that",
]);

const MAX_FILLER_WORDS = 6;

export function isFillerMessage(message: string): boolean {
  const words = message.toLowerCase().replace(/[^a-z' ]+/g, " ").split(/\s+/).filter(Boolean);
  return words.length > 0 && words.length <= MAX_FILLER_WORDS && words.every((w) => FILLER_WORDS.has(w));
}
