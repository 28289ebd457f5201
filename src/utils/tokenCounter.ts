import { encode } from 'gpt-tokenizer';

/**
 * Accurately count tokens using GPT tokenizer
 * Falls back to character-based estimation if tokenization fails
 */
export function countTokens(text: string): number {
  if (!text) return 0;

  try {
    return encode(text).length;
  } catch {
    // Fallback: ~4 characters per token (rough approximation)
    return Math.max(1, Math.round(text.length / 4));
  }
}
