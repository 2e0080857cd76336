import type { TokenCounter } from "../adapters/types.js"

/** Average characters per token (conservative estimate). */
const CHARS_PER_TOKEN = 4

/**
 * Estimate token count for a string.
 */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / CHARS_PER_TOKEN)
}

/**
 * 4-chars-per-token approximation. Never under-counts a concatenation:
 * the units of joined pieces are at most the sum of their units.
 */
export class CharTokenCounter implements TokenCounter {
  count(text: string): number {
    return estimateTokens(text)
  }
}
