/**
 * Importance elicitation prompt. The model answers with one integer.
 */

import { MAX_IMPORTANCE, MIN_IMPORTANCE } from "@mnemos/engine"

export function buildImportancePrompt(text: string): string {
  return `On a scale of ${MIN_IMPORTANCE} to ${MAX_IMPORTANCE}, where ${MIN_IMPORTANCE} is purely mundane (e.g. brushing teeth, making bed) and ${MAX_IMPORTANCE} is extremely poignant (e.g. a break up, college acceptance), rate the likely poignancy of the following memory.

Memory: ${text}

Respond with ONLY the integer rating.`
}

/**
 * Pull the first integer out of a rating reply and clamp it into range.
 * Returns undefined when the reply holds no number at all.
 */
export function parseImportance(reply: string): number | undefined {
  const match = /-?\d+(?:\.\d+)?/.exec(reply)
  if (!match) return undefined
  const value = Math.round(Number(match[0]))
  if (!Number.isFinite(value)) return undefined
  return Math.max(MIN_IMPORTANCE, Math.min(MAX_IMPORTANCE, value))
}
