/**
 * Reflection and plan prompts, and parsing of the statements they return.
 */

import type { MemoryRecord, SynthesisMode } from "@mnemos/engine"
import { z } from "zod"

export const StatementsResponseSchema = z.object({
  statements: z.array(z.string()),
})

const INSTRUCTIONS: Record<SynthesisMode, string> = {
  reflection:
    "Given only the memories below, what are the most salient high-level insights you can infer? Each insight must stand on its own without the original memories.",
  plan: "Given only the insights below, what should the agent plan to do or keep in mind in upcoming conversations? Each plan must be a single actionable statement.",
}

export function buildSynthesisPrompt(
  records: readonly MemoryRecord[],
  mode: SynthesisMode,
  maxStatements: number,
): string {
  const listing = records.map((r, i) => `${i + 1}. ${r.text}`).join("\n")

  return `${INSTRUCTIONS[mode]}

--- MEMORIES START ---
${listing}
--- MEMORIES END ---

Respond with ONLY a JSON object of the form {"statements": ["..."]} holding at most ${maxStatements} statements.`
}

const FENCE = /^```(?:json)?\s*([\s\S]*?)\s*```$/
const LIST_MARKER = /^(?:\d+[.)]|[-*•])\s+/

/**
 * Parse a synthesis reply. JSON `{ "statements": [...] }` (optionally
 * fenced) is preferred; otherwise every numbered or bulleted line counts.
 */
export function parseStatements(reply: string): string[] {
  const trimmed = reply.trim()
  const body = FENCE.exec(trimmed)?.[1] ?? trimmed

  const json = tryParseJson(body)
  if (json !== undefined) {
    const parsed = StatementsResponseSchema.safeParse(json)
    if (parsed.success) return parsed.data.statements.map((s) => s.trim()).filter(Boolean)
  }

  return body
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => LIST_MARKER.test(line))
    .map((line) => line.replace(LIST_MARKER, "").trim())
    .filter(Boolean)
}

function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text)
  } catch {
    return undefined
  }
}
