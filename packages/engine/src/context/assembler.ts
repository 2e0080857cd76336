/**
 * Context assembly: persona, then retrieved memories, then as much of the
 * recent conversation as the remaining budget allows.
 */

import type { TokenCounter } from "../adapters/types.js"
import type { ConversationEntry } from "../conversation/buffer.js"
import { PersonaTooLargeError } from "../errors/index.js"
import type { MemoryRecord } from "../memory/types.js"

export const MEMORY_HEADING = "\n## Relevant memories\n"
export const CONVERSATION_HEADING = "\n## Recent conversation\n"

export function formatMemoryLine(record: MemoryRecord): string {
  return `- ${record.text}\n`
}

export function formatConversationLine(entry: ConversationEntry): string {
  return `${entry.speaker}: ${entry.text}\n`
}

export type AssemblyResult =
  | {
      ok: true
      prompt: string
      usedUnits: number
      memoryIds: number[]
      /** How many of the newest tail entries made it in. */
      tailEntries: number
    }
  | { ok: false; error: PersonaTooLargeError }

/**
 * Packs the prompt piece by piece, counting every piece (headings and line
 * breaks included) with the same counter the retriever uses.
 */
export class ContextAssembler {
  constructor(private readonly counter: TokenCounter) {}

  assemble(
    retrieved: readonly MemoryRecord[],
    tail: readonly ConversationEntry[],
    persona: string,
    totalBudget: number,
  ): AssemblyResult {
    const personaBlock = `${persona.trim()}\n`
    const personaUnits = this.counter.count(personaBlock)
    if (personaUnits > totalBudget) {
      return { ok: false, error: new PersonaTooLargeError(personaUnits, totalBudget) }
    }

    let remaining = totalBudget - personaUnits

    // Memories: rank order, skip what does not fit
    const memoryLines: string[] = []
    const memoryIds: number[] = []
    const memoryHeadingUnits = this.counter.count(MEMORY_HEADING)
    for (const record of retrieved) {
      const line = formatMemoryLine(record)
      const cost = this.counter.count(line) + (memoryLines.length === 0 ? memoryHeadingUnits : 0)
      if (cost > remaining) continue
      memoryLines.push(line)
      memoryIds.push(record.id)
      remaining -= cost
    }

    // Conversation: newest first, stop at the first entry that does not fit
    const tailLines: string[] = []
    const tailHeadingUnits = this.counter.count(CONVERSATION_HEADING)
    for (let i = tail.length - 1; i >= 0; i--) {
      const entry = tail[i]
      if (!entry) continue
      const line = formatConversationLine(entry)
      const cost = this.counter.count(line) + (tailLines.length === 0 ? tailHeadingUnits : 0)
      if (cost > remaining) break
      tailLines.unshift(line)
      remaining -= cost
    }

    let prompt = personaBlock
    if (memoryLines.length > 0) prompt += MEMORY_HEADING + memoryLines.join("")
    if (tailLines.length > 0) prompt += CONVERSATION_HEADING + tailLines.join("")

    return {
      ok: true,
      prompt,
      usedUnits: totalBudget - remaining,
      memoryIds,
      tailEntries: tailLines.length,
    }
  }
}
