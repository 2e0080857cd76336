export interface ConversationEntry {
  speaker: string
  text: string
  /** Epoch ms. */
  timestamp: number
}

const DEFAULT_MAX_ENTRIES = 50

/**
 * The literal recent exchange, kept alongside the memory stream so the
 * last few lines reach the prompt verbatim and in order.
 */
export class ConversationBuffer {
  readonly maxEntries: number
  private entries: ConversationEntry[] = []

  constructor(maxEntries: number = DEFAULT_MAX_ENTRIES) {
    if (!Number.isInteger(maxEntries) || maxEntries < 1) {
      throw new RangeError(`maxEntries must be a positive integer, got ${maxEntries}`)
    }
    this.maxEntries = maxEntries
  }

  append(entry: ConversationEntry): void {
    this.entries.push(entry)
    if (this.entries.length > this.maxEntries) {
      this.entries = this.entries.slice(this.entries.length - this.maxEntries)
    }
  }

  /** The newest `count` entries (all by default), oldest first. */
  tail(count?: number): ConversationEntry[] {
    if (count === undefined) return [...this.entries]
    if (count <= 0) return []
    return this.entries.slice(-count)
  }

  /** Replace the contents with `entries` (oldest first), e.g. a saved `tail()`. */
  restore(entries: readonly ConversationEntry[]): void {
    this.entries = entries.slice(-this.maxEntries)
  }

  get length(): number {
    return this.entries.length
  }

  clear(): void {
    this.entries = []
  }
}
