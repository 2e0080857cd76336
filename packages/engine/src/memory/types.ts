export type MemoryKind = "observation" | "reflection" | "plan"

export const MIN_IMPORTANCE = 1
export const MAX_IMPORTANCE = 10

export interface MemoryRecord {
  /** Monotonic, assigned by the stream on insert. */
  readonly id: number
  readonly text: string
  readonly embedding: readonly number[]
  readonly kind: MemoryKind
  /** Integer in [MIN_IMPORTANCE, MAX_IMPORTANCE]. */
  readonly importance: number
  /** Epoch ms. */
  readonly createdAt: number
  /** Epoch ms, only ever advanced by `MemoryStream.touch`. */
  readonly lastAccessedAt: number
  readonly sourceIds: readonly number[]
}

/** Everything but the id, which the stream assigns. */
export interface MemoryDraft {
  text: string
  embedding: readonly number[]
  kind: MemoryKind
  importance: number
  createdAt: number
  sourceIds?: readonly number[]
}

export interface ScoringWeights {
  recency: number
  importance: number
  relevance: number
}

export interface ScoreBreakdown {
  recency: number
  importance: number
  relevance: number
  combined: number
}

export interface ScoredMemory {
  record: MemoryRecord
  score: ScoreBreakdown
}

export interface ImportanceRange {
  min: number
  max: number
}

export interface AccessUpdate {
  id: number
  lastAccessedAt: number
}

/** Mutations since the journal was last drained. */
export interface MemoryChanges {
  inserted: MemoryRecord[]
  touched: AccessUpdate[]
}
