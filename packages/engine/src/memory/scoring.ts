import { cosineWithNorms, vectorNorm } from "./similarity.js"
import type { MemoryStream } from "./stream.js"
import type {
  ImportanceRange,
  MemoryRecord,
  ScoreBreakdown,
  ScoredMemory,
  ScoringWeights,
} from "./types.js"

const MS_PER_HOUR = 3_600_000

export const DEFAULT_DECAY_FACTOR = 0.99

export const DEFAULT_WEIGHTS: Readonly<ScoringWeights> = Object.freeze({
  recency: 1 / 3,
  importance: 1 / 3,
  relevance: 1 / 3,
})

/**
 * Exponential decay on hours since last access (not creation), so memories
 * that keep getting recalled stay warm.
 */
export function calculateRecency(
  lastAccessedAt: number,
  now: number,
  decayFactor: number = DEFAULT_DECAY_FACTOR,
): number {
  const hours = Math.max(0, (now - lastAccessedAt) / MS_PER_HOUR)
  return Math.pow(decayFactor, hours)
}

/** Min-max scale against the store's current importance range. */
export function scaleImportance(importance: number, range: ImportanceRange | undefined): number {
  if (!range || range.max === range.min) return 1.0
  return (importance - range.min) / (range.max - range.min)
}

/** Cosine similarity mapped from [-1, 1] to [0, 1]. */
export function rescaleCosine(cosine: number): number {
  return (cosine + 1) / 2
}

export function validateWeights(weights: ScoringWeights): void {
  const values = [weights.recency, weights.importance, weights.relevance]
  if (!values.every((w) => Number.isFinite(w) && w >= 0)) {
    throw new RangeError("Scoring weights must be finite and non-negative")
  }
  if (values.reduce((a, b) => a + b, 0) <= 0) {
    throw new RangeError("Scoring weights must not all be zero")
  }
}

/** Rescale relative weights so they sum to 1. */
export function normalizeWeights(weights: ScoringWeights): ScoringWeights {
  validateWeights(weights)
  const total = weights.recency + weights.importance + weights.relevance
  return {
    recency: weights.recency / total,
    importance: weights.importance / total,
    relevance: weights.relevance / total,
  }
}

export interface ScorerOptions {
  /** Per-hour decay base in (0, 1]. Defaults to 0.99. */
  decayFactor?: number
  /** Relative weights; used as given, see normalizeWeights. */
  weights?: ScoringWeights
}

/** A query embedding with its norm computed once per retrieval. */
export interface PreparedQuery {
  vector: readonly number[]
  norm: number
}

export function prepareQuery(vector: readonly number[]): PreparedQuery {
  return { vector, norm: vectorNorm(vector) }
}

export class Scorer {
  readonly decayFactor: number
  readonly weights: Readonly<ScoringWeights>

  constructor(options: ScorerOptions = {}) {
    const decayFactor = options.decayFactor ?? DEFAULT_DECAY_FACTOR
    if (!(decayFactor > 0 && decayFactor <= 1)) {
      throw new RangeError(`decayFactor must be in (0, 1], got ${decayFactor}`)
    }
    const weights = options.weights ?? DEFAULT_WEIGHTS
    validateWeights(weights)

    this.decayFactor = decayFactor
    this.weights = Object.freeze({ ...weights })
  }

  recency(record: MemoryRecord, now: number): number {
    return calculateRecency(record.lastAccessedAt, now, this.decayFactor)
  }

  relevance(query: PreparedQuery, record: MemoryRecord, recordNorm: number): number {
    return rescaleCosine(cosineWithNorms(query.vector, query.norm, record.embedding, recordNorm))
  }

  score(
    record: MemoryRecord,
    query: PreparedQuery,
    now: number,
    range: ImportanceRange | undefined,
    recordNorm: number = vectorNorm(record.embedding),
  ): ScoreBreakdown {
    const recency = this.recency(record, now)
    const importance = scaleImportance(record.importance, range)
    const relevance = this.relevance(query, record, recordNorm)

    return {
      recency,
      importance,
      relevance,
      combined:
        this.weights.recency * recency +
        this.weights.importance * importance +
        this.weights.relevance * relevance,
    }
  }

  /**
   * Score the given records (all of the stream by default) against a query.
   * Importance is scaled against the whole stream's range either way.
   */
  scoreAll(
    stream: MemoryStream,
    query: PreparedQuery,
    now: number,
    records: readonly MemoryRecord[] = stream.all(),
  ): ScoredMemory[] {
    const range = stream.importanceRange()
    return records.map((record) => ({
      record,
      score: this.score(record, query, now, range, stream.norm(record.id)),
    }))
  }
}

/**
 * Rank descending by combined score; ties go to the more recently created
 * record, then to the lower id.
 */
export function compareScored(a: ScoredMemory, b: ScoredMemory): number {
  return (
    b.score.combined - a.score.combined ||
    b.record.createdAt - a.record.createdAt ||
    a.record.id - b.record.id
  )
}

export function rankMemories(scored: ScoredMemory[]): ScoredMemory[] {
  return [...scored].sort(compareScored)
}
