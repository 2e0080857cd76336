import type { Embedder, TokenCounter, VectorIndex } from "../adapters/types.js"
import { BudgetExceededError, guardExternalCall, InvalidRecordError } from "../errors/index.js"
import { errorFields, type Logger, TracingLogger } from "../tracing/logger.js"
import { MemoryAttributes, withSpan } from "../tracing/spans.js"
import { compareScored, prepareQuery, Scorer } from "./scoring.js"
import type { MemoryStream } from "./stream.js"
import type { MemoryRecord, ScoredMemory } from "./types.js"

export interface RetrieverOptions {
  embedder: Embedder
  counter: TokenCounter
  scorer?: Scorer
  clock?: () => number
  /** Deadline per external call (ms). */
  timeoutMs?: number
  logger?: Logger
  /**
   * With both set, streams larger than `candidatePool` score only the
   * index's nearest neighbours plus the most recently accessed and most
   * important records, instead of every record.
   */
  vectorIndex?: VectorIndex
  candidatePool?: number
}

export interface RetrieveOptions {
  /** Stop after this many selected records. */
  limit?: number
  /** Scoring and access time; defaults to the retriever's clock. */
  now?: number
}

export interface Retrieval {
  /** Selected records in ranked order, as they are after being touched. */
  selected: ScoredMemory[]
  /** Records whose own length can never fit the budget. */
  skipped: BudgetExceededError[]
  usedUnits: number
  budget: number
  now: number
}

export function retrievedRecords(retrieval: Retrieval): MemoryRecord[] {
  return retrieval.selected.map((s) => s.record)
}

export class Retriever {
  readonly scorer: Scorer
  readonly counter: TokenCounter

  private readonly embedder: Embedder
  private readonly clock: () => number
  private readonly timeoutMs: number | undefined
  private readonly logger: Logger
  private readonly vectorIndex: VectorIndex | undefined
  private readonly candidatePool: number | undefined

  constructor(options: RetrieverOptions) {
    this.embedder = options.embedder
    this.counter = options.counter
    this.scorer = options.scorer ?? new Scorer()
    this.clock = options.clock ?? Date.now
    this.timeoutMs = options.timeoutMs
    this.logger = options.logger ?? new TracingLogger()
    this.vectorIndex = options.vectorIndex
    this.candidatePool = options.candidatePool
  }

  /**
   * Rank the stream against `queryText` and greedily take records in rank
   * order until the next one would overflow `budget` units. Each selected
   * record is touched, which feeds its future recency.
   */
  async retrieve(
    stream: MemoryStream,
    queryText: string,
    budget: number,
    options: RetrieveOptions = {},
  ): Promise<Retrieval> {
    if (!Number.isFinite(budget) || budget < 0) {
      throw new RangeError(`Retrieval budget must be a non-negative number, got ${budget}`)
    }

    const now = options.now ?? this.clock()
    const empty: Retrieval = { selected: [], skipped: [], usedUnits: 0, budget, now }
    if (stream.size === 0) return empty

    return withSpan(
      "mnemos.memory.retrieve",
      {
        [MemoryAttributes.AGENT_IDENTITY]: stream.identity,
        [MemoryAttributes.STORE_SIZE]: stream.size,
        [MemoryAttributes.RETRIEVAL_BUDGET]: budget,
      },
      async (span) => {
        const vector = await guardExternalCall(
          "embed",
          () => this.embedder.embed(queryText),
          this.timeoutMs,
        )
        const query = prepareQuery(vector)
        const candidates = await this.candidates(stream, vector)
        const ranked = this.scorer.scoreAll(stream, query, now, candidates).sort(compareScored)

        const picked: ScoredMemory[] = []
        const skipped: BudgetExceededError[] = []
        let usedUnits = 0

        for (const scored of ranked) {
          if (options.limit !== undefined && picked.length >= options.limit) break

          const units = this.counter.count(scored.record.text)
          if (units > budget) {
            skipped.push(new BudgetExceededError(scored.record.id, units, budget))
            continue
          }
          if (usedUnits + units > budget) break

          picked.push(scored)
          usedUnits += units
        }

        const selected = picked.map((scored) => ({
          record: this.touch(stream, scored.record, now),
          score: scored.score,
        }))

        for (const skip of skipped) {
          this.logger.debug("Memory record can never fit retrieval budget", {
            identity: stream.identity,
            recordId: skip.recordId,
            units: skip.units,
            budget,
          })
        }

        span.setAttributes({
          [MemoryAttributes.RETRIEVAL_SELECTED]: selected.length,
          [MemoryAttributes.RETRIEVAL_SKIPPED]: skipped.length,
          [MemoryAttributes.RETRIEVAL_USED_UNITS]: usedUnits,
        })

        return { selected, skipped, usedUnits, budget, now }
      },
    )
  }

  private touch(stream: MemoryStream, record: MemoryRecord, now: number): MemoryRecord {
    try {
      stream.touch(record.id, now)
    } catch (err) {
      if (!(err instanceof InvalidRecordError)) throw err
      // Access time stays where it was; the record is still selected
      this.logger.warn("Skipped non-monotonic memory access", {
        identity: stream.identity,
        recordId: record.id,
        ...errorFields(err),
      })
    }
    return stream.get(record.id)
  }

  private async candidates(
    stream: MemoryStream,
    vector: readonly number[],
  ): Promise<readonly MemoryRecord[]> {
    const pool = this.candidatePool
    const index = this.vectorIndex
    if (!index || pool === undefined || stream.size <= pool) return stream.all()

    const matches = await guardExternalCall(
      "vectorIndex.query",
      () => index.query(stream.identity, vector, pool),
      this.timeoutMs,
    )

    const ids = new Set<number>()
    for (const match of matches) {
      if (stream.has(match.id)) ids.add(match.id)
    }

    const all = stream.all()
    const byAccess = [...all].sort((a, b) => b.lastAccessedAt - a.lastAccessedAt || b.id - a.id)
    const byImportance = [...all].sort((a, b) => b.importance - a.importance || b.id - a.id)
    for (const record of byAccess.slice(0, pool)) ids.add(record.id)
    for (const record of byImportance.slice(0, pool)) ids.add(record.id)

    return [...ids].sort((a, b) => a - b).map((id) => stream.get(id))
  }
}
