import type { LanguageModel, SynthesisMode } from "../adapters/types.js"
import { ExternalCallFailure, guardExternalCall } from "../errors/index.js"
import { errorFields, type Logger, TracingLogger } from "../tracing/logger.js"
import { MemoryAttributes, withSpan } from "../tracing/spans.js"
import type { MemoryRecorder } from "./recorder.js"
import { retrievedRecords, type Retriever } from "./retriever.js"
import type { MemoryStream } from "./stream.js"
import type { MemoryKind, MemoryRecord } from "./types.js"

export const REFLECTIVE_QUERY = "What are the high-level insights from recent experience?"

export const DEFAULT_REFLECTION_THRESHOLD = 150
const DEFAULT_TOP_K = 30
const DEFAULT_REFLECTION_BUDGET = 2_000
const DEFAULT_MAX_INSIGHTS = 3

export interface ReflectionOptions {
  retriever: Retriever
  recorder: MemoryRecorder
  model: LanguageModel
  /** Cumulative observation importance that triggers a reflection. */
  threshold?: number
  /** Most salient records consulted per reflection. */
  topK?: number
  /** Unit budget for the consulted records. */
  budget?: number
  maxInsights?: number
  /** Also derive plan records from each batch of fresh reflections. */
  planning?: boolean
  timeoutMs?: number
  logger?: Logger
}

export interface ReflectionOutcome {
  reflections: MemoryRecord[]
  plans: MemoryRecord[]
  /** Set when reflections were written but deriving plans from them failed. */
  planningError?: ExternalCallFailure
}

function nothing(): ReflectionOutcome {
  return { reflections: [], plans: [] }
}

/** Trim, drop blanks and repeats, keep at most `max`. */
export function cleanInsights(raw: readonly string[], max: number): string[] {
  const seen = new Set<string>()
  const out: string[] = []
  for (const item of raw) {
    const text = item.trim()
    if (text.length === 0 || seen.has(text)) continue
    seen.add(text)
    out.push(text)
    if (out.length >= max) break
  }
  return out
}

/**
 * Periodically compresses recent salient memories into reflections that
 * go back into the same stream, where they can be retrieved and reflected
 * on again.
 *
 * One engine per stream: the pending-importance counter belongs to it.
 */
export class ReflectionEngine {
  readonly threshold: number

  private readonly retriever: Retriever
  private readonly recorder: MemoryRecorder
  private readonly model: LanguageModel
  private readonly topK: number
  private readonly budget: number
  private readonly maxInsights: number
  private readonly planning: boolean
  private readonly timeoutMs: number | undefined
  private readonly logger: Logger
  private pending = 0

  constructor(options: ReflectionOptions) {
    this.retriever = options.retriever
    this.recorder = options.recorder
    this.model = options.model
    this.threshold = options.threshold ?? DEFAULT_REFLECTION_THRESHOLD
    this.topK = options.topK ?? DEFAULT_TOP_K
    this.budget = options.budget ?? DEFAULT_REFLECTION_BUDGET
    this.maxInsights = options.maxInsights ?? DEFAULT_MAX_INSIGHTS
    this.planning = options.planning ?? false
    this.timeoutMs = options.timeoutMs
    this.logger = options.logger ?? new TracingLogger()

    if (!(this.threshold > 0)) {
      throw new RangeError(`Reflection threshold must be positive, got ${this.threshold}`)
    }
  }

  get pendingImportance(): number {
    return this.pending
  }

  /** Count a newly recorded memory toward the next reflection. */
  observe(record: MemoryRecord): void {
    if (record.kind === "observation") {
      this.pending += record.importance
    }
  }

  /** Put the counter back to a value read earlier from `pendingImportance`. */
  restorePending(pending: number): void {
    if (!(pending >= 0)) {
      throw new RangeError(`Pending importance must be non-negative, got ${pending}`)
    }
    this.pending = pending
  }

  /**
   * Recompute the counter for a restored stream: the importance of every
   * observation recorded after the most recent reflection.
   */
  hydrate(stream: MemoryStream): void {
    const records = stream.all()
    let pending = 0
    for (let i = records.length - 1; i >= 0; i--) {
      const record = records[i]
      if (!record || record.kind === "reflection") break
      if (record.kind === "observation") pending += record.importance
    }
    this.pending = pending
  }

  isDue(): boolean {
    return this.pending >= this.threshold
  }

  async maybeReflect(stream: MemoryStream): Promise<ReflectionOutcome> {
    if (!this.isDue()) return nothing()
    return this.reflect(stream)
  }

  /**
   * Synthesize insights from the most salient records and write them back
   * as reflections. The counter resets only once reflections are written;
   * external failures propagate with the counter untouched.
   */
  async reflect(stream: MemoryStream): Promise<ReflectionOutcome> {
    return withSpan(
      "mnemos.memory.reflect",
      {
        [MemoryAttributes.AGENT_IDENTITY]: stream.identity,
        [MemoryAttributes.REFLECTION_PENDING]: this.pending,
      },
      async (span) => {
        const retrieval = await this.retriever.retrieve(stream, REFLECTIVE_QUERY, this.budget, {
          limit: this.topK,
        })
        const consulted = retrievedRecords(retrieval)
        if (consulted.length === 0) {
          this.logger.warn("Reflection found nothing to reflect on", { identity: stream.identity })
          return nothing()
        }

        const reflections = await this.synthesizeAndRecord(stream, consulted, "reflection")
        if (reflections.length === 0) {
          this.logger.warn("Reflection produced no insights", {
            identity: stream.identity,
            consulted: consulted.length,
          })
          return nothing()
        }

        this.pending = 0
        this.logger.info("Reflection written", {
          identity: stream.identity,
          consulted: consulted.length,
          reflectionIds: reflections.map((r) => r.id),
        })

        let plans: MemoryRecord[] = []
        let planningError: ExternalCallFailure | undefined
        if (this.planning) {
          try {
            plans = await this.synthesizeAndRecord(stream, reflections, "plan")
          } catch (err) {
            if (!(err instanceof ExternalCallFailure)) throw err
            // Reflections stay written; the caller decides what a failed plan means
            planningError = err
            this.logger.warn("Planning failed after reflection", {
              identity: stream.identity,
              ...errorFields(err),
            })
          }
        }

        span.setAttribute(MemoryAttributes.REFLECTION_CREATED, reflections.length + plans.length)
        return { reflections, plans, planningError }
      },
    )
  }

  private async synthesizeAndRecord(
    stream: MemoryStream,
    sources: readonly MemoryRecord[],
    mode: SynthesisMode,
  ): Promise<MemoryRecord[]> {
    const raw = await guardExternalCall(
      "synthesize",
      () => this.model.synthesize(sources, mode),
      this.timeoutMs,
    )
    const statements = cleanInsights(raw, this.maxInsights)
    if (statements.length === 0) return []

    const kind: MemoryKind = mode === "plan" ? "plan" : "reflection"
    const sourceIds = sources.map((r) => r.id)
    return this.recorder.recordAll(
      stream,
      statements.map((text) => ({ text, kind, sourceIds })),
    )
  }
}
