import type { Embedder, LanguageModel } from "../adapters/types.js"
import { ExternalCallFailure, guardExternalCall, InvalidRecordError } from "../errors/index.js"
import type { MemoryStream } from "./stream.js"
import { MAX_IMPORTANCE, type MemoryKind, type MemoryRecord, MIN_IMPORTANCE } from "./types.js"

export interface MemoryRequest {
  text: string
  kind: MemoryKind
  sourceIds?: readonly number[]
  /** Skip elicitation and use this importance (seeded facts, imports). */
  importance?: number
}

/** A memory whose external fields are all present, ready to insert. */
export interface PreparedMemory {
  text: string
  kind: MemoryKind
  sourceIds: readonly number[]
  embedding: number[]
  importance: number
}

export interface MemoryRecorderOptions {
  embedder: Embedder
  model: LanguageModel
  /** Deadline per external call (ms). Unlimited when omitted. */
  timeoutMs?: number
  clock?: () => number
}

/**
 * Creates memory records all-or-nothing: the embedding and importance are
 * fetched concurrently, and nothing touches the stream unless both arrive
 * and are well formed.
 */
export class MemoryRecorder {
  private readonly embedder: Embedder
  private readonly model: LanguageModel
  private readonly timeoutMs: number | undefined
  private readonly clock: () => number

  constructor(options: MemoryRecorderOptions) {
    this.embedder = options.embedder
    this.model = options.model
    this.timeoutMs = options.timeoutMs
    this.clock = options.clock ?? Date.now
  }

  async prepare(stream: MemoryStream, request: MemoryRequest): Promise<PreparedMemory> {
    const [embedding, importance] = await Promise.all([
      guardExternalCall("embed", () => this.embedder.embed(request.text), this.timeoutMs),
      request.importance !== undefined
        ? Promise.resolve(request.importance)
        : guardExternalCall(
            "scoreImportance",
            () => this.model.scoreImportance(request.text),
            this.timeoutMs,
          ),
    ])

    const dimension = stream.embeddingDimension
    if (embedding.length === 0 || (dimension !== undefined && embedding.length !== dimension)) {
      throw new ExternalCallFailure(
        "embed",
        `expected a ${dimension ?? "non-empty"}-dimension vector, got ${embedding.length}`,
        { retryable: false },
      )
    }
    if (!Number.isInteger(importance) || importance < MIN_IMPORTANCE || importance > MAX_IMPORTANCE) {
      throw new ExternalCallFailure("scoreImportance", `out-of-range importance ${importance}`, {
        retryable: false,
      })
    }

    return {
      text: request.text,
      kind: request.kind,
      sourceIds: request.sourceIds ?? [],
      embedding,
      importance,
    }
  }

  /**
   * Insert prepared memories with one shared creation time. Creation time
   * never falls behind the stream's latest record.
   */
  commit(stream: MemoryStream, prepared: readonly PreparedMemory[]): MemoryRecord[] {
    const latest = stream.latest()
    const createdAt = Math.max(this.clock(), latest?.createdAt ?? -Infinity)

    // Check provenance up front so a batch never lands half-written
    for (const memory of prepared) {
      const missing = memory.sourceIds.find((id) => !stream.has(id))
      if (missing !== undefined) {
        throw new InvalidRecordError(`Source record ${missing} does not exist`)
      }
    }

    return prepared.map((memory) => {
      const id = stream.insert({ ...memory, createdAt })
      return stream.get(id)
    })
  }

  async record(stream: MemoryStream, request: MemoryRequest): Promise<MemoryRecord> {
    const prepared = await this.prepare(stream, request)
    const [record] = this.commit(stream, [prepared])
    if (!record) throw new Error("commit returned no record")
    return record
  }

  /** Prepare several memories concurrently; insert them only if all succeed. */
  async recordAll(stream: MemoryStream, requests: readonly MemoryRequest[]): Promise<MemoryRecord[]> {
    const prepared = await Promise.all(requests.map((request) => this.prepare(stream, request)))
    return this.commit(stream, prepared)
  }
}
