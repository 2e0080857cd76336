import { InvalidRecordError, NotFoundError } from "../errors/index.js"
import { vectorNorm } from "./similarity.js"
import {
  type AccessUpdate,
  type ImportanceRange,
  MAX_IMPORTANCE,
  type MemoryChanges,
  type MemoryDraft,
  type MemoryRecord,
  MIN_IMPORTANCE,
} from "./types.js"

/** Point-in-time state that `MemoryStream.rollback` returns to. */
export interface StreamCheckpoint {
  readonly records: readonly MemoryRecord[]
  readonly dimension: number | undefined
  readonly range: ImportanceRange | undefined
  readonly journalInserted: readonly MemoryRecord[]
  readonly journalTouched: ReadonlyMap<number, number>
}

/**
 * Append-only, insertion-ordered memory store owned by one agent identity.
 *
 * Ids are assigned here and grow with `createdAt`, so a record can only
 * reference records that already exist: provenance is a DAG by construction.
 * Only `lastAccessedAt` ever changes after insert, and only forwards.
 */
export class MemoryStream {
  readonly identity: string

  private records: MemoryRecord[] = []
  private readonly byId = new Map<number, MemoryRecord>()
  private readonly norms = new Map<number, number>()
  private nextId = 1
  private dimension: number | undefined
  private range: ImportanceRange | undefined

  private journalInserted: MemoryRecord[] = []
  private journalTouched = new Map<number, number>()

  constructor(identity: string) {
    this.identity = identity
  }

  /**
   * Rebuild a stream from persisted records (ascending, contiguous ids from 1).
   * The change journal starts empty: restored records are already stored.
   */
  static restore(identity: string, records: readonly MemoryRecord[]): MemoryStream {
    const stream = new MemoryStream(identity)
    for (const record of records) {
      if (record.id !== stream.nextId) {
        throw new InvalidRecordError(
          `Restored record id ${record.id} out of sequence (expected ${stream.nextId})`,
        )
      }
      if (record.lastAccessedAt < record.createdAt) {
        throw new InvalidRecordError(
          `Restored record ${record.id} was accessed before it was created`,
        )
      }
      stream.append(record, record.lastAccessedAt)
    }
    stream.journalInserted = []
    return stream
  }

  get size(): number {
    return this.records.length
  }

  /** Embedding dimension, fixed by the first insert. */
  get embeddingDimension(): number | undefined {
    return this.dimension
  }

  /**
   * Insert a new record and return its id.
   * Throws InvalidRecordError on dangling sources, out-of-order timestamps,
   * or malformed fields.
   */
  insert(draft: MemoryDraft): number {
    const candidate: MemoryRecord = {
      ...draft,
      id: this.nextId,
      lastAccessedAt: draft.createdAt,
      sourceIds: draft.sourceIds ?? [],
    }
    return this.append(candidate, draft.createdAt).id
  }

  get(id: number): MemoryRecord {
    const record = this.byId.get(id)
    if (!record) throw new NotFoundError(id)
    return record
  }

  has(id: number): boolean {
    return this.byId.has(id)
  }

  latest(): MemoryRecord | undefined {
    return this.records[this.records.length - 1]
  }

  /** Records in insertion order. */
  all(): readonly MemoryRecord[] {
    return this.records
  }

  /**
   * Advance a record's access time. A timestamp older than the current
   * `lastAccessedAt` is rejected rather than clamped.
   */
  touch(id: number, timestamp: number): void {
    const record = this.get(id)
    if (!Number.isFinite(timestamp)) {
      throw new InvalidRecordError(`Access time for record ${id} must be finite`)
    }
    if (timestamp < record.lastAccessedAt) {
      throw new InvalidRecordError(
        `Access time for record ${id} would move backwards (${timestamp} < ${record.lastAccessedAt})`,
      )
    }

    const touched = Object.freeze({ ...record, lastAccessedAt: timestamp })
    const index = id - 1
    this.records[index] = touched
    this.byId.set(id, touched)
    this.journalTouched.set(id, timestamp)
  }

  importanceRange(): ImportanceRange | undefined {
    return this.range
  }

  /** Cached Euclidean norm of a record's embedding. */
  norm(id: number): number {
    const norm = this.norms.get(id)
    if (norm === undefined) throw new NotFoundError(id)
    return norm
  }

  /** Drain the change journal (inserts and touches since the last call). */
  takeChanges(): MemoryChanges {
    const inserted = this.journalInserted
    const insertedIds = new Set(inserted.map((r) => r.id))

    // A record inserted and touched in the same window is reported once, current
    const current = inserted.map((r) => this.get(r.id))
    const touched: AccessUpdate[] = []
    for (const [id, lastAccessedAt] of this.journalTouched) {
      if (!insertedIds.has(id)) touched.push({ id, lastAccessedAt })
    }

    this.journalInserted = []
    this.journalTouched = new Map()
    return { inserted: current, touched }
  }

  checkpoint(): StreamCheckpoint {
    return {
      records: [...this.records],
      dimension: this.dimension,
      range: this.range,
      journalInserted: [...this.journalInserted],
      journalTouched: new Map(this.journalTouched),
    }
  }

  /**
   * Discard every insert and touch made since `checkpoint` was taken,
   * journal included. Ids handed out since then are assigned again.
   */
  rollback(checkpoint: StreamCheckpoint): void {
    const kept = checkpoint.records
    if (kept.length > this.records.length) {
      throw new RangeError(
        `Checkpoint holds ${kept.length} records but the stream only has ${this.records.length}`,
      )
    }

    for (const record of this.records.slice(kept.length)) {
      this.byId.delete(record.id)
      this.norms.delete(record.id)
    }
    this.records = [...kept]
    for (const record of kept) this.byId.set(record.id, record)

    this.nextId = kept.length + 1
    this.dimension = checkpoint.dimension
    this.range = checkpoint.range
    this.journalInserted = [...checkpoint.journalInserted]
    this.journalTouched = new Map(checkpoint.journalTouched)
  }

  private append(candidate: MemoryRecord, lastAccessedAt: number): MemoryRecord {
    this.validate(candidate)

    const record: MemoryRecord = Object.freeze({
      id: candidate.id,
      text: candidate.text,
      embedding: Object.freeze([...candidate.embedding]),
      kind: candidate.kind,
      importance: candidate.importance,
      createdAt: candidate.createdAt,
      lastAccessedAt,
      sourceIds: Object.freeze([...new Set(candidate.sourceIds)]),
    })

    this.records.push(record)
    this.byId.set(record.id, record)
    this.norms.set(record.id, vectorNorm(record.embedding))
    this.dimension ??= record.embedding.length
    this.range = this.range
      ? {
          min: Math.min(this.range.min, record.importance),
          max: Math.max(this.range.max, record.importance),
        }
      : { min: record.importance, max: record.importance }
    this.nextId = record.id + 1
    this.journalInserted.push(record)
    return record
  }

  private validate(record: MemoryRecord): void {
    if (record.text.trim().length === 0) {
      throw new InvalidRecordError("Memory text must not be empty")
    }

    if (
      !Number.isInteger(record.importance) ||
      record.importance < MIN_IMPORTANCE ||
      record.importance > MAX_IMPORTANCE
    ) {
      throw new InvalidRecordError(
        `Importance must be an integer in [${MIN_IMPORTANCE}, ${MAX_IMPORTANCE}], got ${record.importance}`,
      )
    }

    if (record.embedding.length === 0 || !record.embedding.every(Number.isFinite)) {
      throw new InvalidRecordError("Embedding must be a non-empty vector of finite numbers")
    }
    if (this.dimension !== undefined && record.embedding.length !== this.dimension) {
      throw new InvalidRecordError(
        `Embedding dimension ${record.embedding.length} does not match stream dimension ${this.dimension}`,
      )
    }

    if (!Number.isFinite(record.createdAt)) {
      throw new InvalidRecordError("createdAt must be a finite timestamp")
    }
    const latest = this.latest()
    if (latest && record.createdAt < latest.createdAt) {
      throw new InvalidRecordError(
        `createdAt ${record.createdAt} precedes latest record ${latest.id} (${latest.createdAt})`,
      )
    }

    for (const sourceId of record.sourceIds) {
      if (!this.byId.has(sourceId)) {
        throw new InvalidRecordError(`Source record ${sourceId} does not exist`)
      }
    }
  }
}
