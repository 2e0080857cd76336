import { SnapshotFormatError } from "../errors/index.js"
import {
  type SerializedMemoryRecord,
  SNAPSHOT_VERSION,
  type StreamSnapshot,
  StreamSnapshotSchema,
} from "./schemas.js"
import { MemoryStream } from "./stream.js"
import type { MemoryRecord } from "./types.js"

export function serializeRecord(record: MemoryRecord): SerializedMemoryRecord {
  return {
    id: record.id,
    text: record.text,
    embedding: [...record.embedding],
    kind: record.kind,
    importance: record.importance,
    createdAt: record.createdAt,
    lastAccessedAt: record.lastAccessedAt,
    sourceIds: [...record.sourceIds],
  }
}

export function serializeStream(stream: MemoryStream): StreamSnapshot {
  return {
    version: SNAPSHOT_VERSION,
    identity: stream.identity,
    records: stream.all().map(serializeRecord),
  }
}

/**
 * Validate a snapshot and rebuild its stream. Shape problems raise
 * SnapshotFormatError; broken stream invariants raise InvalidRecordError.
 */
export function restoreStream(data: unknown): MemoryStream {
  const parsed = StreamSnapshotSchema.safeParse(data)
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ")
    throw new SnapshotFormatError(`Invalid memory snapshot: ${issues}`)
  }
  return MemoryStream.restore(parsed.data.identity, parsed.data.records)
}

export function stringifySnapshot(stream: MemoryStream): string {
  return JSON.stringify(serializeStream(stream), null, 2) + "\n"
}

export function parseSnapshot(json: string): MemoryStream {
  let data: unknown
  try {
    data = JSON.parse(json)
  } catch (err) {
    throw new SnapshotFormatError(
      `Memory snapshot is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
    )
  }
  return restoreStream(data)
}
