/**
 * MemoryStreamRepository backed by Kysely / PostgreSQL.
 *
 * Rows are keyed by (agent_identity, id). Saves are idempotent: re-sent
 * inserts are ignored and access times only ever move forward.
 */

import {
  type MemoryChanges,
  type MemoryRecord,
  type MemoryStreamRepository,
  SerializedMemoryRecordSchema,
} from "@mnemos/engine"
import type { Kysely } from "kysely"

import type { Database, MemoryRecordRow, NewMemoryRecordRow } from "../db/types.js"

export function recordToRow(identity: string, record: MemoryRecord): NewMemoryRecordRow {
  return {
    agent_identity: identity,
    id: record.id,
    text: record.text,
    embedding: [...record.embedding],
    kind: record.kind,
    importance: record.importance,
    created_at: record.createdAt,
    last_accessed_at: record.lastAccessedAt,
    source_ids: [...record.sourceIds],
  }
}

export function rowToRecord(row: MemoryRecordRow): MemoryRecord {
  return SerializedMemoryRecordSchema.parse({
    id: row.id,
    text: row.text,
    embedding: row.embedding,
    kind: row.kind,
    importance: row.importance,
    createdAt: Number(row.created_at),
    lastAccessedAt: Number(row.last_accessed_at),
    sourceIds: row.source_ids,
  })
}

export class PostgresMemoryRepository implements MemoryStreamRepository {
  constructor(private readonly db: Kysely<Database>) {}

  async load(identity: string): Promise<MemoryRecord[]> {
    const rows = await this.db
      .selectFrom("memory_record")
      .selectAll()
      .where("agent_identity", "=", identity)
      .orderBy("id", "asc")
      .execute()

    return rows.map(rowToRecord)
  }

  async save(identity: string, changes: MemoryChanges): Promise<void> {
    if (changes.inserted.length === 0 && changes.touched.length === 0) return

    await this.db.transaction().execute(async (trx) => {
      if (changes.inserted.length > 0) {
        await trx
          .insertInto("memory_record")
          .values(changes.inserted.map((record) => recordToRow(identity, record)))
          .onConflict((oc) => oc.columns(["agent_identity", "id"]).doNothing())
          .execute()
      }

      for (const update of changes.touched) {
        await trx
          .updateTable("memory_record")
          .set({ last_accessed_at: update.lastAccessedAt })
          .where("agent_identity", "=", identity)
          .where("id", "=", update.id)
          // BIGINT columns compare as their selected (string) form
          .where("last_accessed_at", "<", String(update.lastAccessedAt))
          .execute()
      }
    })
  }
}
