import type { MemoryKind } from "@mnemos/engine"
import type { ColumnType, Insertable, Selectable } from "kysely"

// Epoch milliseconds are stored as BIGINT; pg hands those back as strings.
type EpochMillis = ColumnType<string, number, number>

// ---------------------------------------------------------------------------
// Table: memory_record
// ---------------------------------------------------------------------------
export interface MemoryRecordTable {
  agent_identity: string
  id: number
  text: string
  embedding: ColumnType<number[], number[], never>
  kind: ColumnType<MemoryKind, MemoryKind, never>
  importance: number
  created_at: ColumnType<string, number, never>
  last_accessed_at: EpochMillis
  source_ids: ColumnType<number[], number[], never>
}

export type MemoryRecordRow = Selectable<MemoryRecordTable>
export type NewMemoryRecordRow = Insertable<MemoryRecordTable>

// ---------------------------------------------------------------------------
// Database
// ---------------------------------------------------------------------------
export interface Database {
  memory_record: MemoryRecordTable
}
