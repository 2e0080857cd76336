import { z } from "zod"

import { MAX_IMPORTANCE, MIN_IMPORTANCE } from "./types.js"

// ──────────────────────────────────────────────────
// Persisted memory record
// ──────────────────────────────────────────────────

export const MemoryKindSchema = z.enum(["observation", "reflection", "plan"])

export const SerializedMemoryRecordSchema = z.object({
  id: z.number().int().positive(),
  text: z.string().min(1),
  embedding: z.array(z.number().finite()).min(1),
  kind: MemoryKindSchema,
  importance: z.number().int().min(MIN_IMPORTANCE).max(MAX_IMPORTANCE),
  createdAt: z.number().finite(),
  lastAccessedAt: z.number().finite(),
  sourceIds: z.array(z.number().int().positive()),
})

export type SerializedMemoryRecord = z.infer<typeof SerializedMemoryRecordSchema>

// ──────────────────────────────────────────────────
// Whole-stream snapshot
// ──────────────────────────────────────────────────

export const SNAPSHOT_VERSION = 1

export const StreamSnapshotSchema = z.object({
  version: z.literal(SNAPSHOT_VERSION),
  identity: z.string().min(1),
  records: z.array(SerializedMemoryRecordSchema),
})

export type StreamSnapshot = z.infer<typeof StreamSnapshotSchema>
