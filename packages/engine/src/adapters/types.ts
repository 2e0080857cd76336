/**
 * Contracts for the engine's external collaborators.
 *
 * Production implementations live in @mnemos/runtime; tests pass
 * deterministic stand-ins. Every call here is an I/O boundary and is
 * invoked through guardExternalCall.
 */

import type { MemoryChanges, MemoryRecord } from "../memory/types.js"

export interface Embedder {
  /** Fixed-dimension vector; identical text must yield (near-)identical vectors. */
  embed(text: string): Promise<number[]>
}

export type SynthesisMode = "reflection" | "plan"

export interface LanguageModel {
  complete(prompt: string, maxTokens: number): Promise<string>
  /** Integer salience rating in [1, 10]. */
  scoreImportance(text: string): Promise<number>
  /** A small number of higher-level statements drawn from the given records. */
  synthesize(records: readonly MemoryRecord[], mode: SynthesisMode): Promise<string[]>
}

export interface TokenCounter {
  count(text: string): number
}

export interface VectorMatch {
  id: number
  similarity: number
}

export interface VectorIndex {
  upsert(identity: string, records: readonly MemoryRecord[]): Promise<void>
  query(identity: string, vector: readonly number[], limit: number): Promise<VectorMatch[]>
}

export interface MemoryStreamRepository {
  /** Records for an identity in ascending id order; empty when none stored. */
  load(identity: string): Promise<MemoryRecord[]>
  save(identity: string, changes: MemoryChanges): Promise<void>
}
