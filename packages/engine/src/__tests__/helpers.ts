/**
 * Deterministic stand-ins for the engine's external collaborators.
 */

import { vi } from "vitest"

import type { Embedder, LanguageModel, SynthesisMode } from "../adapters/types.js"
import type { Logger } from "../tracing/logger.js"
import type { MemoryRecord } from "../memory/types.js"

export const T0 = 1_700_000_000_000
export const HOUR = 3_600_000

/** Looks vectors up by exact text; anything unknown embeds to `fallback`. */
export class StubEmbedder implements Embedder {
  readonly calls: string[] = []

  constructor(
    private readonly vectors: Record<string, number[]> = {},
    private readonly fallback: number[] = [1, 1, 1],
  ) {}

  async embed(text: string): Promise<number[]> {
    this.calls.push(text)
    return [...(this.vectors[text] ?? this.fallback)]
  }
}

export interface StubModelOptions {
  importance?: Record<string, number>
  defaultImportance?: number
  reply?: string
  insights?: string[]
  plans?: string[]
}

export class StubModel implements LanguageModel {
  readonly prompts: string[] = []
  readonly synthesized: { ids: number[]; mode: SynthesisMode }[] = []

  constructor(private readonly options: StubModelOptions = {}) {}

  async complete(prompt: string): Promise<string> {
    this.prompts.push(prompt)
    return this.options.reply ?? "ok"
  }

  async scoreImportance(text: string): Promise<number> {
    return this.options.importance?.[text] ?? this.options.defaultImportance ?? 5
  }

  async synthesize(records: readonly MemoryRecord[], mode: SynthesisMode): Promise<string[]> {
    this.synthesized.push({ ids: records.map((r) => r.id), mode })
    return mode === "plan" ? (this.options.plans ?? []) : (this.options.insights ?? [])
  }
}

export function createSilentLogger(): Logger & {
  debug: ReturnType<typeof vi.fn>
  info: ReturnType<typeof vi.fn>
  warn: ReturnType<typeof vi.fn>
  error: ReturnType<typeof vi.fn>
} {
  const logger = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child: (): Logger => logger,
  }
  return logger
}

/** A settable clock. */
export function createClock(start: number = T0): { now: () => number; set: (t: number) => void } {
  let current = start
  return {
    now: () => current,
    set: (t: number) => {
      current = t
    },
  }
}
