/**
 * In-process stand-ins for the runtime's external collaborators.
 */

import type { Embedder, LanguageModel, Logger } from "@mnemos/engine"
import { MemoryStream } from "@mnemos/engine"
import { vi } from "vitest"

export const T0 = 1_700_000_000_000

export function createSilentLogger(): Logger & {
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

export class FixedEmbedder implements Embedder {
  async embed(): Promise<number[]> {
    return [1, 0, 0]
  }
}

export class ScriptedModel implements LanguageModel {
  constructor(private readonly reply: string = "Hello Bob") {}

  async complete(): Promise<string> {
    return this.reply
  }

  async scoreImportance(): Promise<number> {
    return 5
  }

  async synthesize(): Promise<string[]> {
    return []
  }
}

/** A stream of `count` observations one second apart, starting at T0. */
export function observationStream(identity: string, count: number): MemoryStream {
  const stream = new MemoryStream(identity)
  for (let i = 0; i < count; i++) {
    stream.insert({
      text: `observation ${i + 1}`,
      embedding: [1, 0, 0],
      kind: "observation",
      importance: 3,
      createdAt: T0 + i * 1_000,
    })
  }
  return stream
}
