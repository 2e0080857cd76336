import { describe, expect, it } from "vitest"

import { InvalidRecordError, NotFoundError } from "../errors/index.js"
import { MemoryStream } from "../memory/stream.js"
import type { MemoryDraft } from "../memory/types.js"
import { HOUR, T0 } from "./helpers.js"

function draft(overrides: Partial<MemoryDraft> = {}): MemoryDraft {
  return {
    text: "Alice likes green tea",
    embedding: [1, 0, 0],
    kind: "observation",
    importance: 5,
    createdAt: T0,
    ...overrides,
  }
}

describe("MemoryStream.insert", () => {
  it("assigns ascending ids starting at 1", () => {
    const stream = new MemoryStream("agent-1")
    expect(stream.insert(draft())).toBe(1)
    expect(stream.insert(draft())).toBe(2)
    expect(stream.insert(draft())).toBe(3)
    expect(stream.size).toBe(3)
  })

  it("initialises lastAccessedAt to createdAt and defaults sourceIds to empty", () => {
    const stream = new MemoryStream("agent-1")
    const id = stream.insert(draft({ createdAt: T0 + 500 }))
    const record = stream.get(id)
    expect(record.lastAccessedAt).toBe(T0 + 500)
    expect(record.sourceIds).toEqual([])
  })

  it("stores a frozen copy with duplicate sources removed", () => {
    const stream = new MemoryStream("agent-1")
    stream.insert(draft())
    const embedding = [0, 1, 0]
    const id = stream.insert(draft({ kind: "reflection", embedding, sourceIds: [1, 1] }))
    embedding[0] = 9

    const record = stream.get(id)
    expect(record.embedding).toEqual([0, 1, 0])
    expect(record.sourceIds).toEqual([1])
    expect(Object.isFrozen(record)).toBe(true)
  })

  it("rejects sources that do not exist", () => {
    const stream = new MemoryStream("agent-1")
    stream.insert(draft())
    expect(() => stream.insert(draft({ kind: "reflection", sourceIds: [1, 42] }))).toThrow(
      InvalidRecordError,
    )
    expect(stream.size).toBe(1)
  })

  it("rejects blank text", () => {
    const stream = new MemoryStream("agent-1")
    expect(() => stream.insert(draft({ text: "   " }))).toThrow("Memory text must not be empty")
  })

  it.each([0, 11, 2.5, Number.NaN])("rejects importance %s", (importance) => {
    const stream = new MemoryStream("agent-1")
    expect(() => stream.insert(draft({ importance }))).toThrow(InvalidRecordError)
  })

  it("fixes the embedding dimension on first insert", () => {
    const stream = new MemoryStream("agent-1")
    expect(stream.embeddingDimension).toBeUndefined()
    stream.insert(draft())
    expect(stream.embeddingDimension).toBe(3)
    expect(() => stream.insert(draft({ embedding: [1, 0] }))).toThrow(
      "Embedding dimension 2 does not match stream dimension 3",
    )
  })

  it("rejects empty or non-finite embeddings", () => {
    const stream = new MemoryStream("agent-1")
    expect(() => stream.insert(draft({ embedding: [] }))).toThrow(InvalidRecordError)
    expect(() => stream.insert(draft({ embedding: [1, Number.POSITIVE_INFINITY, 0] }))).toThrow(
      InvalidRecordError,
    )
  })

  it("rejects a createdAt earlier than the latest record", () => {
    const stream = new MemoryStream("agent-1")
    stream.insert(draft({ createdAt: T0 + HOUR }))
    expect(() => stream.insert(draft({ createdAt: T0 }))).toThrow(InvalidRecordError)
  })

  it("tracks the importance range", () => {
    const stream = new MemoryStream("agent-1")
    expect(stream.importanceRange()).toBeUndefined()
    stream.insert(draft({ importance: 2 }))
    stream.insert(draft({ importance: 8 }))
    stream.insert(draft({ importance: 5 }))
    expect(stream.importanceRange()).toEqual({ min: 2, max: 8 })
  })
})

describe("MemoryStream lookups", () => {
  it("throws NotFoundError for unknown ids", () => {
    const stream = new MemoryStream("agent-1")
    expect(() => stream.get(7)).toThrow(NotFoundError)
    expect(stream.has(7)).toBe(false)
  })

  it("caches embedding norms", () => {
    const stream = new MemoryStream("agent-1")
    const id = stream.insert(draft({ embedding: [3, 4, 0] }))
    expect(stream.norm(id)).toBe(5)
  })
})

describe("MemoryStream.touch", () => {
  it("advances lastAccessedAt without changing the old record object", () => {
    const stream = new MemoryStream("agent-1")
    const id = stream.insert(draft())
    const before = stream.get(id)

    stream.touch(id, T0 + HOUR)

    expect(stream.get(id).lastAccessedAt).toBe(T0 + HOUR)
    expect(before.lastAccessedAt).toBe(T0)
    expect(stream.get(id).createdAt).toBe(T0)
  })

  it("rejects access times that move backwards", () => {
    const stream = new MemoryStream("agent-1")
    const id = stream.insert(draft())
    stream.touch(id, T0 + HOUR)
    expect(() => stream.touch(id, T0 + 1)).toThrow(InvalidRecordError)
    expect(stream.get(id).lastAccessedAt).toBe(T0 + HOUR)
  })

  it("accepts the same access time again", () => {
    const stream = new MemoryStream("agent-1")
    const id = stream.insert(draft())
    stream.touch(id, T0)
    expect(stream.get(id).lastAccessedAt).toBe(T0)
  })
})

describe("MemoryStream change journal", () => {
  it("reports a record inserted and touched in one window once, as it is now", () => {
    const stream = new MemoryStream("agent-1")
    stream.insert(draft())
    stream.insert(draft({ text: "Bob plays chess" }))
    stream.touch(1, T0 + HOUR)

    const changes = stream.takeChanges()
    expect(changes.inserted.map((r) => [r.id, r.lastAccessedAt])).toEqual([
      [1, T0 + HOUR],
      [2, T0],
    ])
    expect(changes.touched).toEqual([])
  })

  it("drains on take and reports later touches separately", () => {
    const stream = new MemoryStream("agent-1")
    stream.insert(draft())
    stream.takeChanges()

    expect(stream.takeChanges()).toEqual({ inserted: [], touched: [] })

    stream.touch(1, T0 + 2 * HOUR)
    expect(stream.takeChanges()).toEqual({
      inserted: [],
      touched: [{ id: 1, lastAccessedAt: T0 + 2 * HOUR }],
    })
  })
})

describe("MemoryStream.rollback", () => {
  it("discards inserts and touches made after the checkpoint", () => {
    const stream = new MemoryStream("agent-1")
    stream.insert(draft({ importance: 4 }))
    stream.takeChanges()
    const checkpoint = stream.checkpoint()
    const before = [...stream.all()]

    stream.touch(1, T0 + HOUR)
    stream.insert(draft({ text: "Bob plays chess", importance: 9, createdAt: T0 + HOUR }))
    stream.rollback(checkpoint)

    expect(stream.all()).toEqual(before)
    expect(stream.has(2)).toBe(false)
    expect(() => stream.norm(2)).toThrow(NotFoundError)
    expect(stream.importanceRange()).toEqual({ min: 4, max: 4 })
    expect(stream.takeChanges()).toEqual({ inserted: [], touched: [] })
    expect(stream.insert(draft({ text: "Bob plays go" }))).toBe(2)
  })

  it("restores the journal as it stood at the checkpoint", () => {
    const stream = new MemoryStream("agent-1")
    stream.insert(draft())
    const checkpoint = stream.checkpoint()

    stream.takeChanges()
    stream.rollback(checkpoint)

    expect(stream.takeChanges().inserted.map((r) => r.id)).toEqual([1])
  })

  it("lets an emptied stream take a new embedding dimension", () => {
    const stream = new MemoryStream("agent-1")
    const checkpoint = stream.checkpoint()
    stream.insert(draft({ embedding: [1, 0, 0] }))

    stream.rollback(checkpoint)

    expect(stream.size).toBe(0)
    expect(stream.embeddingDimension).toBeUndefined()
    expect(stream.importanceRange()).toBeUndefined()
    expect(stream.insert(draft({ embedding: [1, 0] }))).toBe(1)
  })

  it("refuses a checkpoint holding more records than the stream", () => {
    const stream = new MemoryStream("agent-1")
    stream.insert(draft())
    const checkpoint = stream.checkpoint()
    stream.rollback(new MemoryStream("agent-1").checkpoint())

    expect(() => stream.rollback(checkpoint)).toThrow(
      "Checkpoint holds 1 records but the stream only has 0",
    )
  })
})

describe("MemoryStream.restore", () => {
  it("rebuilds records with an empty journal", () => {
    const original = new MemoryStream("agent-1")
    original.insert(draft({ importance: 3 }))
    original.insert(draft({ importance: 9, createdAt: T0 + HOUR }))
    original.touch(1, T0 + 2 * HOUR)

    const restored = MemoryStream.restore("agent-1", original.all())

    expect(restored.all()).toEqual(original.all())
    expect(restored.importanceRange()).toEqual({ min: 3, max: 9 })
    expect(restored.takeChanges()).toEqual({ inserted: [], touched: [] })
    expect(restored.insert(draft({ createdAt: T0 + HOUR }))).toBe(3)
  })

  it("rejects ids that are not contiguous from 1", () => {
    const original = new MemoryStream("agent-1")
    original.insert(draft())
    original.insert(draft())
    const [, second] = original.all()
    expect(() => MemoryStream.restore("agent-1", second ? [second] : [])).toThrow(
      "Restored record id 2 out of sequence (expected 1)",
    )
  })
})
