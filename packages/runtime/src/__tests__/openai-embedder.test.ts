import { describe, expect, it, vi } from "vitest"

import {
  type EmbeddingsClient,
  normalizeEmbeddingInput,
  OpenAIEmbedder,
} from "../adapters/openai-embedder.js"

function fakeClient(vector: number[] = [0.1, 0.2, 0.3]) {
  const create = vi.fn<EmbeddingsClient["embeddings"]["create"]>(async () => ({
    data: [{ embedding: [...vector] }],
  }))
  return { create, client: { embeddings: { create } } }
}

describe("normalizeEmbeddingInput", () => {
  it("replaces runs of newlines with a space", () => {
    expect(normalizeEmbeddingInput("Bob:\n\nHi\nthere")).toBe("Bob: Hi there")
  })
})

describe("OpenAIEmbedder", () => {
  it("embeds normalized text with the configured model", async () => {
    const { create, client } = fakeClient()
    const embedder = new OpenAIEmbedder({ client, model: "text-embedding-3-large" })

    await expect(embedder.embed("Bob:\nHi")).resolves.toEqual([0.1, 0.2, 0.3])
    expect(create).toHaveBeenCalledWith({ model: "text-embedding-3-large", input: "Bob: Hi" })
  })

  it("serves repeated text from the cache as fresh copies", async () => {
    const { create, client } = fakeClient()
    const embedder = new OpenAIEmbedder({ client })

    const first = await embedder.embed("Bob likes tea")
    first[0] = 99
    const second = await embedder.embed("Bob likes tea")

    expect(second).toEqual([0.1, 0.2, 0.3])
    expect(create).toHaveBeenCalledTimes(1)
  })

  it("evicts the least recently used entry", async () => {
    const { create, client } = fakeClient()
    const embedder = new OpenAIEmbedder({ client, cacheSize: 1 })

    await embedder.embed("a")
    await embedder.embed("b")
    await embedder.embed("a")

    expect(create).toHaveBeenCalledTimes(3)
  })

  it("does not cache with a cache size of 0", async () => {
    const { create, client } = fakeClient()
    const embedder = new OpenAIEmbedder({ client, cacheSize: 0 })

    await embedder.embed("a")
    await embedder.embed("a")

    expect(create).toHaveBeenCalledTimes(2)
  })

  it("rejects a response without a vector", async () => {
    const client: EmbeddingsClient = { embeddings: { create: async () => ({ data: [] }) } }
    const embedder = new OpenAIEmbedder({ client })

    await expect(embedder.embed("a")).rejects.toThrow(
      "Embedding response for model text-embedding-3-small held no vector",
    )
  })
})
