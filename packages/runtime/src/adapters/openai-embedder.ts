import type { Embedder } from "@mnemos/engine"
import OpenAI from "openai"

/** The slice of the OpenAI SDK this adapter calls. */
export interface EmbeddingsClient {
  embeddings: {
    create(params: { model: string; input: string }): Promise<{
      data: { embedding: number[] }[]
    }>
  }
}

export interface OpenAIEmbedderOptions {
  apiKey?: string
  model?: string
  baseUrl?: string
  /** Pre-built client; takes precedence over apiKey/baseUrl. */
  client?: EmbeddingsClient
  /** Max cached vectors per process; 0 disables the cache. */
  cacheSize?: number
}

const DEFAULT_EMBEDDING_MODEL = "text-embedding-3-small"
const DEFAULT_CACHE_SIZE = 1_000

/** Newlines degrade embedding quality for some models. */
export function normalizeEmbeddingInput(text: string): string {
  return text.replace(/\n+/g, " ")
}

export class OpenAIEmbedder implements Embedder {
  readonly model: string

  private readonly client: EmbeddingsClient
  private readonly cacheSize: number
  // Map iteration order doubles as LRU order
  private readonly cache = new Map<string, number[]>()

  constructor(options: OpenAIEmbedderOptions = {}) {
    this.model = options.model ?? DEFAULT_EMBEDDING_MODEL
    this.cacheSize = options.cacheSize ?? DEFAULT_CACHE_SIZE
    this.client =
      options.client ??
      new OpenAI({
        apiKey: options.apiKey ?? process.env.EMBEDDING_API_KEY ?? process.env.OPENAI_API_KEY,
        ...(options.baseUrl ? { baseURL: options.baseUrl } : {}),
      })
  }

  async embed(text: string): Promise<number[]> {
    const input = normalizeEmbeddingInput(text)
    const cached = this.cache.get(input)
    if (cached) {
      this.cache.delete(input)
      this.cache.set(input, cached)
      return [...cached]
    }

    const response = await this.client.embeddings.create({ model: this.model, input })
    const vector = response.data[0]?.embedding
    if (!vector || vector.length === 0) {
      throw new Error(`Embedding response for model ${this.model} held no vector`)
    }

    this.remember(input, vector)
    return [...vector]
  }

  private remember(input: string, vector: number[]): void {
    if (this.cacheSize <= 0) return
    this.cache.set(input, vector)
    if (this.cache.size > this.cacheSize) {
      const oldest = this.cache.keys().next()
      if (!oldest.done) this.cache.delete(oldest.value)
    }
  }
}
