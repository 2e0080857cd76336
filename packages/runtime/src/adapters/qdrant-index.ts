import { createHash } from "node:crypto"

import type { MemoryRecord, VectorIndex, VectorMatch } from "@mnemos/engine"
import { QdrantClient } from "@qdrant/js-client-rest"

const COLLECTION_PREFIX = "mnemos_"
const READABLE_LENGTH = 64

interface IdentityFilter {
  must: { key: "identity"; match: { value: string } }[]
}

/** The slice of QdrantClient this index calls. */
export interface QdrantPointsClient {
  collectionExists(collectionName: string): Promise<{ exists: boolean }>
  createCollection(
    collectionName: string,
    args: { vectors: { size: number; distance: "Cosine" } },
  ): Promise<unknown>
  createPayloadIndex(
    collectionName: string,
    args: { field_name: string; field_schema: "keyword" },
  ): Promise<unknown>
  upsert(
    collectionName: string,
    args: {
      wait: boolean
      points: { id: number; vector: number[]; payload: Record<string, unknown> }[]
    },
  ): Promise<unknown>
  search(
    collectionName: string,
    args: { vector: number[]; limit: number; filter: IdentityFilter; with_payload: boolean },
  ): Promise<{ id: string | number; score: number }[]>
}

export interface QdrantVectorIndexOptions {
  url?: string
  apiKey?: string
  client?: QdrantPointsClient
}

/**
 * One collection per agent identity. The readable part only helps in the
 * Qdrant console; the sha256 suffix keeps identities that read alike apart.
 */
export function collectionNameFor(identity: string): string {
  const readable = identity.replace(/[^A-Za-z0-9_-]/g, "_").slice(0, READABLE_LENGTH)
  const digest = createHash("sha256").update(identity, "utf-8").digest("hex")
  return `${COLLECTION_PREFIX}${readable}_${digest}`
}

function identityFilter(identity: string): IdentityFilter {
  return { must: [{ key: "identity", match: { value: identity } }] }
}

/**
 * Nearest-neighbour pre-filter for retrieval. Point ids are the record ids,
 * and every point carries its owner's identity, which searches filter on.
 */
export class QdrantVectorIndex implements VectorIndex {
  readonly client: QdrantPointsClient

  private readonly ready = new Map<string, Promise<void>>()

  constructor(options: QdrantVectorIndexOptions = {}) {
    this.client =
      options.client ??
      new QdrantClient({
        url: options.url ?? process.env.QDRANT_URL ?? "http://localhost:6333",
        apiKey: options.apiKey ?? process.env.QDRANT_API_KEY,
      })
  }

  async upsert(identity: string, records: readonly MemoryRecord[]): Promise<void> {
    const first = records[0]
    if (!first) return

    const collection = collectionNameFor(identity)
    await this.ensureCollection(collection, first.embedding.length)
    await this.client.upsert(collection, {
      wait: true,
      points: records.map((record) => ({
        id: record.id,
        vector: [...record.embedding],
        payload: {
          identity,
          text: record.text,
          kind: record.kind,
          importance: record.importance,
          createdAt: record.createdAt,
        },
      })),
    })
  }

  async query(identity: string, vector: readonly number[], limit: number): Promise<VectorMatch[]> {
    const collection = collectionNameFor(identity)
    const { exists } = await this.client.collectionExists(collection)
    if (!exists) return []

    const results = await this.client.search(collection, {
      vector: [...vector],
      limit,
      filter: identityFilter(identity),
      with_payload: false,
    })

    const matches: VectorMatch[] = []
    for (const result of results) {
      const id = typeof result.id === "number" ? result.id : Number(result.id)
      if (Number.isInteger(id) && id > 0) matches.push({ id, similarity: result.score })
    }
    return matches
  }

  private ensureCollection(collection: string, size: number): Promise<void> {
    let pending = this.ready.get(collection)
    if (!pending) {
      pending = this.createIfMissing(collection, size)
      this.ready.set(collection, pending)
      // A failed check is retried on the next upsert
      void pending.catch(() => this.ready.delete(collection))
    }
    return pending
  }

  private async createIfMissing(collection: string, size: number): Promise<void> {
    const { exists } = await this.client.collectionExists(collection)
    if (exists) return
    await this.client.createCollection(collection, { vectors: { size, distance: "Cosine" } })
    await this.client.createPayloadIndex(collection, {
      field_name: "identity",
      field_schema: "keyword",
    })
  }
}
