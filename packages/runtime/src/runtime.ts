/**
 * Wires a ConversationManager from configuration: adapters, persistence,
 * optional vector index, logging and tracing.
 */

import {
  ConversationManager,
  type Embedder,
  errorFields,
  type LanguageModel,
  type Logger,
  type MemoryStreamRepository,
  Scorer,
  type TokenCounter,
  TracingLogger,
  type VectorIndex,
} from "@mnemos/engine"
import type { Kysely } from "kysely"

import { HttpLanguageModel } from "./adapters/http-language-model.js"
import { OpenAIEmbedder } from "./adapters/openai-embedder.js"
import { QdrantVectorIndex } from "./adapters/qdrant-index.js"
import { TiktokenCounter } from "./adapters/tiktoken-counter.js"
import type { Config } from "./config.js"
import { createDatabase } from "./db/index.js"
import { type MigrationPool, runMigrations } from "./db/migrate.js"
import type { Database } from "./db/types.js"
import { JsonFileMemoryRepository } from "./persistence/json-file-repository.js"
import { PostgresMemoryRepository } from "./persistence/postgres-repository.js"
import { initTracing, shutdownTracing } from "./tracing.js"

/** An open connection the runtime migrates, reads and writes through, then closes. */
export interface RuntimeDatabase {
  db: Kysely<Database>
  pool: MigrationPool
}

/** Replacements for the configured collaborators. */
export interface RuntimeOverrides {
  /** Used in place of a pool opened from `DATABASE_URL`. */
  database?: RuntimeDatabase
  embedder?: Embedder
  model?: LanguageModel
  counter?: TokenCounter
  vectorIndex?: VectorIndex
  repository?: MemoryStreamRepository
  logger?: Logger
  clock?: () => number
}

export interface AgentRuntime {
  manager: ConversationManager
  repository: MemoryStreamRepository
  logger: Logger
  /** Flush tracing and close the database pool, if any. */
  close(): Promise<void>
}

export async function createAgentRuntime(
  config: Config,
  overrides: RuntimeOverrides = {},
): Promise<AgentRuntime> {
  const tracing = initTracing(config.tracing)
  const logger = overrides.logger ?? new TracingLogger({ level: config.logLevel })

  const closers: (() => Promise<void>)[] = []
  if (tracing) closers.push(shutdownTracing)

  try {
    const wired = await wire(config, overrides, logger, closers)
    return {
      ...wired,
      logger,
      async close() {
        for (const close of [...closers].reverse()) await close()
      },
    }
  } catch (err) {
    logger.error("Agent runtime failed to start", errorFields(err))
    for (const close of [...closers].reverse()) {
      try {
        await close()
      } catch (closeErr) {
        logger.warn("Closing after a failed start also failed", errorFields(closeErr))
      }
    }
    throw err
  }
}

async function wire(
  config: Config,
  overrides: RuntimeOverrides,
  logger: Logger,
  closers: (() => Promise<void>)[],
): Promise<Pick<AgentRuntime, "manager" | "repository">> {
  let repository = overrides.repository
  let persistence = repository ? "custom" : "json"
  if (!repository) {
    const database =
      overrides.database ?? (config.databaseUrl ? createDatabase(config.databaseUrl) : undefined)
    if (database) {
      const { db, pool } = database
      closers.push(() => db.destroy())
      await runMigrations(pool, { logger })
      repository = new PostgresMemoryRepository(db)
      persistence = "postgres"
    }
  }
  repository ??= new JsonFileMemoryRepository(config.dataDir)

  const vectorIndex =
    overrides.vectorIndex ??
    (config.qdrantUrl ? new QdrantVectorIndex({ url: config.qdrantUrl }) : undefined)

  const { memory } = config
  const manager = new ConversationManager({
    embedder:
      overrides.embedder ??
      new OpenAIEmbedder({
        apiKey: config.embedding.apiKey,
        model: config.embedding.model,
        baseUrl: config.embedding.baseUrl,
      }),
    model:
      overrides.model ??
      new HttpLanguageModel({
        provider: config.llm.provider,
        apiKey: config.llm.apiKey,
        model: config.llm.model,
        baseUrl: config.llm.baseUrl,
        temperature: config.llm.temperature,
        maxStatements: memory.reflectionMaxInsights,
      }),
    counter: overrides.counter ?? new TiktokenCounter(),
    scorer: new Scorer({ decayFactor: memory.decayFactor, weights: memory.weights }),
    vectorIndex,
    candidatePool: memory.candidatePool,
    repository,
    memoryBudget: memory.memoryBudget,
    contextBudget: memory.contextBudget,
    maxResponseTokens: memory.maxResponseTokens,
    tailSize: memory.conversationTail,
    reflection: {
      threshold: memory.reflectionThreshold,
      topK: memory.reflectionTopK,
      maxInsights: memory.reflectionMaxInsights,
      planning: memory.reflectionPlanning,
    },
    timeoutMs: memory.externalCallTimeoutMs,
    clock: overrides.clock,
    logger,
  })

  logger.info("Agent runtime ready", {
    provider: config.llm.provider,
    model: config.llm.model,
    persistence,
    vectorIndex: vectorIndex !== undefined,
  })

  return { manager, repository }
}
