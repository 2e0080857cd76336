/**
 * Configuration module: validates environment variables at startup.
 *
 * All config is sourced from process.env and validated eagerly.
 * Invalid values throw immediately so the process fails fast; absent values
 * fall back to the engine defaults.
 */

import { isLogLevel, type LogLevel } from "@mnemos/engine"

export type LlmProvider = "anthropic" | "openai"

export interface TracingConfig {
  /** Whether OpenTelemetry tracing is enabled. */
  enabled: boolean
  /** OTLP collector endpoint URL. */
  endpoint: string
  /** Sampling rate: 0.0 to 1.0. */
  sampleRate: number
  /** Service name for the OTel resource. */
  serviceName: string
  /** Exporter type: "otlp", "console", or "both". */
  exporterType: "otlp" | "console" | "both"
}

export interface LlmConfig {
  provider: LlmProvider
  apiKey: string
  model: string
  baseUrl?: string
  /** Sampling temperature, 0.0 to 2.0. */
  temperature: number
}

export interface EmbeddingConfig {
  apiKey: string
  model: string
  baseUrl?: string
}

export interface MemoryConfig {
  decayFactor: number
  weights: { recency: number; importance: number; relevance: number }
  /** Units available to retrieved memories per turn. */
  memoryBudget: number
  /** The model's context window. */
  contextBudget: number
  maxResponseTokens: number
  conversationTail: number
  reflectionThreshold: number
  reflectionTopK: number
  reflectionMaxInsights: number
  reflectionPlanning: boolean
  /** Vector-index pre-filter size; absent means score every record. */
  candidatePool?: number
  externalCallTimeoutMs: number
}

export interface Config {
  llm: LlmConfig
  embedding: EmbeddingConfig
  /** PostgreSQL connection string; JSON files under dataDir when absent. */
  databaseUrl?: string
  dataDir: string
  /** Qdrant REST URL; no vector index when absent. */
  qdrantUrl?: string
  memory: MemoryConfig
  logLevel: LogLevel
  /** OpenTelemetry tracing configuration */
  tracing: TracingConfig
}

const DEFAULT_MODELS: Record<LlmProvider, string> = {
  anthropic: "claude-sonnet-4-5-20250929",
  openai: "gpt-4o",
}

/**
 * Load and validate configuration from environment variables.
 * Throws if a required value is missing or a value is out of range.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): Config {
  const provider = env.LLM_PROVIDER ?? "openai"
  if (provider !== "openai" && provider !== "anthropic") {
    throw new Error(`Invalid LLM_PROVIDER: ${provider}. Must be "openai" or "anthropic".`)
  }

  const llmApiKey =
    env.LLM_API_KEY ?? (provider === "anthropic" ? env.ANTHROPIC_API_KEY : env.OPENAI_API_KEY)
  if (!llmApiKey) {
    throw new Error("LLM_API_KEY (or provider-specific key) is required")
  }

  const embeddingApiKey =
    env.EMBEDDING_API_KEY ?? (provider === "openai" ? llmApiKey : env.OPENAI_API_KEY)
  if (!embeddingApiKey) {
    throw new Error("EMBEDDING_API_KEY is required when LLM_PROVIDER is not openai")
  }

  const temperature = parseFloatOr(env.LLM_TEMPERATURE, 0.7)
  if (temperature < 0 || temperature > 2) {
    throw new Error(`Invalid LLM_TEMPERATURE: ${temperature}. Must be between 0 and 2.`)
  }

  const decayFactor = parseFloatOr(env.MEMORY_DECAY_FACTOR, 0.99)
  if (!(decayFactor > 0 && decayFactor <= 1)) {
    throw new Error(`Invalid MEMORY_DECAY_FACTOR: ${decayFactor}. Must be in (0, 1].`)
  }

  const weights = {
    recency: parseFloatOr(env.MEMORY_WEIGHT_RECENCY, 1 / 3),
    importance: parseFloatOr(env.MEMORY_WEIGHT_IMPORTANCE, 1 / 3),
    relevance: parseFloatOr(env.MEMORY_WEIGHT_RELEVANCE, 1 / 3),
  }
  const weightValues = [weights.recency, weights.importance, weights.relevance]
  if (weightValues.some((w) => w < 0) || weightValues.every((w) => w === 0)) {
    throw new Error("MEMORY_WEIGHT_* must be non-negative and not all zero")
  }

  const contextBudget = parseIntOr(env.CONTEXT_BUDGET, 4096)
  const maxResponseTokens = parseIntOr(env.MAX_RESPONSE_TOKENS, 512)
  if (maxResponseTokens >= contextBudget) {
    throw new Error(
      `MAX_RESPONSE_TOKENS (${maxResponseTokens}) must be smaller than CONTEXT_BUDGET (${contextBudget})`,
    )
  }

  const logLevel = env.LOG_LEVEL ?? "info"
  if (!isLogLevel(logLevel)) {
    throw new Error(`Invalid LOG_LEVEL: ${logLevel}. Must be debug, info, warn or error.`)
  }

  const exporterType = env.OTEL_EXPORTER_TYPE ?? "otlp"
  if (exporterType !== "otlp" && exporterType !== "console" && exporterType !== "both") {
    throw new Error(
      `Invalid OTEL_EXPORTER_TYPE: ${exporterType}. Must be "otlp", "console", or "both".`,
    )
  }

  const candidatePool = env.CANDIDATE_POOL ? parseIntOr(env.CANDIDATE_POOL, 0) : 0

  return {
    llm: {
      provider,
      apiKey: llmApiKey,
      model: env.LLM_MODEL ?? DEFAULT_MODELS[provider],
      baseUrl: env.LLM_BASE_URL,
      temperature,
    },
    embedding: {
      apiKey: embeddingApiKey,
      model: env.EMBEDDING_MODEL ?? "text-embedding-3-small",
      baseUrl: env.EMBEDDING_BASE_URL,
    },
    databaseUrl: env.DATABASE_URL,
    dataDir: env.MEMORY_DATA_DIR ?? "./data/memory",
    qdrantUrl: env.QDRANT_URL,
    memory: {
      decayFactor,
      weights,
      memoryBudget: parseIntOr(env.MEMORY_BUDGET, 1000),
      contextBudget,
      maxResponseTokens,
      conversationTail: parseIntOr(env.CONVERSATION_TAIL, 20),
      reflectionThreshold: parseIntOr(env.REFLECTION_THRESHOLD, 150),
      reflectionTopK: parseIntOr(env.REFLECTION_TOP_K, 30),
      reflectionMaxInsights: parseIntOr(env.REFLECTION_MAX_INSIGHTS, 3),
      reflectionPlanning: env.REFLECTION_PLANNING === "true",
      candidatePool: candidatePool > 0 ? candidatePool : undefined,
      externalCallTimeoutMs: parseIntOr(env.EXTERNAL_CALL_TIMEOUT_MS, 30_000),
    },
    logLevel,
    tracing: {
      enabled: env.OTEL_TRACING_ENABLED === "true",
      endpoint: env.OTEL_EXPORTER_OTLP_ENDPOINT ?? "http://localhost:4318/v1/traces",
      sampleRate: clampUnit(parseFloatOr(env.OTEL_SAMPLE_RATE, 1.0)),
      serviceName: env.OTEL_SERVICE_NAME ?? "mnemos",
      exporterType,
    },
  }
}

function parseIntOr(value: string | undefined, fallback: number): number {
  if (value === undefined) return fallback
  const parsed = parseInt(value, 10)
  if (Number.isNaN(parsed)) return fallback
  return parsed
}

function parseFloatOr(value: string | undefined, fallback: number): number {
  if (value === undefined) return fallback
  const parsed = parseFloat(value)
  if (Number.isNaN(parsed)) return fallback
  return parsed
}

function clampUnit(value: number): number {
  return Math.max(0, Math.min(1, value))
}
