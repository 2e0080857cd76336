import { describe, expect, it } from "vitest"

import { loadConfig } from "../config.js"

const KEY = { OPENAI_API_KEY: "test-secret" }

const INVALID: [Record<string, string>, string][] = [
  [{ LLM_TEMPERATURE: "2.5" }, "Invalid LLM_TEMPERATURE: 2.5. Must be between 0 and 2."],
  [{ MEMORY_DECAY_FACTOR: "0" }, "Invalid MEMORY_DECAY_FACTOR: 0. Must be in (0, 1]."],
  [{ MEMORY_DECAY_FACTOR: "1.5" }, "Invalid MEMORY_DECAY_FACTOR: 1.5. Must be in (0, 1]."],
  [{ MEMORY_WEIGHT_RECENCY: "-1" }, "MEMORY_WEIGHT_* must be non-negative and not all zero"],
  [
    { MEMORY_WEIGHT_RECENCY: "0", MEMORY_WEIGHT_IMPORTANCE: "0", MEMORY_WEIGHT_RELEVANCE: "0" },
    "MEMORY_WEIGHT_* must be non-negative and not all zero",
  ],
  [
    { MAX_RESPONSE_TOKENS: "4096" },
    "MAX_RESPONSE_TOKENS (4096) must be smaller than CONTEXT_BUDGET (4096)",
  ],
  [{ LOG_LEVEL: "verbose" }, "Invalid LOG_LEVEL: verbose. Must be debug, info, warn or error."],
]

describe("loadConfig", () => {
  it("throws if no LLM key is set", () => {
    expect(() => loadConfig({})).toThrow("LLM_API_KEY (or provider-specific key) is required")
  })

  it("returns defaults when only an OpenAI key is set", () => {
    expect(loadConfig(KEY)).toEqual({
      llm: {
        provider: "openai",
        apiKey: "test-secret",
        model: "gpt-4o",
        baseUrl: undefined,
        temperature: 0.7,
      },
      embedding: {
        apiKey: "test-secret",
        model: "text-embedding-3-small",
        baseUrl: undefined,
      },
      databaseUrl: undefined,
      dataDir: "./data/memory",
      qdrantUrl: undefined,
      memory: {
        decayFactor: 0.99,
        weights: { recency: 1 / 3, importance: 1 / 3, relevance: 1 / 3 },
        memoryBudget: 1000,
        contextBudget: 4096,
        maxResponseTokens: 512,
        conversationTail: 20,
        reflectionThreshold: 150,
        reflectionTopK: 30,
        reflectionMaxInsights: 3,
        reflectionPlanning: false,
        candidatePool: undefined,
        externalCallTimeoutMs: 30_000,
      },
      logLevel: "info",
      tracing: {
        enabled: false,
        endpoint: "http://localhost:4318/v1/traces",
        sampleRate: 1.0,
        serviceName: "mnemos",
        exporterType: "otlp",
      },
    })
  })

  it("overrides defaults from env", () => {
    const config = loadConfig({
      ...KEY,
      LLM_MODEL: "gpt-4o-mini",
      LLM_TEMPERATURE: "0.2",
      DATABASE_URL: "postgres://localhost/test",
      QDRANT_URL: "http://qdrant:6333",
      MEMORY_DATA_DIR: "/var/lib/mnemos",
      MEMORY_BUDGET: "800",
      REFLECTION_THRESHOLD: "40",
      REFLECTION_PLANNING: "true",
      CANDIDATE_POOL: "200",
      LOG_LEVEL: "debug",
    })

    expect(config.llm.model).toBe("gpt-4o-mini")
    expect(config.llm.temperature).toBe(0.2)
    expect(config.databaseUrl).toBe("postgres://localhost/test")
    expect(config.qdrantUrl).toBe("http://qdrant:6333")
    expect(config.dataDir).toBe("/var/lib/mnemos")
    expect(config.memory.memoryBudget).toBe(800)
    expect(config.memory.reflectionThreshold).toBe(40)
    expect(config.memory.reflectionPlanning).toBe(true)
    expect(config.memory.candidatePool).toBe(200)
    expect(config.logLevel).toBe("debug")
  })

  it("falls back to the default when an integer does not parse", () => {
    expect(loadConfig({ ...KEY, MEMORY_BUDGET: "lots" }).memory.memoryBudget).toBe(1000)
  })

  it("treats a zero candidate pool as no pool", () => {
    expect(loadConfig({ ...KEY, CANDIDATE_POOL: "0" }).memory.candidatePool).toBeUndefined()
  })

  describe("providers", () => {
    it("rejects an unknown provider", () => {
      expect(() => loadConfig({ ...KEY, LLM_PROVIDER: "cohere" })).toThrow(
        'Invalid LLM_PROVIDER: cohere. Must be "openai" or "anthropic".',
      )
    })

    it("uses the Anthropic key and a separate embedding key", () => {
      const config = loadConfig({
        LLM_PROVIDER: "anthropic",
        ANTHROPIC_API_KEY: "test-secret",
        OPENAI_API_KEY: "test-embedding-secret",
      })

      expect(config.llm.apiKey).toBe("test-secret")
      expect(config.llm.model).toBe("claude-sonnet-4-5-20250929")
      expect(config.embedding.apiKey).toBe("test-embedding-secret")
    })

    it("requires an embedding key alongside Anthropic", () => {
      expect(() => loadConfig({ LLM_PROVIDER: "anthropic", ANTHROPIC_API_KEY: "test-secret" })).toThrow(
        "EMBEDDING_API_KEY is required when LLM_PROVIDER is not openai",
      )
    })

    it("prefers LLM_API_KEY over the provider key", () => {
      const config = loadConfig({ ...KEY, LLM_API_KEY: "test-llm-secret" })
      expect(config.llm.apiKey).toBe("test-llm-secret")
      expect(config.embedding.apiKey).toBe("test-llm-secret")
    })
  })

  describe("validation", () => {
    it.each(INVALID)("rejects %o", (env, message) => {
      expect(() => loadConfig({ ...KEY, ...env })).toThrow(message)
    })

    it("accepts a decay factor of exactly 1", () => {
      expect(loadConfig({ ...KEY, MEMORY_DECAY_FACTOR: "1" }).memory.decayFactor).toBe(1)
    })
  })

  describe("tracing config", () => {
    it("enables tracing when OTEL_TRACING_ENABLED=true", () => {
      const config = loadConfig({ ...KEY, OTEL_TRACING_ENABLED: "true" })
      expect(config.tracing.enabled).toBe(true)
    })

    it("reads exporter settings", () => {
      const config = loadConfig({
        ...KEY,
        OTEL_EXPORTER_OTLP_ENDPOINT: "http://collector:4318/v1/traces",
        OTEL_SERVICE_NAME: "mnemos-test",
        OTEL_EXPORTER_TYPE: "both",
      })
      expect(config.tracing.endpoint).toBe("http://collector:4318/v1/traces")
      expect(config.tracing.serviceName).toBe("mnemos-test")
      expect(config.tracing.exporterType).toBe("both")
    })

    it("clamps the sample rate into [0, 1]", () => {
      expect(loadConfig({ ...KEY, OTEL_SAMPLE_RATE: "2" }).tracing.sampleRate).toBe(1)
      expect(loadConfig({ ...KEY, OTEL_SAMPLE_RATE: "-0.5" }).tracing.sampleRate).toBe(0)
      expect(loadConfig({ ...KEY, OTEL_SAMPLE_RATE: "0.25" }).tracing.sampleRate).toBe(0.25)
    })

    it("rejects an unknown exporter type", () => {
      expect(() => loadConfig({ ...KEY, OTEL_EXPORTER_TYPE: "zipkin" })).toThrow(
        'Invalid OTEL_EXPORTER_TYPE: zipkin. Must be "otlp", "console", or "both".',
      )
    })
  })
})
