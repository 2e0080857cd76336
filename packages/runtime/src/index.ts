export * from "./adapters/index.js"
export type {
  Config,
  EmbeddingConfig,
  LlmConfig,
  LlmProvider,
  MemoryConfig,
  TracingConfig,
} from "./config.js"
export { loadConfig } from "./config.js"
export type { DatabaseConnection, MigrationClient, MigrationPool } from "./db/index.js"
export { createDatabase, runMigrations } from "./db/index.js"
export * from "./persistence/index.js"
export * from "./prompts/index.js"
export type { AgentRuntime, RuntimeDatabase, RuntimeOverrides } from "./runtime.js"
export { createAgentRuntime } from "./runtime.js"
export { initTracing, shutdownTracing } from "./tracing.js"
