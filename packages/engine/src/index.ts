export * from "./adapters/index.js"
export * from "./context/index.js"
export * from "./conversation/index.js"
export * from "./errors/index.js"
export * from "./memory/index.js"
export * from "./tracing/index.js"
