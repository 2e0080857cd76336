export type { Logger, LogLevel, TracingLoggerOptions } from "./logger.js"
export { errorFields, isLogLevel, TracingLogger } from "./logger.js"
export { addSpanEvent, MemoryAttributes, withSpan } from "./spans.js"
