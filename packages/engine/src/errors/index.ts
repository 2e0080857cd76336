export {
  BudgetExceededError,
  ExternalCallFailure,
  InvalidRecordError,
  MemoryEngineError,
  NotFoundError,
  PersonaTooLargeError,
  SnapshotFormatError,
} from "./errors.js"
export type { ExternalCallFailureOptions, MemoryErrorCode } from "./errors.js"
export { classifyError } from "./classifier.js"
export type { ErrorCategory, ErrorClassification } from "./classifier.js"
export { guardExternalCall } from "./guard.js"
