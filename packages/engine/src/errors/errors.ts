/**
 * Error taxonomy for the memory engine.
 *
 * Every error carries a stable `code` so callers at the turn boundary can
 * branch on the failure kind without `instanceof` chains across packages.
 */

export type MemoryErrorCode =
  | "NOT_FOUND"
  | "INVALID_RECORD"
  | "BUDGET_EXCEEDED"
  | "EXTERNAL_CALL_FAILURE"
  | "PERSONA_TOO_LARGE"
  | "INVALID_TRANSITION"
  | "TURN_FAILED"
  | "SNAPSHOT_FORMAT"

export abstract class MemoryEngineError extends Error {
  abstract readonly code: MemoryErrorCode
}

export class NotFoundError extends MemoryEngineError {
  readonly code = "NOT_FOUND"
  readonly recordId: number

  constructor(recordId: number) {
    super(`Memory record ${recordId} not found`)
    this.name = "NotFoundError"
    this.recordId = recordId
  }
}

export class InvalidRecordError extends MemoryEngineError {
  readonly code = "INVALID_RECORD"

  constructor(message: string) {
    super(message)
    this.name = "InvalidRecordError"
  }
}

/**
 * A single record whose text can never fit the budget. Reported in
 * retrieval results, never thrown.
 */
export class BudgetExceededError extends MemoryEngineError {
  readonly code = "BUDGET_EXCEEDED"
  readonly recordId: number
  readonly units: number
  readonly budget: number

  constructor(recordId: number, units: number, budget: number) {
    super(`Memory record ${recordId} needs ${units} units, budget is ${budget}`)
    this.name = "BudgetExceededError"
    this.recordId = recordId
    this.units = units
    this.budget = budget
  }
}

export interface ExternalCallFailureOptions {
  timedOut?: boolean
  retryable?: boolean
  cause?: unknown
}

export class ExternalCallFailure extends MemoryEngineError {
  readonly code = "EXTERNAL_CALL_FAILURE"
  /** Name of the adapter operation, e.g. "embed" or "complete". */
  readonly operation: string
  readonly timedOut: boolean
  readonly retryable: boolean
  override readonly cause: unknown

  constructor(operation: string, message: string, options: ExternalCallFailureOptions = {}) {
    super(`${operation} failed: ${message}`)
    this.name = "ExternalCallFailure"
    this.operation = operation
    this.timedOut = options.timedOut ?? false
    this.retryable = options.retryable ?? true
    this.cause = options.cause
  }
}

export class PersonaTooLargeError extends MemoryEngineError {
  readonly code = "PERSONA_TOO_LARGE"
  readonly units: number
  readonly budget: number

  constructor(units: number, budget: number) {
    super(`Persona text needs ${units} units, total budget is ${budget}`)
    this.name = "PersonaTooLargeError"
    this.units = units
    this.budget = budget
  }
}

export class SnapshotFormatError extends MemoryEngineError {
  readonly code = "SNAPSHOT_FORMAT"

  constructor(message: string) {
    super(message)
    this.name = "SnapshotFormatError"
  }
}
