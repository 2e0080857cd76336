import { ZodError } from "zod"

import { MemoryEngineError } from "./errors.js"

/**
 * What an adapter failure says about retrying the turn that hit it.
 *
 * Adapters fail in a handful of shapes: provider SDK errors with an HTTP
 * `status` (OpenAI, Anthropic, Qdrant), pg errors with a SQLSTATE `code`,
 * Node system errors from sockets and the JSON file store, zod errors from
 * parsing a reply, and the engine's own errors raised while loading data.
 */
export type ErrorCategory = "TRANSIENT" | "PERMANENT" | "TIMEOUT" | "RESOURCE" | "UNKNOWN"

export interface ErrorClassification {
  category: ErrorCategory
  retryable: boolean
  message: string
}

const RETRYABLE: Record<ErrorCategory, boolean> = {
  TRANSIENT: true,
  PERMANENT: false,
  TIMEOUT: true,
  RESOURCE: true,
  UNKNOWN: true,
}

const SYSTEM_CODES: Record<string, ErrorCategory> = {
  ECONNRESET: "TRANSIENT",
  ECONNREFUSED: "TRANSIENT",
  EPIPE: "TRANSIENT",
  EAI_AGAIN: "TRANSIENT",
  ENETUNREACH: "TRANSIENT",
  UND_ERR_SOCKET: "TRANSIENT",
  ETIMEDOUT: "TIMEOUT",
  UND_ERR_CONNECT_TIMEOUT: "TIMEOUT",
  ENOSPC: "RESOURCE",
  EMFILE: "RESOURCE",
  ENOENT: "PERMANENT",
  EACCES: "PERMANENT",
  EPERM: "PERMANENT",
  ENOTFOUND: "PERMANENT",
}

// SQLSTATE classes; 40001 and 40P01 (serialization, deadlock) are worth a retry
const SQLSTATE_CLASSES: Record<string, ErrorCategory> = {
  "08": "TRANSIENT",
  "40": "TRANSIENT",
  "57": "TRANSIENT",
  "53": "RESOURCE",
  "22": "PERMANENT",
  "23": "PERMANENT",
  "28": "PERMANENT",
  "42": "PERMANENT",
}

function statusCategory(status: number): ErrorCategory {
  if (status === 408 || status === 504) return "TIMEOUT"
  // 529 is Anthropic's "overloaded"
  if (status === 429 || status === 529) return "RESOURCE"
  if (status >= 500) return "TRANSIENT"
  return "PERMANENT"
}

function codeCategory(code: string): ErrorCategory {
  const system = SYSTEM_CODES[code]
  if (system) return system
  if (/^[0-9A-Z]{5}$/.test(code)) return SQLSTATE_CLASSES[code.slice(0, 2)] ?? "UNKNOWN"
  return "UNKNOWN"
}

function field(error: Error, name: "status" | "code"): unknown {
  return Reflect.get(error, name)
}

function classified(category: ErrorCategory, message: string): ErrorClassification {
  return { category, retryable: RETRYABLE[category], message }
}

export function classifyError(error: unknown): ErrorClassification {
  if (!(error instanceof Error)) return classified("UNKNOWN", String(error))

  if (error.name === "AbortError" || error.name === "TimeoutError") {
    return classified("TIMEOUT", error.message || "Operation aborted")
  }

  // Bad stored data or a reply that failed validation will fail the same way again
  if (error instanceof ZodError) return classified("PERMANENT", "malformed response")
  if (error instanceof MemoryEngineError) return classified("PERMANENT", error.message)

  const status = field(error, "status")
  if (typeof status === "number") {
    return classified(statusCategory(status), `HTTP ${status}: ${error.message}`)
  }

  const code = field(error, "code")
  if (typeof code === "string") {
    return classified(codeCategory(code), `${code}: ${error.message}`)
  }

  if (/time(d)? ?out/i.test(error.message)) return classified("TIMEOUT", error.message)
  return classified("UNKNOWN", error.message)
}
