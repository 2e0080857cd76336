/**
 * Tracing span helpers: typed wrappers around the OpenTelemetry API.
 *
 * Without a registered SDK these fall back to the API's no-op tracer.
 */

import { type Attributes, type Span, SpanStatusCode, trace } from "@opentelemetry/api"

import { MemoryEngineError } from "../errors/errors.js"

// ──────────────────────────────────────────────────
// Semantic Attribute Constants
// ──────────────────────────────────────────────────

export const MemoryAttributes = {
  AGENT_IDENTITY: "mnemos.agent.identity",
  STORE_SIZE: "mnemos.store.size",
  RETRIEVAL_BUDGET: "mnemos.retrieval.budget",
  RETRIEVAL_SELECTED: "mnemos.retrieval.selected",
  RETRIEVAL_SKIPPED: "mnemos.retrieval.skipped",
  RETRIEVAL_USED_UNITS: "mnemos.retrieval.used_units",
  REFLECTION_PENDING: "mnemos.reflection.pending_importance",
  REFLECTION_CREATED: "mnemos.reflection.created",
  TURN_STATE: "mnemos.turn.state",
  CONTEXT_UNITS: "mnemos.context.units",
  ERROR_CODE: "mnemos.error.code",
} as const

const TRACER_NAME = "mnemos"

function getTracer() {
  return trace.getTracer(TRACER_NAME)
}

/**
 * Execute an async function inside a new active span.
 *
 * On success the span ends with OK status; on error it records the
 * exception (and the engine error code, if any) and sets ERROR status
 * before re-throwing.
 */
export async function withSpan<T>(
  name: string,
  attributes: Attributes,
  fn: (span: Span) => Promise<T>,
): Promise<T> {
  const tracer = getTracer()
  return tracer.startActiveSpan(name, { attributes }, async (span) => {
    try {
      const result = await fn(span)
      span.setStatus({ code: SpanStatusCode.OK })
      return result
    } catch (err) {
      span.setStatus({ code: SpanStatusCode.ERROR, message: String(err) })
      if (err instanceof Error) {
        span.recordException(err)
      }
      if (err instanceof MemoryEngineError) {
        span.setAttribute(MemoryAttributes.ERROR_CODE, err.code)
      }
      throw err
    } finally {
      span.end()
    }
  })
}

/** Record an event (log-style annotation) on the current active span. */
export function addSpanEvent(name: string, attributes?: Attributes): void {
  const span = trace.getActiveSpan()
  if (span) {
    span.addEvent(name, attributes)
  }
}
