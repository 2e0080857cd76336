/**
 * OpenTelemetry SDK initialization.
 *
 * Call `initTracing()` once before any agent is created.
 * Call `shutdownTracing()` during graceful shutdown to flush buffered spans.
 *
 * When tracing is disabled the engine's spans go to the OTel API's no-op
 * tracer.
 */

import { OTLPTraceExporter } from "@opentelemetry/exporter-trace-otlp-http"
import { HttpInstrumentation } from "@opentelemetry/instrumentation-http"
import { resourceFromAttributes } from "@opentelemetry/resources"
import { NodeSDK } from "@opentelemetry/sdk-node"
import {
  AlwaysOnSampler,
  BatchSpanProcessor,
  ConsoleSpanExporter,
  ParentBasedSampler,
  type Sampler,
  SimpleSpanProcessor,
  type SpanProcessor,
  TraceIdRatioBasedSampler,
} from "@opentelemetry/sdk-trace-node"
import { ATTR_SERVICE_NAME, ATTR_SERVICE_VERSION } from "@opentelemetry/semantic-conventions"

import type { TracingConfig } from "./config.js"

export const SERVICE_VERSION = "0.1.0"

let sdk: NodeSDK | undefined

export function createSampler(sampleRate: number): Sampler {
  return sampleRate >= 1.0
    ? new AlwaysOnSampler()
    : new ParentBasedSampler({ root: new TraceIdRatioBasedSampler(sampleRate) })
}

export function createSpanProcessors(config: TracingConfig): SpanProcessor[] {
  const processors: SpanProcessor[] = []
  if (config.exporterType === "console" || config.exporterType === "both") {
    processors.push(new SimpleSpanProcessor(new ConsoleSpanExporter()))
  }
  if (config.exporterType === "otlp" || config.exporterType === "both") {
    processors.push(new BatchSpanProcessor(new OTLPTraceExporter({ url: config.endpoint })))
  }
  return processors
}

/**
 * Initialize the OpenTelemetry SDK. Returns false when tracing is disabled.
 * Subsequent calls are no-ops.
 */
export function initTracing(config: TracingConfig): boolean {
  if (sdk) return true
  if (!config.enabled) return false

  sdk = new NodeSDK({
    resource: resourceFromAttributes({
      [ATTR_SERVICE_NAME]: config.serviceName,
      [ATTR_SERVICE_VERSION]: SERVICE_VERSION,
    }),
    sampler: createSampler(config.sampleRate),
    spanProcessors: createSpanProcessors(config),
    instrumentations: [new HttpInstrumentation()],
  })

  sdk.start()
  return true
}

/**
 * Gracefully shut down the SDK, flushing any buffered spans.
 */
export async function shutdownTracing(): Promise<void> {
  if (!sdk) return
  try {
    await sdk.shutdown()
  } finally {
    sdk = undefined
  }
}
