import {
  type Attributes,
  type Span,
  SpanKind,
  SpanStatusCode,
  trace,
} from "@opentelemetry/api";
import { getRuntimeConfig } from "./runtime-config.ts";

/**
 * Attributes describing one session-scoped execution
 */
export interface ExecutionSpanAttributes {
  cardinality: "many" | "one";
  transactional: boolean;
}

/**
 * Outcome recorded when the span closes
 */
export interface ExecutionSpanResult {
  outcome: "completed" | "failed" | "cancelled";
  emitted: number;
  finalizerSucceeded: boolean;
  error?: unknown;
}

function isTelemetryEnabled(): boolean {
  return getRuntimeConfig().telemetry?.enabled ?? true;
}

function getTracer() {
  const telemetry = getRuntimeConfig().telemetry;
  return trace.getTracer(
    telemetry?.tracerName ?? "mongo-session-scoped",
    telemetry?.tracerVersion,
  );
}

/**
 * Opens a span for a session-scoped execution
 *
 * Without a registered OpenTelemetry SDK the API hands back a non-recording
 * span, so this stays cheap in applications that do not trace.
 *
 * @returns The span, or null when telemetry is disabled
 */
export function startExecutionSpan(
  attributes: ExecutionSpanAttributes,
): Span | null {
  if (!isTelemetryEnabled()) {
    return null;
  }

  return getTracer().startSpan("mongodb.session.execute", {
    kind: SpanKind.CLIENT,
    attributes: {
      "db.system": "mongodb",
      "session.cardinality": attributes.cardinality,
      "session.transactional": attributes.transactional,
    },
  });
}

/**
 * Records the outcome of an execution and ends its span
 */
export function endExecutionSpan(
  span: Span | null,
  result: ExecutionSpanResult,
): void {
  if (!span) return;

  const attributes: Attributes = {
    "session.outcome": result.outcome,
    "session.emitted_count": result.emitted,
    "session.finalizer.success": result.finalizerSucceeded,
  };
  span.setAttributes(attributes);

  if (result.outcome === "failed") {
    const error = result.error;
    if (error instanceof Error) {
      span.recordException(error);
    }
    span.setStatus({
      code: SpanStatusCode.ERROR,
      message: error instanceof Error ? error.message : "Session execution failed",
    });
  } else {
    span.setStatus({ code: SpanStatusCode.OK });
  }

  span.end();
}
