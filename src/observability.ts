/**
 * @module observability
 *
 * Hooks the coordinator calls around each operation and after each event
 * fan-out. Plug in a metrics or tracing backend by implementing
 * `ObservabilityHook`; `MetricsAggregator` is an in-process one.
 */

import type { DomainEvent } from "./adt.ts";
import type { DispatchReport } from "./dispatcher.ts";
import type { LogLevel } from "./config.ts";
import { createLogger } from "./logger.ts";
import type { CoreError } from "./ports.ts";
import { describeError, describeThrown } from "./ports.ts";
import type { Result } from "./result.ts";

/** Outcome of one coordinator operation. */
export type OperationMetrics = Readonly<{
  operation: string;
  durationMs: number;
  success: boolean;
  /** Error `_type` for rejections, the message for thrown errors. */
  error?: string;
  metadata?: Record<string, unknown>;
}>;

export type ObservabilityHook = Readonly<{
  /** May return a callback that receives the outcome. */
  onOperationStart?: (
    operation: string,
    metadata?: Record<string, unknown>,
  ) => (success: boolean, error?: string) => void;
  onOperationComplete?: (metrics: OperationMetrics) => void;
  /** A rejection, i.e. an operation that returned an Err. */
  onError?: (
    operation: string,
    error: CoreError,
    context?: Record<string, unknown>,
  ) => void;
  onEvent?: (event: DomainEvent, report: DispatchReport) => void;
}>;

export const noopObservability: ObservabilityHook = {};

/** Writes outcomes through the scoped logger; rejections at DEBUG. */
export function loggingObservability(level?: LogLevel): ObservabilityHook {
  const log = createLogger("observability", level);
  return {
    onOperationComplete: (m) => {
      log.debug(`${m.operation} completed`, {
        durationMs: Math.round(m.durationMs * 100) / 100,
        success: m.success,
        ...(m.error !== undefined && { error: m.error }),
      });
    },
    onError: (operation, error, context) => {
      log.debug(`${operation} rejected: ${describeError(error)}`, context);
    },
    onEvent: (event, report) => {
      if (report.failed === 0) return;
      log.warn("Event delivered with handler failures", {
        event: event._type,
        failed: report.failed,
      });
    },
  };
}

export type OperationSummary = Readonly<{
  count: number;
  avgDurationMs: number;
  maxDurationMs: number;
  errorRate: number;
  /** Failures keyed by error tag. */
  errors: Readonly<Record<string, number>>;
}>;

type Tally = {
  count: number;
  totalDurationMs: number;
  maxDurationMs: number;
  errors: Record<string, number>;
};

/** Per-operation counters fed by `onOperationComplete`. */
export class MetricsAggregator implements ObservabilityHook {
  private readonly tallies = new Map<string, Tally>();

  onOperationComplete = (m: OperationMetrics): void => {
    let tally = this.tallies.get(m.operation);
    if (!tally) {
      tally = { count: 0, totalDurationMs: 0, maxDurationMs: 0, errors: {} };
      this.tallies.set(m.operation, tally);
    }
    tally.count++;
    tally.totalDurationMs += m.durationMs;
    tally.maxDurationMs = Math.max(tally.maxDurationMs, m.durationMs);
    if (!m.success) {
      const tag = m.error ?? "unknown";
      tally.errors[tag] = (tally.errors[tag] ?? 0) + 1;
    }
  };

  getMetrics(): ReadonlyMap<string, OperationSummary> {
    const out = new Map<string, OperationSummary>();
    for (const [operation, t] of this.tallies) {
      const failures = Object.values(t.errors).reduce((a, b) => a + b, 0);
      out.set(operation, {
        count: t.count,
        avgDurationMs: t.totalDurationMs / t.count,
        maxDurationMs: t.maxDurationMs,
        errorRate: failures / t.count,
        errors: { ...t.errors },
      });
    }
    return out;
  }

  reset(): void {
    this.tallies.clear();
  }
}

/**
 * Times a Result-returning operation and reports it to `hook`. An Err is a
 * failure tagged with its `_type`; a thrown error is reported, then rethrown.
 */
export async function instrument<T, E extends CoreError>(
  operation: string,
  fn: () => Promise<Result<T, E>>,
  hook?: ObservabilityHook,
  metadata?: Record<string, unknown>,
): Promise<Result<T, E>> {
  const started = performance.now();
  const done = hook?.onOperationStart?.(operation, metadata);
  let success = false;
  let error: string | undefined;

  try {
    const result = await fn();
    if (result.ok) {
      success = true;
    } else {
      error = result.error._type;
      hook?.onError?.(operation, result.error, metadata);
    }
    return result;
  } catch (thrown) {
    error = describeThrown(thrown);
    throw thrown;
  } finally {
    done?.(success, error);
    hook?.onOperationComplete?.({
      operation,
      durationMs: performance.now() - started,
      success,
      ...(error !== undefined && { error }),
      ...(metadata !== undefined && { metadata }),
    });
  }
}
