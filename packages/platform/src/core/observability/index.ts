/**
 * Observability Module
 *
 * Captures errors and operational messages that deserve more attention
 * than a log line: unexpected action failures and skipped cache
 * invalidations. Follows the provider pattern - pluggable backends with
 * a console fallback.
 *
 * Usage:
 *   captureException(error, { actionId: "issue.update", userId: "abc" });
 *   captureMessage("Cache invalidation skipped", "warning", { list: "issues" });
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type ObservabilitySeverity = "fatal" | "error" | "warning" | "info" | "debug";

/** Context tags attached to every event for filtering */
export interface ObservabilityContext {
  userId?: string;
  actionId?: string;
  [key: string]: unknown;
}

/** The provider contract. Every observability backend implements this. */
export interface ObservabilityProvider {
  readonly name: string;

  captureException(error: Error, context?: ObservabilityContext): void;

  captureMessage(
    message: string,
    level: ObservabilitySeverity,
    context?: ObservabilityContext
  ): void;

  /** Flush pending events to the backend (for graceful shutdown) */
  flush(timeoutMs?: number): Promise<void>;
}

// ---------------------------------------------------------------------------
// Console Provider
// ---------------------------------------------------------------------------

export class ConsoleObservabilityProvider implements ObservabilityProvider {
  readonly name = "console";

  captureException(error: Error, context?: ObservabilityContext): void {
    console.error(
      JSON.stringify({
        level: "error",
        context: "observability",
        event: "exception",
        message: error.message,
        stack: error.stack,
        ...context,
        timestamp: new Date().toISOString(),
      })
    );
  }

  captureMessage(
    message: string,
    level: ObservabilitySeverity,
    context?: ObservabilityContext
  ): void {
    // Loggers already printed warnings and errors; only record the event marker
    if (level === "warning" || level === "error" || level === "fatal") {
      return;
    }

    console.log(
      JSON.stringify({
        level,
        context: "observability",
        event: "message",
        message,
        ...context,
        timestamp: new Date().toISOString(),
      })
    );
  }

  async flush(): Promise<void> {
    // console writes are synchronous
  }
}

// ---------------------------------------------------------------------------
// State
// ---------------------------------------------------------------------------

let provider: ObservabilityProvider = new ConsoleObservabilityProvider();

/** Capture an exception through the observability provider */
export function captureException(
  error: Error,
  context?: ObservabilityContext
): void {
  provider.captureException(error, context);
}

/** Capture a message with severity level */
export function captureMessage(
  message: string,
  level: ObservabilitySeverity = "info",
  context?: ObservabilityContext
): void {
  provider.captureMessage(message, level, context);
}

/** Flush pending events (call during graceful shutdown) */
export async function flushObservability(timeoutMs?: number): Promise<void> {
  await provider.flush(timeoutMs);
}

export function getObservabilityProvider(): ObservabilityProvider {
  return provider;
}

/** Override the observability provider (error trackers, tests) */
export function setObservabilityProvider(p: ObservabilityProvider): void {
  provider = p;
}

/** Reset observability module state (for testing only) */
export function resetObservability(): void {
  provider = new ConsoleObservabilityProvider();
}
