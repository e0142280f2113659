/**
 * Logging Middleware
 *
 * Structured JSON logging for the platform and the actions it runs.
 * Every line is one JSON object with a level and a context identifier.
 * LOG_LEVEL (debug | info | warn | error | silent) sets the threshold.
 */

import type { Logger } from "@issuedesk/contracts";
import { captureMessage } from "../../observability/index.js";

type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel | "silent", number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function threshold(): number {
  const configured = process.env.LOG_LEVEL;
  if (
    configured === "debug" ||
    configured === "info" ||
    configured === "warn" ||
    configured === "error" ||
    configured === "silent"
  ) {
    return LEVEL_ORDER[configured];
  }
  return process.env.NODE_ENV === "production" ? LEVEL_ORDER.info : LEVEL_ORDER.debug;
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= threshold();
}

/**
 * Creates a structured logger.
 * Prefixes all messages with a context identifier.
 */
export function createLogger(context: string): Logger {
  return {
    info(message, data) {
      if (!enabled("info")) return;
      console.log(
        JSON.stringify({ level: "info", context, message, ...data })
      );
    },
    warn(message, data) {
      if (enabled("warn")) {
        console.warn(
          JSON.stringify({ level: "warn", context, message, ...data })
        );
      }
      captureMessage(`[${context}] ${message}`, "warning", data);
    },
    error(message, data) {
      if (enabled("error")) {
        console.error(
          JSON.stringify({ level: "error", context, message, ...data })
        );
      }
      captureMessage(`[${context}] ${message}`, "error", data);
    },
    debug(message, data) {
      if (!enabled("debug")) return;
      console.debug(
        JSON.stringify({ level: "debug", context, message, ...data })
      );
    },
  };
}

/**
 * Logs action execution with duration.
 */
export function logActionExecution(
  actionId: string,
  durationMs: number,
  success: boolean,
  error?: string
) {
  const level: LogLevel = success ? "info" : "error";
  if (!enabled(level)) return;

  const entry = {
    level,
    context: "action-bus",
    event: "action.executed",
    actionId,
    durationMs,
    success,
    ...(error ? { error } : {}),
  };

  if (success) {
    console.log(JSON.stringify(entry));
  } else {
    console.error(JSON.stringify(entry));
  }
}
