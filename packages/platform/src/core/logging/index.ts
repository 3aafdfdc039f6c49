/**
 * Structured Logging
 *
 * JSON-lines logger used across the platform. Every line carries a level,
 * the logger's context, and the message, plus any structured data.
 * Warnings and errors are also forwarded to the observability provider.
 */

import type { Logger } from "@curriflow/contracts";
import { captureMessage } from "../observability/index.js";

/**
 * Creates a simple structured logger.
 * Prefixes all messages with a context identifier.
 */
export function createLogger(context: string): Logger {
  return {
    info(message, data) {
      console.log(
        JSON.stringify({ level: "info", context, message, ...data })
      );
    },
    warn(message, data) {
      console.warn(
        JSON.stringify({ level: "warn", context, message, ...data })
      );
      captureMessage(`[${context}] ${message}`, "warning", data);
    },
    error(message, data) {
      console.error(
        JSON.stringify({ level: "error", context, message, ...data })
      );
      captureMessage(`[${context}] ${message}`, "error", data);
    },
    debug(message, data) {
      if (process.env.NODE_ENV !== "production") {
        console.debug(
          JSON.stringify({ level: "debug", context, message, ...data })
        );
      }
    },
  };
}

/**
 * Logs one completed workflow operation with its duration.
 */
export function logOperation(
  operation: string,
  contentUid: string,
  durationMs: number,
  success: boolean,
  error?: string
): void {
  const entry = {
    level: success ? "info" : "error",
    context: "workflow-engine",
    event: "operation.completed",
    operation,
    contentUid,
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
