import { logger } from "./config/logger.js";

// Process-level handlers for errors that escape request handling.

// Async errors that weren't caught: log and keep serving.
export const unhandledRejectionHandler = (reason: unknown, promise: Promise<unknown>) => {
  logger.error("Unhandled promise rejection", {
    reason: reason instanceof Error ? reason.message : String(reason),
    stack: reason instanceof Error ? reason.stack : undefined,
    promise: String(promise),
  });
};

// Uncaught exceptions leave the process in an undefined state.
// Exit immediately after logging (Winston Console transport is synchronous).
export const uncaughtExceptionHandler = (err: Error, origin: string) => {
  logger.error("Uncaught exception", {
    error: err.message,
    stack: err.stack,
    origin,
  });
  process.exit(1);
};

export function registerProcessHandlers(): void {
  process.on("unhandledRejection", unhandledRejectionHandler);
  process.on("uncaughtException", uncaughtExceptionHandler);
}
