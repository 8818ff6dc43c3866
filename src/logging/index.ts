/**
 * Structured logging for the cabin voice assistant.
 * Logs state transitions, provider calls, vehicle events, health and recovery with timestamps. JSON output for shipping.
 *
 * Env:
 *   LOG_LEVEL   - debug | info | warn | error (default: info)
 *   LOG_FILE    - If set, append all logs to this path (creates dirs if needed).
 */

import pino from "pino";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LoggerConfig {
  level?: LogLevel;
  pretty?: boolean;
}

function parseLevel(raw: string | undefined): LogLevel {
  const v = raw?.trim().toLowerCase();
  return v === "debug" || v === "warn" || v === "error" ? v : "info";
}

const defaultConfig: LoggerConfig = {
  level: parseLevel(process.env.LOG_LEVEL),
  // Jest sets NODE_ENV=test; keep the pretty transport (a worker thread) out of test runs.
  pretty: process.env.NODE_ENV !== "production" && process.env.NODE_ENV !== "test",
};

export function createLogger(config: LoggerConfig = {}): pino.Logger {
  const opts: pino.LoggerOptions = {
    level: config.level ?? defaultConfig.level,
    base: undefined,
    timestamp: pino.stdTimeFunctions.isoTime,
  };
  const pretty = config.pretty ?? defaultConfig.pretty;
  const logFile = process.env.LOG_FILE?.trim();

  const streams: pino.StreamEntry[] = [];
  if (pretty) {
    streams.push({
      stream: pino.transport({ target: "pino-pretty", options: { colorize: true } }),
    });
  } else {
    streams.push({ stream: process.stdout });
  }
  if (logFile) {
    streams.push({
      stream: pino.destination({ dest: logFile, append: true, mkdir: true }),
    });
  }

  if (streams.length === 1) {
    return pino(opts, streams[0].stream);
  }
  return pino(opts, pino.multistream(streams));
}

export const logger = createLogger({
  level: process.env.NODE_ENV === "test" && !process.env.LOG_LEVEL ? "error" : defaultConfig.level,
});

/** Message of an unknown thrown value. */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

/** Log a conversation turn boundary. */
export function logTurn(log: pino.Logger, phase: "start" | "end", sessionId?: string, turn?: number): void {
  log.info({ event: "TURN", phase, sessionId, turn }, phase === "start" ? "Turn start" : "Turn end");
}

/** Log error. */
export function logError(log: pino.Logger, err: unknown, context?: Record<string, unknown>): void {
  if (err instanceof Error) {
    log.error({ err: err.message, stack: err.stack, ...context }, "Error");
    return;
  }
  log.error({ err: String(err), ...context }, "Error");
}
