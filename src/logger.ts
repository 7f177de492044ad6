/**
 * Structured logger. Writes JSON lines to stderr: stdout carries the MCP
 * stdio protocol and must stay clean.
 */

import pino from "pino";

export type Logger = pino.Logger;

export function createLogger(
  options: { level?: string; destination?: pino.DestinationStream } = {}
): Logger {
  return pino(
    {
      level: options.level ?? process.env.LOG_LEVEL ?? "info",
      base: { service: "kyc-intake-mcp" },
    },
    options.destination ?? pino.destination(2)
  );
}

/** Logger that discards everything; the default for library callers and tests. */
export const silentLogger: Logger = pino({ level: "silent" });
