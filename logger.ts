/**
 * Shared diagnostics logger for the library.
 *
 * Logging goes through its own `electron-log` instance, created from the Node entry point, so
 * the transports of the application's default logger are left as the application set them.
 * Only the console transport is active; the file transport is switched off so that importing the
 * library never writes to disk.
 *
 * The console level is read once from the `RESOURCE_GUARD_LOG_LEVEL` environment variable
 * (`error`, `warn`, `info`, `verbose`, `debug`, `silly` or `false`), defaulting to `warn`.
 *
 * @module
 */

import electronLog from "electron-log/node";

/** Levels understood by the console transport, most severe first. */
export type LogLevel = "error" | "warn" | "info" | "verbose" | "debug" | "silly";

/** A level, or `false` to silence the transport. */
export type LevelOption = LogLevel | false;

const LOG_LEVELS: readonly LogLevel[] = ["error", "warn", "info", "verbose", "debug", "silly"];

/**
 * Parses a log level from a raw configuration value, falling back to `fallback` when the
 * value is missing or not a known level.
 */
export function parseLogLevel(raw: string | undefined, fallback: LevelOption = "warn"): LevelOption {
  const value = raw?.trim().toLowerCase();
  if (!value) return fallback;
  if (value === "false" || value === "off") return false;
  return LOG_LEVELS.find((level) => level === value) ?? fallback;
}

const log = electronLog.create({ logId: "resource-guard" });
const { console: consoleTransport, file: fileTransport } = log.transports;
if (fileTransport) fileTransport.level = false;
if (consoleTransport) consoleTransport.level = parseLogLevel(process.env.RESOURCE_GUARD_LOG_LEVEL);

/**
 * Scoped logger used by every module of the library.
 */
export const logger = log.scope("resource-guard");
