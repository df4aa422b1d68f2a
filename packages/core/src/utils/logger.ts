import pino, { type Logger } from "pino";
import type { Settings } from "../config/settings.js";

export type { Logger };

/**
 * Logger for a CLI run. Records go to the log file, or to stderr in debug mode,
 * so that stdout stays free for command output.
 */
export function createLogger(settings: Pick<Settings, "logLevel" | "logFile" | "debug">): Logger {
  const destination = settings.debug
    ? pino.destination({ fd: 2, sync: true })
    : pino.destination({ dest: settings.logFile, mkdir: true, sync: true });

  return pino({ name: "devports", level: settings.logLevel }, destination);
}

/**
 * Logger that drops every record
 */
export function silentLogger(): Logger {
  return pino({ enabled: false });
}
