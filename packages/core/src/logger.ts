/**
 * Console logging with a `[sexpr:<scope>]` prefix.
 *
 * Debug lines are written only while `config.get("debug")` is true
 * (`SEXPR_DEBUG=1`). Warnings are always written.
 */

import { config } from "./config.js";

export type LogWriter = (line: string) => void;

export interface Logger {
  debug(message: string): void;
  warn(message: string): void;
}

/** Create a logger for one scope. The writer defaults to console.error. */
export function createLogger(
  scope: string,
  writer: LogWriter = (line: string) => console.error(line)
): Logger {
  const prefix = `[sexpr:${scope}]`;
  return {
    debug(message: string): void {
      if (config.get("debug")) writer(`${prefix} ${message}`);
    },
    warn(message: string): void {
      writer(`${prefix} warning: ${message}`);
    },
  };
}
