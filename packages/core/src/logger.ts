import { pino, type Logger } from "pino";

export type { Logger };

function defaultLevel(): string {
  if (process.env.HISTSYNC_LOG_LEVEL) {
    return process.env.HISTSYNC_LOG_LEVEL;
  }
  return process.env.NODE_ENV === "test" ? "silent" : "info";
}

/**
 * Create a structured JSON logger for a component.
 * @param name - Component name, written as the `name` field of every line
 */
export function createLogger(name: string): Logger {
  return pino({ name, level: defaultLevel() });
}
