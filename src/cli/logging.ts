import type { AppConfig } from "../infrastructure/config/schema";

export type LogLevel = AppConfig["logLevel"];

export type Logger = {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
};

const LEVEL_ORDER: LogLevel[] = ["silent", "error", "warn", "info", "debug"];

/**
 * Diagnostics go to stderr so stdout carries nothing but filter output.
 */
export function createLogger(
  config: Pick<AppConfig, "logLevel">,
  sink: (line: string) => void = (line) => console.error(line),
): Logger {
  const level = config.logLevel;
  const enabled = (target: LogLevel) =>
    level !== "silent" && LEVEL_ORDER.indexOf(level) >= LEVEL_ORDER.indexOf(target);

  const at = (target: LogLevel) => (message: string) => {
    if (enabled(target)) sink(`[${target}] ${message}`);
  };

  return {
    debug: at("debug"),
    info: at("info"),
    warn: at("warn"),
    error: at("error"),
  };
}
