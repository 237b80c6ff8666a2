/**
 * Step-prefixed console logging: `[oracle] [STEP] message`.
 * Tests pass `silentSink` to keep output clean.
 */

export type LogLevel = "info" | "warn" | "error";

export type LogSink = (level: LogLevel, line: string) => void;

export interface Logger {
  info(step: string, msg: string): void;
  warn(step: string, msg: string): void;
  error(step: string, msg: string): void;
}

export const consoleSink: LogSink = (level, line) => {
  if (level === "error") console.error(line);
  else if (level === "warn") console.warn(line);
  else console.log(line);
};

export const silentSink: LogSink = () => {};

export function createLogger(scope = "oracle", sink: LogSink = consoleSink): Logger {
  const write = (level: LogLevel, step: string, msg: string) =>
    sink(level, `[${scope}] [${step}] ${msg}`);
  return {
    info: (step, msg) => write("info", step, msg),
    warn: (step, msg) => write("warn", step, msg),
    error: (step, msg) => write("error", step, msg),
  };
}
