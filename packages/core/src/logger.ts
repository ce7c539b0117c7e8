/**
 * Scoped diagnostic logging.
 *
 * Lines are written as `[tinystd:<scope>] <message>` through a writer
 * (default: console.error). Debug lines appear only while debug output is
 * switched on; the configuration layer switches it from the `debug` key.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LoggerOptions {
  /** Custom writer function (default: console.error) */
  writer?: (line: string) => void;
}

export interface Logger {
  readonly scope: string;
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

let debugOutput = false;

export function setDebugOutput(enabled: boolean): void {
  debugOutput = enabled;
}

export function isDebugOutput(): boolean {
  return debugOutput;
}

export function formatLogLine(scope: string, level: LogLevel, message: string): string {
  const tag = level === "warn" || level === "error" ? ` ${level}:` : "";
  return `[tinystd:${scope}]${tag} ${message}`;
}

export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const write = (level: LogLevel, message: string): void => {
    const writer = options.writer ?? ((line: string) => console.error(line));
    writer(formatLogLine(scope, level, message));
  };

  return {
    scope,
    debug(message) {
      if (debugOutput) write("debug", message);
    },
    info(message) {
      write("info", message);
    },
    warn(message) {
      write("warn", message);
    },
    error(message) {
      write("error", message);
    },
  };
}
