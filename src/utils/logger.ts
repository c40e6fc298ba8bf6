import fs from "node:fs";
import path from "node:path";

export type LogLevel = "info" | "warn" | "error";

export type Logger = {
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
};

export type LoggerOptions = {
  /**
   * Lines are appended here in addition to the console. The parent directory is created if needed.
   */
  readonly logFile?: string;
  readonly console?: boolean;
  readonly now?: () => Date;
};

export function formatLogLine(level: LogLevel, message: string, at: Date): string {
  return `[${at.toISOString()}] ${level.toUpperCase()} ${message}`;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const now = options.now ?? (() => new Date());
  const writeToConsole = options.console ?? true;
  const logFile = options.logFile;
  if (logFile) {
    fs.mkdirSync(path.dirname(path.resolve(logFile)), { recursive: true });
  }

  const write = (level: LogLevel, message: string): void => {
    const line = formatLogLine(level, message, now());
    if (writeToConsole) {
      if (level === "info") {
        console.log(line);
      } else {
        console.error(line);
      }
    }
    if (logFile) {
      fs.appendFileSync(logFile, `${line}\n`, "utf8");
    }
  };

  return {
    info: (message) => write("info", message),
    warn: (message) => write("warn", message),
    error: (message) => write("error", message),
  };
}

export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
};
