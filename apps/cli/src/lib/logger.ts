import { appendFileSync, mkdirSync } from "node:fs";
import path from "node:path";

export type LogLevel = "DEBUG" | "INFO" | "ERROR";

export type Logger = {
  debug: (message: string) => void;
  info: (message: string) => void;
  error: (message: string) => void;
};

export type LoggerOptions = {
  verbose: boolean;
  logFilePath?: string | null;
  now?: () => Date;
  stdout?: (line: string) => void;
  stderr?: (line: string) => void;
};

export function formatLine(level: LogLevel, message: string, at: Date): string {
  return `[${at.toISOString()}] [${level}] ${message}\n`;
}

export function createLogger(options: LoggerOptions): Logger {
  const logFilePath = options.logFilePath || null;
  const now = options.now ?? (() => new Date());
  const stdout = options.stdout ?? ((line: string) => console.log(line));
  const stderr = options.stderr ?? ((line: string) => console.error(line));
  let fileSinkBroken = false;

  const write = (level: LogLevel, message: string): void => {
    if (level === "DEBUG" && !options.verbose) return;

    const line = formatLine(level, message, now());
    if (level === "ERROR") {
      stderr(line.trimEnd());
    } else {
      stdout(line.trimEnd());
    }

    if (!logFilePath || fileSinkBroken) return;
    try {
      mkdirSync(path.dirname(logFilePath), { recursive: true });
      appendFileSync(logFilePath, line);
    } catch (error) {
      // Console output remains available; report the broken sink once.
      fileSinkBroken = true;
      stderr(
        formatLine("ERROR", `log file unavailable path=${logFilePath}: ${String(error)}`, now()).trimEnd(),
      );
    }
  };

  return {
    debug: (message) => write("DEBUG", message),
    info: (message) => write("INFO", message),
    error: (message) => write("ERROR", message),
  };
}

export function createSilentLogger(): Logger {
  return createLogger({ verbose: true, stdout: () => undefined, stderr: () => undefined });
}
