import { Chalk, type ChalkInstance } from "chalk";

export const LOG_LEVELS = ["silent", "error", "warn", "info", "debug", "trace"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface Logger {
  readonly level: LogLevel;
  error(message: string): void;
  warn(message: string): void;
  info(message: string): void;
  debug(message: string): void;
  trace(message: string): void;
}

export type LoggerOptions = {
  level?: LogLevel;
  stream?: { write(chunk: string): unknown };
  color?: boolean;
};

const LABELS: Record<Exclude<LogLevel, "silent">, string> = {
  error: "error",
  warn: "warn",
  info: "info",
  debug: "debug",
  trace: "trace",
};

export function parseLogLevel(value: unknown): LogLevel | null {
  if (typeof value !== "string") return null;
  const normalized = value.trim().toLowerCase();
  return LOG_LEVELS.find(level => level === normalized) ?? null;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? "warn";
  const stream = options.stream ?? process.stderr;
  const colors: ChalkInstance = new Chalk({ level: options.color ? 1 : 0 });
  const threshold = LOG_LEVELS.indexOf(level);

  const paint = (target: Exclude<LogLevel, "silent">, text: string): string => {
    switch (target) {
      case "error":
        return colors.red(text);
      case "warn":
        return colors.yellow(text);
      case "info":
        return colors.cyan(text);
      default:
        return colors.gray(text);
    }
  };

  const write = (target: Exclude<LogLevel, "silent">, message: string) => {
    if (LOG_LEVELS.indexOf(target) > threshold) return;
    stream.write(`${paint(target, `[cmdspec] ${LABELS[target]}:`)} ${message}\n`);
  };

  return {
    level,
    error: message => write("error", message),
    warn: message => write("warn", message),
    info: message => write("info", message),
    debug: message => write("debug", message),
    trace: message => write("trace", message),
  };
}

export const silentLogger: Logger = createLogger({ level: "silent" });
