export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string, error?: unknown): void;
}

export interface LoggerOptions {
  level?: LogLevel;
  prefix?: string;
  write?: (line: string) => void;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function describeError(error: unknown): string {
  if (error instanceof Error) return error.stack ?? error.message;
  return String(error);
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const threshold = LEVEL_RANK[options.level ?? "warn"];
  const prefix = options.prefix ?? "viewmark";
  const write = options.write ?? ((line: string) => console.error(line));

  const emit = (level: Exclude<LogLevel, "silent">, message: string) => {
    if (LEVEL_RANK[level] < threshold) return;
    write(`[${prefix}] ${level.toUpperCase()} ${message}`);
  };

  return {
    debug: (message) => emit("debug", message),
    info: (message) => emit("info", message),
    warn: (message) => emit("warn", message),
    error: (message, error) => {
      emit("error", error === undefined ? message : `${message}: ${describeError(error)}`);
    },
  };
}
