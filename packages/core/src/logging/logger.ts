export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type LogContext = Record<string, unknown>;

export type LogSink = (level: Exclude<LogLevel, "silent">, line: string) => void;

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export interface LoggerOptions {
  level?: LogLevel;
  sink?: LogSink;
  context?: LogContext;
  clock?: () => Date;
}

export interface Logger {
  readonly level: LogLevel;
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  child(context: LogContext): Logger;
}

function consoleSink(level: Exclude<LogLevel, "silent">, line: string): void {
  switch (level) {
    case "debug":
      console.debug(line);
      break;
    case "info":
      console.info(line);
      break;
    case "warn":
      console.warn(line);
      break;
    case "error":
      console.error(line);
      break;
  }
}

function serializeValue(value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  return value;
}

export function formatLogLine(
  timestamp: Date,
  level: Exclude<LogLevel, "silent">,
  message: string,
  context: LogContext
): string {
  const levelStr = level.toUpperCase().padEnd(5);
  let line = `[${timestamp.toISOString()}] [${levelStr}] ${message}`;

  const entries = Object.entries(context);
  if (entries.length > 0) {
    const serialized = Object.fromEntries(entries.map(([key, value]) => [key, serializeValue(value)]));
    line += ` ${JSON.stringify(serialized)}`;
  }

  return line;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? "info";
  const sink = options.sink ?? consoleSink;
  const clock = options.clock ?? (() => new Date());
  const bound = options.context ?? {};

  function log(entryLevel: Exclude<LogLevel, "silent">, message: string, context?: LogContext) {
    if (LOG_LEVEL_PRIORITY[entryLevel] < LOG_LEVEL_PRIORITY[level]) return;
    sink(entryLevel, formatLogLine(clock(), entryLevel, message, { ...bound, ...context }));
  }

  return {
    level,
    debug: (message, context) => log("debug", message, context),
    info: (message, context) => log("info", message, context),
    warn: (message, context) => log("warn", message, context),
    error: (message, context) => log("error", message, context),
    child: (context) => createLogger({ level, sink, clock, context: { ...bound, ...context } }),
  };
}

export const silentLogger: Logger = createLogger({ level: "silent" });
