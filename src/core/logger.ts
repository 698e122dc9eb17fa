import { appendFileSync } from "node:fs";
import { Cause, Config, Effect, Layer, LogLevel, Logger, Option } from "effect";
import { ConfigurationError } from "../config";

export type LogLevelName = "debug" | "info" | "warn" | "error";
export type LogFormat = "text" | "json";

export interface LogEntry {
  readonly timestamp: string;
  readonly level: string;
  readonly message: string;
  readonly data?: Record<string, unknown>;
}

export type LineWriter = (level: LogLevel.LogLevel, line: string) => void;

const levels: Record<LogLevelName, LogLevel.LogLevel> = {
  debug: LogLevel.Debug,
  info: LogLevel.Info,
  warn: LogLevel.Warning,
  error: LogLevel.Error,
};

export const formatLogEntry = (entry: LogEntry, format: LogFormat): string => {
  if (format === "json") {
    return JSON.stringify(entry);
  }
  const prefix = `[${entry.timestamp}] [${entry.level.toUpperCase()}]`;
  if (entry.data) {
    return `${prefix} ${entry.message} ${JSON.stringify(entry.data)}`;
  }
  return `${prefix} ${entry.message}`;
};

const renderMessage = (message: unknown): string => {
  const parts: ReadonlyArray<unknown> = Array.isArray(message) ? message : [message];
  return parts.map((part) => (typeof part === "string" ? part : JSON.stringify(part))).join(" ");
};

const writeToConsole: LineWriter = (level, line) => {
  if (level.ordinal >= LogLevel.Error.ordinal) {
    console.error(line);
  } else {
    console.log(line);
  }
};

/**
 * Writes each line with `next` and appends it to `filePath`.
 */
export const teeToFile =
  (filePath: string, next: LineWriter = writeToConsole): LineWriter =>
  (level, line) => {
    next(level, line);
    try {
      appendFileSync(filePath, `${line}\n`, "utf-8");
    } catch (error) {
      console.error(
        `Failed to append to log file ${filePath}: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  };

/**
 * Logger that prints one line per entry. Log annotations (such as the cycle
 * number) become the entry's data.
 */
export const makeLineLogger = (format: LogFormat, write: LineWriter = writeToConsole) =>
  Logger.make<unknown, void>(({ logLevel, message, annotations, cause, date }) => {
    const data: Record<string, unknown> = Object.fromEntries(annotations);
    if (!Cause.isEmpty(cause)) {
      data.cause = Cause.pretty(cause);
    }

    const entry: LogEntry = {
      timestamp: date.toISOString(),
      level: logLevel.label.toLowerCase(),
      message: renderMessage(message),
      ...(Object.keys(data).length > 0 ? { data } : {}),
    };

    write(logLevel, formatLogEntry(entry, format));
  });

export const LoggingConfig = Config.all({
  level: Config.literal("debug", "info", "warn", "error")("LOG_LEVEL").pipe(
    Config.withDefault("info" as const)
  ),
  format: Config.literal("text", "json")("LOG_FORMAT").pipe(Config.withDefault("text" as const)),
  file: Config.option(Config.nonEmptyString("LOG_FILE")).pipe(Config.map(Option.getOrUndefined)),
});

export const makeLoggerLayer = (level: LogLevelName, format: LogFormat, write?: LineWriter) =>
  Layer.merge(
    Logger.replace(Logger.defaultLogger, makeLineLogger(format, write)),
    Logger.minimumLogLevel(levels[level])
  );

export const LoggerLive = Layer.unwrapEffect(
  Effect.gen(function* () {
    const config = yield* LoggingConfig;
    const write = config.file !== undefined ? teeToFile(config.file) : undefined;
    return makeLoggerLayer(config.level, config.format, write);
  }).pipe(
    Effect.mapError(
      (cause) =>
        new ConfigurationError({
          message: `Invalid logging configuration: ${String(cause)}`,
          cause,
        })
    )
  )
);
