export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(msg: string, fields?: LogFields): void;
  info(msg: string, fields?: LogFields): void;
  warn(msg: string, fields?: LogFields): void;
  error(msg: string, fields?: LogFields): void;
  child(scope: string): Logger;
}

export type LoggerOptions = {
  level?: LogLevel;
  // defaults to console.log, one JSON object per line
  write?: (line: string) => void;
};

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((l) => l === value);
}

export function createLogger(scope: string, opts: LoggerOptions = {}): Logger {
  const threshold = LOG_LEVELS.indexOf(opts.level ?? "info");
  // eslint-disable-next-line no-console
  const write = opts.write ?? ((line: string) => console.log(line));

  function emit(level: LogLevel, msg: string, fields?: LogFields) {
    if (LOG_LEVELS.indexOf(level) < threshold) return;
    write(JSON.stringify({ t: new Date().toISOString(), level, scope, msg, ...fields }));
  }

  return {
    debug: (msg, fields) => emit("debug", msg, fields),
    info: (msg, fields) => emit("info", msg, fields),
    warn: (msg, fields) => emit("warn", msg, fields),
    error: (msg, fields) => emit("error", msg, fields),
    child: (sub) => createLogger(`${scope}:${sub}`, opts),
  };
}

/** Discards every line. */
export const silentLogger: Logger = createLogger("silent", { write: () => {} });
