/**
 * JSON-line logger. One object per line: { ts, level, event, ...fields }.
 *
 * LOG_LEVEL gates output (error < warn < info < debug, default info).
 * error and warn go to stderr, the rest to stdout.
 */

export type LogLevel = "error" | "warn" | "info" | "debug";

export type LogFields = Record<string, unknown>;

export type Logger = {
  error: (event: string, fields?: LogFields) => void;
  warn: (event: string, fields?: LogFields) => void;
  info: (event: string, fields?: LogFields) => void;
  debug: (event: string, fields?: LogFields) => void;
  child: (bound: LogFields) => Logger;
};

const LEVELS: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

export function parseLogLevel(raw: string | undefined, fallback: LogLevel = "info"): LogLevel {
  const value = String(raw ?? "").trim().toLowerCase();
  return value === "error" || value === "warn" || value === "info" || value === "debug" ? value : fallback;
}

function serialize(value: unknown): unknown {
  if (value instanceof Error) return { name: value.name, message: value.message };
  if (value instanceof Date) return value.toISOString();
  return value;
}

export function createLogger(
  opts: {
    level?: LogLevel;
    bound?: LogFields;
    write?: (level: LogLevel, line: string) => void;
  } = {},
): Logger {
  const level = opts.level ?? parseLogLevel(process.env.LOG_LEVEL);
  const bound = opts.bound ?? {};
  const write =
    opts.write ??
    ((lvl: LogLevel, line: string) => {
      if (lvl === "error" || lvl === "warn") console.error(line);
      else console.log(line);
    });

  const emit = (lvl: LogLevel, event: string, fields: LogFields = {}) => {
    if (LEVELS[lvl] > LEVELS[level]) return;
    const payload: LogFields = { ts: new Date().toISOString(), level: lvl, event };
    for (const [key, value] of Object.entries({ ...bound, ...fields })) {
      payload[key] = serialize(value);
    }
    write(lvl, JSON.stringify(payload));
  };

  return {
    error: (event, fields) => emit("error", event, fields),
    warn: (event, fields) => emit("warn", event, fields),
    info: (event, fields) => emit("info", event, fields),
    debug: (event, fields) => emit("debug", event, fields),
    child: (extra) => createLogger({ level, bound: { ...bound, ...extra }, write }),
  };
}

export const silentLogger: Logger = createLogger({ write: () => {} });
