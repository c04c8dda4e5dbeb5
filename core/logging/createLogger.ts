import fs from "fs";
import path from "path";

/* ----------------------------------
 * Log levels
 * ---------------------------------- */

export const LEVELS = ["error", "warn", "info", "debug"] as const;
export type LogLevel = typeof LEVELS[number];

export const LOGGER_MODES = ["none", "console", "file"] as const;
export type LoggerMode = typeof LOGGER_MODES[number];

function levelRank(level: LogLevel) {
  return LEVELS.indexOf(level);
}

export function isLogLevel(value: string): value is LogLevel {
  return (LEVELS as readonly string[]).includes(value);
}

export function isLoggerMode(value: string): value is LoggerMode {
  return (LOGGER_MODES as readonly string[]).includes(value);
}

/* ----------------------------------
 * Log entry + logger types
 * ---------------------------------- */

export interface LogEntry {
  level: LogLevel;
  msg: string;
  time?: number;
  event?: string;
  [key: string]: unknown;
}

export type VaultLogger = (entry: LogEntry) => void;

/** Bound emitter handed to components; a missing logger turns every call into a no-op. */
export type EventLog = (
  level: LogLevel,
  msg: string,
  fields?: Record<string, unknown>
) => void;

export function createEventLog(logger?: VaultLogger): EventLog {
  return (level, msg, fields) => {
    if (!logger) return;

    try {
      logger({
        level,
        msg,
        time: Date.now(),
        ...fields,
      });
    } catch (err) {
      console.error("logger failed:", err);
    }
  };
}

/* ----------------------------------
 * Logger factory
 * ---------------------------------- */

export function createLogger(
  mode: LoggerMode,
  options?: {
    filePath?: string;
    level?: LogLevel;
  }
): VaultLogger | undefined {
  if (mode === "none") return undefined;

  const minLevel = options?.level ?? "info";

  const shouldLog = (entry: LogEntry) =>
    levelRank(entry.level) <= levelRank(minLevel);

  const normalize = (entry: LogEntry) => ({
    time: entry.time ?? Date.now(),
    ...entry,
  });

  /* ---------- console logger ---------- */

  if (mode === "console") {
    return (entry) => {
      if (!shouldLog(entry)) return;
      console.log(JSON.stringify(normalize(entry)));
    };
  }

  /* ---------- file logger ---------- */

  if (!options?.filePath) {
    console.warn("File logger disabled: filePath not set");
    return undefined;
  }

  try {
    const target = path.resolve(options.filePath);
    fs.mkdirSync(path.dirname(target), { recursive: true });

    const stream = fs.createWriteStream(target, { flags: "a" });
    stream.on("error", (err) => {
      console.error("file logger stream error:", err);
    });

    return (entry) => {
      if (!shouldLog(entry)) return;
      stream.write(JSON.stringify(normalize(entry)) + "\n");
    };
  } catch (err) {
    console.warn("Failed to initialize file logger:", err);
    return undefined;
  }
}
