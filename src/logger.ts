export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

// Level names accepted on the command line besides the ones above.
const LEVEL_ALIASES = new Map<string, LogLevel>([
  ["warning", "warn"],
  ["critical", "error"],
]);

const RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 };

/** Case-insensitive; undefined for names that are not a level. */
export function parseLogLevel(value: string): LogLevel | undefined {
  const name = value.trim().toLowerCase();
  return LEVEL_ALIASES.get(name) ?? LOG_LEVELS.find((level) => level === name);
}

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

// 2024/03/01 13:05:09
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}/${pad(date.getMonth() + 1)}/${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

export function createConsoleLogger(
  level: LogLevel = "info",
  write: (line: string) => void = (line) => console.error(line),
  clock: () => Date = () => new Date()
): Logger {
  const emit = (msgLevel: Exclude<LogLevel, "silent">, message: string) => {
    if (RANK[msgLevel] < RANK[level]) return;
    write(`${msgLevel.toUpperCase()} | ${formatTimestamp(clock())} | ${message}`);
  };
  return {
    debug: (message) => emit("debug", message),
    info: (message) => emit("info", message),
    warn: (message) => emit("warn", message),
    error: (message) => emit("error", message),
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
