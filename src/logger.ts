import chalk from "chalk";

export type LogLevel = "debug" | "info" | "warn" | "error";
export type LogContext = Record<string, unknown>;

export type Logger = {
  level: LogLevel;
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, error?: unknown, context?: LogContext): void;
};

const ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

const TAGS: Record<LogLevel, string> = {
  debug: chalk.gray("debug"),
  info: chalk.cyan("info "),
  warn: chalk.yellow("warn "),
  error: chalk.red("error")
};

function formatValue(v: unknown): string {
  if (typeof v === "string") return /\s/.test(v) ? JSON.stringify(v) : v;
  if (v instanceof Error) return JSON.stringify(v.message);
  return JSON.stringify(v) ?? String(v);
}

export function formatContext(context?: LogContext): string {
  if (!context) return "";
  const pairs = Object.entries(context)
    .filter(([, v]) => v !== undefined)
    .map(([k, v]) => `${k}=${formatValue(v)}`);
  return pairs.length ? " " + chalk.gray(pairs.join(" ")) : "";
}

/**
 * Leveled logger. Writes to stderr so stdout stays usable for piping a
 * report or JSON into other tools.
 */
export function createLogger(opts: { level?: LogLevel; write?: (line: string) => void } = {}): Logger {
  const level = opts.level ?? "info";
  const write = opts.write ?? ((line: string) => process.stderr.write(line + "\n"));

  const emit = (lvl: LogLevel, message: string, context?: LogContext) => {
    if (ORDER[lvl] < ORDER[level]) return;
    write(`${TAGS[lvl]} ${message}${formatContext(context)}`);
  };

  return {
    level,
    debug: (message, context) => emit("debug", message, context),
    info: (message, context) => emit("info", message, context),
    warn: (message, context) => emit("warn", message, context),
    error: (message, error, context) =>
      emit("error", message, error === undefined ? context : { ...context, error })
  };
}
