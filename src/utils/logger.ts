import chalk from "chalk";

export enum LogLevel {
  Debug = "debug",
  Info = "info",
  Warn = "warn",
  Error = "error",
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
  timestamp: string;
}

export type LogHandler = (entry: LogEntry) => void;

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  [LogLevel.Debug]: 0,
  [LogLevel.Info]: 1,
  [LogLevel.Warn]: 2,
  [LogLevel.Error]: 3,
};

const levelColor: Record<LogLevel, (s: string) => string> = {
  [LogLevel.Debug]: chalk.gray,
  [LogLevel.Info]: chalk.blue,
  [LogLevel.Warn]: chalk.yellow.bold,
  [LogLevel.Error]: chalk.red.bold,
};

function formatContext(context: Record<string, unknown> | undefined): string {
  if (!context) return "";
  const parts = Object.entries(context).map(([k, v]) => `${k}=${typeof v === "string" ? v : JSON.stringify(v)}`);
  return parts.length > 0 ? " " + chalk.dim(parts.join(" ")) : "";
}

/** Writes one line per entry to stderr so stdout stays clean for report output. */
const stderrHandler: LogHandler = (entry) => {
  const tag = levelColor[entry.level](`[${entry.level.toUpperCase().padEnd(5)}]`);
  process.stderr.write(`${chalk.dim(entry.timestamp)} ${tag} ${entry.message}${formatContext(entry.context)}\n`);
};

let currentHandler: LogHandler = stderrHandler;
let currentMinLevel: LogLevel = LogLevel.Info;

export function setLogHandler(handler: LogHandler): void {
  currentHandler = handler;
}

export function resetLogHandler(): void {
  currentHandler = stderrHandler;
}

export function setLogLevel(level: LogLevel): void {
  currentMinLevel = level;
}

function emit(level: LogLevel, message: string, context?: Record<string, unknown>): void {
  if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[currentMinLevel]) return;
  currentHandler({ level, message, context, timestamp: new Date().toISOString() });
}

export const logger = {
  debug: (message: string, context?: Record<string, unknown>) => emit(LogLevel.Debug, message, context),
  info: (message: string, context?: Record<string, unknown>) => emit(LogLevel.Info, message, context),
  warn: (message: string, context?: Record<string, unknown>) => emit(LogLevel.Warn, message, context),
  error: (message: string, context?: Record<string, unknown>) => emit(LogLevel.Error, message, context),
};
