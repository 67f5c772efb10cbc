/**
 * Structured logging.
 *
 * - JSON lines in production, coloured single lines otherwise
 * - levels: debug, info, warn, error, fatal
 * - child loggers carry a component path and default context
 *
 * Environment variables:
 * - LOG_LEVEL: minimum level. Default: info
 * - LOG_FORMAT: json | pretty. Default: json when NODE_ENV=production
 */
import chalk, { type ChalkInstance } from "chalk";

export type LogLevel = "debug" | "info" | "warn" | "error" | "fatal";
export type LogFormat = "json" | "pretty";

export interface LogContext {
  [key: string]: unknown;
}

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  service: string;
  component?: string;
  message: string;
  error?: { name: string; message: string; stack?: string };
  [key: string]: unknown;
}

export const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
};

const LEVEL_COLORS: Record<LogLevel, ChalkInstance> = {
  debug: chalk.cyan,
  info: chalk.green,
  warn: chalk.yellow,
  error: chalk.red,
  fatal: chalk.magenta,
};

export function isLogLevel(v: string): v is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, v);
}

export interface LoggerSettings {
  level: LogLevel;
  format: LogFormat;
  /** Where formatted lines go. Defaults to the console stream for the level. */
  sink?: (level: LogLevel, line: string) => void;
}

function settingsFromEnv(env: NodeJS.ProcessEnv = process.env): LoggerSettings {
  const level = env.LOG_LEVEL?.toLowerCase() ?? "";
  const format = env.LOG_FORMAT?.toLowerCase();
  return {
    level: isLogLevel(level) ? level : "info",
    format: format === "json" || format === "pretty" ? format : env.NODE_ENV === "production" ? "json" : "pretty",
  };
}

let settings: LoggerSettings = settingsFromEnv();

/** Replaces the process-wide logger settings (level, format, sink). */
export function configureLogging(next: Partial<LoggerSettings>): void {
  settings = { ...settings, ...next };
}

function formatError(error: unknown): LogEntry["error"] {
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack };
  }
  return { name: "UnknownError", message: String(error) };
}

function formatPretty(entry: LogEntry): string {
  const { timestamp, level, service, component, message, error, ...meta } = entry;
  const path = component ? `${service}:${component}` : service;
  const metaStr = Object.keys(meta).length > 0 ? ` ${chalk.dim(JSON.stringify(meta))}` : "";
  const errorStr = error ? `\n  ${chalk.dim(error.stack ?? error.message)}` : "";
  const levelStr = LEVEL_COLORS[level].bold(level.toUpperCase().padEnd(5));
  return `${chalk.dim(timestamp)} ${levelStr} ${chalk.dim(`[${path}]`)} ${message}${metaStr}${errorStr}`;
}

function output(entry: LogEntry): void {
  const line = settings.format === "json" ? JSON.stringify(entry) : formatPretty(entry);
  if (settings.sink) {
    settings.sink(entry.level, line);
    return;
  }
  switch (entry.level) {
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
    case "fatal":
      console.error(line);
      break;
  }
}

export interface ILogger {
  debug(message: string, meta?: LogContext): void;
  info(message: string, meta?: LogContext): void;
  warn(message: string, meta?: LogContext, error?: unknown): void;
  error(message: string, meta?: LogContext, error?: unknown): void;
  fatal(message: string, meta?: LogContext, error?: unknown): void;
  child(component: string, defaultContext?: LogContext): ILogger;
  isLevelEnabled(level: LogLevel): boolean;
}

export class Logger implements ILogger {
  constructor(
    private readonly service: string,
    private readonly component?: string,
    private readonly defaultContext: LogContext = {},
  ) {}

  isLevelEnabled(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[settings.level];
  }

  private log(level: LogLevel, message: string, meta?: LogContext, error?: unknown): void {
    if (!this.isLevelEnabled(level)) return;

    // caller context never overrides the fixed fields
    const entry: LogEntry = {
      ...this.defaultContext,
      ...meta,
      timestamp: new Date().toISOString(),
      level,
      service: this.service,
      message,
    };
    if (this.component) entry.component = this.component;
    if (error !== undefined) entry.error = formatError(error);

    output(entry);
  }

  debug(message: string, meta?: LogContext): void {
    this.log("debug", message, meta);
  }

  info(message: string, meta?: LogContext): void {
    this.log("info", message, meta);
  }

  warn(message: string, meta?: LogContext, error?: unknown): void {
    this.log("warn", message, meta, error);
  }

  error(message: string, meta?: LogContext, error?: unknown): void {
    this.log("error", message, meta, error);
  }

  fatal(message: string, meta?: LogContext, error?: unknown): void {
    this.log("fatal", message, meta, error);
  }

  child(component: string, defaultContext: LogContext = {}): ILogger {
    const path = this.component ? `${this.component}:${component}` : component;
    return new Logger(this.service, path, { ...this.defaultContext, ...defaultContext });
  }
}

export function createLogger(service: string): ILogger {
  return new Logger(service);
}

/** Root logger of the service. */
export const logger = createLogger("fuzzy_engine");

/** Formats a duration in milliseconds the way log lines show it: "850µs", "12.3ms", "1.50s". */
export function readableDuration(ms: number): string {
  // units are picked after rounding, so 59.999s reads "1m0s" rather than "60.00s"
  const micros = Math.round(ms * 1000);
  if (micros < 1000) return `${micros}µs`;
  const tenths = Math.round(ms * 10);
  if (tenths < 10_000) return `${(tenths / 10).toFixed(1)}ms`;
  const hundredths = Math.round(ms / 10);
  if (hundredths < 6000) return `${(hundredths / 100).toFixed(2)}s`;
  const seconds = Math.round(ms / 1000);
  return `${Math.floor(seconds / 60)}m${seconds % 60}s`;
}
