/**
 * Leveled console logging plus the small text layouts (section headers,
 * progress bars, tables) the CLI prints.
 */

import chalk from "chalk";

import { DEFAULT_TUNING } from "../config/defaults.js";

/**
 * Log levels.
 */
export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * Logger configuration.
 */
export interface LoggerConfig {
  level: LogLevel;
  timestamps: boolean;
  colors: boolean;
}

const defaultConfig: LoggerConfig = {
  level: "info",
  timestamps: false,
  colors: true,
};

let config: LoggerConfig = { ...defaultConfig };

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LEVEL_STYLES: Record<LogLevel, (text: string) => string> = {
  debug: (text) => chalk.gray(text),
  info: (text) => chalk.blue(text),
  warn: (text) => chalk.yellow(text),
  error: (text) => chalk.red(text),
};

const LEVEL_SINKS: Record<LogLevel, (...args: unknown[]) => void> = {
  debug: (...args) => {
    console.debug(...args);
  },
  info: (...args) => {
    console.info(...args);
  },
  warn: (...args) => {
    console.warn(...args);
  },
  error: (...args) => {
    console.error(...args);
  },
};

/**
 * Configure the logger.
 *
 * @param newConfig - Partial configuration to apply
 */
export function configureLogger(newConfig: Partial<LoggerConfig>): void {
  config = { ...config, ...newConfig };
}

/**
 * Restore the default configuration.
 */
export function resetLogger(): void {
  config = { ...defaultConfig };
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[config.level];
}

function style(text: string, apply: (text: string) => string): string {
  return config.colors ? apply(text) : text;
}

function formatMessage(level: LogLevel, message: string): string {
  const timestamp = config.timestamps ? `[${new Date().toISOString()}] ` : "";
  const tag = style(`[${level.toUpperCase()}]`, LEVEL_STYLES[level]);
  return `${timestamp}${tag} ${message}`;
}

function emit(level: LogLevel, message: string, args: unknown[]): void {
  if (shouldLog(level)) {
    LEVEL_SINKS[level](formatMessage(level, message), ...args);
  }
}

export function debug(message: string, ...args: unknown[]): void {
  emit("debug", message, args);
}

export function info(message: string, ...args: unknown[]): void {
  emit("info", message, args);
}

export function warn(message: string, ...args: unknown[]): void {
  emit("warn", message, args);
}

export function error(message: string, ...args: unknown[]): void {
  emit("error", message, args);
}

/**
 * Log a success message (info level).
 *
 * @param message - Message to log
 */
export function success(message: string): void {
  if (shouldLog("info")) {
    console.log(
      config.colors ? chalk.green(`✅ ${message}`) : `[SUCCESS] ${message}`,
    );
  }
}

/**
 * Log a section header, e.g. the start of one judge's run.
 *
 * @param title - Section title
 * @param itemCount - Optional item count
 */
export function sectionHeader(title: string, itemCount?: number): void {
  if (!shouldLog("info")) {
    return;
  }

  const separator = "=".repeat(60);
  const countStr =
    itemCount !== undefined ? ` (${String(itemCount)} items)` : "";
  const heading = `${title.toUpperCase()}${countStr}`;

  console.log(style(separator, (text) => chalk.cyan(text)));
  console.log(style(heading, (text) => chalk.cyan.bold(text)));
  console.log(style(separator, (text) => chalk.cyan(text)));
}

/**
 * Text progress bar.
 *
 * @param current - Completed units
 * @param total - Total units; an empty total renders as full
 * @param width - Bar width in characters
 * @returns Bar such as "[█████░░░░░]"
 */
export function progressBar(
  current: number,
  total: number,
  width = DEFAULT_TUNING.limits.progress_bar_width,
): string {
  const ratio = total > 0 ? Math.min(current / total, 1) : 1;
  const filled = Math.round(ratio * width);
  return `[${"█".repeat(filled)}${"░".repeat(width - filled)}]`;
}

/**
 * One-line progress summary: counter, bar and percentage.
 *
 * @example
 * ```typescript
 * progressLine(3, 4, 8); // "[3/4] [██████░░] 75%"
 * ```
 */
export function progressLine(
  current: number,
  total: number,
  width = DEFAULT_TUNING.limits.progress_bar_width,
): string {
  const pct = total > 0 ? Math.round((current / total) * 100) : 100;
  return `[${String(current)}/${String(total)}] ${progressBar(current, total, width)} ${String(pct)}%`;
}

/**
 * Column alignment for {@link table}.
 */
export type ColumnAlign = "left" | "right";

/**
 * Render rows as a plain-text table.
 *
 * @param headers - Column headers
 * @param rows - Table rows
 * @param align - Per-column alignment (left when omitted)
 * @returns Table string
 */
export function table(
  headers: string[],
  rows: string[][],
  align: readonly ColumnAlign[] = [],
): string {
  const widths = headers.map((h, i) =>
    rows.reduce((max, row) => Math.max(max, (row[i] ?? "").length), h.length),
  );

  const pad = (cell: string, i: number): string => {
    const width = widths[i] ?? 0;
    return align[i] === "right" ? cell.padStart(width) : cell.padEnd(width);
  };

  const headerRow = headers.map(pad).join(" | ");
  const separator = widths.map((w) => "-".repeat(w)).join("-+-");
  const dataRows = rows.map((row) => row.map(pad).join(" | "));

  return [headerRow, separator, ...dataRows].join("\n");
}

/**
 * Default logger instance.
 */
export const logger = {
  debug,
  info,
  warn,
  error,
  success,
  sectionHeader,
  configure: configureLogger,
  reset: resetLogger,
};
