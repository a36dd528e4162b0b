import { configureSpinners, pauseSpinner } from "./ui.js";

export type LogLevel = "debug" | "info" | "warn" | "error";
export type OutputMode = "normal" | "quiet" | "json";

export interface LogRecord {
  level: LogLevel;
  message: string;
}

export type LogListener = (record: LogRecord) => void;

let currentLevel: LogLevel = "info";
let colorEnabled = true;
let outputMode: OutputMode = "normal";
const listeners = new Set<LogListener>();

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const COLORS = {
  reset: "\x1b[0m",
  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  cyan: "\x1b[36m",
  gray: "\x1b[90m",
  bold: "\x1b[1m",
};

function c(color: keyof typeof COLORS, text: string): string {
  return colorEnabled ? `${COLORS[color]}${text}${COLORS.reset}` : text;
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

export function configureLogger(opts: { level: LogLevel; color: boolean }): void {
  currentLevel = opts.level;
  colorEnabled = opts.color;
}

export function configureOutputMode(mode: OutputMode): void {
  outputMode = mode;
  configureSpinners({ silent: mode !== "normal" });
}

export function isQuiet(): boolean {
  return outputMode === "quiet" || outputMode === "json";
}

export function getOutputMode(): OutputMode {
  return outputMode;
}

/**
 * Receive every record that passes the level filter, whatever the output
 * mode. Returns the unsubscribe function.
 */
export function onLog(listener: LogListener): () => void {
  listeners.add(listener);
  return () => {
    listeners.delete(listener);
  };
}

/** Level filter and listeners; true when the line should also be printed */
function record(level: LogLevel, message: string): boolean {
  if (!shouldLog(level)) return false;
  for (const listener of listeners) listener({ level, message });
  return !isQuiet() || level === "error";
}

/** Pause spinner, log, resume spinner */
function withSpinnerPause(fn: () => void): void {
  const resume = pauseSpinner();
  fn();
  resume?.();
}

/** Raw content output (command results). Suppressed when quiet/json. */
export function output(msg: string): void {
  if (isQuiet()) return;
  withSpinnerPause(() => console.log(msg));
}

export function debug(msg: string): void {
  if (record("debug", msg)) withSpinnerPause(() => console.log(c("gray", `[debug] ${msg}`)));
}

export function info(msg: string): void {
  if (record("info", msg)) withSpinnerPause(() => console.log(c("cyan", "ℹ") + ` ${msg}`));
}

export function success(msg: string): void {
  if (record("info", msg)) withSpinnerPause(() => console.log(c("green", "✓") + ` ${msg}`));
}

/** Warnings and errors go to stderr so piped command output stays clean */
export function warn(msg: string): void {
  if (record("warn", msg)) withSpinnerPause(() => console.error(c("yellow", "⚠") + ` ${msg}`));
}

export function error(msg: string): void {
  if (record("error", msg)) withSpinnerPause(() => console.error(c("red", "✗") + ` ${msg}`));
}

export function heading(msg: string): void {
  if (isQuiet()) return;
  withSpinnerPause(() => console.log(c("bold", msg)));
}
