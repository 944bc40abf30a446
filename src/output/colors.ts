/**
 * ANSI color codes and prefixed console output
 */

import {
  MS_PER_SECOND,
  SECONDS_PER_HOUR,
  SECONDS_PER_MINUTE,
} from '../utils/constants.js';

export const colors = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  bold: '\x1b[1m',
  cyan: '\x1b[36m',
  yellow: '\x1b[33m',
  green: '\x1b[32m',
  red: '\x1b[31m',
  magenta: '\x1b[35m',
  blue: '\x1b[34m',
} as const;

/**
 * Strip ANSI escape codes from a string
 */
// eslint-disable-next-line no-control-regex -- ANSI escape codes require control characters
const ANSI_REGEX = /\x1b\[[0-9;]*[a-zA-Z]/g;

export function stripAnsi(str: string): string {
  return str.replace(ANSI_REGEX, '');
}

/**
 * Truncate a string to a maximum length
 */
export function truncate(str: string, len: number): string {
  if (str.length <= len) {
    return str;
  }
  return str.slice(0, len) + '...';
}

/**
 * Format duration in human-readable form
 * Examples: 450ms, 2.5s, 1m30s, 1h2m3s
 */
export function formatDuration(ms: number): string {
  if (ms < MS_PER_SECOND) {
    return `${ms}ms`;
  }
  const totalSeconds = ms / MS_PER_SECOND;
  if (totalSeconds < SECONDS_PER_MINUTE) {
    return `${totalSeconds.toFixed(1)}s`;
  }
  const hours = Math.floor(totalSeconds / SECONDS_PER_HOUR);
  const mins = Math.floor((totalSeconds % SECONDS_PER_HOUR) / SECONDS_PER_MINUTE);
  const secs = Math.round(totalSeconds % SECONDS_PER_MINUTE);
  if (hours > 0) {
    return `${hours}h${mins}m${secs}s`;
  }
  return `${mins}m${secs}s`;
}

/**
 * Format current timestamp as HH:MM:SS.mmm
 */
export function formatTimestamp(date: Date = new Date()): string {
  const h = date.getHours().toString().padStart(2, '0');
  const m = date.getMinutes().toString().padStart(2, '0');
  const s = date.getSeconds().toString().padStart(2, '0');
  const ms = date.getMilliseconds().toString().padStart(3, '0');
  return `${h}:${m}:${s}.${ms}`;
}

/**
 * Get a timestamped prefix for output lines
 */
export function timestampPrefix(): string {
  return `${colors.dim}${formatTimestamp()}${colors.reset} `;
}

export type LogSink = (line: string) => void;

/**
 * Module-level log sink, configured once at startup
 */
let logSink: LogSink | null = null;

/**
 * Configure the sink that receives every printed line
 * Call once at startup when file logging is enabled
 */
export function configureLogSink(sink: LogSink | null): void {
  logSink = sink;
}

function emit(write: (line: string) => void, line: string): void {
  write(line);
  logSink?.(line);
}

/**
 * Print a [MACRO] runner message with timestamp
 */
export function printMacro(message: string): void {
  emit(
    console.log,
    `${timestampPrefix()}${colors.magenta}[MACRO]${colors.reset} ${message}`
  );
}

/**
 * Print a [MACRO] informational line (startup details, variable dumps)
 */
export function printMacroInfo(message: string): void {
  emit(
    console.log,
    `${timestampPrefix()}${colors.magenta}[MACRO]${colors.reset} ${colors.dim}${message}${colors.reset}`
  );
}

/**
 * Print an [ACTION] message for mouse/keyboard/vision activity
 */
export function printAction(message: string): void {
  emit(
    console.log,
    `${timestampPrefix()}${colors.cyan}[ACTION]${colors.reset} ${message}`
  );
}

/**
 * Print a warning that does not stop the run
 */
export function printWarning(message: string): void {
  emit(
    console.log,
    `${timestampPrefix()}${colors.yellow}[WARN]${colors.reset} ${message}`
  );
}

/**
 * Print an error line to stderr
 */
export function printError(message: string): void {
  emit(
    console.error,
    `${timestampPrefix()}${colors.red}[ERROR]${colors.reset} ${message}`
  );
}
