/**
 * File logging with ANSI stripping
 */

import * as fs from 'fs';
import * as path from 'path';

import { stripAnsi } from './colors.js';

/**
 * Macro event for structured logging
 */
export interface MacroEvent {
  type: 'macro';
  event: string;
  timestamp: string;
  [key: string]: unknown;
}

export interface Logger {
  log(msg: string): void;
  logEvent(event: Omit<MacroEvent, 'type' | 'timestamp'>): void;
  close(): void;
  filePath: string | null;
}

/**
 * Logger that discards everything
 */
export function createNullLogger(): Logger {
  return {
    log: () => undefined,
    logEvent: () => undefined,
    close: () => undefined,
    filePath: null,
  };
}

/**
 * Create a logger that writes to a timestamped log file
 *
 * @param macroName - Macro file path; its base name prefixes the log file
 */
export function createLogger(
  enabled: boolean,
  logDir: string,
  macroName: string
): Logger {
  if (!enabled) {
    return createNullLogger();
  }

  // Ensure log directory exists
  if (!fs.existsSync(logDir)) {
    fs.mkdirSync(logDir, { recursive: true });
  }

  // Create timestamped filename
  const timestamp = new Date().toISOString().replace(/[:.]/g, '-').slice(0, 19);
  const sanitizedName = path.basename(macroName, path.extname(macroName));
  const logFile = path.join(logDir, `${sanitizedName}-${timestamp}.log`);
  const logStream = fs.createWriteStream(logFile, { flags: 'a' });

  return {
    log(msg: string): void {
      logStream.write(stripAnsi(msg) + '\n');
    },
    logEvent(eventData: Omit<MacroEvent, 'type' | 'timestamp'>): void {
      const fullEvent = {
        type: 'macro' as const,
        timestamp: new Date().toISOString(),
        ...eventData,
      };
      logStream.write(JSON.stringify(fullEvent) + '\n');
    },
    close(): void {
      logStream.end();
    },
    filePath: logFile,
  };
}
