/**
 * Runner configuration and CLI types
 */

import {
  DEFAULT_ACTION_PAUSE_MS,
  DEFAULT_LOG_DIR,
} from '../utils/constants.js';

export type Verbosity = 'quiet' | 'normal' | 'verbose';

/**
 * How a macro is run
 * - execute: real input through the desktop adapter
 * - simulate: control flow and variables only, actions are recorded
 * - dry-run: parse and list instructions, execute nothing
 */
export type RunMode = 'execute' | 'simulate' | 'dry-run';

/**
 * Runner configuration
 */
export interface MacroConfig {
  verbosity: Verbosity;
  mode: RunMode;
  enableLog: boolean;
  logDir: string;
  /** Pause after every mouse/keyboard action */
  actionPauseMs: number;
}

/**
 * Default runner configuration
 */
export const DEFAULT_CONFIG: MacroConfig = {
  verbosity: 'normal',
  mode: 'execute',
  enableLog: true,
  logDir: DEFAULT_LOG_DIR,
  actionPauseMs: DEFAULT_ACTION_PAUSE_MS,
};

/**
 * Parsed CLI arguments
 */
export interface ParsedArgs {
  /** Path to the macro file */
  macroFile: string;
  /** Print the numbered instruction list before running */
  listInstructions: boolean;
  config: Partial<MacroConfig>;
}
