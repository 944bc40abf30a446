/**
 * Centralized constants for the macro runner
 * Replaces magic numbers with descriptive names
 */

// === Display Limits ===
/** Truncation length for instruction text in console output */
export const TRUNCATE_INSTRUCTION = 80;
/** Truncation length for error messages */
export const TRUNCATE_ERROR = 100;
/** Width of the separator line printed around a run */
export const SEPARATOR_WIDTH = 50;

// === Time Constants ===
/** Milliseconds per second */
export const MS_PER_SECOND = 1000;
/** Seconds per minute */
export const SECONDS_PER_MINUTE = 60;
/** Seconds per hour */
export const SECONDS_PER_HOUR = 3600;

/** Longest single sleep; timers clamp anything above to 1ms */
export const MAX_SLEEP_MS = 2_147_483_647;

// === Last-Status Codes ===
/** Last-status after a successful template match */
export const STATUS_SUCCESS = 0;
/** Last-status after a failed template match */
export const STATUS_FAILURE = 1;

// === Simulation Stand-ins ===
/** Logical screen width reported in simulation mode */
export const SIMULATED_SCREEN_WIDTH = 1920;
/** Logical screen height reported in simulation mode */
export const SIMULATED_SCREEN_HEIGHT = 1080;

// === Default Configuration ===
/** Default pause after each input action in ms */
export const DEFAULT_ACTION_PAUSE_MS = 100;
/** Default directory for run logs */
export const DEFAULT_LOG_DIR = 'logs';
