/**
 * CLI argument parsing
 */

import type { MacroConfig, ParsedArgs, RunMode, Verbosity } from '../types/index.js';
import { readPackageVersion } from '../utils/package.js';

const USAGE = 'Usage: macro-runner [options] <macro-file>';

interface RawArgs {
  positionalArgs: string[];
  verbosity: Verbosity;
  mode: RunMode;
  enableLog: boolean;
  logDir: string | null;
  actionPauseMs: number | null;
}

function fail(message: string): never {
  console.error(`Error: ${message}`);
  console.error(USAGE);
  process.exit(1);
}

/**
 * Parse a non-negative integer option value
 */
function parseMs(option: string, value: string | undefined): number {
  if (value === undefined || !/^\d+$/.test(value)) {
    fail(`${option} requires a non-negative integer (ms)`);
  }
  return Number(value);
}

/**
 * Extract options from raw args, returning positional args and config
 */
function extractOptions(args: string[]): RawArgs {
  // Handle --version and --help early
  if (args.includes('--version') || args.includes('-V')) {
    console.log(readPackageVersion());
    process.exit(0);
  }
  if (args.includes('--help') || args.includes('-h')) {
    printUsage();
    process.exit(0);
  }

  let verbosity: Verbosity = 'normal';
  let mode: RunMode = 'execute';
  let enableLog = true;
  let logDir: string | null = null;
  let actionPauseMs: number | null = null;
  const positionalArgs: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? '';
    if (arg === '--quiet' || arg === '-q') {
      verbosity = 'quiet';
    } else if (arg === '--verbose' || arg === '-v') {
      verbosity = 'verbose';
    } else if (arg === '--dry-run') {
      mode = 'dry-run';
    } else if (arg === '--simulate') {
      // --dry-run wins when both are given
      if (mode !== 'dry-run') mode = 'simulate';
    } else if (arg === '--no-log') {
      enableLog = false;
    } else if (arg === '--log-dir') {
      logDir = args[++i] ?? fail('--log-dir requires a directory');
    } else if (arg.startsWith('--log-dir=')) {
      logDir = arg.slice(10);
    } else if (arg === '--pause') {
      actionPauseMs = parseMs('--pause', args[++i]);
    } else if (arg.startsWith('--pause=')) {
      actionPauseMs = parseMs('--pause', arg.slice(8));
    } else if (arg.startsWith('-') && arg !== '-') {
      fail(`unknown option '${arg}'`);
    } else {
      positionalArgs.push(arg);
    }
  }

  return { positionalArgs, verbosity, mode, enableLog, logDir, actionPauseMs };
}

/**
 * Parse CLI arguments
 */
export function parseArgs(args: string[]): ParsedArgs {
  const { positionalArgs, verbosity, mode, enableLog, logDir, actionPauseMs } =
    extractOptions(args);

  const macroFile = positionalArgs[0];
  if (!macroFile) {
    fail('macro file required');
  }
  if (positionalArgs.length > 1) {
    fail(`unexpected argument '${positionalArgs[1] ?? ''}'`);
  }

  const config: Partial<MacroConfig> = { verbosity, mode, enableLog };
  if (logDir !== null) config.logDir = logDir;
  if (actionPauseMs !== null) config.actionPauseMs = actionPauseMs;
  // Simulated actions need no settle time
  else if (mode !== 'execute') config.actionPauseMs = 0;

  return {
    macroFile,
    listInstructions: verbosity === 'verbose' || mode === 'dry-run',
    config,
  };
}

/**
 * Print usage information
 */
export function printUsage(): void {
  console.log(`
Macro Runner - executes desktop automation macro files

${USAGE}

Macro commands:
  var set $name 5 | var set $name (x,y)    Set an integer or position variable
  var increase $name 1                     Add to an integer variable
  checkpoint "name" / goto "name"          Jump to the line after a checkpoint
  mouse move x,y | mouse move $pos         Move the pointer
  mouse left|right|middle click|down|up    Mouse buttons
  key down|up|press <key> / key type "txt" Keyboard
  sleep <ms>                               Wait
  if (<condition>) ... end                 Run the block when the condition holds
  cv match <image.png> <N>% $pos           Find an image on screen ($ = 0 on match, 1 otherwise)

Options:
  --verbose, -v        Print the instruction list and every executed line
  --quiet, -q          Errors and final summary only
  --dry-run            Parse and list instructions without executing
  --simulate           Run logic only; no real mouse, keyboard or screen access
  --pause <ms>         Pause after each input action (default 100, 0 when simulating)
  --no-log             Disable logging to file (enabled by default)
  --log-dir <dir>      Log directory (default: logs)
  --version, -V        Print version
  --help, -h           Show this help
`);
}
