#!/usr/bin/env node
/**
 * Macro Runner - executes desktop automation macro files
 * Variables, checkpoints, conditions and on-screen template matching
 */

import { createActionAdapter } from './actions/index.js';
import { parseArgs } from './cli/args.js';
import { errorMessage } from './core/errors.js';
import { runProgram } from './core/runner.js';
import {
  configureLogSink,
  printMacro,
  printMacroInfo,
} from './output/colors.js';
import {
  formatInstructionList,
  formatRunSummary,
  formatVariables,
} from './output/formatter.js';
import { createLogger } from './output/logger.js';
import { loadMacro } from './script/index.js';
import { DEFAULT_CONFIG, type MacroConfig } from './types/index.js';
import { SEPARATOR_WIDTH } from './utils/constants.js';

async function main(): Promise<void> {
  const startTime = Date.now();
  const parsed = parseArgs(process.argv.slice(2));

  // Merge config with defaults
  const config: MacroConfig = {
    ...DEFAULT_CONFIG,
    ...parsed.config,
  };

  // Missing or unreadable file ends here, before anything runs
  const program = loadMacro(parsed.macroFile);

  if (parsed.listInstructions) {
    for (const line of formatInstructionList(program)) {
      console.log(line);
    }
    console.log();
  }

  if (config.mode === 'dry-run') {
    printMacro('Dry run mode - instructions parsed but not executed');
    process.exit(0);
  }

  const logger = createLogger(config.enableLog, config.logDir, parsed.macroFile);
  if (logger.filePath) {
    configureLogSink((line) => logger.log(line));
  }
  const actions = createActionAdapter(config.mode);

  process.once('SIGINT', () => {
    console.log();
    printMacro('Macro execution interrupted by user');
    logger.logEvent({ event: 'run_interrupted' });
    logger.close();
    process.exit(0);
  });

  if (config.mode === 'simulate') {
    printMacro(`Simulating macro file: ${parsed.macroFile}`);
    printMacroInfo('Simulation mode - logic executed, no mouse/keyboard/screen access');
  } else {
    printMacro(`Executing macro file: ${parsed.macroFile}`);
    printMacroInfo('Press Ctrl+C to stop');
  }
  if (logger.filePath) {
    printMacroInfo(`Log: ${logger.filePath}`);
  }
  logger.logEvent({
    event: 'run_start',
    file: parsed.macroFile,
    mode: config.mode,
    instructions: program.instructions.length,
  });
  console.log('-'.repeat(SEPARATOR_WIDTH));

  const result = await runProgram(program, { config, logger, actions });

  console.log('-'.repeat(SEPARATOR_WIDTH));
  const duration = Date.now() - startTime;
  printMacro(`Macro execution ${formatRunSummary(result, duration)}`);
  if (config.verbosity === 'verbose') {
    for (const line of formatVariables(result)) {
      printMacroInfo(line);
    }
  }

  logger.logEvent({
    event: 'run_complete',
    status: result.status,
    executed: result.executed,
    durationMs: duration,
  });
  logger.close();
  process.exit(result.status === 'ok' ? 0 : 1);
}

// Run main
main().catch((err: unknown) => {
  console.error(`Error: ${errorMessage(err)}`);
  process.exit(1);
});
