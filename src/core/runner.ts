/**
 * Core runner: program counter loop over a loaded macro
 */

import type { ActionAdapter } from '../actions/types.js';
import { colors, printError, printMacro } from '../output/colors.js';
import type { Logger } from '../output/logger.js';
import { decodeInstruction } from '../script/parser.js';
import type { Program, VariableStore } from '../script/types.js';
import { createVariableStore } from '../script/variables.js';
import type { MacroConfig } from '../types/macro.js';
import { errorMessage } from './errors.js';
import { executeCommand } from './handlers.js';

export interface MacroContext {
  config: MacroConfig;
  logger: Logger;
  actions: ActionAdapter;
}

/**
 * Mutable state of one run, owned by the loop
 */
export interface ExecutionState {
  readonly program: Program;
  /** Index of the instruction being executed */
  pc: number;
  readonly store: VariableStore;
}

/**
 * Instruction that aborted a run
 */
export interface RunError {
  message: string;
  /** Source line number, 1-based */
  line: number;
  text: string;
}

export type RunStatus = 'ok' | 'error';

export interface RunResult {
  status: RunStatus;
  /** Instructions executed, repeats included */
  executed: number;
  store: VariableStore;
  error: RunError | null;
}

/**
 * Run a program to completion or to its first fatal error
 *
 * After every instruction the PC moves forward by one. A goto or a false
 * `if` has already moved it onto the checkpoint or `end` line, so execution
 * resumes on the line after it. Any handler error stops the run.
 */
export async function runProgram(
  program: Program,
  context: MacroContext,
  store: VariableStore = createVariableStore()
): Promise<RunResult> {
  const { config, logger } = context;
  const state: ExecutionState = { program, pc: 0, store };
  const { instructions } = program;
  let executed = 0;

  while (state.pc < instructions.length) {
    const instruction = instructions[state.pc];
    if (!instruction) break;
    executed++;

    if (config.verbosity === 'verbose') {
      printMacro(
        `${colors.dim}[${instruction.line}]${colors.reset} ${instruction.text}`
      );
    }
    logger.logEvent({
      event: 'instruction',
      line: instruction.line,
      pc: state.pc,
      text: instruction.text,
    });

    try {
      const command = decodeInstruction(instruction.text);
      await executeCommand(command, state, context);
    } catch (error) {
      const message = errorMessage(error);
      printError(
        `Error at line ${instruction.line} ${colors.dim}(${instruction.text})${colors.reset}: ${message}`
      );
      logger.logEvent({
        event: 'run_error',
        line: instruction.line,
        text: instruction.text,
        error: message,
      });
      return {
        status: 'error',
        executed,
        store,
        error: { message, line: instruction.line, text: instruction.text },
      };
    }

    state.pc++;
  }

  return { status: 'ok', executed, store, error: null };
}
