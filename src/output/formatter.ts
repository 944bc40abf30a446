/**
 * Console formatting for instruction listings and run summaries
 */

import type { RunResult } from '../core/runner.js';
import type { Program } from '../script/types.js';
import { getVariableSummary } from '../script/variables.js';
import { TRUNCATE_INSTRUCTION } from '../utils/constants.js';
import { colors, formatDuration, truncate } from './colors.js';

/**
 * Numbered instruction list, one entry per executable line
 *
 * Numbers are program slots (1-based); the source line follows in brackets
 * when comments or blank lines shifted it.
 */
export function formatInstructionList(program: Program): string[] {
  const header = `Parsed ${program.instructions.length} instructions from ${program.source}`;
  const lines = program.instructions.map((instruction) => {
    const slot = instruction.index + 1;
    const origin =
      instruction.line !== slot
        ? ` ${colors.dim}[line ${instruction.line}]${colors.reset}`
        : '';
    return `  ${slot}: ${truncate(instruction.text, TRUNCATE_INSTRUCTION)}${origin}`;
  });
  return [header, ...lines];
}

/**
 * One-line completion summary
 * Example: "completed 12 instructions in 1.5s"
 */
export function formatRunSummary(result: RunResult, durationMs: number): string {
  const count = `${result.executed} instruction${result.executed === 1 ? '' : 's'}`;
  const duration = formatDuration(durationMs);
  if (result.status === 'ok') {
    return `${colors.green}completed${colors.reset} ${count} in ${duration}`;
  }
  const line = result.error ? ` at line ${result.error.line}` : '';
  return `${colors.red}stopped${colors.reset}${line} after ${count} in ${duration}`;
}

/**
 * Final variable values, indented for display under the summary
 */
export function formatVariables(result: RunResult): string[] {
  return getVariableSummary(result.store).map((line) => `  ${line}`);
}
