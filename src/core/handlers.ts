/**
 * Instruction handlers
 *
 * One handler per opcode. Handlers mutate the execution state (variables,
 * last-status, PC) and call the action adapter; the runner owns the loop
 * and the PC advance that follows every handler.
 */

import * as path from 'path';

import {
  colors,
  printAction,
  printMacro,
  printWarning,
  truncate,
} from '../output/colors.js';
import { evaluateCondition } from '../script/expression.js';
import type { Command, MouseTarget, Opcode } from '../script/types.js';
import {
  formatValue,
  getPosition,
  getSubstitutionList,
  increaseVariable,
  position,
  setVariable,
} from '../script/variables.js';
import {
  STATUS_FAILURE,
  STATUS_SUCCESS,
  TRUNCATE_ERROR,
} from '../utils/constants.js';
import { locate, toLogical } from '../vision/locator.js';
import { errorMessage, MacroSyntaxError, TemplateError } from './errors.js';
import type { ExecutionState, MacroContext } from './runner.js';

type CommandOf<K extends Opcode> = Extract<Command, { op: K }>;

/**
 * Sleep for a given number of milliseconds
 */
function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Settle time after an input action
 */
async function pauseAfterAction(context: MacroContext): Promise<void> {
  if (context.config.actionPauseMs > 0) {
    await sleep(context.config.actionPauseMs);
  }
}

function isVerbose(context: MacroContext): boolean {
  return context.config.verbosity === 'verbose';
}

function isQuiet(context: MacroContext): boolean {
  return context.config.verbosity === 'quiet';
}

function handleVarSet(
  command: CommandOf<'var-set'>,
  state: ExecutionState,
  context: MacroContext
): void {
  setVariable(state.store, command.name, command.value);
  if (!isQuiet(context)) {
    printMacro(`Set $${command.name} = ${formatValue(command.value)}`);
  }
}

function handleVarIncrease(
  command: CommandOf<'var-increase'>,
  state: ExecutionState,
  context: MacroContext
): void {
  const next = increaseVariable(state.store, command.name, command.delta);
  if (!isQuiet(context)) {
    printMacro(
      `Increased $${command.name} by ${command.delta}, now = ${next.value}`
    );
  }
}

function handleGoto(
  command: CommandOf<'goto'>,
  state: ExecutionState,
  context: MacroContext
): void {
  const target = state.program.checkpoints.get(command.name);
  if (target === undefined) {
    throw new MacroSyntaxError(`Checkpoint '${command.name}' not found`);
  }
  // Lands on the checkpoint line; the runner's advance moves past it
  state.pc = target;
  if (isVerbose(context)) {
    printMacro(`Jumping to checkpoint: ${command.name}`);
  }
  context.logger.logEvent({ event: 'goto', checkpoint: command.name, pc: target });
}

/**
 * Flat scan for the next literal `end`; nesting is not tracked, so the
 * first `end` closes the skip. Without one the PC runs off the program.
 */
function skipToEnd(state: ExecutionState): void {
  const { instructions } = state.program;
  let pc = state.pc + 1;
  while (pc < instructions.length && instructions[pc]?.text !== 'end') {
    pc++;
  }
  state.pc = pc;
}

function handleIf(
  command: CommandOf<'if'>,
  state: ExecutionState,
  context: MacroContext
): void {
  const used = getSubstitutionList(command.condition, state.store);
  const result = evaluateCondition(command.condition, state.store);

  if (result.error !== null) {
    printWarning(
      `Error evaluating condition '${result.expression}': ${result.error}`
    );
    context.logger.logEvent({
      event: 'condition_error',
      condition: command.condition,
      expression: result.expression,
      error: result.error,
    });
  }

  if (isVerbose(context)) {
    const withClause = used.length > 0 ? ` (with ${used.join(', ')})` : '';
    printMacro(
      `Condition '${command.condition}'${withClause} is ${result.value ? 'true' : 'false'}`
    );
  }

  if (!result.value) {
    skipToEnd(state);
  }
}

function resolveTarget(
  target: MouseTarget,
  state: ExecutionState
): { x: number; y: number } {
  if (target.kind === 'coordinates') {
    return { x: target.x, y: target.y };
  }
  const { x, y } = getPosition(state.store, target.name);
  return { x, y };
}

async function handleMouseMove(
  command: CommandOf<'mouse-move'>,
  state: ExecutionState,
  context: MacroContext
): Promise<void> {
  const { x, y } = resolveTarget(command.target, state);
  await context.actions.moveTo(x, y);
  if (!isQuiet(context)) {
    printAction(`Mouse moved to (${x}, ${y})`);
  }
  await pauseAfterAction(context);
}

async function handleMouseButton(
  command: CommandOf<'mouse-button'>,
  context: MacroContext
): Promise<void> {
  const { button, action } = command;
  if (action === 'click') {
    await context.actions.click(button);
  } else if (action === 'down') {
    await context.actions.buttonDown(button);
  } else {
    await context.actions.buttonUp(button);
  }
  if (!isQuiet(context)) {
    printAction(`Mouse ${button} ${action}`);
  }
  await pauseAfterAction(context);
}

async function handleKey(
  command: CommandOf<'key'>,
  context: MacroContext
): Promise<void> {
  const { key, action } = command;
  if (action === 'press') {
    await context.actions.keyPress(key);
  } else if (action === 'down') {
    await context.actions.keyDown(key);
  } else {
    await context.actions.keyUp(key);
  }
  if (!isQuiet(context)) {
    printAction(`Key ${action}: ${key}`);
  }
  await pauseAfterAction(context);
}

async function handleKeyType(
  command: CommandOf<'key-type'>,
  context: MacroContext
): Promise<void> {
  await context.actions.typeText(command.text);
  if (!isQuiet(context)) {
    printAction(`Typed: ${command.text}`);
  }
  await pauseAfterAction(context);
}

async function handleSleep(
  command: CommandOf<'sleep'>,
  context: MacroContext
): Promise<void> {
  await sleep(command.ms);
  if (isVerbose(context)) {
    printMacro(`Slept for ${command.ms}ms`);
  }
}

/**
 * Relative template paths resolve against the macro file's directory
 */
export function resolveTemplatePath(templatePath: string, source: string): string {
  if (path.isAbsolute(templatePath)) {
    return templatePath;
  }
  return path.resolve(path.dirname(source), templatePath);
}

/**
 * Locate a template on screen and store its logical center
 *
 * Never fails the run: every problem ends as last-status 1 plus a log line.
 */
async function handleCvMatch(
  command: CommandOf<'cv-match'>,
  state: ExecutionState,
  context: MacroContext
): Promise<void> {
  const templatePath = resolveTemplatePath(command.path, state.program.source);
  const percent = Math.round(command.threshold * 100);

  try {
    const template = await context.actions.loadImage(templatePath);
    if (!template) {
      throw new TemplateError(`Template image not found: ${templatePath}`);
    }
    const capture = await context.actions.captureScreen();
    const logical = await context.actions.logicalScreenSize();
    const match = locate(capture, template, command.threshold);
    const confidence = match.confidence.toFixed(2);

    if (!match.found) {
      state.store.lastStatus = STATUS_FAILURE;
      if (!isQuiet(context)) {
        printAction(
          `No match for ${command.path} (confidence ${confidence} < ${percent}%)`
        );
      }
      context.logger.logEvent({
        event: 'cv_match',
        template: templatePath,
        found: false,
        confidence: match.confidence,
      });
      return;
    }

    const point = toLogical(match.center, capture, logical);
    setVariable(state.store, command.name, position(point.x, point.y));
    state.store.lastStatus = STATUS_SUCCESS;
    if (!isQuiet(context)) {
      printAction(
        `Matched ${command.path} at (${point.x}, ${point.y}) ${colors.dim}confidence ${confidence}${colors.reset} -> $${command.name}`
      );
    }
    context.logger.logEvent({
      event: 'cv_match',
      template: templatePath,
      found: true,
      confidence: match.confidence,
      x: point.x,
      y: point.y,
    });
  } catch (error) {
    const message = errorMessage(error);
    state.store.lastStatus = STATUS_FAILURE;
    printWarning(
      `Template match failed for ${command.path}: ${truncate(message, TRUNCATE_ERROR)}`
    );
    context.logger.logEvent({
      event: 'cv_match',
      template: templatePath,
      found: false,
      error: message,
    });
  }
}

function handleUnknown(command: CommandOf<'unknown'>, context: MacroContext): void {
  printWarning(`Unknown command: ${command.text}`);
  context.logger.logEvent({ event: 'unknown_command', text: command.text });
}

/**
 * Dispatch a decoded command to its handler
 */
export async function executeCommand(
  command: Command,
  state: ExecutionState,
  context: MacroContext
): Promise<void> {
  switch (command.op) {
    case 'var-set':
      return handleVarSet(command, state, context);
    case 'var-increase':
      return handleVarIncrease(command, state, context);
    case 'checkpoint':
    case 'end':
      // Markers only
      return;
    case 'goto':
      return handleGoto(command, state, context);
    case 'mouse-move':
      return handleMouseMove(command, state, context);
    case 'mouse-button':
      return handleMouseButton(command, context);
    case 'key':
      return handleKey(command, context);
    case 'key-type':
      return handleKeyType(command, context);
    case 'sleep':
      return handleSleep(command, context);
    case 'if':
      return handleIf(command, state, context);
    case 'cv-match':
      return handleCvMatch(command, state, context);
    case 'unknown':
      return handleUnknown(command, context);
  }
}
