/**
 * Macro source parser
 *
 * Splits source text into instructions (registering checkpoints on the way)
 * and decodes a single instruction into a Command:
 * - var set $name 5 / var set $name (10,20) / var increase $name 1
 * - checkpoint "name" / goto "name"
 * - mouse move 10,20 / mouse move $pos / mouse left click
 * - key press enter / key type "text"
 * - sleep 500 / if (cond) / end
 * - cv match button.png 80% $pos
 */

import type {
  ButtonAction,
  KeyAction,
  MouseButton,
} from '../actions/types.js';
import { MacroSyntaxError } from '../core/errors.js';
import { MAX_SLEEP_MS } from '../utils/constants.js';
import type { Command, Instruction, Program } from './types.js';
import { integer, position } from './variables.js';

const NAME = '[A-Za-z_][A-Za-z0-9_]*';
const INT = '-?\\d+';

const VAR_SET_INT = new RegExp(`^var\\s+set\\s+\\$(${NAME})\\s+(${INT})$`);
const VAR_SET_POSITION = new RegExp(
  `^var\\s+set\\s+\\$(${NAME})\\s+\\(\\s*(${INT})\\s*,\\s*(${INT})\\s*\\)$`
);
const VAR_INCREASE = new RegExp(
  `^var\\s+increase\\s+\\$(${NAME})\\s+(${INT})$`
);
const MOUSE_MOVE_COORDS = new RegExp(
  `^mouse\\s+move\\s+(${INT})\\s*,\\s*(${INT})$`
);
const MOUSE_MOVE_VAR = new RegExp(`^mouse\\s+move\\s+\\$(${NAME})$`);
const MOUSE_BUTTON = /^mouse\s+(left|right|middle)\s+(click|down|up)$/;
const KEY_ACTION = /^key\s+(down|up|press)\s+(\S+)$/;
const SLEEP = /^sleep\s+(\d+)$/;
const IF_PREFIX = /^if\s*\(/;
const CV_MATCH_TAIL = new RegExp(`^\\s+(\\d+)%\\s+\\$(${NAME})$`);

/** Get character at position, or empty string if out of bounds */
function charAt(input: string, pos: number): string {
  return input[pos] ?? '';
}

/**
 * Parse a quoted string, handling escape sequences
 * Returns the parsed string and the position after the closing quote
 */
export function parseQuotedString(
  input: string,
  startPos: number
): { value: string; endPos: number } {
  if (charAt(input, startPos) !== '"') {
    throw new MacroSyntaxError(`Expected opening quote at position ${startPos}`);
  }

  let result = '';
  let i = startPos + 1;

  while (i < input.length) {
    const char = charAt(input, i);

    if (char === '\\' && i + 1 < input.length) {
      // Escape sequence
      const next = charAt(input, i + 1);
      if (next === 'n') {
        result += '\n';
        i += 2;
      } else if (next === 't') {
        result += '\t';
        i += 2;
      } else if (next === '"') {
        result += '"';
        i += 2;
      } else if (next === '\\') {
        result += '\\';
        i += 2;
      } else {
        // Unknown escape, keep as-is
        result += char;
        i++;
      }
    } else if (char === '"') {
      return { value: result, endPos: i + 1 };
    } else {
      result += char;
      i++;
    }
  }

  throw new MacroSyntaxError('Unterminated string: missing closing quote');
}

/**
 * Parse `<keyword> "<value>"` where the quoted value is the whole tail
 */
function parseQuotedTail(input: string, keyword: RegExp, label: string): string {
  const head = keyword.exec(input);
  if (!head || charAt(input, head[0].length) !== '"') {
    throw new MacroSyntaxError(`Invalid ${label} syntax: ${input}`);
  }
  const { value, endPos } = parseQuotedString(input, head[0].length);
  if (endPos !== input.length) {
    throw new MacroSyntaxError(
      `Unexpected text after closing quote: ${input.slice(endPos)}`
    );
  }
  return value;
}

/**
 * Parse a decimal literal that must fit a safe integer
 */
export function parseInteger(text: string): number {
  const value = Number(text);
  if (!Number.isSafeInteger(value)) {
    throw new MacroSyntaxError(`Integer out of range: ${text}`);
  }
  return value;
}

/**
 * Extract a checkpoint or goto target name
 */
function parseLabel(input: string, keyword: 'checkpoint' | 'goto'): string {
  const name = parseQuotedTail(input, new RegExp(`^${keyword}\\s+`), keyword);
  if (!name) {
    throw new MacroSyntaxError(`${keyword} requires a name`);
  }
  return name;
}

function parseVar(input: string): Command {
  let match = VAR_SET_INT.exec(input);
  if (match) {
    return {
      op: 'var-set',
      name: match[1] ?? '',
      value: integer(parseInteger(match[2] ?? '')),
    };
  }

  match = VAR_SET_POSITION.exec(input);
  if (match) {
    return {
      op: 'var-set',
      name: match[1] ?? '',
      value: position(
        parseInteger(match[2] ?? ''),
        parseInteger(match[3] ?? '')
      ),
    };
  }

  match = VAR_INCREASE.exec(input);
  if (match) {
    return {
      op: 'var-increase',
      name: match[1] ?? '',
      delta: parseInteger(match[2] ?? ''),
    };
  }

  const kind = /^var\s+increase\b/.test(input) ? 'var increase' : 'var set';
  throw new MacroSyntaxError(`Invalid ${kind} syntax: ${input}`);
}

function parseMouse(input: string): Command {
  let match = MOUSE_MOVE_COORDS.exec(input);
  if (match) {
    return {
      op: 'mouse-move',
      target: {
        kind: 'coordinates',
        x: parseInteger(match[1] ?? ''),
        y: parseInteger(match[2] ?? ''),
      },
    };
  }

  match = MOUSE_MOVE_VAR.exec(input);
  if (match) {
    return {
      op: 'mouse-move',
      target: { kind: 'variable', name: match[1] ?? '' },
    };
  }

  if (/^mouse\s+move\b/.test(input)) {
    throw new MacroSyntaxError(`Invalid mouse move syntax: ${input}`);
  }

  match = MOUSE_BUTTON.exec(input);
  if (match) {
    return {
      op: 'mouse-button',
      button: toMouseButton(match[1]),
      action: toButtonAction(match[2]),
    };
  }

  throw new MacroSyntaxError(`Unknown mouse command: ${input}`);
}

function parseKey(input: string): Command {
  if (/^key\s+type\b/.test(input)) {
    const text = parseQuotedTail(input, /^key\s+type\s+/, 'key type');
    return { op: 'key-type', text };
  }

  const match = KEY_ACTION.exec(input);
  if (match) {
    return { op: 'key', action: toKeyAction(match[1]), key: match[2] ?? '' };
  }

  if (/^key\s+(down|up|press)\b/.test(input)) {
    throw new MacroSyntaxError(`Invalid key syntax: ${input}`);
  }
  throw new MacroSyntaxError(`Unknown key command: ${input}`);
}

function parseIf(input: string): Command {
  const open = input.indexOf('(');
  const close = input.lastIndexOf(')');
  if (close !== input.length - 1 || close <= open) {
    throw new MacroSyntaxError(`Invalid if syntax: ${input}`);
  }
  const condition = input.slice(open + 1, close).trim();
  if (!condition) {
    throw new MacroSyntaxError('if requires a condition');
  }
  return { op: 'if', condition };
}

/**
 * cv match <path> <percent>% $<name>; the path may be quoted
 */
function parseCvMatch(input: string): Command {
  const head = /^cv\s+match\s+/.exec(input);
  if (!head) {
    throw new MacroSyntaxError(`Invalid cv match syntax: ${input}`);
  }

  let pos = head[0].length;
  let path: string;
  if (charAt(input, pos) === '"') {
    const quoted = parseQuotedString(input, pos);
    path = quoted.value;
    pos = quoted.endPos;
  } else {
    const end = input.slice(pos).search(/\s/);
    if (end < 0) {
      throw new MacroSyntaxError(`Invalid cv match syntax: ${input}`);
    }
    path = input.slice(pos, pos + end);
    pos += end;
  }

  const tail = CV_MATCH_TAIL.exec(input.slice(pos));
  if (!tail || !path) {
    throw new MacroSyntaxError(`Invalid cv match syntax: ${input}`);
  }

  const percent = parseInteger(tail[1] ?? '');
  if (percent > 100) {
    throw new MacroSyntaxError(`Match threshold must be 0-100%: ${percent}%`);
  }

  return {
    op: 'cv-match',
    path,
    threshold: percent / 100,
    name: tail[2] ?? '',
  };
}

function toMouseButton(value: string | undefined): MouseButton {
  if (value === 'right' || value === 'middle') return value;
  return 'left';
}

function toButtonAction(value: string | undefined): ButtonAction {
  if (value === 'down' || value === 'up') return value;
  return 'click';
}

function toKeyAction(value: string | undefined): KeyAction {
  if (value === 'down' || value === 'up') return value;
  return 'press';
}

/**
 * Decode one instruction into a Command
 *
 * The opcode comes from the leading keyword. A known keyword with a
 * malformed tail throws MacroSyntaxError; an unknown keyword decodes to
 * `unknown` so the runner can skip it.
 */
export function decodeInstruction(text: string): Command {
  const trimmed = text.trim();

  if (IF_PREFIX.test(trimmed)) {
    return parseIf(trimmed);
  }

  const [head = '', second = ''] = trimmed.split(/\s+/);

  switch (head) {
    case 'var':
      if (second === 'set' || second === 'increase') {
        return parseVar(trimmed);
      }
      break;
    case 'checkpoint':
      return { op: 'checkpoint', name: parseLabel(trimmed, 'checkpoint') };
    case 'goto':
      return { op: 'goto', name: parseLabel(trimmed, 'goto') };
    case 'mouse':
      return parseMouse(trimmed);
    case 'key':
      return parseKey(trimmed);
    case 'sleep': {
      const match = SLEEP.exec(trimmed);
      if (!match) {
        throw new MacroSyntaxError(`Invalid sleep syntax: ${trimmed}`);
      }
      const ms = parseInteger(match[1] ?? '');
      if (ms > MAX_SLEEP_MS) {
        throw new MacroSyntaxError(
          `Sleep duration must be at most ${MAX_SLEEP_MS}ms: ${ms}ms`
        );
      }
      return { op: 'sleep', ms };
    }
    case 'if':
      // `if` without an opening parenthesis
      throw new MacroSyntaxError(`Invalid if syntax: ${trimmed}`);
    case 'cv':
      if (second === 'match') {
        return parseCvMatch(trimmed);
      }
      break;
    case 'end':
      if (trimmed !== 'end') {
        throw new MacroSyntaxError(`end takes no arguments: ${trimmed}`);
      }
      return { op: 'end' };
  }

  return { op: 'unknown', text: trimmed };
}

/**
 * Check if a line is a comment or empty
 */
export function isCommentOrEmpty(line: string): boolean {
  const trimmed = line.trim();
  return trimmed === '' || trimmed.startsWith('#');
}

/**
 * Name registered by a checkpoint line, or null for any other line
 */
function checkpointName(text: string): string | null {
  if (text.split(/\s+/)[0] !== 'checkpoint') {
    return null;
  }
  try {
    return parseLabel(text, 'checkpoint');
  } catch {
    // Malformed checkpoints register nothing; executing them reports the error
    return null;
  }
}

/**
 * Split macro source into instructions and register checkpoints
 *
 * Each checkpoint maps to its own slot. The runner advances the PC after
 * every instruction, goto included, so a jump resumes one past the
 * checkpoint line.
 */
export function parseProgram(content: string, source: string): Program {
  const instructions: Instruction[] = [];
  const checkpoints = new Map<string, number>();

  for (const [i, raw] of content.split(/\r?\n/).entries()) {
    const text = raw.trim();
    if (isCommentOrEmpty(text)) {
      continue;
    }

    const index = instructions.length;
    instructions.push({ index, line: i + 1, text });

    const name = checkpointName(text);
    if (name !== null) {
      checkpoints.set(name, index);
    }
  }

  return { source, instructions, checkpoints };
}
