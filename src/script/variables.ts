/**
 * Variable store and value helpers for macro execution
 */

import { MacroSyntaxError } from '../core/errors.js';
import { STATUS_SUCCESS } from '../utils/constants.js';
import type {
  IntegerValue,
  PositionValue,
  Value,
  VariableStore,
} from './types.js';

/**
 * Create an empty variable store
 */
export function createVariableStore(): VariableStore {
  return {
    named: new Map(),
    lastStatus: STATUS_SUCCESS,
  };
}

export function integer(value: number): IntegerValue {
  return { kind: 'integer', value };
}

export function position(x: number, y: number): PositionValue {
  return { kind: 'position', x, y };
}

/**
 * Textual form used in conditions and log output: `5` or `(10, 20)`
 */
export function formatValue(value: Value): string {
  if (value.kind === 'integer') {
    return String(value.value);
  }
  return `(${value.x}, ${value.y})`;
}

/**
 * Set or replace a variable; the kind may change
 */
export function setVariable(
  store: VariableStore,
  name: string,
  value: Value
): void {
  store.named.set(name, value);
}

/**
 * Read a variable, failing the run when it is not defined
 */
export function getVariable(store: VariableStore, name: string): Value {
  const value = store.named.get(name);
  if (!value) {
    throw new MacroSyntaxError(`Variable $${name} is not defined`);
  }
  return value;
}

/**
 * Read a variable that must hold a position
 */
export function getPosition(
  store: VariableStore,
  name: string
): PositionValue {
  const value = getVariable(store, name);
  if (value.kind !== 'position') {
    throw new MacroSyntaxError(
      `Variable $${name} is not a position (value: ${formatValue(value)})`
    );
  }
  return value;
}

/**
 * Add delta to an integer variable. Absent names start at 0.
 */
export function increaseVariable(
  store: VariableStore,
  name: string,
  delta: number
): IntegerValue {
  const current = store.named.get(name) ?? integer(0);
  if (current.kind !== 'integer') {
    throw new MacroSyntaxError(
      `Cannot increase position variable $${name}`
    );
  }
  const next = integer(current.value + delta);
  if (!Number.isSafeInteger(next.value)) {
    throw new MacroSyntaxError(
      `Integer out of range: $${name} = ${current.value} + ${delta}`
    );
  }
  store.named.set(name, next);
  return next;
}

/**
 * Get list of defined variables referenced in a text (for logging)
 */
export function getSubstitutionList(
  text: string,
  store: VariableStore
): string[] {
  const vars: string[] = [];

  for (const [name, value] of store.named) {
    if (text.includes(`$${name}`)) {
      vars.push(`$${name}=${formatValue(value)}`);
    }
  }

  return vars;
}

/**
 * One `$name = value` line per variable, sorted by name
 */
export function getVariableSummary(store: VariableStore): string[] {
  return [...store.named.entries()]
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([name, value]) => `$${name} = ${formatValue(value)}`);
}
