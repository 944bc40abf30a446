/**
 * Types for loaded programs, decoded instructions and variables
 */

import type {
  ButtonAction,
  KeyAction,
  MouseButton,
} from '../actions/types.js';

/**
 * One non-blank, non-comment source line
 */
export interface Instruction {
  /** Slot in the program, 0-based */
  readonly index: number;
  /** Line number in the source file, 1-based */
  readonly line: number;
  readonly text: string;
}

/**
 * Checkpoint name -> slot index of the checkpoint line itself
 */
export type CheckpointTable = ReadonlyMap<string, number>;

/**
 * A loaded macro
 */
export interface Program {
  /** Path the macro was read from (relative template paths resolve against it) */
  readonly source: string;
  readonly instructions: readonly Instruction[];
  readonly checkpoints: CheckpointTable;
}

export interface IntegerValue {
  kind: 'integer';
  value: number;
}

export interface PositionValue {
  kind: 'position';
  x: number;
  y: number;
}

export type Value = IntegerValue | PositionValue;

/**
 * Variable store for a single run
 */
export interface VariableStore {
  /** Named variables: $name -> value */
  named: Map<string, Value>;
  /** Outcome of the last cv match: bare $ in conditions */
  lastStatus: number;
}

export type MouseTarget =
  | { kind: 'coordinates'; x: number; y: number }
  | { kind: 'variable'; name: string };

/**
 * Decoded form of an instruction, derived at execution time
 */
export type Command =
  | { op: 'var-set'; name: string; value: Value }
  | { op: 'var-increase'; name: string; delta: number }
  | { op: 'checkpoint'; name: string }
  | { op: 'goto'; name: string }
  | { op: 'mouse-move'; target: MouseTarget }
  | { op: 'mouse-button'; button: MouseButton; action: ButtonAction }
  | { op: 'key'; action: KeyAction; key: string }
  | { op: 'key-type'; text: string }
  | { op: 'sleep'; ms: number }
  | { op: 'if'; condition: string }
  | { op: 'cv-match'; path: string; threshold: number; name: string }
  | { op: 'end' }
  | { op: 'unknown'; text: string };

export type Opcode = Command['op'];
