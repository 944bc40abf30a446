/**
 * Script module - loading, decoding, variables and conditions
 */

// Types
export type {
  CheckpointTable,
  Command,
  Instruction,
  IntegerValue,
  MouseTarget,
  Opcode,
  PositionValue,
  Program,
  Value,
  VariableStore,
} from './types.js';

// Loader
export { loadMacro } from './loader.js';

// Parser (for direct use if needed)
export {
  decodeInstruction,
  isCommentOrEmpty,
  parseProgram,
  parseQuotedString,
} from './parser.js';

// Variables
export {
  createVariableStore,
  formatValue,
  getPosition,
  getSubstitutionList,
  getVariable,
  getVariableSummary,
  increaseVariable,
  integer,
  position,
  setVariable,
} from './variables.js';

// Conditions
export {
  type ConditionResult,
  evaluateCondition,
  evaluateExpression,
  substituteVariables,
} from './expression.js';
