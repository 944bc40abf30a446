export type {
  MacroConfig,
  ParsedArgs,
  RunMode,
  Verbosity,
} from './macro.js';
export { DEFAULT_CONFIG } from './macro.js';
