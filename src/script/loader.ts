/**
 * Macro file loading
 */

import * as fs from 'fs';

import { errorMessage, MacroFileError } from '../core/errors.js';
import { parseProgram } from './parser.js';
import type { Program } from './types.js';

/**
 * Load and parse a macro file
 *
 * @param macroFile - Path to the macro file
 * @returns Program with its checkpoint table
 */
export function loadMacro(macroFile: string): Program {
  if (!fs.existsSync(macroFile)) {
    throw new MacroFileError(`Macro file '${macroFile}' not found`);
  }

  let content: string;
  try {
    content = fs.readFileSync(macroFile, 'utf-8');
  } catch (error) {
    throw new MacroFileError(
      `Cannot read macro file '${macroFile}': ${errorMessage(error)}`
    );
  }

  return parseProgram(content, macroFile);
}
