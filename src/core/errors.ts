/**
 * Error taxonomy for macro loading and execution
 *
 * Anything a handler throws stops the run. ConditionError and TemplateError
 * are caught by the `if` and `cv match` handlers and end as a log line.
 */

/**
 * Malformed instruction, missing checkpoint, unknown or mistyped variable
 */
export class MacroSyntaxError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MacroSyntaxError';
  }
}

/**
 * Macro file missing or unreadable
 */
export class MacroFileError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MacroFileError';
  }
}

/**
 * Condition could not be tokenized, parsed or evaluated
 */
export class ConditionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConditionError';
  }
}

/**
 * Template image missing or undecodable, or screen capture failed
 */
export class TemplateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TemplateError';
  }
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
