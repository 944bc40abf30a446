import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
  configureLogSink,
  formatDuration,
  formatTimestamp,
  printAction,
  printError,
  printMacro,
  printWarning,
  stripAnsi,
  timestampPrefix,
  truncate,
} from '../../src/output/colors.js';

describe('stripAnsi', () => {
  it('removes ANSI color codes', () => {
    expect(stripAnsi('\x1b[31mRed Text\x1b[0m')).toBe('Red Text');
  });

  it('handles multiple color codes', () => {
    expect(stripAnsi('\x1b[1m\x1b[34mBold Blue\x1b[0m')).toBe('Bold Blue');
  });

  it('returns plain text unchanged', () => {
    expect(stripAnsi('Plain text')).toBe('Plain text');
  });
});

describe('truncate', () => {
  it('returns short strings unchanged', () => {
    expect(truncate('hello', 10)).toBe('hello');
  });

  it('truncates long strings with ellipsis', () => {
    expect(truncate('hello world', 8)).toBe('hello wo...');
  });

  it('handles exact length', () => {
    expect(truncate('hello', 5)).toBe('hello');
  });
});

describe('formatDuration', () => {
  it('formats milliseconds', () => {
    expect(formatDuration(500)).toBe('500ms');
  });

  it('formats seconds', () => {
    expect(formatDuration(2500)).toBe('2.5s');
  });

  it('formats minutes and seconds', () => {
    expect(formatDuration(125000)).toBe('2m5s');
  });

  it('formats hours', () => {
    expect(formatDuration(3723000)).toBe('1h2m3s');
  });
});

describe('formatTimestamp', () => {
  it('formats local time as HH:MM:SS.mmm', () => {
    expect(formatTimestamp(new Date(2024, 0, 15, 9, 5, 3, 42))).toBe(
      '09:05:03.042'
    );
  });

  it('uses current time when no date provided', () => {
    expect(formatTimestamp()).toMatch(/^\d{2}:\d{2}:\d{2}\.\d{3}$/);
  });
});

describe('timestampPrefix', () => {
  it('stripping ANSI leaves just timestamp and space', () => {
    expect(stripAnsi(timestampPrefix())).toMatch(/^\d{2}:\d{2}:\d{2}\.\d{3} $/);
  });
});

describe('prefixed output', () => {
  let logSpy: ReturnType<typeof vi.spyOn>;
  let errorSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    logSpy.mockRestore();
    errorSpy.mockRestore();
  });

  function lastLine(spy: ReturnType<typeof vi.spyOn>): string {
    return stripAnsi(String(spy.mock.calls.at(-1)?.[0])).slice(13);
  }

  it('prints macro messages with [MACRO]', () => {
    printMacro('Set $n = 1');

    expect(logSpy).toHaveBeenCalledTimes(1);
    expect(lastLine(logSpy)).toBe('[MACRO] Set $n = 1');
  });

  it('uses magenta for the [MACRO] label', () => {
    printMacro('Test');

    expect(String(logSpy.mock.calls[0]?.[0])).toContain('\x1b[35m[MACRO]');
  });

  it('prints actions with [ACTION]', () => {
    printAction('Key press: a');

    expect(lastLine(logSpy)).toBe('[ACTION] Key press: a');
  });

  it('prints warnings to stdout with [WARN]', () => {
    printWarning('Unknown command: scroll');

    expect(lastLine(logSpy)).toBe('[WARN] Unknown command: scroll');
    expect(errorSpy).not.toHaveBeenCalled();
  });

  it('copies every printed line to the log sink', () => {
    const sink = vi.fn();
    configureLogSink(sink);

    printMacro('Set $n = 1');
    printError('Error at line 3');
    configureLogSink(null);
    printAction('Key press: a');

    expect(sink).toHaveBeenCalledTimes(2);
    expect(sink).toHaveBeenNthCalledWith(1, logSpy.mock.calls[0]?.[0]);
    expect(sink).toHaveBeenNthCalledWith(2, errorSpy.mock.calls[0]?.[0]);
  });

  it('prints errors to stderr with [ERROR]', () => {
    printError('Error at line 3');

    expect(logSpy).not.toHaveBeenCalled();
    expect(lastLine(errorSpy)).toBe('[ERROR] Error at line 3');
  });
});
