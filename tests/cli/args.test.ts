import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from 'vitest';

import { parseArgs, printUsage } from '../../src/cli/args.js';

describe('parseArgs', () => {
  let exitSpy: MockInstance<typeof process.exit>;
  let errorSpy: ReturnType<typeof vi.spyOn>;
  let logSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    // Mock process.exit to throw
    exitSpy = vi.spyOn(process, 'exit').mockImplementation((code) => {
      throw new Error(`process.exit(${code})`);
    });

    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    exitSpy.mockRestore();
    errorSpy.mockRestore();
    logSpy.mockRestore();
  });

  describe('macro file', () => {
    it('exits with error when no macro file given', () => {
      expect(() => parseArgs([])).toThrow('process.exit(1)');
      expect(errorSpy).toHaveBeenCalledWith('Error: macro file required');
    });

    it('exits with error for a second positional argument', () => {
      expect(() => parseArgs(['a.macro', 'b.macro'])).toThrow('process.exit(1)');
      expect(errorSpy).toHaveBeenCalledWith("Error: unexpected argument 'b.macro'");
    });

    it('parses the macro file with defaults', () => {
      const result = parseArgs(['demo.macro']);

      expect(result).toEqual({
        macroFile: 'demo.macro',
        listInstructions: false,
        config: { verbosity: 'normal', mode: 'execute', enableLog: true },
      });
    });
  });

  describe('options', () => {
    it('exits with error for unknown options', () => {
      expect(() => parseArgs(['--fast', 'demo.macro'])).toThrow('process.exit(1)');
      expect(errorSpy).toHaveBeenCalledWith("Error: unknown option '--fast'");
    });

    it('parses verbosity flags', () => {
      expect(parseArgs(['-q', 'x.macro']).config.verbosity).toBe('quiet');
      expect(parseArgs(['--verbose', 'x.macro']).config.verbosity).toBe(
        'verbose'
      );
    });

    it('lists instructions in verbose mode', () => {
      expect(parseArgs(['-v', 'x.macro']).listInstructions).toBe(true);
    });

    it('parses --dry-run and lists instructions', () => {
      const result = parseArgs(['--dry-run', 'x.macro']);

      expect(result.config.mode).toBe('dry-run');
      expect(result.listInstructions).toBe(true);
    });

    it('keeps --dry-run over --simulate', () => {
      expect(parseArgs(['--dry-run', '--simulate', 'x.macro']).config.mode).toBe(
        'dry-run'
      );
      expect(parseArgs(['--simulate', '--dry-run', 'x.macro']).config.mode).toBe(
        'dry-run'
      );
    });

    it('drops the action pause when simulating', () => {
      const result = parseArgs(['--simulate', 'x.macro']);

      expect(result.config.mode).toBe('simulate');
      expect(result.config.actionPauseMs).toBe(0);
    });

    it('keeps an explicit pause when simulating', () => {
      expect(
        parseArgs(['--simulate', '--pause', '50', 'x.macro']).config.actionPauseMs
      ).toBe(50);
    });

    it('parses --pause in both forms', () => {
      expect(parseArgs(['--pause', '250', 'x.macro']).config.actionPauseMs).toBe(
        250
      );
      expect(parseArgs(['--pause=0', 'x.macro']).config.actionPauseMs).toBe(0);
    });

    it('rejects a non-numeric pause', () => {
      expect(() => parseArgs(['--pause=abc', 'x.macro'])).toThrow(
        'process.exit(1)'
      );
      expect(errorSpy).toHaveBeenCalledWith(
        'Error: --pause requires a non-negative integer (ms)'
      );
    });

    it('parses --no-log', () => {
      expect(parseArgs(['--no-log', 'x.macro']).config.enableLog).toBe(false);
    });

    it('parses --log-dir in both forms', () => {
      expect(parseArgs(['--log-dir', 'out', 'x.macro']).config.logDir).toBe('out');
      expect(parseArgs(['--log-dir=tmp/logs', 'x.macro']).config.logDir).toBe(
        'tmp/logs'
      );
    });

    it('rejects --log-dir without a value', () => {
      expect(() => parseArgs(['x.macro', '--log-dir'])).toThrow('process.exit(1)');
      expect(errorSpy).toHaveBeenCalledWith('Error: --log-dir requires a directory');
    });

    it('prints the version and exits', () => {
      expect(() => parseArgs(['--version'])).toThrow('process.exit(0)');
      expect(logSpy).toHaveBeenCalledWith(expect.stringMatching(/^\d+\.\d+\.\d+/));
    });

    it('prints help and exits', () => {
      expect(() => parseArgs(['-h', 'x.macro'])).toThrow('process.exit(0)');
      expect(logSpy).toHaveBeenCalled();
    });
  });
});

describe('printUsage', () => {
  let logSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    logSpy.mockRestore();
  });

  it('includes the usage line', () => {
    printUsage();

    const output = String(logSpy.mock.calls[0]?.[0]);
    expect(output).toContain('Usage: macro-runner [options] <macro-file>');
  });

  it('includes all options', () => {
    printUsage();

    const output = String(logSpy.mock.calls[0]?.[0]);
    expect(output).toContain('--verbose');
    expect(output).toContain('--quiet');
    expect(output).toContain('--dry-run');
    expect(output).toContain('--simulate');
    expect(output).toContain('--pause');
    expect(output).toContain('--no-log');
    expect(output).toContain('--log-dir');
  });

  it('lists the macro commands', () => {
    printUsage();

    const output = String(logSpy.mock.calls[0]?.[0]);
    expect(output).toContain('checkpoint "name"');
    expect(output).toContain('cv match');
  });
});
