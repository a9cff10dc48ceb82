import { describe, expect, it, vi } from 'vitest';
import { isDebugLogging, logDebug, logError, logInfo, logWarning, setDebugLogging } from '../logger.js';

describe('telemetry logger', () => {
  const cases = [
    { fn: logInfo, level: 'info' as const, method: 'error' as const },
    { fn: logWarning, level: 'warn' as const, method: 'warn' as const },
    { fn: logError, level: 'error' as const, method: 'error' as const },
  ];

  for (const { fn, level, method } of cases) {
    it(`logs a prefixed message only for ${level} when context is undefined`, () => {
      const spy = vi.spyOn(console, method).mockImplementation(() => {});

      fn('hello');

      expect(spy).toHaveBeenCalledWith(`[praxis:${level}] hello`);
    });

    it(`logs message only for ${level} when context is empty`, () => {
      const spy = vi.spyOn(console, method).mockImplementation(() => {});

      fn('hello', {});

      expect(spy).toHaveBeenCalledWith(`[praxis:${level}] hello`);
    });

    it(`logs message and context for ${level} when context has keys`, () => {
      const spy = vi.spyOn(console, method).mockImplementation(() => {});
      const context = { runId: 'run-123' };

      fn('hello', context);

      expect(spy).toHaveBeenCalledWith(`[praxis:${level}] hello`, context);
    });
  }

  it('never writes to stdout', () => {
    const stdout = vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});

    logInfo('a');
    logWarning('b');
    logError('c');

    expect(stdout).not.toHaveBeenCalled();
  });

  it('drops debug lines until debug logging is enabled', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {});

    logDebug('quiet');
    expect(spy).not.toHaveBeenCalled();
    expect(isDebugLogging()).toBe(false);

    setDebugLogging(true);
    logDebug('loud', { step: 2 });

    expect(spy).toHaveBeenCalledTimes(1);
    expect(spy).toHaveBeenCalledWith('[praxis:debug] loud', { step: 2 });
  });
});
