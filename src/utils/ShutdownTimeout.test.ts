/**
 * Tests for shutdown deadlines
 */

import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { createHardDeadline, TimeoutError, withTimeout } from './ShutdownTimeout';

describe('withTimeout', () => {
  beforeEach(() => {
    jest.useFakeTimers();
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  it('should resolve with the value of a prompt operation', async () => {
    await expect(withTimeout(Promise.resolve('done'), { timeoutMs: 1000, operation: 'flush' })).resolves.toBe('done');
  });

  it('should pass through the rejection of the operation', async () => {
    const failing = Promise.reject(new Error('disk full'));

    await expect(withTimeout(failing, { timeoutMs: 1000, operation: 'flush' })).rejects.toThrow('disk full');
  });

  it('should reject with TimeoutError when the operation hangs', async () => {
    const pending = withTimeout(new Promise<void>(() => undefined), { timeoutMs: 500, operation: 'stop API server' });
    const assertion = expect(pending).rejects.toThrow(new TimeoutError('stop API server', 500));

    jest.advanceTimersByTime(500);

    await assertion;
    expect(console.warn).toHaveBeenCalledWith('[Shutdown]', 'Timeout: stop API server (500ms)');
  });

  it('should not warn when silent', async () => {
    const pending = withTimeout(new Promise<void>(() => undefined), {
      timeoutMs: 100,
      operation: 'save config',
      silent: true
    });
    const assertion = expect(pending).rejects.toBeInstanceOf(TimeoutError);

    jest.advanceTimersByTime(100);

    await assertion;
    expect(console.warn).not.toHaveBeenCalled();
  });
});

describe('createHardDeadline', () => {
  beforeEach(() => {
    jest.useFakeTimers();
  });

  afterEach(() => {
    jest.restoreAllMocks();
    jest.useRealTimers();
  });

  it('should exit the process once the deadline passes', () => {
    const exit = jest.spyOn(process, 'exit').mockImplementation((code) => {
      throw new Error(`exit ${String(code)}`);
    });

    createHardDeadline(1000);
    jest.advanceTimersByTime(999);
    expect(exit).not.toHaveBeenCalled();

    expect(() => jest.advanceTimersByTime(1)).toThrow('exit 1');
    expect(console.error).toHaveBeenCalledWith('[Shutdown]', 'HARD DEADLINE (1000ms) exceeded - forcing exit');
  });

  it('should not fire after being cleared', () => {
    const exit = jest.spyOn(process, 'exit').mockImplementation((code) => {
      throw new Error(`exit ${String(code)}`);
    });

    clearTimeout(createHardDeadline(1000));
    jest.advanceTimersByTime(2000);

    expect(exit).not.toHaveBeenCalled();
  });
});
