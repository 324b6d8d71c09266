import { describe, it, expect, vi, afterEach } from 'vitest';

import { ExecutionError, TimeoutError, ValidationError } from '../../errors';
import {
  AbortedError,
  describeFailure,
  failedSlots,
  isSuccess,
  takeSlot,
  validateConnectionConfig,
  validateScript,
  withAbort,
  withTimeout,
} from '../index';

import type { ResultSet } from '../../types';

describe('validation', () => {
  const config = { host: 'localhost', namespace: 'app', database: 'app' };

  describe('validateConnectionConfig', () => {
    it('should accept a minimal config', () => {
      expect(() => validateConnectionConfig(config)).not.toThrow();
    });

    it('should require a host', () => {
      expect(() => validateConnectionConfig({ ...config, host: '' })).toThrow('Host is required');
    });

    it('should require namespace and database', () => {
      expect(() => validateConnectionConfig({ ...config, namespace: undefined })).toThrow(
        'Namespace is required',
      );
      expect(() => validateConnectionConfig({ ...config, database: undefined })).toThrow(
        'Database name is required',
      );
    });

    it.each([0, 65_536, 80.5])('should reject port %s', (port) => {
      expect(() => validateConnectionConfig({ ...config, port })).toThrow(ValidationError);
    });

    it('should require a password alongside a user', () => {
      expect(() => validateConnectionConfig({ ...config, user: 'root' })).toThrow(
        'Password is required when a user is given',
      );
    });

    it('should reject a negative timeout', () => {
      expect(() => validateConnectionConfig({ ...config, connectionTimeout: -1 })).toThrow(
        'Connection timeout must be a non-negative number',
      );
    });
  });

  describe('validateScript', () => {
    it('should reject blank scripts', () => {
      expect(() => validateScript('')).toThrow('Script must be a non-empty string');
      expect(() => validateScript('  \n ')).toThrow('Script cannot be empty');
    });
  });
});

describe('timeout', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('should resolve when the promise settles first', async () => {
    await expect(withTimeout(Promise.resolve('done'), 1000)).resolves.toBe('done');
  });

  it('should reject with TimeoutError when time runs out', async () => {
    vi.useFakeTimers();
    const pending = withTimeout(new Promise<never>(() => undefined), 50);
    const assertion = expect(pending).rejects.toThrow('Operation timed out after 50ms');
    await vi.advanceTimersByTimeAsync(50);
    await assertion;
  });

  it('should use a custom message', async () => {
    vi.useFakeTimers();
    const pending = withTimeout(new Promise<never>(() => undefined), 10, 'Too slow');
    const assertion = expect(pending).rejects.toBeInstanceOf(TimeoutError);
    await vi.advanceTimersByTimeAsync(10);
    await assertion;
  });

  it('should reject immediately for an aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(withAbort(Promise.resolve(1), controller.signal)).rejects.toBeInstanceOf(AbortedError);
  });

  it('should reject when the signal fires while waiting', async () => {
    const controller = new AbortController();
    const pending = withAbort(new Promise<never>(() => undefined), controller.signal);

    controller.abort('stop');

    await expect(pending).rejects.toMatchObject({ name: 'AbortedError', reason: 'stop' });
  });

  it('should pass through without a signal', async () => {
    await expect(withAbort(Promise.resolve(7))).resolves.toBe(7);
  });
});

describe('result-set', () => {
  const mixed: ResultSet = {
    slots: [
      { status: 'OK', time: '1ms', result: [{ id: 'person:a' }] },
      { status: 'ERR', time: '1ms', detail: 'The query was not executed due to a failed transaction' },
      { status: 'ERR', time: '1ms', detail: 'Database record `person:a` already exists' },
    ],
  };

  it('should list failed slots', () => {
    expect(failedSlots(mixed)).toHaveLength(2);
    expect(isSuccess(mixed)).toBe(false);
    expect(isSuccess({ slots: [] })).toBe(true);
  });

  it('should prefer the causing failure', () => {
    expect(describeFailure(mixed)).toBe('Database record `person:a` already exists');
  });

  it('should fall back to the first failure', () => {
    expect(
      describeFailure({
        slots: [{ status: 'ERR', time: '1ms', detail: 'The query was not executed due to a failed transaction' }],
      }),
    ).toBe('The query was not executed due to a failed transaction');
    expect(describeFailure({ slots: [] })).toBeUndefined();
  });

  it('should take a successful slot', () => {
    expect(takeSlot(mixed, 0)).toEqual([{ id: 'person:a' }]);
  });

  it('should throw for failed or missing slots', () => {
    expect(() => takeSlot(mixed, 2, 'SCRIPT')).toThrow(
      'Statement 2 failed: Database record `person:a` already exists',
    );
    expect(() => takeSlot(mixed, 5)).toThrow(ExecutionError);
    expect(() => takeSlot(mixed, 5)).toThrow('No result for statement 5');
  });
});
