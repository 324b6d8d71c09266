import { describe, it, expect, vi, beforeEach } from 'vitest';

import {
  ExecutionError,
  IndeterminateOutcomeError,
  ParseError,
  StateViolationError,
  TransactionError,
} from '../../errors';
import { MemorySession } from '../../memory';
import { Transaction, beginTransaction } from '../transaction';

import type { ResultSet, Session } from '../../types';

const OK: ResultSet = { slots: [] };

class MockSession implements Session {
  readonly name = 'MockSession';
  readonly isConnected = true;
  submit = vi.fn().mockResolvedValue(OK);
}

describe('Transaction', () => {
  let session: MockSession;

  beforeEach(() => {
    session = new MockSession();
  });

  describe('begin', () => {
    it('should send the begin marker and open the handle', async () => {
      const tx = await Transaction.begin(session);

      expect(session.submit).toHaveBeenCalledWith('BEGIN TRANSACTION;', {
        timeout: undefined,
        signal: undefined,
      });
      expect(tx.state).toBe('open');
      expect(tx.isOpen).toBe(true);
      expect(tx.getSession()).toBe(session);
    });

    it('should produce no handle when the engine rejects the marker', async () => {
      session.submit.mockResolvedValueOnce({
        slots: [{ status: 'ERR', time: '0ms', detail: 'There is already an open transaction' }],
      });

      await expect(beginTransaction(session)).rejects.toThrow(
        'Failed to begin transaction: There is already an open transaction',
      );
    });

    it('should give each handle its own id', async () => {
      const first = await Transaction.begin(session);
      const second = await Transaction.begin(session);

      expect(first.id).not.toBe(second.id);
    });

    it('should pass timeout and signal to the boundary', async () => {
      const controller = new AbortController();
      await Transaction.begin(session, { timeout: 250, signal: controller.signal });

      expect(session.submit).toHaveBeenCalledWith('BEGIN TRANSACTION;', {
        timeout: 250,
        signal: controller.signal,
      });
    });
  });

  describe('commit', () => {
    it('should send the commit marker and end the handle', async () => {
      const tx = await Transaction.begin(session);
      await tx.commit();

      expect(session.submit).toHaveBeenLastCalledWith('COMMIT TRANSACTION;', expect.anything());
      expect(tx.state).toBe('committed');
      expect(tx.isOpen).toBe(false);
    });

    it('should mark the handle failed when the engine rejects the commit', async () => {
      const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
      const tx = await Transaction.begin(session, { logger });
      session.submit.mockResolvedValueOnce({
        slots: [{ status: 'ERR', time: '0ms', detail: 'conflict' }],
      });

      await expect(tx.commit()).rejects.toThrow('Failed to commit transaction: conflict');
      expect(tx.state).toBe('failed');
      expect(logger.error).toHaveBeenCalled();
    });

    it('should report an interrupted commit as indeterminate', async () => {
      const tx = await Transaction.begin(session);
      session.submit.mockRejectedValueOnce(
        new IndeterminateOutcomeError('Script outcome is unknown: timed out', 'submit'),
      );

      const failure = await tx.commit().catch((error: unknown) => error);

      expect(failure).toBeInstanceOf(IndeterminateOutcomeError);
      expect(failure).toMatchObject({
        operation: 'commit',
        transactionId: tx.id,
        message: 'Outcome of transaction commit is unknown: Script outcome is unknown: timed out',
      });
      expect(tx.state).toBe('failed');
    });

    it('should wrap other session failures in TransactionError', async () => {
      const tx = await Transaction.begin(session);
      session.submit.mockRejectedValueOnce(new Error('socket closed'));

      const failure = await tx.commit().catch((error: unknown) => error);

      expect(failure).toBeInstanceOf(TransactionError);
      expect(failure).not.toBeInstanceOf(IndeterminateOutcomeError);
      expect(failure).toMatchObject({ message: 'Failed to commit transaction: socket closed' });
    });
  });

  describe('rollback', () => {
    it('should send the cancel marker', async () => {
      const tx = await Transaction.begin(session);
      await tx.rollback();

      expect(session.submit).toHaveBeenLastCalledWith('CANCEL TRANSACTION;', expect.anything());
      expect(tx.state).toBe('rolled_back');
    });

    it('should mark the handle failed when cancel fails', async () => {
      const tx = await Transaction.begin(session);
      session.submit.mockRejectedValueOnce(new Error('gone'));

      await expect(tx.rollback()).rejects.toThrow('Failed to rollback transaction: gone');
      expect(tx.state).toBe('failed');
    });
  });

  describe('state violations', () => {
    it.each([
      ['commit', (tx: Transaction) => tx.commit()],
      ['rollback', (tx: Transaction) => tx.rollback()],
      ['query', (tx: Transaction) => tx.query('RETURN 1')],
    ])('should reject %s after commit without a round-trip', async (operation, act) => {
      const tx = await Transaction.begin(session);
      await tx.commit();
      session.submit.mockClear();

      await expect(act(tx)).rejects.toThrow(`Cannot ${operation}: transaction is committed`);
      expect(session.submit).not.toHaveBeenCalled();
    });

    it('should reject commit after rollback', async () => {
      const tx = await Transaction.begin(session);
      await tx.rollback();

      const failure = await tx.commit().catch((error: unknown) => error);

      expect(failure).toBeInstanceOf(StateViolationError);
      expect(failure).toMatchObject({ message: 'Cannot commit: transaction is rolled back' });
    });

    it('should reject use of a failed handle', async () => {
      const tx = await Transaction.begin(session);
      session.submit.mockRejectedValueOnce(new Error('gone'));
      await tx.commit().catch(() => undefined);

      await expect(tx.rollback()).rejects.toThrow('Cannot rollback: transaction is failed');
    });
  });

  describe('query', () => {
    it('should submit canonical statements', async () => {
      const tx = await Transaction.begin(session);
      session.submit.mockResolvedValueOnce({ slots: [{ status: 'OK', time: '1ms', result: [] }] });

      await tx.query("create person:a content {name: 'a'}; select * from person");

      expect(session.submit).toHaveBeenLastCalledWith(
        "CREATE person:a CONTENT { name: 'a' };\nSELECT * FROM person;",
        {},
      );
    });

    it('should reject transaction markers', async () => {
      const tx = await Transaction.begin(session);

      await expect(tx.query('COMMIT')).rejects.toThrow(
        'Transaction boundaries are managed by the handle',
      );
    });

    it('should reject empty text', async () => {
      const tx = await Transaction.begin(session);

      await expect(tx.query(';')).rejects.toBeInstanceOf(ParseError);
    });

    it('should raise ExecutionError for failed statements and stay open', async () => {
      const tx = await Transaction.begin(session);
      const resultSet: ResultSet = { slots: [{ status: 'ERR', time: '1ms', detail: 'bad' }] };
      session.submit.mockResolvedValueOnce(resultSet);

      const failure = await tx.execute('DELETE person').catch((error: unknown) => error);

      expect(failure).toBeInstanceOf(ExecutionError);
      expect(failure).toMatchObject({ message: 'Query failed in transaction: bad', resultSet });
      expect(tx.isOpen).toBe(true);
    });

    it('should carry an indeterminate outcome through', async () => {
      const tx = await Transaction.begin(session);
      session.submit.mockRejectedValueOnce(new IndeterminateOutcomeError('lost', 'submit'));

      await expect(tx.query('DELETE person')).rejects.toMatchObject({
        name: 'IndeterminateOutcomeError',
        operation: 'query',
        transactionId: tx.id,
      });
    });
  });
});

describe('Transaction with MemorySession', () => {
  let session: MemorySession;

  beforeEach(async () => {
    session = await MemorySession.open();
  });

  it('should discard writes on rollback', async () => {
    const tx = await session.beginTransaction();
    await tx.query("CREATE person:a CONTENT { name: 'a' }");
    expect(session.rows('person')).toHaveLength(1);

    await tx.rollback();

    expect(session.rows('person')).toEqual([]);
    expect(tx.state).toBe('rolled_back');
    await expect(tx.commit()).rejects.toBeInstanceOf(StateViolationError);
  });

  it('should keep writes on commit', async () => {
    const tx = await session.beginTransaction();
    await tx.query("CREATE person:a CONTENT { name: 'a' }");
    await tx.commit();

    expect(session.rows('person')).toEqual([{ id: 'person:a', name: 'a' }]);
    expect(session.inTransaction).toBe(false);
  });

  it('should fail the commit after a failed statement', async () => {
    const tx = await session.beginTransaction();
    await tx.query('CREATE person:a');
    await expect(tx.query('CREATE person:a')).rejects.toThrow(
      'Query failed in transaction: Database record `person:a` already exists',
    );

    await expect(tx.commit()).rejects.toThrow(
      'Failed to commit transaction: The transaction failed and was not committed',
    );
    expect(tx.state).toBe('failed');
    expect(session.rows('person')).toEqual([]);
  });

  it('should refuse a nested begin', async () => {
    await session.beginTransaction();

    await expect(session.beginTransaction()).rejects.toThrow(
      'Failed to begin transaction: There is already an open transaction',
    );
  });
});
