import { describe, it, expect, beforeEach } from 'vitest';

import { ParseError } from '../../errors';
import { takeSlot } from '../../utils';
import {
  CANCELLED_TRANSACTION_DETAIL,
  FAILED_TRANSACTION_DETAIL,
  MemorySession,
} from '../memory-session';

const UUID_KEY = /^⟨[\da-f-]{36}⟩$/;

describe('MemorySession', () => {
  let session: MemorySession;

  beforeEach(async () => {
    session = await MemorySession.open();
  });

  const run = async (script: string): Promise<unknown> => takeSlot(await session.submit(script), 0, script);

  describe('statements', () => {
    it('should create and select records', async () => {
      await run("CREATE person:a CONTENT { name: 'a', age: 30 };");

      await expect(run('SELECT * FROM person WHERE age > 20;')).resolves.toEqual([
        { id: 'person:a', name: 'a', age: 30 },
      ]);
      await expect(run('SELECT * FROM person WHERE age > 40;')).resolves.toEqual([]);
    });

    it('should generate keys for tables and uuid()', async () => {
      await run("CREATE person CONTENT { name: 'a' };");
      await run("CREATE person:uuid() CONTENT { name: 'b' };");

      const keys = session.rows('person').map((row) => String(row['id']).slice('person:'.length));
      expect(keys).toHaveLength(2);
      expect(keys.every((key) => UUID_KEY.test(key))).toBe(true);
    });

    it('should refuse duplicate records', async () => {
      await run('CREATE person:a;');
      const resultSet = await session.submit('CREATE person:a;');

      expect(resultSet.slots).toEqual([
        { status: 'ERR', time: expect.stringMatching(/ms$/), detail: 'Database record `person:a` already exists' },
      ]);
    });

    it('should update existing records only', async () => {
      await run("CREATE person:a CONTENT { name: 'a', age: 30 };");

      await expect(run('UPDATE person:a SET age += 1;')).resolves.toEqual([
        { id: 'person:a', name: 'a', age: 31 },
      ]);
      await expect(run('UPDATE person:zzz SET age = 1;')).resolves.toEqual([]);
      expect(session.rows('person')).toHaveLength(1);
    });

    it('should merge into records', async () => {
      await run("CREATE person:a CONTENT { name: 'a', age: 30 };");
      await run('UPDATE person:a MERGE { age: 5 };');

      expect(session.rows('person')).toEqual([{ id: 'person:a', name: 'a', age: 5 }]);
    });

    it('should upsert missing records', async () => {
      await expect(run("UPSERT person:b CONTENT { name: 'b' };")).resolves.toEqual([
        { id: 'person:b', name: 'b' },
      ]);
    });

    it('should delete quietly unless asked for the rows', async () => {
      await run("CREATE person:a CONTENT { name: 'a' };");
      await run("CREATE person:b CONTENT { name: 'b' };");

      await expect(run('DELETE person:a;')).resolves.toEqual([]);
      await expect(run('DELETE person RETURN BEFORE;')).resolves.toEqual([{ id: 'person:b', name: 'b' }]);
      expect(session.rows('person')).toEqual([]);
    });

    it('should order, limit and project', async () => {
      await run("CREATE person:a CONTENT { name: 'ann', age: 3 };");
      await run("CREATE person:b CONTENT { name: 'bob', age: 1 };");
      await run("CREATE person:c CONTENT { name: 'cy', age: 2 };");

      await expect(run('SELECT VALUE name FROM person ORDER BY age;')).resolves.toEqual([
        'bob',
        'cy',
        'ann',
      ]);
      await expect(
        run('SELECT name AS who FROM person ORDER BY name DESC LIMIT 2 START 1;'),
      ).resolves.toEqual([{ who: 'bob' }, { who: 'ann' }]);
    });

    it('should insert objects', async () => {
      await run("INSERT INTO person [{ id: 'person:x', name: 'x' }, { name: 'y' }];");

      const ids = session.rows('person').map((row) => row['id']);
      expect(ids[0]).toBe('person:x');
      expect(ids).toHaveLength(2);
    });

    it('should relate records', async () => {
      const resultSet = await session.submit(
        'CREATE person:a; CREATE person:b; RELATE person:a->knows->person:b CONTENT { since: 2020 };',
      );

      expect(takeSlot(resultSet, 2)).toEqual([
        expect.objectContaining({ in: 'person:a', out: 'person:b', since: 2020 }),
      ]);
    });

    it('should keep LET variables and take bindings', async () => {
      const resultSet = await session.submit('LET $n = 2; RETURN $n * 3;');
      expect(takeSlot(resultSet, 1)).toBe(6);

      await expect(run('RETURN $n;')).resolves.toBe(2);
      const bound = await session.submit('RETURN $name;', { bindings: { name: 'x' } });
      expect(takeSlot(bound, 0)).toBe('x');
    });

    it('should report unknown functions as failed statements', async () => {
      await expect(run('RETURN nope();')).rejects.toThrow("Statement 0 failed: Unknown function 'nope()'");
    });

    it('should raise ParseError for scripts that do not parse', async () => {
      await expect(session.submit('CREATE')).rejects.toBeInstanceOf(ParseError);
    });
  });

  describe('inline transactions', () => {
    it('should apply a committed block and answer without marker slots', async () => {
      const resultSet = await session.submit(
        'BEGIN TRANSACTION;\nCREATE person:a;\nCREATE person:b;\nCOMMIT TRANSACTION;',
      );

      expect(resultSet.slots.map((slot) => slot.status)).toEqual(['OK', 'OK']);
      expect(session.rows('person')).toHaveLength(2);
      expect(session.inTransaction).toBe(false);
    });

    it('should undo the whole block when a statement fails', async () => {
      await run('CREATE person:b;');

      const resultSet = await session.submit(
        'BEGIN TRANSACTION;\nCREATE person:a;\nCREATE person:b;\nCREATE person:c;\nCOMMIT TRANSACTION;',
      );

      expect(resultSet.slots.map((slot) => (slot.status === 'ERR' ? slot.detail : 'OK'))).toEqual([
        FAILED_TRANSACTION_DETAIL,
        'Database record `person:b` already exists',
        FAILED_TRANSACTION_DETAIL,
      ]);
      expect(session.rows('person')).toEqual([{ id: 'person:b' }]);
    });

    it('should undo a cancelled block', async () => {
      const resultSet = await session.submit('BEGIN; CREATE person:a; CANCEL;');

      expect(resultSet.slots).toEqual([
        { status: 'ERR', time: expect.any(String), detail: CANCELLED_TRANSACTION_DETAIL },
      ]);
      expect(session.rows('person')).toEqual([]);
    });
  });

  describe('explicit transactions', () => {
    it('should span submissions until commit', async () => {
      await session.submit('BEGIN TRANSACTION;');
      expect(session.inTransaction).toBe(true);

      await run('CREATE person:a;');
      const commit = await session.submit('COMMIT TRANSACTION;');

      expect(commit.slots).toEqual([]);
      expect(session.rows('person')).toEqual([{ id: 'person:a' }]);
    });

    it('should restore the snapshot on cancel', async () => {
      await run('CREATE person:keep;');
      await session.submit('BEGIN TRANSACTION;');
      await run('DELETE person;');

      await session.submit('CANCEL TRANSACTION;');

      expect(session.rows('person')).toEqual([{ id: 'person:keep' }]);
    });

    it('should reject markers without an open transaction', async () => {
      const resultSet = await session.submit('COMMIT TRANSACTION;');

      expect(resultSet.slots).toEqual([
        { status: 'ERR', time: '0ms', detail: 'There is no open transaction' },
      ]);
    });
  });

  describe('inspection', () => {
    it('should log every script', async () => {
      await session.submit('RETURN 1;');
      await session.submit('RETURN 2;');

      expect(session.scripts).toEqual(['RETURN 1;', 'RETURN 2;']);
    });

    it('should answer after the configured latency', async () => {
      const slow = await MemorySession.open({ latency: 5 });
      const resultSet = await slow.submit('RETURN 1;');

      expect(takeSlot(resultSet, 0)).toBe(1);
    });
  });
});
