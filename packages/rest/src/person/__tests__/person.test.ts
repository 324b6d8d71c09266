import { describe, it, expect } from 'vitest';
import { ValidationError } from '@batchline/core';

import { isPersonRecord, parsePeople, parsePerson, parseRecordKey } from '../person';

describe('person', () => {
  describe('parsePerson', () => {
    it('should keep only the name', () => {
      expect(parsePerson({ name: 'Tobie', admin: true })).toEqual({ name: 'Tobie' });
    });

    it('should reject non-objects', () => {
      expect(() => parsePerson('Tobie')).toThrow('Person must be a JSON object');
      expect(() => parsePerson(null)).toThrow(ValidationError);
      expect(() => parsePerson([{ name: 'Tobie' }])).toThrow('Person must be a JSON object');
    });

    it('should reject a missing or blank name', () => {
      expect(() => parsePerson({})).toThrow('Person name must be a non-empty string');
      expect(() => parsePerson({ name: '   ' })).toThrow('Person name must be a non-empty string');
      expect(() => parsePerson({ name: 42 })).toThrow(ValidationError);
    });

    it('should report the offending field', () => {
      try {
        parsePerson({ name: '' });
        expect.unreachable();
      } catch (error) {
        expect(error).toMatchObject({ field: 'name', code: 'VALIDATION_ERROR' });
      }
    });
  });

  describe('parsePeople', () => {
    it('should parse every entry', () => {
      expect(parsePeople([{ name: 'a' }, { name: 'b' }])).toEqual([{ name: 'a' }, { name: 'b' }]);
    });

    it('should accept an empty list', () => {
      expect(parsePeople([])).toEqual([]);
    });

    it('should reject anything but an array', () => {
      expect(() => parsePeople({ name: 'a' })).toThrow('Expected a JSON array of people');
    });

    it('should reject the list when one entry is invalid', () => {
      expect(() => parsePeople([{ name: 'a' }, {}])).toThrow('Person name must be a non-empty string');
    });
  });

  describe('parseRecordKey', () => {
    it.each(['tobie', 'person_1', '123', 'a-b'])('should accept %s', (key) => {
      expect(parseRecordKey(key)).toBe(key);
    });

    it.each(['', 'a b', 'a:b', "a'b", 'x'.repeat(129), 'a⟩b'])('should reject %j', (key) => {
      expect(() => parseRecordKey(key)).toThrow(
        'Id must be 1-128 letters, digits, underscores or hyphens',
      );
    });
  });

  describe('isPersonRecord', () => {
    it('should require a string id and name', () => {
      expect(isPersonRecord({ id: 'person:a', name: 'a' })).toBe(true);
      expect(isPersonRecord({ id: 'person:a' })).toBe(false);
      expect(isPersonRecord({ id: 1, name: 'a' })).toBe(false);
      expect(isPersonRecord(undefined)).toBe(false);
    });
  });
});
