import { ValidationError } from '@batchline/core';

export const PERSON_TABLE = 'person';

export interface Person {
  name: string;
}

/** A stored person; `id` is the record id, e.g. `person:tobie` */
export interface PersonRecord extends Person {
  id: string;
}

const RECORD_KEY = /^[\w-]{1,128}$/;

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isPersonRecord(value: unknown): value is PersonRecord {
  return isObject(value) && typeof value['id'] === 'string' && typeof value['name'] === 'string';
}

/**
 * Validate a request body as a person.
 * @throws ValidationError
 */
export function parsePerson(body: unknown): Person {
  if (!isObject(body)) {
    throw new ValidationError('Person must be a JSON object');
  }

  const { name } = body;
  if (typeof name !== 'string' || name.trim().length === 0) {
    throw new ValidationError('Person name must be a non-empty string', 'name');
  }

  return { name };
}

export function parsePeople(body: unknown): Person[] {
  if (!Array.isArray(body)) {
    throw new ValidationError('Expected a JSON array of people');
  }
  return body.map(parsePerson);
}

/**
 * Validate a record key taken from a URL.
 * @throws ValidationError
 */
export function parseRecordKey(key: string): string {
  if (!RECORD_KEY.test(key)) {
    throw new ValidationError(
      'Id must be 1-128 letters, digits, underscores or hyphens',
      'id',
    );
  }
  return key;
}
