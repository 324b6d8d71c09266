/**
 * Person Repository
 *
 * Person records over a session. Single-record operations are one
 * statement each; `batchUp` writes every person in one atomic batch.
 */

import { ExecutionError, StatementBatch, quoteString, takeSlot } from '@batchline/core';

import { PERSON_TABLE, isPersonRecord, parseRecordKey } from './person';

import type { Logger, Session } from '@batchline/core';
import type { Person, PersonRecord } from './person';

export interface PersonRepositoryOptions {
  logger?: Logger;
}

function recordRef(key: string): string {
  return `${PERSON_TABLE}:⟨${parseRecordKey(key)}⟩`;
}

function content(person: Person): string {
  return `{ name: ${quoteString(person.name)} }`;
}

export class PersonRepository {
  private readonly logger?: Logger;

  constructor(
    private readonly session: Session,
    options: PersonRepositoryOptions = {},
  ) {
    this.logger = options.logger;
  }

  /**
   * @throws ExecutionError when the record already exists
   */
  async create(key: string, person: Person): Promise<PersonRecord> {
    const [created] = await this.records(`CREATE ${recordRef(key)} CONTENT ${content(person)}`);
    if (!created) {
      throw new ExecutionError(`Creating ${recordRef(key)} returned no record`, key);
    }
    return created;
  }

  async read(key: string): Promise<PersonRecord | undefined> {
    const [found] = await this.records(`SELECT * FROM ${recordRef(key)}`);
    return found;
  }

  /** Replace the content of an existing person; undefined when it does not exist */
  async update(key: string, person: Person): Promise<PersonRecord | undefined> {
    const [updated] = await this.records(`UPDATE ${recordRef(key)} CONTENT ${content(person)}`);
    return updated;
  }

  async delete(key: string): Promise<PersonRecord | undefined> {
    const [deleted] = await this.records(`DELETE ${recordRef(key)} RETURN BEFORE`);
    return deleted;
  }

  async list(): Promise<PersonRecord[]> {
    return this.records(`SELECT * FROM ${PERSON_TABLE}`);
  }

  /**
   * Create every person under a generated id in one atomic batch, then
   * return the whole table.
   */
  async batchUp(people: Person[]): Promise<PersonRecord[]> {
    const batch = new StatementBatch({ logger: this.logger });
    batch.addAll(people.map((person) => `CREATE ${PERSON_TABLE}:uuid() CONTENT ${content(person)}`));

    await batch.execute(this.session);
    this.logger?.info(`Created ${people.length} people in one batch`);

    return this.list();
  }

  /** Delete every person, returning the removed records */
  async batchDown(): Promise<PersonRecord[]> {
    return this.records(`DELETE ${PERSON_TABLE} RETURN BEFORE`);
  }

  private async records(statement: string): Promise<PersonRecord[]> {
    const script = `${statement};`;
    this.logger?.debug(script);

    const resultSet = await this.session.submit(script);
    const rows = takeSlot(resultSet, 0, script);

    if (!Array.isArray(rows)) {
      throw new ExecutionError('Expected a list of records', script, resultSet);
    }

    return rows.map((row) => {
      if (!isPersonRecord(row)) {
        throw new ExecutionError(`Unexpected record: ${JSON.stringify(row)}`, script, resultSet);
      }
      return { id: row.id, name: row.name };
    });
  }
}
