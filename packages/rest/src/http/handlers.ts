/**
 * Person Handlers
 *
 * Framework-agnostic handlers for the person API:
 *
 * - GET    /health_check       liveness
 * - POST   /person/batch_up    create many people in one batch
 * - DELETE /person/batch_down  delete every person
 * - POST   /person/:id         create
 * - GET    /person/:id         read
 * - PUT    /person/:id         replace
 * - DELETE /person/:id         delete
 * - GET    /people             list
 *
 * The batch routes come first so `batch_up` is never taken for an id.
 */

import { consoleLogger } from '@batchline/core';

import { parsePeople, parsePerson } from '../person';
import { NotFoundError, mapErrorToResponse } from './error-mapping';

import type { Logger } from '@batchline/core';
import type { PersonRecord, PersonRepository } from '../person';
import type { RestHandler, RestRequest, RestResponse, RouteDescriptor } from './types';

export interface PersonRoutesOptions {
  logger?: Logger;
}

function param(request: RestRequest, name: string): string {
  const value = request.params[name];
  if (value === undefined) {
    throw new NotFoundError(`Missing path parameter '${name}'`);
  }
  return value;
}

function found(record: PersonRecord | undefined, id: string): RestResponse {
  if (!record) {
    throw new NotFoundError(`Person '${id}' not found`);
  }
  return { status: 200, body: record };
}

export function createPersonRoutes(
  repository: PersonRepository,
  options: PersonRoutesOptions = {},
): RouteDescriptor[] {
  const logger = options.logger ?? consoleLogger;

  const guarded =
    (name: string, handler: RestHandler): RestHandler =>
    async (request) => {
      try {
        return await handler(request);
      } catch (error) {
        const response = mapErrorToResponse(error);
        const message = `${name} failed with ${response.status}`;
        if (response.status >= 500) {
          logger.error(message, { error });
        } else {
          logger.warn(message, { error });
        }
        return response;
      }
    };

  return [
    {
      method: 'GET',
      path: '/health_check',
      handler: async () => ({ status: 200, body: { status: 'ok' } }),
    },
    {
      method: 'POST',
      path: '/person/batch_up',
      handler: guarded('Batch create', async (request) => ({
        status: 200,
        body: await repository.batchUp(parsePeople(request.body)),
      })),
    },
    {
      method: 'DELETE',
      path: '/person/batch_down',
      handler: guarded('Batch delete', async () => ({
        status: 200,
        body: await repository.batchDown(),
      })),
    },
    {
      method: 'POST',
      path: '/person/:id',
      handler: guarded('Create', async (request) => ({
        status: 201,
        body: await repository.create(param(request, 'id'), parsePerson(request.body)),
      })),
    },
    {
      method: 'GET',
      path: '/person/:id',
      handler: guarded('Read', async (request) => {
        const id = param(request, 'id');
        return found(await repository.read(id), id);
      }),
    },
    {
      method: 'PUT',
      path: '/person/:id',
      handler: guarded('Update', async (request) => {
        const id = param(request, 'id');
        return found(await repository.update(id, parsePerson(request.body)), id);
      }),
    },
    {
      method: 'DELETE',
      path: '/person/:id',
      handler: guarded('Delete', async (request) => {
        const id = param(request, 'id');
        return found(await repository.delete(id), id);
      }),
    },
    {
      method: 'GET',
      path: '/people',
      handler: guarded('List', async () => ({ status: 200, body: await repository.list() })),
    },
  ];
}
