import { consoleLogger } from '@batchline/core';

import { createHttpServer, createPersonRoutes } from './http';
import { PersonRepository } from './person';

import type { Server } from 'node:http';
import type { Logger, Session } from '@batchline/core';

export interface AppOptions {
  session: Session;
  logger?: Logger;
  maxBodyBytes?: number;
}

export interface App {
  repository: PersonRepository;
  server: Server;
}

/**
 * Wire a repository and the person routes over an established session.
 * The returned server is not listening yet.
 */
export function createApp({ session, logger = consoleLogger, maxBodyBytes }: AppOptions): App {
  const repository = new PersonRepository(session, { logger });
  const routes = createPersonRoutes(repository, { logger });
  const server = createHttpServer(routes, { logger, maxBodyBytes });

  return { repository, server };
}
