/**
 * Process bootstrap: configuration, logging, the SurrealDB session and
 * the HTTP listener, torn down again on SIGINT or SIGTERM.
 */

import { createLoggingMiddleware } from '@batchline/core';
import { SurrealSession } from '@batchline/surrealdb';

import { createApp } from './app';
import { loadConfig } from './config';
import { createLevelLogger } from './logger';

import type { Server } from 'node:http';
import type { BaseSession, BaseSessionOptions } from '@batchline/core';
import type { App } from './app';
import type { AppConfig } from './config';

export interface RunningApp extends App {
  config: AppConfig;
  session: BaseSession;
  shutdown(): Promise<void>;
}

export interface MainOptions {
  createSession?: (options: BaseSessionOptions) => BaseSession;
  listen?: (server: Server, host: string, port: number) => Promise<void>;
}

export function listen(server: Server, host: string, port: number): Promise<void> {
  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, host, () => {
      server.off('error', reject);
      resolve();
    });
  });
}

export function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}

export async function main(
  env: NodeJS.ProcessEnv = process.env,
  options: MainOptions = {},
): Promise<RunningApp> {
  const { createSession = (sessionOptions) => new SurrealSession(sessionOptions), listen: bind = listen } =
    options;
  const config = loadConfig(env);
  const logger = createLevelLogger(config.logLevel);

  const session = createSession({
    logger,
    middleware: [createLoggingMiddleware({ logger })],
  });
  await session.connect(config.database);

  const app = createApp({ session, logger });
  const { host, port } = config.server;
  try {
    await bind(app.server, host, port);
  } catch (error) {
    await session.disconnect();
    throw error;
  }
  logger.info(`Listening on http://${host}:${port}`);

  const shutdown = async (): Promise<void> => {
    await closeServer(app.server);
    await session.disconnect();
    logger.info('Shut down');
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      logger.info(`Received ${signal}`);
      shutdown().catch((error: unknown) => {
        logger.error('Shutdown failed', { error });
        process.exitCode = 1;
      });
    });
  }

  return { ...app, config, session, shutdown };
}
