// HTTP server entry point

import { serve } from '@hono/node-server';
import { ConfigurationError } from '../core/errors.js';
import { Logger, logger } from '../core/logger.js';
import { AppConfig } from '../services/config/config-service.js';
import { createServices, ServiceOverrides } from '../services/container.js';
import { createApp } from './app.js';

export { createApp, type AppOptions, type SubmissionHandler } from './app.js';

export interface RunningServer {
  server: ReturnType<typeof serve>;
  port: number;
  stop(): Promise<void>;
}

type FetchHandler = Parameters<typeof serve>[0]['fetch'];

/**
 * Resolves once the socket is bound; bind failures such as EADDRINUSE reject
 */
function listen(fetch: FetchHandler, port: number, hostname: string): Promise<[ReturnType<typeof serve>, number]> {
  return new Promise((resolve, reject) => {
    const server = serve({ fetch, port, hostname }, info => {
      server.off('error', reject);
      resolve([server, info.port]);
    });
    server.once('error', reject);
  });
}

/**
 * Starts serving on the configured host and port
 */
export async function startServer(config: AppConfig, overrides: ServiceOverrides = {}): Promise<RunningServer> {
  Logger.configure({ level: config.logLevel });
  const log = overrides.logger ?? logger;
  const services = await createServices(config, overrides);
  const app = createApp({
    submissions: services.submissions,
    repository: services.store,
    sessionSecret: config.sessionSecret,
    logger: log
  });

  const { port, host } = config.server;
  let server: ReturnType<typeof serve>;
  let boundPort: number;
  try {
    [server, boundPort] = await listen(app.fetch, port, host);
  } catch (error) {
    await services.close();
    throw new ConfigurationError(`Cannot listen on ${host}:${port}: ${(error as Error).message}`);
  }
  log.info('Server listening', { host, port: boundPort });

  return {
    server,
    port: boundPort,
    stop: () =>
      new Promise<void>((resolve, reject) => {
        server.close(error => {
          if (error) {
            reject(error);
            return;
          }
          services.close().then(resolve, reject);
        });
      })
  };
}
