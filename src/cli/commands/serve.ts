// Serve command - run the web application

import { Command } from 'commander';
import { ValidationError } from '../../core/errors.js';
import { startServer } from '../../server/index.js';
import { GlobalOptions, loadCliConfig } from '../utils/context.js';
import { withErrorHandling } from '../utils/error-handler.js';

export const serveCommand = new Command('serve')
  .description('Start the web server')
  .option('-p, --port <port>', 'Port to listen on (overrides PORT)')
  .option('-H, --host <host>', 'Host to bind (overrides HOST)')
  .action(withErrorHandling(async (options: { port?: string; host?: string }, command: Command) => {
    const config = await loadCliConfig(command.optsWithGlobals<GlobalOptions>());

    if (options.port !== undefined) {
      const port = Number(options.port);
      if (!Number.isInteger(port) || port < 1 || port > 65535) {
        throw new ValidationError(`Invalid port: ${options.port}`, 'port');
      }
      config.server.port = port;
    }
    if (options.host !== undefined) {
      config.server.host = options.host;
    }

    const running = await startServer(config);

    const shutdown = (): void => {
      running.stop().then(
        () => process.exit(0),
        (error: unknown) => {
          console.error(error); // eslint-disable-line no-console
          process.exit(1);
        }
      );
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);
  }));
