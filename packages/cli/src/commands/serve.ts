/**
 * @module commands/serve
 * `article2video serve [--port <n>]`: HTTP surface over one orchestrator.
 */

import { ConsoleLogger, createOrchestrator, loadConfig, loadDotenv } from '@article2video/core';

import { createHttpServer, listen } from '../server/http.js';
import { arg, intFlag } from '../utils/args.js';

export async function cmdServe(args: string[] = process.argv.slice(3)): Promise<number> {
  loadDotenv();
  const config = loadConfig();
  const logger = new ConsoleLogger(config.debug, 'server');
  const orchestrator = createOrchestrator(config, { logger: logger.child('pipeline') });

  const port = intFlag(args, '--port') ?? config.server.port;
  const host = arg(args, '--host', config.server.host);

  const server = createHttpServer({
    runPipeline: (req) => orchestrator.run(req),
    logger,
  });
  await listen(server, port, host, logger);

  await new Promise<void>((resolve) => {
    const stop = () => {
      logger.info('Shutting down');
      server.close(() => resolve());
      server.closeAllConnections();
    };
    process.once('SIGINT', stop);
    process.once('SIGTERM', stop);
  });
  return 0;
}
