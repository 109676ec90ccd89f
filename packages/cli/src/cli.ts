#!/usr/bin/env node

/**
 * @article2video/cli
 * Entry point for the command surface.
 */

import { cmdRun } from './commands/run.js';
import { cmdServe } from './commands/serve.js';
import { cmdDoctor } from './commands/doctor.js';
import { UsageError } from './utils/errors.js';

const VERSION = '0.1.0';

function printHelp(): void {
  console.log(`
  Usage: article2video <command> [options]

  Commands:
    run        Run the pipeline once
    serve      Start the HTTP surface
    doctor     Check environment readiness

  Run options:
    --article <id>    Article number (default: the latest article)

  Serve options:
    --port <n>        Port (default: PORT or 8000)
    --host <addr>     Bind address (default: 0.0.0.0)

  Global options:
    --help     Show this help message
    --version  Show version

  Configuration is read from .article2video.json, the environment and .env
  (see README.md for the recognised variables).

  Examples:
    article2video run
    article2video run --article 123
    article2video serve --port 8080
    curl -X POST localhost:8080/pipeline/run -d '{"article_id":123}'
`);
}

async function main(command: string | undefined): Promise<number> {
  switch (command) {
    case 'run':
      return cmdRun();
    case 'serve':
      return cmdServe();
    case 'doctor':
      return cmdDoctor();
    case '--version':
    case '-v':
      console.log(VERSION);
      return 0;
    case '--help':
    case '-h':
    case undefined:
      printHelp();
      return 0;
    default:
      console.error(`Unknown command: ${command}`);
      printHelp();
      return 2;
  }
}

try {
  process.exitCode = await main(process.argv[2]);
} catch (err) {
  if (err instanceof UsageError) {
    console.error(err.message);
    process.exitCode = 2;
  } else {
    console.error(err instanceof Error ? err.stack ?? err.message : String(err));
    process.exitCode = 1;
  }
}
