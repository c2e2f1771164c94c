#!/usr/bin/env node

import { config as loadDotEnv } from 'dotenv';
import { parseCliArgs, CLI_USAGE } from './cli/args.js';
import { parseConfig } from './config.js';
import { Logger } from './core/logger.js';
import { startHttpServer } from './http/start-http-server.js';
import { startStdioServer } from './mcp/start-stdio-server.js';
import { StateManager } from './paper/state-manager.js';
import { SessionManager } from './session/session-manager.js';
import { getPackageVersion } from './version.js';

loadDotEnv({ quiet: true });

const printStdout = (message: string): void => {
  process.stdout.write(`${message}\n`);
};

const printStderr = (message: string): void => {
  process.stderr.write(`${message}\n`);
};

const run = async (): Promise<void> => {
  const cli = parseCliArgs(process.argv.slice(2));

  if (cli.showHelp) {
    printStdout(CLI_USAGE);
    return;
  }

  if (cli.showVersion) {
    printStdout(getPackageVersion());
    return;
  }

  const config = parseConfig({
    ...(cli.transport ? { PAPERDRAFT_TRANSPORT: cli.transport } : {}),
    ...(cli.stateDir ? { PAPERDRAFT_STATE_DIR: cli.stateDir } : {})
  });

  const logger = new Logger(config.logLevel);
  const dependencies = {
    sessions: new SessionManager(
      {
        maxSessions: config.maxSessions,
        defaultStyle: config.defaultCitationStyle
      },
      logger.child({ component: 'sessions' })
    ),
    stateManager: new StateManager(config.stateDir)
  };

  switch (config.transport) {
    case 'stdio': {
      await startStdioServer(config, dependencies, logger.child({ transport: 'stdio' }));
      return;
    }
    case 'http': {
      startHttpServer(config, dependencies, logger.child({ transport: 'http' }));
      return;
    }
    case 'both': {
      startHttpServer(config, dependencies, logger.child({ transport: 'http' }));
      await startStdioServer(config, dependencies, logger.child({ transport: 'stdio' }));
      return;
    }
    default: {
      throw new Error(`Unsupported transport mode: ${String(config.transport)}`);
    }
  }
};

run().catch((error) => {
  const message = error instanceof Error ? error.message : String(error);
  printStderr(`paperdraft-citations failed to start: ${message}`);
  if (error instanceof Error && error.stack) {
    printStderr(error.stack);
  }
  if (message.includes('Unknown argument') || message.includes('Invalid transport') || message.includes('Missing value')) {
    printStderr('');
    printStderr(CLI_USAGE);
  }
  process.exitCode = 1;
});
