import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { AppConfig } from '../config.js';
import { Logger } from '../core/logger.js';
import { createPaperdraftMcpServer, type PaperdraftMcpDependencies } from './create-paperdraft-mcp-server.js';

export const startStdioServer = async (
  config: AppConfig,
  dependencies: PaperdraftMcpDependencies,
  logger: Logger
): Promise<void> => {
  const server = createPaperdraftMcpServer(config, dependencies, logger);
  const transport = new StdioServerTransport();

  await server.connect(transport);
  logger.info('Paperdraft stdio transport ready', {
    defaultCitationStyle: config.defaultCitationStyle
  });
};
