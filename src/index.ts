#!/usr/bin/env node
import process from 'node:process';

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';

import { loadConfig } from './config.js';
import { createLogger } from './logger.js';
import { NegotiationHistory } from './history/negotiationHistory.js';
import { buildMcpServer } from './mcp/server.js';

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger(config.logLevel, { pretty: config.logPretty });
  const history = new NegotiationHistory(config.historyMaxEntries, config.historyPersistPath, logger);

  const server = buildMcpServer({ config, logger, history });
  const transport = new StdioServerTransport();
  await server.connect(transport);

  logger.info(
    {
      transport: 'stdio',
      maxHeaderLength: config.maxHeaderLength,
      historyPersistPath: config.historyPersistPath ?? null
    },
    'accept-negotiator running on stdio'
  );

  const shutdown = async () => {
    logger.info('Shutting down stdio server');
    await server.close();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((error: unknown) => {
      logger.error({ err: error }, 'Shutdown failed');
      process.exit(1);
    });
  };

  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
}

main().catch((error) => {
  const text = error instanceof Error ? error.stack ?? error.message : String(error);
  console.error(text);
  process.exit(1);
});
