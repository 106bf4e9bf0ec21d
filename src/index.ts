#!/usr/bin/env node

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { createServer } from './server.js';
import { runCLI } from './cli.js';
import { ContextConfigError } from './errors.js';
import { logger } from './logger.js';

async function startMCPServer(): Promise<void> {
  const server = createServer();
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info('Context-budget MCP server running');
}

async function main(): Promise<void> {
  const result = runCLI(process.argv.slice(2));

  if (result === 'server') {
    await startMCPServer();
  }
}

main().catch((error: unknown) => {
  if (error instanceof ContextConfigError) {
    console.error(error.message);
  } else {
    logger.error('Fatal error', error);
  }
  process.exit(1);
});
