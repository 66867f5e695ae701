#!/usr/bin/env node

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { createServer } from './server.js';
import { loadConfig } from './config.js';
import { initializeDatabase } from './adapters/db/sqlite.adapter.js';
import { logger } from './lib/logger.js';

async function main() {
  const config = loadConfig();
  logger.level = config.logLevel;

  // Initialize database with migrations
  initializeDatabase(config.databasePath);

  const server = createServer(config);

  // stdout is reserved for MCP communication
  const transport = new StdioServerTransport();
  await server.connect(transport);

  logger.info({ dataDir: config.dataDir, workspacesDir: config.workspacesDir }, 'vmledger MCP server running on stdio');
}

main().catch((error) => {
  logger.fatal({ err: error }, 'Fatal error');
  process.exit(1);
});
