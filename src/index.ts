#!/usr/bin/env node
import { ConfigError, ConfigManager } from './config/settings.js';
import { MCPHandlers } from './mcp/handlers.js';
import { MCPServer } from './mcp/server.js';
import { TOOLS } from './mcp/tools.js';
import { logger } from './utils/logger.js';

async function main(): Promise<void> {
  const config = ConfigManager.load();
  const server = new MCPServer(new MCPHandlers(config), TOOLS);

  const shutdown = () => {
    server.stop().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error('Failed to stop server:', error);
        process.exit(1);
      }
    );
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  await server.start();
}

main().catch((error: unknown) => {
  if (error instanceof ConfigError) {
    logger.error(error.message);
  } else {
    logger.error('Fatal error:', error);
  }
  process.exit(1);
});
