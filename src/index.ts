#!/usr/bin/env node

/**
 * Cortex Agent Chat - Entry Point
 *
 * Serves the chat UI and API, and the MCP tools over stdio.
 */

import { getConfig, printConfigInfo } from './config.js';
import { McpServer } from './presentation/McpServer.js';

async function main() {
  let server: McpServer | null = null;

  // Setup graceful shutdown
  const shutdown = async (signal: string, exitCode = 0) => {
    console.error(`\n\n📛 Received ${signal}, shutting down gracefully...`);
    try {
      await server?.shutdown();
    } catch (error) {
      console.error('💥 Error during shutdown:', error);
      exitCode = 1;
    }
    console.error('👋 Goodbye!\n');
    process.exit(exitCode);
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));

  process.on('uncaughtException', (error) => {
    console.error('💥 Uncaught Exception:', error);
    void shutdown('UNCAUGHT_EXCEPTION', 1);
  });

  process.on('unhandledRejection', (reason) => {
    console.error('💥 Unhandled Rejection:', reason);
    void shutdown('UNHANDLED_REJECTION', 1);
  });

  try {
    // Load configuration
    const config = getConfig();
    printConfigInfo(config);

    server = new McpServer(config);
    await server.start();
    server.printStats();
  } catch (error) {
    console.error('💥 Fatal error in main():', error);
    await shutdown('STARTUP_FAILURE', 1);
  }
}

// Start the server
void main();
