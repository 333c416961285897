#!/usr/bin/env node

// Load environment variables from a .env file if present
import 'dotenv/config';

import { BudgetToolServer } from './server/BudgetToolServer.js';
import { parseCliOptions } from './server/cli.js';
import { loadConfig } from './server/config.js';
import { ConfigurationError } from './types/index.js';

/**
 * Global server instance for graceful shutdown
 */
let serverInstance: BudgetToolServer | null = null;

async function gracefulShutdown(signal: string): Promise<void> {
  console.error(`Received ${signal}, shutting down...`);

  try {
    if (serverInstance) {
      await serverInstance.close();
      serverInstance = null;
    }
    process.exit(0);
  } catch (error) {
    console.error('Error during shutdown:', error);
    process.exit(1);
  }
}

function reportError(error: unknown): void {
  if (error instanceof ConfigurationError) {
    console.error('Configuration Error:', error.message);
    console.error('Please check your environment variables and try again.');
  } else if (error instanceof Error) {
    console.error('Server Error:', error.message);
    if (process.env['NODE_ENV'] === 'development') {
      console.error('Stack trace:', error.stack);
    }
  } else {
    console.error('Unknown error:', error);
  }
  process.exit(1);
}

async function main(): Promise<void> {
  const options = parseCliOptions();
  const config = loadConfig();

  serverInstance = new BudgetToolServer({ config, logging: options.logging });
  await serverInstance.run();
}

process.on('SIGINT', () => {
  void gracefulShutdown('SIGINT');
});
process.on('SIGTERM', () => {
  void gracefulShutdown('SIGTERM');
});

process.on('unhandledRejection', (reason) => {
  console.error('Unhandled Promise Rejection:', reason);
  process.exit(1);
});

main().catch(reportError);
