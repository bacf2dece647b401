#!/usr/bin/env node

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { server } from './server.js';
import { loadConfig } from './config.js';
import { runInspect } from './inspect.js';
import { logToStderr, setLogLevel } from './utils/logger.js';

async function runServer() {
  // Check if first argument is "inspect"
  if (process.argv[2] === 'inspect') {
    process.exitCode = await runInspect(process.argv.slice(3));
    return;
  }

  const config = loadConfig();
  setLogLevel(config.logLevel);

  process.on('uncaughtException', (error) => {
    logToStderr('error', `Uncaught exception: ${error.message}`);
    process.exit(1);
  });

  process.on('unhandledRejection', (reason) => {
    logToStderr('error', `Unhandled rejection: ${reason instanceof Error ? reason.message : String(reason)}`);
    process.exit(1);
  });

  const transport = new StdioServerTransport();
  logToStderr('info', 'Connecting server...');
  await server.connect(transport);
  logToStderr('info', 'Server connected successfully');
}

runServer().catch((error: unknown) => {
  logToStderr('error', `FATAL ERROR: ${error instanceof Error ? error.message : String(error)}`);
  process.exit(1);
});
