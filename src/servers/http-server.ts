#!/usr/bin/env node
import 'dotenv/config';
import { ConfigLoader } from '../config/ConfigLoader.js';
import { startApiServer } from '../api/server.js';
import { setLogLevel, logger } from '../utils/logger.js';

/**
 * API keys from API_KEYS, comma separated
 */
export function parseApiKeys(value: string | undefined): string[] {
  return (value ?? '')
    .split(',')
    .map((key) => key.trim())
    .filter((key) => key.length > 0);
}

// Start server
export async function startHttpServer(): Promise<void> {
  const config = await ConfigLoader.loadRecognitionConfig();
  if (config.processing.logLevel) {
    setLogLevel(config.processing.logLevel);
  }

  const apiKeys = parseApiKeys(process.env.API_KEYS);
  logger.info(`API key required: ${apiKeys.length > 0}`);

  await startApiServer(
    { config },
    {
      requireApiKey: apiKeys.length > 0,
      apiKeys,
    }
  );
}

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled promise rejection', {
    reason: reason instanceof Error ? reason.message : String(reason),
    stack: reason instanceof Error ? reason.stack : undefined
  });
});

// Only run if not in test environment
if (!process.env.VITEST && !process.env.NODE_ENV?.includes('test')) {
  startHttpServer().catch((error) => {
    logger.error('HTTP server startup failed', error);
    process.exit(1);
  });
}
