import { loadConfig, createLogger } from './config.js';
import { createApp } from './app.js';
import { OllamaClient } from './lib/ollama-client.js';
import { YouTubeTranscriptSource } from './lib/transcript-source.js';
import { errorMessage } from './lib/errors.js';

// Load configuration
const config = loadConfig();
const logger = createLogger(config.logLevel);

const { server, registry, jobRunner } = createApp(
  config,
  {
    transcripts: new YouTubeTranscriptSource(logger),
    backend: new OllamaClient({ baseUrl: config.ollamaBaseUrl, timeoutMs: config.backendTimeoutMs }, logger),
  },
  logger
);

// Graceful shutdown handler
let isShuttingDown = false;

async function shutdown(signal: string): Promise<void> {
  if (isShuttingDown) return;
  isShuttingDown = true;

  logger.info(`Received ${signal}, starting graceful shutdown...`);

  // Force exit timeout
  const forceTimer = setTimeout(() => {
    logger.error('Forced shutdown due to timeout');
    process.exit(1);
  }, 35000);

  registry.stopCleanup();

  try {
    // Stop accepting, wait for in-flight connections
    await server.close();
    // Let background jobs already accepted finish
    await jobRunner.onIdle();
    clearTimeout(forceTimer);
    logger.info('Graceful shutdown complete');
    process.exit(0);
  } catch (error) {
    logger.error('Shutdown failed', { error: errorMessage(error) });
    process.exit(1);
  }
}

// Register signal handlers
process.on('SIGTERM', () => void shutdown('SIGTERM'));
process.on('SIGINT', () => void shutdown('SIGINT'));

// Handle uncaught errors
process.on('uncaughtException', (err) => {
  logger.error('Uncaught exception', { error: err.message, stack: err.stack });
  void shutdown('uncaughtException');
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled rejection', { reason: String(reason) });
  // Don't shutdown on unhandled rejection, just log
});

// Start server
server
  .listen()
  .then((address) => {
    registry.startCleanup();
    logger.info(`Video TLDR server listening on http://${address.address}:${address.port}`, {
      nodeVersion: process.version,
      logLevel: config.logLevel,
      workerConcurrency: config.workerConcurrency,
      maxQueueSize: config.maxQueueSize,
      jobConcurrency: config.jobConcurrency,
      defaultModel: config.defaultModel,
    });
  })
  .catch((error: unknown) => {
    logger.error('Failed to start server', { error: errorMessage(error) });
    process.exit(1);
  });
