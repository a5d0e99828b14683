#!/usr/bin/env node
/**
 * Command-line entry point: console speech loop plus the optional control
 * server, with graceful shutdown on SIGINT/SIGTERM
 */

import http from 'http';
import { ConfigurationManager } from './config/ConfigurationManager';
import { buildAssistant } from './bootstrap';
import { ConsoleSpeechSink, ConsoleSpeechSource } from './assistant/ConsoleSpeech';
import { closeServer, createApp, startServer } from './server';
import { extractErrorDetails } from './errors/AssistantErrors';
import logger from './utils/logger';

const FORCED_EXIT_MS = 10000;

async function main(): Promise<void> {
  const config = ConfigurationManager.fromEnvironment().getConfig();
  const speech = new ConsoleSpeechSink();
  const source = new ConsoleSpeechSource();
  const assistant = buildAssistant(config, { speech });

  let server: http.Server | undefined;
  if (config.server.enabled) {
    server = await startServer(createApp(assistant), config.server);
  }

  let shuttingDown = false;
  const shutdown = async (reason: string): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info(`Shutting down (${reason})`);

    const forceExitTimer = setTimeout(() => {
      logger.error('Forcing shutdown due to timeout');
      process.exit(1);
    }, FORCED_EXIT_MS);
    forceExitTimer.unref();

    try {
      source.close();
      assistant.loop.stop();
      if (server) {
        await closeServer(server);
      }
      await assistant.registries.main.shutdown();
      await assistant.registries.builtin.shutdown();
      logger.info('Shut down gracefully');
      process.exitCode = 0;
    } catch (error) {
      logger.error('Error during shutdown', { error: extractErrorDetails(error).message });
      process.exitCode = 1;
    } finally {
      clearTimeout(forceExitTimer);
    }
  };

  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });
  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });

  await assistant.loop.run(source);
  await shutdown('speech source finished');
}

main().catch((error: unknown) => {
  const details = extractErrorDetails(error);
  logger.error('Assistant failed to start', { error: details.message, stack: details.stack });
  process.exit(1);
});
