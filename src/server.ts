/**
 * Control server
 *
 * Health probes, tool listing and toggling, and text commands dispatched
 * through the assistant loop.
 */

import express from 'express';
import http from 'http';

import { HealthHandler } from './handlers/HealthHandler';
import { ToolsHandler } from './handlers/ToolsHandler';
import { CommandHandler } from './handlers/CommandHandler';
import { AssistantLoop } from './assistant/AssistantLoop';
import { IntentRecognizer } from './intent/IntentRecognizer';
import { ToolRegistries } from './tools';
import { ServerConfig } from './config/ConfigurationTypes';
import logger from './utils/logger';
import { correlationMiddleware } from './utils/correlationId';

export interface ControlServerDependencies {
  registries: ToolRegistries;
  recognizer: IntentRecognizer;
  loop: AssistantLoop;
}

export function createApp(deps: ControlServerDependencies): express.Express {
  const app = express();
  const health = new HealthHandler({ registries: deps.registries, recognizer: deps.recognizer });
  const tools = new ToolsHandler(deps.registries);
  const commands = new CommandHandler(deps.loop);

  app.use(correlationMiddleware());
  app.use(express.json());

  app.get('/health', health.getReadiness);
  app.get('/health/ready', health.getReadiness);
  app.get('/health/live', health.getLiveness);

  app.get('/tools', tools.list);
  app.post('/tools/:name/enable', tools.enable);
  app.post('/tools/:name/disable', tools.disable);

  app.post('/commands', commands.handle);

  return app;
}

export function startServer(app: express.Express, config: ServerConfig): Promise<http.Server> {
  const server = http.createServer(app);
  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(config.port, config.host, () => {
      server.off('error', reject);
      logger.info(`Control server listening on ${config.host}:${config.port}`);
      resolve(server);
    });
  });
}

export function closeServer(server: http.Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}
