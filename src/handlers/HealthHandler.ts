/**
 * Health Handler
 *
 * Liveness and readiness endpoints of the control server
 */

import { Request, Response } from 'express';
import { IntentRecognizer } from '../intent/IntentRecognizer';
import { ToolRegistries } from '../tools';
import logger from '../utils/logger';
import { errorMessage } from '../errors/AssistantErrors';

export interface HealthHandlerDependencies {
  registries: ToolRegistries;
  recognizer: IntentRecognizer;
}

export class HealthHandler {
  constructor(private readonly deps: HealthHandlerDependencies) {}

  /**
   * Alive as long as the process answers
   */
  getLiveness = async (_req: Request, res: Response): Promise<void> => {
    res.status(200).json({
      status: 'alive',
      timestamp: new Date().toISOString(),
      uptime: process.uptime()
    });
  };

  /**
   * Ready when at least one tool is routable
   */
  getReadiness = async (_req: Request, res: Response): Promise<void> => {
    try {
      const { main, builtin } = this.deps.registries;
      const toolCount = main.getAvailableTools().length + builtin.getAvailableTools().length;
      const configuration = main.validateConfiguration();
      const ready = toolCount > 0;

      res.status(ready ? 200 : 503).json({
        status: ready ? 'ready' : 'not ready',
        timestamp: new Date().toISOString(),
        uptime: process.uptime(),
        engine: this.deps.recognizer.getEngine(),
        tools: toolCount,
        misconfiguredTools: configuration.invalidTools
      });
    } catch (error) {
      logger.error('Readiness check failed', {
        component: 'health_handler',
        error: errorMessage(error)
      });

      res.status(503).json({
        status: 'not ready',
        timestamp: new Date().toISOString(),
        error: 'Service not ready'
      });
    }
  };
}
