/**
 * Tools Handler
 *
 * Lists tools of both registries and switches them on or off at run time.
 * Registry mutation is synchronous, so it never interleaves with a running
 * dispatch step.
 */

import { Request, Response } from 'express';
import { ToolRegistries, ToolRegistry } from '../tools';
import logger from '../utils/logger';

export class ToolsHandler {
  constructor(private readonly registries: ToolRegistries) {}

  list = async (_req: Request, res: Response): Promise<void> => {
    const tools = (['main', 'builtin'] as const).flatMap((registryName) => {
      const status = this.registries[registryName].getToolStatus();
      const usage = this.registries[registryName].getUsageStats();
      return Object.entries(status).map(([toolName, entry]) => ({
        tool: toolName,
        registry: registryName,
        displayName: entry.name,
        description: entry.description,
        enabled: entry.enabled,
        supportedIntents: entry.supportedIntents,
        usage: usage[toolName]
      }));
    });
    res.status(200).json({ tools });
  };

  enable = async (req: Request, res: Response): Promise<void> => {
    this.toggle(req, res, true);
  };

  disable = async (req: Request, res: Response): Promise<void> => {
    this.toggle(req, res, false);
  };

  private toggle(req: Request, res: Response, enabled: boolean): void {
    const toolName = req.params.name;
    const registry = this.owner(toolName);
    if (!registry) {
      res.status(404).json({ error: 'tool_not_found', tool: toolName });
      return;
    }

    if (enabled) {
      registry.enable(toolName);
    } else {
      registry.disable(toolName);
    }
    logger.info('Tool toggled through control server', { toolName, enabled });
    res.status(200).json({ tool: toolName, enabled });
  }

  private owner(toolName: string): ToolRegistry | undefined {
    if (this.registries.main.hasTool(toolName)) {
      return this.registries.main;
    }
    return this.registries.builtin.hasTool(toolName) ? this.registries.builtin : undefined;
  }
}
