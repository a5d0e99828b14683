/**
 * Command Handler
 *
 * POST /commands {text}: runs the text through the same serialized loop as
 * spoken utterances and returns the dispatch result.
 */

import { Request, Response } from 'express';
import { AssistantLoop } from '../assistant/AssistantLoop';
import { isObject, isNonEmptyString } from '../types/TypeGuards';
import { AssistantStoppedError, extractErrorDetails } from '../errors/AssistantErrors';
import logger from '../utils/logger';
import { CorrelationIdManager } from '../utils/correlationId';

export class CommandHandler {
  constructor(private readonly loop: AssistantLoop) {}

  handle = async (req: Request, res: Response): Promise<void> => {
    const body: unknown = req.body;
    const text = isObject(body) ? body.text : undefined;
    if (!isNonEmptyString(text)) {
      res.status(400).json({ error: 'text_required' });
      return;
    }

    try {
      const result = await this.loop.submit(text, {
        source: 'http',
        correlationId: CorrelationIdManager.getCurrentCorrelationId()
      });
      res.status(200).json(result);
    } catch (error) {
      const details = extractErrorDetails(error);
      logger.error('Command submission failed', { error: details.message });
      const status = error instanceof AssistantStoppedError ? 503 : 500;
      res.status(status).json({ error: details.code ?? 'command_failed', message: details.message });
    }
  };
}
