/**
 * @fileoverview Base class for tool handlers
 *
 * Holds the enabled flag, the intent schemas and the shared entity checks so
 * concrete tools only implement `handle`.
 */

import { Entities } from '../intent/types';
import { clarify, formatOutcome } from './outcome';
import { ClarificationOutcome, IntentSchema, ToolHandler, ToolOutcome } from './types';
import { findMissingFields } from '../types/TypeGuards';
import logger from '../utils/logger';

export abstract class BaseTool implements ToolHandler {
  abstract readonly name: string;
  abstract readonly description: string;

  private enabled = true;

  abstract getSupportedIntents(): readonly string[];

  protected abstract handle(intent: string, entities: Entities, originalText: string): Promise<ToolOutcome>;

  async execute(intent: string, entities: Entities, originalText: string): Promise<ToolOutcome> {
    const outcome = await this.handle(intent, entities, originalText);
    logger.debug('Tool executed intent', {
      tool: this.name,
      intent,
      result: formatOutcome(outcome)
    });
    return outcome;
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  setEnabled(enabled: boolean): void {
    this.enabled = enabled;
  }

  getIntentSchemas(): readonly IntentSchema[] {
    return [];
  }

  getKeywords(): readonly string[] {
    return [];
  }

  /**
   * Clarification naming the missing entities, or undefined when all are present
   */
  protected requireEntities(entities: Entities, required: readonly string[]): ClarificationOutcome | undefined {
    const missing = findMissingFields(entities, required);
    if (missing.length === 0) {
      return undefined;
    }
    return clarify(`missing_${missing.join('_')}`, `缺少必需的参数: ${missing.join(', ')}`);
  }
}
