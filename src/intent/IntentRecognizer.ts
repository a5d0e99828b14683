/**
 * @fileoverview Intent Recognizer
 *
 * Front door of the pipeline: turns recognized text into a normalized
 * IntentRecord using either the rule engine or an LLM adapter. Never throws.
 */

import { IntentRecord, UNKNOWN_INTENT, EngineSource } from './types';
import { RuleEngine } from './RuleEngine';
import { DEFAULT_RULES } from './defaultRules';
import { normalizeIntent, normalizeLLMAnswer } from './IntentNormalizer';
import { LLMAdapter, isToolAware } from '../llm/types';
import { ToolRegistry } from '../tools/ToolRegistry';
import { extractErrorDetails } from '../errors/AssistantErrors';
import logger from '../utils/logger';
import { CorrelationIdManager } from '../utils/correlationId';

export interface IntentRecognizerOptions {
  /** Configured engine; anything other than "llm" uses the rules */
  engine: string;
  adapter?: LLMAdapter;
  /** Handed to a tool-aware adapter once, at construction */
  registry?: ToolRegistry;
  ruleEngine?: RuleEngine;
}

export class IntentRecognizer {
  private readonly ruleEngine: RuleEngine;
  private readonly adapter?: LLMAdapter;
  private readonly engine: EngineSource;
  private readonly configuredEngine: string;

  constructor(options: IntentRecognizerOptions) {
    this.ruleEngine = options.ruleEngine ?? new RuleEngine(DEFAULT_RULES);
    this.adapter = options.adapter;
    this.configuredEngine = options.engine;

    if (options.engine === 'llm' && options.adapter) {
      this.engine = 'llm';
    } else {
      this.engine = 'rule_based';
      if (options.engine === 'llm') {
        logger.warn('LLM engine selected but no adapter is available, using rule engine');
      } else if (options.engine !== 'rule_based') {
        logger.warn('Unknown NLP engine, using rule engine', { engine: options.engine });
      }
    }

    if (this.engine === 'llm' && this.adapter && options.registry) {
      if (isToolAware(this.adapter)) {
        this.adapter.setToolRegistry(options.registry);
      }
      logger.info('LLM adapter ready', {
        backend: this.adapter.backend,
        protocols: this.adapter.getSupportedToolProtocols()
      });
    }
  }

  /**
   * Engine actually in use after fallback
   */
  getEngine(): EngineSource {
    return this.engine;
  }

  getConfiguredEngine(): string {
    return this.configuredEngine;
  }

  getAdapter(): LLMAdapter | undefined {
    return this.engine === 'llm' ? this.adapter : undefined;
  }

  async recognize(text: string): Promise<IntentRecord> {
    if (text.trim() === '') {
      return { intent: UNKNOWN_INTENT, entities: {}, originalText: text, engine: this.engine };
    }

    if (this.engine === 'rule_based' || !this.adapter) {
      const match = this.ruleEngine.match(text);
      return normalizeIntent(match, text, 'rule_based');
    }

    return this.recognizeWithLLM(this.adapter, text);
  }

  private async recognizeWithLLM(adapter: LLMAdapter, text: string): Promise<IntentRecord> {
    const correlationId = CorrelationIdManager.getCurrentCorrelationId();
    let answer: unknown;
    try {
      answer = await adapter.getIntentAndEntities(text);
    } catch (error) {
      logger.error('LLM adapter raised during intent analysis', {
        correlationId,
        backend: adapter.backend,
        error: extractErrorDetails(error).message
      });
      return { intent: UNKNOWN_INTENT, entities: {}, originalText: text, engine: 'llm_exception' };
    }

    if (typeof answer !== 'string' || answer.trim() === '') {
      logger.warn('LLM adapter returned no answer', { correlationId, backend: adapter.backend });
      return { intent: UNKNOWN_INTENT, entities: {}, originalText: text, engine: 'llm_error' };
    }

    const record = normalizeLLMAnswer(answer, text);
    logger.debug('LLM intent recognized', {
      correlationId,
      intent: record.intent,
      engine: record.engine,
      hasToolCall: record.toolCall !== undefined
    });
    return record;
  }
}
