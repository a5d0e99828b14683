/**
 * @fileoverview Shared behavior of every LLM adapter
 *
 * Subclasses supply the vendor transport calls. This class owns protocol
 * selection, the tool catalog (rebuilt whenever the registry changes), reply
 * parsing and the rule that no failure escapes an adapter method.
 */

import { ToolRegistry } from '../tools/ToolRegistry';
import { LLMTransportError, extractErrorDetails } from '../errors/AssistantErrors';
import logger from '../utils/logger';
import { CorrelationIdManager } from '../utils/correlationId';
import {
  ConversationTurn,
  FunctionSchema,
  IntentRequest,
  LLMAdapter,
  ModelReply,
  ReplyRequest,
  ToolAware,
  ToolProtocol
} from './types';
import { APOLOGY_RESPONSE, CONVERSATION_SYSTEM_PROMPT, INTENT_SYSTEM_PROMPT, buildToolPrompt } from './prompts';
import { UNKNOWN_ANSWER, parseEmbeddedAnswer, toolCallAnswer } from './responseParsing';
import { buildFunctionSchemas, buildToolCatalog } from './toolSchema';

export interface AdapterOptions {
  model: string;
  /** Temperature for intent analysis; replies use a livelier fixed value */
  temperature: number;
}

const REPLY_TEMPERATURE = 0.7;

export abstract class BaseLLMAdapter implements LLMAdapter, ToolAware {
  abstract readonly backend: string;

  protected registry?: ToolRegistry;
  protected toolPrompt?: string;
  protected functions: FunctionSchema[] = [];

  private readonly onRegistryChanged = (): void => this.rebuildToolCatalog();

  constructor(protected readonly options: AdapterOptions) {}

  abstract getSupportedToolProtocols(): readonly ToolProtocol[];

  protected abstract requestIntent(request: IntentRequest): Promise<ModelReply>;
  protected abstract requestReply(request: ReplyRequest): Promise<string>;
  protected abstract probe(): Promise<boolean>;

  setToolRegistry(registry: ToolRegistry): void {
    if (this.registry) {
      this.registry.off('changed', this.onRegistryChanged);
    }
    this.registry = registry;
    registry.on('changed', this.onRegistryChanged);
    this.rebuildToolCatalog();
  }

  /**
   * Current native declarations; empty when the registry is absent
   */
  getFunctionSchemas(): readonly FunctionSchema[] {
    return this.functions;
  }

  async getIntentAndEntities(text: string): Promise<string> {
    const correlationId = CorrelationIdManager.getCurrentCorrelationId();
    const useNative = this.supportsNativeCalls() && this.functions.length > 0;

    const request: IntentRequest = {
      system: useNative || !this.toolPrompt ? INTENT_SYSTEM_PROMPT : this.toolPrompt,
      text,
      temperature: this.options.temperature,
      functions: useNative ? this.functions : undefined
    };

    try {
      const reply = await logger.withSpan(
        'llm.get_intent',
        () => this.requestIntent(request),
        { 'llm.backend': this.backend, 'llm.model': this.options.model, 'llm.native_tools': useNative }
      );

      if (reply.toolCall) {
        logger.info('Model requested a tool', { correlationId, backend: this.backend, tool: reply.toolCall.name });
        return toolCallAnswer(reply.toolCall.name, reply.toolCall.arguments);
      }

      return parseEmbeddedAnswer(reply.text ?? '');
    } catch (error) {
      this.logTransportFailure('getIntentAndEntities', error, correlationId);
      return UNKNOWN_ANSWER;
    }
  }

  async generateResponse(text: string, context: readonly ConversationTurn[] = []): Promise<string> {
    const correlationId = CorrelationIdManager.getCurrentCorrelationId();
    try {
      const reply = await logger.withSpan(
        'llm.generate_response',
        () => this.requestReply({
          system: CONVERSATION_SYSTEM_PROMPT,
          turns: [...context, { role: 'user', content: text }],
          temperature: REPLY_TEMPERATURE
        }),
        { 'llm.backend': this.backend, 'llm.model': this.options.model }
      );
      return reply.trim() === '' ? APOLOGY_RESPONSE : reply;
    } catch (error) {
      this.logTransportFailure('generateResponse', error, correlationId);
      return APOLOGY_RESPONSE;
    }
  }

  async isAvailable(): Promise<boolean> {
    try {
      return await this.probe();
    } catch (error) {
      logger.warn('LLM availability probe failed', {
        backend: this.backend,
        error: extractErrorDetails(error).message
      });
      return false;
    }
  }

  protected supportsNativeCalls(): boolean {
    return this.getSupportedToolProtocols().includes('native_function_calling');
  }

  private rebuildToolCatalog(): void {
    if (!this.registry) {
      return;
    }
    this.toolPrompt = buildToolPrompt(buildToolCatalog(this.registry));
    this.functions = this.supportsNativeCalls() ? buildFunctionSchemas(this.registry) : [];
    logger.debug('Rebuilt tool catalog', {
      backend: this.backend,
      functionCount: this.functions.length
    });
  }

  private logTransportFailure(operation: string, error: unknown, correlationId?: string): void {
    const wrapped = LLMTransportError.create(
      `${this.backend} ${operation} failed`,
      this.backend,
      correlationId,
      { model: this.options.model },
      error instanceof Error ? error : undefined
    );
    logger.error('LLM request failed', {
      error: wrapped.toJSON(),
      cause: extractErrorDetails(error).message
    });
  }
}
