/**
 * @fileoverview Dispatcher
 *
 * Resolves a normalized IntentRecord to exactly one handler and turns the
 * outcome into spoken feedback. Routing order:
 *
 * 1. `toolCall`, when present, through the main registry and then the builtins
 * 2. the main registry owner of `intent`
 * 3. the builtin registry (greeting, exit, time, applications, windows, input)
 * 4. otherwise "don't know how" and `unhandled_intent: <intent>`
 *
 * Feedback is spoken here and nowhere else: an ok outcome speaks its speech
 * (or stays silent), a clarification prompt is spoken once, an error speaks
 * its user-facing speech or a generic apology. Internal error messages are
 * only logged. `dispatch` never rejects.
 */

import { IntentRecord } from '../intent/types';
import { ToolRegistry } from '../tools/ToolRegistry';
import { ToolOutcome } from '../tools/types';
import { fail, formatOutcome } from '../tools/outcome';
import { DispatchResult, DispatchRoute, SpeechSink } from './types';
import { errorMessage, extractErrorDetails } from '../errors/AssistantErrors';
import logger from '../utils/logger';
import { CorrelationIdManager } from '../utils/correlationId';

/** Codes meaning "this registry has no usable owner", so the next route is tried */
const NOT_HANDLED_CODES: readonly string[] = ['unsupported_intent', 'tool_not_found', 'tool_cannot_handle'];

export const TOOL_FAILURE_SPEECH = '抱歉，执行该指令时出现了一些问题。';

export interface DispatcherOptions {
  registry: ToolRegistry;
  /** Consulted after the main registry */
  builtins?: ToolRegistry;
  speech: SpeechSink;
}

function notHandled(outcome: ToolOutcome): boolean {
  return outcome.kind === 'error' && NOT_HANDLED_CODES.includes(outcome.code);
}

export class Dispatcher {
  private readonly registry: ToolRegistry;
  private readonly builtins?: ToolRegistry;
  private readonly speech: SpeechSink;

  constructor(options: DispatcherOptions) {
    this.registry = options.registry;
    this.builtins = options.builtins;
    this.speech = options.speech;
  }

  async dispatch(record: IntentRecord): Promise<DispatchResult> {
    return logger.withSpan('dispatcher.dispatch', async () => {
      try {
        return await this.route(record);
      } catch (error) {
        const details = extractErrorDetails(error);
        logger.error('Dispatch failed', {
          correlationId: CorrelationIdManager.getCurrentCorrelationId(),
          intent: record.intent,
          error: details.message,
          stack: details.stack
        });
        return this.finish(fail('dispatch_failed', details.message, TOOL_FAILURE_SPEECH), 'failed', record);
      }
    }, { 'intent.name': record.intent, 'intent.engine': record.engine });
  }

  private async route(record: IntentRecord): Promise<DispatchResult> {
    const { toolCall, originalText } = record;

    if (toolCall) {
      logger.info('Dispatching explicit tool call', { tool: toolCall.name });
      let outcome: ToolOutcome;
      try {
        outcome = await this.executeAcross(toolCall.name, toolCall.arguments, originalText);
      } catch (error) {
        logger.error('Tool call execution raised', { tool: toolCall.name, error: errorMessage(error) });
        outcome = fail('tool_execution_failed', `tool_execution_failed:${toolCall.name}`, TOOL_FAILURE_SPEECH);
      }
      if (!notHandled(outcome)) {
        return this.finish(outcome, 'tool_call', record);
      }
      return this.unhandled(toolCall.name, record);
    }

    if (this.registry.resolve(record.intent) !== undefined) {
      const outcome = await this.registry.executeIntent(record.intent, record.entities, originalText);
      if (!notHandled(outcome)) {
        return this.finish(outcome, 'registry', record);
      }
    }

    if (this.builtins) {
      const outcome = await this.builtins.executeIntent(record.intent, record.entities, originalText);
      if (!notHandled(outcome)) {
        return this.finish(outcome, 'builtin', record);
      }
    }

    // Final attempt: the owner may have been registered or re-enabled meanwhile
    const lastChance = await this.registry.executeIntent(record.intent, record.entities, originalText);
    if (!notHandled(lastChance)) {
      return this.finish(lastChance, 'registry', record);
    }

    return this.unhandled(record.intent, record);
  }

  private async executeAcross(intent: string, entities: IntentRecord['entities'], originalText: string): Promise<ToolOutcome> {
    const outcome = await this.registry.executeIntent(intent, entities, originalText);
    if (notHandled(outcome) && this.builtins) {
      return this.builtins.executeIntent(intent, entities, originalText);
    }
    return outcome;
  }

  private async unhandled(intent: string, record: IntentRecord): Promise<DispatchResult> {
    logger.info('No handler for intent', { intent, engine: record.engine });
    const speech = `抱歉，我还不知道如何处理指令 '${record.originalText}' (意图: ${intent})。`;
    const result = await this.finish(fail('unhandled_intent', intent, speech), 'unhandled', record);
    return { ...result, status: `unhandled_intent: ${intent}` };
  }

  private async finish(outcome: ToolOutcome, route: DispatchRoute, record: IntentRecord): Promise<DispatchResult> {
    const spoken = this.feedbackFor(outcome, record);
    if (spoken !== undefined) {
      await this.say(spoken);
    }

    const status = formatOutcome(outcome);
    if (outcome.kind === 'error') {
      logger.warn('Intent failed', { intent: record.intent, route, code: outcome.code, message: outcome.message });
    }

    return {
      outcome,
      status,
      route,
      exit: outcome.kind === 'ok' && outcome.exit === true,
      ...(spoken !== undefined ? { spoken } : {})
    };
  }

  private feedbackFor(outcome: ToolOutcome, record: IntentRecord): string | undefined {
    switch (outcome.kind) {
      case 'ok':
        return outcome.speech;
      case 'clarification_needed':
        return outcome.prompt;
      case 'error':
        if (outcome.speech !== undefined) {
          return outcome.speech;
        }
        return outcome.code === 'execution_error'
          ? TOOL_FAILURE_SPEECH
          : `处理指令 '${record.originalText}' 时遇到问题。`;
    }
  }

  private async say(text: string): Promise<void> {
    try {
      await this.speech.speak(text);
    } catch (error) {
      logger.warn('Speech sink failed', { error: errorMessage(error) });
    }
  }
}
