/**
 * @fileoverview Assistant Loop
 *
 * Serializes utterances from every entry point (speech source, control
 * server) so that one command is fully resolved before the next starts. Each
 * utterance runs recognize → dispatch inside its own correlation context and
 * span.
 *
 * An exit outcome from any entry point stops the loop: later submissions are
 * rejected and `run` stops reading its source.
 *
 * Optional conversation fallback: when enabled and an LLM adapter is in use,
 * an `unknown` intent is answered with a free-text reply over the last turns
 * instead of the "don't know how" message.
 */

import { AsyncSubject, Subject, firstValueFrom } from 'rxjs';
import { concatMap, map } from 'rxjs/operators';
import { SpeechEvent, SpeechSource } from './types';
import { IntentRecognizer } from '../intent/IntentRecognizer';
import { IntentRecord, UNKNOWN_INTENT } from '../intent/types';
import { Dispatcher } from '../dispatch/Dispatcher';
import { DispatchResult, SpeechSink } from '../dispatch/types';
import { ok } from '../tools/outcome';
import { ConversationTurn } from '../llm/types';
import { AssistantStoppedError, errorMessage } from '../errors/AssistantErrors';
import logger from '../utils/logger';
import { CorrelationIdManager, CorrelationSource } from '../utils/correlationId';

export const SILENCE_PROMPT = '抱歉，我没有听到您的指令。';
export const STARTED_MESSAGE = '语音助手已在后台启动。';

export interface AssistantLoopOptions {
  recognizer: IntentRecognizer;
  dispatcher: Dispatcher;
  speech: SpeechSink;
  conversationFallback?: boolean;
  /** Turns kept for the conversation fallback */
  maxContextTurns?: number;
}

export interface SubmitOptions {
  source?: CorrelationSource;
  correlationId?: string;
}

interface Job {
  text: string;
  options: SubmitOptions;
  resolve: (result: DispatchResult) => void;
  reject: (error: Error) => void;
}

export class AssistantLoop {
  private readonly recognizer: IntentRecognizer;
  private readonly dispatcher: Dispatcher;
  private readonly speech: SpeechSink;
  private readonly conversationFallback: boolean;
  private readonly maxContextTurns: number;
  private readonly history: ConversationTurn[] = [];
  private readonly queue = new Subject<Job>();
  private readonly stopped$ = new AsyncSubject<void>();
  private stopped = false;

  constructor(options: AssistantLoopOptions) {
    this.recognizer = options.recognizer;
    this.dispatcher = options.dispatcher;
    this.speech = options.speech;
    this.conversationFallback = options.conversationFallback ?? false;
    this.maxContextTurns = options.maxContextTurns ?? 10;

    this.queue
      .pipe(concatMap(async (job) => {
        try {
          const result = await this.process(job.text, job.options);
          if (result.exit) {
            logger.info('Exit requested by command', { source: job.options.source ?? 'console' });
            this.stop();
          }
          job.resolve(result);
        } catch (error) {
          job.reject(error instanceof Error ? error : new Error(String(error)));
        }
      }))
      .subscribe();
  }

  /**
   * Queue one utterance. Resolves with its dispatch result once every earlier
   * utterance has finished.
   */
  submit(text: string, options: SubmitOptions = {}): Promise<DispatchResult> {
    if (this.stopped) {
      return Promise.reject(AssistantStoppedError.create('assistant_submit'));
    }
    return new Promise<DispatchResult>((resolve, reject) => {
      this.queue.next({ text, options, resolve, reject });
    });
  }

  /**
   * Read the source until it closes or the loop stops
   */
  async run(source: SpeechSource): Promise<void> {
    logger.info('Assistant loop started');
    await this.say(STARTED_MESSAGE);

    const stopEvent = firstValueFrom(this.stopped$.pipe(map((): SpeechEvent => ({ kind: 'closed' }))));

    try {
      while (!this.stopped) {
        const event: SpeechEvent = await Promise.race([source.next(), stopEvent]);
        if (event.kind === 'closed') {
          logger.info(this.stopped ? 'Assistant loop stopped' : 'Speech source closed');
          break;
        }
        if (event.kind === 'silence') {
          await this.say(SILENCE_PROMPT);
          continue;
        }

        await this.submit(event.text, { source: 'speech' });
      }
    } finally {
      source.close();
    }
  }

  /**
   * Reject further submissions. Queued utterances still complete.
   */
  stop(): void {
    if (this.stopped) {
      return;
    }
    this.stopped = true;
    this.queue.complete();
    this.stopped$.next();
    this.stopped$.complete();
  }

  getHistory(): readonly ConversationTurn[] {
    return this.history;
  }

  private process(text: string, options: SubmitOptions): Promise<DispatchResult> {
    const context = CorrelationIdManager.createUtteranceContext(options.source ?? 'console', options.correlationId);

    return CorrelationIdManager.runWithContext(context, () =>
      logger.withSpan('assistant.utterance', async () => {
        logger.info('Utterance received', { text, source: context.source });

        const record = await logger.withSpan('intent.recognize', () => this.recognizer.recognize(text));
        logger.info('Intent recognized', {
          intent: record.intent,
          engine: record.engine,
          toolCall: record.toolCall?.name
        });

        const reply = await this.converse(record);
        const result = reply ?? await this.dispatcher.dispatch(record);

        this.remember(record.originalText, result.spoken);
        logger.info('Utterance completed', { status: result.status, route: result.route });
        return result;
      }, { 'utterance.id': context.utteranceId ?? '' })
    );
  }

  private async converse(record: IntentRecord): Promise<DispatchResult | undefined> {
    const adapter = this.recognizer.getAdapter();
    if (!this.conversationFallback || !adapter || record.intent !== UNKNOWN_INTENT || record.originalText.trim() === '') {
      return undefined;
    }

    const reply = await adapter.generateResponse(record.originalText, this.history);
    await this.say(reply);
    return {
      outcome: ok('conversation_reply', reply),
      status: 'conversation_reply',
      route: 'conversation',
      exit: false,
      spoken: reply
    };
  }

  private remember(userText: string, assistantText: string | undefined): void {
    if (userText.trim() === '') {
      return;
    }
    this.history.push({ role: 'user', content: userText });
    if (assistantText !== undefined) {
      this.history.push({ role: 'assistant', content: assistantText });
    }
    const overflow = this.history.length - this.maxContextTurns * 2;
    if (overflow > 0) {
      this.history.splice(0, overflow);
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
