/**
 * Unit tests for AssistantLoop
 */

import { AssistantLoop, SILENCE_PROMPT, STARTED_MESSAGE } from '../../../assistant/AssistantLoop';
import { SpeechEvent, SpeechSource } from '../../../assistant/types';
import { Dispatcher } from '../../../dispatch/Dispatcher';
import { IntentRecognizer } from '../../../intent/IntentRecognizer';
import { ConversationTurn, LLMAdapter, ToolProtocol } from '../../../llm/types';
import { ToolRegistry } from '../../../tools/ToolRegistry';
import { exitOutcome, ok } from '../../../tools/outcome';
import { AssistantStoppedError } from '../../../errors/AssistantErrors';
import { RecordingSpeechSink, StubTool } from '../../utils/fakes';

class ScriptedSpeechSource implements SpeechSource {
  closed = false;
  reads = 0;

  constructor(private readonly events: SpeechEvent[]) {}

  async next(): Promise<SpeechEvent> {
    this.reads += 1;
    return this.events.shift() ?? { kind: 'closed' };
  }

  close(): void {
    this.closed = true;
  }
}

/** Never produces an event; only close() ends it */
class IdleSpeechSource implements SpeechSource {
  closed = false;
  reads = 0;

  next(): Promise<SpeechEvent> {
    this.reads += 1;
    return new Promise<SpeechEvent>(() => undefined);
  }

  close(): void {
    this.closed = true;
  }
}

class ChattyAdapter implements LLMAdapter {
  readonly backend = 'chatty';
  readonly conversations: Array<{ text: string; context: ConversationTurn[] }> = [];

  async getIntentAndEntities(): Promise<string> {
    return '{"intent":"unknown","entities":{}}';
  }

  async generateResponse(text: string, context: readonly ConversationTurn[] = []): Promise<string> {
    this.conversations.push({ text, context: [...context] });
    return `回复: ${text}`;
  }

  async isAvailable(): Promise<boolean> {
    return true;
  }

  getSupportedToolProtocols(): readonly ToolProtocol[] {
    return ['embedded_json'];
  }
}

describe('AssistantLoop', () => {
  let speech: RecordingSpeechSink;
  let registry: ToolRegistry;
  let builtins: ToolRegistry;
  let dispatcher: Dispatcher;

  beforeEach(() => {
    speech = new RecordingSpeechSink();
    registry = new ToolRegistry({ label: 'main' });
    builtins = new ToolRegistry({ label: 'builtin' });
    builtins.register('conversation', new StubTool('conversation', ['greeting', 'exit_assistant'], (intent) =>
      intent === 'greeting' ? ok('greeted', '你好') : exitOutcome('再见！')));
    dispatcher = new Dispatcher({ registry, builtins, speech });
  });

  function createLoop(options: { adapter?: LLMAdapter; conversationFallback?: boolean; maxContextTurns?: number } = {}): AssistantLoop {
    const recognizer = options.adapter
      ? new IntentRecognizer({ engine: 'llm', adapter: options.adapter })
      : new IntentRecognizer({ engine: 'rule_based' });
    return new AssistantLoop({
      recognizer,
      dispatcher,
      speech,
      conversationFallback: options.conversationFallback,
      maxContextTurns: options.maxContextTurns
    });
  }

  describe('submit', () => {
    it('should recognize, dispatch and remember the exchange', async () => {
      const loop = createLoop();

      const result = await loop.submit('你好');

      expect(result.status).toBe('greeted');
      expect(result.route).toBe('builtin');
      expect(speech.spoken).toEqual(['你好']);
      expect(loop.getHistory()).toEqual([
        { role: 'user', content: '你好' },
        { role: 'assistant', content: '你好' }
      ]);
    });

    it('should finish one utterance before starting the next', async () => {
      const events: string[] = [];
      registry.register('calculator', new StubTool('calculator', ['calculate'], async (_intent, entities) => {
        const expression = String(entities.expression);
        events.push(`start ${expression}`);
        if (expression === '1') {
          await new Promise((resolve) => setTimeout(resolve, 20));
        }
        events.push(`end ${expression}`);
        return ok(`calculation_result: ${expression}`);
      }));
      const loop = createLoop();

      const results = await Promise.all([loop.submit('计算 1'), loop.submit('计算 2')]);

      expect(results.map((result) => result.status)).toEqual(['calculation_result: 1', 'calculation_result: 2']);
      expect(events).toEqual(['start 1', 'end 1', 'start 2', 'end 2']);
    });

    it('should reject submissions after stop', async () => {
      const loop = createLoop();
      loop.stop();

      await expect(loop.submit('你好')).rejects.toBeInstanceOf(AssistantStoppedError);
      await expect(loop.submit('你好')).rejects.toThrow('Assistant loop has stopped');
    });

    it('should let an already queued utterance finish when stopped', async () => {
      const loop = createLoop();

      const pending = loop.submit('你好');
      loop.stop();

      await expect(pending).resolves.toMatchObject({ status: 'greeted' });
    });

    it('should bound the remembered history', async () => {
      const loop = createLoop({ maxContextTurns: 1 });

      await loop.submit('你好');
      await loop.submit('嗯嗯');

      expect(loop.getHistory()).toEqual([
        { role: 'user', content: '嗯嗯' },
        { role: 'assistant', content: "抱歉，我还不知道如何处理指令 '嗯嗯' (意图: unknown)。" }
      ]);
    });
  });

  describe('run', () => {
    it('should prompt on silence and stop on an exit command', async () => {
      const source = new ScriptedSpeechSource([
        { kind: 'silence' },
        { kind: 'utterance', text: '你好' },
        { kind: 'utterance', text: '再见' },
        { kind: 'utterance', text: '你好' }
      ]);
      const loop = createLoop();

      await loop.run(source);

      expect(speech.spoken).toEqual([STARTED_MESSAGE, SILENCE_PROMPT, '你好', '再见！']);
      expect(source.reads).toBe(3);
      expect(source.closed).toBe(true);
    });

    it('should stop listening when another entry point submits an exit', async () => {
      const source = new IdleSpeechSource();
      const loop = createLoop();

      const running = loop.run(source);
      const result = await loop.submit('再见', { source: 'http' });
      await running;

      expect(result.exit).toBe(true);
      expect(source.closed).toBe(true);
      expect(speech.spoken).toEqual([STARTED_MESSAGE, '再见！']);
      await expect(loop.submit('你好')).rejects.toBeInstanceOf(AssistantStoppedError);
    });

    it('should return at once when the loop is already stopped', async () => {
      const source = new IdleSpeechSource();
      const loop = createLoop();
      loop.stop();

      await loop.run(source);

      expect(source.reads).toBe(0);
      expect(source.closed).toBe(true);
    });

    it('should end when the source closes', async () => {
      const source = new ScriptedSpeechSource([{ kind: 'closed' }]);

      await createLoop().run(source);

      expect(speech.spoken).toEqual([STARTED_MESSAGE]);
      expect(source.closed).toBe(true);
    });
  });

  describe('conversation fallback', () => {
    it('should answer unknown intents with a free-text reply over the history', async () => {
      const adapter = new ChattyAdapter();
      const loop = createLoop({ adapter, conversationFallback: true });

      const first = await loop.submit('讲个笑话');
      await loop.submit('再讲一个');

      expect(first).toEqual({
        outcome: { kind: 'ok', detail: 'conversation_reply', speech: '回复: 讲个笑话' },
        status: 'conversation_reply',
        route: 'conversation',
        exit: false,
        spoken: '回复: 讲个笑话'
      });
      expect(adapter.conversations[1]).toEqual({
        text: '再讲一个',
        context: [
          { role: 'user', content: '讲个笑话' },
          { role: 'assistant', content: '回复: 讲个笑话' }
        ]
      });
    });

    it('should leave unknown intents to the dispatcher when disabled', async () => {
      const adapter = new ChattyAdapter();
      const loop = createLoop({ adapter });

      const result = await loop.submit('讲个笑话');

      expect(result.status).toBe('unhandled_intent: unknown');
      expect(adapter.conversations).toHaveLength(0);
    });
  });
});
