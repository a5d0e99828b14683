/**
 * Unit tests for Dispatcher routing and spoken feedback
 */

import { Dispatcher, TOOL_FAILURE_SPEECH } from '../../../dispatch/Dispatcher';
import { ToolRegistry } from '../../../tools/ToolRegistry';
import { clarify, exitOutcome, fail, ok } from '../../../tools/outcome';
import { Entities, IntentRecord } from '../../../intent/types';
import { RecordingSpeechSink, StubTool } from '../../utils/fakes';

function record(intent: string, entities: Entities = {}, originalText = '', extra: Partial<IntentRecord> = {}): IntentRecord {
  return { intent, entities, originalText, engine: 'rule_based', ...extra };
}

describe('Dispatcher', () => {
  let registry: ToolRegistry;
  let builtins: ToolRegistry;
  let speech: RecordingSpeechSink;
  let dispatcher: Dispatcher;
  let weather: StubTool;
  let conversation: StubTool;

  beforeEach(() => {
    registry = new ToolRegistry({ label: 'main' });
    builtins = new ToolRegistry({ label: 'builtin' });
    speech = new RecordingSpeechSink();

    weather = new StubTool('weather', ['get_weather'], (_intent, entities) =>
      ok(`weather_retrieved: ${String(entities.city)}`, `${String(entities.city)} 晴`));
    conversation = new StubTool('conversation', ['greeting', 'get_time'], (intent) =>
      intent === 'greeting' ? ok('greeted', '你好') : ok('time', '十点'));
    registry.register('weather', weather);
    builtins.register('conversation', conversation);

    dispatcher = new Dispatcher({ registry, builtins, speech });
  });

  it('should route to the main registry owner and speak its speech', async () => {
    const result = await dispatcher.dispatch(record('get_weather', { city: 'Paris' }, '巴黎天气'));

    expect(result).toEqual({
      outcome: { kind: 'ok', detail: 'weather_retrieved: Paris', speech: 'Paris 晴' },
      status: 'weather_retrieved: Paris',
      route: 'registry',
      exit: false,
      spoken: 'Paris 晴'
    });
    expect(speech.spoken).toEqual(['Paris 晴']);
  });

  it('should fall through to the builtin registry', async () => {
    const result = await dispatcher.dispatch(record('greeting', {}, '你好'));

    expect(result.route).toBe('builtin');
    expect(result.status).toBe('greeted');
    expect(speech.spoken).toEqual(['你好']);
  });

  it('should fall through when the main owner is disabled', async () => {
    registry.register('clock', new StubTool('clock', ['get_time']));
    registry.disable('clock');

    const result = await dispatcher.dispatch(record('get_time'));

    expect(result.route).toBe('builtin');
    expect(result.status).toBe('time');
  });

  it('should give an explicit tool call priority over the intent', async () => {
    const result = await dispatcher.dispatch(record('greeting', {}, '北京天气', {
      engine: 'llm',
      toolCall: { name: 'get_weather', arguments: { city: 'Beijing' } }
    }));

    expect(result.route).toBe('tool_call');
    expect(result.status).toBe('weather_retrieved: Beijing');
    expect(weather.calls).toEqual([{ intent: 'get_weather', entities: { city: 'Beijing' } }]);
    expect(conversation.calls).toHaveLength(0);
  });

  it('should resolve a tool call against the builtins too', async () => {
    const result = await dispatcher.dispatch(record('unknown', {}, 'hi', {
      toolCall: { name: 'greeting', arguments: {} }
    }));

    expect(result.route).toBe('tool_call');
    expect(result.status).toBe('greeted');
  });

  it('should report an unclaimed tool call as unhandled', async () => {
    const result = await dispatcher.dispatch(record('unknown', {}, '飞', {
      toolCall: { name: 'fly', arguments: {} }
    }));

    expect(result.status).toBe('unhandled_intent: fly');
    expect(result.route).toBe('unhandled');
    expect(speech.spoken).toEqual(["抱歉，我还不知道如何处理指令 '飞' (意图: fly)。"]);
  });

  it('should report an unknown intent as unhandled', async () => {
    const result = await dispatcher.dispatch(record('unknown', {}, '嗯'));

    expect(result).toEqual({
      outcome: {
        kind: 'error',
        code: 'unhandled_intent',
        message: 'unknown',
        speech: "抱歉，我还不知道如何处理指令 '嗯' (意图: unknown)。"
      },
      status: 'unhandled_intent: unknown',
      route: 'unhandled',
      exit: false,
      spoken: "抱歉，我还不知道如何处理指令 '嗯' (意图: unknown)。"
    });
  });

  it('should speak a clarification prompt exactly once', async () => {
    registry.register('weather', new StubTool('weather', ['get_weather'], () => clarify('city_missing', '哪个城市？')));

    const result = await dispatcher.dispatch(record('get_weather'));

    expect(result.status).toBe('clarification_needed: city_missing');
    expect(speech.spoken).toEqual(['哪个城市？']);
  });

  it('should speak curated error speech or a generic apology', async () => {
    registry.register('a', new StubTool('a', ['curated'], () => fail('quota', 'quota exceeded', '额度用完了。')));
    registry.register('b', new StubTool('b', ['plain'], () => fail('boom')));

    const curated = await dispatcher.dispatch(record('curated'));
    const plain = await dispatcher.dispatch(record('plain', {}, '做点什么'));

    expect(curated.status).toBe('error: quota exceeded');
    expect(plain.status).toBe('error: boom');
    expect(speech.spoken).toEqual(['额度用完了。', "处理指令 '做点什么' 时遇到问题。"]);
  });

  it('should contain a throwing handler and keep its message out of speech', async () => {
    registry.register('bad', new StubTool('bad', ['explode'], () => {
      throw new Error('kaboom');
    }));

    const result = await dispatcher.dispatch(record('explode'));

    expect(result.status).toBe('execution_error: kaboom');
    expect(result.route).toBe('registry');
    expect(speech.spoken).toEqual([TOOL_FAILURE_SPEECH]);
  });

  it('should apologize without details when routing itself throws', async () => {
    jest.spyOn(builtins, 'executeIntent').mockRejectedValue(new Error('EACCES /usr/bin/xdotool'));

    const result = await dispatcher.dispatch(record('greeting', {}, '你好'));

    expect(result).toEqual({
      outcome: {
        kind: 'error',
        code: 'dispatch_failed',
        message: 'EACCES /usr/bin/xdotool',
        speech: TOOL_FAILURE_SPEECH
      },
      status: 'error: EACCES /usr/bin/xdotool',
      route: 'failed',
      exit: false,
      spoken: TOOL_FAILURE_SPEECH
    });
    expect(speech.spoken).toEqual([TOOL_FAILURE_SPEECH]);
  });

  it('should stay silent on an ok outcome without speech', async () => {
    registry.register('quiet', new StubTool('quiet', ['hush']));

    const result = await dispatcher.dispatch(record('hush'));

    expect(result.status).toBe('hush_done');
    expect(result).not.toHaveProperty('spoken');
    expect(speech.spoken).toEqual([]);
  });

  it('should flag exit outcomes', async () => {
    builtins.register('bye', new StubTool('bye', ['exit_assistant'], () => exitOutcome('再见！')));

    const result = await dispatcher.dispatch(record('exit_assistant'));

    expect(result.exit).toBe(true);
    expect(result.status).toBe('exit');
  });

  it('should survive a failing speech sink', async () => {
    const failing = new Dispatcher({
      registry,
      speech: {
        speak: () => {
          throw new Error('no audio device');
        }
      }
    });

    const result = await failing.dispatch(record('get_weather', { city: 'Oslo' }));

    expect(result.status).toBe('weather_retrieved: Oslo');
    expect(result.spoken).toBe('Oslo 晴');
  });
});
