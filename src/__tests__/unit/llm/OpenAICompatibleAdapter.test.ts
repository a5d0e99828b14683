/**
 * Unit tests for OpenAICompatibleAdapter and the shared adapter behavior
 */

import {
  ChatCompletionRequest,
  ChatCompletionTransport,
  ChatMessagePayload,
  OpenAICompatibleAdapter
} from '../../../llm/OpenAICompatibleAdapter';
import { APOLOGY_RESPONSE, INTENT_SYSTEM_PROMPT } from '../../../llm/prompts';
import { ToolRegistry } from '../../../tools/ToolRegistry';
import { StubTool } from '../../utils/fakes';

class FakeChatTransport implements ChatCompletionTransport {
  readonly requests: ChatCompletionRequest[] = [];
  reply: ChatMessagePayload | undefined = { content: '' };
  failure?: Error;

  async complete(request: ChatCompletionRequest): Promise<ChatMessagePayload | undefined> {
    this.requests.push(request);
    if (this.failure) {
      throw this.failure;
    }
    return this.reply;
  }

  async probe(): Promise<boolean> {
    if (this.failure) {
      throw this.failure;
    }
    return true;
  }
}

function parse(answer: string): unknown {
  return JSON.parse(answer);
}

describe('OpenAICompatibleAdapter', () => {
  let transport: FakeChatTransport;
  let adapter: OpenAICompatibleAdapter;

  beforeEach(() => {
    transport = new FakeChatTransport();
    adapter = new OpenAICompatibleAdapter('openai', transport, { model: 'test-model', temperature: 0.1 });
  });

  describe('getIntentAndEntities', () => {
    it('should turn the first tool call into an intent answer', async () => {
      transport.reply = {
        content: null,
        tool_calls: [
          { function: { name: 'get_weather', arguments: '{"city":"Beijing"}' } },
          { function: { name: 'calculate', arguments: '{}' } }
        ]
      };

      const answer = await adapter.getIntentAndEntities('北京天气');

      expect(parse(answer)).toEqual({
        intent: 'get_weather',
        entities: { city: 'Beijing' },
        tool_call: { name: 'get_weather', arguments: { city: 'Beijing' } }
      });
    });

    it('should report undecodable tool arguments as unknown', async () => {
      transport.reply = { tool_calls: [{ function: { name: 'get_weather', arguments: '{city' } }] };

      expect(parse(await adapter.getIntentAndEntities('x'))).toEqual({
        intent: 'unknown',
        entities: { error: 'Failed to parse tool arguments' }
      });
    });

    it('should read fenced JSON content', async () => {
      transport.reply = { content: '```json\n{"intent":"greeting","entities":{}}\n```' };

      expect(parse(await adapter.getIntentAndEntities('你好'))).toEqual({ intent: 'greeting', entities: {} });
    });

    it('should keep a non-JSON reply as the raw response', async () => {
      transport.reply = { content: 'I am not sure' };

      const answer = parse(await adapter.getIntentAndEntities('x'));

      expect(answer).toMatchObject({ intent: 'unknown', entities: { raw_response: 'I am not sure' } });
    });

    it('should take the intent from an embedded tool call', async () => {
      transport.reply = { content: '{"tool_call":{"name":"calculate","arguments":{"expression":"1+1"}}}' };

      expect(parse(await adapter.getIntentAndEntities('x'))).toEqual({
        intent: 'calculate',
        entities: { expression: '1+1' },
        tool_call: { name: 'calculate', arguments: { expression: '1+1' } }
      });
    });

    it('should return the unknown answer when the transport fails', async () => {
      transport.failure = new Error('connect ECONNREFUSED');

      await expect(adapter.getIntentAndEntities('x')).resolves.toBe('{"intent":"unknown","entities":{}}');
    });

    it('should send the plain intent prompt without a registry', async () => {
      await adapter.getIntentAndEntities('hello');

      expect(transport.requests[0]).toEqual({
        model: 'test-model',
        system: INTENT_SYSTEM_PROMPT,
        turns: [{ role: 'user', content: 'hello' }],
        temperature: 0.1,
        functions: undefined
      });
    });
  });

  describe('tool catalog', () => {
    it('should declare one function per routable intent and follow registry changes', async () => {
      const registry = new ToolRegistry();
      registry.register('weather', new StubTool('weather', ['get_weather'], undefined, {
        schemas: [{
          intent: 'get_weather',
          description: 'Current weather',
          parameters: { city: { type: 'string', description: 'City name' } },
          required: ['city']
        }]
      }));
      registry.register('calc', new StubTool('calc', ['calculate']));
      adapter.setToolRegistry(registry);

      expect(adapter.getFunctionSchemas()).toEqual([
        {
          name: 'get_weather',
          description: 'Current weather',
          parameters: { type: 'object', properties: { city: { type: 'string', description: 'City name' } }, required: ['city'] }
        },
        {
          name: 'calculate',
          description: 'calc stub (calculate)',
          parameters: { type: 'object', properties: {}, required: [] }
        }
      ]);

      registry.disable('weather');
      await adapter.getIntentAndEntities('1+1');

      expect(transport.requests[0].functions?.map((fn) => fn.name)).toEqual(['calculate']);
    });
  });

  describe('generateResponse', () => {
    it('should send the context followed by the user turn', async () => {
      transport.reply = { content: '北京今天晴。' };

      const reply = await adapter.generateResponse('天气呢', [
        { role: 'user', content: '你好' },
        { role: 'assistant', content: '你好！' }
      ]);

      expect(reply).toBe('北京今天晴。');
      expect(transport.requests[0].turns).toEqual([
        { role: 'user', content: '你好' },
        { role: 'assistant', content: '你好！' },
        { role: 'user', content: '天气呢' }
      ]);
      expect(transport.requests[0].temperature).toBe(0.7);
    });

    it('should apologize for an empty or failed reply', async () => {
      transport.reply = { content: '  ' };
      await expect(adapter.generateResponse('x')).resolves.toBe(APOLOGY_RESPONSE);

      transport.failure = new Error('timeout');
      await expect(adapter.generateResponse('x')).resolves.toBe(APOLOGY_RESPONSE);
    });
  });

  describe('isAvailable', () => {
    it('should report a failing probe as unavailable', async () => {
      await expect(adapter.isAvailable()).resolves.toBe(true);

      transport.failure = new Error('401');
      await expect(adapter.isAvailable()).resolves.toBe(false);
    });
  });
});
