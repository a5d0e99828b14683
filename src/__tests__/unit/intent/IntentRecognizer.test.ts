/**
 * Unit tests for IntentRecognizer
 */

import { IntentRecognizer } from '../../../intent/IntentRecognizer';
import { LLMAdapter, ToolProtocol } from '../../../llm/types';
import { OpenAICompatibleAdapter, ChatCompletionTransport } from '../../../llm/OpenAICompatibleAdapter';
import { ToolRegistry } from '../../../tools/ToolRegistry';
import { StubTool } from '../../utils/fakes';

class ScriptedAdapter implements LLMAdapter {
  readonly backend = 'scripted';
  readonly prompts: string[] = [];

  constructor(private readonly answer: () => Promise<string>) {}

  getIntentAndEntities(text: string): Promise<string> {
    this.prompts.push(text);
    return this.answer();
  }

  async generateResponse(): Promise<string> {
    return 'reply';
  }

  async isAvailable(): Promise<boolean> {
    return true;
  }

  getSupportedToolProtocols(): readonly ToolProtocol[] {
    return ['embedded_json'];
  }
}

describe('IntentRecognizer', () => {
  describe('rule engine', () => {
    const recognizer = new IntentRecognizer({ engine: 'rule_based' });

    it('should produce a normalized rule-based record', async () => {
      await expect(recognizer.recognize('打开记事本')).resolves.toEqual({
        intent: 'open_application',
        entities: { application_name: 'notepad.exe' },
        originalText: '打开记事本',
        engine: 'rule_based'
      });
    });

    it('should return unknown for blank text and keep it as typed', async () => {
      await expect(recognizer.recognize('   ')).resolves.toEqual({
        intent: 'unknown',
        entities: {},
        originalText: '   ',
        engine: 'rule_based'
      });
    });

    it('should not expose an adapter', () => {
      expect(recognizer.getAdapter()).toBeUndefined();
    });
  });

  it('should fall back to rules when the LLM engine has no adapter', async () => {
    const recognizer = new IntentRecognizer({ engine: 'llm' });

    expect(recognizer.getEngine()).toBe('rule_based');
    expect(recognizer.getConfiguredEngine()).toBe('llm');
    await expect(recognizer.recognize('你好')).resolves.toMatchObject({ intent: 'greeting', engine: 'rule_based' });
  });

  describe('LLM engine', () => {
    it('should normalize the adapter answer', async () => {
      const adapter = new ScriptedAdapter(async () =>
        JSON.stringify({ intent: 'get_weather', entities: {}, tool_call: { name: 'get_weather', arguments: { city: 'Beijing' } } })
      );
      const recognizer = new IntentRecognizer({ engine: 'llm', adapter });

      const record = await recognizer.recognize('北京天气怎么样');

      expect(adapter.prompts).toEqual(['北京天气怎么样']);
      expect(record).toEqual({
        intent: 'get_weather',
        entities: { city: 'Beijing' },
        originalText: '北京天气怎么样',
        engine: 'llm',
        toolCall: { name: 'get_weather', arguments: { city: 'Beijing' } }
      });
      expect(recognizer.getAdapter()).toBe(adapter);
    });

    it('should report an adapter exception as llm_exception', async () => {
      const recognizer = new IntentRecognizer({
        engine: 'llm',
        adapter: new ScriptedAdapter(async () => {
          throw new Error('socket hang up');
        })
      });

      await expect(recognizer.recognize('hello')).resolves.toEqual({
        intent: 'unknown',
        entities: {},
        originalText: 'hello',
        engine: 'llm_exception'
      });
    });

    it('should report an empty answer as llm_error', async () => {
      const recognizer = new IntentRecognizer({ engine: 'llm', adapter: new ScriptedAdapter(async () => '') });

      await expect(recognizer.recognize('hello')).resolves.toMatchObject({ intent: 'unknown', engine: 'llm_error' });
    });

    it('should hand the registry to a tool-aware adapter', () => {
      const transport: ChatCompletionTransport = {
        complete: async () => undefined,
        probe: async () => true
      };
      const adapter = new OpenAICompatibleAdapter('openai', transport, { model: 'test-model', temperature: 0 });
      const registry = new ToolRegistry();
      registry.register('weather', new StubTool('weather', ['get_weather']));

      new IntentRecognizer({ engine: 'llm', adapter, registry });

      expect(adapter.getFunctionSchemas().map((fn) => fn.name)).toEqual(['get_weather']);
    });
  });
});
