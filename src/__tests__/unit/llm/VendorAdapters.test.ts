/**
 * Unit tests for the Anthropic, Gemini and Bedrock adapters and the factory
 */

import { AnthropicAdapter, MessageBlock, MessagesRequest, MessagesTransport } from '../../../llm/AnthropicAdapter';
import { GeminiAdapter, GeminiReply, GeminiTransport } from '../../../llm/GeminiAdapter';
import { BedrockConverseAdapter, ConverseReply, ConverseTransport } from '../../../llm/BedrockConverseAdapter';
import { LLMAdapterFactory } from '../../../llm/LLMAdapterFactory';
import { OpenAICompatibleAdapter } from '../../../llm/OpenAICompatibleAdapter';
import { DEFAULT_CONFIG, LLMConfig } from '../../../config/ConfigurationTypes';

const options = { model: 'test-model', temperature: 0 };

describe('AnthropicAdapter', () => {
  it('should read a tool_use block as a tool call', async () => {
    const transport: MessagesTransport = {
      create: async (): Promise<MessageBlock[]> => [
        { type: 'text', text: 'Let me calculate.' },
        { type: 'tool_use', name: 'calculate', input: { expression: '2*3' } }
      ]
    };
    const adapter = new AnthropicAdapter(transport, options);

    expect(JSON.parse(await adapter.getIntentAndEntities('2乘3'))).toEqual({
      intent: 'calculate',
      entities: { expression: '2*3' },
      tool_call: { name: 'calculate', arguments: { expression: '2*3' } }
    });
  });

  it('should join text blocks for a reply', async () => {
    const requests: MessagesRequest[] = [];
    const transport: MessagesTransport = {
      create: async (request) => {
        requests.push(request);
        return [{ type: 'text', text: '你好' }, { type: 'text', text: '！' }];
      }
    };

    await expect(new AnthropicAdapter(transport, options).generateResponse('hi')).resolves.toBe('你好！');
    expect(requests[0].maxTokens).toBe(1024);
  });
});

describe('GeminiAdapter', () => {
  const transport = (reply: GeminiReply, tokens = 3): GeminiTransport => ({
    generate: async () => reply,
    countTokens: async () => tokens
  });

  it('should read the first function call', async () => {
    const adapter = new GeminiAdapter(
      transport({ text: '', functionCalls: [{ name: 'get_time', args: {} }] }),
      options
    );

    expect(JSON.parse(await adapter.getIntentAndEntities('几点了'))).toEqual({
      intent: 'get_time',
      entities: {},
      tool_call: { name: 'get_time', arguments: {} }
    });
  });

  it('should be available when the token count succeeds', async () => {
    await expect(new GeminiAdapter(transport({ text: '', functionCalls: [] }), options).isAvailable()).resolves.toBe(true);
    await expect(new GeminiAdapter(transport({ text: '', functionCalls: [] }, 0), options).isAvailable()).resolves.toBe(false);
  });
});

describe('BedrockConverseAdapter', () => {
  it('should parse a text answer under the embedded protocol', async () => {
    const transport: ConverseTransport = {
      converse: async (): Promise<ConverseReply> => ({ text: '{"intent":"exit_assistant","entities":{}}' }),
      probe: async () => true
    };

    const answer = await new BedrockConverseAdapter(transport, options).getIntentAndEntities('再见');

    expect(JSON.parse(answer)).toEqual({ intent: 'exit_assistant', entities: {} });
  });
});

describe('LLMAdapterFactory', () => {
  const config = (overrides: Partial<LLMConfig>): LLMConfig => ({ ...DEFAULT_CONFIG.llm, ...overrides });

  it('should return undefined without an API type', () => {
    expect(LLMAdapterFactory.create(config({}))).toBeUndefined();
  });

  it('should return undefined when a keyed backend has no key', () => {
    expect(LLMAdapterFactory.create(config({ apiType: 'openai' }))).toBeUndefined();
  });

  it('should build the adapter for each backend', () => {
    const openai = LLMAdapterFactory.create(config({ apiType: 'tongyi', apiKey: 'test-secret' }));
    expect(openai).toBeInstanceOf(OpenAICompatibleAdapter);
    expect(openai?.backend).toBe('tongyi');

    expect(LLMAdapterFactory.create(config({ apiType: 'claude', apiKey: 'test-secret' }))?.backend).toBe('claude');
    expect(LLMAdapterFactory.create(config({ apiType: 'gemini', apiKey: 'test-secret' }))?.backend).toBe('gemini');
    expect(LLMAdapterFactory.create(config({ apiType: 'bedrock' }))?.backend).toBe('bedrock');
  });
});
