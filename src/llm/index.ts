/**
 * LLM adapter module exports
 */

export * from './types';
export { BaseLLMAdapter, AdapterOptions } from './BaseLLMAdapter';
export { OpenAICompatibleAdapter, OpenAISdkTransport, ChatCompletionTransport, ChatMessagePayload } from './OpenAICompatibleAdapter';
export { AnthropicAdapter, AnthropicSdkTransport, MessagesTransport } from './AnthropicAdapter';
export { GeminiAdapter, GeminiSdkTransport, GeminiTransport } from './GeminiAdapter';
export { BedrockConverseAdapter, BedrockSdkTransport, ConverseTransport } from './BedrockConverseAdapter';
export { LLMAdapterFactory, DEFAULT_MODELS } from './LLMAdapterFactory';
export { UNKNOWN_ANSWER, parseEmbeddedAnswer, stripCodeFence } from './responseParsing';
