/**
 * @fileoverview Chooses and builds the LLM adapter named by configuration
 */

import { LLMConfig } from '../config/ConfigurationTypes';
import logger from '../utils/logger';
import { LLMAdapter } from './types';
import { OpenAICompatibleAdapter, OpenAISdkTransport } from './OpenAICompatibleAdapter';
import { AnthropicAdapter, AnthropicSdkTransport } from './AnthropicAdapter';
import { GeminiAdapter, GeminiSdkTransport } from './GeminiAdapter';
import { BedrockConverseAdapter, BedrockSdkTransport } from './BedrockConverseAdapter';

export const DASHSCOPE_COMPATIBLE_BASE_URL = 'https://dashscope.aliyuncs.com/compatible-mode/v1';
export const OPENAI_BASE_URL = 'https://api.openai.com/v1';

export const DEFAULT_MODELS = {
  openai_compatible: 'gpt-3.5-turbo',
  openai: 'gpt-4o-mini',
  tongyi: 'qwen-turbo',
  claude: 'claude-3-haiku-20240307',
  gemini: 'gemini-1.5-flash',
  bedrock: 'anthropic.claude-3-haiku-20240307-v1:0'
} as const;

export class LLMAdapterFactory {
  /**
   * Build the configured adapter. Returns undefined (and logs why) when no
   * backend is configured or its credentials are missing.
   */
  static create(config: LLMConfig): LLMAdapter | undefined {
    const { apiType, apiKey, timeoutMs, temperature } = config;

    if (!apiType) {
      logger.warn('No LLM_API_TYPE configured, LLM adapter unavailable');
      return undefined;
    }

    if (apiType !== 'bedrock' && !apiKey) {
      logger.warn('LLM backend has no API key, LLM adapter unavailable', { apiType });
      return undefined;
    }

    const model = config.model ?? DEFAULT_MODELS[apiType];
    const options = { model, temperature };
    logger.info('Creating LLM adapter', { apiType, model });

    switch (apiType) {
      case 'openai_compatible':
      case 'openai':
        return new OpenAICompatibleAdapter(
          apiType,
          new OpenAISdkTransport({ apiKey: apiKey ?? '', baseURL: config.apiBase ?? OPENAI_BASE_URL, timeoutMs }),
          options
        );
      case 'tongyi':
        return new OpenAICompatibleAdapter(
          apiType,
          new OpenAISdkTransport({ apiKey: apiKey ?? '', baseURL: config.apiBase ?? DASHSCOPE_COMPATIBLE_BASE_URL, timeoutMs }),
          options
        );
      case 'claude':
        return new AnthropicAdapter(new AnthropicSdkTransport(apiKey ?? '', timeoutMs), options);
      case 'gemini':
        return new GeminiAdapter(new GeminiSdkTransport(apiKey ?? '', timeoutMs), options);
      case 'bedrock':
        return new BedrockConverseAdapter(new BedrockSdkTransport(config.region, timeoutMs), options);
    }
  }
}
