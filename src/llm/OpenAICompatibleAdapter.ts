/**
 * @fileoverview Adapter for chat-completion APIs (OpenAI and compatible
 * endpoints such as DashScope's compatible mode)
 */

import OpenAI from 'openai';
import { BaseLLMAdapter, AdapterOptions } from './BaseLLMAdapter';
import { ConversationTurn, FunctionSchema, IntentRequest, ModelReply, ReplyRequest, ToolProtocol } from './types';

/**
 * Message as returned by a chat-completion endpoint
 */
export interface ChatMessagePayload {
  content?: string | null;
  tool_calls?: Array<{ function?: { name: string; arguments: string } }>;
}

export interface ChatCompletionRequest {
  model: string;
  system: string;
  turns: ConversationTurn[];
  temperature: number;
  functions?: FunctionSchema[];
}

/**
 * Wire access to a chat-completion endpoint
 */
export interface ChatCompletionTransport {
  complete(request: ChatCompletionRequest): Promise<ChatMessagePayload | undefined>;
  probe(): Promise<boolean>;
}

export interface OpenAIClientSettings {
  apiKey: string;
  baseURL?: string;
  timeoutMs: number;
}

export class OpenAISdkTransport implements ChatCompletionTransport {
  private readonly client: OpenAI;

  constructor(settings: OpenAIClientSettings) {
    this.client = new OpenAI({
      apiKey: settings.apiKey,
      baseURL: settings.baseURL,
      timeout: settings.timeoutMs,
      maxRetries: 1
    });
  }

  async complete(request: ChatCompletionRequest): Promise<ChatMessagePayload | undefined> {
    const messages: OpenAI.Chat.Completions.ChatCompletionMessageParam[] = [
      { role: 'system', content: request.system },
      ...request.turns.map(toMessageParam)
    ];

    const completion = await this.client.chat.completions.create({
      model: request.model,
      messages,
      temperature: request.temperature,
      ...(request.functions && request.functions.length > 0
        ? { tools: request.functions.map(toTool), tool_choice: 'auto' as const }
        : {})
    });

    const message = completion.choices[0]?.message;
    if (!message) {
      return undefined;
    }
    return {
      content: message.content,
      tool_calls: message.tool_calls?.map((call) => ({
        function: { name: call.function.name, arguments: call.function.arguments }
      }))
    };
  }

  async probe(): Promise<boolean> {
    await this.client.models.list();
    return true;
  }
}

function toMessageParam(turn: ConversationTurn): OpenAI.Chat.Completions.ChatCompletionMessageParam {
  return turn.role === 'user'
    ? { role: 'user', content: turn.content }
    : { role: 'assistant', content: turn.content };
}

function toTool(fn: FunctionSchema): OpenAI.Chat.Completions.ChatCompletionTool {
  return {
    type: 'function',
    function: {
      name: fn.name,
      description: fn.description,
      parameters: fn.parameters
    }
  };
}

export class OpenAICompatibleAdapter extends BaseLLMAdapter {
  constructor(
    readonly backend: string,
    private readonly transport: ChatCompletionTransport,
    options: AdapterOptions
  ) {
    super(options);
  }

  getSupportedToolProtocols(): readonly ToolProtocol[] {
    return ['native_function_calling', 'embedded_json'];
  }

  protected async requestIntent(request: IntentRequest): Promise<ModelReply> {
    const message = await this.transport.complete({
      model: this.options.model,
      system: request.system,
      turns: [{ role: 'user', content: request.text }],
      temperature: request.temperature,
      functions: request.functions
    });

    // Only the first tool call is honored
    const call = message?.tool_calls?.[0]?.function;
    if (call) {
      return { toolCall: { name: call.name, arguments: call.arguments } };
    }
    return { text: message?.content ?? '' };
  }

  protected async requestReply(request: ReplyRequest): Promise<string> {
    const message = await this.transport.complete({
      model: this.options.model,
      system: request.system,
      turns: request.turns,
      temperature: request.temperature
    });
    return message?.content ?? '';
  }

  protected probe(): Promise<boolean> {
    return this.transport.probe();
  }
}
