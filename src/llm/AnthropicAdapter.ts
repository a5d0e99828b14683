/**
 * @fileoverview Adapter for the Anthropic Messages API
 */

import Anthropic from '@anthropic-ai/sdk';
import { BaseLLMAdapter, AdapterOptions } from './BaseLLMAdapter';
import { ConversationTurn, FunctionSchema, IntentRequest, ModelReply, ReplyRequest, ToolProtocol } from './types';

const MAX_TOKENS = 1024;

/**
 * Loose view of a response content block; only text and tool_use blocks are read
 */
export interface MessageBlock {
  type: string;
  text?: string;
  name?: string;
  input?: unknown;
}

export interface MessagesRequest {
  model: string;
  system: string;
  turns: ConversationTurn[];
  temperature: number;
  maxTokens: number;
  functions?: FunctionSchema[];
}

export interface MessagesTransport {
  create(request: MessagesRequest): Promise<MessageBlock[]>;
}

export class AnthropicSdkTransport implements MessagesTransport {
  private readonly client: Anthropic;

  constructor(apiKey: string, timeoutMs: number) {
    this.client = new Anthropic({ apiKey, timeout: timeoutMs, maxRetries: 1 });
  }

  async create(request: MessagesRequest): Promise<MessageBlock[]> {
    const response = await this.client.messages.create({
      model: request.model,
      max_tokens: request.maxTokens,
      ...(request.system ? { system: request.system } : {}),
      temperature: request.temperature,
      messages: request.turns.map((turn) => ({ role: turn.role, content: turn.content })),
      ...(request.functions && request.functions.length > 0
        ? { tools: request.functions.map(toTool) }
        : {})
    });

    const blocks: MessageBlock[] = [];
    for (const block of response.content) {
      if (block.type === 'text') {
        blocks.push({ type: 'text', text: block.text });
      } else if (block.type === 'tool_use') {
        blocks.push({ type: 'tool_use', name: block.name, input: block.input });
      }
    }
    return blocks;
  }
}

function toTool(fn: FunctionSchema): Anthropic.Tool {
  return {
    name: fn.name,
    description: fn.description,
    input_schema: {
      type: 'object',
      properties: fn.parameters.properties,
      required: fn.parameters.required
    }
  };
}

export class AnthropicAdapter extends BaseLLMAdapter {
  readonly backend = 'claude';

  constructor(private readonly transport: MessagesTransport, options: AdapterOptions) {
    super(options);
  }

  getSupportedToolProtocols(): readonly ToolProtocol[] {
    return ['native_function_calling', 'embedded_json'];
  }

  protected async requestIntent(request: IntentRequest): Promise<ModelReply> {
    const blocks = await this.transport.create({
      model: this.options.model,
      system: request.system,
      turns: [{ role: 'user', content: request.text }],
      temperature: request.temperature,
      maxTokens: MAX_TOKENS,
      functions: request.functions
    });

    const toolUse = blocks.find((block) => block.type === 'tool_use' && typeof block.name === 'string');
    if (toolUse && toolUse.name) {
      return { toolCall: { name: toolUse.name, arguments: toolUse.input } };
    }
    return { text: joinText(blocks) };
  }

  protected async requestReply(request: ReplyRequest): Promise<string> {
    const blocks = await this.transport.create({
      model: this.options.model,
      system: request.system,
      turns: request.turns,
      temperature: request.temperature,
      maxTokens: MAX_TOKENS
    });
    return joinText(blocks);
  }

  /**
   * Smallest possible request; the Messages API has no free ping endpoint
   */
  protected async probe(): Promise<boolean> {
    await this.transport.create({
      model: this.options.model,
      system: '',
      turns: [{ role: 'user', content: 'ping' }],
      temperature: 0,
      maxTokens: 1
    });
    return true;
  }
}

function joinText(blocks: MessageBlock[]): string {
  return blocks
    .filter((block) => block.type === 'text' && typeof block.text === 'string')
    .map((block) => block.text ?? '')
    .join('');
}
