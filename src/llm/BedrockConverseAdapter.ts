/**
 * @fileoverview Adapter for Amazon Bedrock's Converse API
 *
 * Credentials come from the default AWS provider chain, so no API key is
 * needed. Requests time out through the HTTP handler.
 */

import {
  BedrockRuntimeClient,
  ContentBlock,
  ConverseCommand,
  Message,
  Tool
} from '@aws-sdk/client-bedrock-runtime';
import { NodeHttpHandler } from '@smithy/node-http-handler';
import { DocumentType } from '@smithy/types';
import { BaseLLMAdapter, AdapterOptions } from './BaseLLMAdapter';
import {
  ConversationTurn,
  FunctionSchema,
  IntentRequest,
  JsonSchemaObject,
  ModelReply,
  ReplyRequest,
  ToolProtocol
} from './types';

const MAX_TOKENS = 1024;

export interface ConverseReply {
  text?: string;
  toolUse?: { name: string; input: unknown };
}

export interface ConverseRequest {
  modelId: string;
  system: string;
  turns: ConversationTurn[];
  temperature: number;
  functions?: FunctionSchema[];
}

export interface ConverseTransport {
  converse(request: ConverseRequest): Promise<ConverseReply>;
  probe(): Promise<boolean>;
}

export class BedrockSdkTransport implements ConverseTransport {
  private readonly client: BedrockRuntimeClient;

  constructor(region: string, timeoutMs: number) {
    this.client = new BedrockRuntimeClient({
      region,
      requestHandler: new NodeHttpHandler({
        requestTimeout: timeoutMs,
        connectionTimeout: Math.min(timeoutMs, 5000)
      })
    });
  }

  async converse(request: ConverseRequest): Promise<ConverseReply> {
    const messages: Message[] = request.turns.map((turn) => ({
      role: turn.role,
      content: [{ text: turn.content }]
    }));

    const response = await this.client.send(new ConverseCommand({
      modelId: request.modelId,
      system: [{ text: request.system }],
      messages,
      inferenceConfig: { temperature: request.temperature, maxTokens: MAX_TOKENS },
      ...(request.functions && request.functions.length > 0
        ? { toolConfig: { tools: request.functions.map(toTool) } }
        : {})
    }));

    return readContent(response.output?.message?.content ?? []);
  }

  /**
   * Resolves credentials from the provider chain without calling a model
   */
  async probe(): Promise<boolean> {
    const credentials = await this.client.config.credentials();
    return credentials.accessKeyId.length > 0;
  }
}

function readContent(blocks: ContentBlock[]): ConverseReply {
  const reply: ConverseReply = {};
  const texts: string[] = [];
  for (const block of blocks) {
    if (block.toolUse && block.toolUse.name && !reply.toolUse) {
      reply.toolUse = { name: block.toolUse.name, input: block.toolUse.input };
    } else if (block.text !== undefined) {
      texts.push(block.text);
    }
  }
  if (texts.length > 0) {
    reply.text = texts.join('');
  }
  return reply;
}

function toDocument(schema: JsonSchemaObject): DocumentType {
  const properties: Record<string, DocumentType> = {};
  for (const [name, property] of Object.entries(schema.properties)) {
    const entry: Record<string, DocumentType> = {
      type: property.type,
      description: property.description
    };
    if (property.enum) {
      entry.enum = [...property.enum];
    }
    if (property.items) {
      entry.items = { type: property.items.type };
    }
    properties[name] = entry;
  }
  return { type: schema.type, properties, required: [...schema.required] };
}

function toTool(fn: FunctionSchema): Tool {
  return {
    toolSpec: {
      name: fn.name,
      description: fn.description,
      inputSchema: { json: toDocument(fn.parameters) }
    }
  };
}

export class BedrockConverseAdapter extends BaseLLMAdapter {
  readonly backend = 'bedrock';

  constructor(private readonly transport: ConverseTransport, options: AdapterOptions) {
    super(options);
  }

  getSupportedToolProtocols(): readonly ToolProtocol[] {
    return ['native_function_calling', 'embedded_json'];
  }

  protected async requestIntent(request: IntentRequest): Promise<ModelReply> {
    const reply = await this.transport.converse({
      modelId: this.options.model,
      system: request.system,
      turns: [{ role: 'user', content: request.text }],
      temperature: request.temperature,
      functions: request.functions
    });

    if (reply.toolUse) {
      return { toolCall: { name: reply.toolUse.name, arguments: reply.toolUse.input } };
    }
    return { text: reply.text ?? '' };
  }

  protected async requestReply(request: ReplyRequest): Promise<string> {
    const reply = await this.transport.converse({
      modelId: this.options.model,
      system: request.system,
      turns: request.turns,
      temperature: request.temperature
    });
    return reply.text ?? '';
  }

  protected probe(): Promise<boolean> {
    return this.transport.probe();
  }
}
