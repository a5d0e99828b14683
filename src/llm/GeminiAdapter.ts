/**
 * @fileoverview Adapter for Google's Gemini API
 */

import {
  FunctionDeclaration,
  GoogleGenerativeAI,
  Schema,
  SchemaType
} from '@google/generative-ai';
import { BaseLLMAdapter, AdapterOptions } from './BaseLLMAdapter';
import {
  ConversationTurn,
  FunctionSchema,
  IntentRequest,
  JsonSchemaProperty,
  ModelReply,
  ReplyRequest,
  ToolProtocol
} from './types';

export interface GeminiReply {
  text: string;
  functionCalls: Array<{ name: string; args: unknown }>;
}

export interface GeminiRequest {
  model: string;
  system: string;
  turns: ConversationTurn[];
  temperature: number;
  functions?: FunctionSchema[];
}

export interface GeminiTransport {
  generate(request: GeminiRequest): Promise<GeminiReply>;
  countTokens(model: string, text: string): Promise<number>;
}

export class GeminiSdkTransport implements GeminiTransport {
  private readonly client: GoogleGenerativeAI;

  constructor(apiKey: string, private readonly timeoutMs: number) {
    this.client = new GoogleGenerativeAI(apiKey);
  }

  async generate(request: GeminiRequest): Promise<GeminiReply> {
    const model = this.client.getGenerativeModel(
      {
        model: request.model,
        systemInstruction: request.system,
        generationConfig: { temperature: request.temperature },
        ...(request.functions && request.functions.length > 0
          ? { tools: [{ functionDeclarations: request.functions.map(toFunctionDeclaration) }] }
          : {})
      },
      { timeout: this.timeoutMs }
    );

    const history = request.turns.slice(0, -1).map((turn) => ({
      role: turn.role === 'user' ? 'user' : 'model',
      parts: [{ text: turn.content }]
    }));
    const last = request.turns[request.turns.length - 1];

    const result = await model.startChat({ history }).sendMessage(last ? last.content : '');
    const response = result.response;
    const functionCalls = response.functionCalls() ?? [];

    return {
      text: functionCalls.length > 0 ? '' : response.text(),
      functionCalls: functionCalls.map((call) => ({ name: call.name, args: call.args }))
    };
  }

  async countTokens(modelName: string, text: string): Promise<number> {
    const model = this.client.getGenerativeModel({ model: modelName }, { timeout: this.timeoutMs });
    const result = await model.countTokens(text);
    return result.totalTokens;
  }
}

function toSchema(property: JsonSchemaProperty): Schema {
  const description = property.description;
  switch (property.type) {
    case 'number':
      return { type: SchemaType.NUMBER, description };
    case 'integer':
      return { type: SchemaType.INTEGER, description };
    case 'boolean':
      return { type: SchemaType.BOOLEAN, description };
    case 'array':
      return {
        type: SchemaType.ARRAY,
        description,
        items: toSchema({ type: property.items?.type ?? 'string', description })
      };
    case 'object':
      return { type: SchemaType.OBJECT, description, properties: {} };
    default:
      return property.enum
        ? { type: SchemaType.STRING, format: 'enum', description, enum: property.enum }
        : { type: SchemaType.STRING, description };
  }
}

function toFunctionDeclaration(fn: FunctionSchema): FunctionDeclaration {
  const names = Object.keys(fn.parameters.properties);
  if (names.length === 0) {
    return { name: fn.name, description: fn.description };
  }

  const properties: Record<string, Schema> = {};
  for (const name of names) {
    properties[name] = toSchema(fn.parameters.properties[name]);
  }
  return {
    name: fn.name,
    description: fn.description,
    parameters: {
      type: SchemaType.OBJECT,
      properties,
      required: fn.parameters.required
    }
  };
}

export class GeminiAdapter extends BaseLLMAdapter {
  readonly backend = 'gemini';

  constructor(private readonly transport: GeminiTransport, options: AdapterOptions) {
    super(options);
  }

  getSupportedToolProtocols(): readonly ToolProtocol[] {
    return ['native_function_calling', 'embedded_json'];
  }

  protected async requestIntent(request: IntentRequest): Promise<ModelReply> {
    const reply = await this.transport.generate({
      model: this.options.model,
      system: request.system,
      turns: [{ role: 'user', content: request.text }],
      temperature: request.temperature,
      functions: request.functions
    });

    const call = reply.functionCalls[0];
    if (call) {
      return { toolCall: { name: call.name, arguments: call.args } };
    }
    return { text: reply.text };
  }

  protected async requestReply(request: ReplyRequest): Promise<string> {
    const reply = await this.transport.generate({
      model: this.options.model,
      system: request.system,
      turns: request.turns,
      temperature: request.temperature
    });
    return reply.text;
  }

  protected async probe(): Promise<boolean> {
    const tokens = await this.transport.countTokens(this.options.model, 'ping');
    return tokens > 0;
  }
}
