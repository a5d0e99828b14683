/**
 * @fileoverview LLM adapter contract
 *
 * Every backend variant implements LLMAdapter. None of its methods raise:
 * transport failures come back as the safe `unknown` answer, a fixed apology
 * or `false`.
 */

import type { ToolRegistry } from '../tools/ToolRegistry';

export type ToolProtocol = 'native_function_calling' | 'embedded_json';

export interface ConversationTurn {
  role: 'user' | 'assistant';
  content: string;
}

export interface LLMAdapter {
  /** Backend label used in logs and spans, e.g. "openai" */
  readonly backend: string;

  /**
   * JSON string with at least `intent` and `entities`, optionally
   * `tool_call: {name, arguments}`
   */
  getIntentAndEntities(text: string): Promise<string>;

  generateResponse(text: string, context?: readonly ConversationTurn[]): Promise<string>;

  isAvailable(): Promise<boolean>;

  getSupportedToolProtocols(): readonly ToolProtocol[];
}

/**
 * Optional capability: adapters that can describe the registry's tools to
 * their model
 */
export interface ToolAware {
  setToolRegistry(registry: ToolRegistry): void;
}

export function isToolAware(adapter: LLMAdapter): adapter is LLMAdapter & ToolAware {
  return 'setToolRegistry' in adapter && typeof adapter.setToolRegistry === 'function';
}

/**
 * Provider-neutral model answer produced by a transport
 */
export interface ModelReply {
  text?: string;
  toolCall?: {
    name: string;
    /** Parsed object, or the raw JSON text some vendors send */
    arguments: unknown;
  };
}

export type JsonSchemaProperty = {
  type: string;
  description: string;
  enum?: string[];
  items?: { type: string };
};

export type JsonSchemaObject = {
  type: 'object';
  properties: Record<string, JsonSchemaProperty>;
  required: string[];
};

/**
 * Native function-calling declaration; one per routable intent
 */
export interface FunctionSchema {
  name: string;
  description: string;
  parameters: JsonSchemaObject;
}

export interface IntentRequest {
  system: string;
  text: string;
  temperature: number;
  /** Present only when native function calling is used for this request */
  functions?: FunctionSchema[];
}

export interface ReplyRequest {
  system: string;
  turns: ConversationTurn[];
  temperature: number;
}
