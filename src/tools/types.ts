/**
 * @fileoverview Tool handler contract and result types
 *
 * Key Concepts:
 * - ToolHandler: a named group of intents with one execute entry point
 * - ToolOutcome: tagged result of an execution (ok, clarification, error)
 * - IntentSchema: per-intent parameter description used to build LLM tool
 *   catalogs and native function-calling schemas
 */

import { Entities } from '../intent/types';

/**
 * Successful execution. `speech` is spoken by the dispatcher; when absent the
 * success is silent. `exit` asks the host loop to stop.
 */
export interface OkOutcome {
  kind: 'ok';
  detail: string;
  speech?: string;
  exit?: boolean;
}

/**
 * Valid intent with a required entity missing. Not a failure: the prompt is
 * spoken once and the user is expected to rephrase.
 */
export interface ClarificationOutcome {
  kind: 'clarification_needed';
  reason: string;
  prompt: string;
}

export interface ErrorOutcome {
  kind: 'error';
  code: string;
  message: string;
  /** User-facing message; the dispatcher falls back to a generic apology */
  speech?: string;
}

export type ToolOutcome = OkOutcome | ClarificationOutcome | ErrorOutcome;

/**
 * Error codes produced by the registry itself rather than a handler
 */
export const REGISTRY_ERROR_CODES = [
  'unsupported_intent',
  'execution_error',
  'tool_not_found',
  'tool_cannot_handle'
] as const;

export type RegistryErrorCode = typeof REGISTRY_ERROR_CODES[number];

export type ParameterType = 'string' | 'number' | 'integer' | 'boolean' | 'array' | 'object';

export interface ParameterSchema {
  type: ParameterType;
  description: string;
  enum?: readonly string[];
  /** Element type for arrays */
  items?: { type: ParameterType };
}

/**
 * Description of one intent's parameters
 *
 * Example:
 * {
 *   intent: "get_weather",
 *   description: "Current weather for a city",
 *   parameters: { city: { type: "string", description: "City name" } },
 *   required: ["city"]
 * }
 */
export interface IntentSchema {
  intent: string;
  description: string;
  parameters: Record<string, ParameterSchema>;
  required?: readonly string[];
}

/**
 * Contract every tool implements. The registry never inspects a handler
 * beyond this surface.
 */
export interface ToolHandler {
  readonly name: string;
  readonly description: string;

  getSupportedIntents(): readonly string[];

  /**
   * Handle one intent. Thrown errors are contained by the registry.
   */
  execute(intent: string, entities: Entities, originalText: string): Promise<ToolOutcome>;

  isEnabled(): boolean;
  setEnabled(enabled: boolean): void;

  /** Declared parameter schemas; intents without one get an empty parameter list */
  getIntentSchemas(): readonly IntentSchema[];

  /** Extra words used by capability search */
  getKeywords?(): readonly string[];

  /** False when the tool lacks something it needs, such as an API key */
  validateConfiguration?(): boolean;

  /** Release resources on registry shutdown */
  dispose?(): Promise<void>;
}
