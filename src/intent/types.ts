/**
 * @fileoverview Intent Record Types
 *
 * The canonical value exchanged between recognition (rule engine or LLM
 * adapter) and execution (dispatcher and tool registry).
 */

/**
 * Value an entity can hold. Rule extractors produce strings, booleans and
 * nulls; LLM tool arguments may carry numbers, arrays and nested maps.
 */
export type EntityValue =
  | string
  | number
  | boolean
  | null
  | EntityValue[]
  | { [key: string]: EntityValue };

/**
 * Intent-specific entity map. An absent key is distinct from a key holding
 * null or an empty string.
 */
export type Entities = { [key: string]: EntityValue };

/**
 * Provenance of an intent record. Only used for diagnostics, never routing.
 */
export type EngineTag =
  | 'rule_based'
  | 'rule_based_parse_error'
  | 'llm'
  | 'llm_error'
  | 'llm_parse_error'
  | 'llm_exception';

/**
 * Explicit tool invocation requested by an LLM
 */
export interface ToolCall {
  /** Tool (intent) name, never empty */
  name: string;

  /** Arguments supplied by the model */
  arguments: Entities;
}

/**
 * Normalized intent record
 */
export interface IntentRecord {
  /** Intent label; "unknown" is the no-match sentinel */
  intent: string;

  /** Extracted entities, possibly empty */
  entities: Entities;

  /** The utterance exactly as recognized */
  originalText: string;

  /** Which engine produced this record */
  engine: EngineTag;

  /** Present when the LLM asked for a specific tool; takes dispatch priority */
  toolCall?: ToolCall;
}

/**
 * Output of an engine before normalization: intent and entities only
 */
export interface EngineMatch {
  intent: string;
  entities: Entities;
}

export const UNKNOWN_INTENT = 'unknown';

/**
 * Engine families the recognizer stamps onto records
 */
export type EngineSource = 'rule_based' | 'llm';
