/**
 * @fileoverview Intent Normalizer
 *
 * Reconciles rule engine matches and every LLM adapter answer into one
 * IntentRecord, so the dispatcher never needs to know where a record came
 * from. Normalizing an already-normalized record returns an equal record.
 */

import { EngineTag, Entities, IntentRecord, ToolCall, UNKNOWN_INTENT } from './types';
import { toEntities } from './entities';
import { isNonEmptyString, isObject } from '../types/TypeGuards';
import logger from '../utils/logger';

/**
 * Entity key the adapters use to carry an unparsable model answer
 */
export const RAW_RESPONSE_ENTITY = 'raw_response';

function parseErrorTag(engine: EngineTag): EngineTag {
  return engine.startsWith('llm') ? 'llm_parse_error' : 'rule_based_parse_error';
}

/**
 * Accepts both the wire spelling (`tool_call`) and the record spelling
 * (`toolCall`). A call without a non-empty name is dropped.
 */
function readToolCall(output: Record<string, unknown>): ToolCall | undefined {
  const raw = output.toolCall ?? output.tool_call;
  if (!isObject(raw) || !isNonEmptyString(raw.name)) {
    return undefined;
  }
  return {
    name: raw.name,
    arguments: isObject(raw.arguments) ? toEntities(raw.arguments) : {},
  };
}

export function normalizeIntent(output: unknown, originalText: string, engine: EngineTag): IntentRecord {
  // Rule 1: not a mapping
  if (!isObject(output)) {
    logger.debug('Engine output is not a mapping', { engine, outputType: typeof output });
    return {
      intent: UNKNOWN_INTENT,
      entities: {},
      originalText,
      engine: parseErrorTag(engine),
    };
  }

  const toolCall = readToolCall(output);
  let intent = isNonEmptyString(output.intent) ? output.intent : undefined;
  let entities: Entities | undefined = isObject(output.entities) ? toEntities(output.entities) : undefined;

  // Rule 2: tool call names the intent
  if ((intent === undefined || intent === UNKNOWN_INTENT) && toolCall) {
    intent = toolCall.name;
  }

  // Rule 3: tool call supplies the entities
  if ((entities === undefined || Object.keys(entities).length === 0) && toolCall) {
    entities = { ...toolCall.arguments };
  }

  // Rules 4 and 5
  const record: IntentRecord = {
    intent: intent ?? UNKNOWN_INTENT,
    entities: entities ?? {},
    originalText,
    engine,
  };

  if (
    engine === 'llm' &&
    record.intent === UNKNOWN_INTENT &&
    Object.prototype.hasOwnProperty.call(record.entities, RAW_RESPONSE_ENTITY)
  ) {
    record.engine = 'llm_parse_error';
  }

  if (toolCall) {
    record.toolCall = toolCall;
  }

  return record;
}

/**
 * Parse an adapter's JSON answer and normalize it. Invalid JSON is reported
 * as a parse error carrying the raw text.
 */
export function normalizeLLMAnswer(answer: string, originalText: string): IntentRecord {
  let parsed: unknown;
  try {
    parsed = JSON.parse(answer);
  } catch (error) {
    logger.warn('LLM answer is not valid JSON', {
      error: error instanceof Error ? error.message : String(error),
      answerLength: answer.length,
    });
    return {
      intent: UNKNOWN_INTENT,
      entities: { [RAW_RESPONSE_ENTITY]: answer },
      originalText,
      engine: 'llm_parse_error',
    };
  }
  return normalizeIntent(parsed, originalText, 'llm');
}
