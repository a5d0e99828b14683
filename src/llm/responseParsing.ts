/**
 * @fileoverview Turning model output into the adapter's JSON answer
 *
 * Every function here returns a JSON string that parses to a mapping with
 * `intent` and `entities`. Nothing throws.
 */

import { isNonEmptyString, isObject, isString } from '../types/TypeGuards';
import logger from '../utils/logger';

export const UNKNOWN_ANSWER = JSON.stringify({ intent: 'unknown', entities: {} });

const FENCE_PATTERN = /^```(?:json)?\s*([\s\S]*?)\s*```$/i;

export function stripCodeFence(content: string): string {
  const trimmed = content.trim();
  const fenced = FENCE_PATTERN.exec(trimmed);
  return fenced ? fenced[1].trim() : trimmed;
}

export function rawResponseAnswer(content: string, reason: string): string {
  return JSON.stringify({ intent: 'unknown', entities: { raw_response: content, error: reason } });
}

/**
 * Answer for a native tool invocation: the tool name becomes the intent and
 * its arguments the entities.
 */
export function toolCallAnswer(name: string, rawArguments: unknown): string {
  const args = parseToolArguments(rawArguments);
  if (args === undefined) {
    logger.warn('Could not decode tool call arguments', { tool: name });
    return JSON.stringify({ intent: 'unknown', entities: { error: 'Failed to parse tool arguments' } });
  }
  return JSON.stringify({ intent: name, entities: args, tool_call: { name, arguments: args } });
}

/**
 * Tool arguments arrive as an object or as JSON text; an empty string means
 * no arguments
 */
export function parseToolArguments(rawArguments: unknown): Record<string, unknown> | undefined {
  if (rawArguments === undefined || rawArguments === null) {
    return {};
  }
  if (isObject(rawArguments)) {
    return rawArguments;
  }
  if (!isString(rawArguments)) {
    return undefined;
  }
  if (rawArguments.trim() === '') {
    return {};
  }
  try {
    const parsed: unknown = JSON.parse(rawArguments);
    return isObject(parsed) ? parsed : undefined;
  } catch {
    return undefined;
  }
}

/**
 * Parse a free-text reply under the embedded-JSON protocol. A reply carrying
 * only a `tool_call` gets its intent and entities from the call.
 */
export function parseEmbeddedAnswer(content: string): string {
  const body = stripCodeFence(content);

  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    logger.debug('Model reply is not JSON', { reason });
    return rawResponseAnswer(content, reason);
  }

  if (!isObject(parsed)) {
    return rawResponseAnswer(content, 'reply is not a JSON object');
  }

  const answer: Record<string, unknown> = { ...parsed };
  const toolCall = isObject(answer.tool_call) ? answer.tool_call : undefined;

  if (!isNonEmptyString(answer.intent)) {
    if (toolCall && isNonEmptyString(toolCall.name)) {
      answer.intent = toolCall.name;
      if (!isObject(answer.entities)) {
        answer.entities = isObject(toolCall.arguments) ? toolCall.arguments : {};
      }
    } else {
      return rawResponseAnswer(content, "reply is missing 'intent'");
    }
  }

  if (!isObject(answer.entities)) {
    answer.entities = {};
  }
  return JSON.stringify(answer);
}
