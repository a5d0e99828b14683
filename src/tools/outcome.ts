/**
 * Constructors and formatting for ToolOutcome values
 */

import { ClarificationOutcome, ErrorOutcome, OkOutcome, REGISTRY_ERROR_CODES, ToolOutcome } from './types';

export function ok(detail: string, speech?: string): OkOutcome {
  return speech === undefined ? { kind: 'ok', detail } : { kind: 'ok', detail, speech };
}

export function exitOutcome(speech: string): OkOutcome {
  return { kind: 'ok', detail: 'exit', speech, exit: true };
}

export function clarify(reason: string, prompt: string): ClarificationOutcome {
  return { kind: 'clarification_needed', reason, prompt };
}

/**
 * Failure with a machine code. `message` defaults to the code.
 */
export function fail(code: string, message: string = code, speech?: string): ErrorOutcome {
  return speech === undefined
    ? { kind: 'error', code, message }
    : { kind: 'error', code, message, speech };
}

const REGISTRY_CODES: readonly string[] = REGISTRY_ERROR_CODES;

/**
 * Render the sentinel string used in logs, HTTP responses and tests:
 * `detail`, `clarification_needed: <reason>`, `<registry_code>: <message>`
 * or `error: <message>`.
 */
export function formatOutcome(outcome: ToolOutcome): string {
  switch (outcome.kind) {
    case 'ok':
      return outcome.detail;
    case 'clarification_needed':
      return `clarification_needed: ${outcome.reason}`;
    case 'error':
      return REGISTRY_CODES.includes(outcome.code)
        ? `${outcome.code}: ${outcome.message}`
        : `error: ${outcome.message}`;
  }
}

export function isUnsupported(outcome: ToolOutcome): boolean {
  return outcome.kind === 'error' && outcome.code === 'unsupported_intent';
}
