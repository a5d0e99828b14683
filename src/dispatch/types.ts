/**
 * @fileoverview Dispatch result and speech feedback types
 */

import { ToolOutcome } from '../tools/types';

/**
 * User-facing feedback (voiced or printed). Implementations should not throw;
 * the dispatcher logs and drops anything they do throw.
 */
export interface SpeechSink {
  speak(text: string): void | Promise<void>;
}

/**
 * Which path produced the outcome
 * - tool_call: explicit LLM tool invocation
 * - registry: owner found in the main registry
 * - builtin: conversation, application, window or desktop input handler
 * - conversation: free-text reply from the conversation fallback
 * - unhandled: nothing claimed the intent
 * - failed: the dispatcher itself caught an exception
 */
export type DispatchRoute = 'tool_call' | 'registry' | 'builtin' | 'conversation' | 'unhandled' | 'failed';

export interface DispatchResult {
  outcome: ToolOutcome;
  /** Sentinel rendering of the outcome, e.g. "clarification_needed: mouse_coordinates_missing" */
  status: string;
  route: DispatchRoute;
  /** The host loop should stop */
  exit: boolean;
  /** Text handed to the speech sink, if any */
  spoken?: string;
}
