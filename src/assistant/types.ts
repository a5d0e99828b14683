/**
 * @fileoverview Speech source contract for the assistant loop
 */

/**
 * One event from the speech source: recognized text, a listening window that
 * ended without speech, or the source shutting down
 */
export type SpeechEvent =
  | { kind: 'utterance'; text: string }
  | { kind: 'silence' }
  | { kind: 'closed' };

export interface SpeechSource {
  /** Wait for the next event. After `closed` the source is not read again. */
  next(): Promise<SpeechEvent>;
  close(): void;
}
