/**
 * @fileoverview Console stand-ins for speech input and output
 *
 * Typed lines play the role of recognized utterances; an empty line counts as
 * a listening window without speech. Feedback is printed.
 */

import * as readline from 'readline';
import { SpeechEvent, SpeechSource } from './types';
import { SpeechSink } from '../dispatch/types';

export class ConsoleSpeechSource implements SpeechSource {
  private readonly rl: readline.Interface;
  private readonly buffered: SpeechEvent[] = [];
  private waiting?: (event: SpeechEvent) => void;
  private closed = false;

  constructor(input: NodeJS.ReadableStream = process.stdin, output: NodeJS.WritableStream = process.stdout) {
    this.rl = readline.createInterface({ input, output, prompt: '> ' });
    this.rl.on('line', (line) => {
      const text = line.trim();
      this.push(text === '' ? { kind: 'silence' } : { kind: 'utterance', text });
    });
    this.rl.on('close', () => {
      this.closed = true;
      this.push({ kind: 'closed' });
    });
  }

  next(): Promise<SpeechEvent> {
    const event = this.buffered.shift();
    if (event) {
      return Promise.resolve(event);
    }
    if (this.closed) {
      return Promise.resolve({ kind: 'closed' });
    }
    this.rl.prompt();
    return new Promise((resolve) => {
      this.waiting = resolve;
    });
  }

  close(): void {
    if (!this.closed) {
      this.rl.close();
    }
  }

  private push(event: SpeechEvent): void {
    const waiting = this.waiting;
    if (waiting) {
      this.waiting = undefined;
      waiting(event);
    } else {
      this.buffered.push(event);
    }
  }
}

export class ConsoleSpeechSink implements SpeechSink {
  constructor(private readonly output: NodeJS.WritableStream = process.stdout) {}

  speak(text: string): void {
    this.output.write(`助手: ${text}\n`);
  }
}
