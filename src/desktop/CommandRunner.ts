/**
 * @fileoverview Runs platform commands with a timeout
 *
 * Arguments are passed as a list and never through a shell.
 */

import { spawn } from 'child_process';
import { DesktopAutomationError } from '../errors/AssistantErrors';
import logger from '../utils/logger';

export interface CommandResult {
  exitCode: number | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
}

export interface CommandRunner {
  /**
   * Run to completion. Rejects with DesktopAutomationError when the program
   * cannot be started (ENOENT is reported through `notFound` metadata).
   */
  run(command: string, args: readonly string[], options?: { timeoutMs?: number }): Promise<CommandResult>;

  /**
   * Start a program without waiting for it to exit. Rejects when it cannot
   * be started.
   */
  launch(command: string, args: readonly string[]): Promise<void>;
}

export class SpawnCommandRunner implements CommandRunner {
  constructor(private readonly defaultTimeoutMs: number) {}

  run(command: string, args: readonly string[], options: { timeoutMs?: number } = {}): Promise<CommandResult> {
    const timeout = options.timeoutMs ?? this.defaultTimeoutMs;

    return new Promise((resolve, reject) => {
      let stdout = '';
      let stderr = '';
      let timedOut = false;

      const child = spawn(command, [...args], { stdio: ['ignore', 'pipe', 'pipe'] });

      const timeoutId = setTimeout(() => {
        timedOut = true;
        child.kill('SIGTERM');
      }, timeout);

      child.stdout?.on('data', (data: Buffer) => {
        stdout += data.toString();
      });
      child.stderr?.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      child.on('close', (code) => {
        clearTimeout(timeoutId);
        if (timedOut) {
          logger.warn('Desktop command timed out', { command, timeoutMs: timeout });
        }
        resolve({ exitCode: code, stdout, stderr, timedOut });
      });

      child.on('error', (error: NodeJS.ErrnoException) => {
        clearTimeout(timeoutId);
        reject(DesktopAutomationError.create(
          `Could not run ${command}: ${error.message}`,
          command,
          { notFound: error.code === 'ENOENT' },
          error
        ));
      });
    });
  }

  launch(command: string, args: readonly string[]): Promise<void> {
    return new Promise((resolve, reject) => {
      const child = spawn(command, [...args], { detached: true, stdio: 'ignore' });
      child.once('error', (error: NodeJS.ErrnoException) => {
        reject(DesktopAutomationError.create(
          `Could not start ${command}: ${error.message}`,
          command,
          { notFound: error.code === 'ENOENT' },
          error
        ));
      });
      child.once('spawn', () => {
        child.unref();
        resolve();
      });
    });
  }
}
