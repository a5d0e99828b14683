/**
 * In-process stand-ins for the desktop, HTTP and speech collaborators
 */

import { DesktopController } from '../../desktop/DesktopController';
import { CommandResult, CommandRunner } from '../../desktop/CommandRunner';
import { MouseButton, ScreenRegion } from '../../intent/entities';
import { HttpClient, HttpRequestOptions, HttpResponse, buildUrl } from '../../tools/HttpClient';
import { SpeechSink } from '../../dispatch/types';
import { AssistantConfig, DEFAULT_CONFIG } from '../../config/ConfigurationTypes';
import { BaseTool } from '../../tools/BaseTool';
import { ok } from '../../tools/outcome';
import { IntentSchema, ToolOutcome } from '../../tools/types';
import { Entities } from '../../intent/types';

export class RecordingSpeechSink implements SpeechSink {
  readonly spoken: string[] = [];

  speak(text: string): void {
    this.spoken.push(text);
  }
}

/**
 * Records every call; answers come from the public fields
 */
export class FakeDesktopController implements DesktopController {
  readonly calls: Array<{ method: string; args: unknown[] }> = [];
  windows: string[] = ['Untitled - Notepad', 'Inbox - Mail'];
  activeWindow: string | undefined = 'Untitled - Notepad';
  volume: number | undefined = 40;
  succeed = true;
  launchError?: Error;

  async launchApplication(name: string): Promise<void> {
    this.record('launchApplication', name);
    if (this.launchError) {
      throw this.launchError;
    }
  }

  async openUrl(url: string): Promise<void> {
    this.record('openUrl', url);
  }

  async activateWindow(titleSubstring: string): Promise<boolean> {
    this.record('activateWindow', titleSubstring);
    return this.succeed && this.windows.some((title) => title.includes(titleSubstring));
  }

  async minimizeWindow(titleSubstring?: string): Promise<boolean> {
    this.record('minimizeWindow', titleSubstring);
    return this.succeed;
  }

  async maximizeWindow(titleSubstring?: string): Promise<boolean> {
    this.record('maximizeWindow', titleSubstring);
    return this.succeed;
  }

  async closeWindow(titleSubstring: string): Promise<boolean> {
    this.record('closeWindow', titleSubstring);
    return this.succeed;
  }

  async getActiveWindowTitle(): Promise<string | undefined> {
    this.record('getActiveWindowTitle');
    return this.activeWindow;
  }

  async listWindows(): Promise<string[]> {
    this.record('listWindows');
    return this.windows;
  }

  async captureScreen(filename: string, region?: ScreenRegion): Promise<string | undefined> {
    this.record('captureScreen', filename, region);
    return this.succeed ? `/tmp/screens/${filename}` : undefined;
  }

  async moveMouse(x: number, y: number, durationSeconds: number, relative: boolean): Promise<boolean> {
    this.record('moveMouse', x, y, durationSeconds, relative);
    return this.succeed;
  }

  async clickMouse(position: { x: number; y: number } | undefined, button: MouseButton, clicks: number): Promise<boolean> {
    this.record('clickMouse', position, button, clicks);
    return this.succeed;
  }

  async typeText(text: string): Promise<boolean> {
    this.record('typeText', text);
    return this.succeed;
  }

  async pressKey(keyName: string): Promise<boolean> {
    this.record('pressKey', keyName);
    return this.succeed;
  }

  async hotkey(keys: readonly string[]): Promise<boolean> {
    this.record('hotkey', [...keys]);
    return this.succeed;
  }

  async getVolume(): Promise<number | undefined> {
    this.record('getVolume');
    return this.volume;
  }

  async setVolume(level: number): Promise<boolean> {
    this.record('setVolume', level);
    if (this.succeed) {
      this.volume = level;
    }
    return this.succeed;
  }

  callsTo(method: string): unknown[][] {
    return this.calls.filter((call) => call.method === method).map((call) => call.args);
  }

  private record(method: string, ...args: unknown[]): void {
    this.calls.push({ method, args });
  }
}

/**
 * Replies from a queue or a per-command handler
 */
export class FakeCommandRunner implements CommandRunner {
  readonly runs: Array<{ command: string; args: string[] }> = [];
  readonly launches: Array<{ command: string; args: string[] }> = [];
  reply: (command: string, args: string[]) => Partial<CommandResult> = () => ({});
  launchFailure?: Error;

  async run(command: string, args: readonly string[]): Promise<CommandResult> {
    this.runs.push({ command, args: [...args] });
    return { exitCode: 0, stdout: '', stderr: '', timedOut: false, ...this.reply(command, [...args]) };
  }

  async launch(command: string, args: readonly string[]): Promise<void> {
    this.launches.push({ command, args: [...args] });
    if (this.launchFailure) {
      throw this.launchFailure;
    }
  }
}

export interface FakeRoute {
  status?: number;
  body?: string | Buffer | object;
  headers?: Record<string, string>;
  error?: Error;
}

/**
 * Answers by URL path (query ignored); unknown paths get 404
 */
export class FakeHttpClient implements HttpClient {
  readonly requests: Array<{ url: string; options: HttpRequestOptions }> = [];
  private readonly routes = new Map<string, FakeRoute>();

  on(pathOrUrl: string, route: FakeRoute): this {
    this.routes.set(pathOrUrl, route);
    return this;
  }

  async request(url: string, options: HttpRequestOptions = {}): Promise<HttpResponse> {
    this.requests.push({ url, options });
    const target = buildUrl(url, options.params);
    const parsed = new URL(target);
    const route = this.routes.get(`${parsed.origin}${parsed.pathname}`) ?? this.routes.get(parsed.pathname);
    if (route?.error) {
      throw route.error;
    }

    const status = route?.status ?? (route ? 200 : 404);
    const rawBody = route?.body ?? '';
    const body = Buffer.isBuffer(rawBody)
      ? rawBody
      : Buffer.from(typeof rawBody === 'string' ? rawBody : JSON.stringify(rawBody), 'utf8');

    return {
      url: target,
      status,
      ok: status >= 200 && status < 300,
      headers: route?.headers ?? {},
      body,
      elapsedMs: 1
    };
  }

  lastParams(): Record<string, string> {
    const last = this.requests[this.requests.length - 1];
    const params: Record<string, string> = {};
    if (last) {
      new URL(buildUrl(last.url, last.options.params)).searchParams.forEach((value, key) => {
        params[key] = value;
      });
    }
    return params;
  }
}

export function testConfig(overrides: Partial<AssistantConfig> = {}): AssistantConfig {
  return {
    nlp: { ...DEFAULT_CONFIG.nlp },
    llm: { ...DEFAULT_CONFIG.llm },
    tools: { ...DEFAULT_CONFIG.tools, disabled: [] },
    desktop: { ...DEFAULT_CONFIG.desktop },
    server: { ...DEFAULT_CONFIG.server },
    logging: { ...DEFAULT_CONFIG.logging },
    environment: { nodeEnv: 'test' },
    ...overrides
  };
}

type StubResponder = (intent: string, entities: Entities) => ToolOutcome | Promise<ToolOutcome>;

/**
 * Tool answering every supported intent through a callback
 */
export class StubTool extends BaseTool {
  readonly description: string;
  readonly calls: Array<{ intent: string; entities: Entities }> = [];
  private readonly intents: string[];
  private readonly schemas: IntentSchema[];

  constructor(
    readonly name: string,
    intents: string[],
    private readonly responder: StubResponder = (intent) => ok(`${intent}_done`),
    options: { description?: string; schemas?: IntentSchema[] } = {}
  ) {
    super();
    this.intents = intents;
    this.description = options.description ?? `${name} stub`;
    this.schemas = options.schemas ?? [];
  }

  getSupportedIntents(): readonly string[] {
    return this.intents;
  }

  getIntentSchemas(): readonly IntentSchema[] {
    return this.schemas;
  }

  protected async handle(intent: string, entities: Entities): Promise<ToolOutcome> {
    this.calls.push({ intent, entities });
    return this.responder(intent, entities);
  }
}
