/**
 * Utterance to spoken feedback through the fully wired assistant, with the
 * desktop, HTTP and LLM transport replaced by in-process stand-ins
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { buildAssistant } from '../../bootstrap';
import { AssistantConfig, DEFAULT_CONFIG } from '../../config/ConfigurationTypes';
import {
  ChatCompletionRequest,
  ChatCompletionTransport,
  ChatMessagePayload,
  OpenAICompatibleAdapter
} from '../../llm/OpenAICompatibleAdapter';
import {
  FakeCommandRunner,
  FakeDesktopController,
  FakeHttpClient,
  RecordingSpeechSink,
  testConfig
} from '../utils/fakes';

class ToolCallingTransport implements ChatCompletionTransport {
  readonly requests: ChatCompletionRequest[] = [];

  async complete(request: ChatCompletionRequest): Promise<ChatMessagePayload | undefined> {
    this.requests.push(request);
    return {
      content: null,
      tool_calls: [{ function: { name: 'get_weather', arguments: '{"city":"Beijing"}' } }]
    };
  }

  async probe(): Promise<boolean> {
    return true;
  }
}

describe('assistant end to end', () => {
  let workDir: string;
  let desktop: FakeDesktopController;
  let http: FakeHttpClient;
  let speech: RecordingSpeechSink;

  beforeEach(() => {
    workDir = fs.mkdtempSync(path.join(os.tmpdir(), 'assistant-e2e-'));
    desktop = new FakeDesktopController();
    http = new FakeHttpClient().on('/data/2.5/weather', {
      body: {
        weather: [{ description: '多云' }],
        main: { temp: 18, feels_like: 17, humidity: 60, pressure: 1008 },
        wind: { speed: 2 },
        visibility: 8000
      }
    });
    speech = new RecordingSpeechSink();
  });

  afterEach(() => {
    fs.rmSync(workDir, { recursive: true, force: true });
  });

  function config(overrides: Partial<AssistantConfig> = {}): AssistantConfig {
    return testConfig({
      tools: {
        ...DEFAULT_CONFIG.tools,
        disabled: [],
        weatherApiKey: 'test-secret',
        weatherApiBase: 'http://weather.test/',
        calendarFile: path.join(workDir, 'calendar.json'),
        workspaceDir: workDir,
        downloadDir: path.join(workDir, 'downloads')
      },
      ...overrides
    });
  }

  function build(assistantConfig: AssistantConfig, adapter?: OpenAICompatibleAdapter) {
    return buildAssistant(assistantConfig, {
      speech,
      tools: { desktop, runner: new FakeCommandRunner(), http },
      adapter
    });
  }

  it('should open notepad from a rule match', async () => {
    const { loop } = build(config());

    const result = await loop.submit('打开记事本');

    expect(result.status).toBe('application_opened: notepad.exe');
    expect(result.route).toBe('builtin');
    expect(desktop.callsTo('launchApplication')).toEqual([['notepad.exe']]);
    expect(speech.spoken).toEqual(['正在打开 notepad']);
  });

  it('should evaluate a calculation', async () => {
    const { loop } = build(config());

    const result = await loop.submit('计算 2 + 3 * 4');

    expect(result.status).toBe('calculation_result: 14');
    expect(result.route).toBe('registry');
    expect(speech.spoken).toEqual(['计算结果: 2 + 3 * 4 = 14']);
  });

  it('should follow an LLM tool call to the weather tool', async () => {
    const transport = new ToolCallingTransport();
    const adapter = new OpenAICompatibleAdapter('openai', transport, { model: 'test-model', temperature: 0.1 });
    const { loop } = build(config({ nlp: { engine: 'llm' } }), adapter);

    const result = await loop.submit('北京今天天气怎么样');

    expect(result.status).toBe('weather_retrieved: Beijing');
    expect(result.route).toBe('tool_call');
    expect(transport.requests).toHaveLength(1);
    expect(http.lastParams()).toEqual({ q: 'Beijing', units: 'metric', lang: 'zh_cn', appid: 'test-secret' });
    expect(speech.spoken).toHaveLength(1);
    expect(speech.spoken[0].split('\n')[0]).toBe('Beijing当前天气:');
  });

  it('should ask for mouse coordinates without touching the desktop', async () => {
    const { dispatcher } = build(config());

    const result = await dispatcher.dispatch({
      intent: 'move_mouse',
      entities: {},
      originalText: '移动鼠标',
      engine: 'rule_based'
    });

    expect(result.status).toBe('clarification_needed: mouse_coordinates_missing');
    expect(speech.spoken).toEqual(["请告诉我鼠标要移动到哪里，例如 '移动鼠标到 100, 200'。"]);
    expect(desktop.calls).toEqual([]);
  });

  it('should treat a configured-off tool as unhandled until it is enabled', async () => {
    const assistantConfig = config();
    assistantConfig.tools.disabled = ['calculator'];
    const { loop, registries } = build(assistantConfig);

    const off = await loop.submit('计算 1 + 1');
    registries.main.enable('calculator');
    const on = await loop.submit('计算 1 + 1');

    expect(off.status).toBe('unhandled_intent: calculate');
    expect(on.status).toBe('calculation_result: 2');
  });
});
