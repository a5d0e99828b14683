/**
 * Tools module exports and the registry wiring used at startup
 */

import { ToolRegistry } from './ToolRegistry';
import { ToolHandler } from './types';
import { CalculatorTool } from './CalculatorTool';
import { UnitConversionTool } from './UnitConversionTool';
import { WeatherTool } from './WeatherTool';
import { CalendarTool, JsonCalendarStore } from './CalendarTool';
import { FileTool } from './FileTool';
import { SystemTool } from './SystemTool';
import { WebTool } from './WebTool';
import { ConversationTool } from './builtin/ConversationTool';
import { ApplicationTool } from './builtin/ApplicationTool';
import { WindowTool } from './builtin/WindowTool';
import { DesktopInputTool } from './builtin/DesktopInputTool';
import { FetchHttpClient, HttpClient } from './HttpClient';
import { AssistantConfig } from '../config/ConfigurationTypes';
import { CommandRunner, SpawnCommandRunner } from '../desktop/CommandRunner';
import { DesktopController } from '../desktop/DesktopController';
import { ShellDesktopController } from '../desktop/ShellDesktopController';
import logger from '../utils/logger';

export * from './types';
export * from './outcome';
export { BaseTool } from './BaseTool';
export { ToolRegistry } from './ToolRegistry';
export type { ToolFactory, ToolSummary, ToolStatus, ToolUsageStats } from './ToolRegistry';
export { FetchHttpClient } from './HttpClient';
export type { HttpClient, HttpResponse, HttpRequestOptions } from './HttpClient';
export {
  CalculatorTool,
  UnitConversionTool,
  WeatherTool,
  CalendarTool,
  JsonCalendarStore,
  FileTool,
  SystemTool,
  WebTool,
  ConversationTool,
  ApplicationTool,
  WindowTool,
  DesktopInputTool
};

/**
 * Collaborators shared by the tools. Anything left out is built from the
 * configuration.
 */
export interface ToolDependencies {
  desktop?: DesktopController;
  runner?: CommandRunner;
  http?: HttpClient;
  clock?: () => Date;
}

export interface ToolRegistries {
  /** Feature tools, consulted first */
  main: ToolRegistry;
  /** Conversation, application, window and desktop input handlers */
  builtin: ToolRegistry;
}

/**
 * Build both registries. Names in `tools.disabled` are registered and then
 * disabled, so they can be switched on again at run time.
 */
export function createToolRegistries(config: AssistantConfig, dependencies: ToolDependencies = {}): ToolRegistries {
  const runner = dependencies.runner ?? new SpawnCommandRunner(config.desktop.commandTimeoutMs);
  const desktop = dependencies.desktop ?? new ShellDesktopController({
    runner,
    screenshotsDir: config.desktop.screenshotsDir
  });
  const http = dependencies.http ?? new FetchHttpClient(config.tools.httpTimeoutMs);

  const mainTools = (): Array<[string, ToolHandler]> => [
    ['file', new FileTool(config.tools.workspaceDir)],
    ['system', new SystemTool({ desktop, runner })],
    ['web', new WebTool({ http, downloadDir: config.tools.downloadDir })],
    ['calculator', new CalculatorTool()],
    ['unit_conversion', new UnitConversionTool()],
    ['weather', new WeatherTool({ apiKey: config.tools.weatherApiKey, apiBase: config.tools.weatherApiBase, http })],
    ['calendar', new CalendarTool({ store: new JsonCalendarStore(config.tools.calendarFile), clock: dependencies.clock })]
  ];

  const builtinTools = (): Array<[string, ToolHandler]> => [
    ['conversation', new ConversationTool(dependencies.clock)],
    ['application', new ApplicationTool({ desktop, searchUrlTemplate: config.desktop.searchUrlTemplate })],
    ['window', new WindowTool(desktop)],
    ['desktop_input', new DesktopInputTool(desktop)]
  ];

  const registries: ToolRegistries = {
    main: new ToolRegistry({ label: 'main', factory: mainTools }),
    builtin: new ToolRegistry({ label: 'builtin', factory: builtinTools })
  };

  for (const toolName of config.tools.disabled) {
    const registry = registries.main.hasTool(toolName) ? registries.main : registries.builtin;
    if (!registry.disable(toolName)) {
      logger.warn('Disabled tool name is not registered', { toolName });
    }
  }

  return registries;
}
