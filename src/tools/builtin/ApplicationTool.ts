/**
 * @fileoverview Application launch and web search
 *
 * Application names arrive already normalized by the rule table
 * (记事本 → notepad.exe). The name `browser` opens a browser, optionally a
 * specific one named by `specific_browser`.
 */

import { BaseTool } from '../BaseTool';
import { clarify, fail, ok } from '../outcome';
import { IntentSchema, ToolOutcome } from '../types';
import { DesktopController } from '../../desktop/DesktopController';
import { Entities } from '../../intent/types';
import { entityString } from '../../intent/entities';
import { ApplicationLaunchError, errorMessage } from '../../errors/AssistantErrors';
import logger from '../../utils/logger';

const DEFAULT_BROWSER_HOME = 'http://google.com';

const BROWSERS: Readonly<Record<string, { executable: string; speech: string }>> = {
  chrome: { executable: 'chrome', speech: '正在打开谷歌浏览器。' },
  edge: { executable: 'msedge', speech: '正在打开 Edge 浏览器。' }
};

export interface ApplicationToolOptions {
  desktop: DesktopController;
  /** Search URL with a `{query}` placeholder */
  searchUrlTemplate: string;
}

export function displayName(applicationName: string): string {
  return applicationName.toLowerCase().endsWith('.exe') ? applicationName.slice(0, -4) : applicationName;
}

export class ApplicationTool extends BaseTool {
  readonly name = 'application';
  readonly description = '打开应用程序和网页搜索';

  private readonly desktop: DesktopController;
  private readonly searchUrlTemplate: string;

  constructor(options: ApplicationToolOptions) {
    super();
    this.desktop = options.desktop;
    this.searchUrlTemplate = options.searchUrlTemplate;
  }

  getSupportedIntents(): readonly string[] {
    return ['open_application', 'open_application_generic', 'search_web', 'search_web_generic'];
  }

  getKeywords(): readonly string[] {
    return ['打开', '启动', '运行', '搜索', '浏览器'];
  }

  getIntentSchemas(): readonly IntentSchema[] {
    return [
      {
        intent: 'open_application',
        description: 'Launch an application by executable name, or "browser"',
        parameters: {
          application_name: { type: 'string', description: 'Executable such as notepad.exe, or browser' },
          specific_browser: { type: 'string', description: 'Browser to open', enum: ['chrome', 'edge'] }
        },
        required: ['application_name']
      },
      { intent: 'open_application_generic', description: 'The user wants to open something unnamed', parameters: {} },
      {
        intent: 'search_web',
        description: 'Open a web search in the browser',
        parameters: { search_query: { type: 'string', description: 'Search keywords' } },
        required: ['search_query']
      },
      { intent: 'search_web_generic', description: 'The user wants to search without keywords', parameters: {} }
    ];
  }

  protected async handle(intent: string, entities: Entities): Promise<ToolOutcome> {
    switch (intent) {
      case 'open_application':
        return this.openApplication(entities);
      case 'open_application_generic':
        return clarify('application_name_missing', '您想打开哪个应用程序？请说出具体名称。');
      case 'search_web':
        return this.searchWeb(entities);
      case 'search_web_generic':
        return clarify('search_query_missing', '您想搜索什么内容？请说出关键词。');
      default:
        return fail('unsupported_operation', `unsupported_operation: ${intent}`);
    }
  }

  private async openApplication(entities: Entities): Promise<ToolOutcome> {
    const applicationName = entityString(entities, 'application_name');
    if (!applicationName) {
      return clarify('application_name_missing', '您想打开哪个应用程序？');
    }

    if (applicationName === 'browser') {
      return this.openBrowser(entityString(entities, 'specific_browser'));
    }

    const display = displayName(applicationName);
    try {
      await this.desktop.launchApplication(applicationName);
    } catch (error) {
      return this.launchFailure(applicationName, display, error);
    }
    return ok(`application_opened: ${applicationName}`, `正在打开 ${display}`);
  }

  private async openBrowser(specific: string | undefined): Promise<ToolOutcome> {
    const browser = specific ? BROWSERS[specific.toLowerCase()] : undefined;
    try {
      if (browser) {
        await this.desktop.launchApplication(browser.executable);
        return ok(`browser_opened: ${specific}`, browser.speech);
      }
      await this.desktop.openUrl(DEFAULT_BROWSER_HOME);
      return ok('browser_opened: default', '正在打开默认浏览器。');
    } catch (error) {
      return this.launchFailure(browser?.executable ?? 'browser', browser?.executable ?? '浏览器', error);
    }
  }

  private async searchWeb(entities: Entities): Promise<ToolOutcome> {
    const query = entityString(entities, 'search_query');
    if (!query) {
      return clarify('search_query_missing', '您想搜索什么内容？');
    }

    const url = this.searchUrlTemplate.replace('{query}', encodeURIComponent(query));
    try {
      await this.desktop.openUrl(url);
    } catch (error) {
      const message = errorMessage(error);
      logger.warn('Could not open search page', { url, error: message });
      return fail('search_failed', message, `打开搜索页面失败: ${message}`);
    }
    return ok(`Searched for: ${query}`, `正在为您搜索 ${query}`);
  }

  private launchFailure(applicationName: string, display: string, error: unknown): ToolOutcome {
    if (error instanceof ApplicationLaunchError && error.notFound) {
      return fail(
        'application_not_found',
        `application_not_found: ${applicationName}`,
        `找不到应用程序 ${display}。请确保它在您的系统路径中或提供完整路径。`
      );
    }
    const message = errorMessage(error);
    return fail('application_launch_failed', message, `打开 ${display} 时发生错误: ${message}`);
  }
}
