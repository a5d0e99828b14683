/**
 * @fileoverview Window management
 *
 * Titles match by substring. Minimize and maximize fall back to the active
 * window when no title is given.
 */

import { BaseTool } from '../BaseTool';
import { clarify, fail, ok } from '../outcome';
import { IntentSchema, ToolOutcome } from '../types';
import { DesktopController } from '../../desktop/DesktopController';
import { Entities } from '../../intent/types';
import { entityString } from '../../intent/entities';

export class WindowTool extends BaseTool {
  readonly name = 'window';
  readonly description = '激活、最小化、最大化、关闭和列出窗口';

  constructor(private readonly desktop: DesktopController) {
    super();
  }

  getSupportedIntents(): readonly string[] {
    return ['activate_window', 'minimize_window', 'maximize_window', 'close_window', 'list_windows'];
  }

  getKeywords(): readonly string[] {
    return ['窗口', '切换', '最小化', '最大化', '关闭'];
  }

  getIntentSchemas(): readonly IntentSchema[] {
    const title = { type: 'string' as const, description: 'Part of the window title' };
    return [
      { intent: 'activate_window', description: 'Bring a window to the front', parameters: { window_title: title }, required: ['window_title'] },
      { intent: 'minimize_window', description: 'Minimize a window, default the active one', parameters: { window_title: title } },
      { intent: 'maximize_window', description: 'Maximize a window, default the active one', parameters: { window_title: title } },
      { intent: 'close_window', description: 'Close a window', parameters: { window_title: title }, required: ['window_title'] },
      { intent: 'list_windows', description: 'List open window titles', parameters: {} }
    ];
  }

  protected async handle(intent: string, entities: Entities): Promise<ToolOutcome> {
    const title = entityString(entities, 'window_title');
    switch (intent) {
      case 'activate_window':
        if (!title) {
          return clarify('window_title_missing', '请告诉我需要激活哪个窗口的标题。');
        }
        return (await this.desktop.activateWindow(title))
          ? ok(`window_activated: ${title}`, `窗口 '${title}' 已激活。`)
          : fail('activate_window_failed', `activate_window_failed: ${title}`, `激活窗口 '${title}' 失败。可能找不到该窗口。`);

      case 'minimize_window':
        return this.resize('minimize', title);

      case 'maximize_window':
        return this.resize('maximize', title);

      case 'close_window':
        if (!title) {
          return clarify('window_title_missing_for_close', '请告诉我需要关闭哪个窗口的标题。');
        }
        return (await this.desktop.closeWindow(title))
          ? ok(`window_closed_attempted: ${title}`, `窗口 '${title}' 已尝试关闭。`)
          : fail('close_window_failed', `close_window_failed: ${title}`, `关闭窗口 '${title}' 失败。可能找不到该窗口。`);

      case 'list_windows': {
        const windows = await this.desktop.listWindows();
        if (windows.length === 0) {
          return ok('info: no_windows_listed_or_error', '目前没有检测到打开的窗口，或者无法列出它们。');
        }
        return ok(`windows_listed: ${windows.length}`, `当前打开的窗口有：${windows.join(', ')}`);
      }

      default:
        return fail('unsupported_operation', `unsupported_operation: ${intent}`);
    }
  }

  private async resize(action: 'minimize' | 'maximize', requestedTitle: string | undefined): Promise<ToolOutcome> {
    const verb = action === 'minimize' ? '最小化' : '最大化';
    const title = requestedTitle ?? await this.desktop.getActiveWindowTitle();
    if (!title) {
      return clarify(`no_active_window_to_${action}`, `没有活动的窗口可以${verb}，或者请指定窗口标题。`);
    }

    // Without a requested title the active window itself is targeted
    const done = action === 'minimize'
      ? await this.desktop.minimizeWindow(requestedTitle)
      : await this.desktop.maximizeWindow(requestedTitle);

    return done
      ? ok(`window_${action}d: ${title}`, `窗口 '${title}' 已${verb}。`)
      : fail(`${action}_window_failed`, `${action}_window_failed: ${title}`, `${verb}窗口 '${title}' 失败。`);
  }
}
