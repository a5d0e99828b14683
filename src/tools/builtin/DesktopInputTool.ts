/**
 * @fileoverview Screen capture, mouse and keyboard input
 */

import { BaseTool } from '../BaseTool';
import { clarify, fail, ok } from '../outcome';
import { IntentSchema, ToolOutcome } from '../types';
import { DesktopController } from '../../desktop/DesktopController';
import { Entities } from '../../intent/types';
import {
  decodeCaptureScreen,
  decodeClickMouse,
  decodeHotkey,
  decodeMoveMouse,
  entityString
} from '../../intent/entities';
import logger from '../../utils/logger';

const BUTTON_NAMES = { left: '左', right: '右', middle: '中' } as const;

export class DesktopInputTool extends BaseTool {
  readonly name = 'desktop_input';
  readonly description = '截屏以及鼠标和键盘操作';

  constructor(private readonly desktop: DesktopController) {
    super();
  }

  getSupportedIntents(): readonly string[] {
    return ['capture_screen', 'move_mouse', 'click_mouse', 'type_text', 'press_key', 'hotkey'];
  }

  getKeywords(): readonly string[] {
    return ['截图', '截屏', '鼠标', '点击', '输入', '按键', '快捷键'];
  }

  getIntentSchemas(): readonly IntentSchema[] {
    const coordinate = (axis: string) => ({ type: 'integer' as const, description: `${axis} coordinate in pixels` });
    return [
      {
        intent: 'capture_screen',
        description: 'Save a screenshot',
        parameters: {
          filename: { type: 'string', description: 'File name, default screenshot.png' },
          region: { type: 'string', description: 'left,top,width,height' }
        }
      },
      {
        intent: 'move_mouse',
        description: 'Move the mouse pointer',
        parameters: {
          x: coordinate('X'),
          y: coordinate('Y'),
          duration: { type: 'number', description: 'Seconds, default 0.25' },
          relative: { type: 'boolean', description: 'Move relative to the current position' }
        },
        required: ['x', 'y']
      },
      {
        intent: 'click_mouse',
        description: 'Click at a position or at the current pointer',
        parameters: {
          x: coordinate('X'),
          y: coordinate('Y'),
          button: { type: 'string', description: 'Mouse button', enum: ['left', 'right', 'middle'] },
          clicks: { type: 'integer', description: 'Click count, default 1' }
        }
      },
      {
        intent: 'type_text',
        description: 'Type text into the focused window',
        parameters: { text: { type: 'string', description: 'Text to type' } },
        required: ['text']
      },
      {
        intent: 'press_key',
        description: 'Press a single key',
        parameters: { key_name: { type: 'string', description: 'Key name such as enter or f5' } },
        required: ['key_name']
      },
      {
        intent: 'hotkey',
        description: 'Press a key combination',
        parameters: { keys: { type: 'array', description: 'Keys in order, e.g. ["ctrl", "c"]', items: { type: 'string' } } },
        required: ['keys']
      }
    ];
  }

  protected async handle(intent: string, entities: Entities): Promise<ToolOutcome> {
    switch (intent) {
      case 'capture_screen':
        return this.captureScreen(entities);
      case 'move_mouse':
        return this.moveMouse(entities);
      case 'click_mouse':
        return this.clickMouse(entities);
      case 'type_text': {
        const text = entityString(entities, 'text');
        if (!text) {
          return clarify('text_to_type_missing', '您想输入什么文本？');
        }
        return (await this.desktop.typeText(text))
          ? ok('text_typed', `已输入文本: ${text}`)
          : fail('type_text_failed', 'type_text_failed', '输入文本失败。');
      }
      case 'press_key': {
        const key = entityString(entities, 'key_name');
        if (!key) {
          return clarify('key_name_missing', '您想按哪个键？');
        }
        return (await this.desktop.pressKey(key))
          ? ok('key_pressed', `已按下按键: ${key}`)
          : fail('press_key_failed', `press_key_failed_${key}`, `按下按键 ${key} 失败。`);
      }
      case 'hotkey':
        return this.hotkey(entities);
      default:
        return fail('unsupported_operation', `unsupported_operation: ${intent}`);
    }
  }

  private async captureScreen(entities: Entities): Promise<ToolOutcome> {
    const request = decodeCaptureScreen(entities);
    if (request.invalidRegion !== undefined) {
      logger.warn('Invalid screen capture region, capturing full screen', { region: request.invalidRegion });
    }

    const saved = await this.desktop.captureScreen(request.filename, request.region);
    if (!saved) {
      return fail('screenshot_failed', 'screenshot_failed', '屏幕截图失败。');
    }

    const notice = request.invalidRegion !== undefined
      ? `无效的区域格式: ${request.invalidRegion}。应该是 left,top,width,height。将截取全屏。`
      : '';
    return ok(`screenshot_saved: ${saved}`, `${notice}屏幕已截图并保存到 ${saved}`);
  }

  private async moveMouse(entities: Entities): Promise<ToolOutcome> {
    const decoded = decodeMoveMouse(entities);
    if (!decoded.ok) {
      return 'missing' in decoded
        ? clarify('mouse_coordinates_missing', "请告诉我鼠标要移动到哪里，例如 '移动鼠标到 100, 200'。")
        : fail('invalid_mouse_parameters', 'invalid_mouse_parameters', '鼠标坐标或持续时间格式不正确。');
    }

    const { x, y, duration, relative } = decoded.value;
    if (!(await this.desktop.moveMouse(x, y, duration, relative))) {
      return fail('mouse_move_failed', 'mouse_move_failed', '移动鼠标失败。');
    }
    return ok('mouse_moved', `鼠标已移动到 (${x}, ${y})${relative ? '相对位置' : ''}。`);
  }

  private async clickMouse(entities: Entities): Promise<ToolOutcome> {
    const decoded = decodeClickMouse(entities);
    if (!decoded.ok) {
      return fail('invalid_click_parameters', 'invalid_click_parameters', '鼠标点击参数格式不正确。');
    }

    const { position, button, clicks } = decoded.value;
    if (!(await this.desktop.clickMouse(position, button, clicks))) {
      return fail('mouse_click_failed', 'mouse_click_failed', '鼠标点击失败。');
    }
    const where = position ? `坐标 (${position.x}, ${position.y})` : '当前位置';
    return ok('mouse_clicked', `在${where}执行了${clicks}次${BUTTON_NAMES[button]}键点击。`);
  }

  private async hotkey(entities: Entities): Promise<ToolOutcome> {
    const decoded = decodeHotkey(entities);
    if (!decoded.ok) {
      if ('missing' in decoded) {
        return clarify('hotkey_keys_missing', '您想执行哪个组合键？');
      }
      return decoded.invalid === 'empty_hotkey_list'
        ? fail('empty_hotkey_list', 'empty_hotkey_list', '未指定有效的组合键。')
        : fail('invalid_hotkey_format', 'invalid_hotkey_format', '组合键格式不正确。');
    }

    const keys = decoded.value;
    if (!(await this.desktop.hotkey(keys))) {
      return fail('hotkey_failed', 'hotkey_failed', `执行组合键 ${keys.join(', ')} 失败。`);
    }
    return ok('hotkey_performed', `已执行组合键: ${keys.join(', ')}`);
  }
}
