/**
 * @fileoverview DesktopController backed by platform command-line tools
 *
 * - Linux: xdotool, wmctrl, xdg-open, ImageMagick `import`, amixer
 * - macOS: open, osascript, screencapture, cliclick
 * - Windows: PowerShell
 */

import * as path from 'path';
import { promises as fs } from 'fs';
import { DesktopController } from './DesktopController';
import { CommandRunner, CommandResult } from './CommandRunner';
import { MouseButton, ScreenRegion } from '../intent/entities';
import { ApplicationLaunchError, DesktopAutomationError, extractErrorDetails, isAssistantError } from '../errors/AssistantErrors';
import logger from '../utils/logger';

export interface ShellDesktopControllerOptions {
  runner: CommandRunner;
  screenshotsDir: string;
  platform?: NodeJS.Platform;
}

type Platform = 'linux' | 'darwin' | 'win32';

const XDOTOOL_BUTTONS: Record<MouseButton, string> = { left: '1', middle: '2', right: '3' };

const MAC_KEY_CODES: Record<string, number> = {
  enter: 36,
  return: 36,
  tab: 48,
  space: 49,
  delete: 51,
  backspace: 51,
  esc: 53,
  escape: 53,
  left: 123,
  right: 124,
  down: 125,
  up: 126
};

const MAC_MODIFIERS: Record<string, string> = {
  ctrl: 'control down',
  control: 'control down',
  cmd: 'command down',
  command: 'command down',
  alt: 'option down',
  option: 'option down',
  shift: 'shift down'
};

const SENDKEYS_NAMES: Record<string, string> = {
  enter: '{ENTER}',
  return: '{ENTER}',
  tab: '{TAB}',
  esc: '{ESC}',
  escape: '{ESC}',
  backspace: '{BACKSPACE}',
  delete: '{DELETE}',
  space: ' ',
  up: '{UP}',
  down: '{DOWN}',
  left: '{LEFT}',
  right: '{RIGHT}'
};

const SENDKEYS_MODIFIERS: Record<string, string> = { ctrl: '^', control: '^', alt: '%', shift: '+' };

const WIN32_SHOW_WINDOW = `Add-Type -Namespace Native -Name Win -MemberDefinition '[DllImport("user32.dll")] public static extern bool ShowWindow(System.IntPtr h, int c); [DllImport("user32.dll")] public static extern System.IntPtr GetForegroundWindow();'`;

const WIN32_MOUSE = `Add-Type -Namespace Native -Name Mouse -MemberDefinition '[DllImport("user32.dll")] public static extern void mouse_event(int f, int x, int y, int d, int e);'`;

function psQuote(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

function appleQuote(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

export class ShellDesktopController implements DesktopController {
  private readonly runner: CommandRunner;
  private readonly screenshotsDir: string;
  private readonly platform: Platform;

  constructor(options: ShellDesktopControllerOptions) {
    this.runner = options.runner;
    this.screenshotsDir = options.screenshotsDir;
    const platform = options.platform ?? process.platform;
    this.platform = platform === 'darwin' || platform === 'win32' ? platform : 'linux';
  }

  async launchApplication(name: string): Promise<void> {
    try {
      switch (this.platform) {
        case 'darwin':
          await this.expectSuccess('open', ['-a', name.replace(/\.exe$/i, '')]);
          return;
        case 'win32':
          await this.expectSuccess('powershell', ['-NoProfile', '-Command', `Start-Process ${psQuote(name)}`]);
          return;
        default:
          await this.runner.launch(name.replace(/\.exe$/i, ''), []);
      }
    } catch (error) {
      const notFound = isAssistantError(error) && error.context.metadata.notFound === true;
      throw ApplicationLaunchError.create(name, notFound, error instanceof Error ? error : undefined);
    }
  }

  async openUrl(url: string): Promise<void> {
    switch (this.platform) {
      case 'darwin':
        await this.expectSuccess('open', [url]);
        return;
      case 'win32':
        await this.expectSuccess('powershell', ['-NoProfile', '-Command', `Start-Process ${psQuote(url)}`]);
        return;
      default:
        await this.runner.launch('xdg-open', [url]);
    }
  }

  activateWindow(title: string): Promise<boolean> {
    switch (this.platform) {
      case 'darwin':
        return this.succeeds('osascript', ['-e', `tell application ${appleQuote(title)} to activate`]);
      case 'win32':
        return this.powershell(`(New-Object -ComObject WScript.Shell).AppActivate(${psQuote(title)})`, 'True');
      default:
        return this.succeeds('wmctrl', ['-a', title]);
    }
  }

  minimizeWindow(title?: string): Promise<boolean> {
    switch (this.platform) {
      case 'darwin':
        return this.succeeds('osascript', ['-e', title
          ? `tell application ${appleQuote(title)} to set miniaturized of front window to true`
          : 'tell application "System Events" to keystroke "m" using command down']);
      case 'win32':
        return this.powershell(`${WIN32_SHOW_WINDOW}; ${this.windowHandleScript(title)}; [Native.Win]::ShowWindow($h, 6)`, 'True');
      default:
        return title
          ? this.succeeds('xdotool', ['search', '--name', title, 'windowminimize'])
          : this.succeeds('xdotool', ['getactivewindow', 'windowminimize']);
    }
  }

  maximizeWindow(title?: string): Promise<boolean> {
    switch (this.platform) {
      case 'darwin':
        return this.succeeds('osascript', ['-e', title
          ? `tell application ${appleQuote(title)} to set zoomed of front window to true`
          : 'tell application "System Events" to tell (first process whose frontmost is true) to set value of attribute "AXFullScreen" of front window to true']);
      case 'win32':
        return this.powershell(`${WIN32_SHOW_WINDOW}; ${this.windowHandleScript(title)}; [Native.Win]::ShowWindow($h, 3)`, 'True');
      default:
        return this.succeeds('wmctrl', ['-r', title ?? ':ACTIVE:', '-b', 'add,maximized_vert,maximized_horz']);
    }
  }

  closeWindow(title: string): Promise<boolean> {
    switch (this.platform) {
      case 'darwin':
        return this.succeeds('osascript', ['-e', `tell application ${appleQuote(title)} to close front window`]);
      case 'win32':
        return this.powershell(
          `$p = Get-Process | Where-Object { $_.MainWindowTitle -like ${psQuote(`*${title}*`)} } | Select-Object -First 1; if ($p) { $p.CloseMainWindow() } else { $false }`,
          'True'
        );
      default:
        return this.succeeds('wmctrl', ['-c', title]);
    }
  }

  async getActiveWindowTitle(): Promise<string | undefined> {
    let result: CommandResult | undefined;
    switch (this.platform) {
      case 'darwin':
        result = await this.tryRun('osascript', ['-e', 'tell application "System Events" to get name of first process whose frontmost is true']);
        break;
      case 'win32':
        result = await this.tryRun('powershell', ['-NoProfile', '-Command',
          `${WIN32_SHOW_WINDOW}; $h = [Native.Win]::GetForegroundWindow(); (Get-Process | Where-Object { $_.MainWindowHandle -eq $h }).MainWindowTitle`]);
        break;
      default:
        result = await this.tryRun('xdotool', ['getactivewindow', 'getwindowname']);
    }
    const title = result && result.exitCode === 0 ? result.stdout.trim() : '';
    return title === '' ? undefined : title;
  }

  async listWindows(): Promise<string[]> {
    let result: CommandResult | undefined;
    switch (this.platform) {
      case 'darwin':
        result = await this.tryRun('osascript', ['-e',
          'tell application "System Events" to get name of every process whose background only is false']);
        return result && result.exitCode === 0
          ? result.stdout.split(',').map((name) => name.trim()).filter((name) => name !== '')
          : [];
      case 'win32':
        result = await this.tryRun('powershell', ['-NoProfile', '-Command',
          'Get-Process | Where-Object { $_.MainWindowTitle } | ForEach-Object { $_.MainWindowTitle }']);
        return result && result.exitCode === 0 ? this.lines(result.stdout) : [];
      default:
        result = await this.tryRun('wmctrl', ['-l']);
        // Columns: id, desktop, host, title
        return result && result.exitCode === 0
          ? this.lines(result.stdout).map((line) => line.split(/\s+/).slice(3).join(' ')).filter((title) => title !== '')
          : [];
    }
  }

  async captureScreen(filename: string, region?: ScreenRegion): Promise<string | undefined> {
    const target = path.resolve(this.screenshotsDir, path.basename(filename));
    try {
      await fs.mkdir(this.screenshotsDir, { recursive: true });
    } catch (error) {
      logger.error('Could not create screenshots directory', {
        directory: this.screenshotsDir,
        error: extractErrorDetails(error).message
      });
      return undefined;
    }

    let captured: boolean;
    switch (this.platform) {
      case 'darwin':
        captured = await this.succeeds('screencapture', region
          ? ['-x', '-R', `${region.left},${region.top},${region.width},${region.height}`, target]
          : ['-x', target]);
        break;
      case 'win32': {
        const bounds = region
          ? `$x=${region.left}; $y=${region.top}; $w=${region.width}; $h=${region.height}`
          : '$b = [System.Windows.Forms.Screen]::PrimaryScreen.Bounds; $x=$b.X; $y=$b.Y; $w=$b.Width; $h=$b.Height';
        captured = await this.powershell(
          `Add-Type -AssemblyName System.Windows.Forms,System.Drawing; ${bounds}; ` +
          '$bmp = New-Object System.Drawing.Bitmap $w, $h; $g = [System.Drawing.Graphics]::FromImage($bmp); ' +
          `$g.CopyFromScreen($x, $y, 0, 0, $bmp.Size); $bmp.Save(${psQuote(target)}); 'True'`,
          'True'
        );
        break;
      }
      default:
        captured = await this.succeeds('import', region
          ? ['-window', 'root', '-crop', `${region.width}x${region.height}+${region.left}+${region.top}`, target]
          : ['-window', 'root', target]);
    }
    return captured ? target : undefined;
  }

  moveMouse(x: number, y: number, durationSeconds: number, relative: boolean): Promise<boolean> {
    switch (this.platform) {
      case 'darwin':
        return this.succeeds('cliclick', [relative ? `m:${signed(x)},${signed(y)}` : `m:${x},${y}`]);
      case 'win32': {
        const target = relative
          ? `$p = [System.Windows.Forms.Cursor]::Position; $nx = $p.X + (${x}); $ny = $p.Y + (${y})`
          : `$nx = ${x}; $ny = ${y}`;
        return this.powershell(
          `Add-Type -AssemblyName System.Windows.Forms,System.Drawing; ${target}; ` +
          "[System.Windows.Forms.Cursor]::Position = New-Object System.Drawing.Point($nx, $ny); 'True'",
          'True'
        );
      }
      default: {
        const delay = Math.max(0, Math.round(durationSeconds * 1000));
        return relative
          ? this.succeeds('xdotool', ['mousemove_relative', '--', String(x), String(y)])
          : this.succeeds('xdotool', ['mousemove', '--delay', String(delay), String(x), String(y)]);
      }
    }
  }

  clickMouse(position: { x: number; y: number } | undefined, button: MouseButton, clicks: number): Promise<boolean> {
    switch (this.platform) {
      case 'darwin': {
        const verb = button === 'right' ? 'rc' : clicks >= 2 ? 'dc' : 'c';
        const at = position ? `${position.x},${position.y}` : '.';
        return this.succeeds('cliclick', [`${verb}:${at}`]);
      }
      case 'win32': {
        const flags = { left: [0x02, 0x04], right: [0x08, 0x10], middle: [0x20, 0x40] }[button];
        const move = position
          ? `[System.Windows.Forms.Cursor]::Position = New-Object System.Drawing.Point(${position.x}, ${position.y}); `
          : '';
        return this.powershell(
          `Add-Type -AssemblyName System.Windows.Forms,System.Drawing; ${WIN32_MOUSE}; ${move}` +
          `for ($i = 0; $i -lt ${clicks}; $i++) { [Native.Mouse]::mouse_event(${flags[0]}, 0, 0, 0, 0); [Native.Mouse]::mouse_event(${flags[1]}, 0, 0, 0, 0) }; 'True'`,
          'True'
        );
      }
      default: {
        const args = position ? ['mousemove', String(position.x), String(position.y)] : [];
        args.push('click', '--repeat', String(clicks), XDOTOOL_BUTTONS[button]);
        return this.succeeds('xdotool', args);
      }
    }
  }

  typeText(text: string): Promise<boolean> {
    switch (this.platform) {
      case 'darwin':
        return this.succeeds('osascript', ['-e', `tell application "System Events" to keystroke ${appleQuote(text)}`]);
      case 'win32':
        return this.sendKeys(text.replace(/[+^%~(){}[\]]/g, '{$&}'));
      default:
        return this.succeeds('xdotool', ['type', '--', text]);
    }
  }

  pressKey(keyName: string): Promise<boolean> {
    const key = keyName.trim().toLowerCase();
    switch (this.platform) {
      case 'darwin': {
        const code = MAC_KEY_CODES[key];
        return this.succeeds('osascript', ['-e', code !== undefined
          ? `tell application "System Events" to key code ${code}`
          : `tell application "System Events" to keystroke ${appleQuote(key)}`]);
      }
      case 'win32':
        return this.sendKeys(SENDKEYS_NAMES[key] ?? key);
      default:
        return this.succeeds('xdotool', ['key', linuxKeyName(key)]);
    }
  }

  hotkey(keys: readonly string[]): Promise<boolean> {
    const normalized = keys.map((key) => key.trim().toLowerCase());
    const modifiers = normalized.slice(0, -1);
    const last = normalized[normalized.length - 1] ?? '';

    switch (this.platform) {
      case 'darwin': {
        const using = modifiers.map((modifier) => MAC_MODIFIERS[modifier]).filter((value) => value !== undefined);
        const code = MAC_KEY_CODES[last];
        const press = code !== undefined ? `key code ${code}` : `keystroke ${appleQuote(last)}`;
        const suffix = using.length > 0 ? ` using {${using.join(', ')}}` : '';
        return this.succeeds('osascript', ['-e', `tell application "System Events" to ${press}${suffix}`]);
      }
      case 'win32': {
        const prefix = modifiers.map((modifier) => SENDKEYS_MODIFIERS[modifier] ?? '').join('');
        return this.sendKeys(`${prefix}${SENDKEYS_NAMES[last] ?? last}`);
      }
      default:
        return this.succeeds('xdotool', ['key', normalized.map(linuxKeyName).join('+')]);
    }
  }

  async getVolume(): Promise<number | undefined> {
    let result: CommandResult | undefined;
    switch (this.platform) {
      case 'darwin':
        result = await this.tryRun('osascript', ['-e', 'output volume of (get volume settings)']);
        return result && result.exitCode === 0 ? parseVolume(result.stdout.trim()) : undefined;
      case 'win32':
        return undefined;
      default: {
        result = await this.tryRun('amixer', ['get', 'Master']);
        const match = result && result.exitCode === 0 ? /\[(\d+)%\]/.exec(result.stdout) : null;
        return match ? parseVolume(match[1]) : undefined;
      }
    }
  }

  setVolume(level: number): Promise<boolean> {
    const clamped = Math.max(0, Math.min(100, Math.round(level)));
    switch (this.platform) {
      case 'darwin':
        return this.succeeds('osascript', ['-e', `set volume output volume ${clamped}`]);
      case 'win32':
        return Promise.resolve(false);
      default:
        return this.succeeds('amixer', ['set', 'Master', `${clamped}%`]);
    }
  }

  private windowHandleScript(title?: string): string {
    return title
      ? `$h = (Get-Process | Where-Object { $_.MainWindowTitle -like ${psQuote(`*${title}*`)} } | Select-Object -First 1).MainWindowHandle`
      : '$h = [Native.Win]::GetForegroundWindow()';
  }

  private sendKeys(keys: string): Promise<boolean> {
    return this.powershell(
      `Add-Type -AssemblyName System.Windows.Forms; [System.Windows.Forms.SendKeys]::SendWait(${psQuote(keys)}); 'True'`,
      'True'
    );
  }

  /**
   * Runs a PowerShell script and checks the last output line
   */
  private async powershell(script: string, expected: string): Promise<boolean> {
    const result = await this.tryRun('powershell', ['-NoProfile', '-Command', script]);
    if (!result || result.exitCode !== 0) {
      return false;
    }
    const lines = this.lines(result.stdout);
    return lines[lines.length - 1] === expected;
  }

  private async succeeds(command: string, args: readonly string[]): Promise<boolean> {
    const result = await this.tryRun(command, args);
    return result !== undefined && result.exitCode === 0 && !result.timedOut;
  }

  private async expectSuccess(command: string, args: readonly string[]): Promise<void> {
    const result = await this.runner.run(command, args);
    if (result.exitCode !== 0 || result.timedOut) {
      throw DesktopAutomationError.create(
        `${command} exited with ${result.exitCode}: ${result.stderr.trim()}`,
        command,
        { notFound: /unable to find|cannot find|not found/i.test(result.stderr) }
      );
    }
  }

  private async tryRun(command: string, args: readonly string[]): Promise<CommandResult | undefined> {
    try {
      const result = await this.runner.run(command, args);
      if (result.exitCode !== 0) {
        logger.debug('Desktop command failed', { command, exitCode: result.exitCode, stderr: result.stderr.trim() });
      }
      return result;
    } catch (error) {
      logger.warn('Desktop command unavailable', { command, error: extractErrorDetails(error).message });
      return undefined;
    }
  }

  private lines(output: string): string[] {
    return output.split(/\r?\n/).map((line) => line.trim()).filter((line) => line !== '');
  }
}

function signed(value: number): string {
  return value >= 0 ? `+${value}` : String(value);
}

function linuxKeyName(key: string): string {
  switch (key) {
    case 'enter':
    case 'return':
      return 'Return';
    case 'esc':
    case 'escape':
      return 'Escape';
    case 'backspace':
      return 'BackSpace';
    case 'delete':
      return 'Delete';
    case 'tab':
      return 'Tab';
    case 'space':
      return 'space';
    case 'up':
      return 'Up';
    case 'down':
      return 'Down';
    case 'left':
      return 'Left';
    case 'right':
      return 'Right';
    default:
      return key;
  }
}

function parseVolume(value: string): number | undefined {
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? undefined : parsed;
}
