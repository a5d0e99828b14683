/**
 * @fileoverview Desktop automation surface used by the built-in tools
 *
 * Methods report "could not do it" with `false` or `undefined`. Only
 * `launchApplication` and `openUrl` reject, because the caller reports why a
 * launch failed.
 */

import { MouseButton, ScreenRegion } from '../intent/entities';

export interface DesktopController {
  /** Rejects with ApplicationLaunchError */
  launchApplication(name: string): Promise<void>;
  openUrl(url: string): Promise<void>;

  activateWindow(titleSubstring: string): Promise<boolean>;
  /** Without a title the active window is used */
  minimizeWindow(titleSubstring?: string): Promise<boolean>;
  maximizeWindow(titleSubstring?: string): Promise<boolean>;
  closeWindow(titleSubstring: string): Promise<boolean>;
  getActiveWindowTitle(): Promise<string | undefined>;
  listWindows(): Promise<string[]>;

  /** Path of the saved image, or undefined on failure */
  captureScreen(filename: string, region?: ScreenRegion): Promise<string | undefined>;

  moveMouse(x: number, y: number, durationSeconds: number, relative: boolean): Promise<boolean>;
  clickMouse(position: { x: number; y: number } | undefined, button: MouseButton, clicks: number): Promise<boolean>;
  typeText(text: string): Promise<boolean>;
  pressKey(keyName: string): Promise<boolean>;
  hotkey(keys: readonly string[]): Promise<boolean>;

  /** Master volume 0-100 */
  getVolume(): Promise<number | undefined>;
  setVolume(level: number): Promise<boolean>;
}
