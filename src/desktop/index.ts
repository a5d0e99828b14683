/**
 * @fileoverview Desktop automation exports
 */

export { DesktopController } from './DesktopController';
export { CommandRunner, CommandResult, SpawnCommandRunner } from './CommandRunner';
export { ShellDesktopController, ShellDesktopControllerOptions } from './ShellDesktopController';
