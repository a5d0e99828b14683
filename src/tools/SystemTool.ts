/**
 * @fileoverview System Tool
 *
 * Host information from the `os` module, process management through platform
 * commands, battery state from sysfs and volume through the DesktopController.
 */

import * as os from 'os';
import { promises as fs } from 'fs';
import { BaseTool } from './BaseTool';
import { clarify, fail, ok } from './outcome';
import { IntentSchema, ToolOutcome } from './types';
import { CommandRunner } from '../desktop/CommandRunner';
import { DesktopController } from '../desktop/DesktopController';
import { Entities } from '../intent/types';
import { entityString } from '../intent/entities';
import { isNodeSystemError, toInteger } from '../types/TypeGuards';
import { errorMessage } from '../errors/AssistantErrors';
import logger from '../utils/logger';

const GB = 1024 ** 3;
const BATTERY_ROOT = '/sys/class/power_supply';

export interface ProcessInfo {
  pid: number;
  name: string;
  cpu: number;
  memory: number;
}

export interface SystemToolOptions {
  desktop: DesktopController;
  runner: CommandRunner;
  platform?: NodeJS.Platform;
  /** Interval between the two CPU samples */
  cpuSampleMs?: number;
  /** Sends SIGTERM; defaults to process.kill */
  killProcess?: (pid: number) => void;
}

function wholeGb(bytes: number): number {
  return Math.floor(bytes / GB);
}

function cpuTimes(): { idle: number; total: number }[] {
  return os.cpus().map((cpu) => {
    const { user, nice, sys, idle, irq } = cpu.times;
    return { idle, total: user + nice + sys + idle + irq };
  });
}

/**
 * Parse `ps -eo pid,comm,%cpu,%mem` output (header line first)
 */
export function parsePsOutput(output: string): ProcessInfo[] {
  const processes: ProcessInfo[] = [];
  for (const line of output.split(/\r?\n/).slice(1)) {
    const match = /^\s*(\d+)\s+(.+?)\s+([\d.]+)\s+([\d.]+)\s*$/.exec(line);
    if (match) {
      processes.push({ pid: Number(match[1]), name: match[2], cpu: Number(match[3]), memory: Number(match[4]) });
    }
  }
  return processes;
}

/**
 * Parse `tasklist /fo csv /nh` output: "name","pid","session","#","mem K"
 */
export function parseTasklistOutput(output: string): ProcessInfo[] {
  const processes: ProcessInfo[] = [];
  for (const line of output.split(/\r?\n/)) {
    const fields = [...line.matchAll(/"([^"]*)"/g)].map((match) => match[1]);
    const pid = toInteger(fields[1]);
    if (fields.length >= 2 && pid !== undefined) {
      processes.push({ pid, name: fields[0], cpu: 0, memory: 0 });
    }
  }
  return processes;
}

export class SystemTool extends BaseTool {
  readonly name = 'system';
  readonly description = '提供系统信息查询、进程管理、音量控制等功能';

  private readonly desktop: DesktopController;
  private readonly runner: CommandRunner;
  private readonly platform: NodeJS.Platform;
  private readonly cpuSampleMs: number;
  private readonly killProcess: (pid: number) => void;

  constructor(options: SystemToolOptions) {
    super();
    this.desktop = options.desktop;
    this.runner = options.runner;
    this.platform = options.platform ?? process.platform;
    this.cpuSampleMs = options.cpuSampleMs ?? 500;
    this.killProcess = options.killProcess ?? ((pid) => {
      process.kill(pid, 'SIGTERM');
    });
  }

  getSupportedIntents(): readonly string[] {
    return [
      'get_system_info',
      'get_cpu_usage',
      'get_memory_usage',
      'get_disk_usage',
      'get_network_info',
      'list_processes',
      'kill_process',
      'get_battery_info',
      'set_volume',
      'get_volume'
    ];
  }

  getKeywords(): readonly string[] {
    return ['系统', '电脑', 'CPU', '内存', '磁盘', '进程', '网络', '电池', '音量'];
  }

  getIntentSchemas(): readonly IntentSchema[] {
    return [
      { intent: 'get_system_info', description: 'Operating system, CPU and memory summary', parameters: {} },
      { intent: 'get_cpu_usage', description: 'Current CPU usage', parameters: {} },
      { intent: 'get_memory_usage', description: 'Memory usage', parameters: {} },
      {
        intent: 'get_disk_usage',
        description: 'Disk usage of a mount point',
        parameters: { path: { type: 'string', description: 'Mount point, default / (C:\\ on Windows)' } }
      },
      { intent: 'get_network_info', description: 'IPv4 address of each network interface', parameters: {} },
      {
        intent: 'list_processes',
        description: 'Top processes',
        parameters: {
          limit: { type: 'integer', description: 'How many, default 10' },
          sort_by: { type: 'string', description: 'Sort key', enum: ['cpu', 'memory', 'name'] }
        }
      },
      {
        intent: 'kill_process',
        description: 'Terminate a process by name or PID',
        parameters: {
          process_name: { type: 'string', description: 'Part of the process name' },
          process_id: { type: 'integer', description: 'Process id' }
        }
      },
      { intent: 'get_battery_info', description: 'Battery charge and power state', parameters: {} },
      {
        intent: 'set_volume',
        description: 'Set the master volume',
        parameters: { level: { type: 'integer', description: 'Volume 0-100' } },
        required: ['level']
      },
      { intent: 'get_volume', description: 'Current master volume', parameters: {} }
    ];
  }

  protected async handle(intent: string, entities: Entities): Promise<ToolOutcome> {
    switch (intent) {
      case 'get_system_info':
        return this.getSystemInfo();
      case 'get_cpu_usage':
        return this.getCpuUsage();
      case 'get_memory_usage':
        return this.getMemoryUsage();
      case 'get_disk_usage':
        return this.getDiskUsage(entities);
      case 'get_network_info':
        return this.getNetworkInfo();
      case 'list_processes':
        return this.listProcesses(entities);
      case 'kill_process':
        return this.killProcesses(entities);
      case 'get_battery_info':
        return this.getBatteryInfo();
      case 'set_volume':
        return this.setVolume(entities);
      case 'get_volume':
        return this.getVolume();
      default:
        return fail('unsupported_operation', `unsupported_operation: ${intent}`);
    }
  }

  private getSystemInfo(): ToolOutcome {
    const cpus = os.cpus();
    const lines = [
      '系统信息:',
      `操作系统: ${os.type()} ${os.release()}`,
      `处理器: ${cpus[0]?.model ?? '未知'}`,
      `架构: ${os.arch()}`,
      `计算机名: ${os.hostname()}`,
      `Node.js版本: ${process.versions.node}`,
      `CPU核心数: ${cpus.length} 逻辑核心`,
      `总内存: ${wholeGb(os.totalmem())} GB`
    ];
    return ok('system_info_retrieved', lines.join('\n'));
  }

  private async getCpuUsage(): Promise<ToolOutcome> {
    const before = cpuTimes();
    await new Promise<void>((resolve) => setTimeout(resolve, this.cpuSampleMs));
    const after = cpuTimes();

    const perCore = after.map((sample, index) => {
      const previous = before[index] ?? { idle: 0, total: 0 };
      const total = sample.total - previous.total;
      const idle = sample.idle - previous.idle;
      return total > 0 ? ((total - idle) / total) * 100 : 0;
    });
    const overall = perCore.length > 0 ? perCore.reduce((sum, value) => sum + value, 0) / perCore.length : 0;
    const percent = overall.toFixed(1);

    const lines = [
      `CPU使用率: ${percent}%`,
      `各核心使用率: ${perCore.map((value, index) => `${index + 1}核:${value.toFixed(1)}%`).join(', ')}`
    ];
    const speed = os.cpus()[0]?.speed;
    if (speed) {
      lines.push(`CPU频率: ${speed.toFixed(2)} MHz`);
    }
    return ok(`cpu_usage_retrieved: ${percent}%`, lines.join('\n'));
  }

  private getMemoryUsage(): ToolOutcome {
    const total = os.totalmem();
    const free = os.freemem();
    const used = total - free;
    const percent = total > 0 ? ((used / total) * 100).toFixed(1) : '0.0';
    const lines = [
      '内存使用情况:',
      `总内存: ${wholeGb(total)} GB`,
      `已使用: ${wholeGb(used)} GB (${percent}%)`,
      `可用: ${wholeGb(free)} GB`
    ];
    return ok(`memory_usage_retrieved: ${percent}%`, lines.join('\n'));
  }

  private async getDiskUsage(entities: Entities): Promise<ToolOutcome> {
    const target = entityString(entities, 'path') ?? (this.platform === 'win32' ? 'C:\\' : '/');
    try {
      const stats = await fs.statfs(target);
      const total = stats.blocks * stats.bsize;
      const free = stats.bavail * stats.bsize;
      const used = total - stats.bfree * stats.bsize;
      const percent = total > 0 ? ((used / total) * 100).toFixed(1) : '0.0';
      const lines = [
        `磁盘使用情况 (${target}):`,
        `总容量: ${wholeGb(total)} GB`,
        `已使用: ${wholeGb(used)} GB`,
        `可用: ${wholeGb(free)} GB`,
        `使用率: ${percent}%`
      ];
      return ok(`disk_usage_retrieved: ${target}`, lines.join('\n'));
    } catch (error) {
      const message = errorMessage(error);
      return fail('disk_usage_failed', message, `获取磁盘使用情况失败: ${message}`);
    }
  }

  private getNetworkInfo(): ToolOutcome {
    const lines = ['网络信息:'];
    for (const [name, addresses] of Object.entries(os.networkInterfaces())) {
      const ipv4 = (addresses ?? []).find((address) => address.family === 'IPv4');
      if (ipv4) {
        lines.push(`${name}: ${ipv4.address}`);
      }
    }
    return ok('network_info_retrieved', lines.join('\n'));
  }

  private async readProcesses(): Promise<ProcessInfo[]> {
    if (this.platform === 'win32') {
      const result = await this.runner.run('tasklist', ['/fo', 'csv', '/nh']);
      return parseTasklistOutput(result.stdout);
    }
    const result = await this.runner.run('ps', ['-eo', 'pid,comm,%cpu,%mem']);
    return parsePsOutput(result.stdout);
  }

  private async listProcesses(entities: Entities): Promise<ToolOutcome> {
    const limit = Math.max(1, toInteger(entities.limit) ?? 10);
    const sortBy = entityString(entities, 'sort_by') ?? 'cpu';

    let processes: ProcessInfo[];
    try {
      processes = await this.readProcesses();
    } catch (error) {
      const message = errorMessage(error);
      return fail('process_list_failed', message, `列出进程失败: ${message}`);
    }

    if (sortBy === 'memory') {
      processes.sort((a, b) => b.memory - a.memory);
    } else if (sortBy === 'name') {
      processes.sort((a, b) => a.name.localeCompare(b.name));
    } else {
      processes.sort((a, b) => b.cpu - a.cpu);
    }

    const shown = processes.slice(0, limit);
    const lines = [`进程列表 (按${sortBy}排序，前${limit}个):`];
    shown.forEach((info, index) => {
      lines.push(`${index + 1}. ${info.name} (PID: ${info.pid}) - CPU: ${info.cpu.toFixed(1)}%, 内存: ${info.memory.toFixed(1)}%`);
    });
    return ok(`processes_listed: ${shown.length}`, lines.join('\n'));
  }

  private async killProcesses(entities: Entities): Promise<ToolOutcome> {
    const processName = entityString(entities, 'process_name');
    const processId = toInteger(entities.process_id);
    if (!processName && processId === undefined) {
      return clarify('process_identifier_missing', '请指定要终止的进程名称或进程ID');
    }

    if (processId !== undefined) {
      try {
        this.killProcess(processId);
      } catch (error) {
        if (isNodeSystemError(error) && error.code === 'ESRCH') {
          return fail('process_not_found', `process_not_found: ${processId}`, `进程 ${processId} 不存在`);
        }
        const message = errorMessage(error);
        return fail('kill_process_failed', message, `终止进程失败: ${message}`);
      }
      return ok('process_killed: 1', `进程 ${processId} 已终止`);
    }

    const name = processName ?? '';
    let processes: ProcessInfo[];
    try {
      processes = await this.readProcesses();
    } catch (error) {
      const message = errorMessage(error);
      return fail('kill_process_failed', message, `终止进程失败: ${message}`);
    }

    let killed = 0;
    for (const info of processes) {
      if (info.pid === process.pid || !info.name.toLowerCase().includes(name.toLowerCase())) {
        continue;
      }
      try {
        this.killProcess(info.pid);
        killed++;
      } catch (error) {
        logger.debug('Could not terminate process', { pid: info.pid, error: errorMessage(error) });
      }
    }

    if (killed === 0) {
      return fail('process_not_found', `process_not_found: ${name}`, `未找到名为 '${name}' 的进程`);
    }
    return ok(`process_killed: ${killed}`, `已终止 ${killed} 个名为 '${name}' 的进程`);
  }

  private async getBatteryInfo(): Promise<ToolOutcome> {
    const noBattery = ok('no_battery_found', '此设备没有电池或无法获取电池信息');
    if (this.platform !== 'linux') {
      return noBattery;
    }

    try {
      const supplies = await fs.readdir(BATTERY_ROOT);
      const battery = supplies.find((name) => name.startsWith('BAT'));
      if (!battery) {
        return noBattery;
      }
      const capacity = (await fs.readFile(`${BATTERY_ROOT}/${battery}/capacity`, 'utf8')).trim();
      const status = (await fs.readFile(`${BATTERY_ROOT}/${battery}/status`, 'utf8')).trim();
      const plugged = status === 'Charging' || status === 'Full' || status === 'Not charging';
      const lines = ['电池信息:', `电量: ${capacity}%`, `电源连接: ${plugged ? '是' : '否'}`];
      return ok(`battery_info_retrieved: ${capacity}%`, lines.join('\n'));
    } catch (error) {
      logger.debug('Battery information unavailable', { error: errorMessage(error) });
      return noBattery;
    }
  }

  private async setVolume(entities: Entities): Promise<ToolOutcome> {
    if (entities.level === undefined || entities.level === null || entities.level === '') {
      return clarify('volume_level_missing', '请告诉我要把音量设置为多少');
    }
    const level = toInteger(entities.level);
    if (level === undefined || level < 0 || level > 100) {
      return fail('invalid_volume_range', 'invalid_volume_range', '音量必须在0到100之间');
    }

    if (!(await this.desktop.setVolume(level))) {
      return fail('volume_control_unavailable', 'volume_control_unavailable', '此平台暂不支持音量控制');
    }
    return ok(`volume_set: ${level}%`, `音量已设置为 ${level}%`);
  }

  private async getVolume(): Promise<ToolOutcome> {
    const volume = await this.desktop.getVolume();
    if (volume === undefined) {
      return fail('platform_not_supported', 'platform_not_supported', '此平台暂不支持音量查询');
    }
    return ok(`current_volume: ${volume}%`, `当前音量: ${volume}%`);
  }
}
