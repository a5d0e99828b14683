/**
 * Unit tests for SystemTool
 */

import { SystemTool, parsePsOutput, parseTasklistOutput } from '../../../tools/SystemTool';
import { FakeCommandRunner, FakeDesktopController } from '../../utils/fakes';

const PS_OUTPUT = [
  '    PID COMMAND         %CPU %MEM',
  '3999001 systemd          0.0  0.1',
  '3999042 node server     12.5  3.2',
  '3999077 nodemon          1.0  0.5',
  ''
].join('\n');

describe('parsePsOutput', () => {
  it('should read pid, command, cpu and memory columns', () => {
    expect(parsePsOutput(PS_OUTPUT)).toEqual([
      { pid: 3999001, name: 'systemd', cpu: 0, memory: 0.1 },
      { pid: 3999042, name: 'node server', cpu: 12.5, memory: 3.2 },
      { pid: 3999077, name: 'nodemon', cpu: 1, memory: 0.5 }
    ]);
  });
});

describe('parseTasklistOutput', () => {
  it('should read name and pid from CSV rows', () => {
    const output = '"chrome.exe","1234","Console","1","120,000 K"\r\n"notepad.exe","88","Console","1","9,000 K"\r\n';

    expect(parseTasklistOutput(output)).toEqual([
      { pid: 1234, name: 'chrome.exe', cpu: 0, memory: 0 },
      { pid: 88, name: 'notepad.exe', cpu: 0, memory: 0 }
    ]);
  });
});

describe('SystemTool', () => {
  let desktop: FakeDesktopController;
  let runner: FakeCommandRunner;
  let killed: number[];
  let tool: SystemTool;

  beforeEach(() => {
    desktop = new FakeDesktopController();
    runner = new FakeCommandRunner();
    runner.reply = () => ({ stdout: PS_OUTPUT });
    killed = [];
    tool = new SystemTool({
      desktop,
      runner,
      platform: 'linux',
      cpuSampleMs: 1,
      killProcess: (pid) => {
        killed.push(pid);
      }
    });
  });

  describe('host information', () => {
    it('should summarize the host', async () => {
      await expect(tool.execute('get_system_info', {}, '')).resolves.toMatchObject({ detail: 'system_info_retrieved' });
      await expect(tool.execute('get_network_info', {}, '')).resolves.toMatchObject({ detail: 'network_info_retrieved' });
    });

    it('should report cpu and memory usage as percentages', async () => {
      const cpu = await tool.execute('get_cpu_usage', {}, '');
      const memory = await tool.execute('get_memory_usage', {}, '');

      expect(cpu.kind === 'ok' ? cpu.detail : '').toMatch(/^cpu_usage_retrieved: \d+\.\d%$/);
      expect(memory.kind === 'ok' ? memory.detail : '').toMatch(/^memory_usage_retrieved: \d+\.\d%$/);
    });

    it('should report a missing battery off Linux', async () => {
      const mac = new SystemTool({ desktop, runner, platform: 'darwin' });

      await expect(mac.execute('get_battery_info', {}, '')).resolves.toEqual({
        kind: 'ok',
        detail: 'no_battery_found',
        speech: '此设备没有电池或无法获取电池信息'
      });
    });
  });

  describe('processes', () => {
    it('should list the busiest processes first', async () => {
      await expect(tool.execute('list_processes', { limit: 1 }, '')).resolves.toEqual({
        kind: 'ok',
        detail: 'processes_listed: 1',
        speech: '进程列表 (按cpu排序，前1个):\n1. node server (PID: 3999042) - CPU: 12.5%, 内存: 3.2%'
      });
      expect(runner.runs).toEqual([{ command: 'ps', args: ['-eo', 'pid,comm,%cpu,%mem'] }]);
    });

    it('should use tasklist on Windows', async () => {
      runner.reply = () => ({ stdout: '"notepad.exe","88","Console","1","9,000 K"\r\n' });
      const windows = new SystemTool({ desktop, runner, platform: 'win32' });

      await expect(windows.execute('list_processes', {}, '')).resolves.toMatchObject({ detail: 'processes_listed: 1' });
      expect(runner.runs[0]).toEqual({ command: 'tasklist', args: ['/fo', 'csv', '/nh'] });
    });

    it('should terminate every process whose name matches', async () => {
      await expect(tool.execute('kill_process', { process_name: 'NODE' }, '')).resolves.toEqual({
        kind: 'ok',
        detail: 'process_killed: 2',
        speech: "已终止 2 个名为 'NODE' 的进程"
      });
      expect(killed).toEqual([3999042, 3999077]);
    });

    it('should terminate by pid and report a missing one', async () => {
      await expect(tool.execute('kill_process', { process_id: '3999001' }, '')).resolves.toMatchObject({
        detail: 'process_killed: 1'
      });
      expect(killed).toEqual([3999001]);

      const missing = new SystemTool({
        desktop,
        runner,
        killProcess: () => {
          throw Object.assign(new Error('kill ESRCH'), { code: 'ESRCH' });
        }
      });
      await expect(missing.execute('kill_process', { process_id: 5 }, '')).resolves.toEqual({
        kind: 'error',
        code: 'process_not_found',
        message: 'process_not_found: 5',
        speech: '进程 5 不存在'
      });
    });

    it('should ask which process to terminate', async () => {
      await expect(tool.execute('kill_process', {}, '')).resolves.toEqual({
        kind: 'clarification_needed',
        reason: 'process_identifier_missing',
        prompt: '请指定要终止的进程名称或进程ID'
      });
    });

    it('should report a name that matches nothing', async () => {
      await expect(tool.execute('kill_process', { process_name: 'ghost' }, '')).resolves.toEqual({
        kind: 'error',
        code: 'process_not_found',
        message: 'process_not_found: ghost',
        speech: "未找到名为 'ghost' 的进程"
      });
    });
  });

  describe('volume', () => {
    it('should set the volume through the desktop', async () => {
      await expect(tool.execute('set_volume', { level: '55' }, '')).resolves.toEqual({
        kind: 'ok',
        detail: 'volume_set: 55%',
        speech: '音量已设置为 55%'
      });
      expect(desktop.callsTo('setVolume')).toEqual([[55]]);
    });

    it('should validate the level before touching the desktop', async () => {
      await expect(tool.execute('set_volume', {}, '')).resolves.toMatchObject({ reason: 'volume_level_missing' });
      await expect(tool.execute('set_volume', { level: 150 }, '')).resolves.toEqual({
        kind: 'error',
        code: 'invalid_volume_range',
        message: 'invalid_volume_range',
        speech: '音量必须在0到100之间'
      });
      expect(desktop.callsTo('setVolume')).toEqual([]);
    });

    it('should report platforms without volume control', async () => {
      desktop.succeed = false;
      desktop.volume = undefined;

      await expect(tool.execute('set_volume', { level: 10 }, '')).resolves.toMatchObject({ code: 'volume_control_unavailable' });
      await expect(tool.execute('get_volume', {}, '')).resolves.toMatchObject({ code: 'platform_not_supported' });
    });

    it('should read the current volume', async () => {
      await expect(tool.execute('get_volume', {}, '')).resolves.toEqual({
        kind: 'ok',
        detail: 'current_volume: 40%',
        speech: '当前音量: 40%'
      });
    });
  });
});
