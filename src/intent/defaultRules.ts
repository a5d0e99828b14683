/**
 * @fileoverview Default rule table for the Chinese voice command set
 *
 * Order matters: the engine stops at the first matching rule, so broad rules
 * placed early shadow narrower ones placed later.
 */

import { PatternRule } from './RuleEngine';

/**
 * Spoken application names mapped to launchable executables
 */
export const APPLICATION_NAME_MAPPINGS: Readonly<Record<string, string>> = {
  '记事本': 'notepad.exe',
  notepad: 'notepad.exe',
  '计算器': 'calc.exe',
  calculator: 'calc.exe',
  '浏览器': 'browser',
  chrome: 'chrome',
  edge: 'msedge',
  '火狐': 'firefox',
  word: 'winword.exe',
  excel: 'excel.exe',
};

export function normalizeApplicationName(spokenName: string): string {
  const key = spokenName.trim().toLowerCase();
  return APPLICATION_NAME_MAPPINGS[key] ?? key;
}

export const DEFAULT_RULES: readonly PatternRule[] = [
  { intent: 'exit_assistant', pattern: /^(再见|拜拜|退出|关闭助手|别说了)$/iu },
  { intent: 'greeting', pattern: /^(你好|哈喽|嗨|在吗|你好呀)$/iu },
  { intent: 'get_time', pattern: /(现在几点|当前时间|几点钟了|报时)/iu },

  // Applications and web search
  {
    intent: 'open_application',
    pattern: /(打开|启动|运行|开一下|帮我打开)(?:一个)?(?:叫做)?\s*([\p{L}\p{N}_\s]+?)(?:程序|应用|软件)?(?:吧|呀|行吗)?$/iu,
    entities: { application_name: [2, normalizeApplicationName] },
  },
  {
    intent: 'open_application',
    pattern: /(打开|启动|运行|开一下|帮我打开)\s*([\p{L}\p{N}_\s]+?)(?:吧|呀|行吗)?$/iu,
    entities: { application_name: [2, normalizeApplicationName] },
  },
  {
    intent: 'search_web',
    pattern: /(搜索|查找|查一下|搜一下)(?:关于)?\s*(.+?)(?:的信息|内容)?(?:吧|呀|行吗)?$/iu,
    entities: { search_query: 2 },
  },
  { intent: 'search_web_generic', pattern: /^(搜索|查找|查一下|搜一下)$/iu },

  // Window management
  {
    intent: 'activate_window',
    pattern: /(激活|切换到|打开|显示)(?:名为|标题为|叫做)?\s*["']?(.+?)["']?(?:的)?(?:窗口)?/iu,
    entities: { window_title: 2 },
  },
  {
    intent: 'minimize_window',
    pattern: /(最小化)(?:名为|标题为|叫做)?\s*["']?(.+?)["']?(?:的)?(?:窗口)?/iu,
    entities: { window_title: 2 },
  },
  { intent: 'minimize_window', pattern: /(最小化当前窗口|最小化活动窗口|最小化这个窗口|最小化窗口)/iu },
  {
    intent: 'maximize_window',
    pattern: /(最大化)(?:名为|标题为|叫做)?\s*["']?(.+?)["']?(?:的)?(?:窗口)?/iu,
    entities: { window_title: 2 },
  },
  { intent: 'maximize_window', pattern: /(最大化当前窗口|最大化活动窗口|最大化这个窗口|最大化窗口)/iu },
  {
    intent: 'close_window',
    pattern: /(关闭)(?:名为|标题为|叫做)?\s*["']?(.+?)["']?(?:的)?(?:窗口)?/iu,
    entities: { window_title: 2 },
  },
  { intent: 'list_windows', pattern: /(列出所有窗口|显示所有窗口|有哪些窗口|打开了哪些窗口)/iu },

  // Desktop input
  {
    intent: 'capture_screen',
    pattern: /(截屏|截图|屏幕截图|截个图)(?:并保存为)?\s*([\p{L}\p{N}_.-]+)?(?:到)?\s*([\d,]+)?/iu,
    entities: { filename: 2, region: 3 },
  },
  { intent: 'capture_screen', pattern: /(截屏|截图|屏幕截图|截个图)/iu },
  {
    intent: 'move_mouse',
    pattern: /(移动鼠标|鼠标移动|鼠标移到|把鼠标放到)(?:到)?\s*([-\d]+)\s*[,，]\s*([-\d]+)(?:相对位置)?(?:持续时间)?\s*([\d.]+)?s?/iu,
    entities: { x: 2, y: 3, duration: 4, relative: (match) => match[0].includes('相对位置') },
  },
  {
    intent: 'move_mouse',
    pattern: /(鼠标相对移动|相对移动鼠标)(?:到)?\s*([-\d]+)\s*[,，]\s*([-\d]+)(?:持续时间)?\s*([\d.]+)?s?/iu,
    entities: { x: 2, y: 3, duration: 4, relative: () => true },
  },
  {
    intent: 'click_mouse',
    pattern: /(点击鼠标|鼠标点击|单击)(?:在)?\s*([-\d]+)\s*[,，]\s*([-\d]+)?(?:用)?(左键|右键|中键)?(?:(\d+)次)?/iu,
    entities: { x: 2, y: 3, button: 4, clicks: 5 },
  },
  {
    intent: 'click_mouse',
    pattern: /(点击鼠标|鼠标点击|单击)(?:用)?(左键|右键|中键)?(?:(\d+)次)?/iu,
    entities: { button: 2, clicks: 3 },
  },
  { intent: 'type_text', pattern: /(输入文本|打字|输入)\s*(.+)/iu, entities: { text: 2 } },
  { intent: 'press_key', pattern: /(按下|按一下|按)\s*([\p{L}\p{N}_\s+]+?)\s*(?:键)?/iu, entities: { key_name: 2 } },
  { intent: 'hotkey', pattern: /(按下组合键|执行组合键|组合键)\s*(.+)/iu, entities: { keys: 2 } },

  // Files
  {
    intent: 'create_file',
    pattern: /(创建|新建)(?:一个)?文件\s*(.+?)(?:在|到)\s*(.+)/iu,
    entities: { filename: 2, path: 3 },
  },
  { intent: 'create_file', pattern: /(创建|新建)(?:一个)?文件\s*(.+)/iu, entities: { filename: 2 } },
  { intent: 'delete_file', pattern: /(删除|移除)文件\s*(.+)/iu, entities: { path: 2 } },
  {
    intent: 'copy_file',
    pattern: /(复制|拷贝)文件\s*(.+?)(?:到)\s*(.+)/iu,
    entities: { source: 2, destination: 3 },
  },
  {
    intent: 'move_file',
    pattern: /(移动|剪切)文件\s*(.+?)(?:到)\s*(.+)/iu,
    entities: { source: 2, destination: 3 },
  },
  {
    intent: 'search_files',
    pattern: /(搜索|查找)文件\s*(.+?)(?:在)\s*(.+)/iu,
    entities: { pattern: 2, directory: 3 },
  },
  { intent: 'search_files', pattern: /(搜索|查找)文件\s*(.+)/iu, entities: { pattern: 2 } },
  {
    intent: 'list_files',
    pattern: /(列出|显示)(?:目录|文件夹)\s*(.+?)(?:的|中的)?(?:文件|内容)/iu,
    entities: { directory: 2 },
  },
  { intent: 'read_file', pattern: /(读取|查看|打开)文件\s*(.+)/iu, entities: { path: 2 } },

  // System information
  { intent: 'get_system_info', pattern: /(获取|查看|显示)(?:系统|电脑)信息/iu },
  { intent: 'get_cpu_usage', pattern: /(获取|查看|显示)(?:cpu|处理器)(?:使用率|占用率)/iu },
  { intent: 'get_memory_usage', pattern: /(获取|查看|显示)(?:内存|ram)(?:使用率|占用率)/iu },
  { intent: 'get_disk_usage', pattern: /(获取|查看|显示)(?:磁盘|硬盘)(?:使用率|占用率|空间)/iu },
  { intent: 'list_processes', pattern: /(列出|显示)(?:所有)?(?:进程|程序)/iu },
  { intent: 'kill_process', pattern: /(结束|终止|杀死)进程\s*(.+)/iu, entities: { process_name: 2 } },
  { intent: 'get_network_info', pattern: /(获取|查看|显示)网络信息/iu },
  { intent: 'get_battery_info', pattern: /(获取|查看|显示)电池信息/iu },
  { intent: 'set_volume', pattern: /(设置|调整)音量(?:到|为)\s*(\d+)/iu, entities: { level: 2 } },
  { intent: 'get_volume', pattern: /(获取|查看|显示)(?:当前)?音量/iu },

  // Calculator and conversions
  { intent: 'calculate', pattern: /(计算|算一下)\s*(.+)/iu, entities: { expression: 2 } },
  {
    intent: 'convert_unit',
    pattern: /(转换|换算)\s*(\d+(?:\.\d+)?)\s*([\p{L}\p{N}_]+?)(?:到|为)\s*([\p{L}\p{N}_]+)/iu,
    entities: { value: 2, from_unit: 3, to_unit: 4 },
  },
  {
    intent: 'convert_temperature',
    pattern: /(转换|换算)温度\s*(\d+(?:\.\d+)?)\s*(摄氏度|华氏度|开尔文)(?:到|为)\s*(摄氏度|华氏度|开尔文)/iu,
    entities: { value: 2, from_unit: 3, to_unit: 4 },
  },

  // Weather
  { intent: 'get_weather', pattern: /(查看|获取|显示)(?:(.+?)的)?天气/iu, entities: { location: 2 } },
  { intent: 'get_weather_forecast', pattern: /(查看|获取|显示)(?:(.+?)的)?天气预报/iu, entities: { location: 2 } },
  { intent: 'get_air_quality', pattern: /(查看|获取|显示)(?:(.+?)的)?空气质量/iu, entities: { location: 2 } },

  // Email
  {
    intent: 'send_email',
    pattern: /(发送|发)邮件(?:给|到)\s*(.+?)(?:主题|标题)\s*(.+?)(?:内容|正文)\s*(.+)/iu,
    entities: { to: 2, subject: 3, body: 4 },
  },
  { intent: 'read_emails', pattern: /(查看|读取|显示)(?:最新的|未读的)?邮件/iu },
  { intent: 'search_emails', pattern: /(搜索|查找)邮件\s*(.+)/iu, entities: { query: 2 } },

  // Calendar
  {
    intent: 'create_event',
    pattern: /(创建|新建|添加)(?:日程|事件|活动)\s*(.+?)(?:在|时间)\s*(.+)/iu,
    entities: { title: 2, datetime: 3 },
  },
  { intent: 'list_events', pattern: /(查看|显示|列出)(?:今天|明天|本周|本月)?(?:的)?(?:日程|事件|活动)/iu },
  {
    intent: 'set_reminder',
    pattern: /(设置|添加)提醒\s*(.+?)(?:在|时间)\s*(.+)/iu,
    entities: { message: 2, datetime: 3 },
  },
  { intent: 'get_date_info', pattern: /(今天|明天|后天)是(?:几号|什么日期|星期几)/iu, entities: { day: 1 } },

  // Web
  {
    intent: 'download_file',
    pattern: /(下载)文件\s*(.+?)(?:到|保存到)\s*(.+)/iu,
    entities: { url: 2, path: 3 },
  },
  { intent: 'download_file', pattern: /(下载)文件\s*(.+)/iu, entities: { url: 2 } },
  { intent: 'check_website', pattern: /(检查|测试)网站\s*(.+)/iu, entities: { url: 2 } },
  {
    intent: 'translate_text',
    pattern: /(翻译)\s*(.+?)(?:到|为)\s*([\p{L}\p{N}_]+)/iu,
    entities: { text: 2, target_language: 3 },
  },
];
