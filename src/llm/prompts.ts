/**
 * System prompts shared by all adapters
 */

const BUILTIN_INTENTS = [
  'open_application',
  'search_web',
  'get_time',
  'greeting',
  'exit_assistant',
  'capture_screen',
  'move_mouse',
  'click_mouse',
  'type_text',
  'press_key',
  'hotkey',
  'activate_window',
  'minimize_window',
  'maximize_window',
  'close_window',
  'list_windows'
].join(', ');

export const INTENT_SYSTEM_PROMPT =
  '你是一个专门用于意图识别的AI助手。分析用户输入，提取意图和实体。' +
  "返回JSON格式，包含'intent'和'entities'字段。" +
  `支持的意图包括：${BUILTIN_INTENTS}。` +
  "如果无法识别意图，将intent设为'unknown'。";

/**
 * Prompt for the embedded-JSON protocol; the catalog is a JSON array of
 * available tools
 */
export function buildToolPrompt(catalog: string): string {
  return (
    '你是一个专门用于意图识别和工具调用的AI助手。分析用户输入，提取意图和实体，并判断是否需要调用工具。' +
    "如果需要调用工具，请在返回的JSON中包含 'tool_call' 字段，其中包含 'name' 和 'arguments'。" +
    "'arguments' 应该是一个包含工具所需参数的对象。" +
    "返回JSON格式，包含'intent', 'entities', 和可选的 'tool_call' 字段。" +
    `支持的意图包括：${BUILTIN_INTENTS}。` +
    "如果无法识别意图，将intent设为'unknown'。" +
    `可用的工具如下：\n${catalog}`
  );
}

export const CONVERSATION_SYSTEM_PROMPT = '你是一个友好的中文语音助手。提供简洁、有用的回答。';

export const APOLOGY_RESPONSE = '抱歉，我在处理您的请求时遇到了问题。';
