/**
 * Configuration Schema and Validation Rules
 * Defines the environment variable, default and validation rule of every
 * configuration property.
 */

import { ConfigSchema, DEFAULT_CONFIG, LLM_API_TYPES, NLP_ENGINES } from './ConfigurationTypes';
import { isValidLogLevel } from '../types/TypeGuards';

const LLM_API_TYPE_NAMES: readonly string[] = LLM_API_TYPES;
const NLP_ENGINE_NAMES: readonly string[] = NLP_ENGINES;

export const CONFIG_SCHEMA: ConfigSchema = {
  // NLP Configuration
  'nlp.engine': {
    env: 'NLP_ENGINE',
    type: 'string',
    required: false,
    default: DEFAULT_CONFIG.nlp.engine,
    validation: (value: string) => NLP_ENGINE_NAMES.includes(value),
    description: 'Intent recognition engine (rule_based | llm)',
  },

  // LLM Configuration
  'llm.apiType': {
    env: 'LLM_API_TYPE',
    type: 'string',
    required: false,
    validation: (value: string) => LLM_API_TYPE_NAMES.includes(value),
    description: 'LLM backend (openai_compatible | openai | tongyi | claude | gemini | bedrock)',
  },
  'llm.apiKey': {
    env: 'LLM_API_KEY',
    type: 'string',
    required: false,
    description: 'LLM API key (not needed for bedrock)',
  },
  'llm.model': {
    env: 'LLM_MODEL',
    type: 'string',
    required: false,
    validation: (value: string) => value.length > 0,
    description: 'Model identifier passed to the LLM backend',
  },
  'llm.apiBase': {
    env: 'LLM_API_BASE',
    type: 'string',
    required: false,
    validation: (value: string) => /^https?:\/\//.test(value),
    description: 'Base URL for OpenAI-compatible endpoints',
  },
  'llm.region': {
    env: 'AWS_REGION',
    type: 'string',
    required: false,
    default: DEFAULT_CONFIG.llm.region,
    validation: (value: string) => /^[a-z0-9-]+$/.test(value),
    description: 'AWS region for the Bedrock adapter',
  },
  'llm.timeoutMs': {
    env: 'LLM_TIMEOUT_MS',
    type: 'number',
    required: false,
    default: DEFAULT_CONFIG.llm.timeoutMs,
    validation: (value: number) => value > 0 && value <= 120000,
    description: 'LLM request timeout in milliseconds (1-120000)',
  },
  'llm.temperature': {
    env: 'LLM_TEMPERATURE',
    type: 'number',
    required: false,
    default: DEFAULT_CONFIG.llm.temperature,
    validation: (value: number) => value >= 0 && value <= 2,
    description: 'Sampling temperature for intent analysis (0-2)',
  },
  'llm.conversationFallback': {
    env: 'LLM_CONVERSATION_FALLBACK',
    type: 'boolean',
    required: false,
    default: DEFAULT_CONFIG.llm.conversationFallback,
    description: 'Reply to unknown intents with generated conversation',
  },
  'llm.maxContextTurns': {
    env: 'LLM_MAX_CONTEXT_TURNS',
    type: 'number',
    required: false,
    default: DEFAULT_CONFIG.llm.maxContextTurns,
    validation: (value: number) => value >= 0 && value <= 100,
    description: 'Conversation turns kept for generated replies (0-100)',
  },

  // Tools Configuration
  'tools.disabled': {
    env: 'DISABLED_TOOLS',
    type: 'array',
    required: false,
    default: DEFAULT_CONFIG.tools.disabled,
    description: 'Comma separated tool names that start disabled',
  },
  'tools.weatherApiKey': {
    env: 'WEATHER_API_KEY',
    type: 'string',
    required: false,
    description: 'OpenWeatherMap API key',
  },
  'tools.weatherApiBase': {
    env: 'WEATHER_API_BASE',
    type: 'string',
    required: false,
    default: DEFAULT_CONFIG.tools.weatherApiBase,
    validation: (value: string) => /^https?:\/\//.test(value),
    description: 'OpenWeatherMap base URL',
  },
  'tools.calendarFile': {
    env: 'CALENDAR_FILE',
    type: 'string',
    required: false,
    default: DEFAULT_CONFIG.tools.calendarFile,
    validation: (value: string) => value.endsWith('.json'),
    description: 'JSON file holding calendar events and reminders',
  },
  'tools.workspaceDir': {
    env: 'WORKSPACE_DIR',
    type: 'string',
    required: false,
    default: DEFAULT_CONFIG.tools.workspaceDir,
    description: 'Directory relative file paths resolve against',
  },
  'tools.downloadDir': {
    env: 'DOWNLOAD_DIR',
    type: 'string',
    required: false,
    default: DEFAULT_CONFIG.tools.downloadDir,
    description: 'Directory downloads are saved into when no path is given',
  },
  'tools.httpTimeoutMs': {
    env: 'TOOL_HTTP_TIMEOUT_MS',
    type: 'number',
    required: false,
    default: DEFAULT_CONFIG.tools.httpTimeoutMs,
    validation: (value: number) => value > 0 && value <= 120000,
    description: 'HTTP timeout for tool requests in milliseconds (1-120000)',
  },

  // Desktop Configuration
  'desktop.screenshotsDir': {
    env: 'SCREENSHOTS_DIR',
    type: 'string',
    required: false,
    default: DEFAULT_CONFIG.desktop.screenshotsDir,
    description: 'Directory screenshots are written to',
  },
  'desktop.searchUrlTemplate': {
    env: 'SEARCH_URL_TEMPLATE',
    type: 'string',
    required: false,
    default: DEFAULT_CONFIG.desktop.searchUrlTemplate,
    validation: (value: string) => value.includes('{query}'),
    description: 'Web search URL containing a {query} placeholder',
  },
  'desktop.commandTimeoutMs': {
    env: 'DESKTOP_COMMAND_TIMEOUT_MS',
    type: 'number',
    required: false,
    default: DEFAULT_CONFIG.desktop.commandTimeoutMs,
    validation: (value: number) => value > 0,
    description: 'Timeout for desktop automation commands in milliseconds',
  },

  // Server Configuration
  'server.enabled': {
    env: 'CONTROL_SERVER_ENABLED',
    type: 'boolean',
    required: false,
    default: DEFAULT_CONFIG.server.enabled,
    description: 'Start the HTTP control server',
  },
  'server.port': {
    env: 'PORT',
    type: 'number',
    required: false,
    default: DEFAULT_CONFIG.server.port,
    validation: (value: number) => value > 0 && value <= 65535,
    description: 'Server port number (1-65535)',
  },
  'server.host': {
    env: 'HOST',
    type: 'string',
    required: false,
    default: DEFAULT_CONFIG.server.host,
    description: 'Server host address',
  },

  // Logging Configuration
  'logging.level': {
    env: 'LOG_LEVEL',
    type: 'string',
    required: false,
    default: DEFAULT_CONFIG.logging.level,
    validation: (value: string) => isValidLogLevel(value),
    description: 'Logging level (ERROR | WARN | INFO | DEBUG | TRACE)',
  },
};

/**
 * Keys marked as required in the schema
 */
export function getRequiredConfigKeys(): string[] {
  return Object.entries(CONFIG_SCHEMA)
    .filter(([, rule]) => rule.required)
    .map(([key]) => key);
}
