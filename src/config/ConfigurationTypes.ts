/**
 * Configuration Types
 * Shape of the configuration struct built once at startup and passed into
 * each component that needs it.
 */

import { LogLevel } from '../utils/logger';

export type NlpEngine = 'rule_based' | 'llm';

export const NLP_ENGINES: readonly NlpEngine[] = ['rule_based', 'llm'];

export type LLMApiType = 'openai_compatible' | 'openai' | 'tongyi' | 'claude' | 'gemini' | 'bedrock';

export const LLM_API_TYPES: readonly LLMApiType[] = [
  'openai_compatible',
  'openai',
  'tongyi',
  'claude',
  'gemini',
  'bedrock'
];

export interface NlpConfig {
  engine: NlpEngine;
}

export interface LLMConfig {
  apiType?: LLMApiType;
  apiKey?: string;
  model?: string;
  apiBase?: string;
  /** AWS region, only read by the Bedrock adapter */
  region: string;
  timeoutMs: number;
  temperature: number;
  /** Answer unknown intents with a free-text reply instead of "don't know how" */
  conversationFallback: boolean;
  maxContextTurns: number;
}

export interface ToolsConfig {
  disabled: string[];
  weatherApiKey?: string;
  weatherApiBase: string;
  calendarFile: string;
  workspaceDir: string;
  downloadDir: string;
  httpTimeoutMs: number;
}

export interface DesktopConfig {
  screenshotsDir: string;
  searchUrlTemplate: string;
  commandTimeoutMs: number;
}

export interface ServerConfig {
  enabled: boolean;
  port: number;
  host: string;
}

export interface LoggingConfig {
  level: LogLevel;
}

export interface EnvironmentConfig {
  nodeEnv: string;
}

export interface AssistantConfig {
  nlp: NlpConfig;
  llm: LLMConfig;
  tools: ToolsConfig;
  desktop: DesktopConfig;
  server: ServerConfig;
  logging: LoggingConfig;
  environment: EnvironmentConfig;
}

// Validation result
export interface ValidationResult {
  isValid: boolean;
  errors: string[];
  warnings: string[];
}

interface SchemaRuleBase {
  /** Environment variable the value is read from */
  env: string;
  required: boolean;
  description: string;
}

export type SchemaRule =
  | (SchemaRuleBase & { type: 'string'; default?: string; validation?: (value: string) => boolean })
  | (SchemaRuleBase & { type: 'number'; default?: number; validation?: (value: number) => boolean })
  | (SchemaRuleBase & { type: 'boolean'; default?: boolean })
  | (SchemaRuleBase & { type: 'array'; default?: string[]; validation?: (value: string[]) => boolean });

export interface ConfigSchema {
  [key: string]: SchemaRule;
}

export interface ConfigChanges {
  modified: Record<string, { oldValue: unknown; newValue: unknown }>;
}

// Default values
export const DEFAULT_CONFIG: AssistantConfig = {
  nlp: {
    engine: 'rule_based'
  },
  llm: {
    region: 'us-east-1',
    timeoutMs: 30000,
    temperature: 0.1,
    conversationFallback: false,
    maxContextTurns: 10
  },
  tools: {
    disabled: [],
    weatherApiBase: 'http://api.openweathermap.org',
    calendarFile: 'data/calendar.json',
    workspaceDir: '.',
    downloadDir: 'downloads',
    httpTimeoutMs: 10000
  },
  desktop: {
    screenshotsDir: 'screenshots',
    searchUrlTemplate: 'https://www.bing.com/search?q={query}',
    commandTimeoutMs: 10000
  },
  server: {
    enabled: true,
    port: 8080,
    host: '127.0.0.1'
  },
  logging: {
    level: 'INFO'
  },
  environment: {
    nodeEnv: 'development'
  }
};
