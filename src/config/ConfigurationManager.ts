/**
 * Configuration Manager
 * Builds the assistant configuration struct once at startup from environment
 * variables (optionally seeded from a .env file) and validates it against
 * CONFIG_SCHEMA.
 */

import { EventEmitter } from 'events';
import * as dotenv from 'dotenv';
import {
  AssistantConfig,
  ConfigChanges,
  DEFAULT_CONFIG,
  LLM_API_TYPES,
  LLMApiType,
  NLP_ENGINES,
  NlpEngine,
  SchemaRule,
  ValidationResult
} from './ConfigurationTypes';
import { CONFIG_SCHEMA, getRequiredConfigKeys } from './ConfigurationSchema';
import { ConfigurationError } from '../errors/AssistantErrors';
import { isArray, isBoolean, isNumber, isObject, isString, isValidLogLevel } from '../types/TypeGuards';
import logger, { LogLevel } from '../utils/logger';

export type Environment = Record<string, string | undefined>;

export interface ConfigurationLoadOptions {
  /** Variables to read; defaults to process.env after loading the .env file */
  env?: Environment;
  /** Path of the .env file; only used when env is not supplied */
  envFile?: string;
}

export class ConfigurationManager extends EventEmitter {
  private config: AssistantConfig;
  private loadWarnings: string[] = [];
  private loadErrors: string[] = [];

  constructor(private readonly env: Environment = process.env) {
    super();
    this.config = this.loadConfiguration();
  }

  /**
   * Load, validate and return a manager. Throws ConfigurationError when the
   * configuration is invalid; warnings are logged.
   */
  public static fromEnvironment(options: ConfigurationLoadOptions = {}): ConfigurationManager {
    let env = options.env;
    if (!env) {
      const result = dotenv.config(options.envFile ? { path: options.envFile } : {});
      if (result.error && options.envFile) {
        throw ConfigurationError.create(
          `Could not read env file ${options.envFile}`,
          'load_env_file',
          { envFile: options.envFile },
          result.error
        );
      }
      env = process.env;
    }

    const manager = new ConfigurationManager(env);
    const validation = manager.validate();

    for (const warning of validation.warnings) {
      logger.warn('Configuration warning', { warning });
    }

    if (!validation.isValid) {
      logger.error('Configuration validation failed', { errors: validation.errors });
      throw ConfigurationError.create(
        `Invalid configuration: ${validation.errors.join('; ')}`,
        'validate_configuration',
        { errors: validation.errors }
      );
    }

    logger.info('Configuration loaded', {
      nlpEngine: manager.config.nlp.engine,
      llmApiType: manager.config.llm.apiType || 'none',
      disabledTools: manager.config.tools.disabled
    });

    return manager;
  }

  public getConfig(): AssistantConfig {
    return this.config;
  }

  /**
   * Look up a value by dotted key, e.g. `llm.timeoutMs`
   */
  public get(key: string): unknown {
    return key.split('.').reduce<unknown>(
      (current, part) => (isObject(current) ? current[part] : undefined),
      this.config
    );
  }

  public has(key: string): boolean {
    return this.get(key) !== undefined;
  }

  public isToolEnabled(toolName: string): boolean {
    return !this.config.tools.disabled.includes(toolName);
  }

  public getSchema(): typeof CONFIG_SCHEMA {
    return CONFIG_SCHEMA;
  }

  public validate(): ValidationResult {
    const errors: string[] = [...this.loadErrors];
    const warnings: string[] = [...this.loadWarnings];

    for (const key of getRequiredConfigKeys()) {
      const value = this.get(key);
      if (value === undefined || value === null || value === '') {
        errors.push(`Required configuration key '${key}' is missing`);
      }
    }

    for (const [key, rule] of Object.entries(CONFIG_SCHEMA)) {
      const value = this.get(key);
      if (value === undefined || value === null) {
        continue;
      }
      const problem = this.checkRule(rule, value);
      if (problem === 'type') {
        errors.push(`Configuration key '${key}' has invalid type. Expected ${rule.type}, got ${typeof value}`);
      } else if (problem === 'validation') {
        errors.push(`Configuration key '${key}' failed validation: ${rule.description}`);
      }
    }

    const { nlp, llm, environment, logging } = this.config;
    if (nlp.engine === 'llm' && !llm.apiType) {
      warnings.push('NLP engine is llm but LLM_API_TYPE is not set; the rule engine will be used');
    }
    if (nlp.engine === 'llm' && llm.apiType && llm.apiType !== 'bedrock' && !llm.apiKey) {
      warnings.push(`LLM backend ${llm.apiType} has no LLM_API_KEY; the rule engine will be used`);
    }
    if (llm.conversationFallback && nlp.engine !== 'llm') {
      warnings.push('Conversation fallback needs the llm engine and has no effect');
    }
    if (environment.nodeEnv === 'production' && logging.level === 'DEBUG') {
      warnings.push('DEBUG logging level in production may impact performance');
    }

    return {
      isValid: errors.length === 0,
      errors,
      warnings,
    };
  }

  /**
   * Re-read the environment and emit `configChanged` with the keys whose
   * values differ.
   */
  public reload(): ConfigChanges {
    const previous = this.config;
    this.config = this.loadConfiguration();

    const changes: ConfigChanges = { modified: {} };
    for (const key of Object.keys(CONFIG_SCHEMA)) {
      const oldValue = readPath(previous, key);
      const newValue = this.get(key);
      if (JSON.stringify(oldValue) !== JSON.stringify(newValue)) {
        changes.modified[key] = { oldValue, newValue };
      }
    }

    if (Object.keys(changes.modified).length > 0) {
      this.emit('configChanged', changes);
    }
    return changes;
  }

  private loadConfiguration(): AssistantConfig {
    this.loadWarnings = [];
    this.loadErrors = [];
    const env = this.env;

    return {
      nlp: {
        engine: this.parseEngine(env.NLP_ENGINE),
      },
      llm: {
        apiType: this.parseApiType(env.LLM_API_TYPE),
        apiKey: this.parseOptional(env.LLM_API_KEY),
        model: this.parseOptional(env.LLM_MODEL),
        apiBase: this.parseOptional(env.LLM_API_BASE),
        region: env.AWS_REGION || DEFAULT_CONFIG.llm.region,
        timeoutMs: this.parseNumber(env.LLM_TIMEOUT_MS, DEFAULT_CONFIG.llm.timeoutMs),
        temperature: this.parseFloat(env.LLM_TEMPERATURE, DEFAULT_CONFIG.llm.temperature),
        conversationFallback: this.parseBoolean(env.LLM_CONVERSATION_FALLBACK, DEFAULT_CONFIG.llm.conversationFallback),
        maxContextTurns: this.parseNumber(env.LLM_MAX_CONTEXT_TURNS, DEFAULT_CONFIG.llm.maxContextTurns),
      },
      tools: {
        disabled: this.parseList(env.DISABLED_TOOLS),
        weatherApiKey: this.parseOptional(env.WEATHER_API_KEY),
        weatherApiBase: env.WEATHER_API_BASE || DEFAULT_CONFIG.tools.weatherApiBase,
        calendarFile: env.CALENDAR_FILE || DEFAULT_CONFIG.tools.calendarFile,
        workspaceDir: env.WORKSPACE_DIR || DEFAULT_CONFIG.tools.workspaceDir,
        downloadDir: env.DOWNLOAD_DIR || DEFAULT_CONFIG.tools.downloadDir,
        httpTimeoutMs: this.parseNumber(env.TOOL_HTTP_TIMEOUT_MS, DEFAULT_CONFIG.tools.httpTimeoutMs),
      },
      desktop: {
        screenshotsDir: env.SCREENSHOTS_DIR || DEFAULT_CONFIG.desktop.screenshotsDir,
        searchUrlTemplate: env.SEARCH_URL_TEMPLATE || DEFAULT_CONFIG.desktop.searchUrlTemplate,
        commandTimeoutMs: this.parseNumber(env.DESKTOP_COMMAND_TIMEOUT_MS, DEFAULT_CONFIG.desktop.commandTimeoutMs),
      },
      server: {
        enabled: this.parseBoolean(env.CONTROL_SERVER_ENABLED, DEFAULT_CONFIG.server.enabled),
        port: this.parseNumber(env.PORT, DEFAULT_CONFIG.server.port),
        host: env.HOST || DEFAULT_CONFIG.server.host,
      },
      logging: {
        level: this.parseLogLevel(env.LOG_LEVEL),
      },
      environment: {
        nodeEnv: env.NODE_ENV || DEFAULT_CONFIG.environment.nodeEnv,
      },
    };
  }

  private checkRule(rule: SchemaRule, value: unknown): 'type' | 'validation' | undefined {
    switch (rule.type) {
      case 'string':
        if (!isString(value)) return 'type';
        return rule.validation && !rule.validation(value) ? 'validation' : undefined;
      case 'number':
        if (!isNumber(value)) return 'type';
        return rule.validation && !rule.validation(value) ? 'validation' : undefined;
      case 'boolean':
        return isBoolean(value) ? undefined : 'type';
      case 'array': {
        if (!isArray(value)) return 'type';
        const items = value.filter(isString);
        if (items.length !== value.length) return 'type';
        return rule.validation && !rule.validation(items) ? 'validation' : undefined;
      }
    }
  }

  // Utility parsing methods
  private parseEngine(value: string | undefined): NlpEngine {
    if (!value) return DEFAULT_CONFIG.nlp.engine;
    const normalized = value.trim().toLowerCase();
    const engine = NLP_ENGINES.find((candidate) => candidate === normalized);
    if (!engine) {
      this.loadWarnings.push(`Unknown NLP engine '${value}', defaulting to ${DEFAULT_CONFIG.nlp.engine}`);
      return DEFAULT_CONFIG.nlp.engine;
    }
    return engine;
  }

  private parseApiType(value: string | undefined): LLMApiType | undefined {
    if (!value) return undefined;
    const normalized = value.trim().toLowerCase();
    const apiType = LLM_API_TYPES.find((candidate) => candidate === normalized);
    if (!apiType) {
      this.loadErrors.push(`Unsupported LLM_API_TYPE '${value}'`);
    }
    return apiType;
  }

  private parseLogLevel(value: string | undefined): LogLevel {
    if (!value) return DEFAULT_CONFIG.logging.level;
    const normalized = value.trim().toUpperCase();
    if (isValidLogLevel(normalized)) {
      return normalized;
    }
    this.loadWarnings.push(`Unknown LOG_LEVEL '${value}', defaulting to ${DEFAULT_CONFIG.logging.level}`);
    return DEFAULT_CONFIG.logging.level;
  }

  private parseOptional(value: string | undefined): string | undefined {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
  }

  private parseList(value: string | undefined): string[] {
    if (!value) return [];
    return value.split(',').map((item) => item.trim()).filter((item) => item.length > 0);
  }

  private parseNumber(value: string | undefined, defaultValue: number): number {
    if (!value) return defaultValue;
    const parsed = parseInt(value, 10);
    return isNaN(parsed) ? defaultValue : parsed;
  }

  private parseFloat(value: string | undefined, defaultValue: number): number {
    if (!value) return defaultValue;
    const parsed = parseFloat(value);
    return isNaN(parsed) ? defaultValue : parsed;
  }

  private parseBoolean(value: string | undefined, defaultValue: boolean): boolean {
    if (!value) return defaultValue;
    return value.toLowerCase() === 'true' || value === '1';
  }
}

function readPath(source: AssistantConfig, key: string): unknown {
  return key.split('.').reduce<unknown>(
    (current, part) => (isObject(current) ? current[part] : undefined),
    source
  );
}
