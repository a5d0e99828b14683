/**
 * Unit tests for ConfigurationManager
 */

import { ConfigurationManager, Environment } from '../../../config/ConfigurationManager';
import { DEFAULT_CONFIG } from '../../../config/ConfigurationTypes';
import { ConfigurationError } from '../../../errors/AssistantErrors';

describe('ConfigurationManager', () => {
  describe('loading', () => {
    it('should fall back to defaults for an empty environment', () => {
      const config = new ConfigurationManager({}).getConfig();

      expect(config.nlp).toEqual(DEFAULT_CONFIG.nlp);
      expect(config.tools).toMatchObject(DEFAULT_CONFIG.tools);
      expect(config.desktop).toEqual(DEFAULT_CONFIG.desktop);
      expect(config.server).toEqual(DEFAULT_CONFIG.server);
      expect(config.llm).toMatchObject({ apiType: undefined, apiKey: undefined, ...DEFAULT_CONFIG.llm });
    });

    it('should parse and normalize environment values', () => {
      const config = new ConfigurationManager({
        NLP_ENGINE: 'LLM',
        LLM_API_TYPE: 'OpenAI',
        LLM_API_KEY: ' test-secret ',
        LLM_TEMPERATURE: '0.5',
        LLM_CONVERSATION_FALLBACK: '1',
        DISABLED_TOOLS: 'web, file ,',
        PORT: 'abc',
        LOG_LEVEL: 'debug'
      }).getConfig();

      expect(config.nlp.engine).toBe('llm');
      expect(config.llm.apiType).toBe('openai');
      expect(config.llm.apiKey).toBe('test-secret');
      expect(config.llm.temperature).toBe(0.5);
      expect(config.llm.conversationFallback).toBe(true);
      expect(config.tools.disabled).toEqual(['web', 'file']);
      expect(config.server.port).toBe(8080);
      expect(config.logging.level).toBe('DEBUG');
    });

    it('should look values up by dotted key', () => {
      const manager = new ConfigurationManager({ DISABLED_TOOLS: 'web' });

      expect(manager.get('llm.timeoutMs')).toBe(30000);
      expect(manager.has('server.host')).toBe(true);
      expect(manager.has('server.nothing')).toBe(false);
      expect(manager.isToolEnabled('web')).toBe(false);
      expect(manager.isToolEnabled('file')).toBe(true);
    });
  });

  describe('validate', () => {
    it('should accept the defaults', () => {
      expect(new ConfigurationManager({}).validate()).toEqual({ isValid: true, errors: [], warnings: [] });
    });

    it('should reject an unsupported LLM backend', () => {
      const result = new ConfigurationManager({ LLM_API_TYPE: 'foo' }).validate();

      expect(result.isValid).toBe(false);
      expect(result.errors).toEqual(["Unsupported LLM_API_TYPE 'foo'"]);
    });

    it('should apply schema rules', () => {
      const result = new ConfigurationManager({ PORT: '70000', SEARCH_URL_TEMPLATE: 'https://search.test/' }).validate();

      expect(result.errors).toEqual([
        "Configuration key 'desktop.searchUrlTemplate' failed validation: Web search URL containing a {query} placeholder",
        "Configuration key 'server.port' failed validation: Server port number (1-65535)"
      ]);
    });

    it('should warn about settings that fall back to the rule engine', () => {
      expect(new ConfigurationManager({ NLP_ENGINE: 'fuzzy' }).validate().warnings).toEqual([
        "Unknown NLP engine 'fuzzy', defaulting to rule_based"
      ]);
      expect(new ConfigurationManager({ NLP_ENGINE: 'llm' }).validate().warnings).toEqual([
        'NLP engine is llm but LLM_API_TYPE is not set; the rule engine will be used'
      ]);
      expect(new ConfigurationManager({ NLP_ENGINE: 'llm', LLM_API_TYPE: 'claude' }).validate().warnings).toEqual([
        'LLM backend claude has no LLM_API_KEY; the rule engine will be used'
      ]);
    });

    it('should not ask bedrock for an API key', () => {
      const result = new ConfigurationManager({ NLP_ENGINE: 'llm', LLM_API_TYPE: 'bedrock' }).validate();

      expect(result.warnings).toEqual([]);
    });
  });

  describe('fromEnvironment', () => {
    it('should throw ConfigurationError on invalid configuration', () => {
      expect(() => ConfigurationManager.fromEnvironment({ env: { LLM_API_TYPE: 'foo' } })).toThrow(ConfigurationError);
      expect(() => ConfigurationManager.fromEnvironment({ env: { LLM_API_TYPE: 'foo' } })).toThrow(
        "Invalid configuration: Unsupported LLM_API_TYPE 'foo'"
      );
    });

    it('should return a manager for a valid environment', () => {
      const manager = ConfigurationManager.fromEnvironment({ env: { NLP_ENGINE: 'rule_based' } });

      expect(manager.getConfig().nlp.engine).toBe('rule_based');
    });
  });

  describe('reload', () => {
    it('should report and emit changed keys', () => {
      const env: Environment = { PORT: '8080' };
      const manager = new ConfigurationManager(env);
      const emitted: unknown[] = [];
      manager.on('configChanged', (changes: unknown) => emitted.push(changes));

      env.PORT = '9090';
      const changes = manager.reload();

      expect(changes).toEqual({ modified: { 'server.port': { oldValue: 8080, newValue: 9090 } } });
      expect(emitted).toEqual([changes]);
      expect(manager.getConfig().server.port).toBe(9090);
    });

    it('should stay quiet when nothing changed', () => {
      const manager = new ConfigurationManager({});
      const listener = jest.fn();
      manager.on('configChanged', listener);

      expect(manager.reload()).toEqual({ modified: {} });
      expect(listener).not.toHaveBeenCalled();
    });
  });
});
