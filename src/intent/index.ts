/**
 * @fileoverview Intent recognition module exports
 */

export * from './types';
export { RuleEngine, PatternRule, EntityExtractor, EntityNormalizer } from './RuleEngine';
export { DEFAULT_RULES, APPLICATION_NAME_MAPPINGS, normalizeApplicationName } from './defaultRules';
export { normalizeIntent, normalizeLLMAnswer, RAW_RESPONSE_ENTITY } from './IntentNormalizer';
export { IntentRecognizer, IntentRecognizerOptions } from './IntentRecognizer';
export * from './entities';
