/**
 * @fileoverview Rule-based intent engine
 *
 * Evaluates an ordered pattern table against the lower-cased, trimmed
 * utterance. The first pattern whose regex matches anywhere in the text wins;
 * later patterns are not evaluated.
 */

import { EngineMatch, Entities, EntityValue, UNKNOWN_INTENT } from './types';
import logger from '../utils/logger';
import { CorrelationIdManager } from '../utils/correlationId';

/**
 * Applied to a trimmed capture group before it is stored
 */
export type EntityNormalizer = (value: string) => EntityValue;

/**
 * How one entity is pulled out of a match:
 * - a capture group index (trimmed text, null when the group did not take part)
 * - a `[groupIndex, normalizer]` pair (normalizer skipped for absent groups)
 * - a function of the whole match (a thrown error stores null for that entity)
 */
export type EntityExtractor =
  | number
  | readonly [number, EntityNormalizer]
  | ((match: RegExpExecArray) => EntityValue);

export interface PatternRule {
  /** Intent label produced when this rule matches */
  readonly intent: string;
  /** Searched (not full-matched) against the processed text */
  readonly pattern: RegExp;
  /** Entity name to extractor; evaluated in declaration order */
  readonly entities?: Readonly<Record<string, EntityExtractor>>;
}

export class RuleEngine {
  constructor(private readonly rules: readonly PatternRule[]) {}

  /**
   * Match text against the table. No match yields `unknown` with no entities.
   */
  public match(text: string): EngineMatch {
    const processedText = text.toLowerCase().trim();

    for (const rule of this.rules) {
      const match = rule.pattern.exec(processedText);
      if (!match) {
        continue;
      }

      const entities = this.extractEntities(rule, match);
      logger.debug('Rule matched', {
        correlationId: CorrelationIdManager.getCurrentCorrelationId(),
        intent: rule.intent,
        pattern: rule.pattern.source,
        entityCount: Object.keys(entities).length
      });
      return { intent: rule.intent, entities };
    }

    return { intent: UNKNOWN_INTENT, entities: {} };
  }

  /**
   * Intents the table can produce, in first-appearance order
   */
  public getKnownIntents(): string[] {
    return Array.from(new Set(this.rules.map((rule) => rule.intent)));
  }

  private extractEntities(rule: PatternRule, match: RegExpExecArray): Entities {
    const entities: Entities = {};
    if (!rule.entities) {
      return entities;
    }

    for (const [name, extractor] of Object.entries(rule.entities)) {
      entities[name] = this.runExtractor(name, extractor, match);
    }
    return entities;
  }

  private runExtractor(name: string, extractor: EntityExtractor, match: RegExpExecArray): EntityValue {
    if (typeof extractor === 'number') {
      const group = match[extractor];
      return group === undefined ? null : group.trim();
    }

    if (typeof extractor === 'function') {
      try {
        return extractor(match);
      } catch (error) {
        logger.debug('Entity extractor failed', {
          entity: name,
          error: error instanceof Error ? error.message : String(error)
        });
        return null;
      }
    }

    const [groupIndex, normalize] = extractor;
    const group = match[groupIndex];
    return group === undefined ? null : normalize(group.trim());
  }
}
