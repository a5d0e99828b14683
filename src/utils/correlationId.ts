/**
 * @fileoverview Correlation Context Management
 *
 * Every utterance (spoken, typed, or posted to the control server) runs inside
 * its own correlation context so that recognition, dispatch, tool execution
 * and LLM calls can be tied together in the logs.
 *
 * Features:
 * - Correlation ID generation with optional prefixes
 * - Context storage using AsyncLocalStorage
 * - OpenTelemetry span enrichment (see logger.withSpan)
 * - Express middleware for the control server
 */

import { AsyncLocalStorage } from 'async_hooks';
import { randomUUID } from 'crypto';
import { Span, Attributes } from '@opentelemetry/api';
import { Request, Response, NextFunction } from 'express';

// ============================================================================
// TYPES AND INTERFACES
// ============================================================================

export type CorrelationSource = 'speech' | 'console' | 'http' | 'internal';

export interface CorrelationContext {
  correlationId: string;
  utteranceId?: string;
  parentCorrelationId?: string;
  timestamp: number;
  source: CorrelationSource;
}

const correlationStorage = new AsyncLocalStorage<CorrelationContext>();

// ============================================================================
// CORRELATION ID UTILITIES
// ============================================================================

export class CorrelationIdManager {
  static readonly CORRELATION_ID_HEADER = 'x-correlation-id';

  /**
   * Generate a new correlation ID with optional prefix
   */
  public static generateCorrelationId(prefix?: string): string {
    const uuid = randomUUID();
    return prefix ? `${prefix}-${uuid}` : uuid;
  }

  /**
   * Short ID used to label a single utterance in log lines
   */
  public static generateUtteranceId(): string {
    return `utt-${randomUUID().split('-')[0]}`;
  }

  public static getCurrentContext(): CorrelationContext | undefined {
    return correlationStorage.getStore();
  }

  public static getCurrentCorrelationId(): string | undefined {
    return this.getCurrentContext()?.correlationId;
  }

  /**
   * Run a function within a correlation context.
   * Missing required properties are filled in.
   */
  public static runWithContext<T>(context: Partial<CorrelationContext>, fn: () => T): T {
    const fullContext: CorrelationContext = {
      ...context,
      correlationId: context.correlationId || this.generateCorrelationId(),
      timestamp: context.timestamp || Date.now(),
      source: context.source || 'internal'
    };
    return correlationStorage.run(fullContext, fn);
  }

  /**
   * Create a correlation context for one utterance
   */
  public static createUtteranceContext(source: CorrelationSource, correlationId?: string): CorrelationContext {
    const parent = this.getCurrentContext();
    return {
      correlationId: correlationId || this.generateCorrelationId(source),
      utteranceId: this.generateUtteranceId(),
      parentCorrelationId: parent?.correlationId,
      timestamp: Date.now(),
      source
    };
  }

  /**
   * Add correlation context to an OpenTelemetry span
   */
  public static addToSpan(span: Span, context?: CorrelationContext): void {
    const ctx = context || this.getCurrentContext();
    if (!ctx) return;

    const attributes: Attributes = {
      'correlation.id': ctx.correlationId,
      'correlation.source': ctx.source,
      'correlation.timestamp': ctx.timestamp
    };
    if (ctx.utteranceId) attributes['utterance.id'] = ctx.utteranceId;
    if (ctx.parentCorrelationId) attributes['correlation.parent_id'] = ctx.parentCorrelationId;

    span.setAttributes(attributes);
  }

  /**
   * Middleware for Express: honours an incoming x-correlation-id header,
   * echoes the chosen id back and runs the rest of the request inside it.
   */
  public static middleware() {
    return (req: Request, res: Response, next: NextFunction): void => {
      const header = req.headers[CorrelationIdManager.CORRELATION_ID_HEADER];
      const incoming = Array.isArray(header) ? header[0] : header;
      const correlationId = incoming || CorrelationIdManager.generateCorrelationId('http');

      res.setHeader(CorrelationIdManager.CORRELATION_ID_HEADER, correlationId);
      CorrelationIdManager.runWithContext({ correlationId, source: 'http' }, () => next());
    };
  }
}

export const correlationMiddleware = CorrelationIdManager.middleware.bind(CorrelationIdManager);

export default CorrelationIdManager;
