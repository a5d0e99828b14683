import { trace, SpanStatusCode, SpanKind, Attributes } from '@opentelemetry/api';
import * as util from 'util';
import { CorrelationIdManager } from '../utils/correlationId';

type LogLevel = 'ERROR' | 'WARN' | 'INFO' | 'DEBUG' | 'TRACE';

type LogMeta = Record<string, unknown> | string;

const LEVEL_PRIORITIES: Record<LogLevel, number> = {
  ERROR: 0,
  WARN: 1,
  INFO: 2,
  DEBUG: 3,
  TRACE: 4
};

const TRACER_NAME = 'voice-command-router';

/**
 * Read the level on every call so tests and operators can change LOG_LEVEL
 * at runtime.
 */
function getCurrentLevel(): LogLevel {
  const rawLevel = (process.env.LOG_LEVEL || 'INFO').toUpperCase();
  switch (rawLevel) {
    case 'ERROR':
    case 'WARN':
    case 'INFO':
    case 'DEBUG':
    case 'TRACE':
      return rawLevel;
    default:
      return 'INFO';
  }
}

function isLevelEnabled(level: LogLevel): boolean {
  return LEVEL_PRIORITIES[level] <= LEVEL_PRIORITIES[getCurrentLevel()];
}

interface TraceContext {
  correlationId?: string;
  utteranceId?: string;
  source?: string;
  traceId?: string;
  spanId?: string;
}

function getTraceContext(): TraceContext {
  const traceContext: TraceContext = {};

  const correlationContext = CorrelationIdManager.getCurrentContext();
  if (correlationContext) {
    traceContext.correlationId = correlationContext.correlationId;
    traceContext.source = correlationContext.source;
    if (correlationContext.utteranceId) {
      traceContext.utteranceId = correlationContext.utteranceId;
    }
  }

  const activeSpan = trace.getActiveSpan();
  if (activeSpan) {
    const spanContext = activeSpan.spanContext();
    traceContext.traceId = spanContext.traceId;
    traceContext.spanId = spanContext.spanId;
  }

  return traceContext;
}

function stringifyMeta(meta: LogMeta): string {
  if (typeof meta === 'string') return meta;
  try {
    return JSON.stringify(meta);
  } catch {
    return util.inspect(meta, { depth: 4 });
  }
}

function formatMessage(level: LogLevel, message: string, meta?: LogMeta): string {
  const ts = new Date().toISOString();
  const traceContext = getTraceContext();

  if (process.env.NODE_ENV === 'production') {
    return JSON.stringify({
      timestamp: ts,
      level,
      message,
      ...traceContext,
      ...(meta !== undefined && { meta })
    });
  }

  let out = `[${ts}] [${level}]`;
  if (traceContext.correlationId) {
    out += ` [corr:${traceContext.correlationId.slice(-12)}]`;
  } else if (traceContext.traceId) {
    out += ` [trace:${traceContext.traceId.slice(-8)}]`;
  }
  if (traceContext.utteranceId) {
    out += ` [${traceContext.utteranceId}]`;
  }
  out += ` ${message}`;
  if (meta !== undefined) {
    out += ` | ${stringifyMeta(meta)}`;
  }
  return out;
}

function logWithSpan(level: LogLevel, message: string, meta?: LogMeta): void {
  if (!isLevelEnabled(level)) {
    return;
  }

  const activeSpan = trace.getActiveSpan();
  if (activeSpan) {
    const eventAttributes: Attributes = {
      'log.severity': level,
      'log.message': message
    };
    if (meta !== undefined) {
      eventAttributes['log.meta'] = stringifyMeta(meta);
    }
    const correlationContext = CorrelationIdManager.getCurrentContext();
    if (correlationContext) {
      eventAttributes['correlation.id'] = correlationContext.correlationId;
    }
    activeSpan.addEvent(`log.${level.toLowerCase()}`, eventAttributes);

    if (level === 'ERROR') {
      activeSpan.setStatus({ code: SpanStatusCode.ERROR, message });
    }
  }

  const formattedMessage = formatMessage(level, message, meta);
  switch (level) {
    case 'ERROR':
      console.error(formattedMessage);
      break;
    case 'WARN':
      console.warn(formattedMessage);
      break;
    default:
      console.log(formattedMessage);
  }
}

// Logger with tracing integration
const logger = {
  error(message: string, meta?: LogMeta): void {
    logWithSpan('ERROR', message, meta);
  },

  warn(message: string, meta?: LogMeta): void {
    logWithSpan('WARN', message, meta);
  },

  info(message: string, meta?: LogMeta): void {
    logWithSpan('INFO', message, meta);
  },

  debug(message: string, meta?: LogMeta): void {
    logWithSpan('DEBUG', message, meta);
  },

  trace(message: string, meta?: LogMeta): void {
    logWithSpan('TRACE', message, meta);
  },

  /**
   * Run an async operation inside an active span. Without a registered
   * OpenTelemetry SDK the API hands out no-op spans, so this is always safe.
   */
  async withSpan<T>(name: string, operation: () => Promise<T>, attributes?: Attributes): Promise<T> {
    const tracer = trace.getTracer(TRACER_NAME);
    return tracer.startActiveSpan(name, { kind: SpanKind.INTERNAL, attributes }, async (span) => {
      CorrelationIdManager.addToSpan(span);
      try {
        const result = await operation();
        span.setStatus({ code: SpanStatusCode.OK });
        return result;
      } catch (error) {
        const err = error instanceof Error ? error : new Error(String(error));
        span.setStatus({ code: SpanStatusCode.ERROR, message: err.message });
        span.recordException(err);
        throw error;
      } finally {
        span.end();
      }
    });
  },

  isLevelEnabled
};

export type Logger = typeof logger;

export default logger;
export { logger, isLevelEnabled, LogLevel, LogMeta };
