/**
 * @fileoverview Custom Error Classes for the assistant core
 *
 * Provides specific error types for better error handling and debugging.
 * None of these cross the adapter, registry or dispatcher boundaries: each
 * boundary converts them into its contract's safe value.
 */

/**
 * Error severity levels for classification
 */
export enum ErrorSeverity {
  LOW = 'LOW',
  MEDIUM = 'MEDIUM',
  HIGH = 'HIGH',
  CRITICAL = 'CRITICAL'
}

/**
 * Error context information for better debugging
 */
export interface ErrorContext {
  readonly correlationId?: string;
  readonly utteranceId?: string;
  readonly operation: string;
  readonly timestamp: number;
  readonly metadata: Record<string, unknown>;
  readonly retryAttempt?: number;
  readonly maxRetries?: number;
}

function buildContext(
  operation: string,
  correlationId: string | undefined,
  metadata: Record<string, unknown>
): ErrorContext {
  return {
    correlationId,
    operation,
    timestamp: Date.now(),
    metadata
  };
}

/**
 * Base error class for all assistant errors
 */
export abstract class AssistantError extends Error {
  abstract readonly code: string;
  abstract readonly severity: ErrorSeverity;
  abstract readonly retryable: boolean;

  constructor(
    message: string,
    public readonly context: ErrorContext,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = this.constructor.name;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  get correlationId(): string | undefined {
    return this.context.correlationId;
  }

  get operation(): string {
    return this.context.operation;
  }

  /**
   * Check if this error can be retried
   */
  canRetry(): boolean {
    if (!this.retryable) return false;

    const { retryAttempt = 0, maxRetries = 3 } = this.context;
    return retryAttempt < maxRetries;
  }

  /**
   * Convert error to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      severity: this.severity,
      retryable: this.retryable,
      context: this.context,
      stack: this.stack,
      cause: this.cause ? {
        name: this.cause.name,
        message: this.cause.message,
        stack: this.cause.stack
      } : undefined
    };
  }
}

/**
 * Error thrown when configuration is invalid
 */
export class ConfigurationError extends AssistantError {
  readonly code = 'CONFIGURATION_ERROR';
  readonly severity = ErrorSeverity.CRITICAL;
  readonly retryable = false;

  static create(
    message: string,
    operation: string,
    metadata: Record<string, unknown> = {},
    cause?: Error
  ): ConfigurationError {
    return new ConfigurationError(message, buildContext(operation, undefined, metadata), cause);
  }
}

/**
 * Error thrown when an LLM backend cannot be reached or answers with a failure
 */
export class LLMTransportError extends AssistantError {
  readonly code = 'LLM_TRANSPORT_ERROR';
  readonly severity = ErrorSeverity.MEDIUM;
  readonly retryable = true;

  static create(
    message: string,
    backend: string,
    correlationId?: string,
    metadata: Record<string, unknown> = {},
    cause?: Error
  ): LLMTransportError {
    return new LLMTransportError(
      message,
      buildContext('llm_request', correlationId, { backend, ...metadata }),
      cause
    );
  }
}

/**
 * Error raised (and then contained) when a tool handler throws
 */
export class ToolExecutionError extends AssistantError {
  readonly code = 'TOOL_EXECUTION_ERROR';
  readonly severity = ErrorSeverity.HIGH;
  readonly retryable = false;

  static create(
    message: string,
    toolName: string,
    intent: string,
    correlationId?: string,
    cause?: Error
  ): ToolExecutionError {
    return new ToolExecutionError(
      message,
      buildContext('tool_execute', correlationId, { toolName, intent }),
      cause
    );
  }
}

/**
 * Error thrown when a desktop automation command fails
 */
export class DesktopAutomationError extends AssistantError {
  readonly code = 'DESKTOP_AUTOMATION_ERROR';
  readonly severity = ErrorSeverity.MEDIUM;
  readonly retryable = false;

  static create(
    message: string,
    command: string,
    metadata: Record<string, unknown> = {},
    cause?: Error
  ): DesktopAutomationError {
    return new DesktopAutomationError(message, buildContext(command, undefined, metadata), cause);
  }
}

/**
 * Error thrown when an application cannot be launched (not found, no permission)
 */
export class ApplicationLaunchError extends AssistantError {
  readonly code = 'APPLICATION_LAUNCH_ERROR';
  readonly severity = ErrorSeverity.MEDIUM;
  readonly retryable = false;

  constructor(
    message: string,
    context: ErrorContext,
    public readonly applicationName: string,
    public readonly notFound: boolean,
    cause?: Error
  ) {
    super(message, context, cause);
  }

  static create(applicationName: string, notFound: boolean, cause?: Error): ApplicationLaunchError {
    const message = notFound
      ? `Application not found: ${applicationName}`
      : `Failed to launch application: ${applicationName}`;
    return new ApplicationLaunchError(
      message,
      buildContext('launch_application', undefined, { applicationName }),
      applicationName,
      notFound,
      cause
    );
  }
}

/**
 * Error thrown when an outbound HTTP request fails or times out
 */
export class HttpRequestError extends AssistantError {
  readonly code = 'HTTP_REQUEST_ERROR';
  readonly severity = ErrorSeverity.LOW;
  readonly retryable = true;

  constructor(
    message: string,
    context: ErrorContext,
    public readonly timedOut: boolean,
    cause?: Error
  ) {
    super(message, context, cause);
  }

  static create(url: string, timedOut: boolean, cause?: Error): HttpRequestError {
    const message = timedOut
      ? `Request to ${url} timed out`
      : `Request to ${url} failed${cause ? `: ${cause.message}` : ''}`;
    return new HttpRequestError(message, buildContext('http_request', undefined, { url }), timedOut, cause);
  }
}

/**
 * Error returned to callers that submit to a stopped assistant loop
 */
export class AssistantStoppedError extends AssistantError {
  readonly code = 'ASSISTANT_STOPPED';
  readonly severity = ErrorSeverity.LOW;
  readonly retryable = false;

  static create(operation: string): AssistantStoppedError {
    return new AssistantStoppedError('Assistant loop has stopped', buildContext(operation, undefined, {}));
  }
}

/**
 * Validation error for input validation failures
 */
export class ValidationError extends AssistantError {
  readonly code = 'VALIDATION_ERROR';
  readonly severity = ErrorSeverity.MEDIUM;
  readonly retryable = false;

  static create(
    message: string,
    operation: string,
    metadata: Record<string, unknown> = {}
  ): ValidationError {
    return new ValidationError(message, buildContext(operation, undefined, metadata));
  }
}

/**
 * Type guard to check if error is an AssistantError
 */
export function isAssistantError(error: unknown): error is AssistantError {
  return error instanceof AssistantError;
}

/**
 * Utility to extract error details for logging
 */
export function extractErrorDetails(error: unknown): {
  name: string;
  message: string;
  code?: string;
  correlationId?: string;
  severity?: ErrorSeverity;
  retryable?: boolean;
  stack?: string;
  context?: ErrorContext;
} {
  if (isAssistantError(error)) {
    return {
      name: error.name,
      message: error.message,
      code: error.code,
      correlationId: error.correlationId,
      severity: error.severity,
      retryable: error.retryable,
      stack: error.stack,
      context: error.context
    };
  }

  if (typeof error === 'string') {
    return { name: 'Error', message: error };
  }

  return {
    name: getErrorProperty(error, 'name') || 'UnknownError',
    message: getErrorProperty(error, 'message') || 'Unknown error',
    code: getErrorProperty(error, 'code'),
    stack: getErrorProperty(error, 'stack')
  };
}

/**
 * Message of any thrown value
 */
export function errorMessage(error: unknown): string {
  return extractErrorDetails(error).message;
}

function getErrorProperty(error: unknown, property: string): string | undefined {
  if (hasProperty(error, property)) {
    const value = error[property];
    return typeof value === 'string' ? value : undefined;
  }
  return undefined;
}

function hasProperty<T extends string>(
  obj: unknown,
  property: T
): obj is Record<T, unknown> {
  return typeof obj === 'object' && obj !== null && property in obj;
}
