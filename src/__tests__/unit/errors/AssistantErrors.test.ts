/**
 * Unit tests for the assistant error classes
 */

import {
  ApplicationLaunchError,
  AssistantStoppedError,
  ErrorSeverity,
  HttpRequestError,
  LLMTransportError,
  ToolExecutionError,
  ValidationError,
  errorMessage,
  extractErrorDetails,
  isAssistantError
} from '../../../errors/AssistantErrors';

describe('AssistantErrors', () => {
  it('should describe HTTP failures and timeouts', () => {
    const timedOut = HttpRequestError.create('http://weather.test/', true);
    const failed = HttpRequestError.create('http://weather.test/', false, new Error('ECONNREFUSED'));

    expect(timedOut.message).toBe('Request to http://weather.test/ timed out');
    expect(timedOut.timedOut).toBe(true);
    expect(failed.message).toBe('Request to http://weather.test/ failed: ECONNREFUSED');
    expect(failed.context.metadata).toEqual({ url: 'http://weather.test/' });
    expect(failed.retryable).toBe(true);
  });

  it('should distinguish missing applications from launch failures', () => {
    expect(ApplicationLaunchError.create('foo.exe', true).message).toBe('Application not found: foo.exe');
    expect(ApplicationLaunchError.create('foo.exe', false).message).toBe('Failed to launch application: foo.exe');
  });

  it('should carry the correlation id and operation', () => {
    const error = ToolExecutionError.create('Tool weather failed', 'weather', 'get_weather', 'corr-1');

    expect(error.correlationId).toBe('corr-1');
    expect(error.operation).toBe('tool_execute');
    expect(error.severity).toBe(ErrorSeverity.HIGH);
    expect(error.name).toBe('ToolExecutionError');
    expect(error.canRetry()).toBe(false);
  });

  it('should allow retries of retryable errors within the budget', () => {
    expect(LLMTransportError.create('down', 'openai').canRetry()).toBe(true);
  });

  it('should serialize the cause', () => {
    const json = LLMTransportError.create('down', 'openai', undefined, {}, new Error('socket hang up')).toJSON();

    expect(json).toMatchObject({
      name: 'LLMTransportError',
      code: 'LLM_TRANSPORT_ERROR',
      message: 'down',
      severity: 'MEDIUM',
      cause: { name: 'Error', message: 'socket hang up' }
    });
  });

  it('should report a stopped loop', () => {
    const error = AssistantStoppedError.create('assistant_submit');

    expect(error.message).toBe('Assistant loop has stopped');
    expect(error.code).toBe('ASSISTANT_STOPPED');
  });

  describe('extractErrorDetails', () => {
    it('should read assistant errors, plain errors, strings and objects', () => {
      const validation = ValidationError.create('bad input', 'parse', { field: 'x' });

      expect(isAssistantError(validation)).toBe(true);
      expect(isAssistantError(new Error('plain'))).toBe(false);
      expect(extractErrorDetails(validation)).toMatchObject({ code: 'VALIDATION_ERROR', message: 'bad input' });
      expect(extractErrorDetails(new TypeError('nope'))).toMatchObject({ name: 'TypeError', message: 'nope' });
      expect(extractErrorDetails('text')).toEqual({ name: 'Error', message: 'text' });
      expect(extractErrorDetails({ code: 'ENOENT' })).toEqual({
        name: 'UnknownError',
        message: 'Unknown error',
        code: 'ENOENT',
        stack: undefined
      });
    });

    it('should give a message for anything thrown', () => {
      expect(errorMessage(new Error('boom'))).toBe('boom');
      expect(errorMessage(42)).toBe('Unknown error');
    });
  });
});
