/**
 * @fileoverview Error Classes Export Module
 *
 * Centralized exports for all error classes used by the assistant core
 */

export {
  AssistantError,
  ErrorSeverity,
  ErrorContext,
  ConfigurationError,
  LLMTransportError,
  ToolExecutionError,
  DesktopAutomationError,
  ApplicationLaunchError,
  HttpRequestError,
  AssistantStoppedError,
  ValidationError,
  isAssistantError,
  extractErrorDetails,
  errorMessage
} from './AssistantErrors';
