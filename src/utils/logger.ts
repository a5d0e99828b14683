/**
 * Logger re-export from observability module
 * This ensures consistent logging with tracing integration across the application
 */

export { default, logger, isLevelEnabled, LogLevel, LogMeta, Logger } from '../observability/logger';
