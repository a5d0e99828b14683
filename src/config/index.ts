/**
 * Configuration module exports
 */

export { ConfigurationManager, ConfigurationLoadOptions, Environment } from './ConfigurationManager';
export { CONFIG_SCHEMA, getRequiredConfigKeys } from './ConfigurationSchema';
export * from './ConfigurationTypes';
