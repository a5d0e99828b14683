/**
 * Voice command router: intent recognition, tool registry and dispatch for a
 * voice-controlled desktop assistant
 */

export * from './intent';
export * from './tools';
export * from './llm';
export * from './dispatch';
export * from './assistant';
export * from './desktop';
export * from './config';
export * from './errors';
export { buildAssistant, Assistant, AssistantOverrides } from './bootstrap';
export { createApp, startServer, closeServer, ControlServerDependencies } from './server';
