/**
 * Wires configuration into the component graph: tool registries, LLM adapter,
 * recognizer, dispatcher and assistant loop
 */

import { AssistantConfig } from './config/ConfigurationTypes';
import { createToolRegistries, ToolDependencies, ToolRegistries } from './tools';
import { IntentRecognizer } from './intent/IntentRecognizer';
import { LLMAdapterFactory } from './llm/LLMAdapterFactory';
import { LLMAdapter } from './llm/types';
import { Dispatcher } from './dispatch/Dispatcher';
import { SpeechSink } from './dispatch/types';
import { AssistantLoop } from './assistant/AssistantLoop';

export interface AssistantOverrides {
  speech: SpeechSink;
  tools?: ToolDependencies;
  /** Replaces the adapter the factory would build from `llm` */
  adapter?: LLMAdapter;
}

export interface Assistant {
  registries: ToolRegistries;
  recognizer: IntentRecognizer;
  dispatcher: Dispatcher;
  loop: AssistantLoop;
}

export function buildAssistant(config: AssistantConfig, overrides: AssistantOverrides): Assistant {
  const registries = createToolRegistries(config, overrides.tools);

  const adapter = config.nlp.engine === 'llm'
    ? overrides.adapter ?? LLMAdapterFactory.create(config.llm)
    : undefined;

  const recognizer = new IntentRecognizer({
    engine: config.nlp.engine,
    adapter,
    registry: registries.main
  });

  const dispatcher = new Dispatcher({
    registry: registries.main,
    builtins: registries.builtin,
    speech: overrides.speech
  });

  const loop = new AssistantLoop({
    recognizer,
    dispatcher,
    speech: overrides.speech,
    conversationFallback: config.llm.conversationFallback,
    maxContextTurns: config.llm.maxContextTurns
  });

  return { registries, recognizer, dispatcher, loop };
}
