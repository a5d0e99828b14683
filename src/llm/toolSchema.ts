/**
 * @fileoverview Tool catalog and native schema construction
 *
 * Both views are derived from the registry's enabled tools and only list
 * intents the registry currently routes to that tool, so a disabled or
 * overridden tool never reaches the model.
 */

import { ToolRegistry } from '../tools/ToolRegistry';
import { IntentSchema, ParameterSchema } from '../tools/types';
import { FunctionSchema, JsonSchemaProperty } from './types';

/**
 * JSON array describing the tools, for prompt injection
 */
export function buildToolCatalog(registry: ToolRegistry): string {
  const catalog = registry.getEnabledHandlers().map(([toolName, handler]) => ({
    name: toolName,
    description: handler.description,
    supported_intents: handler.getSupportedIntents().filter((intent) => registry.resolve(intent) === toolName)
  }));
  return JSON.stringify(catalog, null, 2);
}

function toProperty(parameter: ParameterSchema): JsonSchemaProperty {
  const property: JsonSchemaProperty = {
    type: parameter.type,
    description: parameter.description
  };
  if (parameter.enum) {
    property.enum = [...parameter.enum];
  }
  if (parameter.items) {
    property.items = { type: parameter.items.type };
  }
  return property;
}

function toFunctionSchema(schema: IntentSchema): FunctionSchema {
  const properties: Record<string, JsonSchemaProperty> = {};
  for (const [name, parameter] of Object.entries(schema.parameters)) {
    properties[name] = toProperty(parameter);
  }
  return {
    name: schema.intent,
    description: schema.description,
    parameters: {
      type: 'object',
      properties,
      required: [...(schema.required ?? [])]
    }
  };
}

/**
 * One function per routable intent. Intents without a declared schema get an
 * empty parameter list.
 */
export function buildFunctionSchemas(registry: ToolRegistry): FunctionSchema[] {
  const functions: FunctionSchema[] = [];

  for (const [toolName, handler] of registry.getEnabledHandlers()) {
    const declared = new Map(handler.getIntentSchemas().map((schema) => [schema.intent, schema]));
    for (const intent of handler.getSupportedIntents()) {
      if (registry.resolve(intent) !== toolName) {
        continue;
      }
      functions.push(
        toFunctionSchema(
          declared.get(intent) ?? { intent, description: `${handler.description} (${intent})`, parameters: {} }
        )
      );
    }
  }

  return functions;
}
