import { logger } from '../../utils/logger';
import { isJsonObject } from '../../types/json';
import type { JsonObject, JsonValue } from '../../types/json';
import type { ChatTool } from '../../types/chat';
import type { MessagesTool, MessagesToolChoice } from '../../types/messages';

const SCHEMA_CORE_KEYS = new Set(['type', 'properties', 'required']);

/**
 * Converts chat tool definitions to the Messages API format.
 *
 * Chat uses: { type: "function", function: { name, description, parameters } }
 * Messages uses: { name, description, input_schema }
 *
 * Tools whose parameters are not a JSON object are skipped.
 */
export function convertChatToolsToAnthropic(tools: ChatTool[]): MessagesTool[] {
  const converted: MessagesTool[] = [];

  for (const tool of tools) {
    const params = tool.function.parameters;
    if (!isJsonObject(params)) {
      logger.debug(`Skipping tool without an object parameter schema: ${tool.function.name}`);
      continue;
    }

    const inputSchema: JsonObject = {};
    if (typeof params.type === 'string') {
      inputSchema.type = params.type;
    }
    if (params.properties !== undefined) {
      inputSchema.properties = params.properties;
    }
    if (params.required !== undefined) {
      inputSchema.required = params.required;
    }
    for (const [key, value] of Object.entries(params)) {
      if (!SCHEMA_CORE_KEYS.has(key)) {
        inputSchema[key] = value;
      }
    }

    const messagesTool: MessagesTool = {
      name: tool.function.name,
      input_schema: inputSchema,
    };
    if (tool.function.description) {
      messagesTool.description = tool.function.description;
    }
    converted.push(messagesTool);
  }

  return converted;
}

/**
 * Converts a chat tool_choice directive. Unknown directives are dropped.
 */
export function convertToolChoice(choice: JsonValue | undefined): MessagesToolChoice | undefined {
  if (typeof choice === 'string') {
    switch (choice) {
      case 'auto':
        return { type: 'auto' };
      case 'required':
        return { type: 'any' };
      case 'none':
        return { type: 'none' };
      default:
        return undefined;
    }
  }

  if (!isJsonObject(choice)) return undefined;

  const fn = choice.function;
  switch (choice.type) {
    case 'function':
      return isJsonObject(fn) && typeof fn.name === 'string'
        ? { type: 'tool', name: fn.name }
        : undefined;
    case 'tool':
      return typeof choice.name === 'string' ? { type: 'tool', name: choice.name } : undefined;
    case 'auto':
      return { type: 'auto' };
    case 'any':
      return { type: 'any' };
    case 'none':
      return { type: 'none' };
    default:
      return undefined;
  }
}
