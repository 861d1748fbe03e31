/**
 * MCP Server - Tool Handlers
 * Routes tool calls to the naming core
 */

import { CallToolRequest, CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { CATEGORIES } from '../constants.js';
import { compose } from '../naming/composer.js';
import { formatOption, selectionFromInputs } from '../naming/selection.js';
import { getTablePath } from '../tables/loader.js';
import type { Category, ComposedName, DeviceNameAction } from '../types.js';
import { DEVICE_NAME_ACTIONS } from '../types.js';
import { debugLogToolCall, debugLogToolResponse } from '../utils/debug-logger.js';
import { handleToolError } from '../utils/error-handler.js';
import type { AppContext } from './setup.js';
import { DEVICE_NAME_TOOL } from './tool-registry.js';

type ToolParams = Record<string, unknown>;

/**
 * Read an optional string parameter; numbers are accepted and stringified
 */
function stringParam(params: ToolParams, key: string): string | undefined {
  const value = params[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number') {
    return String(value);
  }
  throw new Error(`Parameter "${key}" must be a string`);
}

function isAction(value: string): value is DeviceNameAction {
  return DEVICE_NAME_ACTIONS.some(action => action === value);
}

function isCategory(value: string): value is Category {
  return CATEGORIES.some(category => category === value);
}

/**
 * device_name.compose
 */
export function composeAction(params: ToolParams, context: AppContext): ComposedName & { unresolved: Category[] } {
  const { selection, unresolved } = selectionFromInputs(context.tables, {
    entity: stringParam(params, 'entity'),
    department: stringParam(params, 'department'),
    division: stringParam(params, 'division'),
    type: stringParam(params, 'type'),
    year: stringParam(params, 'year'),
    techId: stringParam(params, 'tech_id'),
  });

  return { ...compose(selection, context.composeOptions), unresolved };
}

/**
 * device_name.tables
 */
export function tablesAction(params: ToolParams, context: AppContext): { tables: object[] } {
  const requested = stringParam(params, 'category');
  if (requested !== undefined && !isCategory(requested)) {
    throw new Error(`Unknown category: ${requested}. Expected one of: ${CATEGORIES.join(', ')}`);
  }

  const categories = requested === undefined ? CATEGORIES : [requested];
  return {
    tables: categories.map(category => {
      const table = context.tables[category];
      return {
        category,
        source: table.source,
        path: getTablePath(category, context.dataDir),
        entries: table.entries.map(entry => ({ ...entry, option: formatOption(entry) })),
      };
    }),
  };
}

/**
 * device_name.help
 */
export function deviceNameHelp(): object {
  return {
    tool: DEVICE_NAME_TOOL,
    description: 'Composes device names as entity + department + division + type + last digit of year + technician ID, with no separators. Empty or unknown values leave their segment out.',
    actions: {
      compose: {
        params: {
          entity: 'label, code or "Label - CODE" (optional)',
          department: 'label, code or "Label - CODE" (optional)',
          division: 'label, code or "Label - CODE" (optional)',
          type: 'label, code or "Label - CODE" (optional)',
          year: 'deployment year, non-numeric values leave the digit out (optional)',
          tech_id: 'technician ID (optional)',
        },
        returns: '{ name, segments: [{ component, value }], unresolved: [category] }',
        example: {
          params: { action: 'compose', entity: 'County', department: 'PW', division: 'ADM', type: 'WK', year: '2026', tech_id: '00A7' },
          name: 'LPWADMWK600A7',
        },
      },
      tables: {
        params: { category: `one of ${CATEGORIES.join(', ')} (optional)` },
        returns: '{ tables: [{ category, source, path, entries }] }',
      },
      help: { returns: 'this document' },
    },
  };
}

/**
 * Handle CallToolRequest - dispatch to the device_name action
 */
export async function handleToolCall(request: CallToolRequest, context: AppContext): Promise<CallToolResult> {
  const { name, arguments: args } = request.params;
  const params: ToolParams = args ?? {};
  const action = typeof params.action === 'string' ? params.action : 'N/A';

  debugLogToolCall(name, action, params);

  try {
    let result: unknown;

    if (name !== DEVICE_NAME_TOOL) {
      throw new Error(`Unknown tool: ${name}`);
    }

    if (!isAction(action)) {
      throw new Error(`Unknown action: ${action}`);
    }

    switch (action) {
      case 'compose': result = composeAction(params, context); break;
      case 'tables': result = tablesAction(params, context); break;
      case 'help': result = deviceNameHelp(); break;
    }

    debugLogToolResponse(name, action, true, result);

    return {
      content: [{ type: 'text', text: JSON.stringify(result, null, 2) }],
    };
  } catch (error) {
    // Stack goes to logs only, not returned to client
    const { message } = handleToolError(name, action, error, params);
    const errorResponse = { error: message };

    debugLogToolResponse(name, action, false, undefined, errorResponse);

    return {
      content: [{ type: 'text', text: JSON.stringify(errorResponse, null, 2) }],
      isError: true,
    };
  }
}
