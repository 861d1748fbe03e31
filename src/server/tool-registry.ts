/**
 * MCP Server - Tool Registry
 * Defines available MCP tools and their metadata
 */

import { Tool } from '@modelcontextprotocol/sdk/types.js';
import { CATEGORIES } from '../constants.js';
import { DEVICE_NAME_ACTIONS } from '../types.js';

export const DEVICE_NAME_TOOL = 'device_name';

/**
 * Get list of all available MCP tools
 * Used by ListToolsRequest handler
 */
export function getToolRegistry(): Tool[] {
  return [
    {
      name: DEVICE_NAME_TOOL,
      description: 'Device Naming - Compose standardized device names from entity, department, division, type, deployment year and technician ID. Use action: "help" for documentation.',
      inputSchema: {
        type: 'object',
        properties: {
          action: {
            type: 'string',
            description: 'Action',
            enum: [...DEVICE_NAME_ACTIONS],
          },
          entity: { type: 'string', description: 'Entity label or code (compose)' },
          department: { type: 'string', description: 'Department label or code (compose)' },
          division: { type: 'string', description: 'Division label or code (compose)' },
          type: { type: 'string', description: 'Device type label or code (compose)' },
          year: { type: ['string', 'number'], description: 'Deployment year; its last digit is used (compose)' },
          tech_id: { type: 'string', description: 'Technician ID (compose)' },
          category: {
            type: 'string',
            description: 'Limit tables to one category (tables)',
            enum: [...CATEGORIES],
          },
        },
        required: ['action'],
      },
    },
  ];
}
