/**
 * MCP Tool Action Types
 * String literal unions for compile-time safety without breaking MCP wire protocol
 */

/**
 * device_name tool actions
 */
export type DeviceNameAction = 'compose' | 'tables' | 'help';

export const DEVICE_NAME_ACTIONS: readonly DeviceNameAction[] = ['compose', 'tables', 'help'];
