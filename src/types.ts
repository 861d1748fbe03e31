/**
 * Type definitions for the IDNT device naming tool
 */

export * from './types/naming.js';
export * from './types/form.js';
export * from './types/actions.js';
