/**
 * Shutdown Handlers
 * Graceful cleanup of resources on process termination
 */

import { closeDebugLogger, debugLog } from '../utils/debug-logger.js';
import { setupGlobalErrorHandlers } from '../utils/error-handler.js';

/**
 * Register signal handlers for graceful shutdown
 * Ensures the debug log is flushed and closed
 */
export function registerShutdownHandlers(): void {
  setupGlobalErrorHandlers(() => {
    debugLog('INFO', 'Shutting down gracefully');
    closeDebugLogger();
  });
}

/**
 * Perform cleanup on process exit
 * Called on normal close and in fatal error paths
 */
export function performCleanup(): void {
  closeDebugLogger();
}
