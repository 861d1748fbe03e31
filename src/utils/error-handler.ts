/**
 * Centralized error handling module for IDNT
 * Provides consistent error logging, reporting, and recovery
 */

import { debugLog, debugLogError } from './debug-logger.js';

/**
 * Console error wrapper that writes to the debug log instead of stderr.
 *
 * In MCP mode stdout carries JSON-RPC and stray stderr output confuses some
 * clients, so diagnostics go to the debug log file only.
 */
export function safeConsoleError(...args: unknown[]): void {
  const message = args.map(arg =>
    typeof arg === 'object' && arg !== null ? JSON.stringify(arg) : String(arg)
  ).join(' ');

  debugLog('INFO', message);
}

/**
 * Format error details for logging and reporting
 */
export function formatErrorDetails(error: unknown): {
  message: string;
  stack?: string;
  errorType: string;
} {
  const message = error instanceof Error ? error.message : String(error);
  const stack = error instanceof Error ? error.stack : undefined;
  const errorType = error instanceof Error ? error.constructor.name : typeof error;

  return { message, stack, errorType };
}

/**
 * Handle tool execution errors
 * Logs the error with context and returns formatted error response
 *
 * Stack traces are ONLY written to logs, never returned to the MCP client
 */
export function handleToolError(
  toolName: string,
  action: string,
  error: unknown,
  params?: unknown
): { message: string } {
  const { message, errorType } = formatErrorDetails(error);

  debugLogError(`Tool ${toolName}.${action}`, error, {
    tool: toolName,
    action,
    params,
    errorType,
  });

  return { message };
}

/**
 * Handle initialization errors (system-critical)
 * Logs the error at FATAL level and returns formatted error message
 */
export function handleInitializationError(error: unknown): string {
  const { message, errorType } = formatErrorDetails(error);

  debugLogError('INITIALIZATION_ERROR', error, { errorType }, 'FATAL');

  return message;
}

/**
 * Setup global error handlers for uncaught exceptions, unhandled rejections
 * and termination signals.
 *
 * Uncaught errors are logged at FATAL, cleanup runs, and the process exits 1.
 * SIGINT/SIGTERM run cleanup and exit 0.
 */
export function setupGlobalErrorHandlers(onCleanup?: () => void): void {
  const fail = (kind: string, reason: unknown): void => {
    const { message, errorType } = formatErrorDetails(reason);
    debugLogError(kind, reason, { errorType }, 'FATAL');
    console.error(`❌ ${kind}: ${message}`);
    onCleanup?.();
    process.exit(1);
  };

  process.on('uncaughtException', (error: Error) => fail('UNCAUGHT_EXCEPTION', error));
  process.on('unhandledRejection', (reason: unknown) => fail('UNHANDLED_REJECTION', reason));

  const shutdown = (signal: string): void => {
    debugLog('INFO', `Received ${signal}, shutting down`);
    onCleanup?.();
    process.exit(0);
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}
