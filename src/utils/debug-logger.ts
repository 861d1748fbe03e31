/**
 * Debug Logger for the IDNT device naming tool
 *
 * Enables debug logging when specified via CLI arg, environment variable, or config file.
 * Priority: CLI arg > Environment variable > Config file
 *
 * Usage:
 *   idnt --debug-log=/path/to/debug.log
 *   IDNT_DEBUG=/path/to/debug.log idnt
 *   OR set debug.log_path in idnt.toml
 */

import * as fs from 'fs';
import * as path from 'path';
import { APP_NAME } from '../constants.js';

export type LogLevel = 'FATAL' | 'ERROR' | 'WARN' | 'INFO' | 'DEBUG';

/**
 * Where the log path came from, shown in the log banner
 */
export type DebugLogSource = 'CLI Argument' | 'Environment Variable' | 'Config File' | 'Caller';

let debugEnabled = false;
let debugStream: fs.WriteStream | null = null;
let currentLogLevel: LogLevel = 'INFO';

// Log level hierarchy (higher number = more verbose)
// FATAL: System-critical errors (crashes, initialization failures)
// ERROR: Application errors (tool failures)
// WARN: Warnings (fallback tables, skipped rows, bad config values)
// INFO: Informational messages (startup, configuration)
// DEBUG: Detailed debugging information
const LOG_LEVELS: Record<LogLevel, number> = {
  FATAL: 0,
  ERROR: 1,
  WARN: 2,
  INFO: 3,
  DEBUG: 4,
};

const LOG_LEVEL_NAMES: readonly LogLevel[] = ['FATAL', 'ERROR', 'WARN', 'INFO', 'DEBUG'];

/**
 * Narrow a case-insensitive level name to a LogLevel
 */
export function parseLogLevel(value: string | undefined): LogLevel | null {
  if (!value) {
    return null;
  }
  const upper = value.toUpperCase();
  return LOG_LEVEL_NAMES.find(level => level === upper) ?? null;
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] <= LOG_LEVELS[currentLogLevel];
}

/**
 * Initialize debug logger
 * @param debugLogPath - Log path (already resolved with priority: CLI > env > config)
 * @param logLevel - Log level (case-insensitive: "error", "warn", "info", "debug")
 * @param source - Where the path came from
 */
export function initDebugLogger(debugLogPath?: string, logLevel?: string, source: DebugLogSource = 'Caller'): void {
  if (!debugLogPath) {
    return;
  }

  currentLogLevel = parseLogLevel(logLevel) ?? 'INFO';

  try {
    const logDir = path.dirname(debugLogPath);
    if (!fs.existsSync(logDir)) {
      fs.mkdirSync(logDir, { recursive: true });
    }

    // Append mode
    debugStream = fs.createWriteStream(debugLogPath, { flags: 'a' });
    debugEnabled = true;

    debugLog('INFO', '='.repeat(80));
    debugLog('INFO', `${APP_NAME} Debug Log Started`);
    debugLog('INFO', `Process ID: ${process.pid}`);
    debugLog('INFO', `Debug Log Path: ${debugLogPath}`);
    debugLog('INFO', `Log Level: ${currentLogLevel}`);
    debugLog('INFO', `Source: ${source}`);
    debugLog('INFO', '='.repeat(80));
  } catch (error) {
    console.error(`Failed to initialize debug logger: ${error instanceof Error ? error.message : String(error)}`);
    debugEnabled = false;
    debugStream = null;
  }
}

/**
 * Replace newlines so every entry stays on one line
 */
function sanitizeForSingleLine(str: string): string {
  return str.replace(/\r?\n/g, ' ').replace(/\s+/g, ' ').trim();
}

/**
 * Format one log entry: `[timestamp] [LEVEL] message | Data: {...}`
 */
export function formatLogEntry(timestamp: string, level: LogLevel, message: string, data?: unknown): string {
  let entry = `[${timestamp}] [${level}] ${sanitizeForSingleLine(message)}`;
  if (data !== undefined) {
    const dataStr = typeof data === 'string' ? data : JSON.stringify(data);
    entry += ` | Data: ${sanitizeForSingleLine(dataStr ?? String(data))}`;
  }
  return entry;
}

/**
 * Write debug log entry (always single-line format)
 */
export function debugLog(level: LogLevel, message: string, data?: unknown): void {
  if (!debugEnabled || !debugStream) {
    return;
  }

  if (!shouldLog(level)) {
    return;
  }

  try {
    debugStream.write(formatLogEntry(new Date().toISOString(), level, message, data) + '\n');
  } catch (error) {
    console.error(`Failed to write debug log: ${error instanceof Error ? error.message : String(error)}`);
  }
}

/**
 * Log MCP tool call
 */
export function debugLogToolCall(toolName: string, action: string, params: unknown): void {
  debugLog('DEBUG', `Tool Call: ${toolName}.${action}`, { params });
}

/**
 * Log MCP tool response
 */
export function debugLogToolResponse(toolName: string, action: string, success: boolean, result?: unknown, error?: unknown): void {
  debugLog(
    success ? 'DEBUG' : 'ERROR',
    `Tool Response: ${toolName}.${action} ${success ? 'SUCCESS' : 'FAILED'}`,
    success ? result : error
  );
}

/**
 * Log error with stack trace
 * @param context - Error context/description
 * @param level - FATAL for system-critical, ERROR for application errors
 */
export function debugLogError(
  context: string,
  error: unknown,
  additionalContext?: Record<string, unknown>,
  level: 'FATAL' | 'ERROR' = 'ERROR'
): void {
  const errorMessage = error instanceof Error ? error.message : String(error);
  const stack = error instanceof Error ? error.stack : undefined;

  debugLog(level, `${context}: ${errorMessage}`, {
    stack,
    ...additionalContext,
  });
}

/**
 * Close debug logger
 * @param onClosed - Called once buffered entries are flushed to the file
 */
export function closeDebugLogger(onClosed?: () => void): void {
  if (debugStream) {
    debugLog('INFO', `${APP_NAME} Debug Log Ended`);
    debugLog('INFO', '_'.repeat(80));
    debugStream.end(onClosed);
    debugStream = null;
    debugEnabled = false;
  } else if (onClosed) {
    onClosed();
  }
}

/**
 * Check if debug logging is enabled
 */
export function isDebugEnabled(): boolean {
  return debugEnabled;
}
